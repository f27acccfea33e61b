export interface TransportConfig {
    host: string;
    port: number;

    enabledCiphers?: string[];
    handshakeTimeoutSecs: number;
    connectTimeoutSecs: number;

    httpsHostnameVerificationEnabled: boolean;
    certificateHostnameCheck: boolean;
    rejectUnauthorized: boolean;
    caFile?: string;
}

const DEFAULT_PORT = 8883; // Standard MQTT-over-TLS port

function readSeconds(env: NodeJS.ProcessEnv, name: string): number {
    const value = env[name];
    if (value === undefined || value === '') return 0;

    const seconds = Number(value);
    if (!Number.isInteger(seconds) || seconds < 0) {
        throw new Error(`Invalid timeout ${value}, expected a whole number of seconds (via $${name})`);
    }
    return seconds;
}

function readFlag(env: NodeJS.ProcessEnv, name: string, defaultValue: boolean): boolean {
    const value = env[name];
    if (value === undefined || value === '') return defaultValue;
    if (value === 'true') return true;
    if (value === 'false') return false;
    throw new Error(`Invalid value ${value}, expected true or false (via $${name})`);
}

export function readTransportConfig(env: NodeJS.ProcessEnv): TransportConfig {
    const host = env.BROKER_HOST;
    if (!host) {
        throw new Error(`Can't connect without configuring a broker host (via $BROKER_HOST)`);
    }

    const port = env.BROKER_PORT ? Number(env.BROKER_PORT) : DEFAULT_PORT;
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new Error(`Invalid broker port ${env.BROKER_PORT} (via $BROKER_PORT)`);
    }

    const enabledCiphers = env.TLS_CIPHERS
        ?.split(',')
        .map(cipher => cipher.trim())
        .filter(cipher => cipher.length > 0);

    return {
        host,
        port,
        enabledCiphers: enabledCiphers?.length ? enabledCiphers : undefined,
        handshakeTimeoutSecs: readSeconds(env, 'TLS_HANDSHAKE_TIMEOUT'),
        connectTimeoutSecs: readSeconds(env, 'CONNECT_TIMEOUT'),
        httpsHostnameVerificationEnabled: readFlag(env, 'TLS_HOSTNAME_VERIFICATION', true),
        certificateHostnameCheck: readFlag(env, 'TLS_CERT_HOSTNAME_CHECK', false),
        rejectUnauthorized: readFlag(env, 'TLS_REJECT_UNAUTHORIZED', true),
        caFile: env.TLS_CA_FILE || undefined
    };
}
