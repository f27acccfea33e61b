import * as fs from 'fs/promises';

import { readTransportConfig, TransportConfig } from './config.js';
import { SecureTransport, TransportLogger } from './secure-transport.js';
import { NodeTlsEngine } from './tls-engine.js';
import { TcpTransport } from './tcp-transport.js';
import { certificateHostnameVerifier } from './hostname-verifiers.js';

export async function createSecureTransport(config: TransportConfig, logger?: TransportLogger) {
    const ca = config.caFile
        ? await fs.readFile(config.caFile, 'utf8')
        : undefined;

    const transport = new SecureTransport({
        host: config.host,
        port: config.port,
        tlsEngine: new NodeTlsEngine({
            secureContext: ca ? { ca } : undefined,
            rejectUnauthorized: config.rejectUnauthorized
        }),
        plainTransport: new TcpTransport({
            connectTimeoutMs: config.connectTimeoutSecs > 0
                ? config.connectTimeoutSecs * 1000
                : undefined
        }),
        logger
    });

    transport.setEnabledCiphers(config.enabledCiphers);
    transport.setHandshakeTimeout(config.handshakeTimeoutSecs);
    transport.setHttpsHostnameVerificationEnabled(config.httpsHostnameVerificationEnabled);
    if (config.certificateHostnameCheck) {
        transport.setHostnameVerifier(certificateHostnameVerifier);
    }

    return transport;
}

// This is not a perfect test (various odd cases) but good enough
const wasRunDirectly = import.meta.filename === process?.argv[1];
if (wasRunDirectly) {
    const config = readTransportConfig(process.env);

    createSecureTransport(config, console).then(async (transport) => {
        try {
            await transport.start();
            const session = transport.getSession();
            console.log(`Connected to ${transport.getServerURI()} (${session.protocol}, ${session.cipher.name})`);
        } catch (e) {
            console.error(`TLS connection to ${transport.getServerURI()} failed`, e);
            process.exitCode = 1;
        } finally {
            transport.close();
        }
    }).catch((e) => {
        console.error('Could not set up TLS connection', e);
        process.exitCode = 1;
    });
}
