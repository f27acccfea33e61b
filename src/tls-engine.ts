import * as net from 'net';
import * as tls from 'tls';

/**
 * The TLS settings applied to a socket when it's wrapped. Treated as a value:
 * copy it, change the copy, and hand the copy back.
 */
export interface TlsParameters {
    readonly serverNames: readonly string[];
    readonly cipherSuites?: readonly string[];
    readonly endpointIdentificationAlgorithm?: 'HTTPS';
}

export interface TlsTarget {
    host: string;
    port: number;
}

export interface TlsSession {
    readonly peerHost: string;
    readonly peerPort: number | undefined;
    readonly protocol: string | null;
    readonly cipher: tls.CipherNameAndProtocol;
    readonly peerCertificate: tls.PeerCertificate | undefined;
    readonly authorized: boolean;
    readonly valid: boolean;

    /**
     * Drop this session, so it's never offered for resumption again.
     */
    invalidate(): void;
}

export interface TlsEngine {
    getParameters(): TlsParameters;
    wrap(socket: net.Socket, target: TlsTarget, parameters: TlsParameters): tls.TLSSocket;
    getSession(tlsSocket: tls.TLSSocket): TlsSession;
}

interface NodeTlsEngineOptions {
    /**
     * Trust & client identity settings (ca, cert, key, min/maxVersion...)
     * used to build the context for each connection.
     */
    secureContext?: tls.SecureContextOptions;

    /**
     * Whether to reject peers whose chain doesn't validate. Defaults to true.
     */
    rejectUnauthorized?: boolean;

    /**
     * Server names to include in every parameter set, ahead of the target host.
     */
    serverNames?: string[];

    /**
     * Default cipher suites, used when a transport doesn't configure its own.
     */
    cipherSuites?: string[];
}

const skipServerIdentityCheck = () => undefined;

// RFC 6066 allows one host_name entry. We send the target host whenever it's
// listed, and otherwise the most recently added name.
const selectServerName = (serverNames: readonly string[], host: string) => {
    if (net.isIP(host) === 0 && serverNames.includes(host)) return host;
    return serverNames.length > 0
        ? serverNames[serverNames.length - 1]
        : undefined;
};

class NodeTlsSession implements TlsSession {

    private invalidated = false;

    constructor(
        private tlsSocket: tls.TLSSocket,
        private onInvalidate: () => void
    ) {
        this.peerHost = tlsSocket.remoteAddress ?? '';
        this.peerPort = tlsSocket.remotePort;
        this.protocol = tlsSocket.getProtocol();
        this.cipher = tlsSocket.getCipher();
        this.authorized = tlsSocket.authorized;

        const certificate = tlsSocket.getPeerCertificate();
        this.peerCertificate = Object.keys(certificate).length > 0
            ? certificate
            : undefined;
    }

    readonly peerHost: string;
    readonly peerPort: number | undefined;
    readonly protocol: string | null;
    readonly cipher: tls.CipherNameAndProtocol;
    readonly peerCertificate: tls.PeerCertificate | undefined;
    readonly authorized: boolean;

    get valid() {
        return !this.invalidated && !this.tlsSocket.destroyed;
    }

    invalidate() {
        if (this.invalidated) return;
        this.invalidated = true;
        this.onInvalidate();
    }
}

export class NodeTlsEngine implements TlsEngine {

    private sessionCache = new Map<string, Buffer>();
    private sessionKeys = new WeakMap<tls.TLSSocket, string>();
    private invalidatedSockets = new WeakSet<tls.TLSSocket>();

    constructor(
        private options: NodeTlsEngineOptions = {}
    ) {}

    getParameters(): TlsParameters {
        return {
            serverNames: [...(this.options.serverNames ?? [])],
            cipherSuites: this.options.cipherSuites
                ? [...this.options.cipherSuites]
                : undefined
        };
    }

    wrap(socket: net.Socket, target: TlsTarget, parameters: TlsParameters): tls.TLSSocket {
        const sessionKey = `${target.host}:${target.port}`;

        const tlsSocket = tls.connect({
            ...this.options.secureContext,
            socket,
            host: target.host,
            servername: selectServerName(parameters.serverNames, target.host),
            ciphers: parameters.cipherSuites?.join(':')
                ?? this.options.secureContext?.ciphers,
            rejectUnauthorized: this.options.rejectUnauthorized ?? true,
            // Node checks the SNI name by default, which may not be the host we're connecting to:
            checkServerIdentity: parameters.endpointIdentificationAlgorithm === 'HTTPS'
                ? (_servername, certificate) => tls.checkServerIdentity(target.host, certificate)
                : skipServerIdentityCheck,
            session: this.sessionCache.get(sessionKey)
        });

        this.sessionKeys.set(tlsSocket, sessionKey);
        // TLS 1.3 tickets can arrive after the handshake completes, possibly after
        // the session has already been invalidated:
        tlsSocket.on('session', (session: Buffer) => {
            if (this.invalidatedSockets.has(tlsSocket)) return;
            this.sessionCache.set(sessionKey, session);
        });

        return tlsSocket;
    }

    getSession(tlsSocket: tls.TLSSocket): TlsSession {
        return new NodeTlsSession(tlsSocket, () => {
            this.invalidatedSockets.add(tlsSocket);
            const sessionKey = this.sessionKeys.get(tlsSocket);
            if (sessionKey) this.sessionCache.delete(sessionKey);
        });
    }

    hasCachedSession(host: string, port: number) {
        return this.sessionCache.has(`${host}:${port}`);
    }

    clearSessionCache() {
        this.sessionCache.clear();
    }
}
