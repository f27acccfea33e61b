import * as net from 'net';
import * as tls from 'tls';

import { PlainTransport, TcpTransport } from './tcp-transport.js';
import { NodeTlsEngine, TlsEngine, TlsParameters, TlsSession } from './tls-engine.js';
import { HostnameVerifier } from './hostname-verifiers.js';
import {
    HandshakeError,
    HandshakeTimeoutError,
    PeerUnverifiedError,
    TransportStateError
} from './errors.js';

export type SecureTransportState =
    | 'unstarted'
    | 'tcp-connected'
    | 'ciphers-applied'
    | 'params-configured'
    | 'handshake-done'
    | 'verified'
    | 'failed';

export type TransportLogger = Pick<Console, 'log'>;

export interface SecureTransportOptions {
    host: string;
    port: number;

    tlsEngine?: TlsEngine;
    plainTransport?: PlainTransport;
    logger?: TransportLogger;
}

/**
 * Opens a TCP connection to a broker and upgrades it to TLS, with a bounded
 * handshake, explicit SNI, optional cipher restrictions and an optional
 * pluggable check of the peer's identity.
 *
 * Each instance makes a single connection attempt. Create a new one to retry.
 */
export class SecureTransport {

    readonly host: string;
    readonly port: number;

    private tlsEngine: TlsEngine;
    private plainTransport: PlainTransport;
    private logger: TransportLogger | undefined;

    private enabledCiphers: string[] | undefined;
    private handshakeTimeoutSecs = 0;
    private hostnameVerifier: HostnameVerifier | undefined;
    private httpsHostnameVerificationEnabled = true;

    private state: SecureTransportState = 'unstarted';
    private started = false;
    private closed = false;

    private rawSocket: net.Socket | undefined;
    private tlsSocket: tls.TLSSocket | undefined;
    private tlsParameters: TlsParameters | undefined;

    constructor(options: SecureTransportOptions) {
        if (!Number.isInteger(options.port) || options.port < 1 || options.port > 65535) {
            throw new RangeError(`Invalid port for ${options.host}: ${options.port}`);
        }

        this.host = options.host;
        this.port = options.port;
        this.tlsEngine = options.tlsEngine ?? new NodeTlsEngine();
        this.plainTransport = options.plainTransport ?? new TcpTransport();
        this.logger = options.logger;
    }

    getEnabledCiphers(): readonly string[] | undefined {
        return this.enabledCiphers;
    }

    /**
     * Restrict the cipher suites the handshake may negotiate. An empty list or
     * undefined leaves the engine defaults in place. Once the TLS socket has been
     * created, changes only take effect for a new transport.
     */
    setEnabledCiphers(enabledCiphers: readonly string[] | undefined) {
        this.enabledCiphers = enabledCiphers && enabledCiphers.length > 0
            ? [...enabledCiphers]
            : undefined;

        if (this.tlsParameters && !this.tlsSocket && this.enabledCiphers) {
            this.logger?.log(`setEnabledCiphers ciphers=${this.enabledCiphers.join(',')}`);
            this.tlsParameters = {
                ...this.tlsParameters,
                cipherSuites: this.enabledCiphers
            };
        }
    }

    getHandshakeTimeout() {
        return this.handshakeTimeoutSecs;
    }

    /**
     * Bound the TLS handshake, in whole seconds. 0 installs no bound of its own,
     * leaving any read timeout already set on the socket in effect.
     *
     * With a {@link TcpTransport} that has no `connectTimeoutMs` of its own, this
     * also bounds the TCP connect.
     */
    setHandshakeTimeout(timeoutSecs: number) {
        if (!Number.isInteger(timeoutSecs) || timeoutSecs < 0) {
            throw new RangeError(`Handshake timeout must be a whole number of seconds, got ${timeoutSecs}`);
        }
        this.handshakeTimeoutSecs = timeoutSecs;

        if (this.plainTransport instanceof TcpTransport) {
            this.plainTransport.setFallbackConnectTimeout(timeoutSecs * 1000);
        }
    }

    getHostnameVerifier() {
        return this.hostnameVerifier;
    }

    setHostnameVerifier(hostnameVerifier: HostnameVerifier | undefined) {
        this.hostnameVerifier = hostnameVerifier;
    }

    isHttpsHostnameVerificationEnabled() {
        return this.httpsHostnameVerificationEnabled;
    }

    setHttpsHostnameVerificationEnabled(enabled: boolean) {
        this.httpsHostnameVerificationEnabled = enabled;
    }

    getServerURI() {
        return `ssl://${this.host}:${this.port}`;
    }

    getState() {
        return this.state;
    }

    /**
     * The parameter set applied (or about to be applied) to the TLS socket,
     * or undefined before the TCP connection opens.
     */
    getTlsParameters() {
        return this.tlsParameters;
    }

    getSocket(): tls.TLSSocket {
        if (this.state !== 'verified' || !this.tlsSocket) {
            throw new TransportStateError(
                `No secure socket available for ${this.getServerURI()} in state ${this.state}`
            );
        }
        return this.tlsSocket;
    }

    getSession(): TlsSession {
        return this.tlsEngine.getSession(this.getSocket());
    }

    async start(): Promise<void> {
        if (this.started) {
            throw new TransportStateError(
                `Transport to ${this.getServerURI()} has already been started (state: ${this.state})`
            );
        }
        this.started = true;

        try {
            await this.upgrade();
        } catch (e) {
            this.state = 'failed';
            this.closeSockets();
            throw e;
        }
    }

    /**
     * Close the connection. During start this cancels the attempt, which then
     * rejects. Safe to call repeatedly.
     */
    close() {
        this.closed = true;
        this.closeSockets();
    }

    private async upgrade() {
        const rawSocket = await this.plainTransport.connect(this.host, this.port);
        this.rawSocket = rawSocket;
        if (this.closed) {
            throw new TransportStateError(`Transport to ${this.getServerURI()} was closed while connecting`);
        }
        this.state = 'tcp-connected';

        this.tlsParameters = this.tlsEngine.getParameters();
        this.setEnabledCiphers(this.enabledCiphers);
        this.state = 'ciphers-applied';

        // The ambient timeout moves to the TLS socket, which takes over the connection:
        const savedTimeoutMs = this.plainTransport.getReadTimeout(rawSocket);
        this.plainTransport.setReadTimeout(rawSocket, 0);
        const handshakeTimeoutMs = this.handshakeTimeoutSecs > 0
            ? this.handshakeTimeoutSecs * 1000
            : savedTimeoutMs;

        this.tlsParameters = this.configureParameters(this.tlsParameters);
        this.state = 'params-configured';

        const tlsSocket = this.tlsEngine.wrap(rawSocket, {
            host: this.host,
            port: this.port
        }, this.tlsParameters);
        this.tlsSocket = tlsSocket;

        this.plainTransport.setReadTimeout(tlsSocket, handshakeTimeoutMs);
        await this.handshake(tlsSocket, handshakeTimeoutMs);
        this.state = 'handshake-done';

        if (this.hostnameVerifier) {
            await this.verifyPeer(tlsSocket, this.hostnameVerifier);
        }

        this.plainTransport.setReadTimeout(tlsSocket, savedTimeoutMs);
        this.state = 'verified';
        this.logger?.log(`TLS connection established to ${this.getServerURI()}`);
    }

    private async verifyPeer(tlsSocket: tls.TLSSocket, hostnameVerifier: HostnameVerifier) {
        const session = this.tlsEngine.getSession(tlsSocket);

        // Verifiers may be async, so the connection can fail underneath them:
        let socketError: Error | undefined;
        const onError = (err: Error) => { socketError = err; };
        tlsSocket.on('error', onError);

        let accepted: boolean;
        try {
            accepted = await hostnameVerifier(this.host, session);
        } finally {
            tlsSocket.removeListener('error', onError);
        }

        if (!accepted) {
            session.invalidate();
            this.closeSockets();
            throw new PeerUnverifiedError(this.host, session.peerHost);
        }

        if (socketError || tlsSocket.destroyed) {
            throw new HandshakeError(
                `Connection to ${this.getServerURI()} closed during peer verification`,
                { cause: socketError }
            );
        }
    }

    private configureParameters(parameters: TlsParameters): TlsParameters {
        // Extend any names already configured, never replace them:
        const serverNames = [...parameters.serverNames];
        if (net.isIP(this.host) === 0 && !serverNames.includes(this.host)) {
            serverNames.push(this.host);
        }

        return {
            ...parameters,
            serverNames,
            ...(this.httpsHostnameVerificationEnabled
                ? { endpointIdentificationAlgorithm: 'HTTPS' as const }
                : {}
            )
        };
    }

    private handshake(tlsSocket: tls.TLSSocket, timeoutMs: number) {
        const serverURI = this.getServerURI();

        return new Promise<void>((resolve, reject) => {
            const cleanup = () => {
                tlsSocket.removeListener('secureConnect', onSecureConnect);
                tlsSocket.removeListener('error', onError);
                tlsSocket.removeListener('close', onClose);
                tlsSocket.removeListener('timeout', onTimeout);
            };

            const onSecureConnect = () => {
                cleanup();
                resolve();
            };

            const onError = (err: Error) => {
                cleanup();
                reject(new HandshakeError(
                    `TLS handshake with ${serverURI} failed: ${err.message}`,
                    { cause: err }
                ));
            };

            const onClose = () => {
                cleanup();
                reject(new HandshakeError(
                    `Connection to ${serverURI} closed before the TLS handshake completed`
                ));
            };

            const onTimeout = () => {
                cleanup();
                reject(new HandshakeTimeoutError(serverURI, timeoutMs));
            };

            tlsSocket.once('secureConnect', onSecureConnect);
            tlsSocket.once('error', onError);
            tlsSocket.once('close', onClose);
            tlsSocket.once('timeout', onTimeout);
        });
    }

    private closeSockets() {
        if (this.tlsSocket) this.plainTransport.close(this.tlsSocket);
        if (this.rawSocket) this.plainTransport.close(this.rawSocket);
    }
}
