import { CustomError } from '@httptoolkit/util';

const errorCode = (error: Error | undefined): string | undefined => {
    if (!error || !('code' in error)) return undefined;
    return typeof error.code === 'string' ? error.code : undefined;
};

/**
 * The raw TCP connection could not be established. No TLS state is involved.
 */
export class ConnectionError extends CustomError {
    constructor(
        public readonly host: string,
        public readonly port: number,
        message: string,
        options: { code?: string, cause?: Error } = {}
    ) {
        super(message, {
            code: options.code ?? errorCode(options.cause) ?? 'ERR_CONNECT',
            cause: options.cause
        });
    }
}

/**
 * TLS negotiation failed: protocol error, untrusted chain, endpoint identity
 * mismatch, or the connection closing before the handshake completed.
 */
export class HandshakeError extends CustomError {
    constructor(message: string, options: { code?: string, cause?: Error } = {}) {
        super(message, {
            code: options.code ?? errorCode(options.cause) ?? 'ERR_TLS_HANDSHAKE',
            cause: options.cause
        });
    }
}

export class HandshakeTimeoutError extends HandshakeError {
    constructor(serverURI: string, public readonly timeoutMs: number) {
        super(`TLS handshake with ${serverURI} timed out after ${timeoutMs}ms`, {
            code: 'ERR_TLS_HANDSHAKE_TIMEOUT'
        });
    }
}

/**
 * The handshake succeeded, but the configured hostname verifier rejected
 * the peer. Never retried silently by the transport.
 */
export class PeerUnverifiedError extends CustomError {
    constructor(
        public readonly host: string,
        public readonly peerHost: string
    ) {
        super(`Host: ${host}, Peer Host: ${peerHost}`, {
            code: 'ERR_TLS_PEER_UNVERIFIED'
        });
    }
}

export class TransportStateError extends CustomError {
    constructor(message: string) {
        super(message, { code: 'ERR_TRANSPORT_STATE' });
    }
}
