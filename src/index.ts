export {
    SecureTransport,
    type SecureTransportOptions,
    type SecureTransportState,
    type TransportLogger
} from './secure-transport.js';
export { TcpTransport, type PlainTransport } from './tcp-transport.js';
export {
    NodeTlsEngine,
    type TlsEngine,
    type TlsParameters,
    type TlsSession,
    type TlsTarget
} from './tls-engine.js';
export {
    certificateHostnameVerifier,
    fingerprintHostnameVerifier,
    type HostnameVerifier
} from './hostname-verifiers.js';
export {
    ConnectionError,
    HandshakeError,
    HandshakeTimeoutError,
    PeerUnverifiedError,
    TransportStateError
} from './errors.js';
export { readTransportConfig, type TransportConfig } from './config.js';
export { createSecureTransport } from './connect.js';
