import * as net from 'net';

import { ConnectionError } from './errors.js';

/**
 * The raw stream layer underneath a secure transport. Timeouts are in
 * milliseconds, with 0 meaning no timeout, as with `socket.setTimeout`.
 */
export interface PlainTransport {
    connect(host: string, port: number): Promise<net.Socket>;
    getReadTimeout(socket: net.Socket): number;
    setReadTimeout(socket: net.Socket, timeoutMs: number): void;
    close(socket: net.Socket): void;
}

interface TcpTransportOptions {
    /**
     * Maximum time to wait for the TCP connection to open. When unset, the
     * fallback timeout is used, which is 0 (left to the OS) unless changed.
     */
    connectTimeoutMs?: number;
}

export class TcpTransport implements PlainTransport {

    private fallbackConnectTimeoutMs = 0;

    constructor(
        private options: TcpTransportOptions = {}
    ) {}

    getConnectTimeout() {
        return this.options.connectTimeoutMs ?? this.fallbackConnectTimeoutMs;
    }

    /**
     * Set the connect timeout used when no `connectTimeoutMs` option was given.
     */
    setFallbackConnectTimeout(timeoutMs: number) {
        this.fallbackConnectTimeoutMs = timeoutMs;
    }

    connect(host: string, port: number): Promise<net.Socket> {
        const connectTimeoutMs = this.getConnectTimeout();
        const socket = net.connect({ host, port });

        return new Promise<net.Socket>((resolve, reject) => {
            const cleanup = () => {
                socket.removeListener('connect', onConnect);
                socket.removeListener('error', onError);
                socket.removeListener('timeout', onTimeout);
                socket.setTimeout(0);
            };

            const onConnect = () => {
                cleanup();
                resolve(socket);
            };

            const onError = (err: Error) => {
                cleanup();
                socket.destroy();
                reject(new ConnectionError(host, port,
                    `Could not connect to ${host}:${port}: ${err.message}`,
                    { cause: err }
                ));
            };

            const onTimeout = () => {
                cleanup();
                socket.destroy();
                reject(new ConnectionError(host, port,
                    `Connecting to ${host}:${port} timed out after ${connectTimeoutMs}ms`,
                    { code: 'ERR_CONNECT_TIMEOUT' }
                ));
            };

            socket.once('connect', onConnect);
            socket.once('error', onError);
            if (connectTimeoutMs > 0) {
                socket.setTimeout(connectTimeoutMs);
                socket.once('timeout', onTimeout);
            }
        });
    }

    getReadTimeout(socket: net.Socket) {
        return socket.timeout ?? 0;
    }

    setReadTimeout(socket: net.Socket, timeoutMs: number) {
        socket.setTimeout(timeoutMs);
    }

    close(socket: net.Socket) {
        socket.destroy();
    }
}
