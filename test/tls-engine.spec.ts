import * as net from 'net';
import * as tls from 'tls';

import { expect } from 'chai';

import { NodeTlsEngine } from '../src/tls-engine.js';

import { generateTestCA, generateTestCertificate } from './test-certificates.js';
import { TestTlsServer, startTlsServer } from './test-helpers.js';

describe("Node TLS engine", () => {

    it("returns a fresh copy of the default parameters each time", () => {
        const serverNames = ['broker.example.com'];
        const engine = new NodeTlsEngine({
            serverNames,
            cipherSuites: ['AES256-SHA']
        });

        const parameters = engine.getParameters();
        serverNames.push('other.example.com');

        expect(parameters).to.deep.equal({
            serverNames: ['broker.example.com'],
            cipherSuites: ['AES256-SHA']
        });
        expect(engine.getParameters()).not.to.equal(parameters);
        expect(engine.getParameters().serverNames).not.to.equal(parameters.serverNames);
    });

    it("has no default server names or ciphers", () => {
        expect(new NodeTlsEngine().getParameters()).to.deep.equal({
            serverNames: [],
            cipherSuites: undefined
        });
    });

    describe("wrapping a connection", () => {

        let tlsServer: TestTlsServer;
        let caCert: string;

        before(async function () {
            this.timeout(20000);

            const ca = await generateTestCA();
            caCert = ca.cert;
            tlsServer = await startTlsServer(await generateTestCertificate(ca, 'localhost'));
        });

        after(async () => {
            await tlsServer.server.destroy();
        });

        const connectRaw = async () => {
            const socket = net.connect(tlsServer.port, 'localhost');
            await new Promise<void>((resolve) => socket.on('connect', resolve));
            return socket;
        };

        const handshake = (tlsSocket: tls.TLSSocket) =>
            new Promise<void>((resolve, reject) => {
                tlsSocket.on('secureConnect', resolve);
                tlsSocket.on('error', reject);
            });

        it("sends the target host when it's listed, wherever it appears", async () => {
            tlsServer.serverNames.length = 0;
            const engine = new NodeTlsEngine({ secureContext: { ca: caCert } });

            const tlsSocket = engine.wrap(await connectRaw(), { host: 'localhost', port: tlsServer.port }, {
                serverNames: ['localhost', 'first.example']
            });
            await handshake(tlsSocket);
            tlsSocket.destroy();

            expect(tlsServer.serverNames).to.deep.equal(['localhost']);
        });

        it("sends the most recently added server name if the target isn't listed", async () => {
            tlsServer.serverNames.length = 0;
            const engine = new NodeTlsEngine({ secureContext: { ca: caCert } });

            const tlsSocket = engine.wrap(await connectRaw(), { host: 'localhost', port: tlsServer.port }, {
                serverNames: ['first.example', 'second.example']
            });
            await handshake(tlsSocket);
            tlsSocket.destroy();

            expect(tlsServer.serverNames).to.deep.equal(['second.example']);
        });

        it("describes the completed session", async () => {
            const engine = new NodeTlsEngine({ secureContext: { ca: caCert } });

            const tlsSocket = engine.wrap(await connectRaw(), { host: 'localhost', port: tlsServer.port }, {
                serverNames: ['localhost'],
                endpointIdentificationAlgorithm: 'HTTPS'
            });
            await new Promise<void>((resolve, reject) => {
                tlsSocket.on('secureConnect', resolve);
                tlsSocket.on('error', reject);
            });

            const session = engine.getSession(tlsSocket);
            expect(session.authorized).to.equal(true);
            expect(session.peerPort).to.equal(tlsServer.port);
            expect(session.peerCertificate?.subjectaltname).to.equal('DNS:localhost');
            expect(session.valid).to.equal(true);

            tlsSocket.destroy();
            expect(session.valid).to.equal(false);
        });

    });

});
