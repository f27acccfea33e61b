import * as crypto from 'crypto';
import * as tls from 'tls';

import { expect } from 'chai';

import {
    certificateHostnameVerifier,
    fingerprintHostnameVerifier
} from '../src/hostname-verifiers.js';
import { TlsSession } from '../src/tls-engine.js';

import { generateTestCA, generateTestCertificate } from './test-certificates.js';

const buildSession = (peerCertificate: tls.PeerCertificate | undefined): TlsSession => ({
    peerHost: '127.0.0.1',
    peerPort: 8883,
    protocol: 'TLSv1.3',
    cipher: {
        name: 'TLS_AES_256_GCM_SHA384',
        standardName: 'TLS_AES_256_GCM_SHA384',
        version: 'TLSv1.3'
    },
    peerCertificate,
    authorized: true,
    valid: true,
    invalidate: () => {}
});

describe("Hostname verifiers", () => {

    let brokerCertificate: crypto.X509Certificate;

    before(async function () {
        this.timeout(20000);

        const ca = await generateTestCA();
        const { cert } = await generateTestCertificate(ca, 'broker.example.com');
        brokerCertificate = new crypto.X509Certificate(cert);
    });

    describe("certificate hostname verifier", () => {

        it("accepts a certificate issued for the hostname", async () => {
            const session = buildSession(brokerCertificate.toLegacyObject());
            expect(await certificateHostnameVerifier('broker.example.com', session)).to.equal(true);
        });

        it("rejects a certificate issued for another hostname", async () => {
            const session = buildSession(brokerCertificate.toLegacyObject());
            expect(await certificateHostnameVerifier('other.example.com', session)).to.equal(false);
        });

        it("rejects sessions without a peer certificate", async () => {
            expect(await certificateHostnameVerifier('broker.example.com', buildSession(undefined))).to.equal(false);
        });

    });

    describe("fingerprint verifier", () => {

        it("accepts a pinned certificate", async () => {
            const verifier = fingerprintHostnameVerifier([brokerCertificate.fingerprint256]);
            const session = buildSession(brokerCertificate.toLegacyObject());

            expect(await verifier('anything.example', session)).to.equal(true);
        });

        it("ignores colons and case in pinned fingerprints", async () => {
            const pin = brokerCertificate.fingerprint256.replace(/:/g, '').toLowerCase();
            const verifier = fingerprintHostnameVerifier([pin]);
            const session = buildSession(brokerCertificate.toLegacyObject());

            expect(await verifier('broker.example.com', session)).to.equal(true);
        });

        it("rejects certificates that aren't pinned", async () => {
            const verifier = fingerprintHostnameVerifier(['AA:BB:CC']);
            const session = buildSession(brokerCertificate.toLegacyObject());

            expect(await verifier('broker.example.com', session)).to.equal(false);
        });

        it("rejects sessions without a peer certificate", async () => {
            const verifier = fingerprintHostnameVerifier([brokerCertificate.fingerprint256]);
            expect(await verifier('broker.example.com', buildSession(undefined))).to.equal(false);
        });

    });

});
