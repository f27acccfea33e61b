import * as tls from 'tls';
import { MaybePromise } from '@httptoolkit/util';

import { TlsSession } from './tls-engine.js';

/**
 * Checks a completed session against the hostname we meant to reach.
 * Runs after the engine has already accepted the peer's chain.
 */
export type HostnameVerifier = (hostname: string, session: TlsSession) => MaybePromise<boolean>;

export const certificateHostnameVerifier: HostnameVerifier = (hostname, session) =>
    session.peerCertificate !== undefined &&
    tls.checkServerIdentity(hostname, session.peerCertificate) === undefined;

const normalizeFingerprint = (fingerprint: string) =>
    fingerprint.replace(/:/g, '').toUpperCase();

/**
 * Accept only peers presenting one of the given certificates, identified by SHA-256
 * fingerprint (with or without colons, in any case). The hostname is ignored.
 */
export function fingerprintHostnameVerifier(fingerprints: string[]): HostnameVerifier {
    const pinned = new Set(fingerprints.map(normalizeFingerprint));

    return (_hostname, session) =>
        session.peerCertificate !== undefined &&
        pinned.has(normalizeFingerprint(session.peerCertificate.fingerprint256));
}
