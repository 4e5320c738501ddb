// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { X509Certificate } from 'crypto';
import { createSecureContext, type SecureContext } from 'tls';
import { MalformedResponseError, errorMessage } from '../utils/errors';
import { certificateNotAfter, parseCertificates, parsePrivateKey } from '../x509/pem';
import { commonName, dnsNames, uriNames } from '../x509/san';
import type { Bundle, BundleInfo, LeafCertificate } from './types';

/**
 * Set of CA certificates used to validate peers.
 */
export class TrustPool {
    private readonly anchors: readonly X509Certificate[];

    private constructor(anchors: X509Certificate[]) {
        this.anchors = Object.freeze([...anchors]);
    }

    static empty(): TrustPool {
        return new TrustPool([]);
    }

    /**
     * Build a pool from PEM strings; each string may hold several certificates.
     * Throws MalformedResponseError naming `label` if any string fails to parse.
     */
    static fromPem(label: string, ...pems: string[]): TrustPool {
        const anchors: X509Certificate[] = [];
        for (const pem of pems) {
            anchors.push(...parseCertificates(pem, label));
        }
        return new TrustPool(anchors);
    }

    get size(): number {
        return this.anchors.length;
    }

    certificates(): X509Certificate[] {
        return [...this.anchors];
    }

    toPem(): string[] {
        return this.anchors.map((a) => a.toString());
    }

    /**
     * True when one of the anchors issued and signed `leaf`.
     */
    verifies(leaf: X509Certificate): boolean {
        return this.anchors.some((ca) => leaf.checkIssued(ca) && leaf.verify(ca.publicKey));
    }
}

/**
 * Assemble a bundle from an issued certificate and key. Expiry is read from
 * the leaf itself.
 */
export function createBundle(certificatePem: string, privateKeyPem: string, trustPool: TrustPool): Bundle {
    const [certificate] = parseCertificates(certificatePem, 'certificate');
    const privateKey = parsePrivateKey(privateKeyPem, 'private_key');

    if (!certificate.checkPrivateKey(privateKey)) {
        throw new MalformedResponseError('private_key does not match certificate');
    }

    let secureContext: SecureContext;
    try {
        secureContext = createSecureContext({
            cert: certificatePem,
            key: privateKeyPem,
            ca: trustPool.size > 0 ? trustPool.toPem() : undefined,
        });
    } catch (e) {
        throw new MalformedResponseError(`failed to build TLS context: ${errorMessage(e)}`);
    }

    const leafCertificate: LeafCertificate = Object.freeze({
        certificatePem,
        privateKeyPem,
        certificate,
        privateKey,
        secureContext,
    });

    return Object.freeze({
        leafCertificate,
        trustPool,
        notAfter: certificateNotAfter(certificate),
    });
}

export function bundleInfo(bundle: Bundle): BundleInfo {
    const leaf = bundle.leafCertificate.certificate;
    return {
        notAfter: new Date(bundle.notAfter.getTime()),
        commonName: commonName(leaf),
        serialNumber: BigInt(`0x${leaf.serialNumber}`).toString(),
        dnsNames: dnsNames(leaf.subjectAltName),
        uris: uriNames(leaf.subjectAltName),
    };
}
