// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { X509Certificate, createPrivateKey, KeyObject } from 'crypto';
import { MalformedResponseError, errorMessage } from '../utils/errors';

const CERTIFICATE_BLOCK = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g;

/**
 * Split a PEM string into its certificate blocks.
 */
export function splitCertificatePem(pem: string): string[] {
    return pem.match(CERTIFICATE_BLOCK) ?? [];
}

/**
 * Parse every certificate block in `pem`. A string without any certificate
 * block, or with a block that does not decode, fails as a whole.
 *
 * @param label  names the field in error messages (e.g. "ca_chain")
 */
export function parseCertificates(pem: string, label: string): X509Certificate[] {
    const blocks = splitCertificatePem(pem);
    if (blocks.length === 0) {
        throw new MalformedResponseError(`${label} contained invalid PEM`);
    }
    return blocks.map((block, idx) => {
        try {
            return new X509Certificate(block);
        } catch (e) {
            throw new MalformedResponseError(`${label} certificate[${idx}]: ${errorMessage(e)}`);
        }
    });
}

export function parsePrivateKey(pem: string, label: string): KeyObject {
    try {
        return createPrivateKey(pem);
    } catch (e) {
        throw new MalformedResponseError(`${label} contained invalid PEM: ${errorMessage(e)}`);
    }
}

export function certificateNotAfter(cert: X509Certificate): Date {
    const notAfter = new Date(cert.validTo);
    if (isNaN(notAfter.getTime())) {
        throw new MalformedResponseError(`certificate has unreadable validity: ${cert.validTo}`);
    }
    return notAfter;
}
