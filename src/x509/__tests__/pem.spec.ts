// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { MalformedResponseError } from '../../utils/errors';
import { createTestCA, issueTestLeaf, wholeSeconds } from '../../../tests/helpers/pki';
import { certificateNotAfter, parseCertificates, parsePrivateKey, splitCertificatePem } from '../pem';

const BROKEN_BLOCK = '-----BEGIN CERTIFICATE-----\nAAAA\n-----END CERTIFICATE-----\n';

describe('PEM helpers', () => {
    const ca = createTestCA();
    const leaf = issueTestLeaf(ca);

    it('should split concatenated certificates', () => {
        expect(splitCertificatePem(leaf.certPem + ca.certPem)).toHaveLength(2);
        expect(splitCertificatePem('no pem here')).toEqual([]);
    });

    it('should parse every block in order', () => {
        const certs = parseCertificates(leaf.certPem + ca.certPem, 'certificate');
        expect(certs).toHaveLength(2);
        expect(certs[1].subject).toBe('CN=Test Root CA');
    });

    it('should name the field when no block is present', () => {
        expect(() => parseCertificates('garbage', 'ca_chain')).toThrow(MalformedResponseError);
        expect(() => parseCertificates('garbage', 'ca_chain')).toThrow('ca_chain contained invalid PEM');
    });

    it('should name the index of a block that fails to decode', () => {
        expect(() => parseCertificates(ca.certPem + BROKEN_BLOCK, 'ca_chain')).toThrow(/^ca_chain certificate\[1\]: /);
    });

    it('should parse private keys', () => {
        expect(parsePrivateKey(leaf.keyPem, 'private_key').asymmetricKeyType).toBe('rsa');
        expect(() => parsePrivateKey('nope', 'private_key')).toThrow(/^private_key contained invalid PEM: /);
    });

    it('should read expiry from the leaf', () => {
        const notAfter = new Date(Date.now() + 2 * 60 * 60 * 1000);
        const pem = issueTestLeaf(ca, { notAfter }).certPem;
        const [cert] = parseCertificates(pem, 'certificate');
        expect(certificateNotAfter(cert)).toEqual(wholeSeconds(notAfter));
    });
});
