// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { MalformedResponseError } from '../../utils/errors';
import { decodeIssueResponse, decodeLoginResponse } from '../types';

describe('decodeIssueResponse', () => {
    it('should default optional CA fields', () => {
        expect(decodeIssueResponse({ data: { certificate: 'LEAF', private_key: 'KEY', ca_chain: null } })).toEqual({
            certificate: 'LEAF',
            privateKey: 'KEY',
            caChain: [],
            issuingCA: '',
        });
    });

    it('should require the data envelope', () => {
        expect(() => decodeIssueResponse(null)).toThrow('vault issue response missing data');
        expect(() => decodeIssueResponse({ data: [] })).toThrow('vault issue response missing data');
        expect(() => decodeIssueResponse('LEAF')).toThrow(MalformedResponseError);
    });

    it('should require certificate and private key', () => {
        expect(() => decodeIssueResponse({ data: { certificate: 'LEAF', private_key: '' } })).toThrow(
            'vault issue response missing certificate/private_key',
        );
    });

    it('should reject fields of the wrong type', () => {
        expect(() => decodeIssueResponse({ data: { certificate: 42, private_key: 'KEY' } })).toThrow(
            'vault issue response: certificate is not a string',
        );
        expect(() =>
            decodeIssueResponse({ data: { certificate: 'LEAF', private_key: 'KEY', ca_chain: ['ROOT', 7] } }),
        ).toThrow('vault issue response: ca_chain is not a list of strings');
        expect(() =>
            decodeIssueResponse({ data: { certificate: 'LEAF', private_key: 'KEY', issuing_ca: {} } }),
        ).toThrow('vault issue response: issuing_ca is not a string');
    });

    it('should copy the chain', () => {
        const chain = ['INTERMEDIATE'];
        const decoded = decodeIssueResponse({ data: { certificate: 'LEAF', private_key: 'KEY', ca_chain: chain } });
        chain.push('ROOT');
        expect(decoded.caChain).toEqual(['INTERMEDIATE']);
    });
});

describe('decodeLoginResponse', () => {
    it('should return the client token', () => {
        expect(decodeLoginResponse({ auth: { client_token: 'test-login-token' } })).toBe('test-login-token');
    });

    it('should reject missing or empty tokens', () => {
        expect(() => decodeLoginResponse({})).toThrow('vault approle auth returned empty token');
        expect(() => decodeLoginResponse({ auth: { client_token: '' } })).toThrow(MalformedResponseError);
        expect(() => decodeLoginResponse({ auth: null })).toThrow(MalformedResponseError);
    });
});
