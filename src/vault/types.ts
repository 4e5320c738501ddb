// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { MalformedResponseError } from '../utils/errors';

/**
 * Body of `POST /v1/{pki}/issue/{role}`. Unset fields are left out so the
 * role's defaults apply.
 */
export interface IssueRequest {
    common_name?: string;
    alt_names?: string[];
    uri_sans?: string[];
    /** duration string, e.g. "6h" */
    ttl?: string;
}

export interface IssueResponse {
    certificate: string;
    privateKey: string;
    /** May be empty */
    caChain: string[];
    /** May be "" */
    issuingCA: string;
}

export interface VaultClientConfig {
    /** e.g. https://vault.internal:8200 */
    addr: string;
    namespace?: string;
    /** Pre-provisioned token; skips the AppRole login while it is accepted */
    token?: string;
    roleId?: string;
    secretId?: string;
    /** Login endpoint below /v1. Default: auth/approle/login */
    authPath?: string;
    /** Per-request timeout in ms. Default: 10000 */
    timeout?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown, field: string): string {
    if (value === undefined || value === null) return '';
    if (typeof value !== 'string') {
        throw new MalformedResponseError(`vault issue response: ${field} is not a string`);
    }
    return value;
}

/**
 * Validate the JSON of an issue call: `{ data: { certificate, private_key, issuing_ca?, ca_chain? } }`.
 */
export function decodeIssueResponse(body: unknown): IssueResponse {
    if (!isRecord(body) || !isRecord(body.data)) {
        throw new MalformedResponseError('vault issue response missing data');
    }
    const data = body.data;

    const certificate = optionalString(data.certificate, 'certificate');
    const privateKey = optionalString(data.private_key, 'private_key');
    if (certificate === '' || privateKey === '') {
        throw new MalformedResponseError('vault issue response missing certificate/private_key');
    }

    let caChain: string[] = [];
    if (data.ca_chain !== undefined && data.ca_chain !== null) {
        if (!Array.isArray(data.ca_chain) || !data.ca_chain.every((e): e is string => typeof e === 'string')) {
            throw new MalformedResponseError('vault issue response: ca_chain is not a list of strings');
        }
        caChain = [...data.ca_chain];
    }

    return {
        certificate,
        privateKey,
        caChain,
        issuingCA: optionalString(data.issuing_ca, 'issuing_ca'),
    };
}

/**
 * Token from an AppRole login: `{ auth: { client_token } }`.
 */
export function decodeLoginResponse(body: unknown): string {
    const auth = isRecord(body) ? body.auth : undefined;
    const token = isRecord(auth) ? auth.client_token : undefined;
    if (typeof token !== 'string' || token === '') {
        throw new MalformedResponseError('vault approle auth returned empty token');
    }
    return token;
}
