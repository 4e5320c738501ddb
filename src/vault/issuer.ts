// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { createBundle, TrustPool } from '../certmanager/bundle';
import type { Bundle, Issuer } from '../certmanager/types';
import { formatTtl } from '../utils/duration';
import { PolicyViolationError } from '../utils/errors';
import { getLogger, LogCategory } from '../utils/logger';
import type { VaultClient } from './client';
import type { IssueRequest, IssueResponse } from './types';

export interface VaultIssuerOptions {
    client: VaultClient;
    /** PKI secrets engine mount, e.g. "pki" or "pki_int" */
    pkiPath: string;
    role: string;
    commonName?: string;
    altNames?: string[];
    uriSans?: string[];
    /** Requested lifetime in ms; the role default applies when unset */
    ttl?: number;
    /** Fail issuance when Vault returns neither ca_chain nor issuing_ca */
    requireCA?: boolean;
}

/**
 * Issuer backed by a Vault/OpenBao PKI role.
 */
export class VaultIssuer implements Issuer {
    constructor(private readonly options: VaultIssuerOptions) {}

    async issue(signal?: AbortSignal): Promise<Bundle> {
        const { client, pkiPath, role } = this.options;
        const logger = getLogger();

        const response = await client.issue(pkiPath, role, this.buildRequest(), signal);
        const trustPool = this.buildTrustPool(response);
        const bundle = createBundle(response.certificate, response.privateKey, trustPool);

        logger.verbose(LogCategory.VAULT, `Issued certificate from ${pkiPath}/issue/${role}`);
        logger.verboseIndent(LogCategory.VAULT, `Trust anchors: ${trustPool.size}`);
        logger.verboseIndent(LogCategory.VAULT, `Not after: ${bundle.notAfter.toISOString()}`);
        return bundle;
    }

    buildRequest(): IssueRequest {
        const { commonName, altNames, uriSans, ttl } = this.options;
        const request: IssueRequest = {};
        if (commonName) request.common_name = commonName;
        if (altNames && altNames.length > 0) request.alt_names = [...altNames];
        if (uriSans && uriSans.length > 0) request.uri_sans = [...uriSans];
        if (ttl !== undefined && ttl > 0) request.ttl = formatTtl(ttl);
        return request;
    }

    /**
     * Every ca_chain entry; issuing_ca only when the chain is empty.
     */
    private buildTrustPool(response: IssueResponse): TrustPool {
        if (response.caChain.length > 0) {
            return TrustPool.fromPem('vault ca_chain', ...response.caChain);
        }
        if (response.issuingCA !== '') {
            return TrustPool.fromPem('vault issuing_ca', response.issuingCA);
        }
        if (this.options.requireCA) {
            throw new PolicyViolationError('vault issue response missing ca_chain/issuing_ca');
        }
        return TrustPool.empty();
    }
}
