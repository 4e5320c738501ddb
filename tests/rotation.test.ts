// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import axios from 'axios';
import MockAdapter from 'axios-mock-adapter';
import { CertManager } from '../src/certmanager/manager';
import type { BundleInfo } from '../src/certmanager/types';
import { NotReadyError, PolicyViolationError } from '../src/utils/errors';
import { Logger, LogLevel } from '../src/utils/logger';
import { VaultClient } from '../src/vault/client';
import { VaultIssuer, VaultIssuerOptions } from '../src/vault/issuer';
import type { VaultClientConfig } from '../src/vault/types';
import { createTestCA, issueTestLeaf } from './helpers/pki';
import { waitFor } from './helpers/wait';

const ADDR = 'https://vault.test:8200';
const ISSUE_URL = `${ADDR}/v1/pki/issue/web`;
const LOGIN_URL = `${ADDR}/v1/auth/approle/login`;

describe('certificate rotation against a Vault PKI role', () => {
    const ca = createTestCA('Vault Test CA');
    const uri = 'spiffe://corp/prod/web';

    let mock: MockAdapter;
    let controller: AbortController;
    let loops: Promise<void>[];

    const issuerFor = (client: Partial<VaultClientConfig> = {}, options: Partial<VaultIssuerOptions> = {}) =>
        new VaultIssuer({
            client: new VaultClient({ addr: ADDR, token: 'test-token', ...client }),
            pkiPath: 'pki',
            role: 'web',
            commonName: 'web',
            uriSans: [uri],
            ttl: 60 * 60 * 1000,
            ...options,
        });

    const issueResponse = (extra: Record<string, unknown> = {}, serialNumber?: string) => {
        const leaf = issueTestLeaf(ca, { commonName: 'web', uris: [uri], serialNumber });
        return { data: { certificate: leaf.certPem, private_key: leaf.keyPem, ...extra } };
    };

    beforeEach(() => {
        mock = new MockAdapter(axios);
        controller = new AbortController();
        loops = [];
    });

    afterEach(async () => {
        controller.abort();
        await Promise.all(loops);
        mock.restore();
    });

    it('should trust the issuing CA when Vault returns no chain', async () => {
        mock.onPost(ISSUE_URL).reply(200, issueResponse({ issuing_ca: ca.certPem }));

        const bundle = await issuerFor().issue();

        expect(bundle.trustPool.size).toBe(1);
        expect(bundle.trustPool.verifies(bundle.leafCertificate.certificate)).toBe(true);
    });

    it('should issue with an empty trust pool when CA material is optional', async () => {
        mock.onPost(ISSUE_URL).reply(200, issueResponse());

        const bundle = await issuerFor().issue();

        expect(bundle.trustPool.size).toBe(0);
        expect(bundle.trustPool.verifies(bundle.leafCertificate.certificate)).toBe(false);
    });

    it('should refuse to issue without CA material when CA is required', async () => {
        mock.onPost(ISSUE_URL).reply(200, issueResponse());

        await expect(issuerFor({}, { requireCA: true }).issue()).rejects.toBeInstanceOf(PolicyViolationError);
    });

    it('should log in again once when Vault rejects the token', async () => {
        mock.onPost(ISSUE_URL).replyOnce(403, { errors: ['permission denied'] });
        mock.onPost(LOGIN_URL).reply(200, { auth: { client_token: 'test-fresh-token' } });
        mock.onPost(ISSUE_URL).reply(200, issueResponse({ ca_chain: [ca.certPem] }));

        const issuer = issuerFor({ token: 'test-stale-token', roleId: 'test-role-id', secretId: 'test-secret-id' });
        const manager = new CertManager(issuer, { logger: new Logger(LogLevel.SILENT) });
        await manager.start();

        expect(manager.current().trustPool.size).toBe(1);
        expect(mock.history.post.filter((r) => r.url === ISSUE_URL)).toHaveLength(2);
    });

    it('should keep reporting at the backoff while Vault fails', async () => {
        mock.onPost(ISSUE_URL).reply(500, { errors: ['internal error'] });
        const errorBackoff = 40;
        const failures: Array<{ at: number; message: string }> = [];
        const notReady: boolean[] = [];

        const manager = new CertManager(issuerFor(), {
            errorBackoff,
            logger: new Logger(LogLevel.SILENT),
            onError: (_signal, error) => {
                failures.push({ at: Date.now(), message: error.message });
                notReady.push(isNotReady(manager));
            },
        });
        loops.push(manager.run(controller.signal));

        await waitFor(() => failures.length >= 4);
        controller.abort();

        expect(failures[0].message).toBe('vault http 500: {"errors":["internal error"]}');
        // the initial issuance and the first loop pass fail back to back
        for (let i = 2; i < failures.length; i++) {
            // timers may fire a millisecond early
            expect(failures[i].at - failures[i - 1].at).toBeGreaterThanOrEqual(errorBackoff - 2);
        }
        expect(notReady.every(Boolean)).toBe(true);
        expect(isNotReady(manager)).toBe(true);
    });

    it('should rotate through successive certificates', async () => {
        mock.onPost(ISSUE_URL).replyOnce(200, issueResponse({ ca_chain: [ca.certPem] }, '0a00'));
        mock.onPost(ISSUE_URL).replyOnce(200, issueResponse({ ca_chain: [ca.certPem] }, '0a01'));
        mock.onPost(ISSUE_URL).reply(200, issueResponse({ ca_chain: [ca.certPem] }, '0a02'));
        const rotations: BundleInfo[] = [];

        const manager = new CertManager(issuerFor(), {
            minRefresh: 20,
            now: () => new Date(Date.UTC(2030, 0, 1)),
            logger: new Logger(LogLevel.SILENT),
            onRotate: (_signal, info) => void rotations.push(info),
        });
        await manager.start();
        loops.push(manager.run(controller.signal));

        await waitFor(() => rotations.length >= 2);

        expect(rotations.map((r) => r.serialNumber).slice(0, 2)).toEqual(['2561', '2562']);
        expect(rotations[0].uris).toEqual([uri]);
        expect(rotations[0].commonName).toBe('web');
    });
});

function isNotReady(manager: CertManager): boolean {
    try {
        manager.current();
        return false;
    } catch (error) {
        return error instanceof NotReadyError;
    }
}
