// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

/**
 * Minimal wiring: one certificate identity used both to serve mTLS and to
 * call a peer, rotated in the background.
 *
 *   VAULT_ADDR=https://vault.internal:8200 VAULT_ROLE_ID=... VAULT_SECRET_ID=... \
 *     node dist/examples/basic/server.js
 */

import * as https from 'https';
import { CertManager } from '../../src/certmanager/manager';
import { IdentityAuthorizer } from '../../src/identity/authorizer';
import { getLogger } from '../../src/utils/logger';
import { VaultClient } from '../../src/vault/client';
import { VaultIssuer } from '../../src/vault/issuer';

async function main(): Promise<void> {
    const logger = getLogger();

    const issuer = new VaultIssuer({
        client: new VaultClient({
            addr: process.env.VAULT_ADDR ?? '',
            token: process.env.VAULT_TOKEN,
            roleId: process.env.VAULT_ROLE_ID,
            secretId: process.env.VAULT_SECRET_ID,
        }),
        pkiPath: 'pki',
        role: 'mtls-service',
        commonName: 'service',
        uriSans: ['spiffe://corp/prod/stack/payments/service/api'],
        ttl: 6 * 60 * 60 * 1000,
    });

    const manager = new CertManager(issuer, {
        onError: (_signal, error) => logger.warn(`rotation failed: ${error.message}`),
    });
    await manager.start();

    const controller = new AbortController();
    const loop = manager.run(controller.signal);

    const authorizer = new IdentityAuthorizer({
        allowedPrefixes: ['spiffe://corp/prod/stack/payments/'],
    });

    const server = https.createServer(
        {
            SNICallback: manager.getCertificate,
            ca: manager.current().trustPool.toPem(),
            requestCert: true,
            rejectUnauthorized: true,
        },
        (_req, res) => {
            res.writeHead(200);
            res.end('ok\n');
        },
    );
    // clients that connect by IP send no server name and get the default context
    manager.attachServer(server);
    server.on('secureConnection', (socket) => {
        try {
            authorizer.authorizeSocket(socket);
        } catch (error) {
            logger.warn(error instanceof Error ? error.message : String(error));
            socket.destroy();
        }
    });
    server.listen(8443);

    // Outbound call with the same identity; the peer is checked by SPIFFE ID.
    const request = https.request({
        host: 'ledger.internal',
        port: 8443,
        path: '/health',
        secureContext: manager.getClientCertificate(),
        servername: 'ledger.internal',
        checkServerIdentity: authorizer.checkServerIdentity,
    });
    request.on('error', (error) => logger.warn(`peer call failed: ${error.message}`));
    request.end();

    const shutdown = () => {
        controller.abort();
        server.close();
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    await loop;
}

main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
});
