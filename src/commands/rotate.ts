// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { bundleInfo } from '../certmanager/bundle';
import { CertManager } from '../certmanager/manager';
import type { Bundle, ManagerOptions } from '../certmanager/types';
import { RotationConfig, RotationConfigOptions, RotationConfigParser } from '../config/rotation-config';
import { getLogger, LogCategory, LogLevel, setLogLevel } from '../utils/logger';
import { VaultClient } from '../vault/client';
import { VaultIssuer } from '../vault/issuer';

interface CommonOptions extends RotationConfigOptions {
    verbose?: boolean;
}

function withCommonOptions(cmd: Command): Command {
    return cmd
        .option('--vault-addr <url>', 'Vault address (default: VAULT_ADDR)')
        .option('--namespace <ns>', 'Vault namespace (default: VAULT_NAMESPACE)')
        .option('--pki-path <path>', 'PKI mount (default: VAULT_PKI_PATH or "pki")')
        .option('--role <role>', 'PKI role (default: VAULT_PKI_ROLE)')
        .option('--common-name <cn>', 'Certificate common name (default: CERT_COMMON_NAME)')
        .option('--alt-names <names>', 'Comma-separated DNS names (default: CERT_ALT_NAMES)')
        .option('--uri-sans <uris>', 'Comma-separated URI SANs (default: CERT_URI_SANS)')
        .option('--ttl <duration>', 'Requested lifetime, e.g. 6h (default: CERT_TTL)')
        .option('--require-ca', 'Fail when Vault returns no CA material (default: CERT_REQUIRE_CA)')
        .option('--verbose', 'Enable verbose output');
}

export function buildManager(config: RotationConfig, hooks: Pick<ManagerOptions, 'onRotate' | 'onError'> = {}): CertManager {
    const client = new VaultClient(config.vault);
    const issuer = new VaultIssuer({ client, ...config.issuer });
    return new CertManager(issuer, { ...config.schedule, ...hooks });
}

function writeBundle(bundle: Bundle, dir: string): void {
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(path.join(dir, 'cert.pem'), bundle.leafCertificate.certificatePem);
    fs.writeFileSync(path.join(dir, 'key.pem'), bundle.leafCertificate.privateKeyPem, { mode: 0o600 });
    fs.writeFileSync(path.join(dir, 'ca.pem'), bundle.trustPool.toPem().join('\n'));
}

export function registerRotateCommands(program: Command): void {
    withCommonOptions(
        program
            .command('issue')
            .description('Issue one certificate and print its details')
            .option('--out <dir>', 'Write cert.pem, key.pem and ca.pem into this directory'),
    ).action(async (options: CommonOptions & { out?: string }) => {
        setLogLevel(options.verbose ? LogLevel.VERBOSE : LogLevel.STANDARD);
        const logger = getLogger();

        try {
            const config = RotationConfigParser.loadConfig(options);
            const manager = buildManager(config);
            await manager.start();

            const bundle = manager.current();
            if (options.out) {
                writeBundle(bundle, options.out);
                logger.success(`Wrote bundle to ${options.out}`);
            }
            logger.info(JSON.stringify(bundleInfo(bundle), null, 2));
        } catch (error) {
            if (error instanceof Error) {
                logger.error('Issue failed', error);
            } else {
                logger.error('Issue failed: An unknown error occurred');
            }
            process.exit(1);
        }
    });

    withCommonOptions(
        program
            .command('watch')
            .description('Keep a certificate rotated until interrupted')
            .option('--out <dir>', 'Rewrite cert.pem, key.pem and ca.pem on every rotation')
            .option('--min-refresh <duration>', 'Minimum wait between refreshes (default: ROTATE_MIN_REFRESH or 30s)')
            .option('--error-backoff <duration>', 'Wait after a failed refresh (default: ROTATE_ERROR_BACKOFF or 15s)')
            .option('--hook-timeout <duration>', 'Deadline for rotation hooks (default: ROTATE_HOOK_TIMEOUT or 2s)'),
    ).action(async (options: CommonOptions & { out?: string }) => {
        setLogLevel(options.verbose ? LogLevel.VERBOSE : LogLevel.STANDARD);
        const logger = getLogger();

        let manager: CertManager;
        try {
            const config = RotationConfigParser.loadConfig(options);
            manager = buildManager(config, {
                onRotate: (_signal, info) => {
                    if (options.out) {
                        writeBundle(manager.current(), options.out);
                    }
                    logger.success(`Rotated certificate ${info.serialNumber}, expires ${info.notAfter.toISOString()}`);
                },
                onError: (_signal, error) => {
                    logger.error('Rotation failed', error);
                },
            });
        } catch (error) {
            logger.error(`Invalid configuration: ${error instanceof Error ? error.message : String(error)}`);
            process.exit(1);
        }

        const controller = new AbortController();
        const stop = () => controller.abort();
        process.once('SIGINT', stop);
        process.once('SIGTERM', stop);

        logger.verbose(LogCategory.ROTATE, 'Starting rotation loop');
        await manager.run(controller.signal);
        logger.info('Rotation stopped');
    });
}
