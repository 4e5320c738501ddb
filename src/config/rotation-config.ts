// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { URL } from 'url';
import type { ManagerOptions } from '../certmanager/types';
import { parseDuration } from '../utils/duration';
import type { VaultClientConfig } from '../vault/types';

export interface IssuerConfig {
    pkiPath: string;
    role: string;
    commonName?: string;
    altNames: string[];
    uriSans: string[];
    ttl?: number;
    requireCA: boolean;
}

export type ScheduleConfig = Required<Pick<ManagerOptions, 'minRefresh' | 'errorBackoff' | 'hookTimeout'>>;

export interface RotationConfig {
    vault: VaultClientConfig;
    issuer: IssuerConfig;
    schedule: ScheduleConfig;
}

/**
 * Options as they arrive from the command line. Anything left unset falls
 * back to the matching environment variable.
 */
export interface RotationConfigOptions {
    vaultAddr?: string;
    namespace?: string;
    pkiPath?: string;
    role?: string;
    commonName?: string;
    altNames?: string | string[];
    uriSans?: string | string[];
    ttl?: string;
    requireCa?: boolean;
    minRefresh?: string;
    errorBackoff?: string;
    hookTimeout?: string;
}

type Env = Record<string, string | undefined>;

export class RotationConfigParser {
    /**
     * Parse a comma-separated list (or pass an array through), dropping blanks
     */
    static parseList(input: string | string[] | undefined): string[] {
        if (input === undefined) {
            return [];
        }
        const items = Array.isArray(input) ? input : input.split(',');
        return items.map((item) => item.trim()).filter((item) => item.length > 0);
    }

    static isValidAddr(addr: string): boolean {
        try {
            const url = new URL(addr);
            return url.protocol === 'http:' || url.protocol === 'https:';
        } catch {
            return false;
        }
    }

    static parseBoolean(input: string | undefined): boolean {
        if (input === undefined) return false;
        return ['1', 'true', 'yes', 'on'].includes(input.trim().toLowerCase());
    }

    /**
     * Load configuration from CLI options and environment
     */
    static loadConfig(options: RotationConfigOptions = {}, env: Env = process.env): RotationConfig {
        const addr = options.vaultAddr || env.VAULT_ADDR;
        if (!addr) {
            throw new Error('No Vault address configured. Use --vault-addr flag or VAULT_ADDR env variable');
        }
        if (!this.isValidAddr(addr)) {
            throw new Error(`Invalid Vault address: ${addr}`);
        }

        const role = options.role || env.VAULT_PKI_ROLE;
        if (!role) {
            throw new Error('No PKI role configured. Use --role flag or VAULT_PKI_ROLE env variable');
        }

        const token = env.VAULT_TOKEN || undefined;
        const roleId = env.VAULT_ROLE_ID || undefined;
        const secretId = env.VAULT_SECRET_ID || undefined;
        if (!token && !(roleId && secretId)) {
            throw new Error('No Vault credentials configured. Set VAULT_TOKEN or VAULT_ROLE_ID and VAULT_SECRET_ID');
        }

        const ttlInput = options.ttl || env.CERT_TTL;

        return {
            vault: {
                addr,
                namespace: options.namespace || env.VAULT_NAMESPACE || undefined,
                token,
                roleId,
                secretId,
                authPath: env.VAULT_AUTH_PATH || undefined,
            },
            issuer: {
                pkiPath: options.pkiPath || env.VAULT_PKI_PATH || 'pki',
                role,
                commonName: options.commonName || env.CERT_COMMON_NAME || undefined,
                altNames: this.parseList(options.altNames ?? env.CERT_ALT_NAMES),
                uriSans: this.parseList(options.uriSans ?? env.CERT_URI_SANS),
                ttl: ttlInput ? parseDuration(ttlInput) : undefined,
                requireCA: options.requireCa ?? this.parseBoolean(env.CERT_REQUIRE_CA),
            },
            schedule: {
                minRefresh: this.durationOr(options.minRefresh ?? env.ROTATE_MIN_REFRESH, 30_000),
                errorBackoff: this.durationOr(options.errorBackoff ?? env.ROTATE_ERROR_BACKOFF, 15_000),
                hookTimeout: this.durationOr(options.hookTimeout ?? env.ROTATE_HOOK_TIMEOUT, 2_000),
            },
        };
    }

    private static durationOr(input: string | undefined, fallback: number): number {
        return input ? parseDuration(input) : fallback;
    }
}
