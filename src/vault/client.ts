// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import axios, { AxiosInstance, AxiosResponse, CanceledError } from 'axios';
import * as path from 'path';
import { AuthRequiredError, BackendHttpError, errorMessage } from '../utils/errors';
import { getLogger, LogCategory } from '../utils/logger';
import { decodeIssueResponse, decodeLoginResponse, IssueRequest, IssueResponse, VaultClientConfig } from './types';

const DEFAULT_AUTH_PATH = 'auth/approle/login';
const DEFAULT_TIMEOUT = 10_000;

/**
 * Client for the parts of the Vault/OpenBao HTTP API needed to obtain
 * certificates: AppRole login and `pki/issue`.
 *
 * The token is cached. When it is missing, one AppRole login runs and every
 * concurrent caller waits on it. When Vault rejects the token, the client logs
 * in again and retries the issue call once.
 */
export class VaultClient {
    private readonly config: VaultClientConfig;
    private readonly http: AxiosInstance;
    private token: string;
    private pendingLogin: Promise<string> | null = null;

    constructor(config: VaultClientConfig) {
        const logger = getLogger();
        this.config = config;
        this.token = config.token ?? '';
        this.http = axios.create({
            timeout: config.timeout ?? DEFAULT_TIMEOUT,
            headers: {
                'Content-Type': 'application/json',
                ...(config.namespace ? { 'X-Vault-Namespace': config.namespace } : {}),
            },
            // status handling is ours; see post()
            validateStatus: () => true,
        });

        logger.verbose(LogCategory.VAULT, `Vault client initialized for ${config.addr || '<unset>'}`);
        if (config.namespace) {
            logger.verboseIndent(LogCategory.VAULT, `Namespace: ${config.namespace}`);
        }
    }

    /**
     * Request a certificate from `{pkiPath}/issue/{role}`.
     */
    async issue(pkiPath: string, role: string, request: IssueRequest, signal?: AbortSignal): Promise<IssueResponse> {
        if (!this.config.addr) {
            throw new Error('vault addr required');
        }
        if (!pkiPath) {
            throw new Error('pki path required');
        }
        if (!role) {
            throw new Error('pki role required');
        }

        const endpoint = this.url(path.posix.join('v1', pkiPath, 'issue', role));

        const token = await this.ensureToken(signal);
        try {
            return decodeIssueResponse(await this.post(endpoint, request, token, signal));
        } catch (error) {
            if (!isAuthError(error) || !this.canLogin()) {
                throw error;
            }
            getLogger().verbose(LogCategory.VAULT, 'Token rejected, logging in again');
            this.clearToken(token);
        }

        const fresh = await this.ensureToken(signal);
        return decodeIssueResponse(await this.post(endpoint, request, fresh, signal));
    }

    private canLogin(): boolean {
        return Boolean(this.config.roleId && this.config.secretId);
    }

    /**
     * Current token, logging in first when there is none. Concurrent callers
     * share a single login, bounded by the client timeout rather than by any
     * one caller's signal; each caller stops waiting when its own signal aborts.
     */
    private ensureToken(signal?: AbortSignal): Promise<string> {
        if (this.token) {
            return Promise.resolve(this.token);
        }
        if (!this.canLogin()) {
            return Promise.reject(new AuthRequiredError());
        }
        if (!this.pendingLogin) {
            this.pendingLogin = this.login().finally(() => {
                this.pendingLogin = null;
            });
        }
        return untilAborted(this.pendingLogin, signal);
    }

    private async login(): Promise<string> {
        const endpoint = this.url(path.posix.join('v1', this.config.authPath || DEFAULT_AUTH_PATH));
        const body = await this.post(endpoint, { role_id: this.config.roleId, secret_id: this.config.secretId }, undefined);
        const token = decodeLoginResponse(body);
        this.token = token;
        getLogger().verbose(LogCategory.VAULT, 'AppRole login succeeded');
        return token;
    }

    /**
     * Forget `failed` unless another caller already replaced it.
     */
    private clearToken(failed: string): void {
        if (this.token === failed) {
            this.token = '';
        }
    }

    private async post(url: string, data: unknown, token: string | undefined, signal?: AbortSignal): Promise<unknown> {
        const logger = getLogger();
        const started = Date.now();
        logger.verbose(LogCategory.VAULT, `→ POST ${url}`);

        let response: AxiosResponse<unknown>;
        try {
            response = await this.http.post<unknown>(url, data, {
                headers: token ? { 'X-Vault-Token': token } : undefined,
                signal,
            });
        } catch (error) {
            if (axios.isCancel(error) || signal?.aborted) {
                throw error;
            }
            throw new Error(`vault request failed: ${errorMessage(error)}`);
        }

        const duration = Date.now() - started;
        logger.verbose(LogCategory.VAULT, `← ${response.status} (${logger.formatDuration(duration)})`);

        if (response.status < 200 || response.status >= 300) {
            throw new BackendHttpError(response.status, bodyText(response.data));
        }
        return response.data;
    }

    private url(p: string): string {
        return `${this.config.addr.replace(/\/+$/, '')}/${p.replace(/^\/+/, '')}`;
    }
}

/**
 * Settles with `work`, or rejects with a CanceledError once `signal` aborts.
 * `work` itself keeps running.
 */
function untilAborted<T>(work: Promise<T>, signal?: AbortSignal): Promise<T> {
    if (!signal) {
        return work;
    }
    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(new CanceledError('vault login aborted'));
        if (signal.aborted) {
            onAbort();
        } else {
            signal.addEventListener('abort', onAbort, { once: true });
        }
        // settling twice is a no-op; the handlers keep a late login failure handled
        void work.then(resolve, reject).finally(() => signal.removeEventListener('abort', onAbort));
    });
}

function bodyText(data: unknown): string {
    if (data === undefined || data === null) return '';
    if (typeof data === 'string') return data.trim();
    return JSON.stringify(data);
}

/**
 * 401/403, or Vault's "permission denied" in the body.
 */
export function isAuthError(error: unknown): boolean {
    if (error instanceof BackendHttpError) {
        return error.status === 401 || error.status === 403 || error.body.includes('permission denied');
    }
    return false;
}
