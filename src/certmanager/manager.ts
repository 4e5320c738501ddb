// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import type { SecureContext, Server } from 'tls';
import { NotReadyError, errorMessage } from '../utils/errors';
import { getLogger, LogCategory, Logger } from '../utils/logger';
import { bundleInfo } from './bundle';
import { nextRefreshAt, refreshDelay } from './schedule';
import type { Bundle, ErrorHook, Issuer, ManagerOptions, RotateHook } from './types';

const DEFAULT_MIN_REFRESH = 30_000;
const DEFAULT_ERROR_BACKOFF = 15_000;
const DEFAULT_HOOK_TIMEOUT = 2_000;
// largest delay setTimeout accepts
const MAX_TIMER_DELAY = 2_147_483_647;

interface RefreshResult {
    bundle: Bundle;
    next: Date;
}

/**
 * CertManager keeps the process's mTLS identity current. It owns a single
 * reference to the active Bundle, replaces it whole on every successful
 * issuance, and exposes it to the TLS layer through per-handshake callbacks.
 *
 * @example
 * ```typescript
 * const manager = new CertManager(issuer, { onError: (_signal, err) => logger.warn(err.message) })
 * await manager.start()
 * const controller = new AbortController()
 * void manager.run(controller.signal)
 * const server = https.createServer({ SNICallback: manager.getCertificate, requestCert: true }, app)
 * manager.attachServer(server)
 * ```
 */
export class CertManager {
    private readonly issuer: Issuer;
    private readonly minRefresh: number;
    private readonly errorBackoff: number;
    private readonly hookTimeout: number;
    private readonly onRotate?: RotateHook;
    private readonly onError?: ErrorHook;
    private readonly now: () => Date;
    private readonly logger: Logger;

    private active: Bundle | undefined;
    private readonly servers = new Set<Server>();

    constructor(issuer: Issuer, options: ManagerOptions = {}) {
        this.issuer = issuer;
        this.minRefresh = positiveOr(options.minRefresh, DEFAULT_MIN_REFRESH);
        this.errorBackoff = positiveOr(options.errorBackoff, DEFAULT_ERROR_BACKOFF);
        this.hookTimeout = positiveOr(options.hookTimeout, DEFAULT_HOOK_TIMEOUT);
        this.onRotate = options.onRotate;
        this.onError = options.onError;
        this.now = options.now ?? (() => new Date());
        this.logger = options.logger ?? getLogger();
    }

    /**
     * The active bundle. Throws NotReadyError until the first issuance succeeds.
     */
    current(): Bundle {
        const bundle = this.active;
        if (!bundle) {
            throw new NotReadyError();
        }
        return bundle;
    }

    /**
     * Issue and store one bundle. Does not schedule anything.
     */
    async start(signal?: AbortSignal): Promise<void> {
        await this.refresh(signal);
    }

    /**
     * Refresh until `signal` aborts. Without a stored bundle an initial
     * issuance runs first. Each pass of the loop then issues, notifies the
     * rotate hook and sleeps until the next refresh point. Issuance failures
     * go to the error hook and are retried after the error backoff; they
     * never end the loop.
     */
    async run(signal: AbortSignal): Promise<void> {
        if (signal.aborted) return;

        if (!this.active) {
            try {
                await this.refresh(signal);
            } catch (error) {
                if (signal.aborted) return;
                this.reportError(error);
            }
        }

        while (!signal.aborted) {
            let wait: number;
            try {
                const result = await this.refresh(signal);
                this.notifyRotate(result.bundle);
                wait = refreshDelay(result.next, this.now(), this.minRefresh);
            } catch (error) {
                if (signal.aborted) return;
                this.reportError(error);
                wait = this.errorBackoff;
            }

            this.logger.verbose(LogCategory.ROTATE, `Next refresh in ${this.logger.formatDuration(wait)}`);
            if (!(await sleep(wait, signal))) return;
        }
    }

    /**
     * tls SNICallback: hands out the current leaf's secure context.
     */
    readonly getCertificate = (
        _servername: string,
        callback: (err: Error | null, ctx?: SecureContext) => void,
    ): void => {
        const bundle = this.active;
        if (!bundle) {
            callback(new NotReadyError());
            return;
        }
        callback(null, bundle.leafCertificate.secureContext);
    };

    /**
     * Secure context for an outbound connection (`tls.connect({ secureContext })`).
     */
    readonly getClientCertificate = (): SecureContext => {
        return this.current().leafCertificate.secureContext;
    };

    /**
     * Keep `server`'s default certificate in step with the active bundle, for
     * clients that send no server name and so never reach SNICallback.
     * Returns a function that stops the updates.
     */
    attachServer(server: Server): () => void {
        this.servers.add(server);
        if (this.active) {
            this.applyTo(server, this.active);
        }
        return () => {
            this.servers.delete(server);
        };
    }

    private async refresh(signal?: AbortSignal): Promise<RefreshResult> {
        const started = Date.now();
        const bundle = await this.issuer.issue(signal);
        this.active = bundle;
        for (const server of this.servers) {
            this.applyTo(server, bundle);
        }

        const next = nextRefreshAt(this.now(), bundle.notAfter);
        this.logger.verbose(LogCategory.ROTATE, `Stored bundle expiring ${bundle.notAfter.toISOString()}`);
        this.logger.verboseIndent(LogCategory.PERF, `Issuance took ${this.logger.formatDuration(Date.now() - started)}`);
        return { bundle, next };
    }

    private applyTo(server: Server, bundle: Bundle): void {
        const { certificatePem, privateKeyPem } = bundle.leafCertificate;
        try {
            server.setSecureContext({
                cert: certificatePem,
                key: privateKeyPem,
                ca: bundle.trustPool.size > 0 ? bundle.trustPool.toPem() : undefined,
            });
        } catch (e) {
            this.logger.warn(`Failed to update server certificate: ${errorMessage(e)}`);
        }
    }

    private reportError(error: unknown): void {
        const err = error instanceof Error ? error : new Error(String(error));
        this.logger.warn(`Certificate refresh failed: ${err.message}`);
        const hook = this.onError;
        if (hook) {
            this.dispatch('onError', (signal) => hook(signal, err));
        }
    }

    private notifyRotate(bundle: Bundle): void {
        const hook = this.onRotate;
        if (!hook) return;
        const info = bundleInfo(bundle);
        this.dispatch('onRotate', (signal) => hook(signal, info));
    }

    /**
     * Run a hook detached from the loop with its own deadline. Whatever the hook
     * does, throws or never settles, the loop is not affected.
     */
    private dispatch(name: string, invoke: (signal: AbortSignal) => void | Promise<void>): void {
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.hookTimeout);
        timer.unref();

        void Promise.resolve()
            .then(() => invoke(controller.signal))
            .catch((e: unknown) => {
                this.logger.warn(`${name} hook failed: ${errorMessage(e)}`);
            })
            .finally(() => {
                clearTimeout(timer);
                controller.abort();
            });
    }
}

function positiveOr(value: number | undefined, fallback: number): number {
    return value !== undefined && value > 0 ? value : fallback;
}

/**
 * Resolves true after `ms`, or false as soon as `signal` aborts. Waits longer
 * than a single timer can hold are taken in steps.
 */
async function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
    let remaining = ms;
    while (remaining > MAX_TIMER_DELAY) {
        if (!(await sleepOnce(MAX_TIMER_DELAY, signal))) return false;
        remaining -= MAX_TIMER_DELAY;
    }
    return sleepOnce(remaining, signal);
}

function sleepOnce(ms: number, signal: AbortSignal): Promise<boolean> {
    return new Promise((resolve) => {
        if (signal.aborted) {
            resolve(false);
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            resolve(false);
        };
        const timer = setTimeout(() => {
            signal.removeEventListener('abort', onAbort);
            resolve(true);
        }, ms);
        signal.addEventListener('abort', onAbort, { once: true });
    });
}
