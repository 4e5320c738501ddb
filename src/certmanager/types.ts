// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import type { KeyObject, X509Certificate } from 'crypto';
import type { SecureContext } from 'tls';
import type { Logger } from '../utils/logger';
import type { TrustPool } from './bundle';

/**
 * Leaf certificate with its matching private key, ready for TLS.
 */
export interface LeafCertificate {
    /** PEM as issued; may carry intermediates after the leaf */
    readonly certificatePem: string;
    readonly privateKeyPem: string;
    readonly certificate: X509Certificate;
    readonly privateKey: KeyObject;
    /** cert + key + trust pool, for SNICallback or tls.connect */
    readonly secureContext: SecureContext;
}

/**
 * Immutable snapshot of the active identity. Replaced as a whole on rotation,
 * never modified in place.
 */
export interface Bundle {
    readonly leafCertificate: LeafCertificate;
    readonly trustPool: TrustPool;
    readonly notAfter: Date;
}

/**
 * Read-only view of a bundle handed to rotation hooks.
 */
export interface BundleInfo {
    notAfter: Date;
    commonName: string;
    /** decimal */
    serialNumber: string;
    dnsNames: string[];
    uris: string[];
}

/**
 * Produces a new bundle. Implementations do no caching, retrying or scheduling.
 */
export interface Issuer {
    issue(signal?: AbortSignal): Promise<Bundle>;
}

export type RotateHook = (signal: AbortSignal, info: BundleInfo) => void | Promise<void>;
export type ErrorHook = (signal: AbortSignal, error: Error) => void | Promise<void>;

export interface ManagerOptions {
    /** Floor for the wait between refreshes, ms. Default 30s. */
    minRefresh?: number;
    /** Wait after a failed refresh, ms. Default 15s. */
    errorBackoff?: number;
    /** Lifetime of each hook invocation's signal, ms. Default 2s. */
    hookTimeout?: number;
    /** Best-effort notification after each successful rotation. */
    onRotate?: RotateHook;
    /** Best-effort notification after each failed refresh. */
    onError?: ErrorHook;
    now?: () => Date;
    logger?: Logger;
}
