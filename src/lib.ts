// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

export { CertManager } from './certmanager/manager';
export { TrustPool, createBundle, bundleInfo } from './certmanager/bundle';
export { nextRefreshAt, refreshDelay } from './certmanager/schedule';
export type {
    Bundle,
    BundleInfo,
    ErrorHook,
    Issuer,
    LeafCertificate,
    ManagerOptions,
    RotateHook,
} from './certmanager/types';
export { VaultClient, isAuthError } from './vault/client';
export { VaultIssuer } from './vault/issuer';
export type { VaultIssuerOptions } from './vault/issuer';
export type { IssueRequest, IssueResponse, VaultClientConfig } from './vault/types';
export { IdentityAuthorizer } from './identity/authorizer';
export type { AuthorizerRules } from './identity/authorizer';
export { matchGlob } from './identity/glob';
export { RotationConfigParser } from './config/rotation-config';
export type { RotationConfig, RotationConfigOptions } from './config/rotation-config';
export {
    CertRotateError,
    NotReadyError,
    AuthRequiredError,
    BackendHttpError,
    MalformedResponseError,
    PolicyViolationError,
    AuthorizationDeniedError,
} from './utils/errors';
export { Logger, LogLevel, LogCategory, getLogger, setLogLevel } from './utils/logger';
