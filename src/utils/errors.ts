// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

/**
 * Base class for every error this package raises on purpose. Lets callers
 * tell rotation failures apart from programming errors with one instanceof.
 */
export class CertRotateError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** No bundle has ever been stored. */
export class NotReadyError extends CertRotateError {
    constructor() {
        super('cert bundle not ready');
    }
}

/** Neither a token nor exchange credentials are available. */
export class AuthRequiredError extends CertRotateError {
    constructor() {
        super('vault auth required');
    }
}

export class BackendHttpError extends CertRotateError {
    constructor(
        readonly status: number,
        readonly body: string,
    ) {
        super(`vault http ${status}: ${body}`);
    }
}

export class MalformedResponseError extends CertRotateError {}

export class PolicyViolationError extends CertRotateError {}

export class AuthorizationDeniedError extends CertRotateError {}

export function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}
