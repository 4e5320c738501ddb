// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

/**
 * Renewal point: two thirds of the way from issuance to expiry.
 */
export function nextRefreshAt(issuedAt: Date, notAfter: Date): Date {
    const lifetime = notAfter.getTime() - issuedAt.getTime();
    return new Date(issuedAt.getTime() + Math.floor((lifetime * 2) / 3));
}

/**
 * Milliseconds to sleep before the refresh due at `next`. Floored at
 * `minRefresh`, plus up to a tenth of the wait in clock-derived jitter so
 * replicas sharing a backend drift apart.
 */
export function refreshDelay(next: Date, now: Date, minRefresh: number): number {
    const wait = Math.max(next.getTime() - now.getTime(), minRefresh);
    const jitter = now.getTime() % (Math.floor(wait / 10) + 1);
    return wait + jitter;
}
