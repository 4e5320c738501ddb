// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

const UNIT_MS: Record<string, number> = {
    ms: 1,
    s: 1000,
    m: 60 * 1000,
    h: 60 * 60 * 1000,
};

/**
 * Parse a duration such as "6h", "1h30m", "45s" or "250ms" into milliseconds.
 * A bare integer is taken as milliseconds.
 */
export function parseDuration(input: string): number {
    const value = input.trim();
    if (/^\d+$/.test(value)) {
        return parseInt(value, 10);
    }

    const re = /(\d+(?:\.\d+)?)(ms|h|m|s)/gy;
    let total = 0;
    let consumed = 0;
    let match: RegExpExecArray | null;
    while ((match = re.exec(value)) !== null) {
        total += parseFloat(match[1]) * UNIT_MS[match[2]];
        consumed = re.lastIndex;
    }

    if (value.length === 0 || consumed !== value.length) {
        throw new Error(`Invalid duration: "${input}"`);
    }
    return Math.round(total);
}

/**
 * Format milliseconds as a Vault TTL string ("1h30m", "45s").
 * Anything under a second rounds up to "1s".
 */
export function formatTtl(ms: number): string {
    let seconds = Math.ceil(ms / 1000);
    if (seconds <= 0) {
        seconds = 1;
    }
    const h = Math.floor(seconds / 3600);
    const m = Math.floor((seconds % 3600) / 60);
    const s = seconds % 60;

    let out = '';
    if (h > 0) out += `${h}h`;
    if (m > 0) out += `${m}m`;
    if (s > 0) out += `${s}s`;
    return out;
}
