// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

/**
 * Poll until `condition` holds; fails the test after `timeout` ms.
 */
export async function waitFor(condition: () => boolean, timeout = 3000): Promise<void> {
    const deadline = Date.now() + timeout;
    while (!condition()) {
        if (Date.now() > deadline) {
            throw new Error(`condition not met within ${timeout}ms`);
        }
        await new Promise((resolve) => setTimeout(resolve, 5));
    }
}

export function delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
