// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

/**
 * Match an identity against a path glob over `/`-separated segments.
 *
 *   `+`  exactly one non-empty segment
 *   `*`  only as the last character: any number of further segments
 *
 * A pattern with `*` anywhere else, or with more than one `*`, never matches.
 * Neither does an empty pattern or value.
 */
export function matchGlob(pattern: string, value: string): boolean {
    if (pattern === '' || value === '') {
        return false;
    }

    const stars = pattern.split('*').length - 1;
    if (stars > 1) {
        return false;
    }
    if (stars === 1) {
        if (!pattern.endsWith('*')) {
            return false;
        }
        return matchSegments(pattern.slice(0, -1), value, true);
    }
    return matchSegments(pattern, value, false);
}

function matchSegments(pattern: string, value: string, prefix: boolean): boolean {
    const psegs = pattern.split('/');
    const vsegs = value.split('/');

    // "a/b/*" leaves "a/b/" behind; the empty tail is not a segment to match
    if (prefix && psegs[psegs.length - 1] === '') {
        psegs.pop();
    }

    if (prefix ? psegs.length > vsegs.length : psegs.length !== vsegs.length) {
        return false;
    }

    return psegs.every((pseg, i) => (pseg === '+' ? vsegs[i] !== '' : pseg === vsegs[i]));
}
