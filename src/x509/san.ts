// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import type { X509Certificate } from 'crypto';

export interface SubjectAltName {
    /** "DNS", "URI", "IP Address", "email", ... as Node prints them */
    type: string;
    value: string;
}

/**
 * Parse the textual subjectAltName Node exposes on X509Certificate and
 * PeerCertificate, e.g. `DNS:api.internal, URI:spiffe://corp/api`.
 * Values holding separators are printed as JSON strings and are unquoted here.
 */
export function parseSubjectAltNames(san: string | undefined): SubjectAltName[] {
    const names: SubjectAltName[] = [];
    if (!san) {
        return names;
    }

    let i = 0;
    while (i < san.length) {
        const colon = san.indexOf(':', i);
        if (colon === -1) {
            break;
        }
        const type = san.slice(i, colon).trim();

        let value: string;
        let end: number;
        if (san[colon + 1] === '"') {
            let j = colon + 2;
            while (j < san.length && san[j] !== '"') {
                if (san[j] === '\\') j++;
                j++;
            }
            end = j + 1;
            const parsed: unknown = JSON.parse(san.slice(colon + 1, end));
            value = typeof parsed === 'string' ? parsed : String(parsed);
        } else {
            const sep = san.indexOf(', ', colon + 1);
            end = sep === -1 ? san.length : sep;
            value = san.slice(colon + 1, end);
        }

        names.push({ type, value });
        i = san.startsWith(', ', end) ? end + 2 : end;
    }

    return names;
}

export function uriNames(san: string | undefined): string[] {
    return parseSubjectAltNames(san)
        .filter((n) => n.type === 'URI')
        .map((n) => n.value);
}

export function dnsNames(san: string | undefined): string[] {
    return parseSubjectAltNames(san)
        .filter((n) => n.type === 'DNS')
        .map((n) => n.value);
}

/**
 * Value of the first CN attribute of a subject as printed by Node
 * ("CN=api\nO=corp"), or "" when absent.
 */
export function commonName(cert: X509Certificate): string {
    for (const line of cert.subject.split('\n')) {
        if (line.startsWith('CN=')) {
            return line.slice(3);
        }
    }
    return '';
}
