// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import type { X509Certificate } from 'crypto';
import type { PeerCertificate, TLSSocket } from 'tls';
import { AuthorizationDeniedError } from '../utils/errors';
import { getLogger, LogCategory } from '../utils/logger';
import { uriNames } from '../x509/san';
import { matchGlob } from './glob';

export interface AuthorizerRules {
    /** Whole identities, e.g. "spiffe://corp/prod/api" */
    allowedExact?: string[];
    /** Plain string prefixes, e.g. "spiffe://corp/prod/" */
    allowedPrefixes?: string[];
    /** `+` / trailing `*` globs, see matchGlob */
    allowedGlobs?: string[];
    /** URI scheme that carries identities. Default: "spiffe" */
    scheme?: string;
}

const URI_SCHEME = /^([a-zA-Z][a-zA-Z0-9+.-]*):/;

/**
 * Accepts a peer when one of its identity URIs matches an allow rule.
 * Chain validation is left to the TLS stack; only the leaf's URI SANs are
 * looked at here.
 */
export class IdentityAuthorizer {
    private readonly exact: readonly string[];
    private readonly prefixes: readonly string[];
    private readonly globs: readonly string[];
    private readonly scheme: string;

    constructor(rules: AuthorizerRules) {
        this.exact = (rules.allowedExact ?? []).map(lowerScheme);
        this.prefixes = (rules.allowedPrefixes ?? []).map(lowerScheme);
        this.globs = (rules.allowedGlobs ?? []).map(lowerScheme);
        this.scheme = (rules.scheme ?? 'spiffe').toLowerCase();
    }

    /**
     * True when any identity URI in `uris` matches a rule. URIs of other
     * schemes are ignored. The scheme is matched case-insensitively, the rest
     * of the URI exactly.
     */
    authorize(uris: readonly string[]): boolean {
        return uris.some((id) => this.isIdentity(id) && this.allowed(lowerScheme(id)));
    }

    /**
     * Peer verification over chains the TLS stack has already verified.
     * Throws AuthorizationDeniedError when the peer is not allowed.
     */
    readonly verifyPeerCertificate = (_rawCerts: readonly Buffer[], verifiedChains: readonly X509Certificate[][]): void => {
        const leaf = verifiedChains[0]?.[0];
        if (!leaf) {
            throw new AuthorizationDeniedError('no verified chain');
        }
        this.check(uriNames(leaf.subjectAltName));
    };

    /**
     * `checkServerIdentity` for tls.connect / https.request: authorizes the
     * server by identity instead of hostname.
     */
    readonly checkServerIdentity = (_hostname: string, cert: PeerCertificate): Error | undefined => {
        try {
            this.check(uriNames(cert.subjectaltname));
            return undefined;
        } catch (e) {
            return e instanceof Error ? e : new AuthorizationDeniedError(String(e));
        }
    };

    /**
     * For a server's `secureConnection` handler: verifies the client of an
     * mTLS socket and throws if it is unauthenticated or not allowed.
     */
    authorizeSocket(socket: TLSSocket): void {
        if (!socket.authorized) {
            throw new AuthorizationDeniedError(`peer not verified: ${String(socket.authorizationError ?? 'no certificate')}`);
        }
        const peer = socket.getPeerX509Certificate();
        if (!peer) {
            throw new AuthorizationDeniedError('no verified chain');
        }
        this.verifyPeerCertificate([peer.raw], [[peer]]);
    }

    private check(uris: string[]): void {
        if (this.authorize(uris)) {
            return;
        }
        const ids = uris.filter((u) => this.isIdentity(u));
        getLogger().verbose(LogCategory.AUTHZ, `Rejected peer identities: ${ids.length > 0 ? ids.join(', ') : '<none>'}`);
        throw new AuthorizationDeniedError(`peer ${this.scheme} ID not allowed`);
    }

    private isIdentity(uri: string): boolean {
        const match = URI_SCHEME.exec(uri);
        return match !== null && match[1].toLowerCase() === this.scheme;
    }

    private allowed(id: string): boolean {
        return (
            this.exact.some((exact) => id === exact) ||
            this.prefixes.some((prefix) => id.startsWith(prefix)) ||
            this.globs.some((glob) => matchGlob(glob, id))
        );
    }
}

function lowerScheme(uri: string): string {
    const match = URI_SCHEME.exec(uri);
    return match ? match[1].toLowerCase() + uri.slice(match[1].length) : uri;
}
