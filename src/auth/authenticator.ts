import { createHash, timingSafeEqual } from 'node:crypto';

export type AuthDenyReasonCode =
    | 'denied_token_malformed'
    | 'denied_token_invalid';

export interface AuthenticateSuccess {
    success: true;
}

export interface AuthenticateFailure {
    success: false;
    reasonCode: AuthDenyReasonCode;
}

export type AuthenticateResult = AuthenticateSuccess | AuthenticateFailure;

function parseBearerToken(authorizationHeader: string | undefined): string | null {
    if (!authorizationHeader) {
        return null;
    }

    const [scheme, token] = authorizationHeader.split(' ', 2);

    if (!scheme || !token) {
        return null;
    }

    if (scheme.toLowerCase() !== 'bearer') {
        return null;
    }

    if (token.trim() === '') {
        return null;
    }

    return token.trim();
}

function digest(value: string): Buffer {
    return createHash('sha256').update(value, 'utf8').digest();
}

/**
 * Checks `authorization: Bearer <token>` against the configured API token.
 */
export class RequestAuthenticator {
    private readonly expectedDigest: Buffer;

    constructor(apiToken: string) {
        if (apiToken.trim() === '') {
            throw new Error('apiToken is required');
        }

        this.expectedDigest = digest(apiToken.trim());
    }

    authenticate(
        authorizationHeader: string | undefined,
    ): AuthenticateResult {
        const token = parseBearerToken(authorizationHeader);

        if (!token) {
            return {
                success: false,
                reasonCode: 'denied_token_malformed',
            };
        }

        // Equal-length digests keep the comparison constant time.
        if (!timingSafeEqual(digest(token), this.expectedDigest)) {
            return {
                success: false,
                reasonCode: 'denied_token_invalid',
            };
        }

        return {
            success: true,
        };
    }
}
