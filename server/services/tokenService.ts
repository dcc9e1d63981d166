import jwt from "jsonwebtoken";

/**
 * Stateless access tokens (HS256 JWTs).
 *
 * Claims are `sub`, `iat`, `exp` plus the configured issuer and audience. The user's
 * profile is never embedded; the gateway reloads it from storage on every request.
 * Refreshing issues a new token but does not revoke the old one, which stays valid
 * until its own `exp`.
 */

export type TokenFailureReason = "expired" | "invalid_signature" | "malformed";

export type TokenVerification =
  | { valid: true; subject: string; expiresAt: Date }
  | { valid: false; reason: TokenFailureReason };

export interface IssuedToken {
  token: string;
  expiresAt: Date;
}

export interface TokenServiceOptions {
  secretKey: string;
  ttlSeconds: number;
  issuer: string;
  audience: string;
  /** Milliseconds since epoch. Defaults to Date.now. */
  now?: () => number;
}

export interface TokenService {
  issue(subjectId: string): IssuedToken;
  verify(token: string): TokenVerification;
  refresh(token: string): IssuedToken | null;
}

const ALGORITHM = "HS256";

function failureReason(error: unknown): TokenFailureReason {
  if (error instanceof jwt.TokenExpiredError) {
    return "expired";
  }
  if (error instanceof jwt.JsonWebTokenError && error.message === "invalid signature") {
    return "invalid_signature";
  }
  return "malformed";
}

export function createTokenService(options: TokenServiceOptions): TokenService {
  const { secretKey, ttlSeconds, issuer, audience } = options;
  const now = options.now ?? Date.now;

  function issue(subjectId: string): IssuedToken {
    const issuedAt = Math.floor(now() / 1000);
    const expiresAt = issuedAt + ttlSeconds;

    const token = jwt.sign(
      { sub: subjectId, iat: issuedAt, exp: expiresAt },
      secretKey,
      { algorithm: ALGORITHM, issuer, audience },
    );

    return { token, expiresAt: new Date(expiresAt * 1000) };
  }

  function verify(token: string): TokenVerification {
    try {
      const decoded = jwt.verify(token, secretKey, {
        algorithms: [ALGORITHM],
        issuer,
        audience,
        clockTimestamp: Math.floor(now() / 1000),
      });

      if (typeof decoded === "string" || typeof decoded.sub !== "string" || !decoded.sub || typeof decoded.exp !== "number") {
        return { valid: false, reason: "malformed" };
      }

      return { valid: true, subject: decoded.sub, expiresAt: new Date(decoded.exp * 1000) };
    } catch (error) {
      return { valid: false, reason: failureReason(error) };
    }
  }

  function refresh(token: string): IssuedToken | null {
    const result = verify(token);
    if (!result.valid) {
      return null;
    }
    return issue(result.subject);
  }

  return { issue, verify, refresh };
}
