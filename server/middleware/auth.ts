import type { Request, RequestHandler } from "express";
import type { User } from "@shared/schema";
import type { IStorage } from "../storage";
import type { TokenService } from "../services/tokenService";
import { AuthenticationError } from "../errors";
import { logger } from "../logger";

export type AuthenticatedUser = Pick<User, "id" | "email" | "fullName" | "isActive" | "isAdmin">;

declare global {
  namespace Express {
    interface Request {
      user?: AuthenticatedUser;
    }
  }
}

const BEARER = /^bearer\s+(\S+)$/i;

export function extractBearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const match = BEARER.exec(header.trim());
  return match ? match[1] : null;
}

/**
 * Authentication gateway for protected routes.
 *
 * Only the token's subject is trusted; everything else comes from storage, so a
 * deactivated account is locked out on its very next request. Every failure yields
 * the same 401 so callers cannot tell which check rejected them.
 */
export function createAuthenticate(deps: { tokens: TokenService; storage: IStorage }): RequestHandler {
  const { tokens, storage } = deps;

  return async (req, _res, next) => {
    try {
      const token = extractBearerToken(req.headers.authorization);
      if (!token) {
        logger.debug('[Auth] Missing or malformed Authorization header', { path: req.path });
        return next(new AuthenticationError());
      }

      const verification = tokens.verify(token);
      if (!verification.valid) {
        logger.warn('[Auth] Token rejected', { reason: verification.reason, path: req.path });
        return next(new AuthenticationError());
      }

      const dbUser = await storage.getUser(verification.subject);
      if (!dbUser) {
        logger.warn('[Auth] Token subject not found', { userId: verification.subject });
        return next(new AuthenticationError());
      }
      if (!dbUser.isActive) {
        logger.warn('[Auth] Inactive user rejected', { userId: dbUser.id });
        return next(new AuthenticationError());
      }

      req.user = {
        id: dbUser.id,
        email: dbUser.email,
        fullName: dbUser.fullName,
        isActive: dbUser.isActive,
        isAdmin: dbUser.isAdmin,
      };
      return next();
    } catch (error) {
      return next(error);
    }
  };
}

/** The user attached by the gateway. Throws when the route is not behind it. */
export function currentUser(req: Request): AuthenticatedUser {
  if (!req.user) {
    throw new AuthenticationError();
  }
  return req.user;
}
