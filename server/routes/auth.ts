import { Router } from "express";
import { signinSchema, signupSchema, updateProfileSchema } from "@shared/schema";
import type { AppContext } from "../context";
import { currentUser, extractBearerToken } from "../middleware/auth";
import { toPublicUser } from "../services/userService";
import type { IssuedToken } from "../services/tokenService";
import { parseOrThrow } from "../utils/validation";
import { AuthenticationError } from "../errors";

function tokenResponse(issued: IssuedToken) {
  return {
    accessToken: issued.token,
    tokenType: "bearer",
    expiresAt: issued.expiresAt.toISOString(),
  };
}

export function createAuthRouter(ctx: AppContext): Router {
  const router = Router();

  router.post("/api/v1/auth/signup", async (req, res, next) => {
    try {
      const body = parseOrThrow(signupSchema, req.body);
      const user = await ctx.users.signup(body);
      res.status(201).json(toPublicUser(user));
    } catch (error) {
      next(error);
    }
  });

  // JSON { email, password } or an OAuth2 password-grant form { username, password }
  router.post(["/api/v1/auth/login", "/api/v1/auth/signin"], async (req, res, next) => {
    try {
      const body = parseOrThrow(signinSchema, req.body);
      const issued = await ctx.users.login(body.email, body.password);
      res.json(tokenResponse(issued));
    } catch (error) {
      next(error);
    }
  });

  router.post("/api/v1/auth/refresh", ctx.authenticate, (req, res, next) => {
    try {
      const token = extractBearerToken(req.headers.authorization);
      if (!token) {
        throw new AuthenticationError();
      }
      res.json(tokenResponse(ctx.users.refresh(token)));
    } catch (error) {
      next(error);
    }
  });

  router.get(["/api/v1/auth/user", "/api/v1/me"], ctx.authenticate, async (req, res, next) => {
    try {
      const user = await ctx.users.getById(currentUser(req).id);
      res.json(toPublicUser(user));
    } catch (error) {
      next(error);
    }
  });

  router.patch("/api/v1/auth/user", ctx.authenticate, async (req, res, next) => {
    try {
      const body = parseOrThrow(updateProfileSchema, req.body);
      const user = await ctx.users.updateProfile(currentUser(req).id, body.fullName);
      res.json(toPublicUser(user));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
