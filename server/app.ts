import express, { type Express } from "express";
import cors from "cors";
import helmet from "helmet";
import type { Server } from "http";
import type { AppContext } from "./context";
import { registerRoutes } from "./routes";
import { errorHandler } from "./middleware/errorHandler";
import { logger } from "./logger";

export interface CreatedApp {
  app: Express;
  server: Server;
}

export function createApp(ctx: AppContext): CreatedApp {
  const app = express();

  // Security headers middleware
  app.use(helmet({
    hsts: {
      maxAge: 31536000, // 1 year in seconds
      includeSubDomains: true,
    },
    frameguard: {
      action: 'deny',
    },
    referrerPolicy: {
      policy: 'strict-origin-when-cross-origin',
    },
    hidePoweredBy: true,
  }));

  const allowedOrigins = ctx.config.corsOrigins;
  app.use(cors({
    origin(origin, callback) {
      if (!origin || allowedOrigins.length === 0 || allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(null, false);
      }
    },
    exposedHeaders: ['WWW-Authenticate'],
  }));

  app.use(express.json({ limit: '2mb' }));
  app.use(express.urlencoded({ extended: false, limit: '100kb' }));

  // Bodies and query strings stay out of the log.
  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;

    res.on("finish", () => {
      if (path.startsWith("/api")) {
        const duration = Date.now() - start;
        logger.info(`${req.method} ${path} ${res.statusCode} in ${duration}ms`);
      }
    });

    next();
  });

  const server = registerRoutes(app, ctx);
  app.use(errorHandler);

  return { app, server };
}
