/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Address, CallerKind } from "@roundfeed/types";
import type { AppEnv } from "./types/api-contract.js";
import type { AuthContext } from "./types/auth.js";
import { AddressSchema } from "./types/dto.js";
import type { FeedService } from "./services/feed-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { validationFailed } from "./middleware/validate.js";
import { createHealthRoutes } from "./routes/health.js";
import { createRoundRoutes } from "./routes/rounds.js";
import { createSubmissionRoutes } from "./routes/submissions.js";
import { createFundsRoutes } from "./routes/funds.js";
import { createRewardRoutes } from "./routes/rewards.js";
import { createOracleRoutes } from "./routes/oracles.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

/** Caller identity header honoured only when auth is off. */
export const CALLER_ADDRESS_HEADER = "X-Caller-Address";

const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

export interface CreateAppOptions {
  readonly service: FeedService;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Sees every error rendered as a 500. */
  readonly onUnexpectedError?: (err: Error) => void;
  /** Auth configuration. When provided, auth middleware is enabled. */
  readonly auth?: AuthConfig;
  /** Caller kind used when auth is off. Default: account */
  readonly anonymousKind?: CallerKind;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: FeedService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const { service } = options;
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  app.use("*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.onUnexpectedError));

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    // Unsecured mode (tests, dev): every HTTP permission is granted and
    // the engine sees the X-Caller-Address header, or the zero address.
    const kind = options.anonymousKind ?? "account";
    app.use("/api/*", async (c, next) => {
      const header = c.req.header(CALLER_ADDRESS_HEADER);
      let address = ZERO_ADDRESS;
      if (header !== undefined) {
        const parsed = AddressSchema.safeParse(header);
        if (!parsed.success) {
          return validationFailed(c, `Invalid ${CALLER_ADDRESS_HEADER} header`, parsed.error);
        }
        address = parsed.data;
      }
      const auth: AuthContext = { type: "anonymous", identity: "anonymous", role: "owner", address, kind };
      c.set("auth", auth);
      return next();
    });
  }

  // Mount v1 API routes
  app.route("/api/v1/rounds", createRoundRoutes());
  app.route("/api/v1/submissions", createSubmissionRoutes());
  app.route("/api/v1/funds", createFundsRoutes());
  app.route("/api/v1/rewards", createRewardRoutes());
  app.route("/api/v1/oracles", createOracleRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
