import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { ZodError } from "zod";
import { apiRouter } from "./api/v1";
import type { AppContext } from "./api/auth";
import { LedgerError, normaliseError, type LedgerErrorCode } from "./ledger/errors";
import type { LedgerSession } from "./session/ledger-session";

export interface AppDependencies {
  session: LedgerSession;
  authSecret: string;
  logger?: Pick<Console, "error" | "warn" | "info">;
}

const STATUS_BY_CODE: Record<LedgerErrorCode, number> = {
  INVALID_AMOUNT: 400,
  INVALID_MONTH: 400,
  INVALID_FIELD: 400,
  BUDGET_EXCEEDED: 422,
  NOT_FOUND: 404,
  PERSISTENCE_FAILURE: 500,
};

function statusFor(error: unknown): number {
  if (error instanceof LedgerError) {
    return STATUS_BY_CODE[error.code];
  }
  if (error instanceof HTTPException) {
    return error.status;
  }
  if (error instanceof ZodError) {
    return 400;
  }
  return 500;
}

function errorBody(error: unknown) {
  if (error instanceof HTTPException) {
    return { code: error.message, message: error.message };
  }
  return normaliseError(error);
}

export function createApp(dependencies: AppDependencies): Hono<AppContext> {
  const logger = dependencies.logger ?? console;
  const app = new Hono<AppContext>();

  app.use("*", async (c, next) => {
    c.set("session", dependencies.session);
    c.set("authSecret", dependencies.authSecret);
    await next();
  });

  app.get("/", (c) =>
    c.json({
      message: "Budget Ledger API",
      status: "ok",
    }),
  );

  app.get("/v1/healthz", (c) => c.json({ ok: true }));

  app.route("/v1", apiRouter);

  app.onError((error, c) => {
    const status = statusFor(error);
    if (status >= 500) {
      logger.error(`${c.req.method} ${c.req.path} failed`, error);
    }
    return new Response(JSON.stringify(errorBody(error)), {
      status,
      headers: { "content-type": "application/json" },
    });
  });

  return app;
}
