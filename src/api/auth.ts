import { createHmac, timingSafeEqual } from "node:crypto";
import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { z } from "zod";
import type { LedgerSession } from "../session/ledger-session";

const tokenHeaderSchema = z.object({
  alg: z.string(),
});

const tokenPayloadSchema = z.object({
  sub: z.string().min(1),
  sid: z.string().optional(),
  exp: z.number().optional(),
});

export type TokenPayload = z.infer<typeof tokenPayloadSchema>;

export interface AuthenticatedUser {
  userId: string;
  sessionId?: string;
}

export type AppContext = {
  Variables: {
    user?: AuthenticatedUser;
    session: LedgerSession;
    authSecret: string;
  };
};

function base64UrlDecode(segment: string): Buffer {
  return Buffer.from(segment.replace(/-/g, "+").replace(/_/g, "/"), "base64");
}

function base64UrlEncode(value: string | Buffer): string {
  return Buffer.from(value).toString("base64url");
}

function parseSegment<T extends z.ZodTypeAny>(segment: string, schema: T): z.infer<T> | null {
  let decoded: unknown;
  try {
    decoded = JSON.parse(base64UrlDecode(segment).toString("utf8"));
  } catch (error) {
    throw new HTTPException(401, { message: "Invalid authentication payload", cause: error });
  }
  const parsed = schema.safeParse(decoded);
  return parsed.success ? parsed.data : null;
}

function sign(data: string, secret: string): Buffer {
  return createHmac("sha256", secret).update(data).digest();
}

function verifySignature(data: string, signature: string, secret: string): boolean {
  const expected = sign(data, secret);
  const received = base64UrlDecode(signature);
  if (expected.length !== received.length) {
    return false;
  }
  return timingSafeEqual(expected, received);
}

export function signSessionToken(payload: TokenPayload, secret: string): string {
  const header = base64UrlEncode(JSON.stringify({ alg: "HS256", typ: "JWT" }));
  const body = base64UrlEncode(JSON.stringify(payload));
  return `${header}.${body}.${base64UrlEncode(sign(`${header}.${body}`, secret))}`;
}

export function verifySessionToken(token: string, secret: string): TokenPayload | null {
  const segments = token.split(".");
  if (segments.length !== 3) {
    return null;
  }
  const [headerSegment, payloadSegment, signature] = segments;
  const header = parseSegment(headerSegment, tokenHeaderSchema);
  if (header?.alg !== "HS256") {
    return null;
  }
  if (!verifySignature(`${headerSegment}.${payloadSegment}`, signature, secret)) {
    return null;
  }
  const payload = parseSegment(payloadSegment, tokenPayloadSchema);
  if (!payload) {
    return null;
  }
  if (typeof payload.exp === "number" && Date.now() >= payload.exp * 1000) {
    return null;
  }
  return payload;
}

function parseCookies(header?: string): Record<string, string> {
  if (!header) {
    return {};
  }
  return header
    .split(";")
    .map((pair) => pair.trim())
    .filter(Boolean)
    .reduce<Record<string, string>>((accumulator, part) => {
      const [key, ...rest] = part.split("=");
      if (!key) {
        return accumulator;
      }
      accumulator[key] = decodeURIComponent(rest.join("="));
      return accumulator;
    }, {});
}

function extractToken(c: Context<AppContext>): string | null {
  const authHeader = c.req.header("authorization");
  if (authHeader?.startsWith("Bearer ")) {
    return authHeader.slice("Bearer ".length).trim() || null;
  }
  const cookies = parseCookies(c.req.header("cookie"));
  if (cookies.session) {
    return cookies.session;
  }
  return null;
}

export function requireUser(c: Context<AppContext>): AuthenticatedUser {
  const cached = c.get("user");
  if (cached) {
    return cached;
  }
  const token = extractToken(c);
  if (!token) {
    throw new HTTPException(401, { message: "Authentication required" });
  }
  const payload = verifySessionToken(token, c.get("authSecret"));
  if (!payload) {
    throw new HTTPException(401, { message: "Invalid authentication token" });
  }
  const user: AuthenticatedUser = { userId: payload.sub, sessionId: payload.sid };
  c.set("user", user);
  return user;
}
