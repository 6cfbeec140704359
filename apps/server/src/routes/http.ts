import type { FastifyReply, FastifyRequest } from "fastify";
import { ZodError } from "zod";
import type { EconomyErrorKind } from "@ledger/shared";
import type { EconomyContext } from "../lib/context";
import { STORE_ERROR_MESSAGE, describeZodError, type Result } from "../lib/errors";

export type RouteDeps = {
  ctx: EconomyContext;
  adminToken: string | null;
};

export class HttpError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
    this.name = "HttpError";
  }
}

export const STATUS_BY_KIND: Record<EconomyErrorKind, number> = {
  NotFound: 404,
  Unauthorized: 403,
  InvalidState: 409,
  InsufficientResource: 422,
  InsufficientCash: 422,
  InsufficientManpower: 422,
  AdmissionLimitExceeded: 429,
  StoreError: 500
};

function header(req: FastifyRequest, name: string): string | null {
  const raw = req.headers[name];
  const value = Array.isArray(raw) ? raw[0] : raw;
  return value?.trim() || null;
}

/** The nation a request acts for, from the x-nation-id header. */
export function actingNation(req: FastifyRequest): string {
  const nationId = header(req, "x-nation-id");
  if (!nationId) throw new HttpError(401, "Missing x-nation-id header.");
  return nationId;
}

export function requireAdmin(req: FastifyRequest, adminToken: string | null): void {
  if (!adminToken) throw new HttpError(403, "Admin operations are disabled.");
  if (header(req, "x-admin-token") !== adminToken) throw new HttpError(403, "Invalid admin token.");
}

export function sendResult<T>(reply: FastifyReply, result: Result<T>, okStatus = 200): FastifyReply {
  if (result.ok) return reply.status(okStatus).send(result.value);
  return reply.status(STATUS_BY_KIND[result.error.kind]).send({ error: result.error });
}

export function sendError(reply: FastifyReply, err: unknown): FastifyReply {
  if (err instanceof HttpError) return reply.status(err.status).send({ error: { kind: "Request", message: err.message } });
  if (err instanceof ZodError) return reply.status(400).send({ error: { kind: "Request", message: describeZodError(err) } });
  reply.log.error({ err }, "request failed");
  return reply.status(500).send({ error: { kind: "StoreError", message: STORE_ERROR_MESSAGE } });
}
