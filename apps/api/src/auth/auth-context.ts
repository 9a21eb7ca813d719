import { Buffer } from "node:buffer";
import type { FastifyRequest } from "fastify";
import type { Logger } from "pino";
import { sessionSchema, userSchema } from "@ctf-arena/types";
import { z } from "zod";
import type { ResolvedAuthContext } from "./auth.types";

export const USER_HEADER = "x-arena-user";
export const SESSION_HEADER = "x-arena-session";

const base64PayloadSchema = z
  .string()
  .min(1)
  .transform((value, ctx) => {
    try {
      const decoded: unknown = JSON.parse(Buffer.from(value, "base64url").toString("utf8"));
      return decoded;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "INVALID_BASE64_JSON" });
      return z.NEVER;
    }
  });

const headersSchema = z.object({
  user: base64PayloadSchema.optional(),
  session: base64PayloadSchema.optional()
});

const readHeader = (request: Pick<FastifyRequest, "headers">, name: string): string | undefined => {
  const value = request.headers[name];
  return typeof value === "string" ? value : undefined;
};

/**
 * Reads the identity the session gateway forwards. Anything malformed leaves the
 * request anonymous; the guards decide whether that is acceptable.
 */
export const resolveAuthContext = (
  request: Pick<FastifyRequest, "headers">,
  logger: Logger
): ResolvedAuthContext => {
  const headers = headersSchema.safeParse({
    user: readHeader(request, USER_HEADER),
    session: readHeader(request, SESSION_HEADER)
  });

  let user: ResolvedAuthContext["user"] = null;
  let session: ResolvedAuthContext["session"] = null;

  if (!headers.success) {
    const reason = headers.error.issues[0]?.message ?? "invalid auth headers";
    logger.debug({ reason }, "Failed to parse auth headers");
    return { user, session };
  }

  if (headers.data.user !== undefined) {
    const parsed = userSchema.safeParse(headers.data.user);
    if (parsed.success) {
      user = parsed.data;
    } else {
      logger.warn({ issues: parsed.error.issues }, "Rejected malformed user payload from auth header");
    }
  }

  if (headers.data.session !== undefined) {
    const parsed = sessionSchema.safeParse(headers.data.session);
    if (parsed.success) {
      session = {
        id: parsed.data.id,
        userId: parsed.data.userId,
        issuedAt: parsed.data.issuedAt,
        expiresAt: parsed.data.expiresAt,
        ipAddress: parsed.data.ipAddress,
        userAgent: parsed.data.userAgent,
        status: parsed.data.status
      };
    } else {
      logger.warn({ issues: parsed.error.issues }, "Rejected malformed session payload from auth header");
    }
  }

  if (user && session && session.userId !== user.id) {
    logger.warn({ userId: user.id, sessionUserId: session.userId }, "Session does not belong to forwarded user");
    return { user: null, session: null };
  }

  return { user, session };
};
