import type { FastifyReply, FastifyRequest } from "fastify";
import type { Logger } from "pino";
import { resolveAuthContext } from "../auth/auth-context";
import type { AuthenticatedSession, AuthenticatedUser } from "../auth/auth.types";
import { createRequestLogger } from "./logger";

export type GraphQLContext = {
  app: FastifyReply["server"];
  request: FastifyRequest;
  reply: FastifyReply;
  requestId: string;
  logger: Logger;
  user: AuthenticatedUser | null;
  session: AuthenticatedSession | null;
};

/** Request id, request-scoped logger and gateway identity for every operation. */
export const buildGraphQLContext = async (
  request: FastifyRequest,
  reply: FastifyReply
): Promise<GraphQLContext> => {
  const requestId = String(request.id);
  const logger = createRequestLogger(requestId);
  const auth = resolveAuthContext(request, logger);

  return {
    app: reply.server,
    reply,
    request,
    requestId,
    logger,
    user: auth.user,
    session: auth.session
  };
};
