import { HttpException } from "@nestjs/common";
import { GraphQLError, type ExecutionResult } from "graphql";
import type { MercuriusCommonOptions } from "mercurius";
import { UnknownChallengeError } from "../validation/unknown-challenge.error";
import { createRequestLogger } from "./logger";

const CODES_BY_STATUS: Readonly<Record<number, string>> = {
  400: "BAD_REQUEST",
  401: "UNAUTHENTICATED",
  403: "FORBIDDEN",
  404: "NOT_FOUND",
  409: "CONFLICT",
  429: "TOO_MANY_REQUESTS"
};

export const resolveErrorCode = (error: GraphQLError): string => {
  const declared = error.extensions?.code;
  if (typeof declared === "string" && declared.length > 0) {
    return declared;
  }

  const original = error.originalError;

  if (original instanceof HttpException) {
    return CODES_BY_STATUS[original.getStatus()] ?? "INTERNAL_SERVER_ERROR";
  }

  if (original instanceof UnknownChallengeError) {
    return "NOT_FOUND";
  }

  return "INTERNAL_SERVER_ERROR";
};

/**
 * Every GraphQL error leaves with `extensions.code`, the request id and a
 * timestamp, and the failure is logged once against the request logger.
 */
export const structuredErrorFormatter: NonNullable<MercuriusCommonOptions["errorFormatter"]> = (executionResult, context) => {
  const requestId = String(context.reply.request.id);
  const logger = createRequestLogger(requestId);
  const timestamp = new Date().toISOString();

  const errors = (executionResult.errors ?? []).map((error) => {
    const code = resolveErrorCode(error);

    return new GraphQLError(error.message, {
      nodes: error.nodes,
      source: error.source,
      positions: error.positions,
      path: error.path,
      originalError: error.originalError,
      extensions: {
        ...error.extensions,
        code,
        requestId,
        timestamp
      }
    });
  });

  const response: ExecutionResult & {
    extensions: Record<string, unknown>;
  } = {
    data: executionResult.data,
    errors,
    extensions: {
      ...(executionResult.extensions ?? {}),
      meta: {
        requestId,
        timestamp
      }
    }
  };

  if (errors.length > 0) {
    logger.error(
      {
        event: "graphql.execution_failed",
        errors: errors.map((error) => ({
          message: error.message,
          path: error.path,
          code: error.extensions.code
        }))
      },
      "GraphQL execution failed"
    );
  }

  return {
    statusCode: 200,
    response
  };
};
