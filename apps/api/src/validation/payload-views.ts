import { Buffer } from "node:buffer";
import { z } from "zod";

// Each field fails closed on its own: a wrong type reads as absent instead of
// rejecting the whole view.
export const optionalText = z.string().optional().catch(undefined);
export const optionalScalar = z.union([z.string(), z.number()]).optional().catch(undefined);

/**
 * Narrows an arbitrary payload to the view a rule expects. Non-object payloads
 * (null, arrays, primitives) never match.
 */
export const readView = <S extends z.ZodTypeAny>(schema: S, payload: unknown): z.infer<S> | null => {
  if (typeof payload !== "object" || payload === null || Array.isArray(payload)) {
    return null;
  }

  const parsed = schema.safeParse(payload);
  return parsed.success ? parsed.data : null;
};

export const toFiniteNumber = (value: string | number | undefined): number | null => {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value !== "string") {
    return null;
  }

  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }

  const numeric = Number(trimmed);
  return Number.isFinite(numeric) ? numeric : null;
};

export const matchesAny = (value: string | undefined, patterns: readonly RegExp[]): boolean => {
  if (typeof value !== "string" || value.length === 0) {
    return false;
  }

  return patterns.some((pattern) => pattern.test(value));
};

const jwtHeaderSchema = z.object({
  alg: z.string()
});

export const decodeJwtHeader = (token: string): z.infer<typeof jwtHeaderSchema> | null => {
  const segments = token.trim().split(".");
  if (segments.length !== 3 || !segments[0]) {
    return null;
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(segments[0], "base64url").toString("utf8"));
  } catch {
    return null;
  }

  const header = jwtHeaderSchema.safeParse(decoded);
  return header.success ? header.data : null;
};
