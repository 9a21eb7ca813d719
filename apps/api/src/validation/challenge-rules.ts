import type { ChallengeId } from "@ctf-arena/types";
import { z } from "zod";
import { decodeJwtHeader, matchesAny, optionalScalar, optionalText, readView, toFiniteNumber } from "./payload-views";

export interface ChallengeRule {
  category: string;
  successMessage: string;
  matches(payload: unknown): boolean;
}

interface RuleDefinition<S extends z.ZodTypeAny> {
  category: string;
  successMessage: string;
  view: S;
  check(view: z.infer<S>): boolean;
}

const defineRule = <S extends z.ZodTypeAny>(definition: RuleDefinition<S>): ChallengeRule => ({
  category: definition.category,
  successMessage: definition.successMessage,
  matches(payload: unknown) {
    const view = readView(definition.view, payload);
    return view !== null && definition.check(view);
  }
});

const SQL_INJECTION_PATTERNS = [
  /\bunion\b[\s\S]*\bselect\b/i,
  /'\s*or\s+'?\w+'?\s*=\s*'?\w+/i,
  /\bor\s+(\d+)\s*=\s*\1\b/i,
  /'\s*(--|#)/
] as const;

const XSS_PATTERNS = [/<script\b/i, /javascript:/i, /<[^>]*\son[a-z]+\s*=/i] as const;

const EVAL_PATTERNS = [
  /\beval\s*\(/,
  /\bnew\s+Function\s*\(/,
  /\bset(?:Timeout|Interval)\s*\(\s*["'`]/
] as const;

const UPLOAD_BYPASS_PATTERN = /\.(php[3-7]?|phtml|jsp|aspx?)(\.[a-z0-9]+|%00|\0)/i;

export const TRUSTED_REDIRECT_HOST = "arena.local";

const leavesTrustedOrigin = (target: string | undefined): boolean => {
  const trimmed = target?.trim();
  if (!trimmed) {
    return false;
  }

  let resolved: URL;
  try {
    resolved = new URL(trimmed, `https://${TRUSTED_REDIRECT_HOST}/`);
  } catch {
    return false;
  }

  if (resolved.protocol !== "http:" && resolved.protocol !== "https:") {
    return false;
  }

  const hostname = resolved.hostname.endsWith(".") ? resolved.hostname.slice(0, -1) : resolved.hostname;
  return hostname.length > 0 && hostname !== TRUSTED_REDIRECT_HOST;
};

/**
 * One rule per catalogue id. Every rule is a pure predicate over its own view of
 * the payload; a missing or mistyped field never matches.
 */
export const CHALLENGE_RULES: Readonly<Record<ChallengeId, ChallengeRule>> = {
  "1": defineRule({
    category: "authentication",
    successMessage: "Login bypassed: the check accepts either field on its own.",
    view: z.object({ username: optionalText, password: optionalText }),
    // Either field alone is a valid solution.
    check: ({ username, password }) => username === "admin" || password === "admin"
  }),
  "2": defineRule({
    category: "injection",
    successMessage: "SQL injection payload reached the query.",
    view: z.object({ input: optionalText }),
    check: ({ input }) => matchesAny(input, SQL_INJECTION_PATTERNS)
  }),
  "3": defineRule({
    category: "xss",
    successMessage: "Script payload was reflected into the page.",
    view: z.object({ input: optionalText }),
    check: ({ input }) => matchesAny(input, XSS_PATTERNS)
  }),
  "4": defineRule({
    category: "session",
    successMessage: "Role cookie tampered: you are now admin.",
    view: z.object({ cookie: optionalText }),
    check: ({ cookie }) => cookie === "admin"
  }),
  "5": defineRule({
    category: "recon",
    successMessage: "Hidden path discovered.",
    view: z.object({ path: optionalText }),
    check: ({ path }) => path === "/super/secret/flag"
  }),
  "6": defineRule({
    category: "validation",
    successMessage: "The server accepted a quantity the form would have blocked.",
    view: z.object({ quantity: optionalScalar }),
    check: ({ quantity }) => {
      const numeric = toFiniteNumber(quantity);
      return numeric !== null && numeric < 0;
    }
  }),
  "7": defineRule({
    category: "access-control",
    successMessage: "You read another user's profile by changing its id.",
    view: z.object({ profileId: optionalScalar }),
    check: ({ profileId }) => profileId !== undefined && String(profileId).trim() === "1"
  }),
  "8": defineRule({
    category: "redirect",
    successMessage: "Redirect escaped the trusted origin.",
    view: z.object({ redirect: optionalText }),
    check: ({ redirect }) => leavesTrustedOrigin(redirect)
  }),
  "9": defineRule({
    category: "information-disclosure",
    successMessage: "Leaky response header identified.",
    view: z.object({ header: optionalText }),
    check: ({ header }) => header?.trim().toLowerCase() === "x-flag"
  }),
  "10": defineRule({
    category: "cryptography",
    successMessage: "Unsigned token accepted with alg none.",
    view: z.object({ token: optionalText }),
    check: ({ token }) => {
      if (!token) {
        return false;
      }

      const header = decodeJwtHeader(token);
      return header !== null && header.alg.toLowerCase() === "none";
    }
  }),
  "11": defineRule({
    category: "upload",
    successMessage: "Executable upload slipped past the extension filter.",
    view: z.object({ filename: optionalText }),
    check: ({ filename }) => typeof filename === "string" && UPLOAD_BYPASS_PATTERN.test(filename)
  }),
  "12": defineRule({
    category: "recon",
    successMessage: "robots.txt gave away the admin backup.",
    view: z.object({ path: optionalText }),
    check: ({ path }) => path === "/backup-admin-panel"
  }),
  "13": defineRule({
    category: "cryptography",
    successMessage: "Next reset token predicted.",
    view: z.object({ resetToken: optionalText }),
    check: ({ resetToken }) => resetToken === "RST-1002"
  }),
  "14": defineRule({
    category: "xss",
    successMessage: "unsafe-eval let your script through the CSP.",
    view: z.object({ input: optionalText }),
    check: ({ input }) => matchesAny(input, EVAL_PATTERNS)
  }),
  "15": defineRule({
    category: "secrets",
    successMessage: "Hardcoded API key recovered from the bundle.",
    view: z.object({ apiKey: optionalText }),
    check: ({ apiKey }) => apiKey === "arena-hardcoded-api-key"
  })
};
