import type { Challenge, ChallengeSummary } from "@ctf-arena/types";
import type { ChallengeEntity } from "./challenge.schema";

export type ChallengeRecord = ChallengeEntity & {
  createdAt: Date;
  updatedAt: Date;
};

export interface AdminChallenge extends Challenge {
  flag: string;
}

const toIsoString = (value: Date | string | undefined): string => {
  if (value instanceof Date) {
    return value.toISOString();
  }

  return typeof value === "string" ? value : new Date(0).toISOString();
};

export const toChallengeSummary = (record: ChallengeRecord, solved?: ReadonlySet<string>): ChallengeSummary => ({
  id: record.slug,
  ruleId: record.ruleId,
  title: record.title,
  category: record.category,
  points: record.points,
  difficulty: record.difficulty,
  isActive: record.isActive,
  solveCount: record.solveCount ?? 0,
  isSolved: solved ? solved.has(record.slug) : null
});

export const toChallenge = (record: ChallengeRecord, solved?: ReadonlySet<string>): Challenge => ({
  ...toChallengeSummary(record, solved),
  description: record.description,
  intro: record.intro ?? null,
  playInstructions: record.playInstructions ?? null,
  frontendHint: record.frontendHint ?? null,
  createdAt: toIsoString(record.createdAt),
  updatedAt: toIsoString(record.updatedAt)
});

export const toAdminChallenge = (record: ChallengeRecord): AdminChallenge => ({
  ...toChallenge(record),
  flag: record.flag
});

/** Rule ids are numeric strings; order them as numbers, then by slug. */
export const compareByRule = (a: ChallengeRecord, b: ChallengeRecord): number =>
  Number(a.ruleId) - Number(b.ruleId) || a.slug.localeCompare(b.slug);

export const normalizeSlug = (value: string): string =>
  value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
