import { z } from "zod";

export const CHALLENGE_IDS = [
  "1",
  "2",
  "3",
  "4",
  "5",
  "6",
  "7",
  "8",
  "9",
  "10",
  "11",
  "12",
  "13",
  "14",
  "15"
] as const;

export const challengeIdSchema = z.enum(CHALLENGE_IDS);
export type ChallengeId = z.infer<typeof challengeIdSchema>;

export const isChallengeId = (value: string): value is ChallengeId => challengeIdSchema.safeParse(value).success;

export const challengeDifficultySchema = z.enum(["easy", "medium", "hard"]);
export type ChallengeDifficulty = z.infer<typeof challengeDifficultySchema>;

export const challengePointsSchema = z.number().int().min(1).max(100);

export const challengeCatalogueEntrySchema = z.object({
  id: challengeIdSchema,
  points: challengePointsSchema,
  flag: z.string().min(1)
});
export type ChallengeCatalogueEntry = z.infer<typeof challengeCatalogueEntrySchema>;

export type ChallengeCatalogue = ReadonlyMap<ChallengeId, Readonly<ChallengeCatalogueEntry>>;

export const challengeSeedSchema = challengeCatalogueEntrySchema.extend({
  slug: z.string().min(1).max(100),
  title: z.string().min(1).max(200),
  category: z.string().min(1).max(50),
  difficulty: challengeDifficultySchema,
  description: z.string().min(1),
  intro: z.string().optional(),
  playInstructions: z.string().optional(),
  frontendHint: z.string().optional()
});
export type ChallengeSeed = z.infer<typeof challengeSeedSchema>;

export const challengeSeedListSchema = z.array(challengeSeedSchema);

export const challengeSummarySchema = z.object({
  id: z.string(),
  ruleId: challengeIdSchema,
  title: z.string(),
  category: z.string(),
  points: challengePointsSchema,
  difficulty: challengeDifficultySchema,
  isActive: z.boolean(),
  solveCount: z.number().int().nonnegative(),
  isSolved: z.boolean().nullable().optional()
});

export const challengeSchema = challengeSummarySchema.extend({
  description: z.string(),
  intro: z.string().nullable().optional(),
  playInstructions: z.string().nullable().optional(),
  frontendHint: z.string().nullable().optional(),
  createdAt: z.string(),
  updatedAt: z.string()
});

export interface ListChallengesParams {
  category?: string;
  difficulty?: string;
}

export type ChallengeSummary = z.infer<typeof challengeSummarySchema>;
export type Challenge = z.infer<typeof challengeSchema>;
