import { z } from "zod";

/**
 * Free-form submission body. Its shape depends on the challenge; each validation
 * rule narrows it to the handful of fields it reads.
 */
export const submissionPayloadSchema = z.record(z.string(), z.unknown());
export type SubmissionPayload = z.infer<typeof submissionPayloadSchema>;

export const submissionFieldSchema = z.object({
  name: z.string().trim().min(1).max(64),
  value: z.string().max(4096)
});
export type SubmissionField = z.infer<typeof submissionFieldSchema>;

export const verdictResultSchema = z.object({
  isCorrect: z.boolean(),
  message: z.string(),
  pointsEarned: z.number().int().nonnegative()
});
export type VerdictResult = z.infer<typeof verdictResultSchema>;

export const submissionSchema = z.object({
  id: z.string(),
  userId: z.string(),
  challengeId: z.string(),
  isCorrect: z.boolean(),
  submittedData: submissionPayloadSchema,
  resultMessage: z.string(),
  pointsEarned: z.number().int().nonnegative(),
  createdAt: z.string()
});
export type Submission = z.infer<typeof submissionSchema>;
