import { BadRequestException } from "@nestjs/common";
import { submissionFieldSchema, type SubmissionField, type SubmissionPayload } from "@ctf-arena/types";
import { z } from "zod";

export const MAX_SUBMISSION_FIELDS = 32;

const submissionFieldListSchema = z.array(submissionFieldSchema).max(MAX_SUBMISSION_FIELDS);

/**
 * Turns the `[{ name, value }]` list a form posts into the mapping the rules
 * read. A repeated name keeps its last value.
 */
export const foldSubmissionFields = (fields: unknown): SubmissionPayload => {
  const parsed = submissionFieldListSchema.safeParse(fields);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const location = issue?.path.length ? ` at ${issue.path.join(".")}` : "";
    throw new BadRequestException(`Invalid submission fields${location}: ${issue?.message ?? "unknown error"}`);
  }

  return Object.fromEntries(parsed.data.map((field) => [field.name, field.value]));
};

export const toSubmissionFields = (payload: SubmissionPayload): SubmissionField[] =>
  Object.entries(payload).map(([name, value]) => ({
    name,
    value: typeof value === "string" ? value : JSON.stringify(value) ?? ""
  }));
