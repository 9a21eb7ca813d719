import { Injectable } from "@nestjs/common";
import { isChallengeId, type ChallengeCatalogue, type VerdictResult } from "@ctf-arena/types";
import { z } from "zod";
import { CHALLENGE_RULES } from "./challenge-rules";
import { optionalText, readView } from "./payload-views";
import { UnknownChallengeError } from "./unknown-challenge.error";

export const FLAG_ACCEPTED_MESSAGE = "Flag is correct! Challenge solved.";
export const INCORRECT_MESSAGE = "Incorrect answer. Keep trying!";

const flagView = z.object({ flag: optionalText });

/**
 * Picks the rule for a challenge and turns its decision into a verdict.
 *
 * The catalogue is supplied per call so the dispatcher holds no state: the same
 * arguments always produce the same verdict. Points come from the catalogue entry,
 * never from the rule.
 */
export const evaluateSubmission = (
  challengeId: string,
  payload: unknown,
  catalogue: ChallengeCatalogue
): VerdictResult => {
  if (!isChallengeId(challengeId)) {
    throw new UnknownChallengeError(challengeId);
  }

  const entry = catalogue.get(challengeId);
  if (!entry) {
    throw new UnknownChallengeError(challengeId);
  }

  const submittedFlag = readView(flagView, payload)?.flag;
  if (submittedFlag !== undefined && submittedFlag === entry.flag) {
    return { isCorrect: true, message: FLAG_ACCEPTED_MESSAGE, pointsEarned: entry.points };
  }

  const rule = CHALLENGE_RULES[challengeId];
  if (rule.matches(payload)) {
    return { isCorrect: true, message: rule.successMessage, pointsEarned: entry.points };
  }

  return { isCorrect: false, message: INCORRECT_MESSAGE, pointsEarned: 0 };
};

@Injectable()
export class ChallengeValidationDispatcher {
  evaluate(challengeId: string, payload: unknown, catalogue: ChallengeCatalogue): VerdictResult {
    return evaluateSubmission(challengeId, payload, catalogue);
  }
}
