/**
 * Raised when a challenge id has no validation rule, or when the catalogue handed
 * to the dispatcher does not list it. Resolvers surface it as NOT_FOUND.
 */
export class UnknownChallengeError extends Error {
  readonly challengeId: string;

  constructor(challengeId: string) {
    super(`Challenge ${JSON.stringify(challengeId)} is not in the catalogue.`);
    this.name = "UnknownChallengeError";
    this.challengeId = challengeId;
  }
}
