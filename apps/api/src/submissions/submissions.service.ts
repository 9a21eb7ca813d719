import {
  ForbiddenException,
  Injectable,
  InternalServerErrorException,
  NotFoundException
} from "@nestjs/common";
import { InjectModel } from "@nestjs/mongoose";
import { SpanStatusCode } from "@opentelemetry/api";
import type { RecentSolve, Submission, VerdictResult } from "@ctf-arena/types";
import type { Model, Types } from "mongoose";
import { performance } from "node:perf_hooks";
import type { Logger } from "pino";
import type { AuthenticatedUser } from "../auth/auth.types";
import { ChallengesService } from "../challenges/challenges.service";
import { apiTracer, evaluationDurationHistogram, solveCounter, submissionCounter } from "../observability/telemetry";
import { UsersService } from "../users/users.service";
import { createChallengeCatalogue } from "../validation/challenge-catalogue";
import { ChallengeValidationDispatcher } from "../validation/challenge-validation.dispatcher";
import { UnknownChallengeError } from "../validation/unknown-challenge.error";
import { foldSubmissionFields } from "./submission-payload";
import { SubmissionEntity } from "./submission.schema";

export const ALREADY_SOLVED_MESSAGE = "Challenge already solved!";
export const SUBMISSION_HISTORY_LIMIT = 10;
export const RECENT_SOLVES_LIMIT = 5;

export type SubmissionRecord = SubmissionEntity & {
  _id: Types.ObjectId;
  createdAt: Date;
  updatedAt: Date;
};

export interface SubmitChallengeParams {
  challengeId: string;
  fields: unknown;
  user: AuthenticatedUser;
  logger: Logger;
  requestId: string;
}

export interface SubmissionCounts {
  total: number;
  correct: number;
}

export const toSubmission = (record: SubmissionRecord): Submission => ({
  id: String(record._id),
  userId: record.userId,
  challengeId: record.challengeId,
  isCorrect: record.isCorrect,
  submittedData: record.submittedData ?? {},
  resultMessage: record.resultMessage,
  pointsEarned: record.pointsEarned,
  createdAt: record.createdAt.toISOString()
});

@Injectable()
export class SubmissionsService {
  constructor(
    @InjectModel(SubmissionEntity.name)
    private readonly submissionModel: Model<SubmissionEntity>,
    private readonly challengesService: ChallengesService,
    private readonly usersService: UsersService,
    private readonly dispatcher: ChallengeValidationDispatcher
  ) {}

  async submit(params: SubmitChallengeParams): Promise<VerdictResult> {
    const span = apiTracer.startSpan("submission.submit", {
      attributes: { "challenge.slug": params.challengeId, "user.id": params.user.id }
    });

    try {
      const verdict = await this.processSubmission(params);
      span.setAttribute("submission.correct", verdict.isCorrect);
      span.setStatus({ code: SpanStatusCode.OK });
      return verdict;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      span.setStatus({ code: SpanStatusCode.ERROR, message });
      throw error;
    } finally {
      span.end();
    }
  }

  private async processSubmission(params: SubmitChallengeParams): Promise<VerdictResult> {
    const { user, logger, requestId } = params;
    const payload = foldSubmissionFields(params.fields);

    const challenge = await this.challengesService.findActive(params.challengeId);
    if (!challenge) {
      throw new NotFoundException("Challenge not found.");
    }

    const profile = await this.usersService.ensureProfile(user);
    if (profile.status === "disabled") {
      throw new ForbiddenException("This account has been disabled.");
    }

    if (profile.solvedChallenges.includes(challenge.slug)) {
      return { isCorrect: false, message: ALREADY_SOLVED_MESSAGE, pointsEarned: 0 };
    }

    const catalogue = createChallengeCatalogue([
      { id: challenge.ruleId, points: challenge.points, flag: challenge.flag }
    ]);

    const startedAt = performance.now();
    let verdict: VerdictResult;
    try {
      verdict = this.dispatcher.evaluate(challenge.ruleId, payload, catalogue);
    } catch (error) {
      if (error instanceof UnknownChallengeError) {
        logger.error(
          { event: "submission.validator_missing", requestId, challengeId: challenge.slug, ruleId: challenge.ruleId },
          "No validation rule for stored challenge"
        );
        throw new InternalServerErrorException("Challenge validator not found");
      }

      throw error;
    }

    evaluationDurationHistogram.record(performance.now() - startedAt, { ruleId: challenge.ruleId });
    submissionCounter.add(1, { ruleId: challenge.ruleId, correct: verdict.isCorrect ? 1 : 0 });

    if (verdict.isCorrect) {
      // A concurrent correct submission may have won the award after the check above.
      const awarded = await this.usersService.awardSolve(user.id, challenge.slug, verdict.pointsEarned);
      if (!awarded) {
        return { isCorrect: false, message: ALREADY_SOLVED_MESSAGE, pointsEarned: 0 };
      }
    }

    await this.submissionModel.create({
      userId: user.id,
      challengeId: challenge.slug,
      isCorrect: verdict.isCorrect,
      submittedData: payload,
      resultMessage: verdict.message,
      pointsEarned: verdict.pointsEarned
    });

    if (verdict.isCorrect) {
      await this.challengesService.recordSolve(challenge.slug);
      solveCounter.add(1, { ruleId: challenge.ruleId });
      logger.info(
        {
          event: "submission.solved",
          requestId,
          userId: user.id,
          challengeId: challenge.slug,
          pointsEarned: verdict.pointsEarned
        },
        "Challenge solved"
      );
    }

    return verdict;
  }

  async listForChallenge(userId: string, challengeId: string): Promise<Submission[]> {
    const records = await this.submissionModel
      .find({ userId, challengeId: challengeId.trim().toLowerCase() })
      .sort({ createdAt: -1 })
      .limit(SUBMISSION_HISTORY_LIMIT)
      .lean<SubmissionRecord[]>()
      .exec();

    return records.map(toSubmission);
  }

  async recentSolves(userId: string, limit = RECENT_SOLVES_LIMIT): Promise<RecentSolve[]> {
    const records = await this.submissionModel
      .find({ userId, isCorrect: true })
      .sort({ createdAt: -1 })
      .limit(limit)
      .lean<SubmissionRecord[]>()
      .exec();

    const titles = await this.challengesService.findTitles(records.map((record) => record.challengeId));

    return records.map((record) => ({
      challengeId: record.challengeId,
      challengeTitle: titles.get(record.challengeId) ?? "Unknown Challenge",
      pointsEarned: record.pointsEarned,
      solvedAt: record.createdAt.toISOString()
    }));
  }

  async counts(): Promise<SubmissionCounts> {
    const [total, correct] = await Promise.all([
      this.submissionModel.countDocuments({}).exec(),
      this.submissionModel.countDocuments({ isCorrect: true }).exec()
    ]);

    return { total, correct };
  }

  async deleteForChallenge(challengeId: string): Promise<number> {
    const result = await this.submissionModel.deleteMany({ challengeId }).exec();
    return result.deletedCount;
  }
}
