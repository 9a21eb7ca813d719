import assert from "node:assert/strict";
import test from "node:test";
import { BadRequestException, NotFoundException } from "@nestjs/common";
import { ChallengesService } from "../challenges/challenges.service";
import { VisitsService } from "../challenges/visits.service";
import { SubmissionsService } from "../submissions/submissions.service";
import { InMemoryModel } from "../testing/in-memory-model";
import { UsersService } from "../users/users.service";
import { ChallengeValidationDispatcher } from "../validation/challenge-validation.dispatcher";
import { AdminChallengesService, type CreateChallengeParams } from "./admin-challenges.service";

const baseInput: CreateChallengeParams = {
  slug: "Cookie Monster!",
  ruleId: "4",
  title: " Cookie Monster ",
  category: " Session ",
  description: "Become admin by editing a cookie.",
  flag: "ARENA{cookie}"
};

const createHarness = (challenges: Array<Record<string, unknown>> = []) => {
  const challengeModel = new InMemoryModel(challenges);
  const submissionModel = new InMemoryModel();
  const visitModel = new InMemoryModel();

  const challengesService = new ChallengesService(challengeModel as never, { shouldSeedChallenges: () => false } as never);
  const usersService = new UsersService(new InMemoryModel() as never);
  const submissionsService = new SubmissionsService(
    submissionModel as never,
    challengesService,
    usersService,
    new ChallengeValidationDispatcher()
  );
  const visitsService = new VisitsService(visitModel as never);
  const service = new AdminChallengesService(
    challengeModel as never,
    challengesService,
    submissionsService,
    visitsService
  );

  return { service, challengeModel, submissionModel, visitModel, visitsService };
};

const rejectsWith = (message: string) => (error: unknown) =>
  error instanceof BadRequestException && error.message === message;

test("createChallenge normalises the input and applies defaults", async () => {
  const { service } = createHarness();

  const created = await service.createChallenge(baseInput);

  assert.equal(created.id, "cookie-monster");
  assert.equal(created.ruleId, "4");
  assert.equal(created.title, "Cookie Monster");
  assert.equal(created.category, "session");
  assert.equal(created.points, 10);
  assert.equal(created.difficulty, "easy");
  assert.equal(created.isActive, true);
  assert.equal(created.solveCount, 0);
  assert.equal(created.intro, null);
  assert.equal(created.flag, "ARENA{cookie}");
});

test("createChallenge rejects duplicates and invalid values", async () => {
  const { service } = createHarness();
  await service.createChallenge(baseInput);

  await assert.rejects(service.createChallenge(baseInput), rejectsWith("A challenge with this slug already exists."));
  await assert.rejects(
    service.createChallenge({ ...baseInput, slug: "!!!" }),
    rejectsWith("A challenge slug must contain at least one alphanumeric character.")
  );
  await assert.rejects(
    service.createChallenge({ ...baseInput, slug: "other", ruleId: "16" }),
    rejectsWith('Unknown validation rule "16".')
  );
  await assert.rejects(
    service.createChallenge({ ...baseInput, slug: "other", title: "   " }),
    rejectsWith("Title cannot be empty.")
  );
  await assert.rejects(
    service.createChallenge({ ...baseInput, slug: "other", points: 101 }),
    rejectsWith("Points must be a whole number between 1 and 100.")
  );
  await assert.rejects(
    service.createChallenge({ ...baseInput, slug: "other", difficulty: "insane" }),
    rejectsWith("Difficulty must be one of easy, medium or hard.")
  );
});

test("updateChallenge changes only the given fields", async () => {
  const { service } = createHarness();
  await service.createChallenge({ ...baseInput, intro: "Old intro" });

  const updated = await service.updateChallenge({
    id: "Cookie-Monster",
    points: 40,
    difficulty: "Hard",
    intro: "  ",
    isActive: false
  });

  assert.equal(updated.points, 40);
  assert.equal(updated.difficulty, "hard");
  assert.equal(updated.intro, null);
  assert.equal(updated.isActive, false);
  assert.equal(updated.title, "Cookie Monster");
  assert.equal(updated.flag, "ARENA{cookie}");

  await assert.rejects(service.updateChallenge({ id: "missing", points: 5 }), NotFoundException);
});

test("deleteChallenge removes the challenge with its submissions and visits", async () => {
  const { service, challengeModel, submissionModel, visitModel, visitsService } = createHarness();
  await service.createChallenge(baseInput);
  await service.createChallenge({ ...baseInput, slug: "keep-me" });

  await submissionModel.create({ userId: "u1", challengeId: "cookie-monster", isCorrect: false });
  await submissionModel.create({ userId: "u1", challengeId: "keep-me", isCorrect: false });
  await visitsService.recordChallengeVisit("cookie-monster", {});
  await visitsService.recordChallengeVisit("cookie-monster", {});

  assert.deepEqual(await service.deleteChallenge("cookie-monster"), {
    id: "cookie-monster",
    deletedSubmissions: 1,
    deletedVisits: 2
  });
  assert.deepEqual(
    challengeModel.documents.map((document) => document.slug),
    ["keep-me"]
  );
  assert.equal(submissionModel.documents.length, 1);
  assert.equal(visitModel.documents.length, 0);

  await assert.rejects(service.deleteChallenge("cookie-monster"), NotFoundException);
});

test("listChallenges exposes flags to admins, newest first", async () => {
  const { service } = createHarness([
    {
      slug: "older",
      ruleId: "1",
      title: "Older",
      category: "web",
      description: "d",
      flag: "ARENA{older}",
      points: 10,
      difficulty: "easy",
      isActive: false,
      solveCount: 0,
      createdAt: new Date("2025-01-01T00:00:00.000Z")
    }
  ]);
  await service.createChallenge(baseInput);

  const challenges = await service.listChallenges();

  assert.deepEqual(
    challenges.map((challenge) => [challenge.id, challenge.flag]),
    [
      ["cookie-monster", "ARENA{cookie}"],
      ["older", "ARENA{older}"]
    ]
  );
});
