import assert from "node:assert/strict";
import test from "node:test";
import { ChallengesService } from "../challenges/challenges.service";
import { SubmissionsService } from "../submissions/submissions.service";
import { InMemoryModel } from "../testing/in-memory-model";
import { UsersService } from "../users/users.service";
import { ChallengeValidationDispatcher } from "../validation/challenge-validation.dispatcher";
import { LeaderboardService, progressPercentage } from "./leaderboard.service";

const userDoc = (userId: string, username: string, score: number, solved: string[], status = "active") => ({
  userId,
  email: `${username}@example.com`,
  username,
  roles: ["player"],
  status,
  score,
  solvedChallenges: solved
});

const challengeDoc = (slug: string, ruleId: string, isActive = true) => ({
  slug,
  ruleId,
  title: slug,
  category: "web",
  description: "d",
  points: 10,
  difficulty: "easy",
  isActive,
  flag: `ARENA{${slug}}`,
  solveCount: 0
});

const createService = () => {
  const challengeModel = new InMemoryModel([
    challengeDoc("a", "1"),
    challengeDoc("b", "2"),
    challengeDoc("c", "3"),
    challengeDoc("retired", "4", false)
  ]);
  const userModel = new InMemoryModel([
    userDoc("u1", "alice", 30, ["a", "b", "c"]),
    userDoc("u2", "bob", 10, ["a"]),
    userDoc("u3", "carol", 10, ["b"]),
    userDoc("u4", "mallory", 99, ["a", "b"], "disabled")
  ]);
  const submissionModel = new InMemoryModel();

  const challengesService = new ChallengesService(challengeModel as never, { shouldSeedChallenges: () => false } as never);
  const usersService = new UsersService(userModel as never);
  const submissionsService = new SubmissionsService(
    submissionModel as never,
    challengesService,
    usersService,
    new ChallengeValidationDispatcher()
  );

  return new LeaderboardService(usersService, challengesService, submissionsService);
};

test("progressPercentage rounds to one decimal and guards an empty catalogue", () => {
  assert.equal(progressPercentage(1, 3), 33.3);
  assert.equal(progressPercentage(2, 3), 66.7);
  assert.equal(progressPercentage(3, 3), 100);
  assert.equal(progressPercentage(0, 0), 0);
});

test("getLeaderboard ranks active players and flags the viewer", async () => {
  const service = createService();

  const leaderboard = await service.getLeaderboard({ viewerId: "u3" });

  assert.deepEqual(leaderboard, {
    entries: [
      { rank: 1, username: "alice", score: 30, solvedChallenges: 3, progressPercentage: 100, isCurrentUser: false },
      { rank: 2, username: "bob", score: 10, solvedChallenges: 1, progressPercentage: 33.3, isCurrentUser: false },
      { rank: 3, username: "carol", score: 10, solvedChallenges: 1, progressPercentage: 33.3, isCurrentUser: true }
    ],
    totalPlayers: 3,
    viewerRank: 2
  });
});

test("getLeaderboard clamps the limit and omits the rank for anonymous or disabled viewers", async () => {
  const service = createService();

  const top = await service.getLeaderboard({ limit: 0 });
  assert.equal(top.entries.length, 1);
  assert.equal(top.viewerRank, null);

  const disabled = await service.getLeaderboard({ limit: 1000, viewerId: "u4" });
  assert.equal(disabled.entries.length, 3);
  assert.equal(disabled.viewerRank, null);
});

test("getProgress summarises a player's standing", async () => {
  const service = createService();

  assert.deepEqual(await service.getProgress("u2"), {
    userId: "u2",
    totalChallenges: 3,
    solvedChallenges: 1,
    totalScore: 10,
    progressPercentage: 33.3,
    rank: 2,
    recentSolves: []
  });
});

test("getProgress places an unknown player below every scoring player", async () => {
  const service = createService();

  const progress = await service.getProgress("nobody");

  assert.equal(progress.solvedChallenges, 0);
  assert.equal(progress.totalScore, 0);
  assert.equal(progress.rank, 4);
});
