import assert from "node:assert/strict";
import test from "node:test";
import { NotFoundException } from "@nestjs/common";
import type { AuthenticatedUser } from "../auth/auth.types";
import { InMemoryModel } from "../testing/in-memory-model";
import { UsersService } from "./users.service";

const player: AuthenticatedUser = {
  id: "user-1",
  email: "player@example.com",
  username: "player_one",
  roles: ["player"],
  status: "active"
};

const userDoc = (overrides: Record<string, unknown>) => ({
  userId: "user-x",
  email: "x@example.com",
  username: "x",
  roles: ["player"],
  status: "active",
  score: 0,
  solvedChallenges: [],
  lastSeenAt: null,
  ...overrides
});

const createService = (seed: Array<Record<string, unknown>> = []) => {
  const model = new InMemoryModel(seed);
  const service = new UsersService(model as never);
  return { model, service };
};

test("ensureProfile creates a profile on first sight", async () => {
  const { service } = createService();
  const now = new Date("2025-03-02T08:00:00.000Z");

  const profile = await service.ensureProfile(player, now);

  assert.equal(profile.userId, "user-1");
  assert.equal(profile.username, "player_one");
  assert.deepEqual(profile.roles, ["player"]);
  assert.equal(profile.status, "active");
  assert.equal(profile.score, 0);
  assert.deepEqual(profile.solvedChallenges, []);
  assert.deepEqual(profile.lastSeenAt, now);
});

test("ensureProfile keeps stored roles, status and score for a known player", async () => {
  const { service } = createService([
    userDoc({ userId: "user-1", username: "old_name", roles: ["admin"], status: "disabled", score: 40 })
  ]);

  const profile = await service.ensureProfile(player);

  assert.equal(profile.username, "player_one");
  assert.deepEqual(profile.roles, ["admin"]);
  assert.equal(profile.status, "disabled");
  assert.equal(profile.score, 40);
});

test("solvedSet is undefined for anonymous viewers and empty for unknown ones", async () => {
  const { service } = createService([userDoc({ userId: "user-1", solvedChallenges: ["a", "b"] })]);

  assert.equal(await service.solvedSet(undefined), undefined);
  assert.deepEqual([...((await service.solvedSet("user-1")) ?? [])], ["a", "b"]);
  assert.equal((await service.solvedSet("nobody"))?.size, 0);
});

test("awardSolve credits a challenge only once", async () => {
  const { model, service } = createService([userDoc({ userId: "user-1", score: 5 })]);

  assert.equal(await service.awardSolve("user-1", "alpha", 20), true);
  assert.equal(await service.awardSolve("user-1", "alpha", 20), false);

  const [stored] = model.documents;
  assert.equal(stored?.score, 25);
  assert.deepEqual(stored?.solvedChallenges, ["alpha"]);
});

test("updateRole replaces the roles and rejects unknown users", async () => {
  const { service } = createService([userDoc({ userId: "user-1" })]);

  const updated = await service.updateRole("user-1", "admin");
  assert.deepEqual(updated.roles, ["admin"]);

  await assert.rejects(service.updateRole("nobody", "admin"), (error: unknown) => {
    return error instanceof NotFoundException && error.message === "User not found.";
  });
});

test("rankedPlayers orders active players by score then username", async () => {
  const { service } = createService([
    userDoc({ userId: "u1", username: "carol", score: 30 }),
    userDoc({ userId: "u2", username: "alice", score: 30 }),
    userDoc({ userId: "u3", username: "bob", score: 50 }),
    userDoc({ userId: "u4", username: "mallory", score: 90, status: "disabled" })
  ]);

  const ranked = await service.rankedPlayers(2);

  assert.deepEqual(
    ranked.map((user) => user.username),
    ["bob", "alice"]
  );
  assert.equal(await service.countActivePlayers(), 3);
  assert.equal(await service.rankForScore(30), 2);
  assert.equal(await service.rankForScore(50), 1);
});

test("analytics counts activity relative to the given time", async () => {
  const now = new Date("2025-03-05T10:00:00.000Z");
  const { service } = createService([
    userDoc({
      userId: "u1",
      username: "today",
      score: 10,
      lastSeenAt: new Date("2025-03-05T01:00:00.000Z"),
      createdAt: new Date("2025-03-05T00:30:00.000Z")
    }),
    userDoc({
      userId: "u2",
      username: "this_week",
      score: 20,
      lastSeenAt: new Date("2025-03-01T09:00:00.000Z"),
      createdAt: new Date("2025-02-01T00:00:00.000Z")
    }),
    userDoc({
      userId: "u3",
      username: "dormant",
      score: 0,
      lastSeenAt: new Date("2025-01-01T00:00:00.000Z"),
      createdAt: new Date("2025-01-01T00:00:00.000Z")
    })
  ]);

  assert.deepEqual(await service.analytics(now), {
    totalUsers: 3,
    activeUsersToday: 1,
    activeUsersWeek: 2,
    newRegistrationsToday: 1,
    topScorers: [
      { username: "this_week", score: 20 },
      { username: "today", score: 10 },
      { username: "dormant", score: 0 }
    ]
  });
});
