import assert from "node:assert/strict";
import test from "node:test";
import { InMemoryModel } from "../testing/in-memory-model";
import { loadChallengeSeeds } from "./challenge-catalogue.loader";
import { ChallengesService } from "./challenges.service";

const challengeDoc = (overrides: Record<string, unknown>) => ({
  slug: "sample",
  ruleId: "1",
  title: "Sample",
  category: "web",
  description: "Sample challenge",
  intro: null,
  playInstructions: null,
  frontendHint: null,
  points: 10,
  difficulty: "easy",
  isActive: true,
  flag: "ARENA{sample}",
  solveCount: 0,
  ...overrides
});

const configStub = (seed: boolean) => ({
  shouldSeedChallenges: () => seed
});

const createService = (seed: Array<Record<string, unknown>> = [], shouldSeed = false) => {
  const model = new InMemoryModel(seed);
  const service = new ChallengesService(model as never, configStub(shouldSeed) as never);
  return { model, service };
};

test("listChallenges returns active challenges ordered by numeric rule id", async () => {
  const { service } = createService([
    challengeDoc({ slug: "ten", ruleId: "10" }),
    challengeDoc({ slug: "two", ruleId: "2" }),
    challengeDoc({ slug: "hidden", ruleId: "3", isActive: false })
  ]);

  const challenges = await service.listChallenges();

  assert.deepEqual(
    challenges.map((challenge) => challenge.id),
    ["two", "ten"]
  );
  assert.equal(challenges[0]?.isSolved, null);
});

test("listChallenges marks solved challenges for a signed-in viewer", async () => {
  const { service } = createService([
    challengeDoc({ slug: "one", ruleId: "1" }),
    challengeDoc({ slug: "two", ruleId: "2" })
  ]);

  const challenges = await service.listChallenges({}, new Set(["two"]));

  assert.deepEqual(
    challenges.map((challenge) => [challenge.id, challenge.isSolved]),
    [
      ["one", false],
      ["two", true]
    ]
  );
});

test("listChallenges filters by category and normalised difficulty", async () => {
  const { service } = createService([
    challengeDoc({ slug: "a", ruleId: "1", category: "web", difficulty: "easy" }),
    challengeDoc({ slug: "b", ruleId: "2", category: "web", difficulty: "hard" }),
    challengeDoc({ slug: "c", ruleId: "3", category: "crypto", difficulty: "hard" })
  ]);

  const hardWeb = await service.listChallenges({ category: " web ", difficulty: " HARD " });
  assert.deepEqual(
    hardWeb.map((challenge) => challenge.id),
    ["b"]
  );

  const unknownDifficulty = await service.listChallenges({ difficulty: "impossible" });
  assert.equal(unknownDifficulty.length, 3);
});

test("getChallenge normalises the slug and hides inactive challenges", async () => {
  const { service } = createService([
    challengeDoc({ slug: "insecure-login", description: "Log in as admin." }),
    challengeDoc({ slug: "retired", ruleId: "2", isActive: false })
  ]);

  const challenge = await service.getChallenge("  Insecure-Login ");
  assert.equal(challenge?.id, "insecure-login");
  assert.equal(challenge?.description, "Log in as admin.");
  assert.equal(challenge?.createdAt, "2025-03-01T12:00:00.000Z");
  assert.equal(challenge !== null && "flag" in challenge, false);

  assert.equal(await service.getChallenge("retired"), null);
  assert.equal(await service.getChallenge("missing"), null);
});

test("listCategories returns distinct active categories in order", async () => {
  const { service } = createService([
    challengeDoc({ slug: "a", category: "web" }),
    challengeDoc({ slug: "b", category: "crypto" }),
    challengeDoc({ slug: "c", category: "web" }),
    challengeDoc({ slug: "d", category: "forensics", isActive: false })
  ]);

  assert.deepEqual(await service.listCategories(), ["crypto", "web"]);
  assert.deepEqual(service.listDifficulties(), ["easy", "medium", "hard"]);
});

test("seedCatalogue inserts each bundled challenge once", async () => {
  const { model, service } = createService([
    challengeDoc({ slug: "insecure-login", title: "Edited by an admin", points: 50 })
  ]);
  const seeds = loadChallengeSeeds();

  const first = await service.seedCatalogue();
  assert.deepEqual(first, { inserted: seeds.length - 1, total: seeds.length });
  assert.equal(model.documents.length, seeds.length);

  const edited = model.documents.find((document) => document.slug === "insecure-login");
  assert.equal(edited?.title, "Edited by an admin");
  assert.equal(edited?.points, 50);

  const second = await service.seedCatalogue();
  assert.deepEqual(second, { inserted: 0, total: seeds.length });
});

test("onModuleInit skips seeding when it is switched off", async () => {
  const { model, service } = createService([], false);

  await service.onModuleInit();

  assert.equal(model.documents.length, 0);
});

test("onModuleInit seeds the catalogue when enabled", async () => {
  const { model, service } = createService([], true);

  await service.onModuleInit();

  assert.equal(model.documents.length, loadChallengeSeeds().length);
  assert.equal(await service.countActive(), loadChallengeSeeds().length);
});

test("recordSolve increments the solve counter and findTitles maps slugs", async () => {
  const { service } = createService([
    challengeDoc({ slug: "a", title: "Alpha" }),
    challengeDoc({ slug: "b", title: "Beta", ruleId: "2" })
  ]);

  await service.recordSolve("a");
  await service.recordSolve("a");

  const [alpha] = await service.listChallenges({ category: "web" });
  assert.equal(alpha?.solveCount, 2);

  const titles = await service.findTitles(["b", "missing"]);
  assert.deepEqual([...titles.entries()], [["b", "Beta"]]);
  assert.equal((await service.findTitles([])).size, 0);
});
