import assert from "node:assert/strict";
import { Buffer } from "node:buffer";
import test from "node:test";
import { CHALLENGE_IDS, type ChallengeId } from "@ctf-arena/types";
import { createChallengeCatalogue } from "./challenge-catalogue";
import {
  ChallengeValidationDispatcher,
  FLAG_ACCEPTED_MESSAGE,
  INCORRECT_MESSAGE,
  evaluateSubmission
} from "./challenge-validation.dispatcher";
import { CHALLENGE_RULES } from "./challenge-rules";
import { UnknownChallengeError } from "./unknown-challenge.error";

const encodeSegment = (value: Record<string, unknown>) =>
  Buffer.from(JSON.stringify(value)).toString("base64url");

const unsignedToken = `${encodeSegment({ alg: "none", typ: "JWT" })}.${encodeSegment({ sub: "admin" })}.`;

const solutions: Record<ChallengeId, Record<string, unknown>> = {
  "1": { username: "admin", password: "anything" },
  "2": { input: "' OR '1'='1" },
  "3": { input: "<script>alert(1)</script>" },
  "4": { cookie: "admin" },
  "5": { path: "/super/secret/flag" },
  "6": { quantity: "-3" },
  "7": { profileId: "1" },
  "8": { redirect: "https://evil.example/phish" },
  "9": { header: "X-Flag" },
  "10": { token: unsignedToken },
  "11": { filename: "shell.php.jpg" },
  "12": { path: "/backup-admin-panel" },
  "13": { resetToken: "RST-1002" },
  "14": { input: "eval(atob('YWxlcnQoMSk='))" },
  "15": { apiKey: "arena-hardcoded-api-key" }
};

const catalogue = createChallengeCatalogue(
  CHALLENGE_IDS.map((id) => ({ id, points: Number(id) * 5, flag: `ARENA{test_flag_${id}}` }))
);

test("every challenge accepts its documented solution and awards the catalogue points", () => {
  for (const id of CHALLENGE_IDS) {
    const verdict = evaluateSubmission(id, solutions[id], catalogue);

    assert.equal(verdict.isCorrect, true, `challenge ${id} should accept its solution`);
    assert.equal(verdict.message, CHALLENGE_RULES[id].successMessage);
    assert.equal(verdict.pointsEarned, Number(id) * 5);
  }
});

test("every challenge rejects an empty payload", () => {
  for (const id of CHALLENGE_IDS) {
    assert.deepEqual(evaluateSubmission(id, {}, catalogue), {
      isCorrect: false,
      message: INCORRECT_MESSAGE,
      pointsEarned: 0
    });
  }
});

test("payloads that are not objects fail closed", () => {
  for (const payload of [null, undefined, "admin", 42, ["admin"]]) {
    assert.equal(evaluateSubmission("4", payload, catalogue).isCorrect, false);
  }
});

test("evaluate is idempotent for identical arguments", () => {
  const dispatcher = new ChallengeValidationDispatcher();
  const first = dispatcher.evaluate("1", { username: "admin" }, catalogue);
  const second = dispatcher.evaluate("1", { username: "admin" }, catalogue);

  assert.deepEqual(first, second);
});

test("unknown challenge ids raise UnknownChallengeError", () => {
  assert.throws(
    () => evaluateSubmission("99", { flag: "anything" }, catalogue),
    (error) => {
      assert.ok(error instanceof UnknownChallengeError);
      assert.equal(error.challengeId, "99");
      return true;
    }
  );
});

test("a known id missing from the injected catalogue is reported as unknown", () => {
  const partial = createChallengeCatalogue([{ id: "1", points: 10, flag: "ARENA{only_one}" }]);

  assert.throws(() => evaluateSubmission("4", { cookie: "admin" }, partial), UnknownChallengeError);
});

test("the captured flag solves any challenge", () => {
  const verdict = evaluateSubmission("12", { flag: "ARENA{test_flag_12}" }, catalogue);

  assert.deepEqual(verdict, { isCorrect: true, message: FLAG_ACCEPTED_MESSAGE, pointsEarned: 60 });
});

test("a flag from another challenge is rejected", () => {
  const verdict = evaluateSubmission("12", { flag: "ARENA{test_flag_11}" }, catalogue);

  assert.equal(verdict.isCorrect, false);
  assert.equal(verdict.pointsEarned, 0);
});

test("createChallengeCatalogue keeps the last entry for a repeated id", () => {
  const result = createChallengeCatalogue([
    { id: "3", points: 10, flag: "first" },
    { id: "3", points: 25, flag: "second" }
  ]);

  assert.equal(result.size, 1);
  assert.deepEqual(result.get("3"), { id: "3", points: 25, flag: "second" });
  assert.ok(Object.isFrozen(result.get("3")));
});
