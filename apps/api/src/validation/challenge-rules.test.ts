import assert from "node:assert/strict";
import { Buffer } from "node:buffer";
import test from "node:test";
import { CHALLENGE_RULES } from "./challenge-rules";

const token = (header: Record<string, unknown>) =>
  `${Buffer.from(JSON.stringify(header)).toString("base64url")}.e30.`;

test("auth bypass accepts either field on its own", () => {
  const rule = CHALLENGE_RULES["1"];

  assert.equal(rule.matches({ username: "admin", password: "wrong" }), true);
  assert.equal(rule.matches({ username: "someone", password: "admin" }), true);
  assert.equal(rule.matches({ password: "admin" }), true);
  assert.equal(rule.matches({ username: "user", password: "password" }), false);
});

test("auth bypass is case-sensitive", () => {
  assert.equal(CHALLENGE_RULES["1"].matches({ username: "Admin" }), false);
  assert.equal(CHALLENGE_RULES["1"].matches({ username: "Admin", password: "ADMIN" }), false);
});

test("a mistyped field reads as absent without failing its sibling", () => {
  assert.equal(CHALLENGE_RULES["1"].matches({ username: 42, password: "admin" }), true);
  assert.equal(CHALLENGE_RULES["1"].matches({ username: ["admin"] }), false);
});

test("cookie manipulation requires the exact lowercase role", () => {
  assert.equal(CHALLENGE_RULES["4"].matches({ cookie: "Admin" }), false);
  assert.equal(CHALLENGE_RULES["4"].matches({ cookie: "admin" }), true);
  assert.equal(CHALLENGE_RULES["4"].matches({ cookie: "user" }), false);
});

test("hidden path must match exactly", () => {
  assert.equal(CHALLENGE_RULES["5"].matches({ path: "/super/secret/flag" }), true);
  assert.equal(CHALLENGE_RULES["5"].matches({ path: "/super/secret/flag/" }), false);
  assert.equal(CHALLENGE_RULES["5"].matches({ path: "/backup-admin-panel" }), false);
});

test("sql injection detection covers union, tautologies and comment terminators", () => {
  const rule = CHALLENGE_RULES["2"];

  assert.equal(rule.matches({ input: "x' UNION SELECT username, password FROM users --" }), true);
  assert.equal(rule.matches({ input: "laptop' or 1=1" }), true);
  assert.equal(rule.matches({ input: "admin'--" }), true);
  assert.equal(rule.matches({ input: "laptop" }), false);
  assert.equal(rule.matches({ input: "or 1=2" }), false);
});

test("reflected xss detection flags script tags, javascript urls and inline handlers", () => {
  const rule = CHALLENGE_RULES["3"];

  assert.equal(rule.matches({ input: "<SCRIPT>alert(1)</SCRIPT>" }), true);
  assert.equal(rule.matches({ input: "<img src=x onerror=alert(1)>" }), true);
  assert.equal(rule.matches({ input: "<a href=\"javascript:alert(1)\">hi</a>" }), true);
  assert.equal(rule.matches({ input: "Ada Lovelace" }), false);
});

test("reflected xss ignores plain text that only looks like an attribute", () => {
  const rule = CHALLENGE_RULES["3"];

  assert.equal(rule.matches({ input: "one=1" }), false);
  assert.equal(rule.matches({ input: "Tom, only = best" }), false);
  assert.equal(rule.matches({ input: "<b>online = yes</b>" }), false);
  assert.equal(rule.matches({ input: "<div class=x onclick=go()>" }), true);
});

test("client-side validation bypass needs a negative quantity", () => {
  const rule = CHALLENGE_RULES["6"];

  assert.equal(rule.matches({ quantity: -1 }), true);
  assert.equal(rule.matches({ quantity: " -2.5 " }), true);
  assert.equal(rule.matches({ quantity: "3" }), false);
  assert.equal(rule.matches({ quantity: "" }), false);
  assert.equal(rule.matches({ quantity: "lots" }), false);
});

test("idor accepts the administrator id as a string or a number", () => {
  assert.equal(CHALLENGE_RULES["7"].matches({ profileId: 1 }), true);
  assert.equal(CHALLENGE_RULES["7"].matches({ profileId: "1" }), true);
  assert.equal(CHALLENGE_RULES["7"].matches({ profileId: "17" }), false);
});

test("open redirect only counts targets that leave the trusted host", () => {
  const rule = CHALLENGE_RULES["8"];

  assert.equal(rule.matches({ redirect: "//evil.example" }), true);
  assert.equal(rule.matches({ redirect: "https://arena.local.evil.example/" }), true);
  assert.equal(rule.matches({ redirect: "https://arena.local@evil.example/" }), true);
  assert.equal(rule.matches({ redirect: "/dashboard" }), false);
  assert.equal(rule.matches({ redirect: "https://arena.local/home" }), false);
  assert.equal(rule.matches({ redirect: "https://arena.local./home" }), false);
  assert.equal(rule.matches({ redirect: "javascript:alert(1)" }), false);
});

test("leaky header name is matched case-insensitively", () => {
  assert.equal(CHALLENGE_RULES["9"].matches({ header: " x-flag " }), true);
  assert.equal(CHALLENGE_RULES["9"].matches({ header: "X-Request-Id" }), false);
});

test("jwt rule decodes the header and looks for alg none", () => {
  const rule = CHALLENGE_RULES["10"];

  assert.equal(rule.matches({ token: token({ alg: "NONE" }) }), true);
  assert.equal(rule.matches({ token: token({ alg: "HS256" }) }), false);
  assert.equal(rule.matches({ token: token({ typ: "JWT" }) }), false);
  assert.equal(rule.matches({ token: "not-a-token" }), false);
  assert.equal(rule.matches({ token: "%%%.e30." }), false);
});

test("upload bypass requires a hidden server-side extension", () => {
  const rule = CHALLENGE_RULES["11"];

  assert.equal(rule.matches({ filename: "shell.PHP.png" }), true);
  assert.equal(rule.matches({ filename: "shell.php%00.png" }), true);
  assert.equal(rule.matches({ filename: "shell.php" }), false);
  assert.equal(rule.matches({ filename: "avatar.png" }), false);
});

test("string sinks are detected for the csp challenge", () => {
  const rule = CHALLENGE_RULES["14"];

  assert.equal(rule.matches({ input: "setTimeout('alert(1)', 0)" }), true);
  assert.equal(rule.matches({ input: "new Function('return 1')()" }), true);
  assert.equal(rule.matches({ input: "alert(1)" }), false);
});

test("exact-value challenges reject near misses", () => {
  assert.equal(CHALLENGE_RULES["12"].matches({ path: "/backup-admin-panel" }), true);
  assert.equal(CHALLENGE_RULES["13"].matches({ resetToken: "RST-1001" }), false);
  assert.equal(CHALLENGE_RULES["13"].matches({ resetToken: "RST-1002" }), true);
  assert.equal(CHALLENGE_RULES["15"].matches({ apiKey: "ARENA-HARDCODED-API-KEY" }), false);
});
