import assert from "node:assert/strict";
import test from "node:test";
import {
  createAuthorizationRequest,
  parseAuthorizationRequest,
  serializeAuthorizationRequest,
  validateOAuthCallback
} from "../../lib/connections/oauth-state.ts";
import { createSilentLogger } from "../../lib/logging/logger.ts";
import type { AuthorizationRequest } from "../../lib/types.ts";

const now = new Date("2026-01-01T00:00:00.000Z");
const logger = createSilentLogger();

const pending: AuthorizationRequest = {
  platform: "instagram",
  state: "0123456789abcdef0123456789abcdef",
  createdAt: "2026-01-01T00:00:00.000Z",
  expiresAt: "2026-01-01T00:15:00.000Z"
};

const callback = { code: "test-code", state: pending.state, error: null };

test("createAuthorizationRequest issues a random state valid for fifteen minutes", () => {
  const request = createAuthorizationRequest("linkedin", now);

  assert.equal(request.platform, "linkedin");
  assert.match(request.state, /^[0-9a-f]{48}$/);
  assert.equal(request.createdAt, "2026-01-01T00:00:00.000Z");
  assert.equal(request.expiresAt, "2026-01-01T00:15:00.000Z");
  assert.notEqual(createAuthorizationRequest("linkedin", now).state, request.state);
});

test("a serialized authorization request parses back to the same value", () => {
  assert.deepEqual(parseAuthorizationRequest(serializeAuthorizationRequest(pending)), pending);
});

test("parseAuthorizationRequest returns null for tampered or missing cookies", () => {
  assert.equal(parseAuthorizationRequest(undefined), null);
  assert.equal(parseAuthorizationRequest("not-base64-json"), null);
  assert.equal(
    parseAuthorizationRequest(Buffer.from(JSON.stringify({ platform: "tiktok" }), "utf8").toString("base64url")),
    null
  );
});

test("a matching, unexpired state is verified", () => {
  const result = validateOAuthCallback({ pending, callback, expectedPlatform: "instagram", policy: "strict", logger, now });

  assert.deepEqual(result, { ok: true, code: "test-code", stateVerified: true, warnings: [] });
});

test("a provider denial is rejected under either policy", () => {
  for (const policy of ["strict", "lenient"] as const) {
    const result = validateOAuthCallback({
      pending,
      callback: { code: null, state: pending.state, error: "access_denied", errorDescription: "The user denied access." },
      expectedPlatform: "instagram",
      policy,
      logger,
      now
    });

    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.error.reason, "denied");
      assert.equal(result.error.message, "Authorization failed: The user denied access.");
    }
  }
});

test("a callback without a code is rejected under the lenient policy", () => {
  const result = validateOAuthCallback({
    pending,
    callback: { code: null, state: pending.state, error: null },
    expectedPlatform: "instagram",
    policy: "lenient",
    logger,
    now
  });

  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.equal(result.error.reason, "missing_code");
  }
});

test("strict policy rejects a state mismatch", () => {
  const result = validateOAuthCallback({
    pending,
    callback: { ...callback, state: "ffffffffffffffffffffffffffffffff" },
    expectedPlatform: "instagram",
    policy: "strict",
    logger,
    now
  });

  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.equal(result.error.code, "AUTHORIZATION_ERROR");
    assert.equal(result.error.reason, "state_mismatch");
  }
});

test("strict policy rejects a missing pending request", () => {
  const result = validateOAuthCallback({ pending: null, callback, expectedPlatform: "instagram", policy: "strict", logger, now });

  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.equal(result.error.reason, "state_missing");
  }
});

test("strict policy rejects an expired pending request", () => {
  const result = validateOAuthCallback({
    pending,
    callback,
    expectedPlatform: "instagram",
    policy: "strict",
    logger,
    now: new Date("2026-01-01T00:15:00.001Z")
  });

  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.equal(result.error.reason, "state_expired");
  }
});

test("lenient policy continues past a state mismatch with a warning", () => {
  const result = validateOAuthCallback({
    pending,
    callback: { ...callback, state: "ffffffffffffffffffffffffffffffff" },
    expectedPlatform: "instagram",
    policy: "lenient",
    logger,
    now
  });

  assert.deepEqual(result, {
    ok: true,
    code: "test-code",
    stateVerified: false,
    warnings: ["State check skipped (state_mismatch)."]
  });
});

test("lenient policy still rejects a pending request for another platform", () => {
  const result = validateOAuthCallback({
    pending,
    callback,
    expectedPlatform: "linkedin",
    policy: "lenient",
    logger,
    now
  });

  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.equal(result.error.reason, "platform_mismatch");
  }
});
