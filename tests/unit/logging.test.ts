import assert from "node:assert/strict";
import test from "node:test";
import { parseLogLevel } from "../../lib/logging/logger.ts";
import { redactBody, redactToken, redactUrl } from "../../lib/logging/redaction.ts";
import { createRecordingLogger } from "../helpers/fetch-stub.ts";

test("redactToken keeps only a short prefix of long tokens", () => {
  assert.equal(redactToken("EAAGtest-long-lived-token"), "EAAG...[redacted]");
  assert.equal(redactToken("short"), "[redacted]");
  assert.equal(redactToken(null), "[redacted]");
});

test("redactUrl masks secret query parameters and keeps the rest", () => {
  assert.equal(
    redactUrl("https://graph.facebook.com/v22.0/oauth/access_token?client_id=1234&client_secret=test-secret&code=test-code"),
    "https://graph.facebook.com/v22.0/oauth/access_token?client_id=1234&client_secret=[redacted]&code=[redacted]"
  );
  assert.equal(
    redactUrl("https://graph.facebook.com/v22.0/me/accounts?fields=id&access_token=test-token"),
    "https://graph.facebook.com/v22.0/me/accounts?fields=id&access_token=[redacted]"
  );
});

test("redactUrl does not echo input it cannot parse", () => {
  assert.equal(redactUrl("access_token=test-token"), "[redacted-url]");
});

test("redactBody masks token fields in JSON bodies", () => {
  assert.equal(
    redactBody('{"access_token":"test-token","token_type":"bearer","expires_in":3600}'),
    '{"access_token":"[redacted]","token_type":"bearer","expires_in":3600}'
  );
});

test("redactBody truncates long bodies", () => {
  assert.equal(redactBody("x".repeat(350)), `${"x".repeat(300)}...[truncated:50 chars]`);
  assert.equal(redactBody(undefined), "");
});

test("child loggers join contexts and respect the level", () => {
  const { logger, lines } = createRecordingLogger("pipeline");
  const child = logger.child("instagram");

  child.info("Created media container", { containerId: "123" });

  assert.equal(lines.length, 1);
  const [message, fields] = lines[0] ?? [];
  assert.match(String(message), /^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[info\] \[pipeline:instagram\] Created media container$/);
  assert.deepEqual(fields, { containerId: "123" });
});

test("parseLogLevel falls back to info for unknown values", () => {
  assert.equal(parseLogLevel("warn"), "warn");
  assert.equal(parseLogLevel("verbose"), "info");
  assert.equal(parseLogLevel(undefined), "info");
});
