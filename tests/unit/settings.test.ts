import assert from "node:assert/strict";
import test from "node:test";
import { loadPipelineSettings, missingClientSettings, SettingsError } from "../../lib/config/settings.ts";

test("loadPipelineSettings applies defaults to an empty environment", () => {
  const settings = loadPipelineSettings({});

  assert.deepEqual(settings, {
    instagram: { clientId: "", clientSecret: "", redirectUri: "", graphVersion: "v22.0" },
    linkedin: { clientId: "", clientSecret: "", redirectUri: "" },
    poll: { maxAttempts: 30, delayMs: 2000 },
    oauthStatePolicy: "strict",
    rendererBaseUrl: null,
    logLevel: "info"
  });
});

test("loadPipelineSettings reads overrides and trims client settings", () => {
  const settings = loadPipelineSettings({
    INSTAGRAM_APP_ID: " test-app-id ",
    INSTAGRAM_APP_SECRET: "test-secret",
    META_GRAPH_VERSION: "v21.0",
    PUBLISH_POLL_MAX_ATTEMPTS: "5",
    PUBLISH_POLL_DELAY_MS: "250",
    OAUTH_STATE_POLICY: "lenient",
    RENDERER_BASE_URL: "https://cards.example.test",
    LOG_LEVEL: "debug"
  });

  assert.equal(settings.instagram.clientId, "test-app-id");
  assert.equal(settings.instagram.graphVersion, "v21.0");
  assert.deepEqual(settings.poll, { maxAttempts: 5, delayMs: 250 });
  assert.equal(settings.oauthStatePolicy, "lenient");
  assert.equal(settings.rendererBaseUrl, "https://cards.example.test");
  assert.equal(settings.logLevel, "debug");
});

test("loadPipelineSettings rejects a malformed graph version", () => {
  assert.throws(() => loadPipelineSettings({ META_GRAPH_VERSION: "22" }), SettingsError);
});

test("loadPipelineSettings rejects a non-positive poll budget", () => {
  assert.throws(() => loadPipelineSettings({ PUBLISH_POLL_MAX_ATTEMPTS: "0" }), SettingsError);
  assert.throws(() => loadPipelineSettings({ PUBLISH_POLL_DELAY_MS: "soon" }), SettingsError);
});

test("missingClientSettings names every missing variable", () => {
  assert.deepEqual(
    missingClientSettings(
      { clientId: "test-client-id", clientSecret: "", redirectUri: "" },
      { clientId: "LINKEDIN_CLIENT_ID", clientSecret: "LINKEDIN_CLIENT_SECRET", redirectUri: "LINKEDIN_REDIRECT_URI" }
    ),
    ["LINKEDIN_CLIENT_SECRET", "LINKEDIN_REDIRECT_URI"]
  );
});
