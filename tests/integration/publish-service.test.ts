import assert from "node:assert/strict";
import test from "node:test";
import { InstagramAdapter } from "../../lib/adapters/instagram.ts";
import { LinkedInAdapter } from "../../lib/adapters/linkedin.ts";
import type { PipelineError } from "../../lib/errors.ts";
import { createSilentLogger } from "../../lib/logging/logger.ts";
import { UrlTemplateRenderer } from "../../lib/media/content.ts";
import { categorizePublishFailure, failureHttpStatus, publishJob } from "../../lib/publish/service.ts";
import type { Credential, PublishJob } from "../../lib/types.ts";
import { createFetchStub, createSleepRecorder, FIXED_NOW, formOf, jsonOf, type ScriptedResponse } from "../helpers/fetch-stub.ts";
import { instagramSettings, linkedinSettings } from "../helpers/settings.ts";

const logger = createSilentLogger();

const instagramCredential: Credential = {
  platform: "instagram",
  accessToken: "test-long-token",
  expiresAt: "2026-03-01T00:00:00.000Z",
  accountId: "17841400000000001"
};

const linkedinCredential: Credential = {
  platform: "linkedin",
  accessToken: "test-li-token",
  expiresAt: "2026-03-01T00:00:00.000Z",
  accountId: "member-1"
};

function createInstagram(responses: ScriptedResponse[]) {
  const stub = createFetchStub(responses);
  const adapter = new InstagramAdapter({
    settings: instagramSettings,
    poll: { maxAttempts: 3, delayMs: 10 },
    logger,
    fetchImpl: stub.fetchImpl,
    sleep: createSleepRecorder().sleep,
    now: () => FIXED_NOW
  });
  return { adapter, stub };
}

function createLinkedIn(responses: ScriptedResponse[]) {
  const stub = createFetchStub(responses);
  const adapter = new LinkedInAdapter({
    settings: linkedinSettings,
    logger,
    fetchImpl: stub.fetchImpl,
    now: () => FIXED_NOW
  });
  return { adapter, stub };
}

function urls(count: number): PublishJob["content"] {
  return Array.from({ length: count }, (_, index) => ({ kind: "url" as const, url: `https://cdn.example.test/${index + 1}.jpg` }));
}

test("a one-slide carousel is rejected before any request", async () => {
  const { adapter, stub } = createInstagram([]);

  const result = await publishJob({
    adapter,
    credential: instagramCredential,
    job: { caption: "Slides", mode: "carousel", content: urls(1) },
    renderer: null,
    logger
  });

  assert.equal(result.success, false);
  if (!result.success && result.error.code === "VALIDATION_ERROR") {
    assert.deepEqual(result.error.issues, ["content: Carousel requires 2-10 items."]);
    assert.equal(result.state, "FAILED");
  } else {
    assert.fail("expected a validation error");
  }
  assert.equal(stub.requests.length, 0);
});

test("an eleven-slide carousel is rejected before any request", async () => {
  const { adapter, stub } = createInstagram([]);

  const result = await publishJob({
    adapter,
    credential: instagramCredential,
    job: { caption: "Slides", mode: "carousel", content: urls(11) },
    renderer: null,
    logger
  });

  assert.equal(result.success, false);
  if (!result.success) {
    assert.equal(result.error.code, "VALIDATION_ERROR");
  }
  assert.equal(stub.requests.length, 0);
});

test("platform rules are checked after the structural schema", async () => {
  const { adapter, stub } = createInstagram([]);

  const result = await publishJob({
    adapter,
    credential: instagramCredential,
    job: { caption: "Nothing attached", mode: "single", content: [] },
    renderer: null,
    logger
  });

  assert.equal(result.success, false);
  if (!result.success && result.error.code === "VALIDATION_ERROR") {
    assert.deepEqual(result.error.issues, ["Instagram single posts require exactly one image."]);
  } else {
    assert.fail("expected a validation error");
  }
  assert.equal(stub.requests.length, 0);
});

test("a missing credential is reported as not connected", async () => {
  const { adapter, stub } = createInstagram([]);

  const result = await publishJob({
    adapter,
    credential: null,
    job: { caption: "Hello", mode: "single", content: urls(1) },
    renderer: null,
    logger
  });

  assert.equal(result.success, false);
  if (!result.success) {
    assert.equal(result.error.code, "NOT_CONNECTED");
  }
  assert.equal(stub.requests.length, 0);
});

test("a card requested without a renderer fails before the platform is called", async () => {
  const { adapter, stub } = createLinkedIn([]);

  const result = await publishJob({
    adapter,
    credential: linkedinCredential,
    job: { caption: "Quote", mode: "single", content: [{ kind: "render", request: { template: "quote", text: "Ship it" } }] },
    renderer: null,
    logger
  });

  assert.equal(result.success, false);
  if (!result.success) {
    assert.equal(result.error.code, "RENDER_ERROR");
  }
  assert.equal(stub.requests.length, 0);
});

test("rendered cards are published by URL", async () => {
  const { adapter, stub } = createLinkedIn([{ status: 201, body: { id: "urn:li:share:7002" } }]);

  const result = await publishJob({
    adapter,
    credential: linkedinCredential,
    job: {
      caption: "Quote",
      hashtags: ["shipping"],
      mode: "single",
      content: [{ kind: "render", request: { template: "quote", text: "Ship it" } }]
    },
    renderer: new UrlTemplateRenderer("https://cards.example.test"),
    logger
  });

  assert.equal(result.success, true);
  if (result.success) {
    assert.equal(result.postId, "urn:li:share:7002");
  }
  assert.deepEqual(jsonOf(stub.requests[0]), {
    author: "urn:li:person:member-1",
    lifecycleState: "PUBLISHED",
    specificContent: {
      "com.linkedin.ugc.ShareContent": {
        shareCommentary: { text: "Quote\n\n#shipping" },
        shareMediaCategory: "ARTICLE",
        media: [{ status: "READY", originalUrl: "https://cards.example.test/quote.png?text=Ship+it" }]
      }
    },
    visibility: { "com.linkedin.ugc.MemberNetworkVisibility": "PUBLIC" }
  });
});

test("an Instagram job with a link still publishes", async () => {
  const { adapter, stub } = createInstagram([
    { body: { id: "123" } },
    { body: { status_code: "FINISHED" } },
    { body: { id: "post-1" } }
  ]);

  const result = await publishJob({
    adapter,
    credential: instagramCredential,
    job: { caption: "Hello", linkUrl: "https://example.test/post", mode: "single", content: urls(1) },
    renderer: null,
    logger,
    options: { deadline: new Date("2026-01-01T00:10:00.000Z") }
  });

  assert.equal(result.success, true);
  assert.equal(formOf(stub.requests[0]).get("caption"), "Hello");
});

test("categorizePublishFailure treats timeouts and upstream outages as retryable", () => {
  const timeout: PipelineError = {
    code: "TIMEOUT_ERROR",
    message: "Media container failed to process in time. Please try again.",
    containerId: "123",
    attempts: 30
  };

  assert.deepEqual(categorizePublishFailure(timeout), {
    code: "TIMEOUT_ERROR",
    message: "Media container failed to process in time. Please try again.",
    userMessage: "The platform is still processing the media. Try the whole post again later.",
    retryable: true,
    category: "timeout"
  });

  const outage: PipelineError = {
    code: "CONTAINER_ERROR",
    message: "Failed to create media container: Service unavailable",
    stage: "create",
    status: 503,
    rawBody: "Service unavailable"
  };
  assert.equal(categorizePublishFailure(outage).retryable, true);
  assert.equal(categorizePublishFailure({ ...outage, status: null }).retryable, true);
  assert.equal(categorizePublishFailure({ ...outage, status: 400 }).retryable, false);
  assert.equal(categorizePublishFailure(outage).category, "provider");
});

test("categorizePublishFailure separates configuration from authorization problems", () => {
  const notConnected: PipelineError = { code: "NOT_CONNECTED", platform: "instagram", message: "Instagram is not connected." };
  const unconfigured: PipelineError = {
    code: "CONFIGURATION_ERROR",
    platform: "linkedin",
    missing: ["LINKEDIN_CLIENT_ID"],
    message: "Missing LinkedIn config."
  };

  assert.equal(categorizePublishFailure(notConnected).category, "authorization");
  assert.equal(categorizePublishFailure(notConnected).retryable, false);
  assert.equal(categorizePublishFailure(unconfigured).category, "configuration");
});

test("failureHttpStatus maps categories onto response codes", () => {
  assert.equal(failureHttpStatus({ code: "VALIDATION_ERROR", message: "bad", issues: ["bad"] }), 422);
  assert.equal(failureHttpStatus({ code: "TIMEOUT_ERROR", message: "slow", containerId: "123", attempts: 3 }), 504);
  assert.equal(failureHttpStatus({ code: "PUBLISH_ERROR", message: "no", status: 403, rawBody: "" }), 502);
  assert.equal(failureHttpStatus({ code: "NOT_CONNECTED", platform: "linkedin", message: "no" }), 409);
});
