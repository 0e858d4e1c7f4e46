import assert from "node:assert/strict";
import test from "node:test";
import { credentialFromRow, credentialToRow, InMemoryCredentialStore } from "../../lib/credentials/store.ts";
import { createTokenCipher } from "../../lib/security/encryption.ts";
import type { Credential } from "../../lib/types.ts";

const cipher = createTokenCipher("0".repeat(64));
const now = new Date("2026-01-01T00:00:00.000Z");

const credential: Credential = {
  platform: "linkedin",
  accessToken: "test-access-token",
  refreshToken: "test-refresh-token",
  expiresAt: "2026-03-02T00:00:00.000Z",
  accountId: "member-1",
  accountName: "Test Member",
  scopes: ["openid", "profile", "w_member_social"]
};

test("credentialToRow encrypts both tokens", () => {
  const row = credentialToRow(credential, cipher, now);

  assert.match(row.access_token_enc, /^v1\./);
  assert.notEqual(row.access_token_enc, credential.accessToken);
  assert.match(row.refresh_token_enc ?? "", /^v1\./);
  assert.equal(row.updated_at, "2026-01-01T00:00:00.000Z");
  assert.equal(row.account_id, "member-1");
});

test("a stored row decodes back into the credential", () => {
  assert.deepEqual(credentialFromRow(credentialToRow(credential, cipher, now), cipher), credential);
});

test("absent optional fields are stored as null", () => {
  const row = credentialToRow({ platform: "instagram", accessToken: "test-access-token" }, cipher, now);

  assert.equal(row.refresh_token_enc, null);
  assert.equal(row.expires_at, null);
  assert.deepEqual(row.scopes, []);
  assert.deepEqual(credentialFromRow(row, cipher), {
    platform: "instagram",
    accessToken: "test-access-token",
    refreshToken: null,
    expiresAt: null,
    accountId: null,
    accountName: null,
    scopes: []
  });
});

test("credentialFromRow ignores rows with an unexpected shape", () => {
  assert.equal(credentialFromRow({ platform: "tiktok" }, cipher), null);
  assert.equal(credentialFromRow(null, cipher), null);
});

test("a token encrypted under another key does not decrypt", () => {
  const row = credentialToRow(credential, createTokenCipher("1".repeat(64)), now);
  assert.throws(() => credentialFromRow(row, cipher));
});

test("createTokenCipher requires a 32-byte key", () => {
  assert.throws(() => createTokenCipher(undefined), /Missing TOKEN_ENCRYPTION_KEY env var\./);
  assert.throws(() => createTokenCipher("dGVzdA=="), /must be 32 bytes/);

  const base64Cipher = createTokenCipher(Buffer.alloc(32, 7).toString("base64"));
  assert.equal(base64Cipher.decrypt(base64Cipher.encrypt("test-access-token")), "test-access-token");
});

test("a malformed envelope is refused", () => {
  assert.throws(() => cipher.decrypt("v2.a.b.c"), /Invalid encrypted token format\./);
  assert.throws(() => cipher.decrypt("v1.a.b"), /Invalid encrypted token format\./);
});

test("InMemoryCredentialStore keeps one credential per platform", async () => {
  const store = new InMemoryCredentialStore();

  assert.equal(await store.load("linkedin"), null);

  await store.save(credential);
  await store.save({ ...credential, accessToken: "test-access-token-2" });

  const loaded = await store.load("linkedin");
  assert.equal(loaded?.accessToken, "test-access-token-2");
  assert.equal(await store.load("instagram"), null);
});

test("InMemoryCredentialStore hands out copies", async () => {
  const store = new InMemoryCredentialStore();
  await store.save(credential);

  const loaded = await store.load("linkedin");
  if (loaded) {
    loaded.accessToken = "changed";
  }

  assert.equal((await store.load("linkedin"))?.accessToken, "test-access-token");
});
