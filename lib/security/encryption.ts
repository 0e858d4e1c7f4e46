import { createCipheriv, createDecipheriv, randomBytes } from "crypto";

const ALGORITHM = "aes-256-gcm";
const ENVELOPE_VERSION = "v1";
const KEY_BYTES = 32;
const IV_BYTES = 12;

/** Encrypts stored access and refresh tokens; envelopes read `v1.<iv>.<tag>.<ciphertext>` in base64url. */
export type TokenCipher = {
  encrypt: (plaintext: string) => string;
  decrypt: (envelope: string) => string;
};

/** Takes TOKEN_ENCRYPTION_KEY as 64 hex characters or base64 of 32 bytes. */
export function createTokenCipher(rawKey: string | undefined): TokenCipher {
  if (!rawKey) {
    throw new Error("Missing TOKEN_ENCRYPTION_KEY env var.");
  }

  const key = /^[0-9a-fA-F]{64}$/.test(rawKey) ? Buffer.from(rawKey, "hex") : Buffer.from(rawKey, "base64");
  if (key.length !== KEY_BYTES) {
    throw new Error("TOKEN_ENCRYPTION_KEY must be 32 bytes (hex-64 or base64-32-byte).");
  }

  return {
    encrypt(plaintext) {
      const iv = randomBytes(IV_BYTES);
      const cipher = createCipheriv(ALGORITHM, key, iv);
      const sealed = Buffer.concat([cipher.update(plaintext, "utf8"), cipher.final()]);

      const encoded = [iv, cipher.getAuthTag(), sealed].map((part) => part.toString("base64url"));
      return [ENVELOPE_VERSION, ...encoded].join(".");
    },

    decrypt(envelope) {
      const parts = envelope.split(".");
      const [version, iv, tag, sealed] = parts;

      if (parts.length !== 4 || version !== ENVELOPE_VERSION || !iv || !tag || !sealed) {
        throw new Error("Invalid encrypted token format.");
      }

      const decipher = createDecipheriv(ALGORITHM, key, Buffer.from(iv, "base64url"));
      decipher.setAuthTag(Buffer.from(tag, "base64url"));

      return Buffer.concat([decipher.update(Buffer.from(sealed, "base64url")), decipher.final()]).toString("utf8");
    }
  };
}
