/**
 * Encryption of secrets at rest (index credentials in the config store).
 *
 * AES-256-CTR with a random IV prepended to the ciphertext, base64
 * encoded.  A site-specific salt is appended to the plaintext before
 * encryption and checked on the way out, so a value encrypted under a
 * different key or salt decrypts to `undefined` instead of garbage.
 */
import { createCipheriv, createDecipheriv, createHash, randomBytes } from "node:crypto";

const ALGORITHM = "aes-256-ctr";
const IV_BYTES = 16;

export interface SecretBoxOptions {
  readonly key: string;
  readonly salt: string;
}

export class SecretBox {
  private readonly key: Buffer;
  private readonly salt: string;

  constructor(options: SecretBoxOptions) {
    this.key = createHash("sha256").update(options.key).digest();
    this.salt = options.salt;
  }

  encrypt(plaintext: string): string {
    const iv = randomBytes(IV_BYTES);
    const cipher = createCipheriv(ALGORITHM, this.key, iv);
    const encrypted = Buffer.concat([cipher.update(plaintext + this.salt, "utf8"), cipher.final()]);
    return Buffer.concat([iv, encrypted]).toString("base64");
  }

  decrypt(payload: string): string | undefined {
    const raw = Buffer.from(payload, "base64");
    if (raw.length <= IV_BYTES) return undefined;
    const decipher = createDecipheriv(ALGORITHM, this.key, raw.subarray(0, IV_BYTES));
    const decrypted = Buffer.concat([decipher.update(raw.subarray(IV_BYTES)), decipher.final()]).toString("utf8");
    if (!decrypted.endsWith(this.salt)) return undefined;
    return decrypted.slice(0, decrypted.length - this.salt.length);
  }
}
