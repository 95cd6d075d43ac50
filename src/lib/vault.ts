import { createCipheriv, createDecipheriv, randomBytes } from "node:crypto";
import { sha256Bytes } from "./hash";

const VERSION = "v1";
const IV_BYTES = 12;

/**
 * Symmetric encryption for stored API keys, keyed by the process-wide secret.
 * Ciphertext layout: `v1.<iv>.<auth tag>.<data>`, each part base64url.
 */
export class CredentialVault {
  private readonly key: Buffer;

  constructor(secret: string) {
    if (!secret) throw new Error("Credential vault requires a non-empty secret.");
    this.key = sha256Bytes(secret);
  }

  encrypt(plaintext: string): string {
    const iv = randomBytes(IV_BYTES);
    const cipher = createCipheriv("aes-256-gcm", this.key, iv);
    const data = Buffer.concat([cipher.update(plaintext, "utf-8"), cipher.final()]);
    const tag = cipher.getAuthTag();
    return [VERSION, iv, tag, data].map((part) => (typeof part === "string" ? part : part.toString("base64url"))).join(".");
  }

  decrypt(ciphertext: string): string {
    const parts = ciphertext.split(".");
    if (parts.length !== 4 || parts[0] !== VERSION) {
      throw new Error("Unrecognized credential ciphertext format.");
    }
    const [, iv, tag, data] = parts.map((part) => Buffer.from(part, "base64url"));
    const decipher = createDecipheriv("aes-256-gcm", this.key, iv);
    decipher.setAuthTag(tag);
    return Buffer.concat([decipher.update(data), decipher.final()]).toString("utf-8");
  }
}
