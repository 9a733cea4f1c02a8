import crypto from "crypto";
import { DecryptionError, ValidationError } from "./errors";

const ALGORITHM = "aes-256-gcm";
const KEY_LENGTH = 32;
const IV_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;

/**
 * Reversible encryption of a single string field.
 */
export interface FieldCodec {
  encrypt(plaintext: string): string;
  decrypt(blob: string): string;
}

interface CodecKey {
  id: string;
  material: Buffer;
}

interface Envelope {
  kid: string;
  iv: string;
  tag: string;
  ct: string;
}

/**
 * AES-256-GCM codec for the street address.
 *
 * The blob is a small JSON envelope naming the key id, so a rotation window
 * can keep prior keys around for reads while all writes use the current
 * one. A fresh IV per call makes equal addresses encrypt differently.
 */
export class AesGcmCodec implements FieldCodec {
  private current: CodecKey;
  private keys: CodecKey[];

  constructor(currentKey: Buffer, priorKeys: Buffer[] = []) {
    this.current = toCodecKey(currentKey);
    this.keys = [this.current, ...priorKeys.map(toCodecKey)];
  }

  /**
   * Build from base64 key material as found in the environment
   */
  static fromBase64(currentKey: string, priorKeys: string[] = []): AesGcmCodec {
    return new AesGcmCodec(
      Buffer.from(currentKey, "base64"),
      priorKeys.map((key) => Buffer.from(key, "base64"))
    );
  }

  static generateKey(): string {
    return crypto.randomBytes(KEY_LENGTH).toString("base64");
  }

  get currentKeyId(): string {
    return this.current.id;
  }

  encrypt(plaintext: string): string {
    const iv = crypto.randomBytes(IV_LENGTH);
    const cipher = crypto.createCipheriv(ALGORITHM, this.current.material, iv, {
      authTagLength: AUTH_TAG_LENGTH,
    });

    const ciphertext = Buffer.concat([
      cipher.update(plaintext, "utf8"),
      cipher.final(),
    ]);

    const envelope: Envelope = {
      kid: this.current.id,
      iv: iv.toString("base64"),
      tag: cipher.getAuthTag().toString("base64"),
      ct: ciphertext.toString("base64"),
    };
    return JSON.stringify(envelope);
  }

  decrypt(blob: string): string {
    const envelope = parseEnvelope(blob);
    const iv = Buffer.from(envelope.iv, "base64");
    const tag = Buffer.from(envelope.tag, "base64");
    const ciphertext = Buffer.from(envelope.ct, "base64");

    if (iv.length !== IV_LENGTH || tag.length !== AUTH_TAG_LENGTH) {
      throw new DecryptionError("malformed envelope");
    }

    // the named key first, then the rest in rotation order
    const candidates = [
      ...this.keys.filter((key) => key.id === envelope.kid),
      ...this.keys.filter((key) => key.id !== envelope.kid),
    ];

    for (const key of candidates) {
      const plaintext = tryDecrypt(key, iv, tag, ciphertext);
      if (plaintext !== null) {
        return plaintext;
      }
    }

    throw new DecryptionError("no configured key authenticates the ciphertext");
  }
}

function toCodecKey(material: Buffer): CodecKey {
  if (material.length !== KEY_LENGTH) {
    throw new ValidationError(
      `Encryption key must be ${KEY_LENGTH} bytes, got ${material.length}`
    );
  }
  const digest = crypto.createHash("sha256").update(material).digest();
  return { id: digest.subarray(0, 8).toString("base64"), material };
}

function tryDecrypt(
  key: CodecKey,
  iv: Buffer,
  tag: Buffer,
  ciphertext: Buffer
): string | null {
  const decipher = crypto.createDecipheriv(ALGORITHM, key.material, iv, {
    authTagLength: AUTH_TAG_LENGTH,
  });
  decipher.setAuthTag(tag);

  try {
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString(
      "utf8"
    );
  } catch {
    // authentication failed with this key
    return null;
  }
}

function parseEnvelope(blob: string): Envelope {
  let parsed: unknown;
  try {
    parsed = JSON.parse(blob);
  } catch {
    throw new DecryptionError("malformed envelope");
  }

  if (
    typeof parsed !== "object" ||
    parsed === null ||
    !("kid" in parsed) ||
    !("iv" in parsed) ||
    !("tag" in parsed) ||
    !("ct" in parsed)
  ) {
    throw new DecryptionError("malformed envelope");
  }

  const { kid, iv, tag, ct } = parsed;
  if (
    typeof kid !== "string" ||
    typeof iv !== "string" ||
    typeof tag !== "string" ||
    typeof ct !== "string"
  ) {
    throw new DecryptionError("malformed envelope");
  }

  return { kid, iv, tag, ct };
}
