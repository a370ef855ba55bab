import { createCipheriv, createDecipheriv, randomBytes, scrypt } from "node:crypto";

export const SECRET_HEADER = "caerbannog";
export const SECRET_VERSION = "1";
/** Every secret starts with this marker. */
export const SECRET_MARKER = `$${SECRET_HEADER}$`;

const SALT_SIZE = 32;
const KEY_SIZE = 32;
const NONCE_SIZE = 16;
const TAG_SIZE = 16;
const LINE_WIDTH = 80;

export interface ScryptParams {
  N: number;
  r: number;
  p: number;
}

export const DEFAULT_SCRYPT_PARAMS: ScryptParams = { N: 2 ** 20, r: 8, p: 1 };

export class SecretFormatError extends Error {
  constructor(message = "Unknown secret format") {
    super(message);
    this.name = "SecretFormatError";
  }
}

export class SecretDecryptionError extends Error {
  constructor(options?: { cause?: unknown }) {
    super("Could not decrypt secret: wrong password or corrupted data", options);
    this.name = "SecretDecryptionError";
  }
}

export interface EncryptOptions {
  /** Break the payload onto lines of 80 characters. Defaults to true. */
  pretty?: boolean;
}

export function isSecret(content: string): boolean {
  return content.startsWith(SECRET_MARKER);
}

function deriveKey(password: string, salt: string, params: ScryptParams): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(
      password,
      salt,
      KEY_SIZE,
      { ...params, maxmem: 256 * params.N * params.r },
      (error, key) => {
        if (error) {
          reject(error);
        } else {
          resolve(key);
        }
      }
    );
  });
}

function chop(text: string, width: number): string[] {
  const lines: string[] = [];
  for (let index = 0; index < text.length; index += width) {
    lines.push(text.slice(index, index + width));
  }
  return lines;
}

/**
 * Password-based secrets in the `$caerbannog$1$salt$nonce$tag$ciphertext`
 * format: scrypt key derivation over the base64 salt text, AES-256-GCM.
 *
 * Derived keys are cached per (password, salt) for the lifetime of the
 * instance.
 */
export class SecretCodec {
  private readonly keys = new Map<string, Promise<Buffer>>();

  constructor(private readonly params: ScryptParams = DEFAULT_SCRYPT_PARAMS) {}

  async encrypt(
    plaintext: string | Uint8Array,
    password: string,
    options: EncryptOptions = {}
  ): Promise<string> {
    const salt = randomBytes(SALT_SIZE).toString("base64");
    const key = await this.key(password, salt);
    const nonce = randomBytes(NONCE_SIZE);

    const cipher = createCipheriv("aes-256-gcm", key, nonce, { authTagLength: TAG_SIZE });
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    const tag = cipher.getAuthTag();

    const message = [
      salt,
      nonce.toString("base64"),
      tag.toString("base64"),
      ciphertext.toString("base64")
    ].join("$");

    if (options.pretty ?? true) {
      return `${SECRET_MARKER}${SECRET_VERSION}$\n${chop(message, LINE_WIDTH).join("\n")}`;
    }
    return `${SECRET_MARKER}${SECRET_VERSION}$${message}`;
  }

  async decrypt(secret: string, password: string): Promise<Buffer> {
    const sections = secret.replace(/\s/g, "").split("$");
    if (sections.length !== 7) {
      throw new SecretFormatError();
    }
    const [, header, version, salt = "", nonce = "", tag = "", ciphertext = ""] = sections;
    if (header !== SECRET_HEADER) {
      throw new SecretFormatError();
    }
    if (version !== SECRET_VERSION) {
      throw new SecretFormatError(`Unknown secret format version: '${version}'`);
    }

    const key = await this.key(password, salt);
    try {
      const decipher = createDecipheriv("aes-256-gcm", key, Buffer.from(nonce, "base64"), {
        authTagLength: TAG_SIZE
      });
      decipher.setAuthTag(Buffer.from(tag, "base64"));
      return Buffer.concat([
        decipher.update(Buffer.from(ciphertext, "base64")),
        decipher.final()
      ]);
    } catch (error) {
      throw new SecretDecryptionError({ cause: error });
    }
  }

  private key(password: string, salt: string): Promise<Buffer> {
    const cacheKey = JSON.stringify([password, salt]);
    let key = this.keys.get(cacheKey);
    if (!key) {
      key = deriveKey(password, salt, this.params);
      this.keys.set(cacheKey, key);
    }
    return key;
  }
}
