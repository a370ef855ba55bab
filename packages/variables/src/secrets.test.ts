import { describe, it, expect } from "vitest";
import {
  SecretCodec,
  SecretDecryptionError,
  SecretFormatError,
  SECRET_MARKER,
  isSecret
} from "./secrets.js";

const PASSWORD = "test-secret";

function createCodec(): SecretCodec {
  return new SecretCodec({ N: 2 ** 10, r: 8, p: 1 });
}

describe("SecretCodec", () => {
  it("decrypts what it encrypts", async () => {
    const codec = createCodec();

    const secret = await codec.encrypt("token: abc\n", PASSWORD);

    expect((await codec.decrypt(secret, PASSWORD)).toString("utf8")).toBe("token: abc\n");
  });

  it("wraps the payload at 80 columns in pretty mode", async () => {
    const secret = await createCodec().encrypt("x".repeat(200), PASSWORD);
    const [first, ...rest] = secret.split("\n");

    expect(first).toBe("$caerbannog$1$");
    expect(rest.length).toBeGreaterThan(1);
    expect(rest.every((line) => line.length <= 80)).toBe(true);
  });

  it("writes a single line in plain mode", async () => {
    const secret = await createCodec().encrypt("value", PASSWORD, { pretty: false });

    expect(secret).not.toContain("\n");
    expect(secret.startsWith("$caerbannog$1$")).toBe(true);
    expect(secret.split("$")).toHaveLength(7);
  });

  it("uses a fresh salt and nonce for every secret", async () => {
    const codec = createCodec();

    const first = await codec.encrypt("same", PASSWORD, { pretty: false });
    const second = await codec.encrypt("same", PASSWORD, { pretty: false });

    expect(first).not.toBe(second);
  });

  it("rejects a wrong password", async () => {
    const codec = createCodec();
    const secret = await codec.encrypt("value", PASSWORD);

    await expect(codec.decrypt(secret, "other-secret")).rejects.toBeInstanceOf(
      SecretDecryptionError
    );
  });

  it("rejects a tampered ciphertext", async () => {
    const codec = createCodec();
    const secret = await codec.encrypt("value", PASSWORD, { pretty: false });
    const fields = secret.split("$");
    fields[6] = Buffer.from("tampered").toString("base64");

    await expect(codec.decrypt(fields.join("$"), PASSWORD)).rejects.toBeInstanceOf(
      SecretDecryptionError
    );
  });

  it("rejects unknown formats", async () => {
    const codec = createCodec();

    await expect(codec.decrypt("$caerbannog$1$a$b$c", PASSWORD)).rejects.toBeInstanceOf(
      SecretFormatError
    );
    await expect(codec.decrypt("$rabbit$1$a$b$c$d", PASSWORD)).rejects.toBeInstanceOf(
      SecretFormatError
    );
    await expect(codec.decrypt("$caerbannog$2$a$b$c$d", PASSWORD)).rejects.toThrow(
      "Unknown secret format version: '2'"
    );
  });
});

describe("isSecret", () => {
  it("recognizes the marker", () => {
    expect(isSecret(`${SECRET_MARKER}1$\nabc`)).toBe(true);
    expect(isSecret("key: value")).toBe(false);
  });
});
