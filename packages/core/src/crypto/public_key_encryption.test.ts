import { generateKeyPairSync } from "crypto";
import { encryptWithPublicKey, loadPublicKey } from "./public_key_encryption";
import { EncryptionError } from "./errors";
import { isEndpointError } from "../endpoint/errors";

describe("public key encryption", () => {
  const { publicKey } = generateKeyPairSync("rsa", { modulusLength: 1024 });
  const spkiPem = publicKey.export({ type: "spki", format: "pem" }).toString();
  const pkcs1Pem = publicKey.export({ type: "pkcs1", format: "pem" }).toString();

  it("should load both PEM flavours of an RSA key", () => {
    expect(spkiPem).toContain("BEGIN PUBLIC KEY");
    expect(pkcs1Pem).toContain("BEGIN RSA PUBLIC KEY");
    expect(loadPublicKey(spkiPem).asymmetricKeyDetails?.modulusLength).toBe(1024);
    expect(loadPublicKey(pkcs1Pem).asymmetricKeyDetails?.modulusLength).toBe(1024);
  });

  it("should return base64 of one modulus-sized block", () => {
    const encrypted = encryptWithPublicKey(spkiPem, "API_KEY=test-secret");

    expect(encrypted).toMatch(/^[A-Za-z0-9+/]+={0,2}$/);
    expect(Buffer.from(encrypted, "base64")).toHaveLength(128);
  });

  it("should use random padding so equal inputs differ", () => {
    const first = encryptWithPublicKey(pkcs1Pem, "same");
    const second = encryptWithPublicKey(pkcs1Pem, "same");

    expect(first).not.toBe(second);
  });

  it("should reject keys that are not RSA", () => {
    const { publicKey: edKey } = generateKeyPairSync("ed25519");
    const edPem = edKey.export({ type: "spki", format: "pem" }).toString();

    expect(() => loadPublicKey(edPem)).toThrow(new EncryptionError("Expected an RSA public key, got ed25519"));
  });

  it("should raise a library error for text that is not PEM", () => {
    let caught: unknown;
    try {
      loadPublicKey("not a key");
    } catch (error: unknown) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(EncryptionError);
    expect(isEndpointError(caught)).toBe(true);
  });

  it("should reject a plaintext longer than the key allows", () => {
    expect(() => encryptWithPublicKey(spkiPem, "x".repeat(200))).toThrow(EncryptionError);
  });
});
