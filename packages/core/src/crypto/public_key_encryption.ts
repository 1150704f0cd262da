import { constants, createPublicKey, publicEncrypt } from "crypto";
import type { KeyObject } from "crypto";
import { EncryptionError } from "./errors";

function reason(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Loads an RSA public key from PEM.
 *
 * Accepts both the SubjectPublicKeyInfo form (`BEGIN PUBLIC KEY`) and the
 * PKCS#1 form (`BEGIN RSA PUBLIC KEY`) that CI services hand out.
 *
 * @throws EncryptionError for unreadable PEM or a key that is not RSA
 */
export function loadPublicKey(pem: string): KeyObject {
  let key: KeyObject;
  try {
    key = createPublicKey({ key: pem.trim(), format: "pem" });
  } catch (error: unknown) {
    throw new EncryptionError(`Unreadable public key (${reason(error)})`, error);
  }
  if (key.asymmetricKeyType !== "rsa") {
    throw new EncryptionError(`Expected an RSA public key, got ${key.asymmetricKeyType ?? "unknown"}`);
  }
  return key;
}

/**
 * Encrypts a string with a repository public key.
 * @returns base64 ciphertext, usable as a `secure:` value in CI configuration
 */
export function encryptWithPublicKey(pem: string, plaintext: string): string {
  const key = loadPublicKey(pem);
  let ciphertext: Buffer;
  try {
    ciphertext = publicEncrypt(
      { key, padding: constants.RSA_PKCS1_PADDING },
      Buffer.from(plaintext, "utf8"),
    );
  } catch (error: unknown) {
    throw new EncryptionError(`Cannot encrypt ${Buffer.byteLength(plaintext, "utf8")} bytes (${reason(error)})`, error);
  }
  return ciphertext.toString("base64");
}
