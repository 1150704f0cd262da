export { encryptWithPublicKey, loadPublicKey } from "./public_key_encryption";
export { EncryptionError } from "./errors";
