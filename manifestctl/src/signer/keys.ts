import fs from "node:fs";
import { createPrivateKey, type KeyObject } from "node:crypto";

/** A private key given either as a file path or inline PEM text. */
export type SigningKeySource =
  | { path: string; password?: string }
  | { pem: string; password?: string };

/**
 * Read and parse a private signing key.
 * Encrypted PKCS#8 keys need the matching password.
 */
export async function loadSigningKey(source: SigningKeySource): Promise<KeyObject> {
  const pem = "pem" in source ? source.pem : await fs.promises.readFile(source.path, "utf8");
  return createPrivateKey({
    key: pem,
    format: "pem",
    passphrase: source.password,
  });
}

/** Human-readable label for a key source; never includes key material. */
export function describeKeySource(source: SigningKeySource): string {
  return "path" in source ? source.path : "inline key";
}
