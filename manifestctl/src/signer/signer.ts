import fs from "node:fs";
import { sign, type KeyObject } from "node:crypto";
import { SigningFailedError, errorMessage } from "../errors.js";
import { describeKeySource, loadSigningKey, type SigningKeySource } from "./keys.js";

/** Produces a base64 signature for one artifact. */
export type ArtifactSigner = (artifactPath: string) => Promise<string>;

/** The underlying signature scheme: key + bytes → base64 signature. */
export interface SigningPrimitive {
  sign(key: KeyObject, data: Uint8Array): string;
}

/** Ed25519/Ed448 sign the raw bytes; RSA and EC keys sign a SHA-256 digest. */
export const nodeSigningPrimitive: SigningPrimitive = {
  sign(key, data) {
    const pure = key.asymmetricKeyType === "ed25519" || key.asymmetricKeyType === "ed448";
    return sign(pure ? null : "sha256", data, key).toString("base64");
  },
};

/**
 * Sign a single artifact.
 *
 * The key is loaded for this call only. Every failure, whether reading the
 * key, reading the artifact or signing, surfaces as SigningFailedError.
 */
export async function signArtifact(
  artifactPath: string,
  key: SigningKeySource,
  primitive: SigningPrimitive = nodeSigningPrimitive,
): Promise<string> {
  let keyObject: KeyObject;
  try {
    keyObject = await loadSigningKey(key);
  } catch (e) {
    throw new SigningFailedError(artifactPath, `unable to load private key (${describeKeySource(key)}): ${errorMessage(e)}`);
  }

  let data: Buffer;
  try {
    data = await fs.promises.readFile(artifactPath);
  } catch (e) {
    throw new SigningFailedError(artifactPath, `unable to read artifact: ${errorMessage(e)}`);
  }

  let signature: string;
  try {
    signature = primitive.sign(keyObject, data);
  } catch (e) {
    throw new SigningFailedError(artifactPath, `signing primitive failed: ${errorMessage(e)}`);
  }

  if (!signature) {
    throw new SigningFailedError(artifactPath, "signing primitive returned an empty signature");
  }
  return signature;
}

/** Signer bound to one key source, for the assembler. */
export function createKeySigner(key: SigningKeySource, primitive?: SigningPrimitive): ArtifactSigner {
  return (artifactPath) => signArtifact(artifactPath, key, primitive);
}
