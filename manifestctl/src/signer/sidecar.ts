import fs from "node:fs";
import { SigningFailedError, errorMessage } from "../errors.js";
import type { ArtifactSigner } from "./signer.js";

export const SIDECAR_EXTENSION = ".sig";

/**
 * Signer that reuses `<artifact>.sig` files written by the bundler.
 * The sidecar content is already base64; surrounding whitespace is dropped.
 */
export function createSidecarSigner(): ArtifactSigner {
  return async (artifactPath) => {
    const sigPath = artifactPath + SIDECAR_EXTENSION;

    let raw: string;
    try {
      raw = await fs.promises.readFile(sigPath, "utf8");
    } catch (e) {
      throw new SigningFailedError(artifactPath, `unable to read signature file ${sigPath}: ${errorMessage(e)}`);
    }

    const signature = raw.trim();
    if (!signature) {
      throw new SigningFailedError(artifactPath, `signature file is empty: ${sigPath}`);
    }
    return signature;
  };
}
