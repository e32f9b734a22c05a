import { createHash } from "crypto";
import { encodeCrockfordBase32_128bits, stableJsonStringify } from "./canonicalJson.js";

export type RunDescriptorId = `run_${string}`;
export type BatchId = `batch_${string}`;

/** Parts are hashed as a JSON array so that no separator inside a part can shift the boundaries. */
function digestParts(parts: string[]): string {
  const digest = createHash("sha256").update(stableJsonStringify(parts)).digest();
  return encodeCrockfordBase32_128bits(digest.subarray(0, 16));
}

export function deriveRunDescriptorId(parts: string[]): RunDescriptorId {
  return `run_${digestParts(parts)}`;
}

export function deriveBatchId(parts: string[]): BatchId {
  return `batch_${digestParts(parts)}`;
}
