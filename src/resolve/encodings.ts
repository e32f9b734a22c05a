import type { BenchmarkInstance, Encoding, Setting } from "../runscript/model.js";
import { matches } from "./tagExpression.js";

export interface EncodingResolution {
  files: string[];
  /** Paths reached more than once; each is kept at its first position. */
  duplicates: string[];
}

/**
 * Encodings for one (instance, setting) pair, in this order:
 * container untagged, container tagged (matched against the setting's tags),
 * setting untagged, setting tagged (matched against the instance's encoding tags).
 */
export function resolveEncodingsDetailed(
  instance: Pick<BenchmarkInstance, "encodings" | "encodingTags">,
  setting: Pick<Setting, "encodings" | "tags">
): EncodingResolution {
  const untagged = (list: readonly Encoding[]) => list.filter((e) => e.tag === null);
  const tagged = (list: readonly Encoding[], against: ReadonlySet<string>) =>
    list.filter((e) => e.tag !== null && matches(e.tag, against));

  const ordered = [
    ...untagged(instance.encodings),
    ...tagged(instance.encodings, setting.tags),
    ...untagged(setting.encodings),
    ...tagged(setting.encodings, instance.encodingTags)
  ];

  const seen = new Set<string>();
  const files: string[] = [];
  const duplicates: string[] = [];
  for (const e of ordered) {
    if (seen.has(e.file)) {
      if (!duplicates.includes(e.file)) duplicates.push(e.file);
      continue;
    }
    seen.add(e.file);
    files.push(e.file);
  }
  return { files, duplicates };
}

export function resolveEncodings(
  instance: Pick<BenchmarkInstance, "encodings" | "encodingTags">,
  setting: Pick<Setting, "encodings" | "tags">
): string[] {
  return resolveEncodingsDetailed(instance, setting).files;
}
