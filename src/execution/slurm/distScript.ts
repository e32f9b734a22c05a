import { formatSlurmTimeLimit } from "../../core/time.js";
import type { DispatchBatch } from "../../resolve/dispatchBatches.js";
import { renderTemplate } from "../templates.js";

export function bashSingleQuote(value: string): string {
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

/** `--exclusive --qos=long` becomes one `#SBATCH` line per option. */
export function sbatchDirectives(distOptions: string | null): string {
  if (distOptions === null) return "";
  const options = distOptions.split(/\s+/).filter((o) => o.length > 0);
  return options.map((o) => `#SBATCH ${o}\n`).join("");
}

export function distScriptName(sequence: number): string {
  return `start${String(sequence).padStart(4, "0")}.dist`;
}

/**
 * Fills a dist template for one batch. `jobs` lists the start scripts of the
 * batch, one per line, relative to the machine directory.
 */
export function renderDistScript(input: {
  template: string;
  templatePath: string;
  batch: Pick<DispatchBatch, "walltime" | "cpt" | "partition" | "distOptions">;
  jobs: readonly string[];
}): string {
  const { batch } = input;
  return renderTemplate(
    input.template,
    {
      walltime: formatSlurmTimeLimit(batch.walltime),
      jobs: input.jobs.map((j) => `${j}\n`).join(""),
      cpt: String(batch.cpt),
      partition: batch.partition,
      dist_options: sbatchDirectives(batch.distOptions)
    },
    input.templatePath
  );
}

/** Submits every dist script of a machine directory in sequence order. */
export function renderSbatchLauncher(scriptNames: readonly string[]): string {
  const lines: string[] = [];
  lines.push("#!/usr/bin/env bash");
  lines.push("");
  lines.push("set -euo pipefail");
  lines.push('cd "$(dirname "$0")"');
  lines.push("");
  for (const name of scriptNames) lines.push(`sbatch ${bashSingleQuote(name)}`);
  lines.push("");
  return lines.join("\n");
}

/**
 * Runs the listed start scripts with at most `parallel` of them at a time.
 * Scripts are relative to the machine directory the launcher sits in.
 */
export function renderSeqLauncher(input: { parallel: number; scripts: readonly string[] }): string {
  if (!Number.isInteger(input.parallel) || input.parallel < 1) throw new Error(`invalid parallel: ${input.parallel}`);

  const lines: string[] = [];
  lines.push("#!/usr/bin/env bash");
  lines.push("");
  lines.push("set -euo pipefail");
  lines.push('cd "$(dirname "$0")"');
  lines.push("");
  if (input.scripts.length === 0) {
    lines.push("# nothing left to run");
    lines.push("");
    return lines.join("\n");
  }
  lines.push("QUEUE=(");
  for (const s of input.scripts) lines.push(`  ${bashSingleQuote(s)}`);
  lines.push(")");
  lines.push("");
  lines.push(`printf '%s\\0' "\${QUEUE[@]}" | xargs -0 -r -n 1 -P ${input.parallel} bash`);
  lines.push("");
  return lines.join("\n");
}
