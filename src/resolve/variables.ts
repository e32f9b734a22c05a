import { ResolutionError } from "../core/diagnostics.js";
import type { Setting, VariableDef } from "../runscript/model.js";

export const VALUE_PLACEHOLDER = "{}";

/** Upper bound on the values of one range and on the settings one setting expands to. */
export const MAX_SETTING_EXPANSION = 100_000;

function decimals(text: string): number {
  const dot = text.indexOf(".");
  return dot < 0 ? 0 : text.length - dot - 1;
}

/**
 * `"start,end[,step]"` is an inclusive range, `"a;b;c"` a pool. A list is a pool
 * as written; a lone scalar is a pool of one.
 */
export function parseValueSpec(raw: string | number | ReadonlyArray<string | number>, scope: string): string[] {
  if (Array.isArray(raw)) {
    const pool = raw.map((v) => String(v).trim());
    if (pool.length === 0 || pool.some((v) => v.length === 0)) {
      throw new ResolutionError("structural", scope, `variable value pool is empty`);
    }
    return pool;
  }

  const text = String(raw).trim();
  if (text.includes(";")) {
    const pool = text.split(";").map((v) => v.trim());
    if (pool.some((v) => v.length === 0)) {
      throw new ResolutionError("structural", scope, `variable value pool has an empty element: "${text}"`);
    }
    return pool;
  }

  if (text.includes(",")) return expandRange(text, scope);

  if (text.length === 0) throw new ResolutionError("structural", scope, `variable value pool is empty`);
  return [text];
}

function expandRange(text: string, scope: string): string[] {
  const parts = text.split(",").map((p) => p.trim());
  if (parts.length < 2 || parts.length > 3) {
    throw new ResolutionError("structural", scope, `variable range must be "start,end[,step]": "${text}"`);
  }
  const [startText = "", endText = "", stepText = "1"] = parts;
  const numeric = /^-?[0-9]+(\.[0-9]+)?$/;
  if (!numeric.test(startText) || !numeric.test(endText) || !numeric.test(stepText)) {
    throw new ResolutionError("structural", scope, `variable range bounds must be numbers: "${text}"`);
  }

  const start = Number(startText);
  const end = Number(endText);
  const step = Number(stepText);
  if (step <= 0) throw new ResolutionError("structural", scope, `variable range step must be > 0: "${text}"`);
  if (start > end) throw new ResolutionError("structural", scope, `variable range is empty: "${text}"`);

  // printed with the decimals of the most precise of start, end and step
  const digits = Math.max(decimals(startText), decimals(endText), decimals(stepText));
  const scale = 10 ** digits;
  const startScaled = Math.round(start * scale);
  const endScaled = Math.round(end * scale);
  const stepScaled = Math.round(step * scale);

  const count = Math.floor((endScaled - startScaled) / stepScaled) + 1;
  if (count > MAX_SETTING_EXPANSION) {
    throw new ResolutionError(
      "structural",
      scope,
      `variable range has ${count} values (max ${MAX_SETTING_EXPANSION}): "${text}"`
    );
  }

  const out: string[] = [];
  for (let v = startScaled; v <= endScaled; v += stepScaled) {
    out.push((v / scale).toFixed(digits));
  }
  return out;
}

export function variableFragment(def: VariableDef, value: string): string {
  if (def.cmd.includes(VALUE_PLACEHOLDER)) return def.cmd.split(VALUE_PLACEHOLDER).join(value);
  return `${def.cmd}=${value}`;
}

function appendFragment(base: string | null, fragments: string[]): string | null {
  const parts = [base ?? "", ...fragments].filter((p) => p.length > 0);
  return parts.length > 0 ? parts.join(" ") : null;
}

/**
 * Lazily yields one setting per combination of variable values. The first
 * declared variable is the outermost axis. A setting without variables is
 * yielded as is.
 */
export function* expandSetting(base: Setting): Generator<Setting> {
  const defs = base.variables;
  if (defs.length === 0) {
    yield base;
    return;
  }

  const indices = defs.map(() => 0);
  for (;;) {
    const chosen = defs.map((def, i) => def.values[indices[i] ?? 0] ?? "");
    const pre: string[] = [];
    const post: string[] = [];
    defs.forEach((def, i) => {
      const fragment = variableFragment(def, chosen[i] ?? "");
      (def.post ? post : pre).push(fragment);
    });

    yield {
      ...base,
      name: [base.name, ...chosen].join("_"),
      baseName: base.name,
      cmdline: appendFragment(base.cmdline, pre),
      cmdlinePost: appendFragment(base.cmdlinePost, post),
      variables: []
    };

    let axis = defs.length - 1;
    while (axis >= 0) {
      const def = defs[axis];
      const next = (indices[axis] ?? 0) + 1;
      if (def && next < def.values.length) {
        indices[axis] = next;
        break;
      }
      indices[axis] = 0;
      axis--;
    }
    if (axis < 0) return;
  }
}

export function expansionSize(setting: Setting): number {
  return setting.variables.reduce((n, def) => n * def.values.length, 1);
}
