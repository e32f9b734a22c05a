import path from "path";
import type { Job } from "../runscript/model.js";
import type { RunDescriptor } from "../resolve/runDescriptors.js";

export class TemplateError extends Error {
  constructor(
    readonly template: string,
    message: string
  ) {
    super(`${template}: ${message}`);
    this.name = "TemplateError";
  }
}

const PLACEHOLDER_NAME = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/;

/**
 * Replaces `{name}` with `values[name]`. `{{` and `}}` stand for literal braces;
 * any other brace, and any unknown name, is an error.
 */
export function renderTemplate(text: string, values: Readonly<Record<string, string>>, source: string): string {
  let out = "";
  let i = 0;
  while (i < text.length) {
    const ch = text.charAt(i);
    if (ch === "{") {
      if (text[i + 1] === "{") {
        out += "{";
        i += 2;
        continue;
      }
      const end = text.indexOf("}", i + 1);
      if (end < 0) throw new TemplateError(source, `unclosed "{" at offset ${i}`);
      const name = text.slice(i + 1, end);
      if (!PLACEHOLDER_NAME.test(name)) throw new TemplateError(source, `invalid placeholder "{${name}}" at offset ${i}`);
      const value = values[name];
      if (value === undefined) throw new TemplateError(source, `unknown placeholder "{${name}}"`);
      out += value;
      i = end + 1;
      continue;
    }
    if (ch === "}") {
      if (text[i + 1] === "}") {
        out += "}";
        i += 2;
        continue;
      }
      throw new TemplateError(source, `single "}" at offset ${i}`);
    }
    out += ch;
    i++;
  }
  return out;
}

function quoted(paths: readonly string[], from: string): string {
  return paths.map((p) => `"${path.relative(from, p)}"`).join(" ");
}

/**
 * Values for a run start script. Paths are relative to the run directory, and
 * `run.root` leads from there back to the directory generation ran in.
 */
export function runTemplateValues(d: RunDescriptor, job: Pick<Job, "templateOptions">, cwd: string): Record<string, string> {
  const runDir = path.resolve(cwd, d.path);
  const from = (p: string) => path.resolve(cwd, p);
  const first = d.files[0];

  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(job.templateOptions)) values[`run.${key}`] = value;

  return {
    ...values,
    "run.root": path.relative(runDir, cwd) || ".",
    "run.file": first !== undefined ? path.relative(runDir, from(first)) : "",
    "run.files": quoted(d.files.map(from), runDir),
    "run.encodings": quoted(d.encodings.map(from), runDir),
    "run.args": d.cmdline.pre.join(" "),
    "run.args_post": d.cmdline.post.join(" "),
    "run.solver": d.solver,
    "run.timeout": String(d.timeout),
    "run.memout": String(d.memout),
    "run.run": String(d.run)
  };
}
