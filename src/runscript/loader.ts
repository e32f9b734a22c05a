import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import type * as z from "zod/v4";
import { Diagnostics, ResolutionError } from "../core/diagnostics.js";
import { parseDuration } from "../core/time.js";
import { expandSetting, expansionSize, MAX_SETTING_EXPANSION, parseValueSpec } from "../resolve/variables.js";
import {
  splitTags,
  systemKey,
  type Benchmark,
  type BenchmarkSource,
  type Config,
  type Encoding,
  type FileEntry,
  type InstanceDefaults,
  type Job,
  type Machine,
  type Project,
  type RunSelector,
  type RunscriptModel,
  type Setting,
  type System
} from "./model.js";
import {
  zRunscriptDecl,
  type BenchmarkDecl,
  type EncodingDecl,
  type FileEntryDecl,
  type JobDecl,
  type ProjectDecl,
  type RunscriptDecl,
  type SettingDecl,
  type SystemDecl
} from "./schema.js";

export const DEFAULT_PARTITION = "kr";
export const DEFAULT_DIST_TEMPLATE = "templates/single.dist";
export const DEFAULT_MEMOUT_MB = 20000;

export class RunscriptSchemaError extends Error {
  constructor(
    readonly source: string,
    readonly issues: string[]
  ) {
    super(`invalid runscript ${source}:\n  ${issues.join("\n  ")}`);
    this.name = "RunscriptSchemaError";
  }
}

export function formatZodIssues(issues: ReadonlyArray<{ path: PropertyKey[]; message: string }>): string[] {
  return issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.map((p) => String(p)).join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}

export function parseYamlDocument<T>(text: string, source: string, schema: z.ZodType<T>): T {
  let raw: unknown;
  try {
    raw = YAML.parse(text) as unknown;
  } catch (err) {
    throw new RunscriptSchemaError(source, [err instanceof Error ? err.message : String(err)]);
  }
  const parsed = schema.safeParse(raw ?? {});
  if (!parsed.success) throw new RunscriptSchemaError(source, formatZodIssues(parsed.error.issues));
  return parsed.data;
}

export function parseRunscript(text: string, source = "<inline>"): RunscriptDecl {
  return parseYamlDocument(text, source, zRunscriptDecl);
}

export async function loadRunscriptFile(filePath: string): Promise<RunscriptDecl> {
  const raw = await fs.readFile(filePath, "utf8");
  return parseRunscript(raw, filePath);
}

export function toEncodings(decls: readonly EncodingDecl[], baseDir: string | null): Encoding[] {
  return decls.map((d) => {
    const file = typeof d === "string" ? d : d.file;
    const tag = typeof d === "string" ? null : (d.tag ?? null);
    const joined = baseDir !== null && !path.isAbsolute(file) ? path.join(baseDir, file) : file;
    return { file: path.normalize(joined), tag: tag !== null && tag.trim().length > 0 ? tag : null };
  });
}

export function toInstanceDefaults(
  decl: {
    tag?: string | string[] | undefined;
    cmdline?: string | undefined;
    cmdline_post?: string | undefined;
    encoding_tag?: string | string[] | undefined;
    encodings: EncodingDecl[];
  },
  baseDir: string | null
): InstanceDefaults {
  return {
    tags: splitTags(decl.tag),
    cmdline: decl.cmdline ?? null,
    cmdlinePost: decl.cmdline_post ?? null,
    encodingTags: splitTags(decl.encoding_tag),
    encodings: toEncodings(decl.encodings, baseDir)
  };
}

/** Only the attributes the entry actually declares end up in `overrides`. */
export function toFileEntry(decl: FileEntryDecl, baseDir: string | null): FileEntry {
  const overrides: Partial<InstanceDefaults> = {};
  if (decl.tag !== undefined) overrides.tags = splitTags(decl.tag);
  if (decl.cmdline !== undefined) overrides.cmdline = decl.cmdline;
  if (decl.cmdline_post !== undefined) overrides.cmdlinePost = decl.cmdline_post;
  if (decl.encoding_tag !== undefined) overrides.encodingTags = splitTags(decl.encoding_tag);
  if (decl.encodings.length > 0) overrides.encodings = toEncodings(decl.encodings, baseDir);
  return { file: path.normalize(decl.file), group: decl.group ?? null, overrides };
}

function toSetting(decl: SettingDecl, scope: string): Setting {
  return {
    name: decl.name,
    baseName: decl.name,
    cmdline: decl.cmdline ?? null,
    cmdlinePost: decl.cmdline_post ?? null,
    tags: new Set(splitTags(decl.tag)),
    distTemplate: decl.dist_template ?? DEFAULT_DIST_TEMPLATE,
    distOptions: decl.dist_options && decl.dist_options.trim().length > 0 ? decl.dist_options : null,
    encodings: toEncodings(decl.encodings, null),
    variables: decl.variables.map((v) => ({
      cmd: v.cmd,
      values: parseValueSpec(v.values, scope),
      post: v.post
    }))
  };
}

function buildSystem(
  decl: SystemDecl,
  configs: ReadonlyMap<string, Config>,
  rejectedConfigs: ReadonlyMap<string, string>
): System {
  const scope = `system:${systemKey(decl.name, decl.version)}`;
  const rejectedConfig = rejectedConfigs.get(decl.config);
  if (rejectedConfig !== undefined) {
    throw new ResolutionError("reference", scope, `config "${decl.config}" is invalid (${rejectedConfig})`);
  }
  const config = configs.get(decl.config);
  if (!config) throw new ResolutionError("reference", scope, `unknown config "${decl.config}"`);

  const settings: Setting[] = [];
  const seen = new Set<string>();
  for (const settingDecl of decl.settings) {
    const base = toSetting(settingDecl, `${scope}/setting:${settingDecl.name}`);
    const size = expansionSize(base);
    if (size > MAX_SETTING_EXPANSION) {
      throw new ResolutionError(
        "structural",
        scope,
        `setting "${base.name}" expands to ${size} settings (max ${MAX_SETTING_EXPANSION})`
      );
    }
    for (const setting of expandSetting(base)) {
      if (seen.has(setting.name)) {
        throw new ResolutionError("structural", scope, `duplicate setting name "${setting.name}"`);
      }
      seen.add(setting.name);
      settings.push(setting);
    }
  }

  return {
    name: decl.name,
    version: decl.version,
    measures: decl.measures,
    config,
    cmdline: decl.cmdline ?? null,
    cmdlinePost: decl.cmdline_post ?? null,
    settings
  };
}

function buildJob(decl: JobDecl): Job {
  const common = {
    name: decl.name,
    timeout: parseDuration(decl.timeout),
    runs: decl.runs,
    memout: decl.memout ?? DEFAULT_MEMOUT_MB,
    templateOptions: Object.fromEntries(Object.entries(decl.template_options).map(([k, v]) => [k, String(v)]))
  };
  if (decl.type === "seq") return { ...common, kind: "seq", parallel: decl.parallel };

  const walltime = parseDuration(decl.walltime);
  if (walltime < 1) throw new ResolutionError("structural", `job:${decl.name}`, `walltime must be at least one second`);
  return {
    ...common,
    kind: "dist",
    scriptMode: decl.script_mode,
    walltime,
    cpt: decl.cpt,
    partition: decl.partition ?? DEFAULT_PARTITION
  };
}

function buildBenchmark(decl: BenchmarkDecl): Benchmark {
  const sources: BenchmarkSource[] = [];
  for (const f of decl.folders) {
    sources.push({
      kind: "folder",
      path: path.normalize(f.path),
      group: f.group,
      ignore: f.ignore.map((p) => path.normalize(p)),
      defaults: toInstanceDefaults(f, null)
    });
  }
  for (const f of decl.files) {
    sources.push({
      kind: "files",
      path: path.normalize(f.path),
      entries: f.add.map((e) => toFileEntry(e, null)),
      defaults: toInstanceDefaults(f, null)
    });
  }
  for (const s of decl.specs) {
    sources.push({ kind: "spec", path: path.normalize(s.path), instanceTag: s.instance_tag ?? null });
  }
  return { name: decl.name, sources };
}

function buildProject(decl: ProjectDecl): Project {
  const runs: RunSelector[] = decl.runs.map((r) =>
    "tag" in r
      ? { kind: "runtag", machine: r.machine, benchmark: r.benchmark, tag: r.tag }
      : {
          kind: "runspec",
          machine: r.machine,
          benchmark: r.benchmark,
          system: r.system,
          version: r.version,
          setting: r.setting
        }
  );
  return { name: decl.name, job: decl.job, runs };
}

/**
 * Claims `name` for one declaration. A clash rejects the name altogether: the
 * earlier entry is dropped too, so nothing resolves against either of them.
 */
function claimName(
  taken: Map<string, unknown>,
  rejected: Map<string, string>,
  name: string,
  what: string,
  diagnostics: Diagnostics
): boolean {
  if (!taken.has(name) && !rejected.has(name)) return true;
  const message = `duplicate ${what} name "${name}"`;
  diagnostics.error("structural", `${what}:${name}`, message);
  taken.delete(name);
  rejected.set(name, message);
  return false;
}

/**
 * Phase one indexes every entity by name and rejects duplicates; phase two links
 * systems to configs and expands setting families. Entities that fail are left
 * out of the model with the reason kept, so that the projects that reference
 * them fail with a precise message.
 */
export function buildRunscriptModel(decl: RunscriptDecl, diagnostics: Diagnostics): RunscriptModel {
  const machines = new Map<string, Machine>();
  const rejectedMachines = new Map<string, string>();
  for (const m of decl.machines) {
    if (claimName(machines, rejectedMachines, m.name, "machine", diagnostics)) {
      machines.set(m.name, { name: m.name, cpu: m.cpu, memory: m.memory });
    }
  }

  const configs = new Map<string, Config>();
  const rejectedConfigs = new Map<string, string>();
  for (const c of decl.configs) {
    if (claimName(configs, rejectedConfigs, c.name, "config", diagnostics)) {
      configs.set(c.name, { name: c.name, template: path.normalize(c.template) });
    }
  }

  const jobs = new Map<string, Job>();
  const rejectedJobs = new Map<string, string>();
  for (const j of decl.jobs) {
    if (!claimName(jobs, rejectedJobs, j.name, "job", diagnostics)) continue;
    try {
      jobs.set(j.name, buildJob(j));
    } catch (err) {
      diagnostics.record(err);
      rejectedJobs.set(j.name, err instanceof Error ? err.message : String(err));
    }
  }

  const systemDecls = new Map<string, SystemDecl>();
  const rejectedSystems = new Map<string, string>();
  for (const s of decl.systems) {
    const key = systemKey(s.name, s.version);
    if (systemDecls.has(key)) {
      const message = `duplicate system version "${key}"`;
      diagnostics.error("structural", `system:${key}`, message);
      rejectedSystems.set(key, message);
      continue;
    }
    systemDecls.set(key, s);
  }

  const systems: System[] = [];
  for (const [key, s] of systemDecls) {
    if (rejectedSystems.has(key)) continue;
    try {
      systems.push(buildSystem(s, configs, rejectedConfigs));
    } catch (err) {
      diagnostics.record(err);
      rejectedSystems.set(key, err instanceof Error ? err.message : String(err));
    }
  }

  const benchmarks = new Map<string, Benchmark>();
  const rejectedBenchmarks = new Map<string, string>();
  for (const b of decl.benchmarks) {
    if (benchmarks.has(b.name)) {
      const message = `duplicate benchmark name "${b.name}"`;
      diagnostics.error("structural", `benchmark:${b.name}`, message);
      rejectedBenchmarks.set(b.name, message);
      continue;
    }
    benchmarks.set(b.name, buildBenchmark(b));
  }
  for (const name of rejectedBenchmarks.keys()) benchmarks.delete(name);

  const projects: Project[] = [];
  const projectNames = new Set<string>();
  for (const p of decl.projects) {
    if (projectNames.has(p.name)) {
      diagnostics.error("structural", `project:${p.name}`, `duplicate project name "${p.name}"`);
      continue;
    }
    projectNames.add(p.name);
    projects.push(buildProject(p));
  }

  return {
    output: path.normalize(decl.output),
    machines,
    rejectedMachines,
    configs,
    rejectedConfigs,
    systems,
    rejectedSystems,
    jobs,
    rejectedJobs,
    benchmarks,
    rejectedBenchmarks,
    projects
  };
}

function encodingFiles(decls: readonly EncodingDecl[]): string[] {
  return decls.map((d) => (typeof d === "string" ? d : d.file));
}

/**
 * Every path the runscript itself names for reading: templates, benchmark roots
 * and encodings. Paths found later inside spec files are below a spec root.
 */
export function referencedPaths(decl: RunscriptDecl): string[] {
  const out = new Set<string>();
  const add = (p: string): void => {
    out.add(path.normalize(p));
  };

  for (const c of decl.configs) add(c.template);
  for (const s of decl.systems) {
    for (const setting of s.settings) {
      add(setting.dist_template ?? DEFAULT_DIST_TEMPLATE);
      encodingFiles(setting.encodings).forEach(add);
    }
  }
  for (const b of decl.benchmarks) {
    for (const f of b.folders) {
      add(f.path);
      encodingFiles(f.encodings).forEach(add);
    }
    for (const f of b.files) {
      add(f.path);
      encodingFiles(f.encodings).forEach(add);
      for (const entry of f.add) {
        add(path.join(f.path, entry.file));
        encodingFiles(entry.encodings).forEach(add);
      }
    }
    for (const spec of b.specs) add(spec.path);
  }
  return [...out];
}
