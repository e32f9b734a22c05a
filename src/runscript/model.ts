/**
 * Linked form of a runscript. Built once by the loader; everything downstream
 * (selection, descriptor generation, batching, emission) only reads it.
 */

export interface Machine {
  name: string;
  cpu: string;
  memory: string;
}

export interface Config {
  name: string;
  template: string;
}

/** `tag` is a tag expression; `null` means the encoding is always attached where declared. */
export interface Encoding {
  file: string;
  tag: string | null;
}

export interface VariableDef {
  cmd: string;
  /** Literal value texts, in expansion order. */
  values: string[];
  post: boolean;
}

export interface Setting {
  name: string;
  /** Name of the declared setting this one was generated from (its own name when not generated). */
  baseName: string;
  cmdline: string | null;
  cmdlinePost: string | null;
  tags: ReadonlySet<string>;
  distTemplate: string;
  distOptions: string | null;
  encodings: readonly Encoding[];
  variables: readonly VariableDef[];
}

export interface System {
  name: string;
  version: string;
  measures: string;
  config: Config;
  cmdline: string | null;
  cmdlinePost: string | null;
  /** Concrete settings: variable families are already expanded, declaration order kept. */
  settings: readonly Setting[];
}

export type ScriptMode = "multi" | "timeout";

interface JobBase {
  name: string;
  timeout: number;
  runs: number;
  memout: number;
  templateOptions: Readonly<Record<string, string>>;
}

export interface SeqJob extends JobBase {
  kind: "seq";
  parallel: number;
}

export interface DistJob extends JobBase {
  kind: "dist";
  scriptMode: ScriptMode;
  walltime: number;
  cpt: number;
  partition: string;
}

export type Job = SeqJob | DistJob;

/**
 * Attributes an instance container (folder, files, spec class) hands down to its
 * instances. Each field is overridden by the instance when the instance sets it.
 */
export interface InstanceDefaults {
  tags: readonly string[];
  cmdline: string | null;
  cmdlinePost: string | null;
  encodingTags: readonly string[];
  encodings: readonly Encoding[];
}

export interface FileEntry {
  file: string;
  group: string | null;
  overrides: Partial<InstanceDefaults>;
}

export interface FolderSource {
  kind: "folder";
  path: string;
  group: boolean;
  ignore: readonly string[];
  defaults: InstanceDefaults;
}

export interface FilesSource {
  kind: "files";
  path: string;
  entries: readonly FileEntry[];
  defaults: InstanceDefaults;
}

export interface SpecSource {
  kind: "spec";
  path: string;
  instanceTag: string | null;
}

export type BenchmarkSource = FolderSource | FilesSource | SpecSource;

export interface Benchmark {
  name: string;
  sources: readonly BenchmarkSource[];
}

export interface RunTagSelector {
  kind: "runtag";
  machine: string;
  benchmark: string;
  tag: string;
}

export interface RunSpecSelector {
  kind: "runspec";
  machine: string;
  benchmark: string;
  system: string;
  version: string;
  setting: string;
}

export type RunSelector = RunTagSelector | RunSpecSelector;

export interface Project {
  name: string;
  job: string;
  runs: readonly RunSelector[];
}

export interface RunscriptModel {
  output: string;
  machines: ReadonlyMap<string, Machine>;
  /** Machines, configs and jobs dropped while building the model, with the reason. */
  rejectedMachines: ReadonlyMap<string, string>;
  configs: ReadonlyMap<string, Config>;
  rejectedConfigs: ReadonlyMap<string, string>;
  /** Valid systems in declaration order. */
  systems: readonly System[];
  /** Systems dropped while building the model, keyed by `name@version`, with the reason. */
  rejectedSystems: ReadonlyMap<string, string>;
  jobs: ReadonlyMap<string, Job>;
  rejectedJobs: ReadonlyMap<string, string>;
  benchmarks: ReadonlyMap<string, Benchmark>;
  rejectedBenchmarks: ReadonlyMap<string, string>;
  projects: readonly Project[];
}

export function systemKey(name: string, version: string): string {
  return `${name}@${version}`;
}

export function splitTags(value: string | readonly string[] | undefined | null): string[] {
  if (value === undefined || value === null) return [];
  const list = typeof value === "string" ? value.split(/\s+/) : [...value];
  return list.filter((t) => t.length > 0);
}

/** One unit of input after benchmark scanning. Grouped instances hold several files. */
export interface BenchmarkInstance {
  benchmark: string;
  className: string;
  name: string;
  /** Directory the instance files live in. */
  location: string;
  /** Paths of the member files (location joined with file name), member order. */
  files: readonly string[];
  tags: ReadonlySet<string>;
  cmdline: readonly string[];
  cmdlinePost: readonly string[];
  /** Container encodings followed by the instance's own. */
  encodings: readonly Encoding[];
  encodingTags: ReadonlySet<string>;
}

export interface BenchmarkClass {
  name: string;
  instances: readonly BenchmarkInstance[];
}

export interface ResolvedBenchmark {
  name: string;
  /** Sorted by class name; instances sorted by name. */
  classes: readonly BenchmarkClass[];
}
