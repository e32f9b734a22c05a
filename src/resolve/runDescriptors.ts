import path from "path";
import { ResolutionError, type Diagnostics } from "../core/diagnostics.js";
import { deriveRunDescriptorId, type RunDescriptorId } from "../core/ids.js";
import {
  systemKey,
  type BenchmarkInstance,
  type Job,
  type Machine,
  type Project,
  type ResolvedBenchmark,
  type RunSelector,
  type RunscriptModel,
  type Setting,
  type System
} from "../runscript/model.js";
import { composeCmdline } from "./cmdline.js";
import { resolveEncodingsDetailed } from "./encodings.js";
import { matchesParsed, parseTagExpression } from "./tagExpression.js";

export interface RunDescriptor {
  id: RunDescriptorId;
  project: string;
  machine: string;
  system: string;
  version: string;
  setting: string;
  benchmark: string;
  className: string;
  instance: string;
  run: number;
  /** Directory the run's start script and outputs live in. */
  path: string;
  files: string[];
  encodings: string[];
  cmdline: { pre: string[]; post: string[] };
  solver: string;
  template: string;
  measures: string;
  timeout: number;
  memout: number;
}

export interface SelectedPair {
  system: System;
  setting: Setting;
}

export interface SelectedRuns {
  selector: RunSelector;
  machine: Machine;
  benchmark: string;
  pairs: SelectedPair[];
}

export function projectScope(name: string): string {
  return `project:${name}`;
}

function describeSelector(s: RunSelector): string {
  return s.kind === "runtag"
    ? `runtag(machine=${s.machine}, benchmark=${s.benchmark}, tag="${s.tag}")`
    : `runspec(machine=${s.machine}, benchmark=${s.benchmark}, system=${s.system}, version=${s.version}, setting=${s.setting})`;
}

export function lookupJob(model: RunscriptModel, project: Project): Job {
  const rejected = model.rejectedJobs.get(project.job);
  if (rejected !== undefined) {
    throw new ResolutionError("reference", projectScope(project.name), `job "${project.job}" is invalid (${rejected})`);
  }
  const job = model.jobs.get(project.job);
  if (!job) throw new ResolutionError("reference", projectScope(project.name), `unknown job "${project.job}"`);
  return job;
}

function selectPairs(model: RunscriptModel, project: Project, selector: RunSelector, diagnostics: Diagnostics): SelectedPair[] {
  const scope = projectScope(project.name);

  if (selector.kind === "runtag") {
    const expr = parseTagExpression(selector.tag);
    const pairs: SelectedPair[] = [];
    for (const system of model.systems) {
      for (const setting of system.settings) {
        if (matchesParsed(expr, setting.tags)) pairs.push({ system, setting });
      }
    }
    if (pairs.length === 0) diagnostics.warning("selection", scope, `${describeSelector(selector)} matches no setting`);
    return pairs;
  }

  const key = systemKey(selector.system, selector.version);
  const rejected = model.rejectedSystems.get(key);
  if (rejected !== undefined) {
    throw new ResolutionError("reference", scope, `${describeSelector(selector)}: system ${key} is invalid (${rejected})`);
  }
  const system = model.systems.find((s) => s.name === selector.system && s.version === selector.version);
  if (!system) {
    const known = model.systems.some((s) => s.name === selector.system);
    const what = known ? `unknown version "${selector.version}" of system "${selector.system}"` : `unknown system "${selector.system}"`;
    throw new ResolutionError("reference", scope, `${describeSelector(selector)}: ${what}`);
  }

  const exact = system.settings.find((s) => s.name === selector.setting);
  if (exact) return [{ system, setting: exact }];

  // The name of a setting with variables stands for its whole generated family.
  const family = system.settings.filter((s) => s.baseName === selector.setting);
  if (family.length === 0) {
    throw new ResolutionError("reference", scope, `${describeSelector(selector)}: unknown setting "${selector.setting}" of ${key}`);
  }
  return family.map((setting) => ({ system, setting }));
}

/**
 * Links every selector of the project against the model. Any dangling
 * reference aborts the whole project.
 */
export function selectProjectRuns(model: RunscriptModel, project: Project, diagnostics: Diagnostics): SelectedRuns[] {
  const scope = projectScope(project.name);
  const out: SelectedRuns[] = [];
  for (const selector of project.runs) {
    const rejectedMachine = model.rejectedMachines.get(selector.machine);
    if (rejectedMachine !== undefined) {
      throw new ResolutionError(
        "reference",
        scope,
        `${describeSelector(selector)}: machine "${selector.machine}" is invalid (${rejectedMachine})`
      );
    }
    const machine = model.machines.get(selector.machine);
    if (!machine) throw new ResolutionError("reference", scope, `${describeSelector(selector)}: unknown machine "${selector.machine}"`);

    const declared = model.benchmarks.has(selector.benchmark) || model.rejectedBenchmarks.has(selector.benchmark);
    if (!declared) {
      throw new ResolutionError("reference", scope, `${describeSelector(selector)}: unknown benchmark "${selector.benchmark}"`);
    }
    out.push({ selector, machine, benchmark: selector.benchmark, pairs: selectPairs(model, project, selector, diagnostics) });
  }
  if (project.runs.length === 0) diagnostics.warning("selection", scope, "project has no runspec or runtag");
  return out;
}

export function settingDirName(system: Pick<System, "name" | "version">, setting: Pick<Setting, "name">): string {
  return `${system.name}-${system.version}-${setting.name}`;
}

export function runPath(
  output: string,
  ids: { project: string; machine: string; benchmark: string; settingDir: string; className: string; instance: string; run: number }
): string {
  return path.join(
    output,
    ids.project,
    ids.machine,
    "results",
    ids.benchmark,
    ids.settingDir,
    ids.className,
    ids.instance,
    `run${ids.run}`
  );
}

function descriptorKey(d: Pick<RunDescriptor, "project" | "machine" | "system" | "version" | "setting" | "benchmark" | "className" | "instance" | "run">): string[] {
  return [d.project, d.machine, d.system, d.version, d.setting, d.benchmark, d.className, d.instance, String(d.run)];
}

export function buildDescriptor(input: {
  output: string;
  project: string;
  job: Job;
  machine: Machine;
  system: System;
  setting: Setting;
  benchmark: string;
  instance: BenchmarkInstance;
  run: number;
  onDuplicateEncodings?: (files: string[]) => void;
}): RunDescriptor {
  const { system, setting, instance } = input;
  const encodings = resolveEncodingsDetailed(instance, setting);
  if (encodings.duplicates.length > 0) input.onDuplicateEncodings?.(encodings.duplicates);

  const ids = {
    project: input.project,
    machine: input.machine.name,
    system: system.name,
    version: system.version,
    setting: setting.name,
    benchmark: input.benchmark,
    className: instance.className,
    instance: instance.name,
    run: input.run
  };

  return {
    id: deriveRunDescriptorId(descriptorKey(ids)),
    ...ids,
    path: runPath(input.output, { ...ids, settingDir: settingDirName(system, setting) }),
    files: [...instance.files],
    encodings: encodings.files,
    cmdline: composeCmdline(system, setting, instance),
    solver: `${system.name}-${system.version}`,
    template: system.config.template,
    measures: system.measures,
    timeout: input.job.timeout,
    memout: input.job.memout
  };
}

/**
 * Selector order, then system and setting order, then classes and instances
 * sorted by name, then run index. Keys seen twice in one project are dropped.
 */
export function generateProjectDescriptors(input: {
  model: RunscriptModel;
  project: Project;
  job: Job;
  selected: readonly SelectedRuns[];
  benchmarks: ReadonlyMap<string, ResolvedBenchmark>;
  diagnostics: Diagnostics;
}): RunDescriptor[] {
  const { model, project, job, diagnostics } = input;
  const scope = projectScope(project.name);
  const out: RunDescriptor[] = [];
  const seen = new Set<RunDescriptorId>();
  const duplicateEncodingWarnings = new Set<string>();
  let duplicateRuns = 0;

  for (const sel of input.selected) {
    const benchmark = input.benchmarks.get(sel.benchmark);
    if (!benchmark) {
      diagnostics.warning("selection", scope, `skipping ${describeSelector(sel.selector)}: benchmark "${sel.benchmark}" could not be resolved`);
      continue;
    }
    for (const { system, setting } of sel.pairs) {
      for (const cls of benchmark.classes) {
        for (const instance of cls.instances) {
          for (let run = 1; run <= job.runs; run++) {
            const d = buildDescriptor({
              output: model.output,
              project: project.name,
              job,
              machine: sel.machine,
              system,
              setting,
              benchmark: benchmark.name,
              instance,
              run,
              onDuplicateEncodings: (files) => {
                const key = `${settingDirName(system, setting)}|${cls.name}|${instance.name}`;
                if (duplicateEncodingWarnings.has(key)) return;
                duplicateEncodingWarnings.add(key);
                diagnostics.warning(
                  "structural",
                  scope,
                  `encoding reached more than once for ${settingDirName(system, setting)} on ${cls.name}/${instance.name}: ${files.join(", ")}`
                );
              }
            });
            if (seen.has(d.id)) {
              duplicateRuns++;
              continue;
            }
            seen.add(d.id);
            out.push(d);
          }
        }
      }
    }
  }

  if (duplicateRuns > 0) {
    diagnostics.warning("selection", scope, `${duplicateRuns} run(s) selected more than once were generated once`);
  }
  return out;
}
