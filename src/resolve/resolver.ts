import { sha256Prefixed, stableJsonStringify } from "../core/canonicalJson.js";
import { Diagnostics, type Diagnostic } from "../core/diagnostics.js";
import type { JsonObject } from "../core/json.js";
import { buildRunscriptModel, loadRunscriptFile } from "../runscript/loader.js";
import type { Benchmark, Job, Project, RunscriptModel } from "../runscript/model.js";
import type { RunscriptDecl } from "../runscript/schema.js";
import { resolveBenchmarks } from "./benchmarks.js";
import { batchDescriptors, settingLookupOf, type DispatchBatch } from "./dispatchBatches.js";
import { NodeFileSystemView, type FileSystemView } from "./fsView.js";
import { generateProjectDescriptors, lookupJob, selectProjectRuns, type RunDescriptor, type SelectedRuns } from "./runDescriptors.js";

export interface ProjectPlan {
  name: string;
  job: Job;
  descriptors: RunDescriptor[];
  /** Empty for sequential jobs. */
  batches: DispatchBatch[];
}

export interface ResolvedPlan {
  output: string;
  projects: ProjectPlan[];
  diagnostics: Diagnostic[];
  digest: `sha256:${string}`;
}

export interface ResolveOptions {
  fsView?: FileSystemView;
  /** Restrict resolution to these projects; unknown names are reported. */
  projects?: readonly string[];
}

interface LinkedProject {
  project: Project;
  job: Job;
  selected: SelectedRuns[];
}

function chooseProjects(model: RunscriptModel, names: readonly string[] | undefined, diagnostics: Diagnostics): Project[] {
  if (!names) return [...model.projects];
  const wanted = new Set(names);
  for (const name of wanted) {
    if (!model.projects.some((p) => p.name === name)) {
      diagnostics.error("reference", `project:${name}`, `no project named "${name}"`);
    }
  }
  return model.projects.filter((p) => wanted.has(p.name));
}

function batchJson(b: DispatchBatch): JsonObject {
  return {
    id: b.id,
    machine: b.machine,
    sequence: b.sequence,
    scriptMode: b.scriptMode,
    walltime: b.walltime,
    cpt: b.cpt,
    partition: b.partition,
    distTemplate: b.distTemplate,
    distOptions: b.distOptions,
    descriptors: b.descriptors.map((d) => d.id)
  };
}

function descriptorJson(d: RunDescriptor): JsonObject {
  return {
    id: d.id,
    project: d.project,
    machine: d.machine,
    system: d.system,
    version: d.version,
    setting: d.setting,
    benchmark: d.benchmark,
    className: d.className,
    instance: d.instance,
    run: d.run,
    path: d.path,
    files: d.files,
    encodings: d.encodings,
    cmdline: { pre: d.cmdline.pre, post: d.cmdline.post },
    solver: d.solver,
    template: d.template,
    measures: d.measures,
    timeout: d.timeout,
    memout: d.memout
  };
}

function jobJson(job: Job): JsonObject {
  const common = {
    name: job.name,
    timeout: job.timeout,
    runs: job.runs,
    memout: job.memout,
    templateOptions: { ...job.templateOptions }
  };
  return job.kind === "seq"
    ? { ...common, kind: job.kind, parallel: job.parallel }
    : { ...common, kind: job.kind, scriptMode: job.scriptMode, walltime: job.walltime, cpt: job.cpt, partition: job.partition };
}

/** JSON form of the resolved projects. Batches refer to descriptors by id. */
export function planProjectsJson(output: string, projects: readonly ProjectPlan[]): JsonObject {
  return {
    output,
    projects: projects.map((p) => ({
      name: p.name,
      job: jobJson(p.job),
      descriptors: p.descriptors.map(descriptorJson),
      batches: p.batches.map(batchJson)
    }))
  };
}

export function planJson(plan: ResolvedPlan): JsonObject {
  return {
    ...planProjectsJson(plan.output, plan.projects),
    diagnostics: plan.diagnostics.map((d) => ({ severity: d.severity, kind: d.kind, scope: d.scope, message: d.message })),
    digest: plan.digest
  };
}

/**
 * Resolves every project of a built model. Benchmarks are scanned once, and only
 * those some project references. A project with a dangling reference is reported
 * and left out of the plan; the others are resolved as if it did not exist.
 */
export async function resolveModel(
  model: RunscriptModel,
  diagnostics: Diagnostics,
  options: ResolveOptions = {}
): Promise<ResolvedPlan> {
  const fsView = options.fsView ?? new NodeFileSystemView();

  const linked: LinkedProject[] = [];
  for (const project of chooseProjects(model, options.projects, diagnostics)) {
    const result = diagnostics.scoped(() => {
      const job = lookupJob(model, project);
      return { project, job, selected: selectProjectRuns(model, project, diagnostics) };
    });
    if (result) linked.push(result);
  }

  const referenced: Benchmark[] = [];
  const names = new Set<string>();
  for (const { selected } of linked) {
    for (const sel of selected) {
      const benchmark = model.benchmarks.get(sel.benchmark);
      if (benchmark && !names.has(benchmark.name)) {
        names.add(benchmark.name);
        referenced.push(benchmark);
      }
    }
  }
  const { resolved } = await resolveBenchmarks(fsView, referenced, diagnostics);

  const settingOf = settingLookupOf(model.systems);
  const projects: ProjectPlan[] = [];
  for (const { project, job, selected } of linked) {
    const descriptors = generateProjectDescriptors({ model, project, job, selected, benchmarks: resolved, diagnostics });
    const batches =
      job.kind === "dist" ? batchDescriptors({ project: project.name, job, descriptors, settingOf, diagnostics }) : [];
    projects.push({ name: project.name, job, descriptors, batches });
  }

  return {
    output: model.output,
    projects,
    diagnostics: diagnostics.list(),
    digest: sha256Prefixed(stableJsonStringify(planProjectsJson(model.output, projects)))
  };
}

export async function resolveRunscript(decl: RunscriptDecl, options: ResolveOptions = {}): Promise<ResolvedPlan> {
  const diagnostics = new Diagnostics();
  const model = buildRunscriptModel(decl, diagnostics);
  return resolveModel(model, diagnostics, options);
}

export async function resolveRunscriptFile(filePath: string, options: ResolveOptions = {}): Promise<ResolvedPlan> {
  return resolveRunscript(await loadRunscriptFile(filePath), options);
}
