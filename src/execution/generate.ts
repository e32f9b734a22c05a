import { promises as fs } from "fs";
import path from "path";
import { PlanLog } from "../log/planLog.js";
import type { ProjectPlan, ResolvedPlan } from "../resolve/resolver.js";
import type { RunDescriptor } from "../resolve/runDescriptors.js";
import { distScriptName, renderDistScript, renderSbatchLauncher, renderSeqLauncher } from "./slurm/distScript.js";
import { renderTemplate, runTemplateValues, TemplateError } from "./templates.js";
import { fileExists, outputTree, writeExecutable, type OutputTree } from "./workspace.js";

export const START_SCRIPT = "start.sh";
export const FINISHED_MARKER = ".finished";
export const GENERATE_LOG = "generate.log";

export interface GenerateOptions {
  /** Directory relative runscript paths resolve against. Defaults to the process working directory. */
  cwd?: string;
  /** Leave runs alone whose directory already holds a completion marker. */
  skipFinished?: boolean;
  log?: PlanLog;
}

export interface GenerateSummary {
  outputDir: string;
  startScripts: number;
  skipped: number;
  launchers: string[];
  distScripts: string[];
  logPath: string;
}

class TemplateCache {
  private readonly texts = new Map<string, string>();

  constructor(private readonly cwd: string) {}

  async get(templatePath: string): Promise<string> {
    const cached = this.texts.get(templatePath);
    if (cached !== undefined) return cached;
    let text: string;
    try {
      text = await fs.readFile(path.resolve(this.cwd, templatePath), "utf8");
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new TemplateError(templatePath, `cannot read template: ${reason}`);
    }
    this.texts.set(templatePath, text);
    return text;
  }
}

function groupByMachine<T extends { machine: string }>(items: readonly T[]): Map<string, T[]> {
  const out = new Map<string, T[]>();
  for (const item of items) {
    const list = out.get(item.machine);
    if (list) list.push(item);
    else out.set(item.machine, [item]);
  }
  return out;
}

async function writeRunScripts(
  project: ProjectPlan,
  tree: OutputTree,
  templates: TemplateCache,
  options: { cwd: string; skipFinished: boolean },
  log: PlanLog
): Promise<{ written: Set<RunDescriptor>; skipped: number }> {
  const written = new Set<RunDescriptor>();
  let skipped = 0;

  for (const d of project.descriptors) {
    const dir = tree.runDir(d.path);
    if (options.skipFinished && (await fileExists(path.join(dir, FINISHED_MARKER)))) {
      skipped++;
      log.event("run.skipped", d.path, { id: d.id });
      continue;
    }
    const template = await templates.get(d.template);
    const script = renderTemplate(template, runTemplateValues(d, project.job, options.cwd), d.template);
    await writeExecutable(path.join(dir, START_SCRIPT), script);
    written.add(d);
  }
  return { written, skipped };
}

async function writeSeqLaunchers(
  project: ProjectPlan,
  tree: OutputTree,
  written: ReadonlySet<RunDescriptor>,
  parallel: number,
  log: PlanLog
): Promise<string[]> {
  const launchers: string[] = [];
  for (const [machine, descriptors] of groupByMachine(project.descriptors)) {
    const machineDir = tree.machineDir(project.name, machine);
    const scripts = descriptors
      .filter((d) => written.has(d))
      .map((d) => path.relative(machineDir, path.join(tree.runDir(d.path), START_SCRIPT)));
    const launcher = path.join(machineDir, START_SCRIPT);
    await writeExecutable(launcher, renderSeqLauncher({ parallel, scripts }));
    log.event("launcher.written", launcher, { project: project.name, machine, runs: scripts.length });
    launchers.push(launcher);
  }
  return launchers;
}

async function writeDistScripts(
  project: ProjectPlan,
  tree: OutputTree,
  templates: TemplateCache,
  written: ReadonlySet<RunDescriptor>,
  log: PlanLog
): Promise<{ launchers: string[]; distScripts: string[] }> {
  const launchers: string[] = [];
  const distScripts: string[] = [];

  for (const [machine, batches] of groupByMachine(project.batches)) {
    const machineDir = tree.machineDir(project.name, machine);
    const names: string[] = [];

    for (const batch of [...batches].sort((a, b) => a.sequence - b.sequence)) {
      const jobs = batch.descriptors
        .filter((d) => written.has(d))
        .map((d) => path.relative(machineDir, path.join(tree.runDir(d.path), START_SCRIPT)));
      if (jobs.length === 0) continue;

      // numbered by emitted scripts so that the names stay contiguous when runs are skipped
      const name = distScriptName(names.length);
      const script = renderDistScript({
        template: await templates.get(batch.distTemplate),
        templatePath: batch.distTemplate,
        batch,
        jobs
      });
      const file = path.join(machineDir, name);
      await writeExecutable(file, script);
      log.event("batch.written", file, { id: batch.id, runs: jobs.length });
      names.push(name);
      distScripts.push(file);
    }

    const launcher = path.join(machineDir, START_SCRIPT);
    await writeExecutable(launcher, renderSbatchLauncher(names));
    log.event("launcher.written", launcher, { project: project.name, machine, batches: names.length });
    launchers.push(launcher);
  }
  return { launchers, distScripts };
}

/**
 * Writes the start script of every run in the plan, then per project and machine
 * either a parallel queue launcher (seq jobs) or the batch scripts with their
 * `sbatch` launcher (dist jobs). The pass is logged to `meta/generate.log`.
 */
export async function generateScripts(plan: ResolvedPlan, options: GenerateOptions = {}): Promise<GenerateSummary> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const skipFinished = options.skipFinished ?? true;
  const log = options.log ?? new PlanLog();
  const tree = outputTree(cwd, plan.output);
  const templates = new TemplateCache(cwd);

  log.event("generate.started", tree.rootDir, { digest: plan.digest, projects: plan.projects.length });

  const summary: GenerateSummary = {
    outputDir: tree.rootDir,
    startScripts: 0,
    skipped: 0,
    launchers: [],
    distScripts: [],
    logPath: tree.metaPath(GENERATE_LOG)
  };

  try {
    for (const project of plan.projects) {
      const { written, skipped } = await writeRunScripts(project, tree, templates, { cwd, skipFinished }, log);
      summary.startScripts += written.size;
      summary.skipped += skipped;

      if (project.job.kind === "seq") {
        summary.launchers.push(...(await writeSeqLaunchers(project, tree, written, project.job.parallel, log)));
      } else {
        const dist = await writeDistScripts(project, tree, templates, written, log);
        summary.launchers.push(...dist.launchers);
        summary.distScripts.push(...dist.distScripts);
      }
    }
    log.event("generate.finished", `${summary.startScripts} start scripts`, {
      start_scripts: summary.startScripts,
      skipped: summary.skipped,
      dist_scripts: summary.distScripts.length
    });
  } catch (err) {
    log.event("generate.failed", err instanceof Error ? err.message : String(err));
    throw err;
  } finally {
    await fs.mkdir(tree.metaDir, { recursive: true });
    await fs.writeFile(summary.logPath, log.text(), "utf8");
  }

  return summary;
}
