import type { Diagnostics } from "../core/diagnostics.js";
import { deriveBatchId, type BatchId } from "../core/ids.js";
import type { DistJob, ScriptMode, Setting, System } from "../runscript/model.js";
import { projectScope, type RunDescriptor } from "./runDescriptors.js";

export interface DispatchBatch {
  id: BatchId;
  project: string;
  machine: string;
  /** Position of the batch among the project's batches on this machine, from 0. */
  sequence: number;
  scriptMode: ScriptMode;
  walltime: number;
  cpt: number;
  partition: string;
  distTemplate: string;
  distOptions: string | null;
  descriptors: RunDescriptor[];
}

export interface BatchSettingLookup {
  (system: string, version: string, setting: string): Pick<Setting, "distTemplate" | "distOptions"> | undefined;
}

export function settingLookupOf(systems: readonly System[]): BatchSettingLookup {
  const index = new Map<string, Setting>();
  for (const system of systems) {
    for (const setting of system.settings) index.set(`${system.name}\0${system.version}\0${setting.name}`, setting);
  }
  return (system, version, setting) => index.get(`${system}\0${version}\0${setting}`);
}

function groupKey(d: RunDescriptor): string {
  return [d.machine, d.system, d.version, d.setting, d.benchmark].join("\0");
}

/** Groups keep the order in which their first descriptor was generated. */
function groupDescriptors(descriptors: readonly RunDescriptor[]): RunDescriptor[][] {
  const groups = new Map<string, RunDescriptor[]>();
  for (const d of descriptors) {
    const key = groupKey(d);
    const group = groups.get(key);
    if (group) group.push(d);
    else groups.set(key, [d]);
  }
  return [...groups.values()];
}

/**
 * Packs one group by cumulative timeout. A descriptor that cannot fit even on
 * its own gets a batch to itself.
 */
export function packByTimeout(
  group: readonly RunDescriptor[],
  walltime: number,
  onOversize: (d: RunDescriptor) => void
): RunDescriptor[][] {
  const out: RunDescriptor[][] = [];
  let current: RunDescriptor[] = [];
  let used = 0;

  for (const d of group) {
    if (d.timeout > walltime) {
      onOversize(d);
      if (current.length > 0) out.push(current);
      out.push([d]);
      current = [];
      used = 0;
      continue;
    }
    if (used + d.timeout > walltime && current.length > 0) {
      out.push(current);
      current = [];
      used = 0;
    }
    current.push(d);
    used += d.timeout;
  }
  if (current.length > 0) out.push(current);
  return out;
}

export function batchDescriptors(input: {
  project: string;
  job: DistJob;
  descriptors: readonly RunDescriptor[];
  settingOf: BatchSettingLookup;
  diagnostics: Diagnostics;
}): DispatchBatch[] {
  const { project, job, diagnostics } = input;
  const scope = projectScope(project);
  const batches: DispatchBatch[] = [];
  const sequenceByMachine = new Map<string, number>();

  for (const group of groupDescriptors(input.descriptors)) {
    const first = group[0];
    if (!first) continue;
    const setting = input.settingOf(first.system, first.version, first.setting);
    if (!setting) throw new Error(`descriptor refers to unknown setting ${first.system}-${first.version}-${first.setting}`);

    const packed =
      job.scriptMode === "multi"
        ? group.map((d) => [d])
        : packByTimeout(group, job.walltime, (d) =>
            diagnostics.warning(
              "selection",
              scope,
              `run ${d.path} has timeout ${d.timeout}s above walltime ${job.walltime}s; dispatched alone`
            )
          );

    for (const descriptors of packed) {
      const sequence = sequenceByMachine.get(first.machine) ?? 0;
      sequenceByMachine.set(first.machine, sequence + 1);
      batches.push({
        id: deriveBatchId([project, first.machine, String(sequence), ...descriptors.map((d) => d.id)]),
        project,
        machine: first.machine,
        sequence,
        scriptMode: job.scriptMode,
        walltime: job.walltime,
        cpt: job.cpt,
        partition: job.partition,
        distTemplate: setting.distTemplate,
        distOptions: setting.distOptions,
        descriptors
      });
    }
  }
  return batches;
}
