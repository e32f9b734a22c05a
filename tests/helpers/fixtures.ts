import { deriveRunDescriptorId } from "../../src/core/ids.js";
import type { DistJob, Setting } from "../../src/runscript/model.js";
import type { RunDescriptor } from "../../src/resolve/runDescriptors.js";

export function makeSetting(overrides: Partial<Setting> = {}): Setting {
  return {
    name: "default",
    baseName: overrides.name ?? "default",
    cmdline: null,
    cmdlinePost: null,
    tags: new Set<string>(),
    distTemplate: "templates/single.dist",
    distOptions: null,
    encodings: [],
    variables: [],
    ...overrides
  };
}

export function makeDistJob(overrides: Partial<DistJob> = {}): DistJob {
  return {
    name: "dist",
    timeout: 3600,
    runs: 1,
    memout: 20000,
    templateOptions: {},
    kind: "dist",
    scriptMode: "timeout",
    walltime: 90000,
    cpt: 1,
    partition: "kr",
    ...overrides
  };
}

export function makeDescriptor(instance: string, overrides: Partial<RunDescriptor> = {}): RunDescriptor {
  const base = {
    project: "p",
    machine: "m",
    system: "clasp",
    version: "1.0",
    setting: "default",
    benchmark: "b",
    className: "c",
    instance,
    run: 1,
    ...overrides
  };
  return {
    id: deriveRunDescriptorId([
      base.project,
      base.machine,
      base.system,
      base.version,
      base.setting,
      base.benchmark,
      base.className,
      base.instance,
      String(base.run)
    ]),
    path: `out/${base.project}/${base.machine}/results/${base.benchmark}/${base.system}-${base.version}-${base.setting}/${base.className}/${instance}/run${base.run}`,
    files: [`bench/${instance}.cnf`],
    encodings: [],
    cmdline: { pre: [], post: [] },
    solver: `${base.system}-${base.version}`,
    template: "templates/seq.sh",
    measures: "clasp",
    timeout: 3600,
    memout: 20000,
    ...base,
    ...overrides
  };
}
