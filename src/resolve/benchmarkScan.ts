import path from "path";
import { ResolutionError } from "../core/diagnostics.js";
import type {
  BenchmarkClass,
  BenchmarkInstance,
  FileEntry,
  FilesSource,
  FolderSource,
  InstanceDefaults,
  ResolvedBenchmark
} from "../runscript/model.js";
import type { FileSystemView } from "./fsView.js";

const INSTANCE_FILE_NAME = /^(([^.]+).*)\.[^.]+$/;
const ALWAYS_SKIPPED = new Set([".svn"]);

export interface InstanceMember {
  file: string;
  overrides: Partial<InstanceDefaults>;
}

export interface PendingInstance {
  className: string;
  name: string;
  location: string;
  members: InstanceMember[];
  defaults: InstanceDefaults;
}

/**
 * `name.1.cnf` is instance `name.1`; with grouping everything from the first dot
 * on is dropped so `name.1.cnf` and `name.2.cnf` form instance `name`.
 */
export function instanceNameOf(fileName: string, group: boolean, scope: string): string {
  const m = INSTANCE_FILE_NAME.exec(fileName);
  if (!m || m[1] === undefined || m[2] === undefined) {
    throw new ResolutionError("structural", scope, `instance file has no extension: "${fileName}"`);
  }
  return group ? m[2] : m[1];
}

/**
 * Override-if-present merge of a container's defaults with its members. Lists of
 * fragments come from the members that declare one, in member order; when no
 * member does, the container value applies once.
 */
export function mergeInstanceAttributes(
  defaults: InstanceDefaults,
  members: readonly InstanceMember[]
): Pick<BenchmarkInstance, "tags" | "cmdline" | "cmdlinePost" | "encodings" | "encodingTags"> {
  const present = (value: string | null): string[] => (value !== null && value.trim().length > 0 ? [value] : []);

  let tags: string[] | null = null;
  let cmdline: string[] | null = null;
  let cmdlinePost: string[] | null = null;
  let encodingTags: string[] | null = null;
  const encodings = [...defaults.encodings];

  for (const { overrides } of members) {
    if (overrides.tags !== undefined) tags = [...(tags ?? []), ...overrides.tags];
    if (overrides.cmdline !== undefined) cmdline = [...(cmdline ?? []), ...present(overrides.cmdline)];
    if (overrides.cmdlinePost !== undefined) cmdlinePost = [...(cmdlinePost ?? []), ...present(overrides.cmdlinePost)];
    if (overrides.encodingTags !== undefined) encodingTags = [...(encodingTags ?? []), ...overrides.encodingTags];
    if (overrides.encodings !== undefined) encodings.push(...overrides.encodings);
  }

  return {
    tags: new Set(tags ?? defaults.tags),
    cmdline: cmdline ?? present(defaults.cmdline),
    cmdlinePost: cmdlinePost ?? present(defaults.cmdlinePost),
    encodings,
    encodingTags: new Set(encodingTags ?? defaults.encodingTags)
  };
}

export function finishInstance(benchmark: string, pending: PendingInstance): BenchmarkInstance {
  return {
    benchmark,
    className: pending.className,
    name: pending.name,
    location: pending.location,
    files: pending.members.map((m) => path.join(pending.location, m.file)),
    ...mergeInstanceAttributes(pending.defaults, pending.members)
  };
}

/**
 * Walks the folder breadth first and returns one pending instance per file (or
 * file group) of each directory. `place` maps the directory relative to the
 * folder and the instance name onto the final class and instance names.
 *
 * Files named in `reserved` are never instances, and a subdirectory holding one
 * is not entered. Folders declared in spec files pass the spec file names here.
 */
export async function scanFolder(
  fsView: FileSystemView,
  source: Pick<FolderSource, "path" | "group" | "ignore" | "defaults">,
  scope: string,
  place: (relDir: string, instanceName: string) => { className: string; name: string },
  reserved: ReadonlySet<string> = new Set()
): Promise<PendingInstance[]> {
  const kind = await fsView.kindOf(source.path);
  if (kind !== "directory") {
    throw new ResolutionError("filesystem", scope, `folder does not exist: ${source.path}`);
  }

  const ignored = new Set(source.ignore);
  const skip = (relPath: string, name: string): boolean =>
    ALWAYS_SKIPPED.has(name) || ignored.has(path.normalize(relPath));

  const out: PendingInstance[] = [];
  const worklist: string[] = ["."];
  while (worklist.length > 0) {
    const relDir = worklist.shift() ?? ".";
    const absDir = path.join(source.path, relDir);
    const groups = new Map<string, InstanceMember[]>();
    const subdirs: string[] = [];

    const entries = await fsView.readDir(absDir);
    if (relDir !== "." && entries.some((e) => e.kind === "file" && reserved.has(e.name))) continue;

    for (const entry of entries) {
      if (entry.kind === "file" && reserved.has(entry.name)) continue;
      const relPath = path.join(relDir, entry.name);
      if (skip(relPath, entry.name)) continue;
      if (entry.kind === "directory") {
        subdirs.push(relPath);
        continue;
      }
      if (entry.kind !== "file") continue;
      const name = instanceNameOf(entry.name, source.group, scope);
      const members = groups.get(name) ?? [];
      members.push({ file: entry.name, overrides: {} });
      groups.set(name, members);
    }

    for (const [name, members] of groups) {
      const placed = place(relDir, name);
      out.push({ ...placed, location: absDir, members, defaults: source.defaults });
    }
    worklist.push(...subdirs);
  }
  return out;
}

/**
 * Explicit file lists. Entries with the same group form one instance; their
 * files must share a directory.
 */
export async function collectFiles(
  fsView: FileSystemView,
  root: string,
  entries: readonly FileEntry[],
  defaults: InstanceDefaults,
  scope: string,
  place: (relDir: string, instanceName: string) => { className: string; name: string }
): Promise<PendingInstance[]> {
  const groups = new Map<string, { relDir: string; members: InstanceMember[] }>();

  for (const entry of entries) {
    const full = path.join(root, entry.file);
    if ((await fsView.kindOf(full)) !== "file") {
      throw new ResolutionError("filesystem", scope, `instance file does not exist: ${full}`);
    }
    const relDir = path.dirname(entry.file);
    const fileName = path.basename(entry.file);
    const name = entry.group ?? instanceNameOf(fileName, false, scope);

    const existing = groups.get(name);
    if (existing && existing.relDir !== relDir) {
      throw new ResolutionError(
        "structural",
        scope,
        `files of instance group "${name}" must share a directory (${existing.relDir} vs ${relDir})`
      );
    }
    const group = existing ?? { relDir, members: [] };
    group.members.push({ file: fileName, overrides: entry.overrides });
    groups.set(name, group);
  }

  return [...groups.entries()].map(([name, g]) => ({
    ...place(g.relDir, name),
    location: path.join(root, g.relDir),
    members: g.members,
    defaults
  }));
}

export function scanFolderSource(fsView: FileSystemView, source: FolderSource, scope: string): Promise<PendingInstance[]> {
  return scanFolder(fsView, source, scope, (relDir, name) => ({ className: relDir, name }));
}

export async function scanFilesSource(fsView: FileSystemView, source: FilesSource, scope: string): Promise<PendingInstance[]> {
  if ((await fsView.kindOf(source.path)) !== "directory") {
    throw new ResolutionError("filesystem", scope, `files path does not exist: ${source.path}`);
  }
  return collectFiles(fsView, source.path, source.entries, source.defaults, scope, (relDir, name) => ({
    className: relDir,
    name
  }));
}

function byName<T extends { name: string }>(a: T, b: T): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/** Sorts classes and instances and rejects a (class, instance) pair seen twice. */
export function assembleBenchmark(name: string, instances: readonly BenchmarkInstance[], scope: string): ResolvedBenchmark {
  const classes = new Map<string, Map<string, BenchmarkInstance>>();
  for (const inst of instances) {
    const cls = classes.get(inst.className) ?? new Map<string, BenchmarkInstance>();
    if (cls.has(inst.name)) {
      throw new ResolutionError("structural", scope, `duplicate instance "${inst.name}" in class "${inst.className}"`);
    }
    cls.set(inst.name, inst);
    classes.set(inst.className, cls);
  }

  const out: BenchmarkClass[] = [...classes.entries()].map(([className, members]) => ({
    name: className,
    instances: [...members.values()].sort(byName)
  }));
  return { name, classes: out.sort(byName) };
}
