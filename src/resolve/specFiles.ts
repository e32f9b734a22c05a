import path from "path";
import { ResolutionError } from "../core/diagnostics.js";
import { parseYamlDocument, RunscriptSchemaError, toFileEntry, toInstanceDefaults } from "../runscript/loader.js";
import type { BenchmarkInstance, SpecSource } from "../runscript/model.js";
import { zSpecFileDecl, type SpecFileDecl } from "../runscript/schema.js";
import { collectFiles, finishInstance, scanFolder, type PendingInstance } from "./benchmarkScan.js";
import type { FileSystemView } from "./fsView.js";
import { matchesParsed, parseTagExpression } from "./tagExpression.js";

export const SPEC_FILE_NAMES = ["spec.yaml", "spec.yml"] as const;

export interface DiscoveredSpecFile {
  /** Directory of the spec file relative to the spec root (`.` for the root itself). */
  relDir: string;
  file: string;
}

/**
 * Finds spec files below `root`. A directory holding one is not descended into;
 * its siblings are. Results come in walk order, which is sorted by directory.
 */
export async function discoverSpecFiles(fsView: FileSystemView, root: string): Promise<DiscoveredSpecFile[]> {
  const found: DiscoveredSpecFile[] = [];
  const stack: string[] = ["."];

  while (stack.length > 0) {
    const relDir = stack.pop() ?? ".";
    const entries = await fsView.readDir(path.join(root, relDir));

    const specName = SPEC_FILE_NAMES.find((n) => entries.some((e) => e.name === n && e.kind === "file"));
    if (specName) {
      found.push({ relDir, file: path.join(root, relDir, specName) });
      continue;
    }

    const subdirs = entries.filter((e) => e.kind === "directory" && e.name !== ".svn").map((e) => path.join(relDir, e.name));
    // reversed so that popping visits them in name order
    for (let i = subdirs.length - 1; i >= 0; i--) {
      const d = subdirs[i];
      if (d !== undefined) stack.push(d);
    }
  }
  return found;
}

export function specClassName(relDir: string, className: string): string {
  return relDir === "." ? className : path.join(relDir, className);
}

async function readSpecFile(fsView: FileSystemView, file: string, scope: string): Promise<SpecFileDecl> {
  try {
    return parseYamlDocument(await fsView.readText(file), file, zSpecFileDecl);
  } catch (err) {
    if (err instanceof RunscriptSchemaError) {
      throw new ResolutionError("structural", scope, err.message);
    }
    throw err;
  }
}

async function instancesOfSpecFile(
  fsView: FileSystemView,
  spec: DiscoveredSpecFile,
  scope: string
): Promise<PendingInstance[]> {
  const decl = await readSpecFile(fsView, spec.file, scope);
  const specDir = path.dirname(spec.file);
  const out: PendingInstance[] = [];

  for (const cls of decl.classes) {
    const className = specClassName(spec.relDir, cls.name);
    const classDefaults = toInstanceDefaults(cls, specDir);

    for (const folder of cls.folders) {
      const folderDefaults = toInstanceDefaults(folder, specDir);
      const pending = await scanFolder(
        fsView,
        {
          path: path.join(specDir, folder.path),
          group: folder.group,
          ignore: folder.ignore.map((p) => path.normalize(p)),
          defaults: {
            tags: folder.tag !== undefined ? folderDefaults.tags : classDefaults.tags,
            cmdline: folder.cmdline !== undefined ? folderDefaults.cmdline : classDefaults.cmdline,
            cmdlinePost: folder.cmdline_post !== undefined ? folderDefaults.cmdlinePost : classDefaults.cmdlinePost,
            encodingTags: folder.encoding_tag !== undefined ? folderDefaults.encodingTags : classDefaults.encodingTags,
            encodings: [...classDefaults.encodings, ...folderDefaults.encodings]
          }
        },
        scope,
        (relDir, name) => ({ className, name: relDir === "." ? name : path.join(relDir, name) }),
        new Set(SPEC_FILE_NAMES)
      );
      out.push(...pending);
    }

    if (cls.instances.length > 0) {
      const entries = cls.instances.map((e) => toFileEntry(e, specDir));
      const pending = await collectFiles(fsView, specDir, entries, classDefaults, scope, (_relDir, name) => ({
        className,
        name
      }));
      out.push(...pending);
    }
  }
  return out;
}

/**
 * Flattens every spec file below the source root into instances of
 * `<spec dir>/<class>`, keeping those whose tags satisfy `instance_tag`.
 */
export async function resolveSpecSource(
  fsView: FileSystemView,
  benchmark: string,
  source: SpecSource,
  scope: string,
  onNoSpecFiles: (message: string) => void
): Promise<BenchmarkInstance[]> {
  if ((await fsView.kindOf(source.path)) !== "directory") {
    throw new ResolutionError("filesystem", scope, `spec path does not exist: ${source.path}`);
  }

  const specs = await discoverSpecFiles(fsView, source.path);
  if (specs.length === 0) onNoSpecFiles(`no spec file below ${source.path}`);

  const filter = parseTagExpression(source.instanceTag);
  const out: BenchmarkInstance[] = [];
  for (const spec of specs) {
    for (const pending of await instancesOfSpecFile(fsView, spec, scope)) {
      const instance = finishInstance(benchmark, pending);
      if (matchesParsed(filter, instance.tags)) out.push(instance);
    }
  }
  return out;
}
