import { promises as fs } from "fs";
import path from "path";

export interface OutputTree {
  rootDir: string;
  metaDir: string;
  machineDir(project: string, machine: string): string;
  runDir(descriptorPath: string): string;
  metaPath(name: string): string;
}

export function safeJoin(baseDir: string, name: string): string {
  const joined = path.join(baseDir, name);
  const rel = path.relative(baseDir, joined);
  if (rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new Error(`unsafe output path: ${name}`);
  }
  return joined;
}

/** Descriptor paths already start with the output directory; they resolve against `cwd` like it. */
export function outputTree(cwd: string, output: string): OutputTree {
  const root = path.resolve(cwd, output);
  const metaDir = path.join(root, "meta");
  return {
    rootDir: root,
    metaDir,
    machineDir: (project, machine) => safeJoin(safeJoin(root, project), machine),
    runDir: (descriptorPath) => safeJoin(root, path.relative(root, path.resolve(cwd, descriptorPath))),
    metaPath: (name) => safeJoin(metaDir, name)
  };
}

export async function writeExecutable(filePath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, "utf8");
  await fs.chmod(filePath, 0o755);
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch (err) {
    if (typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT") return false;
    throw err;
  }
}
