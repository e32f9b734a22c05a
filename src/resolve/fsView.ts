import { promises as fs } from "fs";
import path from "path";

export type EntryKind = "file" | "directory" | "other";

export interface DirEntry {
  name: string;
  kind: EntryKind;
}

/** Read-only view of the filesystem used while scanning benchmarks. */
export interface FileSystemView {
  /** Entries sorted by name. */
  readDir(dir: string): Promise<DirEntry[]>;
  kindOf(p: string): Promise<EntryKind | null>;
  readText(p: string): Promise<string>;
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}

/** A failure reading the benchmark tree; reported against the benchmark being scanned. */
export class FileSystemViewError extends Error {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(message);
    this.name = "FileSystemViewError";
  }
}

function wrapFsError(op: string, p: string, err: unknown): FileSystemViewError {
  const detail = err instanceof Error ? err.message : String(err);
  return new FileSystemViewError(`cannot ${op} ${p}: ${detail}`, p);
}

/**
 * Relative paths resolve against `baseDir`, the process working directory by default.
 * A symlink to a file lists as a file; a symlink to a directory lists as "other"
 * and is not walked.
 */
export class NodeFileSystemView implements FileSystemView {
  constructor(private readonly baseDir: string = process.cwd()) {}

  async readDir(dir: string): Promise<DirEntry[]> {
    const dirents = await fs.readdir(path.resolve(this.baseDir, dir), { withFileTypes: true }).catch((err: unknown) => {
      throw wrapFsError("list", dir, err);
    });
    const out: DirEntry[] = [];
    for (const d of dirents) {
      let kind: EntryKind = d.isDirectory() ? "directory" : d.isFile() ? "file" : "other";
      if (d.isSymbolicLink()) kind = (await this.kindOf(path.join(dir, d.name))) === "file" ? "file" : "other";
      out.push({ name: d.name, kind });
    }
    return out.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  async kindOf(p: string): Promise<EntryKind | null> {
    try {
      const st = await fs.stat(path.resolve(this.baseDir, p));
      if (st.isDirectory()) return "directory";
      if (st.isFile()) return "file";
      return "other";
    } catch (err) {
      if (isNotFound(err)) return null;
      throw wrapFsError("stat", p, err);
    }
  }

  async readText(p: string): Promise<string> {
    try {
      return await fs.readFile(path.resolve(this.baseDir, p), "utf8");
    } catch (err) {
      throw wrapFsError("read", p, err);
    }
  }
}
