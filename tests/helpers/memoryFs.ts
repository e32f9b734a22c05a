import path from "path";
import { FileSystemViewError, type DirEntry, type EntryKind, type FileSystemView } from "../../src/resolve/fsView.js";

/** In-process stand-in for the benchmark tree. Directories are implied by file paths. */
export class MemoryFileSystemView implements FileSystemView {
  private readonly files = new Map<string, string>();
  private readonly dirs = new Set<string>(["."]);
  readonly reads: string[] = [];

  constructor(files: Record<string, string>) {
    for (const [p, content] of Object.entries(files)) {
      const file = path.normalize(p);
      this.files.set(file, content);
      let dir = path.dirname(file);
      while (!this.dirs.has(dir)) {
        this.dirs.add(dir);
        dir = path.dirname(dir);
      }
    }
  }

  async readDir(dir: string): Promise<DirEntry[]> {
    const d = path.normalize(dir);
    if (!this.dirs.has(d)) throw new FileSystemViewError(`cannot list ${dir}: no such directory`, dir);
    const entries: DirEntry[] = [];
    for (const sub of this.dirs) {
      if (sub !== d && path.dirname(sub) === d) entries.push({ name: path.basename(sub), kind: "directory" });
    }
    for (const file of this.files.keys()) {
      if (path.dirname(file) === d) entries.push({ name: path.basename(file), kind: "file" });
    }
    return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  async kindOf(p: string): Promise<EntryKind | null> {
    const n = path.normalize(p);
    if (this.files.has(n)) return "file";
    if (this.dirs.has(n)) return "directory";
    return null;
  }

  async readText(p: string): Promise<string> {
    const n = path.normalize(p);
    const text = this.files.get(n);
    if (text === undefined) throw new FileSystemViewError(`cannot read ${p}: no such file`, p);
    this.reads.push(n);
    return text;
  }
}
