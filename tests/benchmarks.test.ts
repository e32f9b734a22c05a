import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdir, mkdtemp, realpath, rm, symlink, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { Diagnostics } from "../src/core/diagnostics.js";
import { resolveBenchmarks } from "../src/resolve/benchmarks.js";
import { FileSystemViewError, NodeFileSystemView, type DirEntry } from "../src/resolve/fsView.js";
import { discoverSpecFiles } from "../src/resolve/specFiles.js";
import type { Benchmark, InstanceDefaults, ResolvedBenchmark } from "../src/runscript/model.js";
import { MemoryFileSystemView } from "./helpers/memoryFs.js";

const noDefaults: InstanceDefaults = { tags: [], cmdline: null, cmdlinePost: null, encodingTags: [], encodings: [] };

function layout(b: ResolvedBenchmark | undefined): Record<string, string[]> {
  const out: Record<string, string[]> = {};
  for (const cls of b?.classes ?? []) out[cls.name] = cls.instances.map((i) => i.name);
  return out;
}

describe("folder and file sources", () => {
  const fsView = new MemoryFileSystemView({
    "bench/sat/easy/b.cnf": "",
    "bench/sat/easy/a.cnf": "",
    "bench/sat/hard/c.cnf": "",
    "bench/sat/.svn/x.cnf": "",
    "bench/sat/skip/d.cnf": "",
    "bench/asp/g/p.1.lp": "",
    "bench/asp/g/p.2.lp": "",
    "bench/asp/g/q.lp": ""
  });

  it("scans folders into classes named by relative directory", async () => {
    const benchmark: Benchmark = {
      name: "sat",
      sources: [{ kind: "folder", path: "bench/sat", group: false, ignore: ["skip"], defaults: noDefaults }]
    };
    const diagnostics = new Diagnostics();
    const { resolved } = await resolveBenchmarks(fsView, [benchmark], diagnostics);

    expect(layout(resolved.get("sat"))).toEqual({ easy: ["a", "b"], hard: ["c"] });
    expect(resolved.get("sat")?.classes[0]?.instances[0]?.files).toEqual(["bench/sat/easy/a.cnf"]);
    expect(diagnostics.list()).toEqual([]);
  });

  it("groups files by the name before the first dot", async () => {
    const benchmark: Benchmark = {
      name: "asp",
      sources: [{ kind: "folder", path: "bench/asp", group: true, ignore: [], defaults: noDefaults }]
    };
    const { resolved } = await resolveBenchmarks(fsView, [benchmark], new Diagnostics());
    const instances = resolved.get("asp")?.classes[0]?.instances ?? [];
    expect(instances.map((i) => [i.name, i.files])).toEqual([
      ["p", ["bench/asp/g/p.1.lp", "bench/asp/g/p.2.lp"]],
      ["q", ["bench/asp/g/q.lp"]]
    ]);
  });

  it("reports a missing folder for its benchmark only", async () => {
    const diagnostics = new Diagnostics();
    const { resolved, failed } = await resolveBenchmarks(
      fsView,
      [
        { name: "gone", sources: [{ kind: "folder", path: "bench/none", group: false, ignore: [], defaults: noDefaults }] },
        { name: "sat", sources: [{ kind: "folder", path: "bench/sat", group: false, ignore: [], defaults: noDefaults }] }
      ],
      diagnostics
    );
    expect([...failed]).toEqual(["gone"]);
    expect([...resolved.keys()]).toEqual(["sat"]);
    expect(diagnostics.errors()).toEqual([
      { severity: "error", kind: "filesystem", scope: "benchmark:gone", message: "folder does not exist: bench/none" }
    ]);
  });

  it("requires grouped files to share a directory", async () => {
    const diagnostics = new Diagnostics();
    const { failed } = await resolveBenchmarks(
      fsView,
      [
        {
          name: "mixed",
          sources: [
            {
              kind: "files",
              path: "bench/sat",
              defaults: noDefaults,
              entries: [
                { file: "easy/a.cnf", group: "pair", overrides: {} },
                { file: "hard/c.cnf", group: "pair", overrides: {} }
              ]
            }
          ]
        }
      ],
      diagnostics
    );
    expect([...failed]).toEqual(["mixed"]);
    expect(diagnostics.errors()[0]?.kind).toBe("structural");
  });

  it("lets entries override the container's attributes", async () => {
    const { resolved } = await resolveBenchmarks(
      fsView,
      [
        {
          name: "files",
          sources: [
            {
              kind: "files",
              path: "bench/sat",
              defaults: { ...noDefaults, tags: ["base"], cmdline: "--container" },
              entries: [
                { file: "easy/a.cnf", group: null, overrides: {} },
                { file: "easy/b.cnf", group: null, overrides: { tags: ["own"], cmdline: "--own" } }
              ]
            }
          ]
        }
      ],
      new Diagnostics()
    );
    const [a, b] = resolved.get("files")?.classes[0]?.instances ?? [];
    expect([...(a?.tags ?? [])]).toEqual(["base"]);
    expect(a?.cmdline).toEqual(["--container"]);
    expect([...(b?.tags ?? [])]).toEqual(["own"]);
    expect(b?.cmdline).toEqual(["--own"]);
  });
});

describe("spec files", () => {
  const specX = [
    "classes:",
    "  - name: small",
    "    tag: [easy]",
    "    encodings: [../enc.lp]",
    "    instances:",
    "      - file: inst/a.lp",
    "      - file: inst/b.lp",
    "        tag: [hard]"
  ].join("\n");
  const specY = ["classes:", "  - name: big", "    folders:", "      - path: data"].join("\n");

  const fsView = new MemoryFileSystemView({
    "specs/enc.lp": "",
    "specs/x/spec.yaml": specX,
    "specs/x/inst/a.lp": "",
    "specs/x/inst/b.lp": "",
    "specs/x/deeper/spec.yaml": "classes: [",
    "specs/y/spec.yml": specY,
    "specs/y/data/c.lp": ""
  });

  it("stops descending at the first directory holding a spec file", async () => {
    expect(await discoverSpecFiles(fsView, "specs")).toEqual([
      { relDir: "x", file: "specs/x/spec.yaml" },
      { relDir: "y", file: "specs/y/spec.yml" }
    ]);
  });

  it("flattens spec files into classes prefixed by their directory", async () => {
    const diagnostics = new Diagnostics();
    const { resolved } = await resolveBenchmarks(
      fsView,
      [{ name: "mix", sources: [{ kind: "spec", path: "specs", instanceTag: null }] }],
      diagnostics
    );
    expect(diagnostics.list()).toEqual([]);
    expect(layout(resolved.get("mix"))).toEqual({ "x/small": ["a", "b"], "y/big": ["c"] });

    const a = resolved.get("mix")?.classes[0]?.instances[0];
    expect(a?.files).toEqual(["specs/x/inst/a.lp"]);
    expect(a?.encodings).toEqual([{ file: "specs/enc.lp", tag: null }]);
  });

  it("keeps only instances matching the instance tag", async () => {
    const { resolved } = await resolveBenchmarks(
      fsView,
      [{ name: "mix", sources: [{ kind: "spec", path: "specs", instanceTag: "easy" }] }],
      new Diagnostics()
    );
    expect(layout(resolved.get("mix"))).toEqual({ "x/small": ["a"] });
  });

  it("leaves spec files and nested spec directories out of declared folders", async () => {
    const nested = new MemoryFileSystemView({
      "specs/x/spec.yaml": ["classes:", "  - name: c", "    folders:", "      - path: ."].join("\n"),
      "specs/x/a.lp": "",
      "specs/x/deep/spec.yaml": "classes: []",
      "specs/x/deep/b.lp": ""
    });
    const diagnostics = new Diagnostics();
    const { resolved } = await resolveBenchmarks(
      nested,
      [{ name: "nested", sources: [{ kind: "spec", path: "specs", instanceTag: null }] }],
      diagnostics
    );
    expect(diagnostics.list()).toEqual([]);
    expect(layout(resolved.get("nested"))).toEqual({ "x/c": ["a"] });
  });

  it("reports a malformed spec file as a structural error of the benchmark", async () => {
    const broken = new MemoryFileSystemView({ "specs/spec.yaml": "classes: [" });
    const diagnostics = new Diagnostics();
    const { failed } = await resolveBenchmarks(
      broken,
      [{ name: "bad", sources: [{ kind: "spec", path: "specs", instanceTag: null }] }],
      diagnostics
    );
    expect([...failed]).toEqual(["bad"]);
    expect(diagnostics.errors()[0]?.kind).toBe("structural");
    expect(diagnostics.errors()[0]?.scope).toBe("benchmark:bad");
  });
});

describe("benchmark trees on disk", () => {
  let tmpDir: string;
  let fsView: NodeFileSystemView;

  const folder = (name: string): Benchmark => ({
    name,
    sources: [{ kind: "folder", path: name, group: false, ignore: [], defaults: noDefaults }]
  });

  beforeAll(async () => {
    tmpDir = await realpath(await mkdtemp(path.join(os.tmpdir(), "benchplan-scan-")));
    await mkdir(path.join(tmpDir, "cyc", "sub"), { recursive: true });
    await mkdir(path.join(tmpDir, "ok", "k"), { recursive: true });
    await writeFile(path.join(tmpDir, "cyc", "sub", "x.lp"), "", "utf8");
    await writeFile(path.join(tmpDir, "ok", "k", "y.lp"), "", "utf8");
    await symlink("..", path.join(tmpDir, "cyc", "sub", "loop"));
    await symlink(path.join("..", "..", "ok", "k", "y.lp"), path.join(tmpDir, "cyc", "sub", "link.lp"));
    fsView = new NodeFileSystemView(tmpDir);
  });

  afterAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("lists file symlinks as files and does not walk directory symlinks", async () => {
    expect(await fsView.readDir("cyc/sub")).toEqual([
      { name: "link.lp", kind: "file" },
      { name: "loop", kind: "other" },
      { name: "x.lp", kind: "file" }
    ]);

    const diagnostics = new Diagnostics();
    const { resolved, failed } = await resolveBenchmarks(fsView, [folder("cyc"), folder("ok")], diagnostics);
    expect([...failed]).toEqual([]);
    expect(layout(resolved.get("cyc"))).toEqual({ sub: ["link", "x"] });
    expect(layout(resolved.get("ok"))).toEqual({ k: ["y"] });
  });

  it("rejects listing a file with a filesystem view error", async () => {
    await expect(fsView.readDir("ok/k/y.lp")).rejects.toBeInstanceOf(FileSystemViewError);
  });

  it("reports an unreadable directory against its benchmark only", async () => {
    class LockedView extends MemoryFileSystemView {
      override async readDir(dir: string): Promise<DirEntry[]> {
        if (path.normalize(dir) === "locked/a") throw new FileSystemViewError("cannot list locked/a: permission denied", dir);
        return super.readDir(dir);
      }
    }
    const locked = new LockedView({ "locked/a/i.lp": "", "ok/k/y.lp": "" });
    const diagnostics = new Diagnostics();
    const { resolved, failed } = await resolveBenchmarks(locked, [folder("locked"), folder("ok")], diagnostics);

    expect([...failed]).toEqual(["locked"]);
    expect(layout(resolved.get("ok"))).toEqual({ k: ["y"] });
    expect(diagnostics.errors()).toEqual([
      {
        severity: "error",
        kind: "filesystem",
        scope: "benchmark:locked",
        message: "cannot list locked/a: permission denied"
      }
    ]);
  });
});
