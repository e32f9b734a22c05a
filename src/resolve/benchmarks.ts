import { ResolutionError, type Diagnostics } from "../core/diagnostics.js";
import type { Benchmark, BenchmarkInstance, ResolvedBenchmark } from "../runscript/model.js";
import { assembleBenchmark, finishInstance, scanFilesSource, scanFolderSource } from "./benchmarkScan.js";
import { FileSystemViewError, type FileSystemView } from "./fsView.js";
import { resolveSpecSource } from "./specFiles.js";

export function benchmarkScope(name: string): string {
  return `benchmark:${name}`;
}

async function collectInstances(
  fsView: FileSystemView,
  benchmark: Benchmark,
  diagnostics: Diagnostics
): Promise<ResolvedBenchmark> {
  const scope = benchmarkScope(benchmark.name);
  try {
    return await scanBenchmark(fsView, benchmark, diagnostics, scope);
  } catch (err) {
    if (err instanceof FileSystemViewError) throw new ResolutionError("filesystem", scope, err.message);
    throw err;
  }
}

async function scanBenchmark(
  fsView: FileSystemView,
  benchmark: Benchmark,
  diagnostics: Diagnostics,
  scope: string
): Promise<ResolvedBenchmark> {
  const instances: BenchmarkInstance[] = [];

  for (const source of benchmark.sources) {
    switch (source.kind) {
      case "folder":
        for (const p of await scanFolderSource(fsView, source, scope)) instances.push(finishInstance(benchmark.name, p));
        break;
      case "files":
        for (const p of await scanFilesSource(fsView, source, scope)) instances.push(finishInstance(benchmark.name, p));
        break;
      case "spec":
        instances.push(
          ...(await resolveSpecSource(fsView, benchmark.name, source, scope, (msg) =>
            diagnostics.warning("selection", scope, msg)
          ))
        );
        break;
    }
  }

  const resolved = assembleBenchmark(benchmark.name, instances, scope);
  if (resolved.classes.length === 0) diagnostics.warning("selection", scope, "benchmark has no instances");
  return resolved;
}

/**
 * Scans each benchmark on its own. A benchmark whose folders are missing or
 * malformed is reported and left out; the others are unaffected.
 */
export async function resolveBenchmarks(
  fsView: FileSystemView,
  benchmarks: Iterable<Benchmark>,
  diagnostics: Diagnostics
): Promise<{ resolved: Map<string, ResolvedBenchmark>; failed: Set<string> }> {
  const resolved = new Map<string, ResolvedBenchmark>();
  const failed = new Set<string>();
  for (const benchmark of benchmarks) {
    const result = await diagnostics.scopedAsync(() => collectInstances(fsView, benchmark, diagnostics));
    if (result) resolved.set(benchmark.name, result);
    else failed.add(benchmark.name);
  }
  return { resolved, failed };
}
