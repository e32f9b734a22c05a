import { formatDiagnostic } from "../src/core/diagnostics.js";
import { generateScripts } from "../src/execution/generate.js";
import { planJson, resolveRunscriptFile, type ResolvedPlan } from "../src/resolve/resolver.js";
import { RunscriptSchemaError } from "../src/runscript/loader.js";

function usage(): string {
  return [
    "usage:",
    "  tsx scripts/bgen.ts validate --runscript <file> [--projects <a,b>]",
    "  tsx scripts/bgen.ts plan --runscript <file> [--projects <a,b>]",
    "  tsx scripts/bgen.ts generate --runscript <file> [--projects <a,b>] [--no-skip-finished] [--allow-errors]",
    "",
    "Relative paths inside the runscript resolve against the current directory.",
    ""
  ].join("\n");
}

const FLAGS = new Set(["help", "no-skip-finished", "allow-errors"]);

function parseArgs(argv: string[]): Record<string, string | boolean> {
  const out: Record<string, string | boolean> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    if (!a.startsWith("--")) throw new Error(`unexpected arg: ${a}`);
    const key = a.slice(2);
    if (FLAGS.has(key)) {
      out[key] = true;
      continue;
    }
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) throw new Error(`missing value for --${key}`);
    out[key] = next;
    i++;
  }
  return out;
}

function report(plan: ResolvedPlan): number {
  for (const d of plan.diagnostics) console.error(formatDiagnostic(d));
  return plan.diagnostics.filter((d) => d.severity === "error").length;
}

async function main(): Promise<void> {
  const [command, ...rest] = process.argv.slice(2);
  const args = parseArgs(rest);
  if (args.help || !command) {
    process.stdout.write(usage());
    return;
  }
  if (!["validate", "plan", "generate"].includes(command)) throw new Error(`unknown command: ${command}\n\n${usage()}`);

  const runscript = args.runscript;
  if (typeof runscript !== "string") throw new Error(`--runscript is required\n\n${usage()}`);
  const projects =
    typeof args.projects === "string"
      ? args.projects
          .split(",")
          .map((p) => p.trim())
          .filter((p) => p.length > 0)
      : undefined;

  const plan = await resolveRunscriptFile(runscript, { projects });
  const errors = report(plan);

  if (command === "validate") {
    const runs = plan.projects.reduce((n, p) => n + p.descriptors.length, 0);
    console.error(`${plan.projects.length} project(s), ${runs} run(s), ${errors} error(s), digest ${plan.digest}`);
  } else if (command === "plan") {
    process.stdout.write(JSON.stringify(planJson(plan), null, 2) + "\n");
  } else {
    if (errors > 0 && !args["allow-errors"]) {
      throw new Error(`refusing to generate with ${errors} error(s); pass --allow-errors to generate the rest`);
    }
    const summary = await generateScripts(plan, { skipFinished: !args["no-skip-finished"] });
    console.error(
      `wrote ${summary.startScripts} start script(s), ${summary.distScripts.length} dist script(s), skipped ${summary.skipped} finished run(s)`
    );
    for (const launcher of summary.launchers) console.error(`  ${launcher}`);
  }

  if (errors > 0) process.exitCode = 1;
}

main().catch((err) => {
  if (err instanceof RunscriptSchemaError) console.error(err.message);
  else console.error(err);
  process.exitCode = 1;
});
