import { describe, it, expect } from "vitest";
import { renderTemplate, runTemplateValues, TemplateError } from "../src/execution/templates.js";
import {
  bashSingleQuote,
  distScriptName,
  renderDistScript,
  renderSbatchLauncher,
  renderSeqLauncher,
  sbatchDirectives
} from "../src/execution/slurm/distScript.js";
import { makeDescriptor } from "./helpers/fixtures.js";

describe("renderTemplate", () => {
  it("substitutes placeholders and keeps doubled braces literal", () => {
    expect(renderTemplate("a {x} b {y.z} {{c}}", { x: "1", "y.z": "2" }, "t")).toBe("a 1 b 2 {c}");
    expect(renderTemplate("${{HOME}}", {}, "t")).toBe("${HOME}");
  });

  it("reports malformed and unknown placeholders", () => {
    expect(() => renderTemplate("x {a", {}, "t.sh")).toThrow('t.sh: unclosed "{" at offset 2');
    expect(() => renderTemplate("{a b}", {}, "t.sh")).toThrow('t.sh: invalid placeholder "{a b}" at offset 0');
    expect(() => renderTemplate("{missing}", {}, "t.sh")).toThrow('t.sh: unknown placeholder "{missing}"');
    expect(() => renderTemplate("a } b", {}, "t.sh")).toThrow('t.sh: single "}" at offset 2');
    expect(() => renderTemplate("{}", {}, "t.sh")).toThrow(TemplateError);
  });
});

describe("runTemplateValues", () => {
  it("makes paths relative to the run directory", () => {
    const d = makeDescriptor("a", {
      path: "out/p/m/results/b/s/c/a/run1",
      files: ["bench/a.1.lp", "bench/a.2.lp"],
      encodings: ["enc/e.lp"],
      cmdline: { pre: ["--stats", "-q"], post: ["--post"] },
      timeout: 60,
      memout: 512
    });
    const values = runTemplateValues(d, { templateOptions: { mode: "fast" } }, "/work");

    const up = "../../../../../../../../..";
    expect(values["run.root"]).toBe(up);
    expect(values["run.file"]).toBe(`${up}/bench/a.1.lp`);
    expect(values["run.files"]).toBe(`"${up}/bench/a.1.lp" "${up}/bench/a.2.lp"`);
    expect(values["run.encodings"]).toBe(`"${up}/enc/e.lp"`);
    expect(values["run.args"]).toBe("--stats -q");
    expect(values["run.args_post"]).toBe("--post");
    expect(values["run.solver"]).toBe("clasp-1.0");
    expect(values["run.timeout"]).toBe("60");
    expect(values["run.memout"]).toBe("512");
    expect(values["run.run"]).toBe("1");
    expect(values["run.mode"]).toBe("fast");
  });
});

describe("dist scripts", () => {
  it("turns dist options into sbatch directives", () => {
    expect(sbatchDirectives(null)).toBe("");
    expect(sbatchDirectives(" --exclusive  --qos=long ")).toBe("#SBATCH --exclusive\n#SBATCH --qos=long\n");
  });

  it("names scripts by sequence", () => {
    expect(distScriptName(0)).toBe("start0000.dist");
    expect(distScriptName(42)).toBe("start0042.dist");
  });

  it("fills a dist template for a batch", () => {
    const text = renderDistScript({
      template: "#SBATCH --time={walltime}\n#SBATCH -p {partition} -c {cpt}\n{dist_options}{jobs}",
      templatePath: "single.dist",
      batch: { walltime: 90000, cpt: 4, partition: "kr", distOptions: "--exclusive" },
      jobs: ["results/a/start.sh", "results/b/start.sh"]
    });
    expect(text).toBe(
      "#SBATCH --time=1-01:00:00\n#SBATCH -p kr -c 4\n#SBATCH --exclusive\nresults/a/start.sh\nresults/b/start.sh\n"
    );
  });

  it("writes an sbatch launcher submitting each script", () => {
    expect(renderSbatchLauncher(["start0000.dist", "start0001.dist"])).toBe(
      [
        "#!/usr/bin/env bash",
        "",
        "set -euo pipefail",
        'cd "$(dirname "$0")"',
        "",
        "sbatch 'start0000.dist'",
        "sbatch 'start0001.dist'",
        ""
      ].join("\n")
    );
  });
});

describe("renderSeqLauncher", () => {
  it("queues scripts through xargs with the job's parallelism", () => {
    const text = renderSeqLauncher({ parallel: 3, scripts: ["results/a/start.sh", "results/it's/start.sh"] });
    expect(text.split("\n").slice(5)).toEqual([
      "QUEUE=(",
      "  'results/a/start.sh'",
      `  'results/it'"'"'s/start.sh'`,
      ")",
      "",
      `printf '%s\\0' "\${QUEUE[@]}" | xargs -0 -r -n 1 -P 3 bash`,
      ""
    ]);
  });

  it("writes a launcher that does nothing when every run is finished", () => {
    expect(renderSeqLauncher({ parallel: 1, scripts: [] }).endsWith("\n# nothing left to run\n")).toBe(true);
  });

  it("rejects a parallelism below one", () => {
    expect(() => renderSeqLauncher({ parallel: 0, scripts: [] })).toThrow("invalid parallel: 0");
  });

  it("quotes single quotes for bash", () => {
    expect(bashSingleQuote("a'b")).toBe(`'a'"'"'b'`);
  });
});
