import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdir, mkdtemp, readFile, realpath, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema, ListToolsResultSchema, McpError } from "@modelcontextprotocol/sdk/types.js";

import { PolicyEngine } from "../src/policy/policy.js";
import { createGatewayServer } from "../src/mcp/gatewayServer.js";
import {
  zRunscriptGenerateOutput,
  zRunscriptPlanOutput,
  zRunscriptValidateOutput
} from "../src/mcp/toolSchemas.js";

const RUNSCRIPT = [
  "output: out",
  "machines: [{ name: m1 }]",
  "configs: [{ name: seq, template: templates/run.sh }]",
  "systems:",
  '  - { name: clasp, version: "1.0", config: seq, settings: [{ name: def, tag: basic }] }',
  "jobs:",
  "  - { name: sj, type: seq, timeout: 60, runs: 1, parallel: 1 }",
  "benchmarks:",
  "  - { name: b1, folders: [{ path: bench/b1 }] }",
  "projects:",
  "  - { name: s, job: sj, runs: [{ machine: m1, benchmark: b1, tag: basic }] }"
].join("\n");

const BROKEN_PROJECT = "\n  - { name: bad, job: sj, runs: [{ machine: nowhere, benchmark: b1, tag: basic }] }";

interface Connected {
  client: Client;
  close: () => Promise<void>;
}

async function connect(policy: PolicyEngine, cwd: string): Promise<Connected> {
  const server = createGatewayServer({ policy, cwd });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  const client = new Client({ name: "benchplan-test-client", version: "0.0.0" });
  await client.connect(clientTransport);
  return {
    client,
    close: async () => {
      await clientTransport.close();
      await serverTransport.close();
    }
  };
}

async function callTool(client: Client, name: string, args: Record<string, unknown>) {
  const result = await client.request({ method: "tools/call", params: { name, arguments: args } }, CallToolResultSchema);
  if (result.isError) {
    throw new Error(`${name} failed: ${result.content.map((c) => (c.type === "text" ? c.text : c.type)).join("\n")}`);
  }
  return result.structuredContent;
}

/** Tool failures may come back as an error result or as a protocol error. */
async function callToolError(client: Client, name: string, args: Record<string, unknown>): Promise<string> {
  try {
    const result = await client.request({ method: "tools/call", params: { name, arguments: args } }, CallToolResultSchema);
    if (!result.isError) throw new Error(`${name} unexpectedly succeeded`);
    return result.content.map((c) => (c.type === "text" ? c.text : c.type)).join("\n");
  } catch (err) {
    if (err instanceof McpError) return err.message;
    throw err;
  }
}

describe.sequential("gateway (in-memory)", () => {
  let tmpDir: string;
  let policy: PolicyEngine;
  let conn: Connected;

  beforeAll(async () => {
    tmpDir = await realpath(await mkdtemp(path.join(os.tmpdir(), "benchplan-gateway-")));
    await mkdir(path.join(tmpDir, "bench", "b1", "cls"), { recursive: true });
    await mkdir(path.join(tmpDir, "templates"), { recursive: true });
    await writeFile(path.join(tmpDir, "bench", "b1", "cls", "i1.lp"), "", "utf8");
    await writeFile(path.join(tmpDir, "bench", "b1", "cls", "i2.lp"), "", "utf8");
    await writeFile(path.join(tmpDir, "templates", "run.sh"), "#!/bin/bash\n{run.solver} {run.files}\n", "utf8");
    await writeFile(path.join(tmpDir, "run.yaml"), RUNSCRIPT, "utf8");
    await writeFile(path.join(tmpDir, "broken.yaml"), RUNSCRIPT + BROKEN_PROJECT, "utf8");

    policy = new PolicyEngine({
      version: 1,
      tool_allowlist: ["runscript_validate", "runscript_plan", "runscript_generate"],
      paths: { runscript_prefix_allowlist: [tmpDir], output_prefix_allowlist: [tmpDir], deny_symlinks: true },
      quotas: { max_run_descriptors: 100, max_preview_descriptors: 1 }
    });
    conn = await connect(policy, tmpDir);
  });

  afterAll(async () => {
    await conn.close();
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("lists tools", async () => {
    const result = await conn.client.request({ method: "tools/list", params: {} }, ListToolsResultSchema);
    expect(result.tools.map((t) => t.name).sort()).toEqual(["runscript_generate", "runscript_plan", "runscript_validate"]);
  });

  it("validates a runscript", async () => {
    const sc = zRunscriptValidateOutput.parse(await callTool(conn.client, "runscript_validate", { runscript_path: "run.yaml" }));
    expect(sc.valid).toBe(true);
    expect(sc.error_count).toBe(0);
    expect(sc.projects).toEqual([{ name: "s", job: "sj", job_kind: "seq", descriptor_count: 2, batch_count: 0 }]);
    expect(sc.policy_hash).toBe(policy.policyHash);
  });

  it("reports project errors without failing the call", async () => {
    const sc = zRunscriptValidateOutput.parse(
      await callTool(conn.client, "runscript_validate", { runscript_path: "broken.yaml" })
    );
    expect(sc.valid).toBe(false);
    expect(sc.error_count).toBe(1);
    expect(sc.diagnostics[0]?.scope).toBe("project:bad");
    expect(sc.projects.map((p) => p.name)).toEqual(["s"]);
  });

  it("caps the plan preview at the policy limit", async () => {
    const sc = zRunscriptPlanOutput.parse(
      await callTool(conn.client, "runscript_plan", { runscript_path: "run.yaml", preview_limit: 5 })
    );
    const project = sc.projects[0];
    expect(project?.descriptors.map((d) => d.path)).toEqual(["out/s/m1/results/b1/clasp-1.0-def/cls/i1/run1"]);
    expect(project?.truncated).toBe(true);
    expect(project?.batches).toEqual([]);
  });

  it("refuses to generate a runscript with errors unless told to", async () => {
    const message = await callToolError(conn.client, "runscript_generate", { runscript_path: "broken.yaml" });
    expect(message).toContain("runscript has 1 error(s)");
  });

  it("generates start scripts below the output directory", async () => {
    const sc = zRunscriptGenerateOutput.parse(
      await callTool(conn.client, "runscript_generate", { runscript_path: "broken.yaml", allow_errors: true })
    );
    expect(sc.output_dir).toBe(path.join(tmpDir, "out"));
    expect(sc.start_scripts).toBe(2);
    expect(sc.launchers).toEqual([path.join(tmpDir, "out", "s", "m1", "start.sh")]);

    const script = await readFile(path.join(tmpDir, "out/s/m1/results/b1/clasp-1.0-def/cls/i1/run1/start.sh"), "utf8");
    expect(script).toBe('#!/bin/bash\nclasp-1.0 "../../../../../../../../../bench/b1/cls/i1.lp"\n');
  });

  it("denies runscripts outside the allowlist", async () => {
    const outside = await realpath(await mkdtemp(path.join(os.tmpdir(), "benchplan-outside-")));
    try {
      await writeFile(path.join(outside, "run.yaml"), RUNSCRIPT, "utf8");
      const message = await callToolError(conn.client, "runscript_validate", {
        runscript_path: path.join(outside, "run.yaml")
      });
      expect(message).toContain("policy denied runscript outside allowlist");
    } finally {
      await rm(outside, { recursive: true, force: true });
    }
  });

  it("denies runscripts that point benchmark folders outside the allowlist", async () => {
    const outside = await realpath(await mkdtemp(path.join(os.tmpdir(), "benchplan-outside-")));
    try {
      await mkdir(path.join(outside, "cls"), { recursive: true });
      await writeFile(path.join(outside, "cls", "x.lp"), "", "utf8");
      await writeFile(path.join(tmpDir, "escape.yaml"), RUNSCRIPT.replace("path: bench/b1", `path: ${outside}`), "utf8");
      const message = await callToolError(conn.client, "runscript_validate", { runscript_path: "escape.yaml" });
      expect(message).toContain(`policy denied read outside allowlist: ${outside}`);
    } finally {
      await rm(outside, { recursive: true, force: true });
    }
  });

  it("denies tools the policy does not allow", async () => {
    const restricted = new PolicyEngine({ ...policy.snapshot(), tool_allowlist: ["runscript_validate"] });
    const other = await connect(restricted, tmpDir);
    try {
      const message = await callToolError(other.client, "runscript_generate", { runscript_path: "run.yaml" });
      expect(message).toContain("policy denied tool: runscript_generate");
    } finally {
      await other.close();
    }
  });
});
