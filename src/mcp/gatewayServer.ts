import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import path from "path";
import type { Diagnostic } from "../core/diagnostics.js";
import type { JsonObject } from "../core/json.js";
import { generateScripts } from "../execution/generate.js";
import { TemplateError } from "../execution/templates.js";
import type { PolicyEngine } from "../policy/policy.js";
import { NodeFileSystemView, type FileSystemView } from "../resolve/fsView.js";
import { resolveRunscript, type ProjectPlan, type ResolvedPlan } from "../resolve/resolver.js";
import type { RunDescriptor } from "../resolve/runDescriptors.js";
import { loadRunscriptFile, referencedPaths, RunscriptSchemaError } from "../runscript/loader.js";
import {
  zRunscriptGenerateInput,
  zRunscriptGenerateOutput,
  zRunscriptPlanInput,
  zRunscriptPlanOutput,
  zRunscriptValidateInput,
  zRunscriptValidateOutput
} from "./toolSchemas.js";

export interface GatewayDeps {
  policy: PolicyEngine;
  /** Directory relative runscript paths resolve against. */
  cwd?: string;
  fsView?: FileSystemView;
}

function diagnosticJson(d: Diagnostic): JsonObject {
  return { severity: d.severity, kind: d.kind, scope: d.scope, message: d.message };
}

function projectSummary(p: ProjectPlan): JsonObject {
  return {
    name: p.name,
    job: p.job.name,
    job_kind: p.job.kind,
    descriptor_count: p.descriptors.length,
    batch_count: p.batches.length
  };
}

function descriptorPreview(d: RunDescriptor): JsonObject {
  return {
    id: d.id,
    machine: d.machine,
    system: d.system,
    version: d.version,
    setting: d.setting,
    benchmark: d.benchmark,
    class_name: d.className,
    instance: d.instance,
    run: d.run,
    path: d.path,
    args: d.cmdline.pre.join(" "),
    args_post: d.cmdline.post.join(" "),
    encodings: d.encodings,
    timeout: d.timeout
  };
}

function countDescriptors(plan: ResolvedPlan): number {
  return plan.projects.reduce((n, p) => n + p.descriptors.length, 0);
}

function errorCount(plan: ResolvedPlan): number {
  return plan.diagnostics.filter((d) => d.severity === "error").length;
}

/** Turns input problems into InvalidParams; anything else is rethrown unchanged. */
function toMcpError(e: unknown): unknown {
  if (e instanceof McpError) return e;
  if (e instanceof RunscriptSchemaError || e instanceof TemplateError) {
    return new McpError(ErrorCode.InvalidParams, e.message);
  }
  return e;
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const mcp = new McpServer({
    name: "benchplan-gateway",
    version: "0.1.0"
  });

  const cwd = path.resolve(deps.cwd ?? process.cwd());
  const fsView = deps.fsView ?? new NodeFileSystemView(cwd);

  async function resolveForTool(runscriptPath: string, projects: string[] | undefined): Promise<ResolvedPlan> {
    const safePath = await deps.policy.validateRunscriptPath(path.resolve(cwd, runscriptPath));
    const decl = await loadRunscriptFile(safePath);
    for (const p of referencedPaths(decl)) await deps.policy.validateReadPath(path.resolve(cwd, p));
    return resolveRunscript(decl, { fsView, projects });
  }

  mcp.registerTool(
    "runscript_validate",
    {
      description: "Load a runscript, resolve every project and report diagnostics. Writes nothing.",
      inputSchema: zRunscriptValidateInput,
      outputSchema: zRunscriptValidateOutput
    },
    async (args) => {
      const toolName = "runscript_validate";
      try {
        deps.policy.assertToolAllowed(toolName);
        const plan = await resolveForTool(args.runscript_path, args.projects);
        const errors = errorCount(plan);

        const structured: JsonObject = {
          valid: errors === 0,
          error_count: errors,
          warning_count: plan.diagnostics.length - errors,
          diagnostics: plan.diagnostics.map(diagnosticJson),
          projects: plan.projects.map(projectSummary),
          digest: plan.digest,
          policy_hash: deps.policy.policyHash
        };
        return {
          content: [{ type: "text", text: errors === 0 ? `Valid (${plan.digest})` : `${errors} error(s)` }],
          structuredContent: structured
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "runscript_plan",
    {
      description: "Resolve a runscript into run descriptors and dispatch batches and return a preview.",
      inputSchema: zRunscriptPlanInput,
      outputSchema: zRunscriptPlanOutput
    },
    async (args) => {
      const toolName = "runscript_plan";
      try {
        deps.policy.assertToolAllowed(toolName);
        const plan = await resolveForTool(args.runscript_path, args.projects);
        deps.policy.enforceDescriptorQuota(countDescriptors(plan));

        const cap = Math.min(args.preview_limit ?? deps.policy.previewCap(), deps.policy.previewCap());
        const structured: JsonObject = {
          digest: plan.digest,
          policy_hash: deps.policy.policyHash,
          output: plan.output,
          diagnostics: plan.diagnostics.map(diagnosticJson),
          projects: plan.projects.map((p) => ({
            ...projectSummary(p),
            descriptors: p.descriptors.slice(0, cap).map(descriptorPreview),
            truncated: p.descriptors.length > cap,
            batches: p.batches.map((b) => ({
              id: b.id,
              machine: b.machine,
              sequence: b.sequence,
              runs: b.descriptors.length,
              walltime: b.walltime,
              partition: b.partition
            }))
          }))
        };
        return {
          content: [{ type: "text", text: `Planned ${countDescriptors(plan)} run(s) (${plan.digest})` }],
          structuredContent: structured
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "runscript_generate",
    {
      description: "Resolve a runscript and write start scripts, launchers and dist batch scripts below its output directory.",
      inputSchema: zRunscriptGenerateInput,
      outputSchema: zRunscriptGenerateOutput
    },
    async (args) => {
      const toolName = "runscript_generate";
      try {
        deps.policy.assertToolAllowed(toolName);
        const plan = await resolveForTool(args.runscript_path, args.projects);
        deps.policy.enforceDescriptorQuota(countDescriptors(plan));

        const errors = errorCount(plan);
        if (errors > 0 && !args.allow_errors) {
          throw new McpError(ErrorCode.InvalidRequest, `runscript has ${errors} error(s); pass allow_errors to generate the rest`);
        }
        await deps.policy.validateOutputDir(path.resolve(cwd, plan.output));

        const summary = await generateScripts(plan, { cwd, skipFinished: args.skip_finished });
        const structured: JsonObject = {
          digest: plan.digest,
          policy_hash: deps.policy.policyHash,
          output_dir: summary.outputDir,
          start_scripts: summary.startScripts,
          skipped: summary.skipped,
          launchers: summary.launchers,
          dist_scripts: summary.distScripts,
          log_path: summary.logPath,
          diagnostics: plan.diagnostics.map(diagnosticJson)
        };
        return {
          content: [{ type: "text", text: `Wrote ${summary.startScripts} start script(s) below ${summary.outputDir}` }],
          structuredContent: structured
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  return mcp;
}
