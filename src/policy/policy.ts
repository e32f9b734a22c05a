import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { McpError, ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { sha256Prefixed, stableJsonStringify } from "../core/canonicalJson.js";
import { formatZodIssues } from "../runscript/loader.js";

const zPolicyConfig = z.object({
  version: z.number().int(),
  tool_allowlist: z.array(z.string()),
  paths: z.object({
    runscript_prefix_allowlist: z.array(z.string()).default([]),
    output_prefix_allowlist: z.array(z.string()).default([]),
    deny_symlinks: z.boolean().optional()
  }),
  quotas: z.object({
    max_run_descriptors: z.number().int().min(1),
    max_preview_descriptors: z.number().int().min(0).optional()
  })
});

export type PolicyConfig = z.infer<typeof zPolicyConfig>;

function expandEnvToken(value: string): string | null {
  const trimmed = value.trim();

  const m1 = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed);
  if (m1) {
    const varName = m1[1];
    if (!varName) return null;
    const v = process.env[varName]?.trim();
    return v ? v : null;
  }

  const m2 = /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (m2) {
    const varName = m2[1];
    if (!varName) return null;
    const v = process.env[varName]?.trim();
    return v ? v : null;
  }

  return value;
}

function expandPrefixes(prefixes: readonly string[]): string[] {
  return prefixes
    .map((p) => expandEnvToken(p))
    .filter((p): p is string => typeof p === "string" && p.trim().length > 0);
}

function expandPolicyEnv(policy: PolicyConfig): PolicyConfig {
  return {
    ...policy,
    paths: {
      ...policy.paths,
      runscript_prefix_allowlist: expandPrefixes(policy.paths.runscript_prefix_allowlist),
      output_prefix_allowlist: expandPrefixes(policy.paths.output_prefix_allowlist)
    }
  };
}

/** Real path of `p`, or of its closest existing ancestor with the rest appended. */
async function realpathOfExistingPrefix(p: string): Promise<string> {
  const resolved = path.resolve(p);
  try {
    return await fs.realpath(resolved);
  } catch (err) {
    const notFound = typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
    const parent = path.dirname(resolved);
    if (!notFound || parent === resolved) throw err;
    return path.join(await realpathOfExistingPrefix(parent), path.basename(resolved));
  }
}

function isWithin(candidate: string, prefix: string): boolean {
  return candidate === prefix || candidate.startsWith(prefix + path.sep);
}

export class PolicyEngine {
  readonly policyHash: `sha256:${string}`;

  constructor(private readonly policy: PolicyConfig) {
    this.policyHash = sha256Prefixed(stableJsonStringify(policy));
  }

  static parse(raw: unknown, source: string): PolicyEngine {
    const parsed = zPolicyConfig.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`invalid policy at ${source}: ${formatZodIssues(parsed.error.issues).join("; ")}`);
    }
    return new PolicyEngine(expandPolicyEnv(parsed.data));
  }

  static async loadFromFile(filePath: string): Promise<PolicyEngine> {
    const raw = await fs.readFile(filePath, "utf8");
    return PolicyEngine.parse(YAML.parse(raw) as unknown, filePath);
  }

  snapshot(): PolicyConfig {
    return structuredClone(this.policy);
  }

  previewCap(): number {
    return this.policy.quotas.max_preview_descriptors ?? 50;
  }

  assertToolAllowed(toolName: string): void {
    if (!this.policy.tool_allowlist.includes(toolName)) {
      throw new McpError(ErrorCode.InvalidRequest, `policy denied tool: ${toolName}`);
    }
  }

  enforceDescriptorQuota(count: number): void {
    const max = this.policy.quotas.max_run_descriptors;
    if (count > max) {
      throw new McpError(ErrorCode.InvalidRequest, `policy denied plan with ${count} run descriptors (max ${max})`);
    }
  }

  private async allowedBy(real: string, prefixes: readonly string[]): Promise<boolean> {
    const allow = await Promise.all(prefixes.map(async (prefix) => isWithin(real, await realpathOfExistingPrefix(prefix))));
    return allow.some(Boolean);
  }

  /** Resolves a runscript path the policy lets tools read. */
  async validateRunscriptPath(sourcePath: string): Promise<string> {
    const resolved = path.resolve(sourcePath);
    let real: string;
    try {
      real = await fs.realpath(resolved);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new McpError(ErrorCode.InvalidParams, `cannot read runscript ${resolved}: ${reason}`);
    }

    const denySymlinks = this.policy.paths.deny_symlinks ?? true;
    if (denySymlinks && real !== resolved) {
      throw new McpError(ErrorCode.InvalidRequest, `policy denied symlinked path: ${resolved}`);
    }

    if (!(await this.allowedBy(real, this.policy.paths.runscript_prefix_allowlist))) {
      throw new McpError(ErrorCode.InvalidRequest, `policy denied runscript outside allowlist: ${real}`);
    }

    const st = await fs.stat(real);
    if (!st.isFile()) {
      throw new McpError(ErrorCode.InvalidRequest, `policy denied runscript (not a file): ${real}`);
    }
    return real;
  }

  /** Paths a runscript names for reading fall under the runscript allowlist. */
  async validateReadPath(p: string): Promise<string> {
    const real = await realpathOfExistingPrefix(p);
    if (!(await this.allowedBy(real, this.policy.paths.runscript_prefix_allowlist))) {
      throw new McpError(ErrorCode.InvalidRequest, `policy denied read outside allowlist: ${real}`);
    }
    return real;
  }

  /** Resolves an output directory the policy lets tools write below. It need not exist yet. */
  async validateOutputDir(outputDir: string): Promise<string> {
    const real = await realpathOfExistingPrefix(outputDir);
    if (!(await this.allowedBy(real, this.policy.paths.output_prefix_allowlist))) {
      throw new McpError(ErrorCode.InvalidRequest, `policy denied output directory outside allowlist: ${real}`);
    }
    return real;
  }
}
