import * as z from "zod/v4";

export const zSha256 = z.string().regex(/^sha256:[a-f0-9]{64}$/);
export const zRunDescriptorId = z.string().regex(/^run_[0-9A-HJKMNP-TV-Z]{26}$/, "invalid run descriptor id");
export const zBatchId = z.string().regex(/^batch_[0-9A-HJKMNP-TV-Z]{26}$/, "invalid batch id");

export const zDiagnostic = z.object({
  severity: z.enum(["error", "warning"]),
  kind: z.enum(["reference", "structural", "filesystem", "selection"]),
  scope: z.string(),
  message: z.string()
});

const zRunscriptRef = {
  runscript_path: z.string().min(1),
  projects: z.array(z.string().min(1)).min(1).optional()
};

export const zRunscriptValidateInput = z.object(zRunscriptRef);

export const zProjectSummary = z.object({
  name: z.string(),
  job: z.string(),
  job_kind: z.enum(["seq", "dist"]),
  descriptor_count: z.number().int(),
  batch_count: z.number().int()
});

export const zRunscriptValidateOutput = z.object({
  valid: z.boolean(),
  error_count: z.number().int(),
  warning_count: z.number().int(),
  diagnostics: z.array(zDiagnostic),
  projects: z.array(zProjectSummary),
  digest: zSha256,
  policy_hash: zSha256
});

export const zRunscriptPlanInput = z.object({
  ...zRunscriptRef,
  preview_limit: z.number().int().min(0).max(10000).optional()
});

export const zDescriptorPreview = z.object({
  id: zRunDescriptorId,
  machine: z.string(),
  system: z.string(),
  version: z.string(),
  setting: z.string(),
  benchmark: z.string(),
  class_name: z.string(),
  instance: z.string(),
  run: z.number().int(),
  path: z.string(),
  args: z.string(),
  args_post: z.string(),
  encodings: z.array(z.string()),
  timeout: z.number().int()
});

export const zBatchSummary = z.object({
  id: zBatchId,
  machine: z.string(),
  sequence: z.number().int(),
  runs: z.number().int(),
  walltime: z.number().int(),
  partition: z.string()
});

export const zRunscriptPlanOutput = z.object({
  digest: zSha256,
  policy_hash: zSha256,
  output: z.string(),
  diagnostics: z.array(zDiagnostic),
  projects: z.array(
    zProjectSummary.extend({
      descriptors: z.array(zDescriptorPreview),
      truncated: z.boolean(),
      batches: z.array(zBatchSummary)
    })
  )
});

export const zRunscriptGenerateInput = z.object({
  ...zRunscriptRef,
  skip_finished: z.boolean().default(true),
  allow_errors: z.boolean().default(false)
});

export const zRunscriptGenerateOutput = z.object({
  digest: zSha256,
  policy_hash: zSha256,
  output_dir: z.string(),
  start_scripts: z.number().int(),
  skipped: z.number().int(),
  launchers: z.array(z.string()),
  dist_scripts: z.array(z.string()),
  log_path: z.string(),
  diagnostics: z.array(zDiagnostic)
});
