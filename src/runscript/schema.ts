import * as z from "zod/v4";

const namePattern = /^[A-Za-z0-9_-]+$/;
const versionPattern = /^[0-9a-zA-Z._-]+$/;

export const zName = z.string().regex(namePattern, "names may only contain letters, digits, '_' and '-'");
export const zVersion = z.string().regex(versionPattern, "invalid version");

/** `[[h:]m:]s` or integer seconds. */
export const zDuration = z.union([
  z.number().int().min(0),
  z.string().regex(/^[0-9]+(:[0-9]+(:[0-9]+)?)?$/, "expected [[h:]m:]s")
]);

/** Tag sets may be written as one space separated string or as a list. */
export const zTagSet = z.union([z.string(), z.array(zName)]);

export const zCmdline = z.string();

export const zEncodingDecl = z.union([
  z.string().min(1),
  z.object({
    file: z.string().min(1),
    tag: z.string().optional()
  })
]);

export const zVariableDecl = z.object({
  cmd: z.string().min(1),
  values: z.union([z.string(), z.number(), z.array(z.union([z.string(), z.number()]))]),
  post: z.boolean().default(false)
});

export const zSettingDecl = z.object({
  name: zName,
  cmdline: zCmdline.optional(),
  cmdline_post: zCmdline.optional(),
  tag: zTagSet.optional(),
  dist_template: z.string().min(1).optional(),
  dist_options: z.string().optional(),
  encodings: z.array(zEncodingDecl).default([]),
  variables: z.array(zVariableDecl).default([])
});

export const zSystemDecl = z.object({
  name: zName,
  version: zVersion,
  measures: zName.default("clasp"),
  config: zName,
  cmdline: zCmdline.optional(),
  cmdline_post: zCmdline.optional(),
  settings: z.array(zSettingDecl).min(1)
});

export const zMachineDecl = z.object({
  name: zName,
  cpu: z.string().default(""),
  memory: z.string().default("")
});

export const zConfigDecl = z.object({
  name: zName,
  template: z.string().min(1)
});

const zJobCommon = {
  name: zName,
  timeout: zDuration,
  runs: z.number().int().min(1),
  memout: z.number().int().min(1).optional(),
  template_options: z.record(z.string().regex(/^[a-z_][a-z0-9_]*$/), z.union([z.string(), z.number()])).default({})
};

export const zSeqJobDecl = z.object({
  ...zJobCommon,
  type: z.literal("seq"),
  parallel: z.number().int().min(1)
});

export const zDistJobDecl = z.object({
  ...zJobCommon,
  type: z.literal("dist"),
  script_mode: z.enum(["multi", "timeout"]),
  walltime: zDuration,
  cpt: z.number().int().min(1),
  partition: z.string().min(1).optional()
});

export const zJobDecl = z.discriminatedUnion("type", [zSeqJobDecl, zDistJobDecl]);

const zInstanceAttrs = {
  tag: zTagSet.optional(),
  cmdline: zCmdline.optional(),
  cmdline_post: zCmdline.optional(),
  encoding_tag: zTagSet.optional(),
  encodings: z.array(zEncodingDecl).default([])
};

export const zFolderDecl = z.object({
  ...zInstanceAttrs,
  path: z.string().min(1),
  group: z.boolean().default(false),
  ignore: z.array(z.string().min(1)).default([])
});

export const zFileEntryDecl = z.object({
  file: z.string().min(1),
  group: z.string().min(1).optional(),
  tag: zTagSet.optional(),
  cmdline: zCmdline.optional(),
  cmdline_post: zCmdline.optional(),
  encoding_tag: zTagSet.optional(),
  encodings: z.array(zEncodingDecl).default([])
});

export const zFilesDecl = z.object({
  ...zInstanceAttrs,
  path: z.string().min(1),
  add: z.array(zFileEntryDecl).min(1)
});

export const zSpecRefDecl = z.object({
  path: z.string().min(1),
  instance_tag: z.string().optional()
});

export const zBenchmarkDecl = z.object({
  name: zName,
  folders: z.array(zFolderDecl).default([]),
  files: z.array(zFilesDecl).default([]),
  specs: z.array(zSpecRefDecl).default([])
});

export const zRunTagDecl = z.object({
  machine: zName,
  benchmark: zName,
  tag: z.string()
});

export const zRunSpecDecl = z.object({
  machine: zName,
  benchmark: zName,
  system: zName,
  version: zVersion,
  setting: zName
});

export const zProjectDecl = z.object({
  name: zName,
  job: zName,
  runs: z.array(z.union([z.strictObject(zRunSpecDecl.shape), z.strictObject(zRunTagDecl.shape)])).default([])
});

export const zRunscriptDecl = z.object({
  output: z.string().min(1),
  machines: z.array(zMachineDecl).default([]),
  configs: z.array(zConfigDecl).default([]),
  systems: z.array(zSystemDecl).default([]),
  jobs: z.array(zJobDecl).default([]),
  benchmarks: z.array(zBenchmarkDecl).default([]),
  projects: z.array(zProjectDecl).default([])
});

/** A nested `spec.yaml` below a benchmark `specs` root. Paths are relative to the file. */
export const zSpecClassDecl = z.object({
  ...zInstanceAttrs,
  name: z.string().min(1),
  folders: z.array(zFolderDecl).default([]),
  instances: z.array(zFileEntryDecl).default([])
});

export const zSpecFileDecl = z.object({
  classes: z.array(zSpecClassDecl).default([])
});

export type EncodingDecl = z.infer<typeof zEncodingDecl>;
export type VariableDecl = z.infer<typeof zVariableDecl>;
export type SettingDecl = z.infer<typeof zSettingDecl>;
export type SystemDecl = z.infer<typeof zSystemDecl>;
export type JobDecl = z.infer<typeof zJobDecl>;
export type FolderDecl = z.infer<typeof zFolderDecl>;
export type FileEntryDecl = z.infer<typeof zFileEntryDecl>;
export type FilesDecl = z.infer<typeof zFilesDecl>;
export type BenchmarkDecl = z.infer<typeof zBenchmarkDecl>;
export type ProjectDecl = z.infer<typeof zProjectDecl>;
export type RunscriptDecl = z.infer<typeof zRunscriptDecl>;
export type SpecClassDecl = z.infer<typeof zSpecClassDecl>;
export type SpecFileDecl = z.infer<typeof zSpecFileDecl>;
