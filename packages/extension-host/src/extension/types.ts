/**
 * Extension metadata and capability payloads.
 *
 * Payload shapes mirror the JSON a guest reads and writes, so snake_case
 * keys (e.g. `start_line`) are kept as-is. ExtensionInfo is the exception:
 * it is parsed once at load time into a camelCase host-side record.
 */

import { z } from 'zod';

export const EXTENSION_TYPES = ['frontend', 'backend', 'transform', 'validator'] as const;

export const ExtensionTypeSchema = z.enum(EXTENSION_TYPES);
export type ExtensionType = z.infer<typeof ExtensionTypeSchema>;

const optionalString = z
  .string()
  .nullish()
  .transform((v) => v ?? undefined);

export const ExtensionInfoSchema = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    version: z.string(),
    description: optionalString,
    types: z.array(ExtensionTypeSchema).default([]),
    author: optionalString,
    homepage: optionalString,
    license: optionalString,
    min_sdk_version: optionalString,
    /** Source languages a frontend accepts (e.g. "gleam"). */
    languages: z.array(z.string()).optional(),
    /** Target languages a backend emits. */
    targets: z.array(z.string()).optional(),
  })
  .transform(({ min_sdk_version, types, ...rest }) => ({
    ...rest,
    types: [...new Set(types)],
    minSdkVersion: min_sdk_version,
  }));

export type ExtensionInfo = Readonly<z.output<typeof ExtensionInfoSchema>>;

export const ExtensionCapabilitiesSchema = z
  .object({
    streaming: z.boolean().default(false),
    incremental: z.boolean().default(false),
    cancellation: z.boolean().default(false),
    progress: z.boolean().default(false),
  })
  .catchall(z.boolean());

export type ExtensionCapabilities = z.output<typeof ExtensionCapabilitiesSchema>;

export const DEFAULT_CAPABILITIES: ExtensionCapabilities = {
  streaming: false,
  incremental: false,
  cancellation: false,
  progress: false,
};

/** 256 MiB, the ceiling applied to every sandbox instance. */
export const DEFAULT_MAX_MEMORY_BYTES = 256 * 1024 * 1024;

export const ResourceLimitsSchema = z.object({
  /** Linear memory ceiling in bytes. */
  maxMemoryBytes: z.number().int().positive().optional(),
  /** Wall-clock budget per call. */
  maxTimeMs: z.number().int().positive().optional(),
  /** Host-call budget per call (one unit per host function invocation). */
  maxFuel: z.number().int().positive().optional(),
});

export type ResourceLimits = z.infer<typeof ResourceLimitsSchema>;

// ── Diagnostics ──

export const DiagnosticSeveritySchema = z.enum(['error', 'warning', 'info', 'hint']);
export type DiagnosticSeverity = z.infer<typeof DiagnosticSeveritySchema>;

export const SourceLocationSchema = z.object({
  file: z.string(),
  start_line: z.number().int().default(0),
  start_col: z.number().int().default(0),
  end_line: z.number().int().default(0),
  end_col: z.number().int().default(0),
});

export type SourceLocation = z.infer<typeof SourceLocationSchema>;

export const DiagnosticSchema = z.object({
  severity: DiagnosticSeveritySchema,
  code: z.string().optional(),
  message: z.string(),
  location: SourceLocationSchema.optional(),
  related: z
    .array(z.object({ location: SourceLocationSchema, message: z.string() }))
    .default([]),
});

export type Diagnostic = z.infer<typeof DiagnosticSchema>;

// ── Capability requests / results ──

const OptionsSchema = z.record(z.unknown()).default({});

export const SourceFileSchema = z.object({
  path: z.string(),
  content: z.string(),
});

export type SourceFile = z.infer<typeof SourceFileSchema>;

export const CompileRequestSchema = z.object({
  sources: z.array(SourceFileSchema),
  options: OptionsSchema,
});

export type CompileRequest = z.input<typeof CompileRequestSchema>;

export const CompileResultSchema = z.object({
  success: z.boolean(),
  ir: z.unknown().optional(),
  diagnostics: z.array(DiagnosticSchema).default([]),
});

export type CompileResult = z.infer<typeof CompileResultSchema>;

export const GenerateRequestSchema = z.object({
  ir: z.unknown(),
  options: OptionsSchema,
});

export type GenerateRequest = z.input<typeof GenerateRequestSchema>;

export const ArtifactSchema = z.object({
  path: z.string(),
  content: z.string(),
  /** Content is base64 when true. */
  binary: z.boolean().default(false),
});

export type Artifact = z.infer<typeof ArtifactSchema>;

export const GenerateResultSchema = z.object({
  success: z.boolean(),
  artifacts: z.array(ArtifactSchema).default([]),
  diagnostics: z.array(DiagnosticSchema).default([]),
});

export type GenerateResult = z.infer<typeof GenerateResultSchema>;

export const ValidateRequestSchema = z.object({
  ir: z.unknown(),
  options: OptionsSchema,
});

export type ValidateRequest = z.input<typeof ValidateRequestSchema>;

export const ValidateResultSchema = z.object({
  valid: z.boolean(),
  diagnostics: z.array(DiagnosticSchema).default([]),
});

export type ValidateResult = z.infer<typeof ValidateResultSchema>;

export const TransformRequestSchema = z.object({
  ir: z.unknown(),
  options: OptionsSchema,
});

export type TransformRequest = z.input<typeof TransformRequestSchema>;

export const TransformResultSchema = z.object({
  success: z.boolean(),
  ir: z.unknown().optional(),
  diagnostics: z.array(DiagnosticSchema).default([]),
});

export type TransformResult = z.infer<typeof TransformResultSchema>;

/** Answer to the `get_workspace_info` host call. */
export interface WorkspaceInfo {
  root: string;
  output_dir: string;
}
