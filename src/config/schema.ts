/**
 * Configuration schema for fits-regress
 */

import os from "node:os";
import { z } from "zod";

/**
 * Tolerance applied to numeric data; both zero means exact equality
 */
export const ToleranceSchema = z.object({
  absolute: z.number().min(0).default(0),
  relative: z.number().min(0).default(0),
});

/**
 * A pipeline executable and the inputs it processes.
 * `match` is a selector expression over the primary input header.
 */
export const PipelineSchema = z.object({
  name: z.string().min(1),
  executable: z.string().min(1),
  args: z.array(z.string()).default([]),
  match: z.string().min(1),
});

export type Pipeline = z.infer<typeof PipelineSchema>;

export const DEFAULT_PIPELINES: Pipeline[] = [
  { name: "calacs", executable: "calacs.e", args: ["-v", "-1"], match: "INSTRUME=ACS" },
  { name: "calstis", executable: "calstis.e", args: ["-v", "-1"], match: "INSTRUME=STIS" },
  { name: "calwf3", executable: "calwf3.e", args: ["-v", "-1"], match: "INSTRUME=WFC3" },
];

/**
 * A named alternative set of pipelines with an optional input selector
 */
export const ProfileSchema = z.object({
  pipelines: z.array(PipelineSchema).min(1),
  selector: z.string().optional(),
});

export type Profile = z.infer<typeof ProfileSchema>;

export const DEFAULT_PROFILES: Record<string, Profile> = {
  cte: {
    pipelines: [
      { name: "wf3cte", executable: "wf3cte.e", args: ["-v", "-1"], match: "INSTRUME=WFC3" },
      { name: "wf3cte", executable: "wf3cte.e", args: ["-v", "-1"], match: "INSTRUME=ACS" },
    ],
    selector: "PCTECORR=PERFORM",
  },
};

export const ExecutionConfigSchema = z.object({
  concurrency: z.number().int().min(1).default(os.availableParallelism()),
  timeoutMs: z.number().int().min(1).default(3_600_000),
  /** Time a terminated child gets between SIGTERM and SIGKILL */
  graceMs: z.number().int().min(0).default(5_000),
});

export type ExecutionConfig = z.infer<typeof ExecutionConfigSchema>;

export const DiscoveryConfigSchema = z.object({
  primarySuffixes: z.array(z.string().min(1)).min(1).default(["raw.fits"]),
  maxDepth: z.number().int().min(0).default(16),
});

export type DiscoveryConfig = z.infer<typeof DiscoveryConfigSchema>;

export const ComparisonConfigSchema = z.object({
  tolerance: ToleranceSchema.default({}),
  ignoreKeywords: z.array(z.string()).default(["DATE"]),
  artifactSuffixes: z.array(z.string().min(1)).min(1).default([".fits"]),
});

export type ComparisonConfig = z.infer<typeof ComparisonConfigSchema>;

export const LoggingConfigSchema = z.object({
  level: z.enum(["silly", "trace", "debug", "info", "warn", "error", "fatal"]).default("info"),
  logToFile: z.boolean().default(false),
});

/**
 * Complete configuration schema
 */
export const HarnessConfigSchema = z.object({
  execution: ExecutionConfigSchema.default({}),
  discovery: DiscoveryConfigSchema.default({}),
  comparison: ComparisonConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  pipelines: z.array(PipelineSchema).min(1).default(DEFAULT_PIPELINES),
  profiles: z.record(z.string(), ProfileSchema).default(DEFAULT_PROFILES),
});

export type HarnessConfig = z.infer<typeof HarnessConfigSchema>;

/**
 * Configuration with every default applied
 */
export function createDefaultConfig(): HarnessConfig {
  return HarnessConfigSchema.parse({});
}

/**
 * Validate a configuration object
 */
export function validateConfig(config: unknown): {
  success: boolean;
  data?: HarnessConfig;
  error?: z.ZodError;
} {
  const result = HarnessConfigSchema.safeParse(config);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}
