import { z } from 'zod';

export const TimestampPrecisionSchema = z.enum(['ms', 's']);
export type TimestampPrecision = z.infer<typeof TimestampPrecisionSchema>;

export const ScanConfigSchema = z.object({
  concurrency: z.number().int().min(1).max(256).default(16),
  excludes: z.array(z.string()).default([]),
  precision: TimestampPrecisionSchema.default('ms'),
});
export type ScanConfig = z.infer<typeof ScanConfigSchema>;

/** Written to the working directory unless `report.output` says otherwise */
export const DEFAULT_REPORT_FILE = 'build_profile.csv';

export const ReportConfigSchema = z.object({
  output: z.string().min(1).default(DEFAULT_REPORT_FILE),
  timeZone: z.enum(['local', 'utc']).default('local'),
  relativePaths: z.boolean().default(false),
});
export type ReportConfig = z.infer<typeof ReportConfigSchema>;

export const BuildConfigSchema = z.object({
  timeoutMs: z.number().int().positive().optional().describe('Kill the build after this long'),
  shell: z.string().optional().describe('Shell used to run the build command'),
});
export type BuildConfig = z.infer<typeof BuildConfigSchema>;

export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  eventsPath: z.string().optional().describe('Append profiler events to this JSONL file'),
});
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  scan: ScanConfigSchema.default({}),
  report: ReportConfigSchema.default({}),
  build: BuildConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

/** Shape accepted from YAML files and CLI flags before defaults are applied */
export type ConfigInput = z.input<typeof ConfigSchema>;

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});
