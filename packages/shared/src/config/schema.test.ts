import { describe, it, expect } from 'vitest';
import { ConfigSchema, DEFAULT_CONFIG, DEFAULT_REPORT_FILE } from './schema';

describe('ConfigSchema', () => {
  it('fills every section with defaults', () => {
    expect(DEFAULT_CONFIG).toEqual({
      configVersion: 1,
      scan: { concurrency: 16, excludes: [], precision: 'ms' },
      report: { output: 'build_profile.csv', timeZone: 'local', relativePaths: false },
      build: {},
      logging: { level: 'info' },
    });
  });

  it('names the report after the profiled build', () => {
    expect(DEFAULT_REPORT_FILE).toBe('build_profile.csv');
    expect(DEFAULT_CONFIG.report.output).toBe(DEFAULT_REPORT_FILE);
  });

  it('keeps explicit values', () => {
    const config = ConfigSchema.parse({
      scan: { concurrency: 2, precision: 's' },
      report: { timeZone: 'utc' },
    });
    expect(config.scan).toEqual({ concurrency: 2, excludes: [], precision: 's' });
    expect(config.report.timeZone).toBe('utc');
  });

  it('rejects a zero concurrency', () => {
    const result = ConfigSchema.safeParse({ scan: { concurrency: 0 } });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['scan', 'concurrency']);
    }
  });

  it('rejects an unknown time zone mode', () => {
    expect(ConfigSchema.safeParse({ report: { timeZone: 'mars' } }).success).toBe(false);
  });
});
