import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { getEnv, resetEnv, validateEnv } from './env.js';
import { loadPipelineConfig } from './pipelineConfig.js';

const VARIABLES = [
  'PORT',
  'ANALYSIS_WEBHOOK_URL',
  'ANALYSIS_TIMEOUT_SECONDS',
  'MAX_FILE_SIZE_MB',
  'ALLOWED_ORIGINS',
  'SKILLS_TWO_COLUMN_MIN_BULLETS',
  'LOG_PRETTY',
];

describe('validateEnv', () => {
  beforeEach(() => {
    resetEnv();
    for (const name of VARIABLES) {
      vi.stubEnv(name, '');
    }
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    resetEnv();
  });

  it('applies defaults', () => {
    const env = validateEnv();

    expect(env).toMatchObject({
      NODE_ENV: 'test',
      PORT: 8000,
      ANALYSIS_WEBHOOK_URL: 'http://localhost:5678/webhook/resume',
      ANALYSIS_TIMEOUT_SECONDS: 120,
      MAX_FILE_SIZE_MB: 5,
      ALLOWED_ORIGINS: ['*'],
      SKILLS_TWO_COLUMN_MIN_BULLETS: 6,
      LOG_PRETTY: false,
    });
  });

  it('parses a list of allowed origins', () => {
    vi.stubEnv('ALLOWED_ORIGINS', 'http://localhost:5173, https://app.test ,');

    expect(validateEnv().ALLOWED_ORIGINS).toEqual(['http://localhost:5173', 'https://app.test']);
  });

  it('reports every invalid variable at once', () => {
    vi.stubEnv('PORT', '70000');
    vi.stubEnv('ANALYSIS_WEBHOOK_URL', 'ftp://analysis.test');
    vi.stubEnv('MAX_FILE_SIZE_MB', '0');

    expect(() => validateEnv()).toThrow(
      [
        'Environment variable validation failed:',
        '  - PORT: Invalid value "70000". Must be between 1 and 65535.',
        '  - ANALYSIS_WEBHOOK_URL: Invalid value "ftp://analysis.test". Must be an http(s) URL.',
        '  - MAX_FILE_SIZE_MB: Invalid value "0". Must be greater than 0.',
      ].join('\n')
    );
  });

  it('caches the validated environment until reset', () => {
    const first = getEnv();
    vi.stubEnv('PORT', '9000');

    expect(getEnv()).toBe(first);

    resetEnv();
    expect(getEnv().PORT).toBe(9000);
  });
});

describe('loadPipelineConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetEnv();
  });

  it('converts units into the pipeline configuration', () => {
    resetEnv();
    vi.stubEnv('MAX_FILE_SIZE_MB', '2');
    vi.stubEnv('ANALYSIS_TIMEOUT_SECONDS', '30');
    vi.stubEnv('SKILLS_TWO_COLUMN_MIN_BULLETS', '4');

    const config = loadPipelineConfig(validateEnv());

    expect(config.maxUploadBytes).toBe(2 * 1024 * 1024);
    expect(config.analysis.timeoutMs).toBe(30000);
    expect(config.layout.twoColumnMinBullets).toBe(4);
    expect(Object.isFrozen(config)).toBe(true);
  });
});
