/**
 * Configuration Unit Tests
 *
 * Config is read at import time, so each test stubs the environment and
 * re-imports the module.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';

async function loadConfig() {
  vi.resetModules();
  return import('../../src/config.js');
}

describe('validateConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should accept the defaults', async () => {
    vi.stubEnv('LOG_LEVEL', 'warning');
    const { validateConfig } = await loadConfig();

    expect(validateConfig()).toEqual({ valid: true, errors: [] });
  });

  it('should reject an unknown LOG_LEVEL', async () => {
    vi.stubEnv('LOG_LEVEL', 'verbose');
    const { validateConfig } = await loadConfig();

    expect(validateConfig()).toEqual({
      valid: false,
      errors: ['LOG_LEVEL must be one of debug, info, warning, error, critical (got "verbose")'],
    });
  });

  it('should skip the LOG_LEVEL check when --loglevel overrides it', async () => {
    vi.stubEnv('LOG_LEVEL', 'verbose');
    const { validateConfig } = await loadConfig();

    expect(validateConfig({ logLevelOverridden: true })).toEqual({ valid: true, errors: [] });
  });

  it('should reject a malformed schedule URL', async () => {
    vi.stubEnv('ESPN_SCHEDULE_URL', 'not a url');
    const { validateConfig } = await loadConfig();

    expect(validateConfig().errors).toEqual(['ESPN_SCHEDULE_URL is not a valid URL: not a url']);
  });
});
