import { describe, it, expect } from 'vitest';
import path from 'path';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('applies defaults relative to the working directory', () => {
    expect(loadConfig({}, '/work')).toEqual({
      sourceRoot: path.join('/work', 'source_folder'),
      destRoot: path.join('/work', 'renaming_jsons'),
      collectionsRoot: path.join('/work', 'collections'),
      modelsFile: path.join('/work', 'config/models.yaml'),
      apiToken: '',
      port: 3102,
      logLevel: 'info',
      reportsEnabled: false,
      reportsDir: path.join('/work', 'reports'),
    });
  });

  it('keeps absolute paths and coerces the port', () => {
    const config = loadConfig({ TCR_SOURCE_ROOT: '/data/in', PORT: '8080', LOG_LEVEL: 'debug', TCR_API_TOKEN: 'test-token' }, '/work');
    expect(config.sourceRoot).toBe('/data/in');
    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe('debug');
    expect(config.apiToken).toBe('test-token');
  });

  it('reads the report settings', () => {
    const config = loadConfig({ TCR_REPORTS_ENABLED: 'true', TCR_REPORTS_DIR: 'out/reports' }, '/work');
    expect(config.reportsEnabled).toBe(true);
    expect(config.reportsDir).toBe(path.join('/work', 'out/reports'));
  });

  it('rejects a report toggle other than true or false', () => {
    expect(() => loadConfig({ TCR_REPORTS_ENABLED: 'yes' }, '/work')).toThrow();
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'loud' }, '/work')).toThrow();
  });
});
