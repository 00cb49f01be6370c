import { ConfigReader, loadConfig } from '../../src/core/config';
import { ByocError } from '../../src/core/errors';

function reader(values: Record<string, string>): ConfigReader {
  return {
    get: (key) => values[key],
    getSecret: (key) => values[key],
  };
}

const required = {
  apiUrl: 'https://api.test',
  apiKey: 'test-user-key',
  authDomain: 'https://auth.test',
  cloud: 'AWS',
  region: 'us-east-1',
};

describe('loadConfig', () => {
  it('fills defaults around the required settings', () => {
    expect(loadConfig(reader(required))).toEqual({
      apiUrl: 'https://api.test',
      apiKey: 'test-user-key',
      authDomain: 'https://auth.test',
      cloud: 'aws',
      region: 'us-east-1',
      globalEnv: 'prod',
      projectName: 'sli-checkers',
      maxRetries: 3,
      retryBaseDelayMs: 2000,
      uninstallImage: undefined,
      uninstallTimeoutSeconds: 1800,
      uninstallPollIntervalSeconds: 10,
    });
  });

  it('reads overrides', () => {
    const config = loadConfig(
      reader({ ...required, globalEnv: 'staging', maxRetries: '0', uninstallImage: 'registry.test/byoc-tools:1.0.0' }),
    );

    expect(config).toMatchObject({ globalEnv: 'staging', maxRetries: 0, uninstallImage: 'registry.test/byoc-tools:1.0.0' });
  });

  it('names a missing key', () => {
    const { region: _region, ...rest } = required;

    expect(() => loadConfig(reader(rest))).toThrow("Missing required configuration variable 'byoc:region'");
  });

  it('rejects an unknown cloud', () => {
    expect(() => loadConfig(reader({ ...required, cloud: 'oracle' }))).toThrow(
      new ByocError('byoc:cloud must be one of aws, gcp, azure, got "oracle"'),
    );
  });

  it('rejects negative or fractional numbers', () => {
    expect(() => loadConfig(reader({ ...required, maxRetries: '-1' }))).toThrow(
      'byoc:maxRetries must be an integer >= 0, got "-1"',
    );
    expect(() => loadConfig(reader({ ...required, uninstallPollIntervalSeconds: '0.5' }))).toThrow(
      'byoc:uninstallPollIntervalSeconds must be an integer >= 1, got "0.5"',
    );
  });
});
