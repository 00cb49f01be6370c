import * as pulumi from '@pulumi/pulumi';
import { DEFAULT_BASE_DELAY_MS, DEFAULT_MAX_RETRIES } from '../api/client';
import { DEFAULT_POLL_INTERVAL_SECONDS, DEFAULT_UNINSTALL_TIMEOUT_SECONDS } from '../uninstaller/uninstall';
import { CloudKind, CLOUDS, isCloudKind } from './cloud';
import { ByocError } from './errors';

export const CONFIG_NAMESPACE = 'byoc';

/** The subset of `pulumi.Config` the loader reads through. */
export interface ConfigReader {
  get(key: string): string | undefined;
  getSecret(key: string): pulumi.Input<string> | undefined;
}

export interface ByocConfig {
  apiUrl: string;
  /** Secret; stays wrapped so it is never written to state in plain text */
  apiKey: pulumi.Input<string>;
  authDomain: string;
  cloud: CloudKind;
  region: string;
  globalEnv: string;
  projectName: string;
  maxRetries: number;
  retryBaseDelayMs: number;
  uninstallImage?: string;
  uninstallTimeoutSeconds: number;
  uninstallPollIntervalSeconds: number;
}

export const DEFAULT_GLOBAL_ENV = 'prod';
export const DEFAULT_PROJECT_NAME = 'sli-checkers';

/**
 * Reads the `byoc:*` stack configuration, filling defaults and validating
 * values up front so a bad setting fails before any remote call.
 */
export function loadConfig(reader: ConfigReader = new pulumi.Config(CONFIG_NAMESPACE)): ByocConfig {
  const required = (key: string): string => {
    const value = reader.get(key);
    if (!value) {
      throw new ByocError(`Missing required configuration variable '${CONFIG_NAMESPACE}:${key}'`);
    }
    return value;
  };

  const apiKey = reader.getSecret('apiKey');
  if (apiKey === undefined || apiKey === '') {
    throw new ByocError(`Missing required configuration variable '${CONFIG_NAMESPACE}:apiKey'`);
  }

  const cloud = required('cloud').toLowerCase();
  if (!isCloudKind(cloud)) {
    throw new ByocError(`${CONFIG_NAMESPACE}:cloud must be one of ${CLOUDS.join(', ')}, got "${cloud}"`);
  }

  return {
    apiUrl: required('apiUrl'),
    apiKey,
    authDomain: required('authDomain'),
    cloud,
    region: required('region'),
    globalEnv: reader.get('globalEnv') || DEFAULT_GLOBAL_ENV,
    projectName: reader.get('projectName') || DEFAULT_PROJECT_NAME,
    maxRetries: count(reader, 'maxRetries', DEFAULT_MAX_RETRIES),
    retryBaseDelayMs: count(reader, 'retryBaseDelayMs', DEFAULT_BASE_DELAY_MS),
    uninstallImage: reader.get('uninstallImage') || undefined,
    uninstallTimeoutSeconds: count(reader, 'uninstallTimeoutSeconds', DEFAULT_UNINSTALL_TIMEOUT_SECONDS, 1),
    uninstallPollIntervalSeconds: count(reader, 'uninstallPollIntervalSeconds', DEFAULT_POLL_INTERVAL_SECONDS, 1),
  };
}

function count(reader: ConfigReader, key: string, fallback: number, min = 0): number {
  const raw = reader.get(key);
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ByocError(`${CONFIG_NAMESPACE}:${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}
