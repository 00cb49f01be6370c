import { randomBytes } from 'crypto';
import { CloudKind } from '../core/cloud';
import { UninstallError, UninstallJobFailedError, UninstallTimeoutError, errorMessage } from '../core/errors';
import { Logger, pulumiLogger, scoped } from '../core/logger';
import { Clock, systemClock } from '../utils/clock';
import { CliCredentialRefresher, CredentialRefresher } from './credentials';
import { JobClientFactory, kubernetesJobClient } from './job-client';
import { UNINSTALL_NAMESPACE, buildUninstallJob, uninstallJobName } from './job';
import { KubeconfigDocument, extractContextName, parseKubeconfig, usesExecAuth, withBearerToken } from './kubeconfig';
import { PHASE_FOR_DECISION, UninstallPhase, nextDecision } from './state-machine';

export const DEFAULT_UNINSTALL_TIMEOUT_SECONDS = 1800;
export const DEFAULT_POLL_INTERVAL_SECONDS = 10;

export interface UninstallOptions {
  /** JSON or YAML kubeconfig content */
  kubeconfig: string;
  /** Image carrying the byoc-tools binary */
  image: string;
  cloud?: CloudKind;
  namespace?: string;
  timeoutSeconds?: number;
  pollIntervalSeconds?: number;
}

export interface UninstallDeps {
  clock?: Clock;
  credentials?: CredentialRefresher;
  jobClient?: JobClientFactory;
  logger?: Logger;
  /** Random by default; 8 hex characters */
  jobSuffix?: () => string;
}

export interface UninstallResult {
  jobName: string;
  phase: UninstallPhase;
}

const randomSuffix = () => randomBytes(4).toString('hex');

/**
 * Runs the in-cluster uninstall job and waits for it to finish. Resolves when the
 * job succeeded or is gone; rejects when it failed or did not finish in time.
 */
export async function runUninstall(options: UninstallOptions, deps: UninstallDeps = {}): Promise<UninstallResult> {
  const logger = deps.logger ?? pulumiLogger;
  const log = scoped(logger, 'ClusterUninstaller');
  const clock = deps.clock ?? systemClock;

  if (!options.kubeconfig) throw new UninstallError('kubeconfig not provided to uninstaller');
  if (!options.image) throw new UninstallError('image not provided to uninstaller');

  const kubeconfig = await resolveCredentials(
    parseKubeconfig(options.kubeconfig),
    options.cloud,
    deps.credentials ?? new CliCredentialRefresher(),
    log,
  );

  const namespace = options.namespace || UNINSTALL_NAMESPACE;
  const timeoutSeconds = options.timeoutSeconds ?? DEFAULT_UNINSTALL_TIMEOUT_SECONDS;
  const pollIntervalMs = (options.pollIntervalSeconds ?? DEFAULT_POLL_INTERVAL_SECONDS) * 1000;
  const jobName = uninstallJobName((deps.jobSuffix ?? randomSuffix)());
  const jobs = (deps.jobClient ?? kubernetesJobClient)(kubeconfig, log);

  let phase: UninstallPhase = 'pending';
  const enter = (next: UninstallPhase) => {
    log.info(`${jobName}: ${phase} -> ${next}`);
    phase = next;
  };

  log.info(`creating uninstall job ${jobName} in ${namespace} (context ${extractContextName(kubeconfig) ?? 'unknown'})`);
  const created = await jobs.createJob(namespace, buildUninstallJob({ name: jobName, namespace, image: options.image }));
  if (created === 'exists') {
    log.warn(`uninstall job ${jobName} already exists, waiting for it`);
  }
  enter('submitted');

  const startedAt = clock.now();
  for (;;) {
    const observation = await jobs.readJob(namespace, jobName);
    const elapsedMs = clock.now() - startedAt;
    const decision = nextDecision(observation, elapsedMs, timeoutSeconds * 1000);

    switch (decision) {
      case 'continue':
        if (observation.kind === 'present') {
          log.info(`waiting for uninstall job ${jobName}... (active: ${observation.active}, elapsed: ${Math.floor(elapsedMs / 1000)}s)`);
        }
        await clock.sleep(pollIntervalMs);
        continue;
      case 'gone':
        log.warn(`job ${jobName} not found, may have been deleted`);
        enter(PHASE_FOR_DECISION.gone);
        return { jobName, phase };
      case 'succeed':
        enter(PHASE_FOR_DECISION.succeed);
        log.info(`uninstall job ${jobName} completed successfully`);
        return { jobName, phase };
      case 'fail': {
        const logs = await jobs.podLogs(namespace, jobName);
        enter(PHASE_FOR_DECISION.fail);
        throw new UninstallJobFailedError(jobName, logs);
      }
      case 'timeout':
        enter(PHASE_FOR_DECISION.timeout);
        throw new UninstallTimeoutError(jobName, timeoutSeconds);
    }
  }
}

async function resolveCredentials(
  kubeconfig: KubeconfigDocument,
  cloud: CloudKind | undefined,
  refresher: CredentialRefresher,
  log: Logger,
): Promise<KubeconfigDocument> {
  const exec = usesExecAuth(kubeconfig);
  log.info(`kubeconfig auth: exec=${exec}`);
  if (!exec) return kubeconfig;

  try {
    const token = await refresher.refresh(cloud, kubeconfig);
    log.info(`injected ${cloud ?? 'exec plugin'} token: ${token.slice(0, 10)}...`);
    return withBearerToken(kubeconfig, token);
  } catch (error) {
    log.warn(`failed to refresh cluster token, using kubeconfig as is: ${errorMessage(error)}`);
    return kubeconfig;
  }
}
