import * as k8s from '@kubernetes/client-node';
import { UninstallError, errorMessage } from '../core/errors';
import { Logger } from '../core/logger';
import { KubeconfigDocument } from './kubeconfig';
import { JobObservation } from './state-machine';

/** The slice of the Kubernetes API the uninstall driver needs. */
export interface JobClient {
  /** Resolves `exists` when a job with the same name is already there. */
  createJob(namespace: string, job: k8s.V1Job): Promise<'created' | 'exists'>;
  readJob(namespace: string, name: string): Promise<JobObservation>;
  /** Concatenated logs of the pods the job started. */
  podLogs(namespace: string, jobName: string): Promise<string>;
}

export type JobClientFactory = (kubeconfig: KubeconfigDocument, logger: Logger) => JobClient;

function statusOf(error: unknown): number | undefined {
  return error instanceof k8s.HttpError ? error.statusCode : undefined;
}

export class KubernetesJobClient implements JobClient {
  private readonly batchApi: k8s.BatchV1Api;
  private readonly coreApi: k8s.CoreV1Api;

  constructor(
    kubeconfig: KubeconfigDocument,
    private readonly log: Logger,
  ) {
    const kc = new k8s.KubeConfig();
    kc.loadFromString(JSON.stringify(kubeconfig));
    this.batchApi = kc.makeApiClient(k8s.BatchV1Api);
    this.coreApi = kc.makeApiClient(k8s.CoreV1Api);
  }

  async createJob(namespace: string, job: k8s.V1Job): Promise<'created' | 'exists'> {
    try {
      await this.batchApi.createNamespacedJob(namespace, job);
      return 'created';
    } catch (error) {
      if (statusOf(error) === 409) return 'exists';
      throw new UninstallError(`Failed to create uninstall job: ${describeK8sError(error)}`, { cause: error });
    }
  }

  async readJob(namespace: string, name: string): Promise<JobObservation> {
    try {
      const response = await this.batchApi.readNamespacedJobStatus(name, namespace);
      const status = response.body.status;
      return {
        kind: 'present',
        active: status?.active ?? 0,
        succeeded: status?.succeeded ?? 0,
        failed: status?.failed ?? 0,
      };
    } catch (error) {
      if (statusOf(error) === 404) return { kind: 'missing' };
      throw error;
    }
  }

  async podLogs(namespace: string, jobName: string): Promise<string> {
    const pods = await this.coreApi.listNamespacedPod(
      namespace,
      undefined,
      undefined,
      undefined,
      undefined,
      `job-name=${jobName}`,
    );

    let logs = '';
    for (const pod of pods.body.items) {
      const podName = pod.metadata?.name;
      if (!podName) continue;
      try {
        const response = await this.coreApi.readNamespacedPodLog(podName, namespace);
        logs += response.body;
      } catch (error) {
        this.log.warn(`could not read logs of pod ${podName}: ${describeK8sError(error)}`);
      }
    }
    return logs;
  }
}

export const kubernetesJobClient: JobClientFactory = (kubeconfig, logger) => new KubernetesJobClient(kubeconfig, logger);

function describeK8sError(error: unknown): string {
  if (error instanceof k8s.HttpError) {
    return `${error.statusCode ?? 'unknown status'} - ${JSON.stringify(error.body)}`;
  }
  return errorMessage(error);
}
