import * as k8s from '@kubernetes/client-node';

export const UNINSTALL_NAMESPACE = 'byoc-control-plane';
export const UNINSTALL_SERVICE_ACCOUNT = 'byoc-tools';
export const UNINSTALL_JOB_PREFIX = 'byoc-tools-uninstall';
export const UNINSTALL_COMMAND = 'byoc-tools cluster uninstall --force';

export interface UninstallJobOptions {
  name: string;
  namespace: string;
  image: string;
}

export function uninstallJobName(suffix: string): string {
  return `${UNINSTALL_JOB_PREFIX}-${suffix}`;
}

/**
 * One-shot Job that tears down everything the control plane installed in the
 * cluster. Finished jobs are garbage collected after five minutes.
 */
export function buildUninstallJob({ name, namespace, image }: UninstallJobOptions): k8s.V1Job {
  return {
    apiVersion: 'batch/v1',
    kind: 'Job',
    metadata: { name, namespace },
    spec: {
      backoffLimit: 1,
      activeDeadlineSeconds: 600,
      ttlSecondsAfterFinished: 300,
      template: {
        spec: {
          serviceAccountName: UNINSTALL_SERVICE_ACCOUNT,
          restartPolicy: 'OnFailure',
          // still schedulable on nodes that filled up their disks
          tolerations: [
            { key: 'node.kubernetes.io/disk-pressure', operator: 'Exists', effect: 'NoSchedule' },
          ],
          containers: [
            {
              name: UNINSTALL_SERVICE_ACCOUNT,
              image,
              command: ['/bin/sh', '-c'],
              args: [UNINSTALL_COMMAND],
              resources: {
                requests: { 'ephemeral-storage': '1Gi', memory: '512Mi', cpu: '100m' },
                limits: { 'ephemeral-storage': '5Gi', memory: '2Gi' },
              },
            },
          ],
        },
      },
    },
  };
}
