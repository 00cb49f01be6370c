import { CloudKind } from '../core/cloud';
import { LifecycleCreateResult, LifecycleProvider, LifecycleUpdateResult } from '../providers/lifecycle';
import { UninstallDeps, runUninstall } from './uninstall';

export interface ClusterUninstallerInputs {
  kubeconfig: string;
  image: string;
  cloud?: CloudKind;
  namespace?: string;
  timeoutSeconds?: number;
  pollIntervalSeconds?: number;
}

export const UNINSTALLER_ID = 'uninstaller-ready';

/**
 * Does nothing until it is deleted, then runs the uninstall job and fails the
 * destroy if the job fails. Resources that live in the cluster must be
 * dependencies of it so that it is deleted first.
 */
export class ClusterUninstallerProvider extends LifecycleProvider<ClusterUninstallerInputs, ClusterUninstallerInputs> {
  readonly kind = 'cluster-uninstaller' as const;

  // refreshed in place, never replaced: a replace would run the uninstall
  protected readonly updateOn: readonly (keyof ClusterUninstallerInputs & string)[] = [
    'kubeconfig',
    'image',
    'cloud',
    'namespace',
    'timeoutSeconds',
    'pollIntervalSeconds',
  ];

  constructor(private readonly deps: UninstallDeps = {}) {
    super({ logger: deps.logger });
  }

  async create(inputs: ClusterUninstallerInputs): Promise<LifecycleCreateResult<ClusterUninstallerInputs>> {
    return { id: UNINSTALLER_ID, outs: inputs };
  }

  async update(
    _id: string,
    _olds: ClusterUninstallerInputs,
    news: ClusterUninstallerInputs,
  ): Promise<LifecycleUpdateResult<ClusterUninstallerInputs>> {
    return { outs: news };
  }

  async delete(_id: string, props: ClusterUninstallerInputs): Promise<void> {
    await runUninstall(props, this.deps);
  }
}
