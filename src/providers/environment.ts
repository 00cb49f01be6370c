import { LifecycleCreateResult, LifecycleProvider } from './lifecycle';

export interface EnvironmentInputs {
  cloud: string;
  region: string;
  globalEnv: string;
  apiUrl: string;
  /** The operator's own API key; bootstrap routes accept nothing else */
  apiKey: string;
}

export interface EnvironmentOutputs extends EnvironmentInputs {
  envName: string;
  orgId: string;
  orgName: string;
}

const sameIgnoringCase = (previous: unknown, next: unknown): boolean =>
  String(previous ?? '').toLowerCase() === String(next ?? '').toLowerCase();

/**
 * Registers a tenant environment keyed by (cloud, region, tier). The record is
 * immutable: any change to those keys replaces it.
 */
export class EnvironmentProvider extends LifecycleProvider<EnvironmentInputs, EnvironmentOutputs> {
  readonly kind = 'environment' as const;

  protected readonly requiredOutputs: readonly (keyof EnvironmentOutputs & string)[] = ['envName'];
  protected readonly replaceOn: readonly (keyof EnvironmentInputs & string)[] = ['cloud', 'region', 'globalEnv'];
  // a cloud spelled in a different case is the same environment, just re-recorded
  protected readonly updateOn: readonly (keyof EnvironmentInputs & string)[] = ['cloud', 'apiUrl', 'apiKey'];
  protected readonly comparators = { cloud: sameIgnoringCase };

  async create(inputs: EnvironmentInputs): Promise<LifecycleCreateResult<EnvironmentOutputs>> {
    const env = await this.api(inputs.apiUrl).createEnvironment(inputs.apiKey, {
      cloud: inputs.cloud,
      region: inputs.region,
      globalEnv: inputs.globalEnv,
    });
    this.log.info(`created environment ${env.name} (${env.id}) for org ${env.orgName}`);
    return {
      id: env.id,
      outs: { ...inputs, envName: env.name, orgId: env.orgId, orgName: env.orgName },
    };
  }

  async delete(id: string, props: EnvironmentOutputs): Promise<void> {
    if (!this.canDelete(id, { apiUrl: props.apiUrl, apiKey: props.apiKey })) return;
    await this.deleteRemote(`environment ${props.envName ?? id}`, () =>
      this.api(props.apiUrl).deleteEnvironment(props.apiKey, id),
    );
  }
}
