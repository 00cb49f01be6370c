import { LifecycleCreateResult, LifecycleProvider } from './lifecycle';

export interface AmpAccessInputs {
  /** Role of the in-cluster workload that remote-writes metrics */
  workloadRoleArn: string;
  /** Environment name the grant belongs to */
  environment: string;
  apiUrl: string;
  cpgwApiKey: string;
}

export interface AmpAccessOutputs extends AmpAccessInputs {
  /** Role the workload assumes to write into the managed Prometheus backend */
  roleArn: string;
  remoteWriteEndpoint: string;
  region: string;
}

export class AmpAccessProvider extends LifecycleProvider<AmpAccessInputs, AmpAccessOutputs> {
  readonly kind = 'amp-access' as const;

  protected readonly requiredOutputs: readonly (keyof AmpAccessOutputs & string)[] = ['roleArn'];
  protected readonly replaceOn: readonly (keyof AmpAccessInputs & string)[] = ['workloadRoleArn', 'environment'];
  protected readonly updateOn: readonly (keyof AmpAccessInputs & string)[] = ['apiUrl', 'cpgwApiKey'];

  async create(inputs: AmpAccessInputs): Promise<LifecycleCreateResult<AmpAccessOutputs>> {
    const access = await this.api(inputs.apiUrl).createAmpAccess(inputs.cpgwApiKey, inputs.workloadRoleArn);
    this.log.info(`granted ${inputs.workloadRoleArn} remote-write access via ${access.roleArn} (${access.region})`);
    return {
      id: access.roleArn,
      outs: { ...inputs, ...access },
    };
  }

  async delete(id: string, props: AmpAccessOutputs): Promise<void> {
    const required = { workloadRoleArn: props.workloadRoleArn, apiUrl: props.apiUrl, cpgwApiKey: props.cpgwApiKey };
    if (!this.canDelete(id, required)) return;
    await this.deleteRemote(`amp access for ${props.workloadRoleArn}`, () =>
      this.api(props.apiUrl).deleteAmpAccess(props.cpgwApiKey, props.workloadRoleArn),
    );
  }
}
