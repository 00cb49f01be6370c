import { LifecycleCreateResult, LifecycleProvider } from './lifecycle';

export interface ServiceAccountInputs {
  name: string;
  apiUrl: string;
  cpgwApiKey: string;
}

export interface ServiceAccountOutputs extends ServiceAccountInputs {
  clientId: string;
  clientSecret: string;
}

export class ServiceAccountProvider extends LifecycleProvider<ServiceAccountInputs, ServiceAccountOutputs> {
  readonly kind = 'service-account' as const;

  // the secret is only returned at creation; without it the account is useless
  protected readonly requiredOutputs: readonly (keyof ServiceAccountOutputs & string)[] = ['clientId', 'clientSecret'];
  protected readonly replaceOn: readonly (keyof ServiceAccountInputs & string)[] = ['name'];
  protected readonly updateOn: readonly (keyof ServiceAccountInputs & string)[] = ['apiUrl', 'cpgwApiKey'];

  async create(inputs: ServiceAccountInputs): Promise<LifecycleCreateResult<ServiceAccountOutputs>> {
    const account = await this.api(inputs.apiUrl).createServiceAccount(inputs.cpgwApiKey, inputs.name);
    this.log.info(`created service account ${inputs.name} (${account.id})`);
    return {
      id: account.id,
      outs: { ...inputs, clientId: account.clientId, clientSecret: account.clientSecret },
    };
  }

  async delete(id: string, props: ServiceAccountOutputs): Promise<void> {
    if (!this.canDelete(id, { apiUrl: props.apiUrl, cpgwApiKey: props.cpgwApiKey })) return;
    await this.deleteRemote(`service account ${id}`, () =>
      this.api(props.apiUrl).deleteServiceAccount(props.cpgwApiKey, id),
    );
  }
}
