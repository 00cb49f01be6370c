import { LifecycleCreateResult, LifecycleProvider } from './lifecycle';

export interface CpgwApiKeyInputs {
  /** Name of the environment the key is scoped to */
  environment: string;
  apiUrl: string;
  apiKey: string;
}

export interface CpgwApiKeyOutputs extends CpgwApiKeyInputs {
  key: string;
}

/** Admin key for the cpgw infra routes of one environment. */
export class CpgwApiKeyProvider extends LifecycleProvider<CpgwApiKeyInputs, CpgwApiKeyOutputs> {
  readonly kind = 'cpgw-api-key' as const;

  protected readonly requiredOutputs: readonly (keyof CpgwApiKeyOutputs & string)[] = ['key'];
  protected readonly replaceOn: readonly (keyof CpgwApiKeyInputs & string)[] = ['environment'];
  protected readonly updateOn: readonly (keyof CpgwApiKeyInputs & string)[] = ['apiUrl', 'apiKey'];

  async create(inputs: CpgwApiKeyInputs): Promise<LifecycleCreateResult<CpgwApiKeyOutputs>> {
    const created = await this.api(inputs.apiUrl).createCpgwApiKey(inputs.apiKey, inputs.environment);
    this.log.info(`minted cpgw api key ${created.id} for environment ${inputs.environment}`);
    return { id: created.id, outs: { ...inputs, key: created.key } };
  }

  async delete(id: string, props: CpgwApiKeyOutputs): Promise<void> {
    if (!this.canDelete(id, { apiUrl: props.apiUrl, apiKey: props.apiKey })) return;
    await this.deleteRemote(`cpgw api key ${id}`, () => this.api(props.apiUrl).deleteCpgwApiKey(props.apiKey, id));
  }
}
