import { ByocError } from '../core/errors';
import { LifecycleCreateResult, LifecycleProvider } from './lifecycle';

export interface DatadogApiKeyInputs {
  /** Environment name; the key is issued for it through `cpgwApiKey` */
  environment: string;
  apiUrl: string;
  cpgwApiKey: string;
}

export interface DatadogApiKeyOutputs extends DatadogApiKeyInputs {
  keyId: string;
  apiKey: string;
}

/** Per-environment key for the metrics and traces vendor, issued by the control plane. */
export class DatadogApiKeyProvider extends LifecycleProvider<DatadogApiKeyInputs, DatadogApiKeyOutputs> {
  readonly kind = 'datadog-api-key' as const;

  protected readonly requiredOutputs: readonly (keyof DatadogApiKeyOutputs & string)[] = ['apiKey'];
  protected readonly replaceOn: readonly (keyof DatadogApiKeyInputs & string)[] = ['environment'];
  protected readonly updateOn: readonly (keyof DatadogApiKeyInputs & string)[] = ['apiUrl', 'cpgwApiKey'];

  async create(inputs: DatadogApiKeyInputs): Promise<LifecycleCreateResult<DatadogApiKeyOutputs>> {
    const created = await this.api(inputs.apiUrl).createDatadogApiKey(inputs.cpgwApiKey);
    this.log.info(`issued datadog api key ${created.keyId}`);
    return { id: created.keyId, outs: { ...inputs, ...created } };
  }

  async delete(id: string, props: DatadogApiKeyOutputs): Promise<void> {
    const keyId = props.keyId || id;
    if (!this.canDelete(id, { keyId, apiUrl: props.apiUrl, cpgwApiKey: props.cpgwApiKey })) return;
    await this.deleteRemote(`datadog api key ${keyId}`, async () => {
      const deleted = await this.api(props.apiUrl).deleteDatadogApiKey(props.cpgwApiKey, keyId);
      // Kept in state so the next destroy retries it.
      if (!deleted) throw new ByocError(`control plane did not delete datadog api key ${keyId}`);
    });
  }
}
