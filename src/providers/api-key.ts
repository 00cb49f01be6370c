import { withCleanup } from './cleanup';
import { LifecycleCreateResult, LifecycleProvider } from './lifecycle';
import { OAuthCredentials } from '../api/auth';
import { pulumiLogger } from '../core/logger';

export interface ApiKeyInputs {
  orgId: string;
  projectName: string;
  keyName: string;
  apiUrl: string;
  /** Authorization server for the client-credentials exchange */
  authDomain: string;
  clientId: string;
  clientSecret: string;
}

export interface ApiKeyOutputs extends ApiKeyInputs {
  apiKeyId: string;
  value: string;
  projectId: string;
}

/**
 * Project-scoped API key. Minting is two calls (create project, then create a
 * key in it), so a failed second call rolls the project back before the error
 * is surfaced. The resource id is the project id: deleting the project revokes
 * the key with it.
 */
export class ApiKeyProvider extends LifecycleProvider<ApiKeyInputs, ApiKeyOutputs> {
  readonly kind = 'project-api-key' as const;

  protected readonly requiredOutputs: readonly (keyof ApiKeyOutputs & string)[] = ['value'];
  protected readonly replaceOn: readonly (keyof ApiKeyInputs & string)[] = ['orgId', 'projectName', 'keyName'];
  protected readonly updateOn: readonly (keyof ApiKeyInputs & string)[] = ['apiUrl', 'authDomain', 'clientId', 'clientSecret'];

  async create(inputs: ApiKeyInputs): Promise<LifecycleCreateResult<ApiKeyOutputs>> {
    const api = this.api(inputs.apiUrl);
    const token = await api.accessToken(credentialsOf(inputs));

    return withCleanup(this.options.logger ?? pulumiLogger, async (cleanup) => {
      const projectId = await api.createProject(token, inputs.orgId, inputs.projectName);
      cleanup.defer(`delete project ${projectId}`, () => api.deleteProject(token, projectId));
      this.log.info(`created project ${inputs.projectName} (${projectId})`);

      const key = await api.createProjectApiKey(token, projectId, inputs.keyName);
      this.log.info(`minted api key ${key.id} in project ${projectId}`);
      return {
        id: key.projectId,
        outs: { ...inputs, apiKeyId: key.id, value: key.value, projectId: key.projectId },
      };
    });
  }

  async delete(id: string, props: ApiKeyOutputs): Promise<void> {
    const required = {
      apiUrl: props.apiUrl,
      authDomain: props.authDomain,
      clientId: props.clientId,
      clientSecret: props.clientSecret,
    };
    if (!this.canDelete(id, required)) return;

    const api = this.api(props.apiUrl);
    const token = await api.accessToken(credentialsOf(props));
    await this.deleteRemote(`project ${id}`, () => api.deleteProject(token, id));
  }
}

function credentialsOf(inputs: ApiKeyInputs): OAuthCredentials {
  return { domain: inputs.authDomain, clientId: inputs.clientId, clientSecret: inputs.clientSecret };
}
