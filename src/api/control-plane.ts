import { OAuthCredentials, fetchAccessToken } from './auth';
import { ControlPlaneClient } from './client';
import {
  bootstrapUrl,
  cpgwHeaders,
  cpgwInfraUrl,
  managementHeaders,
  managementUrl,
} from './endpoints';
import {
  ampAccessResponse,
  cpgwApiKeyResponse,
  datadogApiKeyDeleteResponse,
  datadogApiKeyResponse,
  dnsDelegationDeleteResponse,
  dnsDelegationResponse,
  environmentResponse,
  parseResponse,
  projectApiKeyResponse,
  projectResponse,
  serviceAccountResponse,
} from './schemas';

export interface EnvironmentSpec {
  cloud: string;
  region: string;
  globalEnv: string;
}

export interface RemoteEnvironment {
  id: string;
  name: string;
  orgId: string;
  orgName: string;
}

export interface RemoteCpgwApiKey {
  id: string;
  key: string;
}

export interface RemoteServiceAccount {
  id: string;
  clientId: string;
  clientSecret: string;
}

export interface RemoteProjectApiKey {
  id: string;
  projectId: string;
  value: string;
}

export interface DnsDelegationSpec {
  subdomain: string;
  nameservers: string[];
}

export interface RemoteDnsDelegation {
  changeId: string;
  status: string;
  fqdn: string;
}

export interface RemoteAmpAccess {
  roleArn: string;
  remoteWriteEndpoint: string;
  region: string;
}

export interface RemoteDatadogApiKey {
  keyId: string;
  apiKey: string;
}

/** Role granted to keys minted for the monitoring project. */
export const PROJECT_KEY_ROLES = ['ProjectEditor'];

/**
 * Typed operations against one control-plane deployment. Every method maps to a
 * single HTTP call; responses are validated before they are returned.
 */
export class ControlPlaneApi {
  constructor(
    readonly apiUrl: string,
    private readonly client: ControlPlaneClient = new ControlPlaneClient(),
  ) {}

  accessToken(credentials: OAuthCredentials): Promise<string> {
    return fetchAccessToken(this.client, this.apiUrl, credentials);
  }

  async createEnvironment(apiKey: string, spec: EnvironmentSpec): Promise<RemoteEnvironment> {
    const body = await this.client.request('POST', `${bootstrapUrl(this.apiUrl)}/environments`, {
      headers: cpgwHeaders(apiKey),
      body: { cloud: spec.cloud, region: spec.region, global_env: spec.globalEnv },
    });
    const env = parseResponse(environmentResponse, body, 'create environment');
    return { id: env.id, name: env.name, orgId: env.org_id, orgName: env.org_name };
  }

  async deleteEnvironment(apiKey: string, id: string): Promise<void> {
    await this.client.request('DELETE', `${bootstrapUrl(this.apiUrl)}/environments/${encodeURIComponent(id)}`, {
      headers: cpgwHeaders(apiKey),
    });
  }

  async createCpgwApiKey(apiKey: string, environment: string): Promise<RemoteCpgwApiKey> {
    const body = await this.client.request('POST', `${bootstrapUrl(this.apiUrl)}/cpgw-api-keys`, {
      headers: cpgwHeaders(apiKey),
      body: { environment },
    });
    return parseResponse(cpgwApiKeyResponse, body, 'create cpgw api key');
  }

  async deleteCpgwApiKey(apiKey: string, id: string): Promise<void> {
    await this.client.request('DELETE', `${bootstrapUrl(this.apiUrl)}/cpgw-api-keys/${encodeURIComponent(id)}`, {
      headers: cpgwHeaders(apiKey),
    });
  }

  async createServiceAccount(cpgwApiKey: string, name: string): Promise<RemoteServiceAccount> {
    const body = await this.client.request('POST', `${cpgwInfraUrl(this.apiUrl)}/service-accounts`, {
      headers: cpgwHeaders(cpgwApiKey),
      body: { name },
    });
    const account = parseResponse(serviceAccountResponse, body, 'create service account');
    return { id: account.id, clientId: account.client_id, clientSecret: account.client_secret };
  }

  async deleteServiceAccount(cpgwApiKey: string, id: string): Promise<void> {
    await this.client.request('DELETE', `${cpgwInfraUrl(this.apiUrl)}/service-accounts/${encodeURIComponent(id)}`, {
      headers: cpgwHeaders(cpgwApiKey),
    });
  }

  async createProject(token: string, orgId: string, name: string): Promise<string> {
    const body = await this.client.request(
      'POST',
      `${managementUrl(this.apiUrl)}/organizations/${encodeURIComponent(orgId)}/projects`,
      { headers: managementHeaders(token), body: { name } },
    );
    return parseResponse(projectResponse, body, 'create project').id;
  }

  async createProjectApiKey(token: string, projectId: string, name: string): Promise<RemoteProjectApiKey> {
    const body = await this.client.request(
      'POST',
      `${managementUrl(this.apiUrl)}/projects/${encodeURIComponent(projectId)}/api-keys`,
      { headers: managementHeaders(token), body: { name, roles: PROJECT_KEY_ROLES } },
    );
    const created = parseResponse(projectApiKeyResponse, body, 'create project api key');
    return { id: created.key.id, projectId: created.key.project_id, value: created.value };
  }

  async deleteProject(token: string, projectId: string): Promise<void> {
    await this.client.request('DELETE', `${managementUrl(this.apiUrl)}/projects/${encodeURIComponent(projectId)}`, {
      headers: managementHeaders(token),
    });
  }

  async createDnsDelegation(cpgwApiKey: string, spec: DnsDelegationSpec): Promise<RemoteDnsDelegation> {
    const body = await this.client.request('POST', `${cpgwInfraUrl(this.apiUrl)}/dns-delegation`, {
      headers: cpgwHeaders(cpgwApiKey),
      body: { subdomain: spec.subdomain, nameservers: spec.nameservers },
    });
    const result = parseResponse(dnsDelegationResponse, body, 'create dns delegation');
    return { changeId: result.change_id, status: result.status, fqdn: result.fqdn };
  }

  async deleteDnsDelegation(cpgwApiKey: string, spec: DnsDelegationSpec): Promise<{ changeId: string; status: string }> {
    const body = await this.client.request('POST', `${cpgwInfraUrl(this.apiUrl)}/dns-delegation/delete`, {
      headers: cpgwHeaders(cpgwApiKey),
      body: { subdomain: spec.subdomain, nameservers: spec.nameservers },
    });
    const result = parseResponse(dnsDelegationDeleteResponse, body, 'delete dns delegation');
    return { changeId: result.change_id, status: result.status };
  }

  async createAmpAccess(cpgwApiKey: string, workloadRoleArn: string): Promise<RemoteAmpAccess> {
    const body = await this.client.request('POST', `${cpgwInfraUrl(this.apiUrl)}/amp-access`, {
      headers: cpgwHeaders(cpgwApiKey),
      body: { workload_role_arn: workloadRoleArn },
    });
    const result = parseResponse(ampAccessResponse, body, 'create amp access');
    return {
      roleArn: result.role_arn,
      remoteWriteEndpoint: result.remote_write_endpoint,
      region: result.region,
    };
  }

  async deleteAmpAccess(cpgwApiKey: string, workloadRoleArn: string): Promise<void> {
    await this.client.request('POST', `${cpgwInfraUrl(this.apiUrl)}/amp-access/delete`, {
      headers: cpgwHeaders(cpgwApiKey),
      body: { workload_role_arn: workloadRoleArn },
    });
  }

  async createDatadogApiKey(cpgwApiKey: string): Promise<RemoteDatadogApiKey> {
    const body = await this.client.request('POST', `${cpgwInfraUrl(this.apiUrl)}/datadog-credentials`, {
      headers: cpgwHeaders(cpgwApiKey),
    });
    const result = parseResponse(datadogApiKeyResponse, body, 'create datadog api key');
    return { keyId: result.key_id, apiKey: result.api_key };
  }

  async deleteDatadogApiKey(cpgwApiKey: string, keyId: string): Promise<boolean> {
    const body = await this.client.request('POST', `${cpgwInfraUrl(this.apiUrl)}/datadog-credentials/delete`, {
      headers: cpgwHeaders(cpgwApiKey),
      body: { key_id: keyId },
    });
    return parseResponse(datadogApiKeyDeleteResponse, body, 'delete datadog api key').deleted;
  }
}
