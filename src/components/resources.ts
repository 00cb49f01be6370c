import * as pulumi from '@pulumi/pulumi';
import { loadConfig, ConfigReader } from '../core/config';
import { ByocError } from '../core/errors';
import {
  AmpAccessInputs,
  AmpAccessProvider,
  ApiKeyInputs,
  ApiKeyProvider,
  CpgwApiKeyInputs,
  CpgwApiKeyProvider,
  DatadogApiKeyInputs,
  DatadogApiKeyProvider,
  DnsDelegationInputs,
  DnsDelegationProvider,
  EnvironmentInputs,
  EnvironmentProvider,
  ProviderOptions,
  ServiceAccountInputs,
  ServiceAccountProvider,
} from '../providers';
import { ClusterUninstallerInputs, ClusterUninstallerProvider } from '../uninstaller/provider';
import { UninstallDeps } from '../uninstaller/uninstall';

/** Resource arguments: every provider input may be an Output. */
export type ResourceArgs<T> = { [K in keyof T]: pulumi.Input<T[K]> };

function withSecrets(opts: pulumi.CustomResourceOptions | undefined, secrets: string[]): pulumi.CustomResourceOptions {
  return pulumi.mergeOptions(opts, { additionalSecretOutputs: secrets });
}

export class Environment extends pulumi.dynamic.Resource {
  declare readonly envName: pulumi.Output<string>;
  declare readonly orgId: pulumi.Output<string>;
  declare readonly orgName: pulumi.Output<string>;

  constructor(
    name: string,
    args: ResourceArgs<EnvironmentInputs>,
    opts?: pulumi.CustomResourceOptions,
    providerOptions?: ProviderOptions,
  ) {
    super(
      new EnvironmentProvider(providerOptions),
      name,
      { ...args, envName: undefined, orgId: undefined, orgName: undefined },
      withSecrets(opts, ['apiKey']),
    );
  }
}

export class CpgwApiKey extends pulumi.dynamic.Resource {
  declare readonly key: pulumi.Output<string>;

  constructor(
    name: string,
    args: ResourceArgs<CpgwApiKeyInputs>,
    opts?: pulumi.CustomResourceOptions,
    providerOptions?: ProviderOptions,
  ) {
    super(new CpgwApiKeyProvider(providerOptions), name, { ...args, key: undefined }, withSecrets(opts, ['apiKey', 'key']));
  }
}

export class ServiceAccount extends pulumi.dynamic.Resource {
  declare readonly clientId: pulumi.Output<string>;
  declare readonly clientSecret: pulumi.Output<string>;

  constructor(
    name: string,
    args: ResourceArgs<ServiceAccountInputs>,
    opts?: pulumi.CustomResourceOptions,
    providerOptions?: ProviderOptions,
  ) {
    super(
      new ServiceAccountProvider(providerOptions),
      name,
      { ...args, clientId: undefined, clientSecret: undefined },
      withSecrets(opts, ['cpgwApiKey', 'clientSecret']),
    );
  }
}

export class ApiKey extends pulumi.dynamic.Resource {
  declare readonly apiKeyId: pulumi.Output<string>;
  declare readonly value: pulumi.Output<string>;
  declare readonly projectId: pulumi.Output<string>;

  constructor(
    name: string,
    args: ResourceArgs<ApiKeyInputs>,
    opts?: pulumi.CustomResourceOptions,
    providerOptions?: ProviderOptions,
  ) {
    super(
      new ApiKeyProvider(providerOptions),
      name,
      { ...args, apiKeyId: undefined, value: undefined, projectId: undefined },
      withSecrets(opts, ['clientSecret', 'value']),
    );
  }
}

export class DnsDelegation extends pulumi.dynamic.Resource {
  declare readonly fqdn: pulumi.Output<string>;
  declare readonly changeId: pulumi.Output<string>;
  declare readonly status: pulumi.Output<string>;
  declare readonly subdomain: pulumi.Output<string>;

  constructor(
    name: string,
    args: ResourceArgs<DnsDelegationInputs>,
    opts?: pulumi.CustomResourceOptions,
    providerOptions?: ProviderOptions,
  ) {
    super(
      new DnsDelegationProvider(providerOptions),
      name,
      { ...args, fqdn: undefined, changeId: undefined, status: undefined },
      withSecrets(opts, ['cpgwApiKey']),
    );
  }
}

export class AmpAccess extends pulumi.dynamic.Resource {
  declare readonly roleArn: pulumi.Output<string>;
  declare readonly remoteWriteEndpoint: pulumi.Output<string>;
  declare readonly region: pulumi.Output<string>;

  constructor(
    name: string,
    args: ResourceArgs<AmpAccessInputs>,
    opts?: pulumi.CustomResourceOptions,
    providerOptions?: ProviderOptions,
  ) {
    super(
      new AmpAccessProvider(providerOptions),
      name,
      { ...args, roleArn: undefined, remoteWriteEndpoint: undefined, region: undefined },
      withSecrets(opts, ['cpgwApiKey']),
    );
  }
}

export class DatadogApiKey extends pulumi.dynamic.Resource {
  declare readonly keyId: pulumi.Output<string>;
  declare readonly apiKey: pulumi.Output<string>;

  constructor(
    name: string,
    args: ResourceArgs<DatadogApiKeyInputs>,
    opts?: pulumi.CustomResourceOptions,
    providerOptions?: ProviderOptions,
  ) {
    super(
      new DatadogApiKeyProvider(providerOptions),
      name,
      { ...args, keyId: undefined, apiKey: undefined },
      withSecrets(opts, ['cpgwApiKey', 'apiKey']),
    );
  }
}

/**
 * Runs the in-cluster uninstall when destroyed. Everything deployed into the
 * cluster must be in its `dependsOn` so it is destroyed first.
 */
export class ClusterUninstaller extends pulumi.dynamic.Resource {
  declare readonly kubeconfig: pulumi.Output<string>;
  declare readonly image: pulumi.Output<string>;

  constructor(
    name: string,
    args: ResourceArgs<ClusterUninstallerInputs>,
    opts?: pulumi.CustomResourceOptions,
    deps?: UninstallDeps,
  ) {
    super(new ClusterUninstallerProvider(deps), name, { ...args }, withSecrets(opts, ['kubeconfig']));
  }

  /** Image, cloud and timings come from `byoc:*` configuration. */
  static fromConfig(
    name: string,
    kubeconfig: pulumi.Input<string>,
    opts?: pulumi.CustomResourceOptions,
    reader?: ConfigReader,
  ): ClusterUninstaller {
    const config = loadConfig(reader);
    if (!config.uninstallImage) {
      throw new ByocError("Missing required configuration variable 'byoc:uninstallImage'");
    }
    return new ClusterUninstaller(
      name,
      {
        kubeconfig,
        image: config.uninstallImage,
        cloud: config.cloud,
        timeoutSeconds: config.uninstallTimeoutSeconds,
        pollIntervalSeconds: config.uninstallPollIntervalSeconds,
      },
      opts,
    );
  }
}
