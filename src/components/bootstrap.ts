import * as pulumi from '@pulumi/pulumi';
import { RetryPolicy } from '../api/client';
import { ConfigReader, loadConfig } from '../core/config';
import { Logger } from '../core/logger';
import { ProviderOptions } from '../providers';
import { cellName, delegatedSubdomain } from '../utils/naming';
import { AmpAccess, ApiKey, CpgwApiKey, DatadogApiKey, DnsDelegation, Environment, ServiceAccount } from './resources';

export interface DnsDelegationArgs {
  nameservers: pulumi.Input<pulumi.Input<string>[]>;
  /** Defaults to the environment name without its `.byoc` suffix */
  subdomain?: pulumi.Input<string>;
}

export interface ControlPlaneBootstrapArgs {
  apiUrl: pulumi.Input<string>;
  /** The operator's API key */
  apiKey: pulumi.Input<string>;
  authDomain: pulumi.Input<string>;
  cloud: pulumi.Input<string>;
  region: pulumi.Input<string>;
  globalEnv?: pulumi.Input<string>;
  projectName?: pulumi.Input<string>;
  dns?: DnsDelegationArgs;
  /** Role of the workload that remote-writes metrics (AWS) */
  ampWorkloadRoleArn?: pulumi.Input<string>;
  retry?: RetryPolicy;
  logger?: Logger;
}

/**
 * Registers an environment with the control plane and mints every credential a
 * cell needs, in dependency order: environment, admin key, service account,
 * project API key and datadog key, plus the optional DNS delegation and metrics
 * access. Destroy runs in reverse.
 */
export class ControlPlaneBootstrap extends pulumi.ComponentResource {
  readonly environment: Environment;
  readonly cpgwApiKey: CpgwApiKey;
  readonly serviceAccount: ServiceAccount;
  readonly apiKey: ApiKey;
  readonly datadogApiKey: DatadogApiKey;
  readonly dnsDelegation?: DnsDelegation;
  readonly ampAccess?: AmpAccess;

  readonly envName: pulumi.Output<string>;
  readonly orgId: pulumi.Output<string>;
  readonly orgName: pulumi.Output<string>;
  readonly cellName: pulumi.Output<string>;

  constructor(name: string, args: ControlPlaneBootstrapArgs, opts?: pulumi.ComponentResourceOptions) {
    super('byoc:index:ControlPlaneBootstrap', name, {}, opts);

    const providerOptions: ProviderOptions = { retry: args.retry, logger: args.logger };

    this.environment = new Environment(
      `${name}-environment`,
      {
        cloud: args.cloud,
        region: args.region,
        globalEnv: args.globalEnv ?? 'prod',
        apiUrl: args.apiUrl,
        apiKey: args.apiKey,
      },
      { parent: this },
      providerOptions,
    );
    this.envName = this.environment.envName;
    this.orgId = this.environment.orgId;
    this.orgName = this.environment.orgName;
    this.cellName = pulumi
      .all([this.environment.orgName, this.environment.envName])
      .apply(([orgName, envName]) => cellName(orgName, envName));

    this.cpgwApiKey = new CpgwApiKey(
      `${name}-cpgw-api-key`,
      { environment: this.environment.envName, apiUrl: args.apiUrl, apiKey: args.apiKey },
      { parent: this, dependsOn: [this.environment] },
      providerOptions,
    );

    this.serviceAccount = new ServiceAccount(
      `${name}-service-account`,
      {
        name: this.cellName.apply((cell) => `${cell}-sa`),
        apiUrl: args.apiUrl,
        cpgwApiKey: this.cpgwApiKey.key,
      },
      { parent: this, dependsOn: [this.cpgwApiKey] },
      providerOptions,
    );

    this.apiKey = new ApiKey(
      `${name}-api-key`,
      {
        orgId: this.environment.orgId,
        projectName: args.projectName ?? 'sli-checkers',
        keyName: this.cellName.apply((cell) => `${cell}-key`),
        apiUrl: args.apiUrl,
        authDomain: args.authDomain,
        clientId: this.serviceAccount.clientId,
        clientSecret: this.serviceAccount.clientSecret,
      },
      { parent: this, dependsOn: [this.serviceAccount] },
      providerOptions,
    );

    this.datadogApiKey = new DatadogApiKey(
      `${name}-datadog-api-key`,
      { environment: this.environment.envName, apiUrl: args.apiUrl, cpgwApiKey: this.cpgwApiKey.key },
      { parent: this, dependsOn: [this.cpgwApiKey] },
      providerOptions,
    );

    if (args.dns) {
      this.dnsDelegation = new DnsDelegation(
        `${name}-dns-delegation`,
        {
          subdomain: args.dns.subdomain ?? this.environment.envName.apply(delegatedSubdomain),
          nameservers: pulumi.output(args.dns.nameservers),
          apiUrl: args.apiUrl,
          cpgwApiKey: this.cpgwApiKey.key,
        },
        { parent: this, dependsOn: [this.cpgwApiKey] },
        providerOptions,
      );
    }

    if (args.ampWorkloadRoleArn) {
      this.ampAccess = new AmpAccess(
        `${name}-amp-access`,
        {
          workloadRoleArn: args.ampWorkloadRoleArn,
          environment: this.environment.envName,
          apiUrl: args.apiUrl,
          cpgwApiKey: this.cpgwApiKey.key,
        },
        { parent: this, dependsOn: [this.cpgwApiKey] },
        providerOptions,
      );
    }

    this.registerOutputs({
      envName: this.envName,
      orgId: this.orgId,
      orgName: this.orgName,
      cellName: this.cellName,
      projectId: this.apiKey.projectId,
      fqdn: this.dnsDelegation?.fqdn,
      remoteWriteEndpoint: this.ampAccess?.remoteWriteEndpoint,
    });
  }

  /** Builds the bootstrap from `byoc:*` stack configuration. */
  static fromConfig(
    name: string,
    extra: Pick<ControlPlaneBootstrapArgs, 'dns' | 'ampWorkloadRoleArn' | 'logger'> = {},
    opts?: pulumi.ComponentResourceOptions,
    reader?: ConfigReader,
  ): ControlPlaneBootstrap {
    const config = loadConfig(reader);
    return new ControlPlaneBootstrap(
      name,
      {
        apiUrl: config.apiUrl,
        apiKey: config.apiKey,
        authDomain: config.authDomain,
        cloud: config.cloud,
        region: config.region,
        globalEnv: config.globalEnv,
        projectName: config.projectName,
        retry: { maxRetries: config.maxRetries, baseDelayMs: config.retryBaseDelayMs },
        ...extra,
      },
      opts,
    );
  }
}
