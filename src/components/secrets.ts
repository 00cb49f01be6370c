import * as k8s from '@pulumi/kubernetes';
import * as pulumi from '@pulumi/pulumi';

export const SECRETS_NAMESPACE = 'external-secrets';

export interface ControlPlaneSecretsArgs {
  cpgwApiKey: pulumi.Input<string>;
  projectApiKey: pulumi.Input<string>;
  datadog?: {
    apiKey: pulumi.Input<string>;
    keyId: pulumi.Input<string>;
  };
}

/** Writes minted control-plane credentials into the cluster for the in-cluster services. */
export class ControlPlaneSecrets extends pulumi.ComponentResource {
  readonly namespace: k8s.core.v1.Namespace;
  readonly secrets: k8s.core.v1.Secret[] = [];

  constructor(name: string, args: ControlPlaneSecretsArgs, opts?: pulumi.ComponentResourceOptions) {
    super('byoc:index:ControlPlaneSecrets', name, {}, opts);

    this.namespace = new k8s.core.v1.Namespace(`${name}-external-secrets-ns`, {
      metadata: {
        name: SECRETS_NAMESPACE,
        labels: { 'kubernetes.io/metadata.name': SECRETS_NAMESPACE, name: SECRETS_NAMESPACE },
      },
    }, { parent: this, deleteBeforeReplace: true });

    const secret = (resourceName: string, secretName: string, stringData: Record<string, pulumi.Input<string>>) => {
      this.secrets.push(new k8s.core.v1.Secret(resourceName, {
        metadata: { name: secretName, namespace: SECRETS_NAMESPACE },
        type: 'Opaque',
        stringData: pulumi.secret(stringData),
      }, { parent: this, dependsOn: [this.namespace] }));
    };

    secret(`${name}-cpgw-credentials`, 'cpgw-credentials', { 'api-key': args.cpgwApiKey });
    secret(`${name}-project-api-key`, 'project-api-key', { 'api-key': args.projectApiKey });
    if (args.datadog) {
      secret(`${name}-datadog-credentials`, 'datadog-credentials', {
        'api-key': args.datadog.apiKey,
        'key-id': args.datadog.keyId,
      });
    }

    this.registerOutputs({});
  }
}
