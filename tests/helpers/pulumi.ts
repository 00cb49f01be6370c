import * as pulumi from '@pulumi/pulumi';

export interface RegisteredResource {
  type: string;
  name: string;
  inputs: Record<string, unknown>;
}

export type CannedOutputs = (name: string) => Record<string, unknown> | undefined;

/**
 * Engine stand-in: records every registration and answers with the inputs
 * merged with the canned outputs for the resource name.
 */
export class RecordingMocks implements pulumi.runtime.Mocks {
  readonly registered: RegisteredResource[] = [];

  constructor(private readonly outputs: CannedOutputs = () => undefined) {}

  newResource(args: pulumi.runtime.MockResourceArgs): { id: string | undefined; state: Record<string, unknown> } {
    const inputs: Record<string, unknown> = { ...args.inputs };
    this.registered.push({ type: args.type, name: args.name, inputs });
    return { id: `${args.name}-id`, state: { ...inputs, ...this.outputs(args.name) } };
  }

  call(args: pulumi.runtime.MockCallArgs): Record<string, unknown> {
    return args.inputs;
  }

  ofType(type: string, prefix: string): RegisteredResource[] {
    return this.registered.filter((r) => r.type === type && r.name.startsWith(prefix));
  }

  inputsOf(name: string): Record<string, unknown> {
    const found = this.registered.find((r) => r.name === name);
    if (!found) throw new Error(`${name} was never registered`);
    return found.inputs;
  }
}

/** Options each resource was constructed with, captured through a component transformation. */
export class OptionsRecorder {
  private readonly names = new Map<pulumi.Resource, string>();
  private readonly options = new Map<string, pulumi.ResourceOptions>();

  readonly transformation: pulumi.ResourceTransformation = (args) => {
    this.names.set(args.resource, args.name);
    this.options.set(args.name, args.opts);
    return undefined;
  };

  dependenciesOf(name: string): (string | undefined)[] {
    const dependsOn = this.options.get(name)?.dependsOn;
    if (!Array.isArray(dependsOn)) return [];
    return dependsOn.map((dep) => (dep instanceof pulumi.Resource ? this.names.get(dep) : undefined));
  }

  secretOutputsOf(name: string): string[] | undefined {
    const opts = this.options.get(name);
    const secrets = opts && 'additionalSecretOutputs' in opts ? opts.additionalSecretOutputs : undefined;
    return Array.isArray(secrets) ? secrets.filter((s): s is string => typeof s === 'string') : undefined;
  }
}

export function promiseOf<T>(output: pulumi.Output<T>): Promise<T> {
  return new Promise((resolve) => {
    output.apply((value) => resolve(value));
  });
}

/** Resolves once every given resource has been registered with the engine. */
export function allRegistered(...resources: pulumi.Resource[]): Promise<string[]> {
  return promiseOf(pulumi.all(resources.map((r) => r.urn)));
}

/** Strips the wire wrapper a secret input may carry. */
export function reveal(value: unknown): unknown {
  if (typeof value === 'object' && value !== null && 'value' in value && Object.keys(value).length === 2) {
    return value.value;
  }
  return value;
}
