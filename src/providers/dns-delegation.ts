import * as pulumi from '@pulumi/pulumi';
import { DnsDelegationSpec } from '../api/control-plane';
import { LifecycleCreateResult, LifecycleProvider, LifecycleUpdateResult } from './lifecycle';

export interface DnsDelegationInputs {
  subdomain: string;
  nameservers: string[];
  apiUrl: string;
  cpgwApiKey: string;
}

export interface DnsDelegationOutputs extends DnsDelegationInputs {
  fqdn: string;
  changeId: string;
  status: string;
}

function normalizeNameservers(servers: unknown): string[] | undefined {
  if (servers === undefined) return [];
  if (!Array.isArray(servers)) return undefined;
  const names = servers.filter((server): server is string => typeof server === 'string');
  if (names.length !== servers.length) return undefined;
  return [...new Set(names.map((server) => server.toLowerCase()))].sort();
}

/**
 * Order-, case- and duplicate-insensitive. A value that is not a list of names,
 * such as an output still unknown during preview, never matches.
 */
export function sameNameservers(previous: unknown, next: unknown): boolean {
  const a = normalizeNameservers(previous);
  const b = normalizeNameservers(next);
  if (a === undefined || b === undefined) return false;
  return a.length === b.length && a.every((server, i) => server === b[i]);
}

/**
 * NS delegation of a subdomain in the parent zone. The control plane records a
 * delegation by value, so delete must replay exactly the subdomain and
 * nameserver set recorded at creation (or at the last update), never values
 * recomputed from the current infrastructure.
 */
export class DnsDelegationProvider extends LifecycleProvider<DnsDelegationInputs, DnsDelegationOutputs> {
  readonly kind = 'dns-delegation' as const;

  protected readonly requiredOutputs: readonly (keyof DnsDelegationOutputs & string)[] = ['fqdn'];
  protected readonly replaceOn: readonly (keyof DnsDelegationInputs & string)[] = ['subdomain'];
  protected readonly updateOn: readonly (keyof DnsDelegationInputs & string)[] = ['apiUrl', 'cpgwApiKey'];

  async create(inputs: DnsDelegationInputs): Promise<LifecycleCreateResult<DnsDelegationOutputs>> {
    const result = await this.api(inputs.apiUrl).createDnsDelegation(inputs.cpgwApiKey, specOf(inputs));
    this.log.info(`delegated ${result.fqdn} to ${inputs.nameservers.join(', ')} (change ${result.changeId}, ${result.status})`);
    return {
      id: result.fqdn,
      outs: { ...inputs, fqdn: result.fqdn, changeId: result.changeId, status: result.status },
    };
  }

  async diff(id: string, olds: DnsDelegationOutputs, news: DnsDelegationInputs): Promise<pulumi.dynamic.DiffResult> {
    const result = await super.diff(id, olds, news);
    if (sameNameservers(olds.nameservers, news.nameservers)) return result;
    return { ...result, changes: true };
  }

  /** A new nameserver set re-creates the delegation; it is never patched. */
  async update(id: string, olds: DnsDelegationOutputs, news: DnsDelegationInputs): Promise<LifecycleUpdateResult<DnsDelegationOutputs>> {
    if (sameNameservers(olds.nameservers, news.nameservers)) {
      return super.update(id, olds, news);
    }
    const result = await this.api(news.apiUrl).createDnsDelegation(news.cpgwApiKey, specOf(news));
    this.log.info(`re-delegated ${result.fqdn} to ${news.nameservers.join(', ')} (change ${result.changeId})`);
    return {
      outs: { ...olds, ...news, fqdn: result.fqdn, changeId: result.changeId, status: result.status },
    };
  }

  async delete(id: string, props: DnsDelegationOutputs): Promise<void> {
    const required = {
      subdomain: props.subdomain,
      nameservers: props.nameservers?.length ? props.nameservers : undefined,
      apiUrl: props.apiUrl,
      cpgwApiKey: props.cpgwApiKey,
    };
    if (!this.canDelete(id, required)) return;
    await this.deleteRemote(`dns delegation ${id}`, () =>
      this.api(props.apiUrl).deleteDnsDelegation(props.cpgwApiKey, specOf(props)),
    );
  }
}

function specOf(inputs: DnsDelegationInputs): DnsDelegationSpec {
  return { subdomain: inputs.subdomain, nameservers: [...inputs.nameservers] };
}
