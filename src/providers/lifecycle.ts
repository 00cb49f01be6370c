import * as pulumi from '@pulumi/pulumi';
import { isDeepStrictEqual } from 'util';
import { ControlPlaneClient, RetryPolicy } from '../api/client';
import { ControlPlaneApi } from '../api/control-plane';
import { isNotFound } from '../core/errors';
import { Logger, pulumiLogger, scoped } from '../core/logger';

/** Tag carried by every provider; one per external entity. */
export type ResourceKind =
  | 'environment'
  | 'cpgw-api-key'
  | 'service-account'
  | 'project-api-key'
  | 'dns-delegation'
  | 'amp-access'
  | 'datadog-api-key'
  | 'cluster-uninstaller';

export interface ProviderOptions {
  /** Used for every request. When absent a client is built from `retry`. */
  client?: ControlPlaneClient;
  retry?: RetryPolicy;
  logger?: Logger;
}

export interface LifecycleCreateResult<O> {
  id: string;
  outs: O;
}

export interface LifecycleUpdateResult<O> {
  outs: O;
}

type Comparator = (previous: unknown, next: unknown) => boolean;

export function isMissing(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}

/**
 * Base for the dynamic providers. Subclasses implement `create` and `delete`;
 * `diff` is driven by the field lists below and `update` carries previously
 * minted outputs forward under the new inputs without calling the remote side.
 */
export abstract class LifecycleProvider<I extends object, O extends I> implements pulumi.dynamic.ResourceProvider {
  abstract readonly kind: ResourceKind;

  /** Minted values that must exist in recorded state; a gap forces replacement. */
  protected readonly requiredOutputs: readonly (keyof O & string)[] = [];
  /** Inputs the remote side cannot change in place. */
  protected readonly replaceOn: readonly (keyof I & string)[] = [];
  /** Inputs that are only recorded, e.g. credentials needed later for delete. */
  protected readonly updateOn: readonly (keyof I & string)[] = [];
  /** Replacement comparators, strict deep equality by default. */
  protected readonly comparators: Partial<Record<keyof I & string, Comparator>> = {};

  constructor(protected readonly options: ProviderOptions = {}) {}

  abstract create(inputs: I): Promise<LifecycleCreateResult<O>>;

  abstract delete(id: string, props: O): Promise<void>;

  async diff(_id: string, olds: O, news: I): Promise<pulumi.dynamic.DiffResult> {
    const missing = this.requiredOutputs.filter((key) => isMissing(olds[key]));
    if (missing.length > 0) {
      this.log.warn(`recorded state is missing ${missing.join(', ')}, forcing replacement`);
      return { changes: true, replaces: [...missing], deleteBeforeReplace: true };
    }

    const previous: I = olds;
    const replaces = this.replaceOn.filter((key) => {
      const same = this.comparators[key] ?? isDeepStrictEqual;
      return !same(previous[key], news[key]);
    });
    const updates = this.updateOn.filter((key) => !isDeepStrictEqual(previous[key], news[key]));

    return {
      changes: replaces.length > 0 || updates.length > 0,
      replaces,
      stables: [...this.requiredOutputs],
      deleteBeforeReplace: true,
    };
  }

  async update(_id: string, olds: O, news: I): Promise<LifecycleUpdateResult<O>> {
    return { outs: { ...olds, ...news } };
  }

  protected get log(): Logger {
    return scoped(this.options.logger ?? pulumiLogger, this.kind);
  }

  protected api(apiUrl: string): ControlPlaneApi {
    const client = this.options.client ?? new ControlPlaneClient({ ...this.options.retry, logger: this.options.logger });
    return new ControlPlaneApi(apiUrl, client);
  }

  /**
   * Recorded state written by an older or interrupted run may lack what delete
   * needs; such deletes are skipped rather than failing the destroy.
   */
  protected canDelete(id: string, required: Record<string, unknown>): boolean {
    const missing = Object.keys(required).filter((key) => isMissing(required[key]));
    if (missing.length === 0) return true;
    this.log.warn(`skipping delete of ${id}: recorded state is missing ${missing.join(', ')}`);
    return false;
  }

  /** Runs a remote delete, treating 404 as already deleted. */
  protected async deleteRemote(description: string, action: () => Promise<unknown>): Promise<void> {
    try {
      await action();
      this.log.info(`deleted ${description}`);
    } catch (error) {
      if (!isNotFound(error)) throw error;
      this.log.info(`${description} is already gone`);
    }
  }
}
