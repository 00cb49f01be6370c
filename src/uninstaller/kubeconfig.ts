import * as YAML from 'yaml';
import { z } from 'zod';
import { UninstallError, errorMessage } from '../core/errors';

const namedEntry = z.object({ name: z.string() }).passthrough();

const namedUser = z
  .object({
    name: z.string(),
    user: z.record(z.unknown()).default({}),
  })
  .passthrough();

const kubeconfigDocument = z
  .object({
    clusters: z.array(namedEntry).default([]),
    contexts: z.array(namedEntry).default([]),
    users: z.array(namedUser).default([]),
    'current-context': z.string().optional(),
  })
  .passthrough();

const execConfig = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).nullish(),
  env: z.array(z.object({ name: z.string(), value: z.string() })).nullish(),
});

export type KubeconfigDocument = z.infer<typeof kubeconfigDocument>;

/** Credential plugin declared under `users[].user.exec`. */
export interface ExecPlugin {
  command: string;
  args: string[];
  env: Record<string, string>;
}

/**
 * Parses kubeconfig content. EKS-style configs arrive as JSON, GKE and AKS ones
 * as YAML; JSON is tried first.
 */
export function parseKubeconfig(raw: string): KubeconfigDocument {
  const parsed = parseText(raw);
  const result = kubeconfigDocument.safeParse(parsed);
  if (!result.success || result.data.users.length === 0) {
    throw new UninstallError('kubeconfig does not describe any user; expected a kubeconfig document');
  }
  return result.data;
}

function parseText(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    try {
      return YAML.parse(raw);
    } catch (error) {
      throw new UninstallError(`Failed to parse kubeconfig as JSON or YAML: ${errorMessage(error)}`, { cause: error });
    }
  }
}

export function usesExecAuth(kubeconfig: KubeconfigDocument): boolean {
  return kubeconfig.users.some((entry) => entry.user['exec'] !== undefined);
}

/** First exec plugin among the users, if any. */
export function execPluginOf(kubeconfig: KubeconfigDocument): ExecPlugin | undefined {
  for (const entry of kubeconfig.users) {
    const parsed = execConfig.safeParse(entry.user['exec']);
    if (!parsed.success) continue;
    const env: Record<string, string> = {};
    for (const variable of parsed.data.env ?? []) {
      env[variable.name] = variable.value;
    }
    return { command: parsed.data.command, args: parsed.data.args ?? [], env };
  }
  return undefined;
}

/** Returns a copy in which every user authenticates with the given bearer token. */
export function withBearerToken(kubeconfig: KubeconfigDocument, token: string): KubeconfigDocument {
  return {
    ...kubeconfig,
    users: kubeconfig.users.map((entry) => ({ ...entry, user: { token } })),
  };
}

/**
 * Name of the context the config points at: `current-context`, else the first
 * context, else the first cluster.
 */
export function extractContextName(kubeconfig: KubeconfigDocument): string | undefined {
  return kubeconfig['current-context'] || kubeconfig.contexts[0]?.name || kubeconfig.clusters[0]?.name;
}
