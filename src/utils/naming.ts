export const ORG_NAME_MAX_LENGTH = 16;

const BYOC_SUFFIX = '.byoc';

/**
 * Short identifier of a deployment cell, e.g. `acme-byoc-ef7a` for org "Acme"
 * and environment `prod-ef7a.byoc`.
 */
export function cellName(orgName: string, envName: string): string {
  const org = orgName.toLowerCase().replace(/[^a-z0-9]/g, '').slice(0, ORG_NAME_MAX_LENGTH);
  const firstLabel = envName.split('.')[0] ?? '';
  return `${org}-byoc-${firstLabel.slice(-4)}`;
}

/** Subdomain delegated to the cluster: the environment name without `.byoc`. */
export function delegatedSubdomain(envName: string): string {
  return envName.endsWith(BYOC_SUFFIX) ? envName.slice(0, -BYOC_SUFFIX.length) : envName;
}
