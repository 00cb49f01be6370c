export function baseUrl(apiUrl: string): string {
  return apiUrl.replace(/\/+$/, '');
}

/** Root of the cpgw infra routes (service accounts, DNS, metrics, vendor keys). */
export function cpgwInfraUrl(apiUrl: string): string {
  return `${baseUrl(apiUrl)}/internal/cpgw/infra`;
}

/** Routes authenticated with the user's own API key, before any cpgw key exists. */
export function bootstrapUrl(apiUrl: string): string {
  return `${cpgwInfraUrl(apiUrl)}/bootstrap`;
}

export function managementUrl(apiUrl: string): string {
  return `${baseUrl(apiUrl)}/management`;
}

export function cpgwHeaders(apiKey: string): Record<string, string> {
  return {
    'Api-Key': apiKey,
    'Content-Type': 'application/json',
  };
}

export function managementHeaders(token: string): Record<string, string> {
  return {
    Authorization: `Bearer ${token}`,
    'Content-Type': 'application/json',
    'X-Api-Version': 'unstable',
  };
}
