import { ControlPlaneClient } from './client';
import { baseUrl } from './endpoints';
import { parseResponse, tokenResponse } from './schemas';

/** Client credentials of a control-plane service account. */
export interface OAuthCredentials {
  /** Authorization server, e.g. https://login.example.com */
  domain: string;
  clientId: string;
  clientSecret: string;
}

/**
 * Exchanges client credentials for a bearer token scoped to the management API.
 * Tokens are short lived and never persisted; callers fetch one per operation.
 */
export async function fetchAccessToken(
  client: ControlPlaneClient,
  apiUrl: string,
  credentials: OAuthCredentials,
): Promise<string> {
  const body = await client.request('POST', `${baseUrl(credentials.domain)}/oauth/token`, {
    headers: {
      'Content-Type': 'application/json',
      'cache-control': 'no-cache',
    },
    body: {
      client_id: credentials.clientId,
      client_secret: credentials.clientSecret,
      audience: `${baseUrl(apiUrl)}/`,
      grant_type: 'client_credentials',
    },
  });
  return parseResponse(tokenResponse, body, 'oauth token exchange').access_token;
}
