import { ControlPlaneClient } from '../../src/api/client';
import { ControlPlaneApiError, ControlPlaneInternalError } from '../../src/core/errors';
import { ApiKeyInputs, ApiKeyOutputs, ApiKeyProvider } from '../../src/providers/api-key';
import { API_URL, AUTH_DOMAIN, FakeClock, RecordingLogger, ScriptedFetch } from '../helpers/fakes';

const inputs: ApiKeyInputs = {
  orgId: 'org-1',
  projectName: 'sli-checkers',
  keyName: 'acme-byoc-ef7a-key',
  apiUrl: API_URL,
  authDomain: AUTH_DOMAIN,
  clientId: 'client-1',
  clientSecret: 'test-secret',
};

const recorded: ApiKeyOutputs = { ...inputs, apiKeyId: 'ak-1', value: 'test-project-key', projectId: 'proj-1' };

const TOKEN = { status: 200, body: { access_token: 'test-token' } };
const PROJECT = { status: 200, body: { id: 'proj-1' } };

function setup(...responses: ConstructorParameters<typeof ScriptedFetch>) {
  const http = new ScriptedFetch(...responses);
  const logger = new RecordingLogger();
  const client = new ControlPlaneClient({ fetch: http.fetch, sleep: new FakeClock().sleep, logger, maxRetries: 0 });
  return { http, logger, provider: new ApiKeyProvider({ client, logger }) };
}

describe('ApiKeyProvider', () => {
  it('creates a project and mints a key in it', async () => {
    const { http, provider } = setup(TOKEN, PROJECT, {
      status: 200,
      body: { key: { id: 'ak-1', project_id: 'proj-1' }, value: 'test-project-key' },
    });

    await expect(provider.create(inputs)).resolves.toEqual({ id: 'proj-1', outs: recorded });
    expect(http.requests.map((r) => `${r.method} ${r.url}`)).toEqual([
      `POST ${AUTH_DOMAIN}/oauth/token`,
      `POST ${API_URL}/management/organizations/org-1/projects`,
      `POST ${API_URL}/management/projects/proj-1/api-keys`,
    ]);
  });

  it('deletes the project when minting the key fails', async () => {
    const { http, logger, provider } = setup(
      TOKEN,
      PROJECT,
      { status: 403, body: { detail: 'forbidden' } },
      { status: 204 },
    );

    const error = await provider.create(inputs).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ControlPlaneApiError);
    expect(error).toMatchObject({ status: 403, cleanupFailures: [] });
    expect(`${http.requests[3]?.method} ${http.requests[3]?.url}`).toBe(`DELETE ${API_URL}/management/projects/proj-1`);
    expect(http.requests[3]?.headers.get('Authorization')).toBe('Bearer test-token');
    expect(logger.messages('info')).toContain('[Cleanup] rolling back: delete project proj-1');
  });

  it('attaches a failed rollback to the original error', async () => {
    const { provider, logger } = setup(
      TOKEN,
      PROJECT,
      { status: 403, body: { detail: 'forbidden' } },
      { status: 500, body: 'rollback exploded' },
    );

    const error = await provider.create(inputs).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ControlPlaneApiError);
    if (!(error instanceof ControlPlaneApiError)) return;
    expect(error.status).toBe(403);
    expect(error.cleanupFailures).toHaveLength(1);
    expect(error.cleanupFailures[0]?.description).toBe('delete project proj-1');
    expect(error.cleanupFailures[0]?.error).toBeInstanceOf(ControlPlaneInternalError);
    expect(logger.messages('warn')).toHaveLength(1);
  });

  it('does not roll anything back when the project itself fails', async () => {
    const { http, provider } = setup(TOKEN, { status: 409, body: { detail: 'exists' } });

    await expect(provider.create(inputs)).rejects.toMatchObject({ status: 409, cleanupFailures: [] });
    expect(http.requests).toHaveLength(2);
  });

  it('replaces the key when the key name changes', async () => {
    const { provider } = setup();

    const diff = await provider.diff('proj-1', recorded, { ...inputs, keyName: 'other-key' });

    expect(diff.replaces).toEqual(['keyName']);
  });

  it('deletes the project with a fresh token', async () => {
    const { http, provider } = setup(TOKEN, { status: 202, body: '' });

    await provider.delete('proj-1', recorded);

    expect(http.requests.map((r) => `${r.method} ${r.url}`)).toEqual([
      `POST ${AUTH_DOMAIN}/oauth/token`,
      `DELETE ${API_URL}/management/projects/proj-1`,
    ]);
  });

  it('skips delete when the service account credentials are gone from state', async () => {
    const { http, logger, provider } = setup();

    await provider.delete('proj-1', { ...recorded, clientSecret: '' });

    expect(http.requests).toEqual([]);
    expect(logger.messages('warn')).toEqual([
      '[project-api-key] skipping delete of proj-1: recorded state is missing clientSecret',
    ]);
  });
});
