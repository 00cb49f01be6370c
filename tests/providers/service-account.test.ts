import { ServiceAccountOutputs, ServiceAccountProvider } from '../../src/providers/service-account';
import { API_URL, harness } from '../helpers/fakes';

const inputs = { name: 'acme-byoc-ef7a-sa', apiUrl: API_URL, cpgwApiKey: 'test-cpgw-key' };
const recorded: ServiceAccountOutputs = { ...inputs, clientId: 'client-1', clientSecret: 'test-secret' };

describe('ServiceAccountProvider', () => {
  it('records the client credentials returned at creation', async () => {
    const { client, logger } = harness({
      status: 200,
      body: { id: 'sa-1', client_id: 'client-1', client_secret: 'test-secret' },
    });
    const provider = new ServiceAccountProvider({ client, logger });

    await expect(provider.create(inputs)).resolves.toEqual({ id: 'sa-1', outs: recorded });
  });

  it('replaces the account when its secret is missing from state', async () => {
    const provider = new ServiceAccountProvider({ logger: harness().logger });

    const diff = await provider.diff('sa-1', { ...recorded, clientSecret: '' }, inputs);

    expect(diff).toMatchObject({ changes: true, replaces: ['clientSecret'] });
  });

  it('keeps minted credentials when the cpgw key rotates', async () => {
    const provider = new ServiceAccountProvider({ logger: harness().logger });
    const news = { ...inputs, cpgwApiKey: 'test-rotated-key' };

    await expect(provider.diff('sa-1', recorded, news)).resolves.toMatchObject({ changes: true, replaces: [] });
    await expect(provider.update('sa-1', recorded, news)).resolves.toEqual({
      outs: { ...recorded, cpgwApiKey: 'test-rotated-key' },
    });
  });

  it('deletes with the recorded cpgw key', async () => {
    const { client, http, logger } = harness({ status: 204 });
    const provider = new ServiceAccountProvider({ client, logger });

    await provider.delete('sa-1', recorded);

    expect(http.requests[0]?.url).toBe(`${API_URL}/internal/cpgw/infra/service-accounts/sa-1`);
    expect(http.requests[0]?.headers.get('Api-Key')).toBe('test-cpgw-key');
  });
});
