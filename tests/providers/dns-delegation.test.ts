import {
  DnsDelegationInputs,
  DnsDelegationOutputs,
  DnsDelegationProvider,
  sameNameservers,
} from '../../src/providers/dns-delegation';
import { API_URL, harness } from '../helpers/fakes';

/** What the engine hands a provider for an output that is not known yet. */
const UNKNOWN = '04da6b54-80e4-46f7-96ec-b56ff0331ba9';

const inputs = {
  subdomain: 'prod-ef7a',
  nameservers: ['ns-1.test.', 'ns-2.test.'],
  apiUrl: API_URL,
  cpgwApiKey: 'test-cpgw-key',
};

const recorded: DnsDelegationOutputs = {
  ...inputs,
  fqdn: 'prod-ef7a.byoc.example.io',
  changeId: 'c-1',
  status: 'PENDING',
};

describe('sameNameservers', () => {
  it('ignores order, case and duplicates', () => {
    expect(sameNameservers(['b.test.', 'A.test.'], ['a.test.', 'b.test.', 'b.test.'])).toBe(true);
    expect(sameNameservers(['a.test.'], ['a.test.', 'b.test.'])).toBe(false);
  });

  it('never matches a value that is not a list of names', () => {
    expect(sameNameservers(['a.test.'], UNKNOWN)).toBe(false);
    expect(sameNameservers(['a.test.'], ['a.test.', 42])).toBe(false);
    expect(sameNameservers(undefined, [])).toBe(true);
  });
});

describe('DnsDelegationProvider', () => {
  it('creates the delegation keyed by its fqdn', async () => {
    const { client, http, logger } = harness({
      status: 200,
      body: { change_id: 'c-1', status: 'PENDING', fqdn: 'prod-ef7a.byoc.example.io' },
    });
    const provider = new DnsDelegationProvider({ client, logger });

    await expect(provider.create(inputs)).resolves.toEqual({ id: 'prod-ef7a.byoc.example.io', outs: recorded });
    expect(http.requests[0]?.body).toEqual({ subdomain: 'prod-ef7a', nameservers: ['ns-1.test.', 'ns-2.test.'] });
  });

  it('sees no change when only the nameserver order differs', async () => {
    const provider = new DnsDelegationProvider({ logger: harness().logger });

    const diff = await provider.diff(recorded.fqdn, recorded, { ...inputs, nameservers: ['ns-2.test.', 'ns-1.test.'] });

    expect(diff.changes).toBe(false);
  });

  it('updates rather than replaces when the nameserver set changes', async () => {
    const provider = new DnsDelegationProvider({ logger: harness().logger });

    const diff = await provider.diff(recorded.fqdn, recorded, { ...inputs, nameservers: ['ns-3.test.'] });

    expect(diff).toMatchObject({ changes: true, replaces: [] });
  });

  it('reports a change when the new nameservers are not known yet', async () => {
    const provider = new DnsDelegationProvider({ logger: harness().logger });
    // Raw wire props, as the engine passes them during preview.
    const news: DnsDelegationInputs = JSON.parse(JSON.stringify({ ...inputs, nameservers: UNKNOWN }));

    const diff = await provider.diff(recorded.fqdn, recorded, news);

    expect(diff).toEqual({ changes: true, replaces: [], stables: ['fqdn'], deleteBeforeReplace: true });
  });

  it('replaces when the subdomain changes', async () => {
    const provider = new DnsDelegationProvider({ logger: harness().logger });

    const diff = await provider.diff(recorded.fqdn, recorded, { ...inputs, subdomain: 'dev-0001' });

    expect(diff.replaces).toEqual(['subdomain']);
  });

  it('re-creates the delegation with the new nameservers on update', async () => {
    const { client, http, logger } = harness({
      status: 200,
      body: { change_id: 'c-2', status: 'INSYNC', fqdn: 'prod-ef7a.byoc.example.io' },
    });
    const provider = new DnsDelegationProvider({ client, logger });
    const news = { ...inputs, nameservers: ['ns-3.test.', 'ns-4.test.'] };

    const result = await provider.update(recorded.fqdn, recorded, news);

    expect(result.outs).toEqual({ ...recorded, nameservers: ['ns-3.test.', 'ns-4.test.'], changeId: 'c-2', status: 'INSYNC' });
    expect(http.requests[0]?.url).toBe(`${API_URL}/internal/cpgw/infra/dns-delegation`);
    expect(http.requests[0]?.body).toEqual({ subdomain: 'prod-ef7a', nameservers: ['ns-3.test.', 'ns-4.test.'] });
  });

  it('records a rotated key without calling the control plane', async () => {
    const { client, http, logger } = harness();
    const provider = new DnsDelegationProvider({ client, logger });

    const result = await provider.update(recorded.fqdn, recorded, { ...inputs, cpgwApiKey: 'test-rotated-key' });

    expect(result.outs).toEqual({ ...recorded, cpgwApiKey: 'test-rotated-key' });
    expect(http.requests).toEqual([]);
  });

  it('deletes exactly the pair recorded in state', async () => {
    const { client, http, logger } = harness({ status: 200, body: { change_id: 'c-9', status: 'PENDING' } });
    const provider = new DnsDelegationProvider({ client, logger });

    await provider.delete(recorded.fqdn, recorded);

    expect(http.requests[0]?.url).toBe(`${API_URL}/internal/cpgw/infra/dns-delegation/delete`);
    expect(http.requests[0]?.body).toEqual({ subdomain: 'prod-ef7a', nameservers: ['ns-1.test.', 'ns-2.test.'] });
  });

  it('skips delete when no nameservers were recorded', async () => {
    const { client, http, logger } = harness();
    const provider = new DnsDelegationProvider({ client, logger });

    await provider.delete(recorded.fqdn, { ...recorded, nameservers: [] });

    expect(http.requests).toEqual([]);
    expect(logger.messages('warn')).toEqual([
      '[dns-delegation] skipping delete of prod-ef7a.byoc.example.io: recorded state is missing nameservers',
    ]);
  });
});
