import { JobObservation, PollDecision, nextDecision } from '../../src/uninstaller/state-machine';
import { failed, missing, running, succeeded } from '../helpers/kube';

const cases: [string, JobObservation, number, PollDecision][] = [
  ['a missing job', missing, 0, 'gone'],
  ['a succeeded job', succeeded, 5_000, 'succeed'],
  ['a failed job', failed, 5_000, 'fail'],
  ['a running job past the deadline', running(), 60_000, 'timeout'],
  ['a running job before the deadline', running(), 59_999, 'continue'],
  ['a job that succeeded right at the deadline', succeeded, 60_000, 'succeed'],
];

describe('nextDecision', () => {
  it.each(cases)('decides %s', (_name, observation, elapsedMs, decision) => {
    expect(nextDecision(observation, elapsedMs, 60_000)).toBe(decision);
  });

  it('prefers success when both counters are set', () => {
    expect(nextDecision({ kind: 'present', active: 0, succeeded: 1, failed: 1 }, 0, 1000)).toBe('succeed');
  });
});
