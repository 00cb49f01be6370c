/** What one poll of the uninstall job returned. */
export type JobObservation =
  | { kind: 'missing' }
  | { kind: 'present'; active: number; succeeded: number; failed: number };

export type PollDecision = 'gone' | 'succeed' | 'fail' | 'timeout' | 'continue';

export type UninstallPhase = 'pending' | 'submitted' | 'succeeded' | 'failed' | 'timed-out' | 'already-gone';

/** Terminal phase reached by each final decision. */
export const PHASE_FOR_DECISION: Record<Exclude<PollDecision, 'continue'>, UninstallPhase> = {
  gone: 'already-gone',
  succeed: 'succeeded',
  fail: 'failed',
  timeout: 'timed-out',
};

/**
 * Transition function of the poll loop. Terminal job states win over the
 * deadline, so a job that finished during the last interval is still reported.
 */
export function nextDecision(observation: JobObservation, elapsedMs: number, timeoutMs: number): PollDecision {
  if (observation.kind === 'missing') return 'gone';
  if (observation.succeeded > 0) return 'succeed';
  if (observation.failed > 0) return 'fail';
  if (elapsedMs >= timeoutMs) return 'timeout';
  return 'continue';
}
