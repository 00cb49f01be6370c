export type SleepFn = (ms: number) => Promise<void>;

export interface Clock {
  now(): number;
  sleep: SleepFn;
}

export const sleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};
