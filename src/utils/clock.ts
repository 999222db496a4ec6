import { setTimeout as delay } from 'timers/promises';
import type { Clock } from '../types/index.js';

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms: number) => {
    if (ms > 0) {
      await delay(ms);
    }
  },
};
