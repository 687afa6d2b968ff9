import { setTimeout as delay } from 'timers/promises';
import type { IClock } from '../../domain/interfaces';

/**
 * Wall-clock implementation of IClock
 */
export class SystemClock implements IClock {
  now(): number {
    return Date.now();
  }

  async sleep(ms: number): Promise<void> {
    await delay(ms);
  }
}
