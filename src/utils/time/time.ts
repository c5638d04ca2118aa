/**
 * Timer adapter over Node's timers
 */

import type { TimerAPI } from '$types/common';

/**
 * Timer backed by Node's timers
 *
 * Timers are unref'd so a pending drain never keeps the process alive.
 */
export function createNodeTimer(): TimerAPI {
  return {
    set: function (intervalMs: number, repeat: boolean, callback: () => void): void {
      const handle = repeat ? setInterval(callback, intervalMs) : setTimeout(callback, intervalMs);
      handle.unref();
    }
  };
}
