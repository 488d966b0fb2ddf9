/**
 * Timer helpers.
 */

/** Largest delay setTimeout honours; longer delays fire after 1 ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * setTimeout that is never armed for delays beyond MAX_TIMER_DELAY_MS.
 * Callers that need such bounds check elapsed time themselves.
 */
export function armTimer(delayMs: number, onExpire: () => void): ReturnType<typeof setTimeout> | undefined {
  if (delayMs > MAX_TIMER_DELAY_MS) {
    return undefined;
  }
  return setTimeout(onExpire, delayMs);
}
