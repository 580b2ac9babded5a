/** Largest delay setTimeout honours; longer delays fire after 1 ms. */
export const MAX_TIMER_MS = 2_147_483_647;
