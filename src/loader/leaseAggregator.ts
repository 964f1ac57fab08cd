/**
 * Share of the shortest lease after which a refresh is due
 */
export const REFRESH_RATIO = 0.75;

function normalizeLease(lease: number | undefined): number {
  if (lease === undefined || Number.isNaN(lease) || lease < 0) {
    return 0;
  }
  return lease;
}

/**
 * Refresh interval derived from the token lease and the shortest secret lease of a cycle.
 * An unset or zero lease governs, so the next cycle is due immediately.
 */
export function computeRefreshInterval(tokenTtl?: number, minSecretTtl?: number): number {
  const shortest = Math.min(normalizeLease(tokenTtl), normalizeLease(minSecretTtl));
  return Math.floor(REFRESH_RATIO * shortest);
}

/**
 * Shortest of the given leases, undefined when there are none
 */
export function minLease(leases: number[]): number | undefined {
  let min: number | undefined;
  for (const lease of leases) {
    const normalized = normalizeLease(lease);
    if (min === undefined || normalized < min) {
      min = normalized;
    }
  }
  return min;
}
