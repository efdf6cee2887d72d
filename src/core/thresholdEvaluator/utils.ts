/**
 * Larger of the locally applied and the remote stop loss; null when neither is set.
 */
export function effectiveStopLoss(applied: number | null, remote: number | null): number | null {
  if (applied === null) {
    return remote;
  }
  if (remote === null) {
    return applied;
  }
  return Math.max(applied, remote);
}
