export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Window after `staleSince` in which updates are attributed to the sweeper's
 * own label and comment rather than to a person.
 */
export const STALE_MARK_GRACE_MS = 60 * 1000;

/** Whole days elapsed between `date` and `now`. */
export function daysSince(date: Date, now: Date = new Date()): number {
  return Math.floor((now.getTime() - date.getTime()) / MS_PER_DAY);
}

/**
 * Activity that lands within `graceMs` after the stale mark is folded back
 * onto the mark itself, so marking an entity stale never counts as an update.
 */
export function effectiveLastActivity(
  lastActivityAt: Date,
  staleSince: Date | undefined,
  graceMs: number = STALE_MARK_GRACE_MS,
): Date {
  if (!staleSince) return lastActivityAt;
  const delta = lastActivityAt.getTime() - staleSince.getTime();
  if (delta > 0 && delta <= graceMs) return staleSince;
  return lastActivityAt;
}

export function latestDate(dates: Iterable<Date | undefined>): Date | undefined {
  let latest: Date | undefined;
  for (const d of dates) {
    if (!d || Number.isNaN(d.getTime())) continue;
    if (!latest || d.getTime() > latest.getTime()) latest = d;
  }
  return latest;
}
