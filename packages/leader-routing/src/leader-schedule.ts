/**
 * Leader Schedule Helpers
 *
 * An epoch leader schedule maps each identity to the slot indices (relative
 * to the epoch start) it leads.
 */

export type LeaderSchedule = Readonly<Record<string, readonly number[]>>;

/**
 * Identity that leads `slotIndex`.
 *
 * When several identities claim the same slot the lexicographically
 * smallest one wins, so the answer never depends on object key order.
 */
export function leaderForSlot(schedule: LeaderSchedule, slotIndex: number): string | null {
  let leader: string | null = null;

  for (const [identity, slots] of Object.entries(schedule)) {
    if (!slots.includes(slotIndex)) {
      continue;
    }
    if (leader === null || identity < leader) {
      leader = identity;
    }
  }

  return leader;
}

/**
 * Every identity with at least one slot, sorted
 */
export function scheduledLeaders(schedule: LeaderSchedule): string[] {
  return Object.entries(schedule)
    .filter(([, slots]) => slots.length > 0)
    .map(([identity]) => identity)
    .sort();
}
