/**
 * One immutable record in an entity's status log. Stored as JSONB, so the
 * timestamp is kept as an ISO string.
 */
export interface StatusHistoryEntry<S extends string = string> {
  from: S | null;
  to: S;
  reason: string | null;
  changedById: string | null;
  changedAt: string;
}

export const historyEntry = <S extends string>(
  from: S | null,
  to: S,
  reason: string | null,
  changedById: string | null,
  at: Date = new Date(),
): StatusHistoryEntry<S> => ({
  from,
  to,
  reason,
  changedById,
  changedAt: at.toISOString(),
});

// Returns a new array; the stored log is never edited in place.
export const appendHistory = <S extends string>(
  history: readonly StatusHistoryEntry<S>[] | null | undefined,
  entry: StatusHistoryEntry<S>,
): StatusHistoryEntry<S>[] => [...(history ?? []), entry];
