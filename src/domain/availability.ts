/**
 * Outcome of a best-effort operation. "unavailable" is an expected state
 * (a table that failed to load, an audit row that could not be written),
 * not an exception the caller has to handle.
 */
export type Availability<T> = { ok: true; value: T } | { ok: false; reason: string };

export function available<T>(value: T): Availability<T> {
  return { ok: true, value };
}

export function unavailable<T>(reason: string): Availability<T> {
  return { ok: false, reason };
}

export async function attempt<T>(operation: () => Promise<T>): Promise<Availability<T>> {
  try {
    return available(await operation());
  } catch (error) {
    return unavailable(error instanceof Error ? error.message : String(error));
  }
}
