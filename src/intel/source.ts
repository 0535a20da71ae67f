/**
 * Outcome of one data-source lookup. A source that has nothing to say is
 * an explicit `available: false`, never an exception.
 */
export type SourceResult<T> =
  | { available: true; data: T }
  | { available: false; error: string };

export async function settle<T>(load: () => Promise<T | null>): Promise<SourceResult<T>> {
  try {
    const data = await load();
    if (data === null) {
      return { available: false, error: 'No data returned' };
    }
    return { available: true, data };
  } catch (error) {
    return {
      available: false,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

export function unavailable<T>(error: string): SourceResult<T> {
  return { available: false, error };
}

export interface SourceHealth {
  ok: boolean;
  error?: string;
}
