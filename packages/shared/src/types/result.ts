/**
 * Outcome of one stage of a job pass. Stages return failures instead of
 * throwing so the pass can decide what still gets reported.
 */
export type StageResult<T> = { ok: true; value: T } | { ok: false; error: Error };

export function ok<T>(value: T): StageResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: Error): StageResult<T> {
  return { ok: false, error };
}
