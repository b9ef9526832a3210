/**
 * Outcome of an auto-correction attempt for an ERROR finding. In lenient mode
 * a successful correction replaces the offending value and the finding stays an
 * ERROR; a failed one escalates the finding to FATAL.
 */
export type Correction<T> =
  | { ok: true; value: T; note: string }
  | { ok: false; reason: string };

export function corrected<T>(value: T, note: string): Correction<T> {
  return { ok: true, value, note };
}

export function uncorrectable<T>(reason: string): Correction<T> {
  return { ok: false, reason };
}
