// lib/conflicts/signature.ts
// Conflict alert signatures: a normalized form of the conflict score used to
// tell whether the condition behind a dismissed alert has changed.

export type ConflictScore = number | string | null | undefined;

/**
 * Signature for a conflict score.
 *
 * Numeric input (number or numeric string) normalizes through Number, so
 * 5, 5.0, "5" and "5.0" all produce "5". Anything else falls back to its
 * trimmed string form. Absent or blank scores produce "".
 */
export function buildSignature(score: ConflictScore): string {
  if (score === null || score === undefined) return '';
  if (typeof score === 'string' && score.trim() === '') return '';

  const n = Number(score);
  return Number.isFinite(n) ? String(n) : String(score).trim();
}

/**
 * Older records stored composite signatures ("<message>|<score>").
 * Only the last segment is significant.
 */
export function normalizeServerSignature(raw: string | null | undefined): string {
  if (!raw) return '';
  const parts = String(raw).split('|');
  return parts[parts.length - 1].trim();
}
