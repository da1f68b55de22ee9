/**
 * Potential Conflict Matches
 *
 * Lists existing accounts that may conflict with an intake account, for the
 * "view matches" panel of the conflict alert. Matching itself happens in the
 * database (`find_potential_conflicts`); this module shapes the rows.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import { getErrorMessage } from '@/lib/errors';
import { errorToast, showToast, type ToastSignal } from '@/lib/notifications/toast';
import { createLogger } from '@/lib/security/logger';

const log = createLogger('potential-matches');

export interface PotentialMatch {
  id: string;
  name: string;
  subtitle: string;
  url: string;
}

export type ConflictMatchSource = (accountId: string) => Promise<unknown>;

const matchRowSchema = z.object({
  id: z.string().min(1),
  name: z.string().nullish(),
  phone: z.string().nullish(),
  email: z.string().nullish(),
});

/**
 * Map raw match rows for display. Subtitle is the phone, then the email.
 * A non-array result yields no matches; malformed rows are dropped.
 */
export function toPotentialMatches(rows: unknown): PotentialMatch[] {
  if (!Array.isArray(rows)) return [];

  const matches: PotentialMatch[] = [];
  for (const row of rows) {
    const parsed = matchRowSchema.safeParse(row);
    if (!parsed.success) {
      log.warn('Dropping malformed match row', { issues: parsed.error.issues.length });
      continue;
    }
    const { id, name, phone, email } = parsed.data;
    matches.push({
      id,
      name: name ?? '',
      subtitle: phone || email || '',
      url: `/${id}`,
    });
  }
  return matches;
}

/**
 * Load potential matches for an account. Failures raise an error toast and
 * yield an empty list.
 */
export async function findPotentialMatches(
  source: ConflictMatchSource,
  accountId: string,
  toasts: ToastSignal
): Promise<PotentialMatch[]> {
  try {
    return toPotentialMatches(await source(accountId));
  } catch (error) {
    log.error('Failed to load potential matches', { accountId, error: getErrorMessage(error) });
    showToast(toasts, errorToast('Failed to load potential matches', getErrorMessage(error)));
    return [];
  }
}

/**
 * Match source backed by the `find_potential_conflicts` database function.
 */
export function createSupabaseConflictMatchSource(
  client: SupabaseClient,
  fn: string = 'find_potential_conflicts'
): ConflictMatchSource {
  return async (accountId) => {
    const { data, error } = await client.rpc(fn, { account_id: accountId });
    if (error) {
      throw new Error(error.message);
    }
    return data;
  };
}
