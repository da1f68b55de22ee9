/**
 * Record Store Contract
 *
 * The intake workflow never owns account data. Every read and write goes
 * through this interface; the production implementation is
 * SupabaseRecordStore, tests use an in-process store.
 *
 * fetch/subscribe failures are RecordFetchError, update failures
 * RecordPersistenceError.
 */

import type { AccountField, AccountSnapshot, AccountUpdate } from '@/types/intake';

export type CancelHandle = () => void;

export type SnapshotListener = (snapshot: AccountSnapshot) => void;
export type FailureListener = (error: Error) => void;

export interface RecordStore {
  /** Read the current values of `fields` for one account */
  fetch(id: string, fields: readonly AccountField[]): Promise<AccountSnapshot>;

  /** Write field values; callers may retry on failure */
  update(id: string, values: AccountUpdate): Promise<void>;

  /** Best-effort hint that other readers of `id` should re-read */
  notifyChanged(id: string): void;

  /** Re-read `id` and deliver the result to every subscriber of it */
  refresh(id: string): Promise<void>;

  /**
   * Deliver a snapshot now and again whenever the record changes.
   * The returned handle stops delivery; no listener fires after it returns.
   */
  subscribe(
    id: string,
    fields: readonly AccountField[],
    onSnapshot: SnapshotListener,
    onFailure: FailureListener
  ): CancelHandle;
}
