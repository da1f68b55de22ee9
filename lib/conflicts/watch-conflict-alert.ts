// lib/conflicts/watch-conflict-alert.ts
// Binds a ConflictAlertTracker to the live alert fields of one account

import type { CancelHandle, RecordStore } from '@/lib/records/record-store';
import { CONFLICT_ALERT_FIELDS, toConflictAlertFields } from '@/types/intake';

import type { ConflictAlertTracker } from './conflict-alert-tracker';

/**
 * Evaluate the tracker on every snapshot of the account's alert fields.
 * Returns the subscription's cancel handle.
 */
export function watchConflictAlert(
  store: Pick<RecordStore, 'subscribe'>,
  tracker: ConflictAlertTracker
): CancelHandle {
  return store.subscribe(
    tracker.recordId,
    CONFLICT_ALERT_FIELDS,
    (snapshot) => {
      tracker.evaluate(toConflictAlertFields(snapshot)).catch((error: unknown) => {
        tracker.reportLoadFailure(error);
      });
    },
    (error) => tracker.reportLoadFailure(error)
  );
}
