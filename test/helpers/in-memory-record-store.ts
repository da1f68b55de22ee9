// test/helpers/in-memory-record-store.ts
// In-process RecordStore for tests. refresh() and deliver() push the current
// record to subscribers synchronously; update() and notifyChanged() only record the call.

import { RecordFetchError, RecordPersistenceError } from '@/lib/errors';
import type { CancelHandle, FailureListener, RecordStore, SnapshotListener } from '@/lib/records/record-store';
import type { AccountField, AccountFields, AccountSnapshot, AccountUpdate } from '@/types/intake';

interface Subscriber {
  fields: readonly AccountField[];
  onSnapshot: SnapshotListener;
  onFailure: FailureListener;
}

export class InMemoryRecordStore implements RecordStore {
  readonly records: Map<string, Partial<AccountFields>> = new Map();
  readonly updates: Array<{ id: string; values: AccountUpdate }> = [];
  readonly notified: string[] = [];
  failNextFetch: Error | null = null;
  failUpdates: Error | null = null;
  refreshCount = 0;

  private readonly subscribers: Map<string, Set<Subscriber>> = new Map();

  seed(id: string, fields: Partial<AccountFields>): void {
    this.records.set(id, { ...fields });
  }

  /** Simulates a change made by another process (no notification) */
  patch(id: string, fields: Partial<AccountFields>): void {
    this.records.set(id, { ...this.records.get(id), ...fields });
  }

  async fetch(id: string, fields: readonly AccountField[]): Promise<AccountSnapshot> {
    return this.read(id, fields);
  }

  async update(id: string, values: AccountUpdate): Promise<void> {
    if (this.failUpdates) {
      throw new RecordPersistenceError(id, this.failUpdates.message);
    }
    this.updates.push({ id, values });
    this.patch(id, values);
  }

  notifyChanged(id: string): void {
    this.notified.push(id);
  }

  async refresh(id: string): Promise<void> {
    this.refreshCount += 1;
    this.deliver(id);
  }

  subscribe(
    id: string,
    fields: readonly AccountField[],
    onSnapshot: SnapshotListener,
    onFailure: FailureListener
  ): CancelHandle {
    const subscriber: Subscriber = { fields, onSnapshot, onFailure };
    const set = this.subscribers.get(id) ?? new Set<Subscriber>();
    set.add(subscriber);
    this.subscribers.set(id, set);
    this.deliverTo(id, subscriber);
    return () => {
      set.delete(subscriber);
    };
  }

  /** Push the current record to every subscriber, as a realtime event would */
  deliver(id: string): void {
    for (const subscriber of this.subscribers.get(id) ?? []) {
      this.deliverTo(id, subscriber);
    }
  }

  private deliverTo(id: string, subscriber: Subscriber): void {
    let snapshot: AccountSnapshot;
    try {
      snapshot = this.read(id, subscriber.fields);
    } catch (error) {
      subscriber.onFailure(error instanceof Error ? error : new Error(String(error)));
      return;
    }
    subscriber.onSnapshot(snapshot);
  }

  private read(id: string, fields: readonly AccountField[]): AccountSnapshot {
    if (this.failNextFetch) {
      const error = this.failNextFetch;
      this.failNextFetch = null;
      throw new RecordFetchError(id, error.message);
    }
    const record = this.records.get(id);
    if (!record) {
      throw new RecordFetchError(id, 'not found');
    }
    const snapshot: AccountSnapshot = { id };
    for (const field of fields) {
      Object.assign(snapshot, { [field]: record[field] ?? null });
    }
    return snapshot;
  }
}
