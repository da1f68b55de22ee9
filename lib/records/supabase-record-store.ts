/**
 * Supabase Record Store
 *
 * Reads and writes intake accounts through PostgREST and keeps subscribers
 * current with one realtime channel per subscription. In-process readers of
 * the same account are re-read on refresh()/notifyChanged(), which covers
 * writes made by this process before the realtime event arrives.
 */

import type { RealtimeChannel, SupabaseClient } from '@supabase/supabase-js';

import { getAccountsTable } from '@/lib/config/intake-config';
import { getErrorMessage, RecordFetchError, RecordPersistenceError } from '@/lib/errors';
import { createLogger } from '@/lib/security/logger';
import type { AccountField, AccountSnapshot, AccountUpdate } from '@/types/intake';

import { parseAccountRow, selectColumns, toAccountColumns } from './account-row';
import type { CancelHandle, FailureListener, RecordStore, SnapshotListener } from './record-store';

const log = createLogger('supabase-record-store');

type Delivery = () => Promise<void>;

function toFetchError(id: string, error: unknown): RecordFetchError {
  if (error instanceof RecordFetchError) return error;
  return new RecordFetchError(id, getErrorMessage(error), { cause: error });
}

export class SupabaseRecordStore implements RecordStore {
  private readonly client: SupabaseClient;
  private readonly table: string;
  private readonly deliveries: Map<string, Set<Delivery>> = new Map();
  private channelSeq = 0;

  constructor(client: SupabaseClient, table: string = getAccountsTable()) {
    this.client = client;
    this.table = table;
  }

  async fetch(id: string, fields: readonly AccountField[]): Promise<AccountSnapshot> {
    const { data, error } = await this.client
      .from(this.table)
      .select(selectColumns(fields))
      .eq('id', id)
      .single();

    if (error) {
      throw new RecordFetchError(id, error.message);
    }

    const parsed = parseAccountRow(data);
    if (!parsed.success) {
      throw new RecordFetchError(id, `malformed row (${parsed.error})`);
    }
    return parsed.snapshot;
  }

  async update(id: string, values: AccountUpdate): Promise<void> {
    const { error } = await this.client
      .from(this.table)
      .update(toAccountColumns(values))
      .eq('id', id);

    if (error) {
      throw new RecordPersistenceError(id, error.message);
    }
  }

  notifyChanged(id: string): void {
    this.refresh(id).catch((error: unknown) => {
      log.warn('Change notification failed', { recordId: id, error: getErrorMessage(error) });
    });
  }

  async refresh(id: string): Promise<void> {
    const pending = this.deliveries.get(id);
    if (!pending || pending.size === 0) return;
    await Promise.all([...pending].map(deliver => deliver()));
  }

  subscribe(
    id: string,
    fields: readonly AccountField[],
    onSnapshot: SnapshotListener,
    onFailure: FailureListener
  ): CancelHandle {
    let active = true;

    const deliver: Delivery = async () => {
      let snapshot: AccountSnapshot;
      try {
        snapshot = await this.fetch(id, fields);
      } catch (error) {
        if (active) onFailure(toFetchError(id, error));
        return;
      }
      if (active) onSnapshot(snapshot);
    };

    const registered = this.deliveries.get(id) ?? new Set<Delivery>();
    registered.add(deliver);
    this.deliveries.set(id, registered);

    const channel: RealtimeChannel = this.client
      .channel(`intake-account-${id}-${++this.channelSeq}`)
      .on(
        'postgres_changes',
        {
          event: 'UPDATE',
          schema: 'public',
          table: this.table,
          filter: `id=eq.${id}`,
        },
        () => {
          void deliver();
        }
      )
      .subscribe((status: string) => {
        if (status === 'SUBSCRIBED') {
          log.debug('[Realtime] Account channel subscribed', { recordId: id });
        } else if (status === 'CHANNEL_ERROR' && active) {
          onFailure(new RecordFetchError(id, 'realtime channel error'));
        }
      });

    void deliver();

    return () => {
      if (!active) return;
      active = false;
      registered.delete(deliver);
      if (registered.size === 0) {
        this.deliveries.delete(id);
      }
      this.client.removeChannel(channel).catch((error: unknown) => {
        log.warn('[Realtime] Failed to remove account channel', {
          recordId: id,
          error: getErrorMessage(error),
        });
      });
    };
  }
}
