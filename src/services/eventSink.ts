/**
 * Event persistence — committed market events → market_events table.
 *
 * Events are buffered as they are published and written in batches. A failed
 * write keeps the batch at the head of the buffer for the next flush, so
 * rows reach the table in sequence order.
 */

import { EventStore, MarketEventRow } from '../db/supabase';
import { MarketEvent } from '../types';
import logger from '../utils/logger';
import { serializeBigInts } from '../utils/units';

export function toEventRow(event: MarketEvent): MarketEventRow {
    const { id, sequence, timestamp, marketAddress, type, ...payload } = event;
    return {
        id,
        market_address: marketAddress,
        sequence,
        event_type: type,
        payload: serializeBigInts(payload),
        created_at: new Date(timestamp * 1000).toISOString(),
    };
}

export class SupabaseEventSink {
    private buffer: MarketEventRow[] = [];

    constructor(private readonly store: EventStore | null) {
        if (!store) {
            logger.info('[EVENTS] Event persistence disabled: no Supabase credentials');
        }
    }

    get enabled(): boolean {
        return this.store !== null;
    }

    get pending(): number {
        return this.buffer.length;
    }

    record(event: MarketEvent): void {
        if (!this.store) return;
        this.buffer.push(toEventRow(event));
    }

    /**
     * Write everything buffered. Returns the number of rows persisted.
     */
    async flush(): Promise<number> {
        if (!this.store || this.buffer.length === 0) return 0;

        const batch = this.buffer;
        this.buffer = [];

        let error: string | null;
        try {
            ({ error } = await this.store.insert(batch));
        } catch (err) {
            error = err instanceof Error ? err.message : String(err);
        }

        if (error !== null) {
            this.buffer = [...batch, ...this.buffer];
            logger.error(`[EVENTS] Failed to persist ${batch.length} events, retained for retry: ${error}`);
            return 0;
        }

        logger.debug(`[EVENTS] Persisted ${batch.length} events`);
        return batch.length;
    }
}
