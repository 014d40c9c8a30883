import { createClient, SupabaseClient } from '@supabase/supabase-js';
import logger from '../utils/logger';

export const MARKET_EVENTS_TABLE = 'market_events';

/**
 * Row shape of the market_events table.
 *
 * SCHEMA:
 * - id TEXT PRIMARY KEY
 * - market_address TEXT NOT NULL
 * - sequence INTEGER NOT NULL
 * - event_type TEXT NOT NULL
 * - payload JSONB NOT NULL (bigints as decimal strings)
 * - created_at TIMESTAMPTZ NOT NULL
 */
export interface MarketEventRow {
    id: string;
    market_address: string;
    sequence: number;
    event_type: string;
    payload: unknown;
    created_at: string;
}

export interface EventStore {
    insert(rows: MarketEventRow[]): Promise<{ error: string | null }>;
}

// Validate URL format to prevent crash
export const isValidUrl = (url: string): boolean => {
    try {
        new URL(url);
        return true;
    } catch {
        return false;
    }
};

export function createSupabaseClient(url: string, key: string): SupabaseClient | null {
    if (!isValidUrl(url)) {
        logger.error(`[SUPABASE] Invalid SUPABASE_URL "${url}"; event persistence disabled`);
        return null;
    }
    return createClient(url, key, { auth: { persistSession: false } });
}

export class SupabaseEventStore implements EventStore {
    constructor(private readonly client: SupabaseClient) {}

    async insert(rows: MarketEventRow[]): Promise<{ error: string | null }> {
        const { error } = await this.client.from(MARKET_EVENTS_TABLE).insert(rows);
        return { error: error ? error.message : null };
    }
}

/**
 * Process-local store with the same contract, for tests and dry runs.
 */
export class MemoryEventStore implements EventStore {
    readonly rows: MarketEventRow[] = [];
    failNext: string | null = null;

    async insert(rows: MarketEventRow[]): Promise<{ error: string | null }> {
        if (this.failNext !== null) {
            const error = this.failNext;
            this.failNext = null;
            return { error };
        }
        this.rows.push(...rows);
        return { error: null };
    }
}
