/**
 * Event Sink Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Committed events become market_events rows, written in sequence order and
 * retained across failed writes.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { EventStore, MarketEventRow, MemoryEventStore } from '../src/db/supabase';
import { SupabaseEventSink, toEventRow } from '../src/services/eventSink';
import { MarketEvent } from '../src/types';
import { MARKET_ADDRESS, MarketFixture, SHARE, USD, testWallet } from './helpers/marketFixture';

// ═══════════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════════

const alice = testWallet(10);

function createTestEvent(id: string = 'event-1', sequence: number = 1): MarketEvent {
    return {
        type: 'LeverageActivated',
        invariantK: 5_000_000_000_000_000_000_000n,
        id,
        sequence,
        timestamp: 1_700_000_000,
        marketAddress: MARKET_ADDRESS,
    };
}

// ═══════════════════════════════════════════════════════════════════════════════
// TEST SUITE
// ═══════════════════════════════════════════════════════════════════════════════

describe('Event persistence', () => {
    describe('toEventRow', () => {
        test('maps metadata to columns and stringifies bigints', () => {
            const row = toEventRow(createTestEvent());

            expect(row).toEqual<MarketEventRow>({
                id: 'event-1',
                market_address: MARKET_ADDRESS,
                sequence: 1,
                event_type: 'LeverageActivated',
                payload: { invariantK: '5000000000000000000000' },
                created_at: '2023-11-14T22:13:20.000Z',
            });
        });
    });

    describe('SupabaseEventSink', () => {
        test('without a store nothing is buffered', async () => {
            const sink = new SupabaseEventSink(null);
            sink.record(createTestEvent());

            expect(sink.enabled).toBe(false);
            expect(sink.pending).toBe(0);
            expect(await sink.flush()).toBe(0);
        });

        test('writes buffered rows in one batch', async () => {
            const store = new MemoryEventStore();
            const sink = new SupabaseEventSink(store);
            sink.record(createTestEvent('a', 1));
            sink.record(createTestEvent('b', 2));

            expect(await sink.flush()).toBe(2);
            expect(store.rows.map((row) => row.id)).toEqual(['a', 'b']);
            expect(sink.pending).toBe(0);
        });

        test('a failed write keeps the batch ahead of newer rows', async () => {
            const store = new MemoryEventStore();
            const sink = new SupabaseEventSink(store);
            sink.record(createTestEvent('a', 1));
            store.failNext = 'duplicate key value';

            expect(await sink.flush()).toBe(0);
            expect(sink.pending).toBe(1);

            sink.record(createTestEvent('b', 2));
            expect(await sink.flush()).toBe(2);
            expect(store.rows.map((row) => row.sequence)).toEqual([1, 2]);
        });

        test('a throwing store counts as a failed write', async () => {
            const store: EventStore = {
                insert: jest.fn().mockRejectedValueOnce(new Error('network down')).mockResolvedValue({ error: null }),
            };
            const sink = new SupabaseEventSink(store);
            sink.record(createTestEvent());

            expect(await sink.flush()).toBe(0);
            expect(await sink.flush()).toBe(1);
            expect(store.insert).toHaveBeenCalledTimes(2);
        });
    });

    describe('wired through bootstrap', () => {
        test('records only committed events', async () => {
            const store = new MemoryEventStore();
            const fx = new MarketFixture({ eventStore: store });
            fx.fund(alice.address, 100n * USD);

            await fx.buy(alice, 'YES', 10n * SHARE);
            await expect(fx.buy(alice, 'YES', 10_000n * SHARE)).rejects.toMatchObject({
                code: 'InsufficientBalance',
            });

            expect(fx.runtime.sink.pending).toBe(1);
            expect(await fx.runtime.sink.flush()).toBe(1);

            const [row] = store.rows;
            expect(row.event_type).toBe('SharesBought');
            expect(row.market_address).toBe(MARKET_ADDRESS);
            expect(row.payload).toMatchObject({ buyer: alice.address, side: 'YES', shares: '10000000000000000000' });
        });
    });
});
