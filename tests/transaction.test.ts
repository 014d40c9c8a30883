/**
 * Transaction Scope Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * All-or-nothing calls: reentrancy guard, rollback across every participant,
 * event publication only after commit.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { MarketError } from '../src/core/errors';
import { MarketEventBus } from '../src/engine/events';
import { TransactionScope } from '../src/engine/transaction';
import { TokenLedger } from '../src/services/tokenLedger';
import { MarketEvent } from '../src/types';
import { ManualClock } from '../src/utils/clock';
import { MarketFixture, USD, testWallet } from './helpers/marketFixture';

// ═══════════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════════

const MARKET = '0x00000000000000000000000000000000000000aa';
const alice = testWallet(10);

function newScope() {
    const ledger = new TokenLedger('USD', 6);
    const events = new MarketEventBus(() => MARKET, new ManualClock(1_000));
    const scope = new TransactionScope(() => [ledger], events);
    const published: MarketEvent[] = [];
    events.subscribe((event) => published.push(event));
    return { ledger, events, scope, published };
}

// ═══════════════════════════════════════════════════════════════════════════════
// TEST SUITE
// ═══════════════════════════════════════════════════════════════════════════════

describe('TransactionScope', () => {
    test('commits and publishes in order', () => {
        const { ledger, events, scope, published } = newScope();

        const result = scope.run('mint', () => {
            ledger.mint(alice.address, 5n);
            events.emit({ type: 'LeverageActivated', invariantK: 1n });
            events.emit({ type: 'LeverageActivated', invariantK: 2n });
            return 'done';
        });

        expect(result).toBe('done');
        expect(ledger.balanceOf(alice.address)).toBe(5n);
        expect(published.map((event) => event.sequence)).toEqual([1, 2]);
        expect(published[0].timestamp).toBe(1_000);
        expect(published[0].marketAddress).toBe(MARKET);
        expect(published[0].id).not.toBe(published[1].id);
    });

    test('a throw restores participants and drops pending events', () => {
        const { ledger, events, scope, published } = newScope();
        ledger.mint(alice.address, 10n);

        expect(() =>
            scope.run('burn', () => {
                ledger.burn(alice.address, 4n);
                events.emit({ type: 'LeverageActivated', invariantK: 1n });
                throw new MarketError('InvalidAmount', 'boom');
            })
        ).toThrow('[InvalidAmount] boom');

        expect(ledger.balanceOf(alice.address)).toBe(10n);
        expect(ledger.totalSupply()).toBe(10n);
        expect(published).toHaveLength(0);
        expect(events.lastSequence).toBe(0);
    });

    test('non-market errors are rethrown unchanged', () => {
        const { scope } = newScope();
        const failure = new TypeError('unexpected');

        expect(() =>
            scope.run('explode', () => {
                throw failure;
            })
        ).toThrow(failure);
        expect(scope.active).toBe(false);
    });

    test('nested entry is rejected', () => {
        const { scope } = newScope();

        expect(() => scope.run('outer', () => scope.run('inner', () => 1))).toThrow(
            '[ReentrantCall] inner called while outer is in flight'
        );
        expect(scope.run('after', () => 2)).toBe(2);
    });

    test('a failing listener does not affect the others or the caller', () => {
        const { events, scope, published } = newScope();
        events.subscribe(() => {
            throw new Error('listener down');
        });

        scope.run('emit', () => events.emit({ type: 'LeverageActivated', invariantK: 1n }));

        expect(published).toHaveLength(1);
        expect(events.recent()).toHaveLength(1);
    });

    test('unsubscribe stops delivery', () => {
        const { events, scope } = newScope();
        const seen: number[] = [];
        const unsubscribe = events.subscribe((event) => seen.push(event.sequence));

        scope.run('first', () => events.emit({ type: 'LeverageActivated', invariantK: 1n }));
        unsubscribe();
        scope.run('second', () => events.emit({ type: 'LeverageActivated', invariantK: 2n }));

        expect(seen).toEqual([1]);
    });
});

describe('Market reentrancy', () => {
    test('a collaborator calling back into the engine aborts the whole call', async () => {
        const fx = new MarketFixture();
        await fx.migrate();

        let inner: unknown = null;
        const fundLoan = jest.spyOn(fx.runtime.lending, 'fundLoan').mockImplementation(() => {
            try {
                fx.engine.liquidate(alice.address, alice.address, 'YES');
            } catch (err) {
                inner = err;
                throw err;
            }
        });

        fx.fund(alice.address, 1_000n * USD);
        await expect(fx.open(alice, 'YES', 1_000n * USD, 5n)).rejects.toMatchObject({ code: 'ReentrantCall' });

        expect(fundLoan).toHaveBeenCalledTimes(1);
        expect(inner).toBeInstanceOf(MarketError);
        expect(fx.engine.getPosition(alice.address, 'YES')).toBeNull();
        expect(fx.engine.getState().reserveStable).toBe(50_000n * USD);
        expect(fx.internalBalance(alice.address)).toBe(1_000n * 10n ** 18n);
        expect(fx.engine.nonceOf(alice.address)).toBe(0n);

        fundLoan.mockRestore();
        await fx.open(alice, 'YES', 1_000n * USD, 5n);
        expect(fx.runtime.lending.totalBorrowed(fx.engine.marketAddress)).toBe(4_000n * USD);
    });
});
