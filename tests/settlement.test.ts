/**
 * Settlement Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Phase 3: solvency-guarded resolution, claims, tier bonus and sweep.
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Test Cases:
 * 1. Underbacked liabilities are paid pro rata, whatever the claim order
 * 2. Fully backed phase-2 winners get par plus a capped tier bonus
 * 3. Interest stops accruing at resolution
 * 4. Losers and empty balances have nothing to claim
 * 5. Only the authority resolves and sweeps, and only once the window opens
 * 6. Trading stops once resolved
 */

import { WAD } from '../src/config/constants';
import { MarketFixture, SHARE, USD, authority, testWallet } from './helpers/marketFixture';

// ═══════════════════════════════════════════════════════════════════════════════
// TEST CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

const YEAR = 365 * 24 * 60 * 60;
const COOLING_OFF = 30 * 24 * 60 * 60;

const WHALE_TOKENS_EXTERNAL = 31_622_776_601n;
const OPEN_SHARES = 9_090_909_091n;

const alice = testWallet(10);
const bob = testWallet(11);
const whale = testWallet(90);
const stranger = testWallet(66);

// ═══════════════════════════════════════════════════════════════════════════════
// TEST SUITE
// ═══════════════════════════════════════════════════════════════════════════════

describe('Settlement', () => {
    let fx: MarketFixture;

    describe('phase-1 market with a haircut', () => {
        beforeEach(async () => {
            // threshold far away: the curve never migrates
            fx = new MarketFixture({ threshold: 1_000_000n * USD });
            fx.fund(alice.address, 1_000n * USD);
            fx.fund(bob.address, 5_000n * USD);
            await fx.buy(alice, 'YES', 4_000n * SHARE);
            await fx.buy(bob, 'YES', 6_000n * SHARE);
        });

        test('redeems the raised capital and prices liabilities against it', () => {
            const resolution = fx.engine.resolveMarket(authority.address, 'YES');

            expect(resolution.liabilities).toBe(10_000n * USD);
            expect(resolution.backing).toBe(5_000n * USD);
            expect(resolution.settlementPrice).toBe(WAD / 2n);
            expect(resolution.bonusReserve).toBe(0n);
            expect(fx.externalBalance(fx.engine.marketAddress)).toBe(5_000n * USD);
            expect(fx.internalBalance(fx.engine.marketAddress)).toBe(0n);
            expect(fx.engine.getCurrentPrice('YES')).toBe(WAD / 2n);
            expect(fx.engine.getCurrentPrice('NO')).toBe(0n);
            expect(fx.engine.getState().phase).toBe('Resolved');
        });

        test('claim order does not change the price', async () => {
            fx.engine.resolveMarket(authority.address, 'YES');

            const bobClaim = await fx.claim(bob, 'OutcomeTokens');
            const aliceClaim = await fx.claim(alice, 'OutcomeTokens');

            expect(bobClaim).toEqual({ kind: 'OutcomeTokens', payout: 3_000_000_000n, bonus: 0n });
            expect(aliceClaim).toEqual({ kind: 'OutcomeTokens', payout: 2_000_000_000n, bonus: 0n });
            expect(fx.engine.outcomeBalanceOf('YES', alice.address)).toBe(0n);
        });

        test('a second claim finds nothing', async () => {
            fx.engine.resolveMarket(authority.address, 'YES');
            await fx.claim(alice, 'OutcomeTokens');

            await expect(fx.claim(alice, 'OutcomeTokens')).rejects.toMatchObject({ code: 'NothingToClaim' });
        });

        test('losing tokens are worth nothing', async () => {
            await fx.buy(bob, 'NO', SHARE);
            fx.engine.resolveMarket(authority.address, 'NO');

            await expect(fx.claim(alice, 'OutcomeTokens')).rejects.toMatchObject({ code: 'NothingToClaim' });
            const claim = await fx.claim(bob, 'OutcomeTokens');
            expect(claim.payout).toBe(1_000_000n);
        });
    });

    describe('migrated market', () => {
        beforeEach(async () => {
            fx = new MarketFixture();
            await fx.migrate(whale);
            fx.fund(alice.address, 1_000n * USD);
            await fx.open(alice, 'YES', 1_000n * USD, 5n);
        });

        test('fully backed liabilities settle at par', () => {
            const resolution = fx.engine.resolveMarket(authority.address, 'YES');

            expect(resolution.liabilities).toBe(WHALE_TOKENS_EXTERNAL + OPEN_SHARES);
            expect(resolution.backing).toBe(55_000n * USD);
            expect(resolution.settlementPrice).toBe(WAD);
            expect(resolution.bonusReserve).toBe(14_286_314_308n);

            const [resolved] = fx.eventsOfType('MarketResolved');
            expect(resolved.winningOutcome).toBe('YES');
        });

        test('a winning position repays its loan and earns the tier bonus', async () => {
            fx.engine.resolveMarket(authority.address, 'YES');

            const claim = await fx.claim(alice, 'Position', 'FanToken');

            expect(claim).toEqual({ kind: 'Position', payout: 5_190_909_091n, bonus: 100_000_000n });
            expect(fx.internalAsExternal(alice.address)).toBe(5_190_909_091n);
            expect(fx.engine.getState().bonusReserve).toBe(14_186_314_308n);
            expect(fx.engine.getState().totalBorrowed).toBe(0n);
            expect(fx.runtime.lending.totalBorrowed(fx.engine.marketAddress)).toBe(0n);
        });

        test('phase-1 tokens are redeemed at par without a bonus', async () => {
            fx.engine.resolveMarket(authority.address, 'YES');

            const claim = await fx.claim(whale, 'OutcomeTokens', 'FanToken');
            expect(claim).toEqual({ kind: 'OutcomeTokens', payout: WHALE_TOKENS_EXTERNAL, bonus: 0n });
        });

        test('interest is frozen at resolution', async () => {
            fx.clock.advance(YEAR);
            fx.engine.resolveMarket(authority.address, 'YES');
            fx.clock.advance(YEAR);

            const claim = await fx.claim(alice, 'Position');

            expect(claim.payout).toBe(4_740_909_091n);
            expect(claim.bonus).toBe(50_000_000n);
            expect(fx.runtime.lending.interestEarned).toBe(400n * USD);
        });

        test('a position is claimed once', async () => {
            fx.engine.resolveMarket(authority.address, 'YES');
            await fx.claim(alice, 'Position');

            await expect(fx.claim(alice, 'Position')).rejects.toMatchObject({ code: 'NoWinningPosition' });
        });

        test('a losing position has nothing to claim', async () => {
            fx.engine.resolveMarket(authority.address, 'NO');

            await expect(fx.claim(alice, 'Position')).rejects.toMatchObject({ code: 'NoWinningPosition' });
            expect(fx.engine.nonceOf(alice.address)).toBe(1n);
        });

        test('claims wait for resolution', async () => {
            await expect(fx.claim(alice, 'Position')).rejects.toMatchObject({ code: 'MarketNotResolved' });
        });

        test('trading stops once resolved', async () => {
            fx.fund(bob.address, 100n * USD);
            fx.engine.resolveMarket(authority.address, 'YES');

            await expect(fx.open(bob, 'NO', 100n * USD, 2n)).rejects.toMatchObject({
                code: 'MarketAlreadyResolved',
            });
            await expect(fx.close(alice, 'YES')).rejects.toMatchObject({ code: 'MarketAlreadyResolved' });
            expect(() => fx.engine.liquidate(bob.address, alice.address, 'YES')).toThrow('[MarketAlreadyResolved]');
        });
    });

    describe('authority', () => {
        beforeEach(async () => {
            fx = new MarketFixture();
            await fx.migrate(whale);
        });

        test('only the authority resolves, and only once', () => {
            expect(() => fx.engine.resolveMarket(stranger.address, 'YES')).toThrow('[Unauthorized]');
            fx.engine.resolveMarket(authority.address, 'YES');
            expect(() => fx.engine.resolveMarket(authority.address, 'NO')).toThrow('[MarketAlreadyResolved]');
            expect(fx.engine.getState().winningOutcome).toBe('YES');
        });

        test('sweep waits for the cooling-off period', () => {
            fx.engine.resolveMarket(authority.address, 'YES');

            fx.clock.advance(COOLING_OFF - 1);
            expect(() => fx.engine.sweepUnclaimed(authority.address, whale.address, 'OutcomeTokens')).toThrow(
                '[ClaimCoolingOff]'
            );

            fx.clock.advance(1);
            const swept = fx.engine.sweepUnclaimed(authority.address, whale.address, 'OutcomeTokens');

            expect(swept).toBe(WHALE_TOKENS_EXTERNAL);
            expect(fx.runtime.insurance.balance()).toBe(WHALE_TOKENS_EXTERNAL);
            expect(fx.engine.outcomeBalanceOf('YES', whale.address)).toBe(0n);
            expect(fx.eventsOfType('UnclaimedSwept')).toHaveLength(1);
        });

        test('only the authority sweeps', () => {
            fx.engine.resolveMarket(authority.address, 'YES');
            fx.clock.advance(COOLING_OFF);

            expect(() => fx.engine.sweepUnclaimed(stranger.address, whale.address, 'OutcomeTokens')).toThrow(
                '[Unauthorized]'
            );
        });

        test('a swept position earns no bonus', async () => {
            fx.fund(alice.address, 1_000n * USD);
            await fx.open(alice, 'YES', 1_000n * USD, 5n);
            fx.engine.resolveMarket(authority.address, 'YES');
            fx.clock.advance(COOLING_OFF);

            const swept = fx.engine.sweepUnclaimed(authority.address, alice.address, 'Position');

            expect(swept).toBe(5_090_909_091n);
            expect(fx.engine.getState().bonusReserve).toBe(14_286_314_308n);
            await expect(fx.claim(alice, 'Position')).rejects.toMatchObject({ code: 'NoWinningPosition' });
        });

        test('rotation hands resolution to the new authority', () => {
            const next = testWallet(2);
            fx.engine.rotateAuthority(authority.address, next.address);

            expect(() => fx.engine.resolveMarket(authority.address, 'YES')).toThrow('[Unauthorized]');
            fx.engine.resolveMarket(next.address, 'NO');
            expect(fx.eventsOfType('AuthorityRotated')[0].next).toBe(next.address);
        });
    });
});
