/**
 * Settlement Guardian — Phase 3
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * NO CLAIMANT IS EVER PAID MORE THAN THE BACKING ALLOWS
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * At resolution:
 *   liabilities     = winning token supply (external units) + winning open interest
 *   backing         = market's external balance
 *   settlementPrice = min(1.0, backing / liabilities)
 *   bonusReserve    = backing - liabilities * settlementPrice
 *
 * Every claimant gets the same price whatever order they claim in. Interest
 * on open loans stops at resolvedAt.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { SCALE_FACTOR, UserTier, WAD } from '../config/constants';
import { MarketError } from '../core/errors';
import { computeSettlementPrice, tierBonus } from '../core/marketMath';
import { ClaimKind, MarketState, Side } from '../types';
import logger from '../utils/logger';
import { MarketContext, marketExternalBalance, payOut, positionKey } from './context';
import { interestOwed } from './positionLedger';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface ResolutionResult {
    winningOutcome: Side;
    settlementPrice: bigint;
    liabilities: bigint;
    backing: bigint;
    bonusReserve: bigint;
}

export interface ClaimResult {
    kind: ClaimKind;
    payout: bigint;
    bonus: bigint;
}

interface Redemption {
    /** external units owed to the claimant before any bonus */
    net: bigint;
    /** tier bonus basis, or null when the claim earns none */
    bonusCollateral: bigint | null;
}

export function requireAuthority(state: MarketState, caller: string, action: string): void {
    if (caller.toLowerCase() !== state.authority.toLowerCase()) {
        throw new MarketError('Unauthorized', `only the authority may ${action}`, { caller });
    }
}

function requireResolved(state: MarketState): { winning: Side; resolvedAt: number } {
    if (!state.resolved || state.winningOutcome === null || state.resolvedAt === null) {
        throw new MarketError('MarketNotResolved', 'market is not resolved');
    }
    return { winning: state.winningOutcome, resolvedAt: state.resolvedAt };
}

// ═══════════════════════════════════════════════════════════════════════════════
// RESOLVE
// ═══════════════════════════════════════════════════════════════════════════════

export function resolveMarket(ctx: MarketContext, caller: string, winningOutcome: Side): ResolutionResult {
    const { state, deps } = ctx;
    requireAuthority(state, caller, 'resolve the market');
    if (state.resolved) {
        throw new MarketError('MarketAlreadyResolved', 'market is already resolved');
    }

    const market = state.marketAddress;
    if (!state.migrated) {
        const residual = deps.accountingUnit.balanceOf(market);
        if (residual >= SCALE_FACTOR) {
            deps.custody.redeem(market, residual);
        }
    }

    const openInterest = winningOutcome === 'YES' ? state.openInterestYes : state.openInterestNo;
    const liabilities = ctx.outcomes[winningOutcome].totalSupply() / SCALE_FACTOR + openInterest;
    const backing = marketExternalBalance(ctx);
    const settlementPrice = computeSettlementPrice(backing, liabilities);
    const bonusReserve = backing - (liabilities * settlementPrice) / WAD;

    state.resolved = true;
    state.winningOutcome = winningOutcome;
    state.settlementPrice = settlementPrice;
    state.resolvedAt = ctx.clock.now();
    state.bonusReserve = bonusReserve;
    state.phase = 'Resolved';

    ctx.emit({ type: 'MarketResolved', winningOutcome, settlementPrice, liabilities, backing });
    logger.info(
        `[SETTLEMENT] Resolved ${winningOutcome} price=${settlementPrice} liabilities=${liabilities} backing=${backing}`
    );

    return { winningOutcome, settlementPrice, liabilities, backing, bonusReserve };
}

// ═══════════════════════════════════════════════════════════════════════════════
// REDEMPTION (shared by claim and sweep)
// ═══════════════════════════════════════════════════════════════════════════════

function redeemOutcomeTokens(ctx: MarketContext, user: string, winning: Side): Redemption {
    const { state } = ctx;
    const token = ctx.outcomes[winning];
    const balance = token.balanceOf(user);
    if (balance === 0n) {
        throw new MarketError('NothingToClaim', `no ${winning} outcome tokens to redeem`, { user });
    }

    token.burn(state.marketAddress, user, balance);
    return { net: (balance * state.settlementPrice) / WAD / SCALE_FACTOR, bonusCollateral: null };
}

function redeemPosition(ctx: MarketContext, user: string, winning: Side, resolvedAt: number): Redemption {
    const { state, deps } = ctx;
    const position = state.positions.get(positionKey(user, winning));
    if (!position || !position.active) {
        throw new MarketError('NoWinningPosition', `no active ${winning} position`, { user });
    }

    const market = state.marketAddress;
    const gross = (position.shares * state.settlementPrice) / WAD;
    const interest = interestOwed(state, position, resolvedAt);
    const debt = position.loanAmount + interest;

    if (gross < debt) {
        deps.insurance.coverBadDebt(market, debt - gross);
    }
    if (debt > 0n) {
        deps.lending.repayLoan(market, position.loanAmount, interest);
    }

    state.totalBorrowed -= position.loanAmount;
    if (winning === 'YES') {
        state.openInterestYes -= position.shares;
    } else {
        state.openInterestNo -= position.shares;
    }
    position.active = false;

    const solvent = state.settlementPrice === WAD && gross >= debt;
    return {
        net: gross > debt ? gross - debt : 0n,
        bonusCollateral: solvent ? position.collateral : null,
    };
}

function redeem(ctx: MarketContext, user: string, kind: ClaimKind): Redemption {
    const { winning, resolvedAt } = requireResolved(ctx.state);
    return kind === 'OutcomeTokens'
        ? redeemOutcomeTokens(ctx, user, winning)
        : redeemPosition(ctx, user, winning, resolvedAt);
}

// ═══════════════════════════════════════════════════════════════════════════════
// CLAIM & SWEEP
// ═══════════════════════════════════════════════════════════════════════════════

export function claimWinnings(ctx: MarketContext, user: string, kind: ClaimKind, tier: UserTier): ClaimResult {
    const { state } = ctx;
    const redemption = redeem(ctx, user, kind);

    let bonus = 0n;
    if (redemption.bonusCollateral !== null) {
        const earned = tierBonus(redemption.bonusCollateral, tier);
        bonus = earned < state.bonusReserve ? earned : state.bonusReserve;
        state.bonusReserve -= bonus;
    }

    const payout = redemption.net + bonus;
    payOut(ctx, user, payout);

    ctx.emit({ type: 'WinningsClaimed', user, kind, tier, payout, bonus });
    logger.info(`[SETTLEMENT] ${user} claimed ${payout} (${kind}, ${tier}, bonus ${bonus})`);
    return { kind, payout, bonus };
}

/**
 * Recover an unclaimed entitlement into the insurance fund once the
 * cooling-off period after resolution has passed.
 */
export function sweepUnclaimed(ctx: MarketContext, caller: string, user: string, kind: ClaimKind): bigint {
    const { state } = ctx;
    requireAuthority(state, caller, 'sweep unclaimed winnings');
    const { resolvedAt } = requireResolved(state);

    const opensAt = resolvedAt + state.params.claimCoolingOffSeconds;
    const now = ctx.clock.now();
    if (now < opensAt) {
        throw new MarketError('ClaimCoolingOff', 'sweep window has not opened', { now, opensAt });
    }

    const { net } = redeem(ctx, user, kind);
    ctx.deps.insurance.depositFee(state.marketAddress, net);

    ctx.emit({ type: 'UnclaimedSwept', user, kind, amount: net });
    logger.info(`[SETTLEMENT] Swept ${net} from ${user} (${kind}) to insurance`);
    return net;
}
