/**
 * Position Ledger — Phase 2 leveraged positions
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * ONE POSITION PER (TRADER, SIDE)
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * OPEN:
 *   collateral (internal) → market → custody redeem (external)
 *   loan = (leverage - 1) * collateral from the lending collaborator
 *   notional = leverage * collateral bought on the virtual AMM
 *
 * CLOSE / LIQUIDATE (shared unwind):
 *   sell shares → proceeds
 *   debt = principal + simple interest since openedAt
 *   proceeds < debt → shortfall covered by insurance (failure propagates)
 *   lender repaid in full, surplus routed out through the custody vault
 *
 * A YES and a NO position held by the same trader never touch each other.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import {
    BPS,
    KEEPER_REWARD_BPS,
    LIQUIDATION_INSURANCE_FEE_BPS,
    SCALE_FACTOR,
    WAD,
} from '../config/constants';
import { MarketError } from '../core/errors';
import { accrueInterest, bps, healthFactor } from '../core/marketMath';
import { MarketState, Position, Side } from '../types';
import logger from '../utils/logger';
import { MarketContext, payOut, positionKey, pullInternal } from './context';
import { ammPrice, buyOutcome, sellOutcome } from './virtualAmm';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface OpenPositionInput {
    trader: string;
    side: Side;
    collateral: bigint;
    leverage: bigint;
    minShares: bigint;
}

export interface ClosePositionResult {
    proceeds: bigint;
    interest: bigint;
    badDebt: bigint;
    payout: bigint;
    pnl: bigint;
}

export interface LiquidationResult {
    proceeds: bigint;
    interest: bigint;
    badDebt: bigint;
    insuranceFee: bigint;
    keeperReward: bigint;
    refund: bigint;
}

interface Unwind {
    proceeds: bigint;
    interest: bigint;
    badDebt: bigint;
    surplus: bigint;
}

// ═══════════════════════════════════════════════════════════════════════════════
// LOOKUPS
// ═══════════════════════════════════════════════════════════════════════════════

export function findPosition(state: MarketState, trader: string, side: Side): Position | undefined {
    return state.positions.get(positionKey(trader, side));
}

function requireActive(state: MarketState, trader: string, side: Side): Position {
    const position = findPosition(state, trader, side);
    if (!position || !position.active) {
        throw new MarketError('NoActivePosition', `no active ${side} position`, { trader, side });
    }
    return position;
}

function requireTrading(state: MarketState): void {
    if (state.resolved) {
        throw new MarketError('MarketAlreadyResolved', 'market is resolved');
    }
    if (state.phase !== 'Phase2Active') {
        throw new MarketError('Phase2NotActive', 'leverage is not active before migration');
    }
}

function adjustOpenInterest(state: MarketState, side: Side, delta: bigint): void {
    if (side === 'YES') {
        state.openInterestYes += delta;
    } else {
        state.openInterestNo += delta;
    }
}

export function interestOwed(state: MarketState, position: Position, until: number): bigint {
    return accrueInterest(position.loanAmount, state.params.borrowRateBps, BigInt(until - position.openedAt));
}

/**
 * Health factor in BPS at the current AMM price with interest accrued to `now`.
 */
export function positionHealth(state: MarketState, position: Position, now: number): bigint {
    return healthFactor({
        shares: position.shares,
        price: ammPrice(state, position.side),
        loan: position.loanAmount,
        interest: interestOwed(state, position, now),
    });
}

export function healthOf(state: MarketState, trader: string, side: Side, now: number): bigint {
    return positionHealth(state, requireActive(state, trader, side), now);
}

// ═══════════════════════════════════════════════════════════════════════════════
// OPEN
// ═══════════════════════════════════════════════════════════════════════════════

export function openPosition(ctx: MarketContext, input: OpenPositionInput): Position {
    const { state, deps } = ctx;
    const { trader, side, collateral, leverage } = input;
    requireTrading(state);

    const existing = findPosition(state, trader, side);
    if (existing && existing.active) {
        throw new MarketError('PositionAlreadyActive', `${side} position already open`, { trader, side });
    }
    if (collateral < state.params.minCollateral) {
        throw new MarketError('CollateralTooLow', 'collateral below minimum', {
            collateral,
            minCollateral: state.params.minCollateral,
        });
    }
    if (leverage < 1n || leverage > state.params.maxLeverage) {
        throw new MarketError('InvalidLeverage', `leverage must be between 1 and ${state.params.maxLeverage}`, {
            leverage,
        });
    }

    const market = state.marketAddress;
    pullInternal(ctx, trader, collateral * SCALE_FACTOR);
    deps.custody.redeem(market, collateral * SCALE_FACTOR);

    const loan = collateral * (leverage - 1n);
    if (loan > 0n) {
        deps.lending.fundLoan(market, loan);
        state.totalBorrowed += loan;
    }

    const notional = collateral * leverage;
    const shares = buyOutcome(ctx, side, notional);
    if (shares < input.minShares) {
        throw new MarketError('SlippageExceeded', 'fewer shares than the signed minimum', {
            shares,
            minShares: input.minShares,
        });
    }

    const position: Position = {
        trader,
        side,
        collateral,
        leverage,
        loanAmount: loan,
        shares,
        entryPrice: (notional * WAD) / shares,
        openedAt: ctx.clock.now(),
        active: true,
    };
    state.positions.set(positionKey(trader, side), position);
    adjustOpenInterest(state, side, shares);

    ctx.emit({
        type: 'PositionOpened',
        trader,
        side,
        collateral,
        leverage,
        loan,
        shares,
        entryPrice: position.entryPrice,
    });
    logger.info(`[POSITIONS] OPEN ${trader} ${side} ${leverage}x collateral=${collateral} shares=${shares}`);
    return position;
}

// ═══════════════════════════════════════════════════════════════════════════════
// UNWIND (shared by close and liquidation)
// ═══════════════════════════════════════════════════════════════════════════════

function unwind(ctx: MarketContext, position: Position): Unwind {
    const { state, deps } = ctx;
    const market = state.marketAddress;

    const proceeds = sellOutcome(ctx, position.side, position.shares);
    const interest = interestOwed(state, position, ctx.clock.now());
    const debt = position.loanAmount + interest;

    let badDebt = 0n;
    if (proceeds < debt) {
        badDebt = debt - proceeds;
        deps.insurance.coverBadDebt(market, badDebt);
    }
    if (debt > 0n) {
        deps.lending.repayLoan(market, position.loanAmount, interest);
    }

    state.totalBorrowed -= position.loanAmount;
    adjustOpenInterest(state, position.side, -position.shares);
    position.active = false;

    return { proceeds, interest, badDebt, surplus: proceeds > debt ? proceeds - debt : 0n };
}

// ═══════════════════════════════════════════════════════════════════════════════
// CLOSE
// ═══════════════════════════════════════════════════════════════════════════════

export function closePosition(
    ctx: MarketContext,
    trader: string,
    side: Side,
    minPayout: bigint
): ClosePositionResult {
    requireTrading(ctx.state);
    const position = requireActive(ctx.state, trader, side);

    const { proceeds, interest, badDebt, surplus } = unwind(ctx, position);
    if (surplus < minPayout) {
        throw new MarketError('SlippageExceeded', 'payout below the signed minimum', {
            payout: surplus,
            minPayout,
        });
    }
    payOut(ctx, trader, surplus);

    const pnl = surplus - position.collateral;
    ctx.emit({ type: 'PositionClosed', trader, side, proceeds, interest, badDebt, payout: surplus, pnl });
    logger.info(`[POSITIONS] CLOSE ${trader} ${side} payout=${surplus} pnl=${pnl}`);

    return { proceeds, interest, badDebt, payout: surplus, pnl };
}

// ═══════════════════════════════════════════════════════════════════════════════
// LIQUIDATION
// ═══════════════════════════════════════════════════════════════════════════════

function liquidateUnhealthy(ctx: MarketContext, keeper: string, position: Position): LiquidationResult {
    const { proceeds, interest, badDebt, surplus } = unwind(ctx, position);

    const insuranceFee = bps(surplus, LIQUIDATION_INSURANCE_FEE_BPS);
    const keeperReward = bps(surplus, KEEPER_REWARD_BPS);
    const refund = surplus - insuranceFee - keeperReward;

    ctx.deps.insurance.depositFee(ctx.state.marketAddress, insuranceFee);
    payOut(ctx, keeper, keeperReward);
    payOut(ctx, position.trader, refund);

    ctx.emit({
        type: 'PositionLiquidated',
        trader: position.trader,
        side: position.side,
        keeper,
        proceeds,
        interest,
        badDebt,
        insuranceFee,
        keeperReward,
        refund,
    });
    logger.warn(
        `[POSITIONS] LIQUIDATED ${position.trader} ${position.side} by ${keeper} ` +
            `proceeds=${proceeds} badDebt=${badDebt} reward=${keeperReward}`
    );

    return { proceeds, interest, badDebt, insuranceFee, keeperReward, refund };
}

export function liquidatePosition(ctx: MarketContext, keeper: string, trader: string, side: Side): LiquidationResult {
    requireTrading(ctx.state);
    const position = requireActive(ctx.state, trader, side);

    const health = positionHealth(ctx.state, position, ctx.clock.now());
    if (health >= BPS) {
        throw new MarketError('PositionHealthy', 'position is above the liquidation threshold', {
            trader,
            side,
            healthFactor: health,
        });
    }
    return liquidateUnhealthy(ctx, keeper, position);
}

/**
 * Liquidate every unhealthy entry; inactive and healthy entries are skipped.
 * Returns how many positions were liquidated.
 */
export function bulkLiquidate(ctx: MarketContext, keeper: string, traders: string[], sides: Side[]): number {
    if (traders.length !== sides.length) {
        throw new MarketError('ArrayLengthMismatch', 'traders and sides differ in length', {
            traders: traders.length,
            sides: sides.length,
        });
    }
    requireTrading(ctx.state);

    let liquidated = 0;
    for (let i = 0; i < traders.length; i++) {
        const position = findPosition(ctx.state, traders[i], sides[i]);
        if (!position || !position.active) continue;
        if (positionHealth(ctx.state, position, ctx.clock.now()) >= BPS) continue;

        liquidateUnhealthy(ctx, keeper, position);
        liquidated++;
    }

    logger.info(`[POSITIONS] Bulk liquidation by ${keeper}: ${liquidated}/${traders.length}`);
    return liquidated;
}
