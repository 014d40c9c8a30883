/**
 * Bonding Curve Ledger — Phase 1 Capital Formation
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * THE THRESHOLD IS NEVER OVERSHOT
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * INVARIANTS:
 *   1. currentSupply and totalCapitalRaised only grow
 *   2. totalCapitalRaised <= migrationThreshold, always
 *   3. A buy that would cross the threshold is capped at the share amount
 *      whose cost lands exactly on it (inverse integral + isqrt); the
 *      floor-rounding gap, at most the cost of one more base unit, is
 *      charged so the capped buy always migrates
 *   4. Exactly one fill reports reachesThreshold
 *   5. A fill never costs zero
 *
 * Both outcomes share one supply counter: buying YES moves the NO price too.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { MarketError } from '../core/errors';
import { CurveParams, bps, curveCost, quoteBuy, sharesForCapital } from '../core/marketMath';
import { MarketContext, pullInternal } from '../engine/context';
import { migrate } from '../engine/migration';
import { MarketState, Side } from '../types';
import logger from '../utils/logger';
import { formatUnits } from '../utils/units';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface CurveFill {
    requestedShares: bigint;
    shares: bigint;
    rawCost: bigint;
    fee: bigint;
    total: bigint;
    capped: boolean;
    reachesThreshold: boolean;
}

export function curveParamsOf(state: MarketState): CurveParams {
    return {
        k: state.params.curveK,
        scale: state.params.curveScale,
        feeBps: state.params.phase1FeeBps,
    };
}

// ═══════════════════════════════════════════════════════════════════════════════
// QUOTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Price a buy of `shareAmount` against the current supply without touching
 * state. Used for both quotes and fills.
 */
export function planFill(state: MarketState, shareAmount: bigint): CurveFill {
    if (state.migrated) {
        throw new MarketError('MarketAlreadyMigrated', 'bonding curve is closed');
    }
    if (shareAmount <= 0n) {
        throw new MarketError('InvalidAmount', 'share amount must be positive', { shareAmount });
    }

    const params = curveParamsOf(state);
    const supply = state.currentSupply;
    const remaining = state.migrationThreshold - state.totalCapitalRaised;
    const full = quoteBuy(params, supply, shareAmount);

    if (full.rawCost < remaining) {
        if (full.rawCost === 0n) {
            throw new MarketError('InvalidAmount', 'buy is below the smallest priced increment', {
                shareAmount,
                supply,
            });
        }
        return { requestedShares: shareAmount, shares: shareAmount, ...full, capped: false, reachesThreshold: false };
    }

    // The floor gap never exceeds the price of one more base unit of supply,
    // so closing it cannot overshoot.
    const sEnd = sharesForCapital(params, supply, remaining);
    const cost = curveCost(params, supply, sEnd);
    const gap = remaining - cost;
    const nextUnit = curveCost(params, supply, sEnd + 1n) - cost;
    if (gap > state.params.snapTolerance && gap > nextUnit) {
        throw new MarketError('InvalidAmount', 'capped fill cannot reach the threshold', { gap, nextUnit });
    }
    const rawCost = remaining;
    const fee = bps(rawCost, params.feeBps);

    return {
        requestedShares: shareAmount,
        shares: sEnd - supply,
        rawCost,
        fee,
        total: rawCost + fee,
        capped: true,
        reachesThreshold: true,
    };
}

// ═══════════════════════════════════════════════════════════════════════════════
// FILLING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Execute a Phase-1 buy: collect cost and fee in internal units, mint
 * outcome tokens, advance the curve and migrate when the threshold is hit.
 */
export function fillBuy(ctx: MarketContext, buyer: string, side: Side, shareAmount: bigint): CurveFill {
    const { state } = ctx;
    if (state.resolved) {
        throw new MarketError('MarketAlreadyResolved', 'market is resolved');
    }

    const fill = planFill(state, shareAmount);

    pullInternal(ctx, buyer, fill.rawCost);
    if (fill.fee > 0n) {
        ctx.deps.accountingUnit.transfer(buyer, state.feeRecipient, fill.fee);
    }
    ctx.outcomes[side].mint(state.marketAddress, buyer, fill.shares);

    state.currentSupply += fill.shares;
    state.totalCapitalRaised += fill.rawCost;

    ctx.emit({
        type: 'SharesBought',
        buyer,
        side,
        requestedShares: fill.requestedShares,
        shares: fill.shares,
        rawCost: fill.rawCost,
        fee: fill.fee,
        currentSupply: state.currentSupply,
        totalCapitalRaised: state.totalCapitalRaised,
    });

    logger.info(
        `[CURVE] ${buyer} bought ${formatUnits(fill.shares, 18)} ${side} for ${formatUnits(fill.total, 18)} ` +
            `(raised ${formatUnits(state.totalCapitalRaised, 18)}/${formatUnits(state.migrationThreshold, 18)})` +
            (fill.capped ? ' [capped]' : '')
    );

    if (fill.reachesThreshold) {
        migrate(ctx);
    }
    return fill;
}
