/**
 * Virtual AMM — Phase 2 pricing
 *
 * Constant product against the invariant fixed at migration. The traded side
 * moves along the curve; the untouched side is then re-derived so that the
 * two prices sum to 1 (traded price capped at 0.99).
 */

import { MarketError } from '../core/errors';
import { SideReserves, ammBuy, ammSell, priceOf, rebalance } from '../core/marketMath';
import { MarketState, Side, oppositeSide } from '../types';
import logger from '../utils/logger';
import { MarketContext } from './context';

export function reserveOf(state: MarketState, side: Side): bigint {
    return side === 'YES' ? state.reserveYes : state.reserveNo;
}

function setReserve(state: MarketState, side: Side, value: bigint): void {
    if (side === 'YES') {
        state.reserveYes = value;
    } else {
        state.reserveNo = value;
    }
}

export function reservesFor(state: MarketState, side: Side): SideReserves {
    if (!state.migrated) {
        throw new MarketError('Phase2NotActive', 'virtual AMM is not live');
    }
    return { stable: state.reserveStable, side: reserveOf(state, side), invariantK: state.invariantK };
}

export function ammPrice(state: MarketState, side: Side): bigint {
    return priceOf(state.reserveStable, reserveOf(state, side));
}

export function buyOutcome(ctx: MarketContext, side: Side, stableIn: bigint): bigint {
    const result = ammBuy(reservesFor(ctx.state, side), stableIn);
    ctx.state.reserveStable = result.newStable;
    setReserve(ctx.state, side, result.newSide);
    rebalanceAfterTrade(ctx, side);
    return result.sharesOut;
}

export function sellOutcome(ctx: MarketContext, side: Side, sharesIn: bigint): bigint {
    const result = ammSell(reservesFor(ctx.state, side), sharesIn);
    ctx.state.reserveStable = result.newStable;
    setReserve(ctx.state, side, result.newSide);
    rebalanceAfterTrade(ctx, side);
    return result.stableOut;
}

function rebalanceAfterTrade(ctx: MarketContext, tradedSide: Side): void {
    const { state } = ctx;
    const other = oppositeSide(tradedSide);
    const result = rebalance(state.reserveStable, reserveOf(state, tradedSide));
    setReserve(state, other, result.complementaryReserve);

    const priceYes = ammPrice(state, 'YES');
    const priceNo = ammPrice(state, 'NO');
    if (result.capped) {
        logger.warn(`[AMM] ${tradedSide} price ${result.tradedPrice} capped at ${result.effectivePrice}`);
    }

    ctx.emit({
        type: 'Rebalanced',
        tradedSide,
        priceYes,
        priceNo,
        reserveStable: state.reserveStable,
        reserveYes: state.reserveYes,
        reserveNo: state.reserveNo,
        capped: result.capped,
    });
}
