import { SCALE_FACTOR } from '../config/constants';
import { MarketDependencies } from '../services/collaborators';
import { OutcomeToken } from '../services/outcomeToken';
import { Clock, MarketEventPayload, MarketState, Side } from '../types';

/**
 * Everything a market module needs for one call. Modules read `state`
 * through the context every time; never cache it across calls.
 */
export interface MarketContext {
    readonly state: MarketState;
    readonly deps: MarketDependencies;
    readonly clock: Clock;
    readonly outcomes: Record<Side, OutcomeToken>;
    emit(payload: MarketEventPayload): void;
}

export function positionKey(trader: string, side: Side): string {
    return `${trader.toLowerCase()}:${side}`;
}

export function marketExternalBalance(ctx: MarketContext): bigint {
    return ctx.deps.stableAsset.balanceOf(ctx.state.marketAddress);
}

/**
 * Pull internal accounting units from an account into the market.
 */
export function pullInternal(ctx: MarketContext, from: string, internalAmount: bigint): void {
    if (internalAmount === 0n) return;
    ctx.deps.accountingUnit.transfer(from, ctx.state.marketAddress, internalAmount);
}

/**
 * Pay external-denominated value out of the market. The market deposits the
 * external amount at the custody vault and forwards the minted internal
 * units to the recipient.
 */
export function payOut(ctx: MarketContext, to: string, externalAmount: bigint): void {
    if (externalAmount === 0n) return;
    const market = ctx.state.marketAddress;
    ctx.deps.custody.deposit(market, externalAmount);
    ctx.deps.accountingUnit.transfer(market, to, externalAmount * SCALE_FACTOR);
}
