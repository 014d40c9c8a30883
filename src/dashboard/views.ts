import { EXTERNAL_DECIMALS, SHARE_DECIMALS, INTERNAL_DECIMALS, MAX_HEALTH_FACTOR } from '../config/constants';
import { MarketEngine } from '../engine/MarketEngine';
import { MarketState, Position, SIDES, Side } from '../types';
import { formatUnits } from '../utils/units';

// ═══════════════════════════════════════════════════════════════════════════════
// VIEW MODELS — everything a client sees, as decimal strings
// ═══════════════════════════════════════════════════════════════════════════════

export interface MarketView {
    marketAddress: string;
    question: string;
    phase: MarketState['phase'];
    prices: Record<Side, string>;
    curve: {
        currentSupply: string;
        totalCapitalRaised: string;
        migrationThreshold: string;
        progressBps: string;
    };
    amm: { reserveStable: string; reserveYes: string; reserveNo: string } | null;
    leverage: { totalBorrowed: string; openInterestYes: string; openInterestNo: string };
    resolution: { winningOutcome: Side; settlementPrice: string; resolvedAt: number } | null;
}

export interface PositionView {
    side: Side;
    collateral: string;
    leverage: string;
    loanAmount: string;
    shares: string;
    entryPrice: string;
    openedAt: number;
    active: boolean;
    healthFactor: string | null;
}

export function buildMarketView(engine: MarketEngine): MarketView {
    const state = engine.getState();
    const prices = {
        YES: formatUnits(engine.getCurrentPrice('YES'), 18),
        NO: formatUnits(engine.getCurrentPrice('NO'), 18),
    };
    const progressBps =
        state.migrationThreshold === 0n ? 0n : (state.totalCapitalRaised * 10_000n) / state.migrationThreshold;

    return {
        marketAddress: state.marketAddress,
        question: state.question,
        phase: state.phase,
        prices,
        curve: {
            currentSupply: formatUnits(state.currentSupply, SHARE_DECIMALS),
            totalCapitalRaised: formatUnits(state.totalCapitalRaised, INTERNAL_DECIMALS),
            migrationThreshold: formatUnits(state.migrationThreshold, INTERNAL_DECIMALS),
            progressBps: progressBps.toString(),
        },
        amm: state.migrated
            ? {
                  reserveStable: formatUnits(state.reserveStable, EXTERNAL_DECIMALS),
                  reserveYes: formatUnits(state.reserveYes, EXTERNAL_DECIMALS),
                  reserveNo: formatUnits(state.reserveNo, EXTERNAL_DECIMALS),
              }
            : null,
        leverage: {
            totalBorrowed: formatUnits(state.totalBorrowed, EXTERNAL_DECIMALS),
            openInterestYes: formatUnits(state.openInterestYes, EXTERNAL_DECIMALS),
            openInterestNo: formatUnits(state.openInterestNo, EXTERNAL_DECIMALS),
        },
        resolution:
            state.winningOutcome !== null && state.resolvedAt !== null
                ? {
                      winningOutcome: state.winningOutcome,
                      settlementPrice: formatUnits(state.settlementPrice, 18),
                      resolvedAt: state.resolvedAt,
                  }
                : null,
    };
}

/**
 * Health factor as a ratio ("1.25"); "∞" without debt.
 */
export function formatHealthFactor(healthFactor: bigint): string {
    return healthFactor === MAX_HEALTH_FACTOR ? '∞' : formatUnits(healthFactor, 4);
}

export function buildPositionView(engine: MarketEngine, position: Position): PositionView {
    const live = position.active && engine.getState().phase === 'Phase2Active';
    return {
        side: position.side,
        collateral: formatUnits(position.collateral, EXTERNAL_DECIMALS),
        leverage: position.leverage.toString(),
        loanAmount: formatUnits(position.loanAmount, EXTERNAL_DECIMALS),
        shares: formatUnits(position.shares, EXTERNAL_DECIMALS),
        entryPrice: formatUnits(position.entryPrice, 18),
        openedAt: position.openedAt,
        active: position.active,
        healthFactor: live ? formatHealthFactor(engine.getHealthFactor(position.trader, position.side)) : null,
    };
}

export function buildTraderView(engine: MarketEngine, trader: string): PositionView[] {
    const views: PositionView[] = [];
    for (const side of SIDES) {
        const position = engine.getPosition(trader, side);
        if (position) views.push(buildPositionView(engine, position));
    }
    return views;
}
