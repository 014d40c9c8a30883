/**
 * Market Math — Pure Integer Routines
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * STATELESS. NO FLOATING POINT. ALL DIVISIONS FLOOR.
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Units:
 *   - bonding-curve supply and outcome tokens: 18 decimals (WAD = 1 share)
 *   - curve cost and fees: internal accounting units (18 decimals)
 *   - virtual reserves, position shares, collateral, loans: external units (6 decimals)
 *   - prices and settlement price: WAD fixed point
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import {
    BASE_YIELD_BPS,
    BPS,
    LIQUIDATION_THRESHOLD_BPS,
    MAX_HEALTH_FACTOR,
    PRICE_CAP,
    SECONDS_PER_YEAR,
    TIER_MULTIPLIER_BPS,
    UserTier,
    WAD,
} from '../config/constants';
import { MarketError } from './errors';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface CurveParams {
    k: bigint;
    scale: bigint;
    feeBps: bigint;
}

export interface CurveQuote {
    rawCost: bigint;
    fee: bigint;
    total: bigint;
}

/**
 * One side of the virtual AMM: the stable reserve, the traded outcome's
 * reserve and the invariant fixed at migration.
 */
export interface SideReserves {
    stable: bigint;
    side: bigint;
    invariantK: bigint;
}

export interface AmmBuyResult {
    sharesOut: bigint;
    newStable: bigint;
    newSide: bigint;
}

export interface AmmSellResult {
    stableOut: bigint;
    newStable: bigint;
    newSide: bigint;
}

export interface RebalanceResult {
    tradedPrice: bigint;
    effectivePrice: bigint;
    complementaryReserve: bigint;
    capped: boolean;
}

export interface LeveragePreview {
    notional: bigint;
    loan: bigint;
    expectedShares: bigint;
    averagePrice: bigint;
}

export interface HealthInputs {
    shares: bigint;
    price: bigint;
    loan: bigint;
    interest: bigint;
}

// ═══════════════════════════════════════════════════════════════════════════════
// PRIMITIVES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Floor integer square root (Newton iteration).
 */
export function isqrt(n: bigint): bigint {
    if (n < 0n) {
        throw new MarketError('InvalidAmount', 'square root of a negative number', { n });
    }
    if (n < 2n) return n;

    let x = n;
    let y = (x + 1n) / 2n;
    while (y < x) {
        x = y;
        y = (x + n / x) / 2n;
    }
    return x;
}

export function bps(amount: bigint, basisPoints: bigint): bigint {
    return (amount * basisPoints) / BPS;
}

// ═══════════════════════════════════════════════════════════════════════════════
// BONDING CURVE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Spot price at `supply`, in internal units per share (WAD-scaled).
 */
export function spotPrice(params: CurveParams, supply: bigint): bigint {
    return (params.k * supply) / params.scale;
}

/**
 * Integral of the linear price between two supply points:
 *   K * (sEnd² - sStart²) / (2 * SCALE * WAD)
 */
export function curveCost(params: CurveParams, sStart: bigint, sEnd: bigint): bigint {
    if (sEnd < sStart) {
        throw new MarketError('InvalidAmount', 'curve end below start', { sStart, sEnd });
    }
    return (params.k * (sEnd * sEnd - sStart * sStart)) / (2n * params.scale * WAD);
}

export function quoteBuy(params: CurveParams, supply: bigint, amount: bigint): CurveQuote {
    const rawCost = curveCost(params, supply, supply + amount);
    const fee = bps(rawCost, params.feeBps);
    return { rawCost, fee, total: rawCost + fee };
}

/**
 * Inverse of the cost integral: the supply reached by spending `capital`
 * starting from `sStart`. Floors, so curveCost(sStart, result) <= capital.
 */
export function sharesForCapital(params: CurveParams, sStart: bigint, capital: bigint): bigint {
    const squared = sStart * sStart + (capital * 2n * params.scale * WAD) / params.k;
    return isqrt(squared);
}

// ═══════════════════════════════════════════════════════════════════════════════
// INTEREST & HEALTH
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Simple interest: principal * rateBps * elapsed / (BPS * year)
 */
export function accrueInterest(principal: bigint, rateBps: bigint, elapsedSeconds: bigint): bigint {
    if (principal === 0n || elapsedSeconds <= 0n) return 0n;
    return (principal * rateBps * elapsedSeconds) / (BPS * SECONDS_PER_YEAR);
}

export function positionValue(shares: bigint, price: bigint): bigint {
    return (shares * price) / WAD;
}

/**
 * Health factor in basis points; below BPS the position is liquidatable.
 * value * BPS / (debt * 120%). A position without debt is maximally healthy.
 */
export function healthFactor(inputs: HealthInputs): bigint {
    const debt = inputs.loan + inputs.interest;
    if (debt === 0n) return MAX_HEALTH_FACTOR;

    const value = positionValue(inputs.shares, inputs.price);
    const threshold = (debt * LIQUIDATION_THRESHOLD_BPS) / BPS;
    return (value * BPS) / threshold;
}

// ═══════════════════════════════════════════════════════════════════════════════
// VIRTUAL AMM
// ═══════════════════════════════════════════════════════════════════════════════

export function priceOf(stable: bigint, sideReserve: bigint): bigint {
    if (sideReserve <= 0n) {
        throw new MarketError('InvalidAmount', 'outcome reserve exhausted', { sideReserve });
    }
    return (stable * WAD) / sideReserve;
}

export function ammBuy(reserves: SideReserves, stableIn: bigint): AmmBuyResult {
    if (stableIn <= 0n) {
        throw new MarketError('InvalidAmount', 'stable input must be positive', { stableIn });
    }
    const newStable = reserves.stable + stableIn;
    const newSide = reserves.invariantK / newStable;
    const sharesOut = reserves.side - newSide;
    if (sharesOut <= 0n) {
        throw new MarketError('ZeroSharesOut', 'trade mints no shares', { stableIn });
    }
    return { sharesOut, newStable, newSide };
}

export function ammSell(reserves: SideReserves, sharesIn: bigint): AmmSellResult {
    if (sharesIn <= 0n) {
        throw new MarketError('InvalidAmount', 'share input must be positive', { sharesIn });
    }
    const newSide = reserves.side + sharesIn;
    const newStable = reserves.invariantK / newSide;
    const stableOut = reserves.stable - newStable;
    if (stableOut <= 0n) {
        throw new MarketError('ZeroProceeds', 'trade returns no proceeds', { sharesIn });
    }
    return { stableOut, newStable, newSide };
}

/**
 * Complementary reserve for the untouched side so that both prices sum to 1.
 * The traded price is capped at PRICE_CAP before taking the complement.
 */
export function rebalance(stable: bigint, tradedReserve: bigint): RebalanceResult {
    const tradedPrice = priceOf(stable, tradedReserve);
    const capped = tradedPrice > PRICE_CAP;
    const effectivePrice = capped ? PRICE_CAP : tradedPrice;
    const complementaryReserve = (stable * WAD) / (WAD - effectivePrice);
    return { tradedPrice, effectivePrice, complementaryReserve, capped };
}

export function previewLeverage(
    reserves: SideReserves,
    collateral: bigint,
    leverage: bigint
): LeveragePreview {
    const notional = collateral * leverage;
    const loan = collateral * (leverage - 1n);
    const { sharesOut } = ammBuy(reserves, notional);
    return {
        notional,
        loan,
        expectedShares: sharesOut,
        averagePrice: (notional * WAD) / sharesOut,
    };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SETTLEMENT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * min(1.0, backing / liabilities) in WAD. No liabilities settles at par.
 */
export function computeSettlementPrice(backing: bigint, liabilities: bigint): bigint {
    if (liabilities === 0n || backing >= liabilities) return WAD;
    return (backing * WAD) / liabilities;
}

export function tierBonus(collateral: bigint, tier: UserTier): bigint {
    return (collateral * BASE_YIELD_BPS * TIER_MULTIPLIER_BPS[tier]) / (BPS * BPS);
}
