// Protocol constants for the leveraged outcome market

// ═══════════════════════════════════════════════════════════════════════════════
// FIXED-POINT UNITS
// ═══════════════════════════════════════════════════════════════════════════════

export const BPS = 10_000n;

/** 1.0 for prices, settlement price and outcome-token shares (18 decimals) */
export const WAD = 10n ** 18n;

/** External asset (6 decimals) → internal accounting unit (18 decimals) */
export const SCALE_FACTOR = 10n ** 12n;

export const EXTERNAL_DECIMALS = 6;
export const INTERNAL_DECIMALS = 18;
export const SHARE_DECIMALS = 18;

export const SECONDS_PER_YEAR = 365n * 24n * 60n * 60n;

export const STATE_VERSION = 1;

// ═══════════════════════════════════════════════════════════════════════════════
// PROTOCOL DEFAULTS (overridable via MarketConfig)
// ═══════════════════════════════════════════════════════════════════════════════

export const MARKET_DEFAULTS = {
    // Bonding curve: spot price = CURVE_K * supply / CURVE_SCALE
    CURVE_K: 100n,
    CURVE_SCALE: 1_000_000n,
    PHASE1_FEE_BPS: 50n,
    SNAP_TOLERANCE: 1_000n,                 // internal base units

    // Leverage
    MAX_LEVERAGE: 5n,
    MIN_COLLATERAL: 10n * 10n ** 6n,        // 10 external units
    BORROW_RATE_BPS: 1_000n,                // 10% simple, annualised

    // Resolution
    CLAIM_COOLING_OFF_SECONDS: 30 * 24 * 60 * 60,
} as const;

// ═══════════════════════════════════════════════════════════════════════════════
// RISK PARAMETERS
// ═══════════════════════════════════════════════════════════════════════════════

/** Traded-side price ceiling used while rebalancing (0.99) */
export const PRICE_CAP = (99n * WAD) / 100n;

/** |priceYes + priceNo - 1| allowed after an uncapped trade */
export const PRICE_SUM_TOLERANCE = 10n ** 9n;

/** Position value must cover 120% of debt */
export const LIQUIDATION_THRESHOLD_BPS = 12_000n;

/** Liquidation surplus split */
export const LIQUIDATION_INSURANCE_FEE_BPS = 200n;
export const KEEPER_REWARD_BPS = 500n;

export const MAX_HEALTH_FACTOR = 2n ** 256n - 1n;

// ═══════════════════════════════════════════════════════════════════════════════
// TIERED CLAIM YIELD
// ═══════════════════════════════════════════════════════════════════════════════

export type UserTier = 'Standard' | 'Early' | 'FanToken';

/** uint8 tier codes carried in signed claim messages */
export const TIER_CODES: Record<UserTier, number> = {
    Standard: 0,
    Early: 1,
    FanToken: 2,
};

/** Bonus paid on collateral to solvent phase-2 winners, before tier multiplier */
export const BASE_YIELD_BPS = 500n;

export const TIER_MULTIPLIER_BPS: Record<UserTier, bigint> = {
    Standard: 10_000n,
    Early: 15_000n,
    FanToken: 20_000n,
};

// ═══════════════════════════════════════════════════════════════════════════════
// AUTHORIZATION DOMAIN
// ═══════════════════════════════════════════════════════════════════════════════

export const SIGNING_DOMAIN = {
    NAME: 'LeveragedOutcomeMarket',
    VERSION: '1',
} as const;

// Environment variable keys
export const ENV_KEYS = {
    MARKET_ADDRESS: 'MARKET_ADDRESS',
    MARKET_QUESTION: 'MARKET_QUESTION',
    CHAIN_ID: 'CHAIN_ID',
    AUTHORITY_ADDRESS: 'AUTHORITY_ADDRESS',
    FEE_RECIPIENT: 'FEE_RECIPIENT',
    MIGRATION_THRESHOLD: 'MIGRATION_THRESHOLD',
    CURVE_K: 'CURVE_K',
    CURVE_SCALE: 'CURVE_SCALE',
    PHASE1_FEE_BPS: 'PHASE1_FEE_BPS',
    SNAP_TOLERANCE: 'SNAP_TOLERANCE',
    MAX_LEVERAGE: 'MAX_LEVERAGE',
    MIN_COLLATERAL: 'MIN_COLLATERAL',
    BORROW_RATE_BPS: 'BORROW_RATE_BPS',
    CLAIM_COOLING_OFF_SECONDS: 'CLAIM_COOLING_OFF_SECONDS',
    PORT: 'PORT',
    SUPABASE_URL: 'SUPABASE_URL',
    SUPABASE_KEY: 'SUPABASE_KEY',
} as const;
