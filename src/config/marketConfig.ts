/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * MARKET CONFIGURATION — SINGLE SOURCE OF TRUTH
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Loaded from the environment (dotenv). Required keys have no fallback: a
 * missing or malformed value fails loudly at startup.
 *
 * REQUIRED:
 *   MARKET_ADDRESS, MARKET_QUESTION, CHAIN_ID, AUTHORITY_ADDRESS,
 *   FEE_RECIPIENT, MIGRATION_THRESHOLD (external units, decimal string)
 *
 * OPTIONAL (protocol defaults otherwise):
 *   CURVE_K, CURVE_SCALE, PHASE1_FEE_BPS, SNAP_TOLERANCE, MAX_LEVERAGE,
 *   MIN_COLLATERAL (external units, decimal string), BORROW_RATE_BPS,
 *   CLAIM_COOLING_OFF_SECONDS, PORT, SUPABASE_URL, SUPABASE_KEY
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { MarketParams } from '../types';
import { normalizeAddress } from '../utils/address';
import { parseUnits } from '../utils/units';
import { ENV_KEYS, EXTERNAL_DECIMALS } from './constants';
import type { MarketInitParams } from '../engine/MarketEngine';
import { DEFAULT_MARKET_PARAMS } from '../engine/MarketEngine';

export type Env = Record<string, string | undefined>;

export interface MarketConfig {
    market: MarketInitParams;
    port: number;
    supabase: { url: string; key: string } | null;
}

export class ConfigError extends Error {
    constructor(
        public readonly key: string,
        message: string
    ) {
        super(`[CONFIG] ${key}: ${message}`);
        this.name = 'ConfigError';
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// PARSERS
// ═══════════════════════════════════════════════════════════════════════════════

function required(env: Env, key: string): string {
    const value = env[key]?.trim();
    if (!value) {
        throw new ConfigError(key, 'is required');
    }
    return value;
}

function address(env: Env, key: string): string {
    const value = required(env, key);
    try {
        return normalizeAddress(value, key);
    } catch {
        throw new ConfigError(key, `"${value}" is not a valid address`);
    }
}

function integer(env: Env, key: string, fallback: bigint): bigint {
    const value = env[key]?.trim();
    if (!value) return fallback;
    if (!/^\d+$/.test(value)) {
        throw new ConfigError(key, `"${value}" is not a non-negative integer`);
    }
    return BigInt(value);
}

function externalAmount(env: Env, key: string, fallback?: bigint): bigint {
    const value = env[key]?.trim();
    if (!value) {
        if (fallback === undefined) throw new ConfigError(key, 'is required');
        return fallback;
    }
    let parsed: bigint;
    try {
        parsed = parseUnits(value, EXTERNAL_DECIMALS);
    } catch {
        throw new ConfigError(key, `"${value}" is not an amount with at most ${EXTERNAL_DECIMALS} decimals`);
    }
    if (parsed <= 0n) {
        throw new ConfigError(key, 'must be positive');
    }
    return parsed;
}

function positive(env: Env, key: string, fallback: bigint): bigint {
    const value = integer(env, key, fallback);
    if (value <= 0n) {
        throw new ConfigError(key, 'must be positive');
    }
    return value;
}

function requiredPositive(env: Env, key: string): bigint {
    required(env, key);
    return positive(env, key, 0n);
}

function safeInteger(env: Env, key: string, fallback: number): number {
    const value = integer(env, key, BigInt(fallback));
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
        throw new ConfigError(key, 'is out of range');
    }
    return Number(value);
}

// ═══════════════════════════════════════════════════════════════════════════════
// LOADER
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate an environment into a typed configuration. Pure: pass a plain
 * object in tests.
 */
export function parseMarketConfig(env: Env): MarketConfig {
    const params: MarketParams = {
        curveK: positive(env, ENV_KEYS.CURVE_K, DEFAULT_MARKET_PARAMS.curveK),
        curveScale: positive(env, ENV_KEYS.CURVE_SCALE, DEFAULT_MARKET_PARAMS.curveScale),
        phase1FeeBps: integer(env, ENV_KEYS.PHASE1_FEE_BPS, DEFAULT_MARKET_PARAMS.phase1FeeBps),
        snapTolerance: integer(env, ENV_KEYS.SNAP_TOLERANCE, DEFAULT_MARKET_PARAMS.snapTolerance),
        maxLeverage: positive(env, ENV_KEYS.MAX_LEVERAGE, DEFAULT_MARKET_PARAMS.maxLeverage),
        minCollateral: externalAmount(env, ENV_KEYS.MIN_COLLATERAL, DEFAULT_MARKET_PARAMS.minCollateral),
        borrowRateBps: integer(env, ENV_KEYS.BORROW_RATE_BPS, DEFAULT_MARKET_PARAMS.borrowRateBps),
        claimCoolingOffSeconds: safeInteger(
            env,
            ENV_KEYS.CLAIM_COOLING_OFF_SECONDS,
            DEFAULT_MARKET_PARAMS.claimCoolingOffSeconds
        ),
    };

    const supabaseUrl = env[ENV_KEYS.SUPABASE_URL]?.trim();
    const supabaseKey = env[ENV_KEYS.SUPABASE_KEY]?.trim();

    return {
        market: {
            marketAddress: address(env, ENV_KEYS.MARKET_ADDRESS),
            question: required(env, ENV_KEYS.MARKET_QUESTION),
            chainId: requiredPositive(env, ENV_KEYS.CHAIN_ID),
            authority: address(env, ENV_KEYS.AUTHORITY_ADDRESS),
            feeRecipient: address(env, ENV_KEYS.FEE_RECIPIENT),
            migrationThreshold: externalAmount(env, ENV_KEYS.MIGRATION_THRESHOLD),
            params,
        },
        port: safeInteger(env, ENV_KEYS.PORT, 3000),
        supabase: supabaseUrl && supabaseKey ? { url: supabaseUrl, key: supabaseKey } : null,
    };
}

/**
 * Reads process.env; the entry point has already loaded .env through dotenv.
 */
export function loadMarketConfig(): MarketConfig {
    return parseMarketConfig(process.env);
}
