import BigNumber from 'bignumber.js';
import { MarketError } from '../core/errors';

export const toBigNumber = (value: bigint | string | number): BigNumber => {
    return new BigNumber(typeof value === 'bigint' ? value.toString() : value);
};

/**
 * Render a base-unit integer as a decimal string, e.g. 1_500_000n @ 6 → "1.5"
 */
export const formatUnits = (value: bigint, decimals: number): string => {
    return toBigNumber(value).shiftedBy(-decimals).toFixed();
};

/**
 * Parse a decimal string into base units. Rejects values with more precision
 * than `decimals` allows.
 */
export const parseUnits = (text: string, decimals: number): bigint => {
    const parsed = new BigNumber(text.trim());
    if (!parsed.isFinite()) {
        throw new MarketError('InvalidAmount', `not a number: "${text}"`);
    }
    const shifted = parsed.shiftedBy(decimals);
    if (!shifted.isInteger()) {
        throw new MarketError('InvalidAmount', `"${text}" exceeds ${decimals} decimals`);
    }
    return BigInt(shifted.toFixed(0));
};

/**
 * JSON-safe copy: bigints become decimal strings, Maps become plain objects.
 */
export const serializeBigInts = (value: unknown): unknown => {
    if (typeof value === 'bigint') return value.toString();
    if (value instanceof Map) {
        const out: Record<string, unknown> = {};
        for (const [key, entry] of value) {
            out[String(key)] = serializeBigInts(entry);
        }
        return out;
    }
    if (Array.isArray(value)) return value.map(serializeBigInts);
    if (value !== null && typeof value === 'object') {
        const out: Record<string, unknown> = {};
        for (const [key, entry] of Object.entries(value)) {
            out[key] = serializeBigInts(entry);
        }
        return out;
    }
    return value;
};
