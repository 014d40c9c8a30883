import { getAddress, isAddress } from 'ethers';
import { MarketError } from '../core/errors';

/**
 * Checksummed form of an account address. Map keys and signed messages
 * always use this form.
 */
export function normalizeAddress(value: string, field: string = 'address'): string {
    if (!isAddress(value)) {
        throw new MarketError('InvalidAddress', `${field} is not a valid address`, { field, value });
    }
    return getAddress(value);
}
