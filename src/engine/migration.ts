import { SCALE_FACTOR } from '../config/constants';
import { MarketError } from '../core/errors';
import logger from '../utils/logger';
import { MarketContext } from './context';

/**
 * One-shot switch from the bonding curve to the virtual AMM. The raised
 * capital becomes the stable reserve and both outcome reserves start at
 * twice that, so each side opens at 0.5.
 */
export function migrate(ctx: MarketContext): void {
    const { state } = ctx;
    if (state.migrated) {
        throw new MarketError('MarketAlreadyMigrated', 'market already migrated');
    }

    const capital = state.totalCapitalRaised / SCALE_FACTOR;
    ctx.deps.custody.transferToMarketOnce(state.marketAddress, capital);

    state.reserveStable = capital;
    state.reserveYes = capital * 2n;
    state.reserveNo = capital * 2n;
    state.invariantK = state.reserveStable * state.reserveYes;
    state.migrated = true;
    state.phase = 'Phase2Active';

    ctx.emit({
        type: 'Migrated',
        capital,
        reserveStable: state.reserveStable,
        reserveYes: state.reserveYes,
        reserveNo: state.reserveNo,
        invariantK: state.invariantK,
    });
    ctx.emit({ type: 'LeverageActivated', invariantK: state.invariantK });

    logger.info(`[MIGRATION] ${state.marketAddress} migrated with ${capital} external units, k=${state.invariantK}`);
}
