import { SCALE_FACTOR } from '../config/constants';
import { MarketError } from '../core/errors';
import logger from '../utils/logger';
import { Checkpointable, CustodyVault, TokenBalances } from './collaborators';

/**
 * Holds the external asset backing every internal accounting unit in
 * circulation. 1 external base unit ⇔ SCALE_FACTOR internal base units.
 */
export class InProcessCustodyVault implements CustodyVault, Checkpointable {
    private fundedMarkets = new Set<string>();

    constructor(
        public readonly address: string,
        private readonly stableAsset: TokenBalances,
        private readonly accountingUnit: TokenBalances
    ) {}

    deposit(account: string, amount: bigint): bigint {
        if (amount <= 0n) {
            throw new MarketError('InvalidAmount', 'deposit must be positive', { amount });
        }
        this.stableAsset.transfer(account, this.address, amount);
        const minted = amount * SCALE_FACTOR;
        this.accountingUnit.mint(account, minted);
        return minted;
    }

    /**
     * Dust below one external base unit stays with the account.
     */
    redeem(account: string, internalAmount: bigint): bigint {
        const external = internalAmount / SCALE_FACTOR;
        if (external <= 0n) {
            throw new MarketError('InvalidAmount', 'redeem amount below one external unit', { internalAmount });
        }
        this.accountingUnit.burn(account, external * SCALE_FACTOR);
        this.stableAsset.transfer(this.address, account, external);
        return external;
    }

    transferToMarketOnce(market: string, amount: bigint): void {
        const key = market.toLowerCase();
        if (this.fundedMarkets.has(key)) {
            throw new MarketError('MigrationAlreadyFunded', 'market capital already released', { market });
        }
        this.accountingUnit.burn(market, amount * SCALE_FACTOR);
        this.stableAsset.transfer(this.address, market, amount);
        this.fundedMarkets.add(key);
        logger.info(`[CUSTODY] Released ${amount} external units to ${market}`);
    }

    isFunded(market: string): boolean {
        return this.fundedMarkets.has(market.toLowerCase());
    }

    checkpoint(): () => void {
        const funded = new Set(this.fundedMarkets);
        return () => {
            this.fundedMarkets = funded;
        };
    }
}
