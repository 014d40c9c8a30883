import { MarketError } from '../core/errors';
import logger from '../utils/logger';
import { InsuranceCollaborator, TokenBalances } from './collaborators';

/**
 * Backstop for bad debt; collects liquidation fees and swept claims.
 * State lives entirely in the stable-asset ledger.
 */
export class InProcessInsuranceFund implements InsuranceCollaborator {
    private allowedMarkets = new Set<string>();

    constructor(
        public readonly address: string,
        private readonly stableAsset: TokenBalances
    ) {}

    allowMarket(market: string): void {
        this.allowedMarkets.add(market.toLowerCase());
    }

    fund(provider: string, amount: bigint): void {
        this.stableAsset.transfer(provider, this.address, amount);
    }

    balance(): bigint {
        return this.stableAsset.balanceOf(this.address);
    }

    depositFee(market: string, amount: bigint): void {
        this.assertAllowed(market);
        if (amount === 0n) return;
        this.stableAsset.transfer(market, this.address, amount);
    }

    coverBadDebt(market: string, amount: bigint): void {
        this.assertAllowed(market);
        const available = this.balance();
        if (available < amount) {
            throw new MarketError('InsufficientInsuranceFunds', 'insurance fund cannot cover bad debt', {
                amount,
                available,
            });
        }
        this.stableAsset.transfer(this.address, market, amount);
        logger.warn(`[INSURANCE] Covered bad debt of ${amount} for ${market}`);
    }

    private assertAllowed(market: string): void {
        if (!this.allowedMarkets.has(market.toLowerCase())) {
            throw new MarketError('Unauthorized', 'market is not registered with the insurance fund', { market });
        }
    }
}
