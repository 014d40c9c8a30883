import { BPS } from '../config/constants';
import { MarketError } from '../core/errors';
import logger from '../utils/logger';
import { Checkpointable, LendingCollaborator, TokenBalances } from './collaborators';

export const DEFAULT_UTILIZATION_CAP_BPS = 8_000n;

interface LendingBook {
    totalSupplied: bigint;
    totalBorrowed: bigint;
    interestEarned: bigint;
    borrowedByMarket: Map<string, bigint>;
}

/**
 * Lends the external asset to allow-listed markets up to a utilization cap
 * of the liquidity supplied.
 */
export class InProcessLendingPool implements LendingCollaborator, Checkpointable {
    private book: LendingBook = {
        totalSupplied: 0n,
        totalBorrowed: 0n,
        interestEarned: 0n,
        borrowedByMarket: new Map(),
    };
    private allowedMarkets = new Set<string>();

    constructor(
        public readonly address: string,
        private readonly stableAsset: TokenBalances,
        private readonly utilizationCapBps: bigint = DEFAULT_UTILIZATION_CAP_BPS
    ) {}

    allowMarket(market: string): void {
        this.allowedMarkets.add(market.toLowerCase());
    }

    supply(provider: string, amount: bigint): void {
        this.stableAsset.transfer(provider, this.address, amount);
        this.book.totalSupplied += amount;
    }

    fundLoan(market: string, amount: bigint): void {
        this.assertAllowed(market);
        if (amount === 0n) return;

        const nextBorrowed = this.book.totalBorrowed + amount;
        if (nextBorrowed * BPS > this.book.totalSupplied * this.utilizationCapBps) {
            throw new MarketError('UtilizationCapExceeded', 'loan exceeds pool utilization cap', {
                amount,
                totalBorrowed: this.book.totalBorrowed,
                totalSupplied: this.book.totalSupplied,
            });
        }

        this.stableAsset.transfer(this.address, market, amount);
        this.book.totalBorrowed = nextBorrowed;
        this.book.borrowedByMarket.set(market.toLowerCase(), this.totalBorrowed(market) + amount);
    }

    repayLoan(market: string, principal: bigint, interest: bigint): void {
        this.assertAllowed(market);
        const outstanding = this.totalBorrowed(market);
        if (principal > outstanding) {
            throw new MarketError('InvalidAmount', 'repayment exceeds outstanding principal', {
                principal,
                outstanding,
            });
        }
        if (principal + interest === 0n) return;

        this.stableAsset.transfer(market, this.address, principal + interest);
        this.book.totalBorrowed -= principal;
        this.book.interestEarned += interest;
        this.book.borrowedByMarket.set(market.toLowerCase(), outstanding - principal);
        logger.debug(`[LENDING] Repaid principal=${principal} interest=${interest} from ${market}`);
    }

    totalBorrowed(market: string): bigint {
        return this.book.borrowedByMarket.get(market.toLowerCase()) ?? 0n;
    }

    get interestEarned(): bigint {
        return this.book.interestEarned;
    }

    get utilizationBps(): bigint {
        if (this.book.totalSupplied === 0n) return 0n;
        return (this.book.totalBorrowed * BPS) / this.book.totalSupplied;
    }

    checkpoint(): () => void {
        const saved: LendingBook = { ...this.book, borrowedByMarket: new Map(this.book.borrowedByMarket) };
        return () => {
            this.book = saved;
        };
    }

    private assertAllowed(market: string): void {
        if (!this.allowedMarkets.has(market.toLowerCase())) {
            throw new MarketError('Unauthorized', 'market is not allowed to borrow', { market });
        }
    }
}
