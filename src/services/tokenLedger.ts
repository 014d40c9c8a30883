import { MarketError } from '../core/errors';
import { Checkpointable, TokenBalances } from './collaborators';

/**
 * In-process fungible token ledger. Accounts are plain address strings and
 * are compared case-insensitively.
 */
export class TokenLedger implements TokenBalances, Checkpointable {
    private balances = new Map<string, bigint>();
    private supply = 0n;

    constructor(
        public readonly symbol: string,
        public readonly decimals: number
    ) {}

    balanceOf(account: string): bigint {
        return this.balances.get(account.toLowerCase()) ?? 0n;
    }

    totalSupply(): bigint {
        return this.supply;
    }

    mint(to: string, amount: bigint): void {
        this.assertAmount(amount);
        this.balances.set(to.toLowerCase(), this.balanceOf(to) + amount);
        this.supply += amount;
    }

    burn(from: string, amount: bigint): void {
        this.assertAmount(amount);
        this.debit(from, amount);
        this.supply -= amount;
    }

    transfer(from: string, to: string, amount: bigint): void {
        this.assertAmount(amount);
        this.debit(from, amount);
        this.balances.set(to.toLowerCase(), this.balanceOf(to) + amount);
    }

    /** Non-zero balances, for snapshots */
    entries(): Array<[string, bigint]> {
        return [...this.balances.entries()].filter(([, balance]) => balance > 0n);
    }

    checkpoint(): () => void {
        const balances = new Map(this.balances);
        const supply = this.supply;
        return () => {
            this.balances = balances;
            this.supply = supply;
        };
    }

    private debit(from: string, amount: bigint): void {
        const balance = this.balanceOf(from);
        if (balance < amount) {
            throw new MarketError('InsufficientBalance', `${this.symbol} balance too low`, {
                account: from,
                balance,
                amount,
            });
        }
        this.balances.set(from.toLowerCase(), balance - amount);
    }

    private assertAmount(amount: bigint): void {
        if (amount < 0n) {
            throw new MarketError('InvalidAmount', `${this.symbol} amount must not be negative`, { amount });
        }
    }
}
