import { MarketError } from '../core/errors';
import { Side } from '../types';
import { Checkpointable, OutcomeTokenView } from './collaborators';
import { TokenLedger } from './tokenLedger';

/**
 * Phase-1 outcome token. Only the issuing market mints and burns; holders
 * can never move their balance.
 */
export class OutcomeToken implements OutcomeTokenView, Checkpointable {
    private readonly ledger: TokenLedger;

    constructor(
        public readonly side: Side,
        private readonly issuer: string
    ) {
        this.ledger = new TokenLedger(`o${side}`, 18);
    }

    balanceOf(account: string): bigint {
        return this.ledger.balanceOf(account);
    }

    totalSupply(): bigint {
        return this.ledger.totalSupply();
    }

    mint(caller: string, to: string, amount: bigint): void {
        this.assertIssuer(caller);
        this.ledger.mint(to, amount);
    }

    burn(caller: string, from: string, amount: bigint): void {
        this.assertIssuer(caller);
        this.ledger.burn(from, amount);
    }

    transfer(_from: string, _to: string, _amount: bigint): never {
        throw new MarketError('NonTransferable', `o${this.side} tokens cannot be transferred`);
    }

    holdings(): Array<[string, bigint]> {
        return this.ledger.entries();
    }

    checkpoint(): () => void {
        return this.ledger.checkpoint();
    }

    private assertIssuer(caller: string): void {
        if (caller.toLowerCase() !== this.issuer.toLowerCase()) {
            throw new MarketError('Unauthorized', 'only the issuing market may mint or burn', { caller });
        }
    }
}
