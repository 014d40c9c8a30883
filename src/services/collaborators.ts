/**
 * Collaborator contracts consumed by the market core.
 *
 * The engine only talks to these interfaces; the in-process implementations
 * under src/services are what the bootstrap and the tests wire in.
 */

import { SignatureVerifier } from '../auth/authorization';

/**
 * Anything whose state must roll back with a failed market call.
 * `checkpoint` captures the current state and returns its restorer.
 */
export interface Checkpointable {
    checkpoint(): () => void;
}

export function isCheckpointable(value: unknown): value is Checkpointable {
    return (
        typeof value === 'object' &&
        value !== null &&
        'checkpoint' in value &&
        typeof value.checkpoint === 'function'
    );
}

export interface TokenBalances {
    readonly symbol: string;
    readonly decimals: number;
    balanceOf(account: string): bigint;
    totalSupply(): bigint;
    mint(to: string, amount: bigint): void;
    burn(from: string, amount: bigint): void;
    transfer(from: string, to: string, amount: bigint): void;
}

/**
 * Converts the external asset into internal accounting units and back.
 */
export interface CustodyVault {
    readonly address: string;
    /** Pull `amount` external units from `account`, mint amount·SCALE internal units to it */
    deposit(account: string, amount: bigint): bigint;
    /** Burn internal units from `account`, pay the external equivalent; returns external units */
    redeem(account: string, internalAmount: bigint): bigint;
    /** Swap the market's raised internal units for external units, once per market */
    transferToMarketOnce(market: string, amount: bigint): void;
}

export interface LendingCollaborator {
    readonly address: string;
    fundLoan(market: string, amount: bigint): void;
    repayLoan(market: string, principal: bigint, interest: bigint): void;
    totalBorrowed(market: string): bigint;
}

export interface InsuranceCollaborator {
    readonly address: string;
    depositFee(market: string, amount: bigint): void;
    coverBadDebt(market: string, amount: bigint): void;
}

export interface OutcomeTokenView {
    readonly side: 'YES' | 'NO';
    balanceOf(account: string): bigint;
    totalSupply(): bigint;
}

export interface MarketDependencies {
    /** external asset, 6 decimals */
    stableAsset: TokenBalances;
    /** internal accounting unit, 18 decimals */
    accountingUnit: TokenBalances;
    custody: CustodyVault;
    lending: LendingCollaborator;
    insurance: InsuranceCollaborator;
    verifier: SignatureVerifier;
}
