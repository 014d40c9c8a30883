// Type Definitions for the Leveraged Outcome Market

import type { UserTier } from '../config/constants';

// ═══════════════════════════════════════════════════════════════════════════════
// CORE ENUMS
// ═══════════════════════════════════════════════════════════════════════════════

export type Side = 'YES' | 'NO';

/**
 * Strictly forward-moving market lifecycle
 */
export type MarketPhase = 'PreMigration' | 'Phase2Active' | 'Resolved';

/**
 * What a claim redeems: phase-1 outcome tokens or a phase-2 leveraged position
 */
export type ClaimKind = 'OutcomeTokens' | 'Position';

export const SIDES: readonly Side[] = ['YES', 'NO'];

export function oppositeSide(side: Side): Side {
    return side === 'YES' ? 'NO' : 'YES';
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Leveraged position keyed by (trader, side)
 */
export interface Position {
    trader: string;
    side: Side;
    collateral: bigint;     // external units posted by the trader
    leverage: bigint;
    loanAmount: bigint;     // borrowed from the lending collaborator
    shares: bigint;         // vAMM units minted at open
    entryPrice: bigint;     // average fill, WAD
    openedAt: number;       // unix seconds
    active: boolean;
}

/**
 * Tunable parameters fixed at initialization
 */
export interface MarketParams {
    curveK: bigint;
    curveScale: bigint;
    phase1FeeBps: bigint;
    snapTolerance: bigint;
    maxLeverage: bigint;
    minCollateral: bigint;
    borrowRateBps: bigint;
    claimCoolingOffSeconds: number;
}

export interface MarketState {
    version: number;
    initialized: boolean;
    marketAddress: string;
    question: string;
    chainId: bigint;
    phase: MarketPhase;
    authority: string;
    feeRecipient: string;
    params: MarketParams;

    // Bonding curve (internal units / 18-decimal shares)
    currentSupply: bigint;
    totalCapitalRaised: bigint;
    migrationThreshold: bigint;
    migrated: boolean;

    // Virtual AMM (external units)
    reserveStable: bigint;
    reserveYes: bigint;
    reserveNo: bigint;
    invariantK: bigint;

    // Leverage book
    totalBorrowed: bigint;
    openInterestYes: bigint;
    openInterestNo: bigint;
    positions: Map<string, Position>;

    // Resolution
    resolved: boolean;
    winningOutcome: Side | null;
    settlementPrice: bigint;
    resolvedAt: number | null;
    bonusReserve: bigint;

    nonces: Map<string, bigint>;
}

export interface Clock {
    /** unix seconds */
    now(): number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// EVENTS
// ═══════════════════════════════════════════════════════════════════════════════

export type MarketEventPayload =
    | {
          type: 'SharesBought';
          buyer: string;
          side: Side;
          requestedShares: bigint;
          shares: bigint;
          rawCost: bigint;
          fee: bigint;
          currentSupply: bigint;
          totalCapitalRaised: bigint;
      }
    | {
          type: 'Migrated';
          capital: bigint;
          reserveStable: bigint;
          reserveYes: bigint;
          reserveNo: bigint;
          invariantK: bigint;
      }
    | { type: 'LeverageActivated'; invariantK: bigint }
    | {
          type: 'PositionOpened';
          trader: string;
          side: Side;
          collateral: bigint;
          leverage: bigint;
          loan: bigint;
          shares: bigint;
          entryPrice: bigint;
      }
    | {
          type: 'PositionClosed';
          trader: string;
          side: Side;
          proceeds: bigint;
          interest: bigint;
          badDebt: bigint;
          payout: bigint;
          pnl: bigint;
      }
    | {
          type: 'PositionLiquidated';
          trader: string;
          side: Side;
          keeper: string;
          proceeds: bigint;
          interest: bigint;
          badDebt: bigint;
          insuranceFee: bigint;
          keeperReward: bigint;
          refund: bigint;
      }
    | {
          type: 'Rebalanced';
          tradedSide: Side;
          priceYes: bigint;
          priceNo: bigint;
          reserveStable: bigint;
          reserveYes: bigint;
          reserveNo: bigint;
          capped: boolean;
      }
    | {
          type: 'MarketResolved';
          winningOutcome: Side;
          settlementPrice: bigint;
          liabilities: bigint;
          backing: bigint;
      }
    | {
          type: 'WinningsClaimed';
          user: string;
          kind: ClaimKind;
          tier: UserTier;
          payout: bigint;
          bonus: bigint;
      }
    | { type: 'UnclaimedSwept'; user: string; kind: ClaimKind; amount: bigint }
    | { type: 'AuthorityRotated'; previous: string; next: string };

export type MarketEventType = MarketEventPayload['type'];

export interface MarketEventMeta {
    id: string;
    sequence: number;
    timestamp: number;
    marketAddress: string;
}

export type MarketEvent = MarketEventPayload & MarketEventMeta;

// ═══════════════════════════════════════════════════════════════════════════════
// SIGNED REQUESTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * The nonce is never carried by a request: signatures cover the
 * initiator's current nonce, so a replayed request fails verification.
 */
export interface DualSignature {
    deadline: number;
    userSignature: string;
    authoritySignature: string;
}

export interface BuySharesRequest extends DualSignature {
    buyer: string;
    side: Side;
    shareAmount: bigint;
}

export interface OpenPositionRequest extends DualSignature {
    trader: string;
    side: Side;
    collateral: bigint;
    leverage: bigint;
    minShares: bigint;
}

export interface ClosePositionRequest extends DualSignature {
    trader: string;
    side: Side;
    minPayout: bigint;
}

export interface BulkLiquidateRequest {
    keeper: string;
    traders: string[];
    sides: Side[];
    deadline: number;
    authoritySignature: string;
}

export interface ClaimRequest {
    user: string;
    kind: ClaimKind;
    tier: UserTier;
    deadline: number;
    authoritySignature: string;
}
