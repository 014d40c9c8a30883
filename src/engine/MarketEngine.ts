/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * MARKET ENGINE — SINGLE SERIALIZATION POINT
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Every mutation:
 *   1. enters the transaction scope (non-reentrant, checkpoints everything)
 *   2. verifies deadline and signatures, consumes the initiator's nonce
 *   3. delegates to the phase module (curve, positions, settlement)
 *   4. commits and publishes events, or rolls back and rethrows
 *
 * Views never mutate and return copies.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { TypedDataDomain } from 'ethers';
import { MARKET_DEFAULTS, SCALE_FACTOR, STATE_VERSION } from '../config/constants';
import { MarketError } from '../core/errors';
import { LeveragePreview, previewLeverage, spotPrice } from '../core/marketMath';
import {
    buildBulkLiquidateMessage,
    buildBuySharesMessage,
    buildClaimTierMessage,
    buildClosePositionMessage,
    buildOpenPositionMessage,
    buildSigningDomain,
    consumeAuthorization,
    currentNonce,
} from '../auth/authorization';
import { CurveFill, curveParamsOf, fillBuy, planFill } from '../capital/bondingCurveLedger';
import { Checkpointable, MarketDependencies, isCheckpointable } from '../services/collaborators';
import { OutcomeToken } from '../services/outcomeToken';
import {
    BulkLiquidateRequest,
    BuySharesRequest,
    ClaimKind,
    ClaimRequest,
    ClosePositionRequest,
    Clock,
    MarketEvent,
    MarketParams,
    MarketState,
    OpenPositionRequest,
    Position,
    Side,
} from '../types';
import { normalizeAddress } from '../utils/address';
import { systemClock } from '../utils/clock';
import logger from '../utils/logger';
import { MarketContext } from './context';
import { MarketEventBus, MarketEventListener } from './events';
import {
    ClosePositionResult,
    LiquidationResult,
    bulkLiquidate,
    closePosition,
    findPosition,
    healthOf,
    liquidatePosition,
    openPosition,
} from './positionLedger';
import {
    ClaimResult,
    ResolutionResult,
    claimWinnings,
    requireAuthority,
    resolveMarket,
    sweepUnclaimed,
} from './settlementGuardian';
import { TransactionScope } from './transaction';
import { ammPrice, reservesFor } from './virtualAmm';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface MarketInitParams {
    marketAddress: string;
    question: string;
    chainId: bigint;
    authority: string;
    feeRecipient: string;
    /** external units */
    migrationThreshold: bigint;
    params?: Partial<MarketParams>;
}

export interface MarketSnapshot {
    version: number;
    state: MarketState;
    outcomeHoldings: Record<Side, Array<[string, bigint]>>;
    lastSequence: number;
}

export const DEFAULT_MARKET_PARAMS: MarketParams = {
    curveK: MARKET_DEFAULTS.CURVE_K,
    curveScale: MARKET_DEFAULTS.CURVE_SCALE,
    phase1FeeBps: MARKET_DEFAULTS.PHASE1_FEE_BPS,
    snapTolerance: MARKET_DEFAULTS.SNAP_TOLERANCE,
    maxLeverage: MARKET_DEFAULTS.MAX_LEVERAGE,
    minCollateral: MARKET_DEFAULTS.MIN_COLLATERAL,
    borrowRateBps: MARKET_DEFAULTS.BORROW_RATE_BPS,
    claimCoolingOffSeconds: MARKET_DEFAULTS.CLAIM_COOLING_OFF_SECONDS,
};

function emptyState(): MarketState {
    return {
        version: STATE_VERSION,
        initialized: false,
        marketAddress: '',
        question: '',
        chainId: 0n,
        phase: 'PreMigration',
        authority: '',
        feeRecipient: '',
        params: { ...DEFAULT_MARKET_PARAMS },
        currentSupply: 0n,
        totalCapitalRaised: 0n,
        migrationThreshold: 0n,
        migrated: false,
        reserveStable: 0n,
        reserveYes: 0n,
        reserveNo: 0n,
        invariantK: 0n,
        totalBorrowed: 0n,
        openInterestYes: 0n,
        openInterestNo: 0n,
        positions: new Map(),
        resolved: false,
        winningOutcome: null,
        settlementPrice: 0n,
        resolvedAt: null,
        bonusReserve: 0n,
        nonces: new Map(),
    };
}

function validateParams(params: MarketParams): void {
    const positive: Array<[string, bigint]> = [
        ['curveK', params.curveK],
        ['curveScale', params.curveScale],
        ['maxLeverage', params.maxLeverage],
        ['minCollateral', params.minCollateral],
    ];
    for (const [field, value] of positive) {
        if (value <= 0n) {
            throw new MarketError('InvalidAmount', `${field} must be positive`, { field, value });
        }
    }
    if (params.phase1FeeBps < 0n || params.borrowRateBps < 0n || params.snapTolerance < 0n) {
        throw new MarketError('InvalidAmount', 'fees, rates and tolerances must not be negative');
    }
    if (params.claimCoolingOffSeconds < 0) {
        throw new MarketError('InvalidAmount', 'cooling-off period must not be negative');
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════════════════════

export class MarketEngine {
    private state: MarketState = emptyState();
    private outcomes: Record<Side, OutcomeToken> | null = null;
    private readonly events: MarketEventBus;
    private readonly scope: TransactionScope;

    constructor(
        private readonly deps: MarketDependencies,
        private readonly clock: Clock = systemClock
    ) {
        this.events = new MarketEventBus(() => this.state.marketAddress, clock);
        this.scope = new TransactionScope(() => this.participants(), this.events);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // LIFECYCLE
    // ═══════════════════════════════════════════════════════════════════════════

    initialize(init: MarketInitParams): void {
        if (this.state.initialized) {
            throw new MarketError('AlreadyInitialized', 'market already initialized');
        }
        if (init.migrationThreshold <= 0n) {
            throw new MarketError('InvalidAmount', 'migration threshold must be positive', {
                migrationThreshold: init.migrationThreshold,
            });
        }

        const params: MarketParams = { ...DEFAULT_MARKET_PARAMS, ...init.params };
        validateParams(params);

        const marketAddress = normalizeAddress(init.marketAddress, 'marketAddress');
        this.state = {
            ...emptyState(),
            initialized: true,
            marketAddress,
            question: init.question,
            chainId: init.chainId,
            authority: normalizeAddress(init.authority, 'authority'),
            feeRecipient: normalizeAddress(init.feeRecipient, 'feeRecipient'),
            params,
            migrationThreshold: init.migrationThreshold * SCALE_FACTOR,
        };
        this.outcomes = {
            YES: new OutcomeToken('YES', marketAddress),
            NO: new OutcomeToken('NO', marketAddress),
        };

        logger.info(
            `[MARKET] Initialized ${marketAddress} "${init.question}" threshold=${init.migrationThreshold} chain=${init.chainId}`
        );
    }

    static fromSnapshot(snapshot: MarketSnapshot, deps: MarketDependencies, clock: Clock = systemClock): MarketEngine {
        if (snapshot.version !== STATE_VERSION) {
            throw new MarketError('UnsupportedStateVersion', `state version ${snapshot.version} is not supported`, {
                version: snapshot.version,
                supported: STATE_VERSION,
            });
        }

        const engine = new MarketEngine(deps, clock);
        engine.state = structuredClone(snapshot.state);
        const market = engine.state.marketAddress;
        const outcomes: Record<Side, OutcomeToken> = {
            YES: new OutcomeToken('YES', market),
            NO: new OutcomeToken('NO', market),
        };
        for (const side of ['YES', 'NO'] as const) {
            for (const [account, balance] of snapshot.outcomeHoldings[side]) {
                outcomes[side].mint(market, account, balance);
            }
        }
        engine.outcomes = outcomes;
        engine.events.resumeAt(snapshot.lastSequence);

        logger.info(`[MARKET] Reloaded ${market} at event #${snapshot.lastSequence} (phase ${engine.state.phase})`);
        return engine;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // PHASE 1
    // ═══════════════════════════════════════════════════════════════════════════

    buyShares(request: BuySharesRequest): CurveFill {
        return this.scope.run('buyShares', () => {
            const ctx = this.context();
            const buyer = normalizeAddress(request.buyer, 'buyer');
            const message = buildBuySharesMessage(
                this.domain(),
                buyer,
                request.side,
                request.shareAmount,
                currentNonce(ctx.state, buyer),
                request.deadline
            );
            consumeAuthorization(ctx.state, this.deps.verifier, this.clock.now(), {
                message,
                initiator: buyer,
                deadline: request.deadline,
                authority: ctx.state.authority,
                authoritySignature: request.authoritySignature,
                userSignature: request.userSignature,
            });

            return fillBuy(ctx, buyer, request.side, request.shareAmount);
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // PHASE 2
    // ═══════════════════════════════════════════════════════════════════════════

    openPosition(request: OpenPositionRequest): Position {
        return this.scope.run('openPosition', () => {
            const ctx = this.context();
            const trader = normalizeAddress(request.trader, 'trader');
            const message = buildOpenPositionMessage(
                this.domain(),
                trader,
                request.side,
                request.collateral,
                request.leverage,
                request.minShares,
                currentNonce(ctx.state, trader),
                request.deadline
            );
            consumeAuthorization(ctx.state, this.deps.verifier, this.clock.now(), {
                message,
                initiator: trader,
                deadline: request.deadline,
                authority: ctx.state.authority,
                authoritySignature: request.authoritySignature,
                userSignature: request.userSignature,
            });

            return { ...openPosition(ctx, { ...request, trader }) };
        });
    }

    closePosition(request: ClosePositionRequest): ClosePositionResult {
        return this.scope.run('closePosition', () => {
            const ctx = this.context();
            const trader = normalizeAddress(request.trader, 'trader');
            const message = buildClosePositionMessage(
                this.domain(),
                trader,
                request.side,
                request.minPayout,
                currentNonce(ctx.state, trader),
                request.deadline
            );
            consumeAuthorization(ctx.state, this.deps.verifier, this.clock.now(), {
                message,
                initiator: trader,
                deadline: request.deadline,
                authority: ctx.state.authority,
                authoritySignature: request.authoritySignature,
                userSignature: request.userSignature,
            });

            return closePosition(ctx, trader, request.side, request.minPayout);
        });
    }

    /**
     * Permissionless: anyone may liquidate a position below the threshold.
     */
    liquidate(keeper: string, trader: string, side: Side): LiquidationResult {
        return this.scope.run('liquidate', () => {
            const ctx = this.context();
            return liquidatePosition(
                ctx,
                normalizeAddress(keeper, 'keeper'),
                normalizeAddress(trader, 'trader'),
                side
            );
        });
    }

    bulkLiquidate(request: BulkLiquidateRequest): number {
        return this.scope.run('bulkLiquidate', () => {
            const ctx = this.context();
            const keeper = normalizeAddress(request.keeper, 'keeper');
            const traders = request.traders.map((trader) => normalizeAddress(trader, 'trader'));
            const message = buildBulkLiquidateMessage(
                this.domain(),
                keeper,
                traders,
                request.sides,
                currentNonce(ctx.state, keeper),
                request.deadline
            );
            consumeAuthorization(ctx.state, this.deps.verifier, this.clock.now(), {
                message,
                initiator: keeper,
                deadline: request.deadline,
                authority: ctx.state.authority,
                authoritySignature: request.authoritySignature,
            });

            return bulkLiquidate(ctx, keeper, traders, request.sides);
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // PHASE 3
    // ═══════════════════════════════════════════════════════════════════════════

    resolveMarket(caller: string, winningOutcome: Side): ResolutionResult {
        return this.scope.run('resolveMarket', () => resolveMarket(this.context(), caller, winningOutcome));
    }

    claimWinnings(request: ClaimRequest): ClaimResult {
        return this.scope.run('claimWinnings', () => {
            const ctx = this.context();
            const user = normalizeAddress(request.user, 'user');
            const message = buildClaimTierMessage(
                this.domain(),
                user,
                request.kind,
                request.tier,
                currentNonce(ctx.state, user),
                request.deadline
            );
            consumeAuthorization(ctx.state, this.deps.verifier, this.clock.now(), {
                message,
                initiator: user,
                deadline: request.deadline,
                authority: ctx.state.authority,
                authoritySignature: request.authoritySignature,
            });

            return claimWinnings(ctx, user, request.kind, request.tier);
        });
    }

    sweepUnclaimed(caller: string, user: string, kind: ClaimKind): bigint {
        return this.scope.run('sweepUnclaimed', () =>
            sweepUnclaimed(this.context(), caller, normalizeAddress(user, 'user'), kind)
        );
    }

    rotateAuthority(caller: string, nextAuthority: string): void {
        this.scope.run('rotateAuthority', () => {
            const ctx = this.context();
            requireAuthority(ctx.state, caller, 'rotate the authority');
            const previous = ctx.state.authority;
            const next = normalizeAddress(nextAuthority, 'nextAuthority');
            ctx.state.authority = next;
            ctx.emit({ type: 'AuthorityRotated', previous, next });
            logger.warn(`[AUTH] Authority rotated ${previous} → ${next}`);
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // VIEWS
    // ═══════════════════════════════════════════════════════════════════════════

    getState(): MarketState {
        this.context();
        return structuredClone(this.state);
    }

    getPosition(trader: string, side: Side): Position | null {
        this.context();
        const position = findPosition(this.state, trader, side);
        return position ? { ...position } : null;
    }

    /**
     * Phase 1: curve spot price (internal units per share). Phase 2: AMM
     * price. Resolved: the settlement price for the winner, 0 for the loser.
     */
    getCurrentPrice(side: Side): bigint {
        const { state } = this.context();
        if (state.resolved) {
            return state.winningOutcome === side ? state.settlementPrice : 0n;
        }
        if (!state.migrated) {
            return spotPrice(curveParamsOf(state), state.currentSupply);
        }
        return ammPrice(state, side);
    }

    getHealthFactor(trader: string, side: Side): bigint {
        const { state } = this.context();
        return healthOf(state, trader, side, this.clock.now());
    }

    quoteBuy(shareAmount: bigint): CurveFill {
        return planFill(this.context().state, shareAmount);
    }

    previewLeverage(side: Side, collateral: bigint, leverage: bigint): LeveragePreview {
        const { state } = this.context();
        if (leverage < 1n || leverage > state.params.maxLeverage) {
            throw new MarketError('InvalidLeverage', `leverage must be between 1 and ${state.params.maxLeverage}`, {
                leverage,
            });
        }
        return previewLeverage(reservesFor(state, side), collateral, leverage);
    }

    nonceOf(account: string): bigint {
        return currentNonce(this.state, account);
    }

    outcomeBalanceOf(side: Side, account: string): bigint {
        return this.context().outcomes[side].balanceOf(account);
    }

    get marketAddress(): string {
        return this.state.marketAddress;
    }

    get signingDomain(): TypedDataDomain {
        return this.domain();
    }

    snapshot(): MarketSnapshot {
        const { outcomes } = this.context();
        return {
            version: STATE_VERSION,
            state: structuredClone(this.state),
            outcomeHoldings: { YES: outcomes.YES.holdings(), NO: outcomes.NO.holdings() },
            lastSequence: this.events.lastSequence,
        };
    }

    onEvent(listener: MarketEventListener): () => void {
        return this.events.subscribe(listener);
    }

    recentEvents(limit?: number): MarketEvent[] {
        return this.events.recent(limit);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // INTERNALS
    // ═══════════════════════════════════════════════════════════════════════════

    private context(): MarketContext {
        const outcomes = this.outcomes;
        if (!this.state.initialized || outcomes === null) {
            throw new MarketError('NotInitialized', 'market is not initialized');
        }
        return {
            state: this.state,
            deps: this.deps,
            clock: this.clock,
            outcomes,
            emit: (payload) => this.events.emit(payload),
        };
    }

    private domain(): TypedDataDomain {
        return buildSigningDomain(this.state.chainId, this.state.marketAddress);
    }

    private participants(): Checkpointable[] {
        const engineState: Checkpointable = {
            checkpoint: () => {
                const saved = structuredClone(this.state);
                return () => {
                    Object.assign(this.state, saved);
                };
            },
        };

        const collaborators: unknown[] = [
            this.deps.stableAsset,
            this.deps.accountingUnit,
            this.deps.custody,
            this.deps.lending,
            this.deps.insurance,
            this.deps.verifier,
        ];
        const unique = new Set<Checkpointable>([engineState]);
        for (const collaborator of collaborators) {
            if (isCheckpointable(collaborator)) unique.add(collaborator);
        }
        if (this.outcomes) {
            unique.add(this.outcomes.YES);
            unique.add(this.outcomes.NO);
        }
        return [...unique];
    }
}
