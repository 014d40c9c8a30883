/**
 * Authorization — EIP-712 typed messages
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * EVERY SIGNED CALL IS DOMAIN-BOUND, NONCED AND DEADLINED
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Domain: { name, version, chainId, verifyingContract: marketAddress }
 *
 * User-initiated trades (BuyShares, OpenPosition, ClosePosition) need both the
 * user's and the authority's signature over the same message. Keeper batches
 * (BulkLiquidate) and claims (ClaimTier) need only the authority.
 *
 * Order of checks: deadline, user signature, authority signature, nonce
 * increment. The increment happens inside the caller's atomic scope, so a
 * later failure rolls it back.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { TypedDataDomain, TypedDataField, verifyTypedData } from 'ethers';
import { SIGNING_DOMAIN, TIER_CODES, UserTier } from '../config/constants';
import { MarketError } from '../core/errors';
import { ClaimKind, Side } from '../types';
import logger from '../utils/logger';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export const AUTH_TYPES = {
    BuyShares: [
        { name: 'buyer', type: 'address' },
        { name: 'isYes', type: 'bool' },
        { name: 'shareAmount', type: 'uint256' },
        { name: 'nonce', type: 'uint256' },
        { name: 'deadline', type: 'uint256' },
    ],
    OpenPosition: [
        { name: 'trader', type: 'address' },
        { name: 'isYes', type: 'bool' },
        { name: 'collateral', type: 'uint256' },
        { name: 'leverage', type: 'uint256' },
        { name: 'minShares', type: 'uint256' },
        { name: 'nonce', type: 'uint256' },
        { name: 'deadline', type: 'uint256' },
    ],
    ClosePosition: [
        { name: 'trader', type: 'address' },
        { name: 'isYes', type: 'bool' },
        { name: 'minPayout', type: 'uint256' },
        { name: 'nonce', type: 'uint256' },
        { name: 'deadline', type: 'uint256' },
    ],
    BulkLiquidate: [
        { name: 'keeper', type: 'address' },
        { name: 'traders', type: 'address[]' },
        { name: 'sides', type: 'bool[]' },
        { name: 'nonce', type: 'uint256' },
        { name: 'deadline', type: 'uint256' },
    ],
    ClaimTier: [
        { name: 'user', type: 'address' },
        { name: 'kind', type: 'uint8' },
        { name: 'tier', type: 'uint8' },
        { name: 'nonce', type: 'uint256' },
        { name: 'deadline', type: 'uint256' },
    ],
} satisfies Record<string, TypedDataField[]>;

export type AuthPrimaryType = keyof typeof AUTH_TYPES;

export const CLAIM_KIND_CODES: Record<ClaimKind, number> = {
    OutcomeTokens: 0,
    Position: 1,
};

export type BuySharesMessage = {
    buyer: string;
    isYes: boolean;
    shareAmount: bigint;
    nonce: bigint;
    deadline: bigint;
};

export type OpenPositionMessage = {
    trader: string;
    isYes: boolean;
    collateral: bigint;
    leverage: bigint;
    minShares: bigint;
    nonce: bigint;
    deadline: bigint;
};

export type ClosePositionMessage = {
    trader: string;
    isYes: boolean;
    minPayout: bigint;
    nonce: bigint;
    deadline: bigint;
};

export type BulkLiquidateMessage = {
    keeper: string;
    traders: string[];
    sides: boolean[];
    nonce: bigint;
    deadline: bigint;
};

export type ClaimTierMessage = {
    user: string;
    kind: number;
    tier: number;
    nonce: bigint;
    deadline: bigint;
};

export type AuthMessageValue =
    | BuySharesMessage
    | OpenPositionMessage
    | ClosePositionMessage
    | BulkLiquidateMessage
    | ClaimTierMessage;

export interface TypedMessage {
    primaryType: AuthPrimaryType;
    domain: TypedDataDomain;
    types: Record<string, TypedDataField[]>;
    value: AuthMessageValue;
}

/**
 * Pluggable signature check. `verify` returns false on any mismatch or
 * malformed signature; it never throws for bad input.
 */
export interface SignatureVerifier {
    verify(message: TypedMessage, signature: string, expectedSigner: string): boolean;
}

// ═══════════════════════════════════════════════════════════════════════════════
// MESSAGE BUILDERS
// ═══════════════════════════════════════════════════════════════════════════════

export function buildSigningDomain(chainId: bigint, marketAddress: string): TypedDataDomain {
    return {
        name: SIGNING_DOMAIN.NAME,
        version: SIGNING_DOMAIN.VERSION,
        chainId,
        verifyingContract: marketAddress,
    };
}

export function typesFor(primaryType: AuthPrimaryType): Record<string, TypedDataField[]> {
    return { [primaryType]: AUTH_TYPES[primaryType] };
}

function typed(domain: TypedDataDomain, primaryType: AuthPrimaryType, value: AuthMessageValue): TypedMessage {
    return { primaryType, domain, types: typesFor(primaryType), value };
}

export const buildBuySharesMessage = (
    domain: TypedDataDomain,
    buyer: string,
    side: Side,
    shareAmount: bigint,
    nonce: bigint,
    deadline: number
): TypedMessage =>
    typed(domain, 'BuyShares', {
        buyer,
        isYes: side === 'YES',
        shareAmount,
        nonce,
        deadline: BigInt(deadline),
    });

export const buildOpenPositionMessage = (
    domain: TypedDataDomain,
    trader: string,
    side: Side,
    collateral: bigint,
    leverage: bigint,
    minShares: bigint,
    nonce: bigint,
    deadline: number
): TypedMessage =>
    typed(domain, 'OpenPosition', {
        trader,
        isYes: side === 'YES',
        collateral,
        leverage,
        minShares,
        nonce,
        deadline: BigInt(deadline),
    });

export const buildClosePositionMessage = (
    domain: TypedDataDomain,
    trader: string,
    side: Side,
    minPayout: bigint,
    nonce: bigint,
    deadline: number
): TypedMessage =>
    typed(domain, 'ClosePosition', {
        trader,
        isYes: side === 'YES',
        minPayout,
        nonce,
        deadline: BigInt(deadline),
    });

export const buildBulkLiquidateMessage = (
    domain: TypedDataDomain,
    keeper: string,
    traders: string[],
    sides: Side[],
    nonce: bigint,
    deadline: number
): TypedMessage =>
    typed(domain, 'BulkLiquidate', {
        keeper,
        traders,
        sides: sides.map((side) => side === 'YES'),
        nonce,
        deadline: BigInt(deadline),
    });

export const buildClaimTierMessage = (
    domain: TypedDataDomain,
    user: string,
    kind: ClaimKind,
    tier: UserTier,
    nonce: bigint,
    deadline: number
): TypedMessage =>
    typed(domain, 'ClaimTier', {
        user,
        kind: CLAIM_KIND_CODES[kind],
        tier: TIER_CODES[tier],
        nonce,
        deadline: BigInt(deadline),
    });

// ═══════════════════════════════════════════════════════════════════════════════
// VERIFICATION
// ═══════════════════════════════════════════════════════════════════════════════

export class TypedDataVerifier implements SignatureVerifier {
    verify(message: TypedMessage, signature: string, expectedSigner: string): boolean {
        let recovered: string;
        try {
            recovered = verifyTypedData(message.domain, message.types, message.value, signature);
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            logger.debug(`[AUTH] ${message.primaryType} signature unreadable: ${reason}`);
            return false;
        }
        return recovered.toLowerCase() === expectedSigner.toLowerCase();
    }
}

export interface AuthorizationCheck {
    message: TypedMessage;
    /** address whose nonce is consumed */
    initiator: string;
    deadline: number;
    authority: string;
    authoritySignature: string;
    /** omitted for authority-only messages */
    userSignature?: string;
}

export interface NonceBook {
    nonces: Map<string, bigint>;
}

export function currentNonce(book: NonceBook, account: string): bigint {
    return book.nonces.get(account.toLowerCase()) ?? 0n;
}

/**
 * Validate deadline and signatures, then consume the initiator's nonce.
 */
export function consumeAuthorization(
    book: NonceBook,
    verifier: SignatureVerifier,
    now: number,
    check: AuthorizationCheck
): void {
    if (now > check.deadline) {
        throw new MarketError('SignatureExpired', `${check.message.primaryType} authorization expired`, {
            deadline: check.deadline,
            now,
        });
    }

    if (
        check.userSignature !== undefined &&
        !verifier.verify(check.message, check.userSignature, check.initiator)
    ) {
        throw new MarketError('InvalidSignature', `${check.message.primaryType} user signature mismatch`, {
            signer: check.initiator,
        });
    }

    if (!verifier.verify(check.message, check.authoritySignature, check.authority)) {
        throw new MarketError('InvalidSignature', `${check.message.primaryType} authority signature mismatch`, {
            signer: check.authority,
        });
    }

    const key = check.initiator.toLowerCase();
    book.nonces.set(key, currentNonce(book, key) + 1n);
}
