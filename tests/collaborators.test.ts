/**
 * Collaborator Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * In-process token ledger, custody vault, lending pool, insurance fund and
 * outcome token.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { SCALE_FACTOR } from '../src/config/constants';
import { InProcessCustodyVault } from '../src/services/custodyVault';
import { InProcessInsuranceFund } from '../src/services/insuranceFund';
import { InProcessLendingPool } from '../src/services/lendingPool';
import { OutcomeToken } from '../src/services/outcomeToken';
import { TokenLedger } from '../src/services/tokenLedger';

// ═══════════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════════

const MARKET = '0x00000000000000000000000000000000000000Aa';
const VAULT = '0x0000000000000000000000000000000000000001';
const POOL = '0x0000000000000000000000000000000000000002';
const FUND = '0x0000000000000000000000000000000000000003';
const ALICE = '0x000000000000000000000000000000000000000A';
const PROVIDER = '0x000000000000000000000000000000000000000B';

function ledgers() {
    return { stable: new TokenLedger('USD', 6), internal: new TokenLedger('iUSD', 18) };
}

// ═══════════════════════════════════════════════════════════════════════════════
// TEST SUITE
// ═══════════════════════════════════════════════════════════════════════════════

describe('TokenLedger', () => {
    test('balances ignore address case', () => {
        const token = new TokenLedger('USD', 6);
        token.mint(MARKET, 10n);

        expect(token.balanceOf(MARKET.toLowerCase())).toBe(10n);
        expect(token.balanceOf(MARKET.toUpperCase().replace('0X', '0x'))).toBe(10n);
    });

    test('transfer and burn keep supply consistent', () => {
        const token = new TokenLedger('USD', 6);
        token.mint(ALICE, 100n);
        token.transfer(ALICE, MARKET, 30n);
        token.burn(MARKET, 10n);

        expect(token.balanceOf(ALICE)).toBe(70n);
        expect(token.balanceOf(MARKET)).toBe(20n);
        expect(token.totalSupply()).toBe(90n);
        expect(token.entries()).toEqual([
            [ALICE.toLowerCase(), 70n],
            [MARKET.toLowerCase(), 20n],
        ]);
    });

    test('overdrafts and negative amounts are rejected', () => {
        const token = new TokenLedger('USD', 6);
        token.mint(ALICE, 5n);

        expect(() => token.transfer(ALICE, MARKET, 6n)).toThrow('[InsufficientBalance]');
        expect(() => token.mint(ALICE, -1n)).toThrow('[InvalidAmount]');
        expect(token.balanceOf(ALICE)).toBe(5n);
    });

    test('checkpoint restores balances and supply', () => {
        const token = new TokenLedger('USD', 6);
        token.mint(ALICE, 5n);
        const restore = token.checkpoint();
        token.mint(MARKET, 7n);
        token.burn(ALICE, 5n);

        restore();

        expect(token.balanceOf(ALICE)).toBe(5n);
        expect(token.balanceOf(MARKET)).toBe(0n);
        expect(token.totalSupply()).toBe(5n);
    });
});

describe('InProcessCustodyVault', () => {
    test('deposit converts external to internal units', () => {
        const { stable, internal } = ledgers();
        const vault = new InProcessCustodyVault(VAULT, stable, internal);
        stable.mint(ALICE, 1_000_000n);

        const minted = vault.deposit(ALICE, 1_000_000n);

        expect(minted).toBe(1_000_000n * SCALE_FACTOR);
        expect(internal.balanceOf(ALICE)).toBe(1_000_000n * SCALE_FACTOR);
        expect(stable.balanceOf(VAULT)).toBe(1_000_000n);
    });

    test('redeem leaves dust below one external unit', () => {
        const { stable, internal } = ledgers();
        const vault = new InProcessCustodyVault(VAULT, stable, internal);
        stable.mint(ALICE, 10n);
        vault.deposit(ALICE, 10n);

        const paid = vault.redeem(ALICE, 3n * SCALE_FACTOR + 5n);

        expect(paid).toBe(3n);
        expect(stable.balanceOf(ALICE)).toBe(3n);
        expect(internal.balanceOf(ALICE)).toBe(7n * SCALE_FACTOR);
        expect(() => vault.redeem(ALICE, SCALE_FACTOR - 1n)).toThrow('[InvalidAmount]');
    });

    test('releases market capital once', () => {
        const { stable, internal } = ledgers();
        const vault = new InProcessCustodyVault(VAULT, stable, internal);
        stable.mint(ALICE, 50n);
        vault.deposit(ALICE, 50n);
        internal.transfer(ALICE, MARKET, 50n * SCALE_FACTOR);

        vault.transferToMarketOnce(MARKET, 50n);

        expect(stable.balanceOf(MARKET)).toBe(50n);
        expect(internal.balanceOf(MARKET)).toBe(0n);
        expect(vault.isFunded(MARKET.toLowerCase())).toBe(true);
        expect(() => vault.transferToMarketOnce(MARKET, 0n)).toThrow('[MigrationAlreadyFunded]');
    });

    test('a rolled back release can run again', () => {
        const { stable, internal } = ledgers();
        const vault = new InProcessCustodyVault(VAULT, stable, internal);
        const restore = vault.checkpoint();
        vault.transferToMarketOnce(MARKET, 0n);

        restore();

        expect(vault.isFunded(MARKET)).toBe(false);
    });
});

describe('InProcessLendingPool', () => {
    function pool(supplied: bigint) {
        const { stable } = ledgers();
        const lending = new InProcessLendingPool(POOL, stable);
        stable.mint(PROVIDER, supplied);
        lending.supply(PROVIDER, supplied);
        lending.allowMarket(MARKET);
        return { stable, lending };
    }

    test('lends up to 80% of supplied liquidity', () => {
        const { stable, lending } = pool(1_000n);

        lending.fundLoan(MARKET, 800n);

        expect(stable.balanceOf(MARKET)).toBe(800n);
        expect(lending.totalBorrowed(MARKET)).toBe(800n);
        expect(lending.utilizationBps).toBe(8_000n);
        expect(() => lending.fundLoan(MARKET, 1n)).toThrow('[UtilizationCapExceeded]');
    });

    test('repayment returns principal and books interest', () => {
        const { stable, lending } = pool(1_000n);
        lending.fundLoan(MARKET, 500n);
        stable.mint(MARKET, 50n);

        lending.repayLoan(MARKET, 500n, 50n);

        expect(lending.totalBorrowed(MARKET)).toBe(0n);
        expect(lending.interestEarned).toBe(50n);
        expect(stable.balanceOf(POOL)).toBe(1_050n);
        expect(() => lending.repayLoan(MARKET, 1n, 0n)).toThrow('[InvalidAmount]');
    });

    test('only allow-listed markets borrow', () => {
        const { lending } = pool(1_000n);
        expect(() => lending.fundLoan(ALICE, 1n)).toThrow('[Unauthorized]');
    });

    test('checkpoint restores the loan book', () => {
        const { lending } = pool(1_000n);
        const restore = lending.checkpoint();
        lending.fundLoan(MARKET, 300n);

        restore();

        expect(lending.totalBorrowed(MARKET)).toBe(0n);
        expect(lending.utilizationBps).toBe(0n);
    });
});

describe('InProcessInsuranceFund', () => {
    test('collects fees and covers bad debt from its balance', () => {
        const { stable } = ledgers();
        const fund = new InProcessInsuranceFund(FUND, stable);
        fund.allowMarket(MARKET);
        stable.mint(MARKET, 100n);

        fund.depositFee(MARKET, 40n);
        fund.coverBadDebt(MARKET, 25n);

        expect(fund.balance()).toBe(15n);
        expect(stable.balanceOf(MARKET)).toBe(85n);
        expect(() => fund.coverBadDebt(MARKET, 16n)).toThrow('[InsufficientInsuranceFunds]');
    });

    test('unregistered markets are refused', () => {
        const { stable } = ledgers();
        const fund = new InProcessInsuranceFund(FUND, stable);
        expect(() => fund.depositFee(MARKET, 0n)).toThrow('[Unauthorized]');
    });
});

describe('OutcomeToken', () => {
    test('only the issuing market mints and burns', () => {
        const token = new OutcomeToken('YES', MARKET);
        token.mint(MARKET.toLowerCase(), ALICE, 10n);
        token.burn(MARKET, ALICE, 4n);

        expect(token.balanceOf(ALICE)).toBe(6n);
        expect(token.totalSupply()).toBe(6n);
        expect(() => token.mint(ALICE, ALICE, 1n)).toThrow('[Unauthorized]');
        expect(token.holdings()).toEqual([[ALICE.toLowerCase(), 6n]]);
    });

    test('holders cannot transfer', () => {
        const token = new OutcomeToken('NO', MARKET);
        expect(() => token.transfer(ALICE, MARKET, 1n)).toThrow('[NonTransferable] oNO tokens cannot be transferred');
    });
});
