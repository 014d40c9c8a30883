/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * BOOTSTRAP — WIRES ONE MARKET AND ITS COLLABORATORS
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * This file creates the runtime. NO LOOPS, NO SERVERS in this file.
 *
 * 1. Ledgers for the external asset (6 decimals) and the internal unit (18)
 * 2. Custody vault, lending pool and insurance fund at derived addresses,
 *    with the market allow-listed at the lender and the insurer
 * 3. Market engine initialized from the validated configuration
 * 4. Event sink subscribed when Supabase credentials are present
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { dataSlice, getAddress, id } from 'ethers';
import { EXTERNAL_DECIMALS, INTERNAL_DECIMALS } from './config/constants';
import { MarketConfig } from './config/marketConfig';
import { createSupabaseClient, EventStore, SupabaseEventStore } from './db/supabase';
import { MarketEngine } from './engine/MarketEngine';
import { SignatureVerifier, TypedDataVerifier } from './auth/authorization';
import { InProcessCustodyVault } from './services/custodyVault';
import { SupabaseEventSink } from './services/eventSink';
import { InProcessInsuranceFund } from './services/insuranceFund';
import { InProcessLendingPool } from './services/lendingPool';
import { TokenLedger } from './services/tokenLedger';
import { Clock } from './types';
import { systemClock } from './utils/clock';
import logger from './utils/logger';

export interface MarketRuntime {
    engine: MarketEngine;
    stableAsset: TokenLedger;
    accountingUnit: TokenLedger;
    custody: InProcessCustodyVault;
    lending: InProcessLendingPool;
    insurance: InProcessInsuranceFund;
    sink: SupabaseEventSink;
}

export interface BootstrapOptions {
    clock?: Clock;
    verifier?: SignatureVerifier;
    /** overrides the store built from the Supabase configuration */
    eventStore?: EventStore | null;
}

/**
 * Stable address for a collaborator of `market`, derived from its role.
 */
export function collaboratorAddress(market: string, role: 'custody' | 'lending' | 'insurance'): string {
    return getAddress(dataSlice(id(`${role}:${market.toLowerCase()}`), 12));
}

function resolveEventStore(config: MarketConfig, options: BootstrapOptions): EventStore | null {
    if (options.eventStore !== undefined) return options.eventStore;
    if (!config.supabase) return null;
    const client = createSupabaseClient(config.supabase.url, config.supabase.key);
    return client ? new SupabaseEventStore(client) : null;
}

export function bootstrap(config: MarketConfig, options: BootstrapOptions = {}): MarketRuntime {
    const market = config.market.marketAddress;
    logger.info(`[BOOTSTRAP] Wiring market ${market}`);

    const stableAsset = new TokenLedger('USD', EXTERNAL_DECIMALS);
    const accountingUnit = new TokenLedger('iUSD', INTERNAL_DECIMALS);
    const custody = new InProcessCustodyVault(collaboratorAddress(market, 'custody'), stableAsset, accountingUnit);
    const lending = new InProcessLendingPool(collaboratorAddress(market, 'lending'), stableAsset);
    const insurance = new InProcessInsuranceFund(collaboratorAddress(market, 'insurance'), stableAsset);
    lending.allowMarket(market);
    insurance.allowMarket(market);

    const engine = new MarketEngine(
        {
            stableAsset,
            accountingUnit,
            custody,
            lending,
            insurance,
            verifier: options.verifier ?? new TypedDataVerifier(),
        },
        options.clock ?? systemClock
    );
    engine.initialize(config.market);

    const sink = new SupabaseEventSink(resolveEventStore(config, options));
    if (sink.enabled) {
        engine.onEvent((event) => sink.record(event));
    }

    logger.info(`[BOOTSTRAP] ✅ Market ready (custody ${custody.address}, lending ${lending.address})`);
    return { engine, stableAsset, accountingUnit, custody, lending, insurance, sink };
}
