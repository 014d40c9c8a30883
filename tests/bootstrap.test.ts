/**
 * Bootstrap Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Runtime wiring: collaborator addresses, allow-lists and event persistence.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { isAddress } from 'ethers';
import { bootstrap, collaboratorAddress } from '../src/bootstrap';
import { isValidUrl, MemoryEventStore } from '../src/db/supabase';
import { MARKET_ADDRESS, testConfig } from './helpers/marketFixture';

// ═══════════════════════════════════════════════════════════════════════════════
// TEST CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

const OTHER_MARKET = '0x00000000000000000000000000000000000000Ee';

// ═══════════════════════════════════════════════════════════════════════════════
// TEST SUITE
// ═══════════════════════════════════════════════════════════════════════════════

describe('bootstrap', () => {
    describe('collaboratorAddress', () => {
        test('is stable per market and role', () => {
            const custody = collaboratorAddress(MARKET_ADDRESS, 'custody');

            expect(isAddress(custody)).toBe(true);
            expect(collaboratorAddress(MARKET_ADDRESS.toLowerCase(), 'custody')).toBe(custody);
            expect(collaboratorAddress(MARKET_ADDRESS, 'lending')).not.toBe(custody);
            expect(collaboratorAddress(OTHER_MARKET, 'custody')).not.toBe(custody);
        });
    });

    describe('runtime', () => {
        test('collaborators live at derived addresses', () => {
            const runtime = bootstrap(testConfig());

            expect(runtime.custody.address).toBe(collaboratorAddress(MARKET_ADDRESS, 'custody'));
            expect(runtime.lending.address).toBe(collaboratorAddress(MARKET_ADDRESS, 'lending'));
            expect(runtime.insurance.address).toBe(collaboratorAddress(MARKET_ADDRESS, 'insurance'));
            expect(runtime.engine.getState().initialized).toBe(true);
        });

        test('only the wired market may borrow or draw insurance', () => {
            const runtime = bootstrap(testConfig());

            expect(() => runtime.lending.fundLoan(OTHER_MARKET, 1n)).toThrow('[Unauthorized]');
            expect(() => runtime.insurance.coverBadDebt(OTHER_MARKET, 1n)).toThrow('[Unauthorized]');
        });

        test('persistence stays off without credentials', () => {
            expect(bootstrap(testConfig()).sink.enabled).toBe(false);
        });

        test('an unparseable Supabase URL disables persistence', () => {
            const config = { ...testConfig(), supabase: { url: 'not a url', key: 'test-key' } };
            expect(bootstrap(config).sink.enabled).toBe(false);
        });

        test('an injected store receives committed events', async () => {
            const store = new MemoryEventStore();
            const runtime = bootstrap(testConfig(), { eventStore: store });

            runtime.engine.rotateAuthority(testConfig().market.authority, OTHER_MARKET);
            expect(await runtime.sink.flush()).toBe(1);
            expect(store.rows[0].event_type).toBe('AuthorityRotated');
        });
    });

    describe('isValidUrl', () => {
        test('accepts absolute URLs only', () => {
            expect(isValidUrl('https://db.example.test')).toBe(true);
            expect(isValidUrl('db.example.test')).toBe(false);
        });
    });
});
