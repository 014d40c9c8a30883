/**
 * Atomic, non-reentrant call scope
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * ALL OR NOTHING
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * 1. A second entry while a call is in flight fails with ReentrantCall
 * 2. Every participant is checkpointed before the body runs
 * 3. A throw restores every participant (reverse order) and rethrows
 * 4. Only a committed call publishes its events
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { MarketError, isMarketError } from '../core/errors';
import { Checkpointable } from '../services/collaborators';
import logger from '../utils/logger';
import { MarketEventBus } from './events';

export class TransactionScope {
    private inFlight: string | null = null;

    constructor(
        private readonly participants: () => Checkpointable[],
        private readonly events: MarketEventBus
    ) {}

    get active(): boolean {
        return this.inFlight !== null;
    }

    run<T>(operation: string, body: () => T): T {
        if (this.inFlight !== null) {
            throw new MarketError('ReentrantCall', `${operation} called while ${this.inFlight} is in flight`, {
                operation,
                inFlight: this.inFlight,
            });
        }

        this.inFlight = operation;
        const restorers = [...this.participants(), this.events].map((participant) => participant.checkpoint());

        let result: T;
        try {
            result = body();
        } catch (err) {
            for (let i = restorers.length - 1; i >= 0; i--) {
                restorers[i]();
            }
            if (isMarketError(err)) {
                logger.warn(`[MARKET] ${operation} rejected: ${err.message}`);
            } else {
                const reason = err instanceof Error ? err.message : String(err);
                logger.error(`[MARKET] ${operation} failed: ${reason}`);
            }
            throw err;
        } finally {
            this.inFlight = null;
        }

        this.events.flush();
        return result;
    }
}
