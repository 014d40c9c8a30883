import { Checkpointable } from '../services/collaborators';
import { Clock, MarketEvent, MarketEventPayload } from '../types';
import { generateEventId } from '../utils/id';
import logger from '../utils/logger';

export type MarketEventListener = (event: MarketEvent) => void;

const HISTORY_LIMIT = 1_000;

/**
 * Buffers events raised inside an atomic scope. Nothing reaches listeners
 * until the scope commits; a rollback drops everything raised since its
 * checkpoint.
 */
export class MarketEventBus implements Checkpointable {
    private pending: MarketEvent[] = [];
    private history: MarketEvent[] = [];
    private listeners = new Set<MarketEventListener>();
    private sequence = 0;

    constructor(
        private readonly marketAddress: () => string,
        private readonly clock: Clock
    ) {}

    emit(payload: MarketEventPayload): void {
        this.sequence += 1;
        this.pending.push({
            ...payload,
            id: generateEventId(),
            sequence: this.sequence,
            timestamp: this.clock.now(),
            marketAddress: this.marketAddress(),
        });
    }

    subscribe(listener: MarketEventListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    flush(): MarketEvent[] {
        const batch = this.pending;
        this.pending = [];

        this.history.push(...batch);
        if (this.history.length > HISTORY_LIMIT) {
            this.history = this.history.slice(-HISTORY_LIMIT);
        }

        for (const event of batch) {
            for (const listener of this.listeners) {
                try {
                    listener(event);
                } catch (err) {
                    const reason = err instanceof Error ? err.message : String(err);
                    logger.error(`[EVENTS] Listener failed on ${event.type} #${event.sequence}: ${reason}`);
                }
            }
        }
        return batch;
    }

    recent(limit: number = 100): MarketEvent[] {
        return this.history.slice(-limit);
    }

    get lastSequence(): number {
        return this.sequence;
    }

    /** Continue numbering after a reload */
    resumeAt(sequence: number): void {
        this.sequence = sequence;
    }

    checkpoint(): () => void {
        const pendingLength = this.pending.length;
        const sequence = this.sequence;
        return () => {
            this.pending = this.pending.slice(0, pendingLength);
            this.sequence = sequence;
        };
    }
}
