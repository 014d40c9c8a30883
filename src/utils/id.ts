/**
 * ID Generation Utilities
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * ALL IDs ARE GENERATED FRESH PER USE
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Every committed market event gets its own UUID v4. IDs are never derived
 * from the market address, sequence number or any other static value, so a
 * replayed or reloaded engine never collides with rows already persisted.
 * A failed write is retried with the same rows, ids included.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { v4 as uuidv4 } from 'uuid';

/**
 * Generate a unique ID for a market event.
 *
 * @example
 * ```typescript
 * const eventId = generateEventId();
 * // Returns: "550e8400-e29b-41d4-a716-446655440000"
 * ```
 */
export function generateEventId(): string {
    return uuidv4();
}
