// Terminal Gateway - the four venue operations the copier consumes
// Implementations own connection handling, retries and lot-step knowledge

import {
    OrderSubmission,
    ParamChanges,
    PositionChanges,
    VenueEntity,
} from '../shared/types';

/**
 * Every method may reject with ConnectionError or AuthError. Mutating
 * methods may also reject with RejectError when the venue refuses the
 * operation itself.
 */
export interface TerminalGateway {
    listPendingOrders(venue: string): Promise<VenueEntity[]>;
    listPositions(venue: string): Promise<VenueEntity[]>;

    /** Resolves the venue-native id of the new order */
    submitOrder(venue: string, submission: OrderSubmission): Promise<string>;
    modifyOrder(venue: string, id: string, changes: ParamChanges): Promise<void>;
    cancelOrder(venue: string, id: string): Promise<void>;

    modifyPosition(venue: string, id: string, changes: PositionChanges): Promise<void>;
    closePosition(venue: string, id: string): Promise<void>;

    /**
     * Round a size to the instrument's lot step on the venue and keep it
     * within the instrument's volume range. Rejects with RejectError when the
     * venue does not list the instrument or the size is below its minimum.
     */
    roundLot(venue: string, instrument: string, size: number): Promise<number>;

    /** Round a price to the number of digits the venue quotes the instrument in */
    normalizePrice(venue: string, instrument: string, price: number): Promise<number>;
}

/**
 * Round to the nearest multiple of `step`, trimming float noise to the
 * step's own precision.
 */
export function roundToStep(size: number, step: number): number {
    if (!Number.isFinite(size) || step <= 0) return size;
    const decimals = Math.max(0, Math.ceil(-Math.log10(step)));
    return Number((Math.round(size / step) * step).toFixed(decimals));
}
