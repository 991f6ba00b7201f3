// Paper Terminal Gateway
// In-memory venues standing in for terminals in the test suite. Behaves like
// a bridge: ids are assigned on submit, unknown tickets are rejected, and
// failures can be injected.

import { AuthError, ConnectionError, RejectError } from '../shared/errors';
import logger from '../shared/logger';
import {
    OrderSubmission,
    ParamChanges,
    PendingOrderEntity,
    PositionChanges,
    PositionEntity,
    TaggedOrder,
    TaggedPosition,
    VenueEntity,
} from '../shared/types';
import { roundToStep, TerminalGateway } from './terminal-gateway';

export type PaperOperation =
    | 'listPendingOrders'
    | 'listPositions'
    | 'submitOrder'
    | 'modifyOrder'
    | 'cancelOrder'
    | 'modifyPosition'
    | 'closePosition'
    | 'roundLot'
    | 'normalizePrice';

export interface PaperCall {
    venue: string;
    operation: PaperOperation;
    id?: string;
    payload?: OrderSubmission | ParamChanges | PositionChanges;
}

type InjectedFailure = 'CONNECTION' | 'AUTH' | { reject: string };

interface PaperVenue {
    orders: Map<string, TaggedOrder>;
    positions: Map<string, TaggedPosition>;
    lotStep: number;
    /** Quoted price digits; null leaves prices as they are */
    digits: number | null;
    /** Instruments the venue lists; null means every instrument is listed */
    instruments: Set<string> | null;
}

export class PaperTerminalGateway implements TerminalGateway {
    private venues: Map<string, PaperVenue> = new Map();
    private failures: Map<string, InjectedFailure[]> = new Map();
    private nextTicket = 1000;
    public readonly calls: PaperCall[] = [];

    addVenue(name: string, options: { lotStep?: number; digits?: number; instruments?: string[] } = {}): this {
        this.venues.set(name, {
            orders: new Map(),
            positions: new Map(),
            lotStep: options.lotStep ?? 0.01,
            digits: options.digits ?? null,
            instruments: options.instruments ? new Set(options.instruments) : null,
        });
        return this;
    }

    /**
     * Seed an order directly, as if a trader or the copier had placed it earlier
     */
    putOrder(venue: string, order: Omit<PendingOrderEntity, 'kind'> & { tag?: string | null }): void {
        const entity: TaggedOrder = { ...order, kind: 'ORDER', tag: order.tag ?? null };
        this.getVenue(venue).orders.set(order.id, entity);
    }

    putPosition(venue: string, position: Omit<PositionEntity, 'kind'> & { tag?: string | null }): void {
        const entity: TaggedPosition = { ...position, kind: 'POSITION', tag: position.tag ?? null };
        this.getVenue(venue).positions.set(position.id, entity);
    }

    removeOrder(venue: string, id: string): void {
        this.getVenue(venue).orders.delete(id);
    }

    removePosition(venue: string, id: string): void {
        this.getVenue(venue).positions.delete(id);
    }

    /**
     * Turn a pending order into a position with the same ticket and tag,
     * the way a terminal does when the order triggers.
     */
    triggerOrder(venue: string, id: string): void {
        const state = this.getVenue(venue);
        const order = state.orders.get(id);
        if (!order) {
            throw new Error(`No order ${id} on ${venue}`);
        }
        state.orders.delete(id);
        state.positions.set(id, {
            kind: 'POSITION',
            id,
            instrument: order.instrument,
            side: order.side,
            size: order.size,
            entryPrice: order.entryPrice,
            stopLoss: order.stopLoss,
            takeProfit: order.takeProfit,
            tag: order.tag,
        });
    }

    /**
     * Make the next call of `operation` on `venue` fail. Failures queue up.
     */
    failNext(venue: string, operation: PaperOperation, failure: InjectedFailure): void {
        const key = `${venue}:${operation}`;
        const queue = this.failures.get(key) ?? [];
        queue.push(failure);
        this.failures.set(key, queue);
    }

    getOrders(venue: string): VenueEntity[] {
        return Array.from(this.getVenue(venue).orders.values());
    }

    getPositions(venue: string): VenueEntity[] {
        return Array.from(this.getVenue(venue).positions.values());
    }

    mutatingCalls(venue?: string): PaperCall[] {
        return this.calls.filter(call =>
            (venue === undefined || call.venue === venue) &&
            call.operation !== 'listPendingOrders' &&
            call.operation !== 'listPositions' &&
            call.operation !== 'roundLot' &&
            call.operation !== 'normalizePrice'
        );
    }

    async listPendingOrders(venue: string): Promise<VenueEntity[]> {
        this.record({ venue, operation: 'listPendingOrders' });
        return this.getOrders(venue).map(order => ({ ...order }));
    }

    async listPositions(venue: string): Promise<VenueEntity[]> {
        this.record({ venue, operation: 'listPositions' });
        return this.getPositions(venue).map(position => ({ ...position }));
    }

    async submitOrder(venue: string, submission: OrderSubmission): Promise<string> {
        this.record({ venue, operation: 'submitOrder', payload: submission });
        const state = this.getVenue(venue);

        if (state.instruments && !state.instruments.has(submission.instrument)) {
            throw new RejectError(venue, `invalid symbol ${submission.instrument}`);
        }
        if (!(submission.size > 0)) {
            throw new RejectError(venue, `invalid volume ${submission.size}`);
        }

        const id = String(this.nextTicket++);
        state.orders.set(id, {
            kind: 'ORDER',
            id,
            instrument: submission.instrument,
            side: submission.side,
            size: submission.size,
            orderType: submission.orderType,
            entryPrice: submission.entryPrice,
            stopLoss: submission.stopLoss,
            takeProfit: submission.takeProfit,
            expiry: submission.expiry,
            tag: submission.tag,
        });

        logger.debug(`[PaperGateway] ${venue}: placed ${submission.orderType} ${submission.size} ${submission.instrument} as ${id}`);
        return id;
    }

    async modifyOrder(venue: string, id: string, changes: ParamChanges): Promise<void> {
        this.record({ venue, operation: 'modifyOrder', id, payload: changes });
        const order = this.getVenue(venue).orders.get(id);
        if (!order) {
            throw new RejectError(venue, `order ${id} not found`);
        }
        Object.assign(order, changes);
    }

    async cancelOrder(venue: string, id: string): Promise<void> {
        this.record({ venue, operation: 'cancelOrder', id });
        if (!this.getVenue(venue).orders.delete(id)) {
            throw new RejectError(venue, `order ${id} not found`);
        }
    }

    async modifyPosition(venue: string, id: string, changes: PositionChanges): Promise<void> {
        this.record({ venue, operation: 'modifyPosition', id, payload: changes });
        const position = this.getVenue(venue).positions.get(id);
        if (!position) {
            throw new RejectError(venue, `position ${id} not found`);
        }
        Object.assign(position, changes);
    }

    async closePosition(venue: string, id: string): Promise<void> {
        this.record({ venue, operation: 'closePosition', id });
        if (!this.getVenue(venue).positions.delete(id)) {
            throw new RejectError(venue, `position ${id} not found`);
        }
    }

    async roundLot(venue: string, instrument: string, size: number): Promise<number> {
        this.record({ venue, operation: 'roundLot' });
        return roundToStep(size, this.listedVenue(venue, instrument).lotStep);
    }

    async normalizePrice(venue: string, instrument: string, price: number): Promise<number> {
        this.record({ venue, operation: 'normalizePrice' });
        const { digits } = this.listedVenue(venue, instrument);
        return digits === null ? price : Number(price.toFixed(digits));
    }

    private listedVenue(venue: string, instrument: string): PaperVenue {
        const state = this.getVenue(venue);
        if (state.instruments && !state.instruments.has(instrument)) {
            throw new RejectError(venue, `invalid symbol ${instrument}`);
        }
        return state;
    }

    private record(call: PaperCall): void {
        this.calls.push(call);

        const key = `${call.venue}:${call.operation}`;
        const failure = this.failures.get(key)?.shift();
        if (failure === undefined) return;

        if (failure === 'CONNECTION') {
            throw new ConnectionError(call.venue, `simulated disconnect during ${call.operation}`);
        }
        if (failure === 'AUTH') {
            throw new AuthError(call.venue, 'simulated login failure');
        }
        throw new RejectError(call.venue, failure.reject);
    }

    private getVenue(name: string): PaperVenue {
        const venue = this.venues.get(name);
        if (!venue) {
            throw new ConnectionError(name, 'unknown paper venue');
        }
        return venue;
    }
}
