// HTTP Terminal Gateway
// Talks to one bridge process per trading terminal. Each venue gets its own
// resilient client, so a tripped circuit on one terminal leaves the others alone.

import { z } from 'zod';
import logger from '../shared/logger';
import { ConfigManager } from '../shared/config';
import { ConnectionError, RejectError } from '../shared/errors';
import {
    CopierConfig,
    OrderSubmission,
    ParamChanges,
    PositionChanges,
    VenueEntity,
} from '../shared/types';
import {
    bridgeOrderSchema,
    bridgePositionSchema,
    bridgeSymbolSchema,
    bridgeTicketSchema,
    BridgeSymbol,
    tagToMagic,
    toBridgeChanges,
    toBridgeSubmission,
    toOrderEntity,
    toPositionEntity,
} from './bridge-schemas';
import { ResilientBridgeClient } from './resilient-bridge-client';
import { roundToStep, TerminalGateway } from './terminal-gateway';

const SYMBOL_CACHE_TTL_MS = 300000; // 5 minutes

export class HttpTerminalGateway implements TerminalGateway {
    private symbolCache: Map<string, { symbol: BridgeSymbol; timestamp: number }> = new Map();

    constructor(
        private clients: Map<string, ResilientBridgeClient>,
        private symbolCacheTtlMs: number = SYMBOL_CACHE_TTL_MS
    ) {}

    /**
     * Build one client per configured venue (source and targets)
     */
    static fromConfig(config: CopierConfig): HttpTerminalGateway {
        const clients = new Map<string, ResilientBridgeClient>();

        for (const venue of [config.source, ...config.targets]) {
            clients.set(venue.name, new ResilientBridgeClient({
                venue: venue.name,
                baseURL: venue.bridgeUrl,
                apiKey: ConfigManager.resolveApiKey(venue),
                timeout: venue.timeoutMs,
                maxRetries: config.gateway.retryAttempts,
                baseDelayMs: config.gateway.retryBaseDelayMs,
                circuitBreakerThreshold: config.gateway.circuitBreakerThreshold,
                circuitBreakerResetMs: config.gateway.circuitBreakerResetMs,
            }));
        }

        return new HttpTerminalGateway(clients);
    }

    async listPendingOrders(venue: string): Promise<VenueEntity[]> {
        const raw = await this.client(venue).get('/orders');
        return this.parse(venue, z.array(bridgeOrderSchema), raw, 'order list').map(toOrderEntity);
    }

    async listPositions(venue: string): Promise<VenueEntity[]> {
        const raw = await this.client(venue).get('/positions');
        return this.parse(venue, z.array(bridgePositionSchema), raw, 'position list').map(toPositionEntity);
    }

    async submitOrder(venue: string, submission: OrderSubmission): Promise<string> {
        const magic = tagToMagic(submission.tag);
        if (magic === null) {
            throw new RejectError(venue, `tag ${submission.tag} does not fit the terminal magic field`);
        }

        const raw = await this.client(venue).post('/orders', toBridgeSubmission(submission, magic));
        const { ticket } = this.parse(venue, bridgeTicketSchema, raw, 'order ticket');

        logger.debug(`[HttpGateway] ${venue}: order ${ticket} placed for tag ${submission.tag}`);
        return ticket;
    }

    async modifyOrder(venue: string, id: string, changes: ParamChanges): Promise<void> {
        await this.client(venue).patch(`/orders/${encodeURIComponent(id)}`, toBridgeChanges(changes));
    }

    async cancelOrder(venue: string, id: string): Promise<void> {
        await this.client(venue).delete(`/orders/${encodeURIComponent(id)}`);
    }

    async modifyPosition(venue: string, id: string, changes: PositionChanges): Promise<void> {
        await this.client(venue).patch(`/positions/${encodeURIComponent(id)}`, toBridgeChanges(changes));
    }

    async closePosition(venue: string, id: string): Promise<void> {
        await this.client(venue).delete(`/positions/${encodeURIComponent(id)}`);
    }

    async roundLot(venue: string, instrument: string, size: number): Promise<number> {
        const symbol = await this.getSymbol(venue, instrument);
        if (!symbol.trade_allowed) {
            throw new RejectError(venue, `trading disabled for ${instrument}`);
        }

        const rounded = roundToStep(size, symbol.volume_step);
        if (rounded < symbol.volume_min) {
            throw new RejectError(venue, `lot ${rounded} below minimum ${symbol.volume_min} for ${instrument}`);
        }
        return Math.min(rounded, symbol.volume_max);
    }

    async normalizePrice(venue: string, instrument: string, price: number): Promise<number> {
        const symbol = await this.getSymbol(venue, instrument);
        return Number(price.toFixed(symbol.digits));
    }

    getHealth(): ReturnType<ResilientBridgeClient['getHealth']>[] {
        return Array.from(this.clients.values()).map(client => client.getHealth());
    }

    private async getSymbol(venue: string, instrument: string): Promise<BridgeSymbol> {
        const key = `${venue}:${instrument}`;
        const cached = this.symbolCache.get(key);
        if (cached && (Date.now() - cached.timestamp) < this.symbolCacheTtlMs) {
            return cached.symbol;
        }

        // An unknown symbol comes back as 404, which the client turns into RejectError
        const raw = await this.client(venue).get(`/symbols/${encodeURIComponent(instrument)}`);
        const symbol = this.parse(venue, bridgeSymbolSchema, raw, `symbol ${instrument}`);
        // A closed market is not remembered: the next run asks again
        if (symbol.trade_allowed) {
            this.symbolCache.set(key, { symbol, timestamp: Date.now() });
        } else {
            this.symbolCache.delete(key);
        }
        return symbol;
    }

    private client(venue: string): ResilientBridgeClient {
        const client = this.clients.get(venue);
        if (!client) {
            throw new ConnectionError(venue, 'no bridge configured for venue');
        }
        return client;
    }

    /**
     * A bridge answering with an unexpected shape is treated like a broken
     * connection: nothing it said can be trusted for this run.
     */
    private parse<T extends z.ZodTypeAny>(venue: string, schema: T, raw: unknown, what: string): z.output<T> {
        const result = schema.safeParse(raw);
        if (!result.success) {
            const issue = result.error.issues[0];
            throw new ConnectionError(venue, `malformed ${what} from bridge: ${issue.path.join('.')} ${issue.message}`);
        }
        return result.data;
    }
}
