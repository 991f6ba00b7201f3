/**
 * Constraint Pipeline
 *
 * Decides whether a source entity may be copied to one target and, if so,
 * what the copy looks like there. Stages run in order and stop at the first
 * rejection:
 *
 *   type filter -> symbol translation -> lot transform -> cardinality
 *
 * The pipeline places nothing. Lot rounding and price precision are
 * delegated to the target's gateway, which knows the venue's symbol.
 */

import { RejectError } from '../shared/errors';
import { SourceEntity, TerminalConfig } from '../shared/types';

export type AdmitPurpose = 'create' | 'update';

export type ConstraintStage = 'TYPE_FILTER' | 'LOT_SIZE' | 'CARDINALITY';

export interface AdmitContext {
    purpose: AdmitPurpose;
    roundLot: (instrument: string, size: number) => Promise<number>;
    /** Round a price to the target symbol's digits; prices pass through when absent */
    normalizePrice?: (instrument: string, price: number) => Promise<number>;
}

export interface Accepted<T extends SourceEntity = SourceEntity> {
    accepted: true;
    entity: T;
    /** False when the instrument had no mapping entry and was passed through */
    symbolMapped: boolean;
}

export interface Rejected {
    accepted: false;
    stage: ConstraintStage;
    reason: string;
}

export type AdmitResult<T extends SourceEntity = SourceEntity> = Accepted<T> | Rejected;

export function clamp(value: number, min: number, max: number): number {
    return Math.min(Math.max(value, min), max);
}

function reject(stage: ConstraintStage, reason: string): Rejected {
    return { accepted: false, stage, reason };
}

type Prices = Pick<SourceEntity, 'entryPrice' | 'stopLoss' | 'takeProfit'>;

async function normalizePrices(candidate: Prices, instrument: string, context: AdmitContext): Promise<Prices> {
    const normalize = context.normalizePrice;
    if (!normalize) {
        return { entryPrice: candidate.entryPrice, stopLoss: candidate.stopLoss, takeProfit: candidate.takeProfit };
    }
    const optional = (price: number | null) => (price === null ? Promise.resolve(null) : normalize(instrument, price));
    return {
        entryPrice: await normalize(instrument, candidate.entryPrice),
        stopLoss: await optional(candidate.stopLoss),
        takeProfit: await optional(candidate.takeProfit),
    };
}

export async function admit<T extends SourceEntity>(
    candidate: T,
    config: TerminalConfig,
    currentTargetCount: number,
    context: AdmitContext
): Promise<AdmitResult<T>> {
    // 1. Type filter. Positions are managed once tracked and never filtered.
    const entity: SourceEntity = candidate;
    if (entity.kind === 'ORDER' && !config.allowedOrderTypes.includes(entity.orderType)) {
        return reject('TYPE_FILTER', `order type ${entity.orderType} not allowed on ${config.name}`);
    }

    // 2. Symbol translation, passthrough when unmapped
    const symbolMapped = Object.prototype.hasOwnProperty.call(config.symbolMapping, candidate.instrument);
    const instrument = symbolMapped ? config.symbolMapping[candidate.instrument] : candidate.instrument;

    // 3. Lot transform
    const clamped = clamp(candidate.size * config.lotMultiplier, config.minLot, config.maxLot);
    if (!Number.isFinite(clamped) || clamped <= 0) {
        return reject('LOT_SIZE', `lot ${clamped} after scaling ${candidate.size} x ${config.lotMultiplier} is not positive`);
    }

    let size: number;
    let prices: Prices;
    try {
        size = await context.roundLot(instrument, clamped);
        if (!Number.isFinite(size) || size <= 0) {
            return reject('LOT_SIZE', `lot ${clamped} rounds to ${size} on ${instrument}`);
        }
        // Same symbol lookup as the lot step, so it shares the stage
        prices = await normalizePrices(candidate, instrument, context);
    } catch (error) {
        if (error instanceof RejectError) {
            return reject('LOT_SIZE', `cannot size ${instrument}: ${error.reason}`);
        }
        throw error;
    }

    // 4. Cardinality, creation only
    if (
        context.purpose === 'create' &&
        config.maxPendingOrders.enabled &&
        currentTargetCount >= config.maxPendingOrders.limit
    ) {
        return reject(
            'CARDINALITY',
            `pending order limit reached (${currentTargetCount}/${config.maxPendingOrders.limit})`
        );
    }

    return {
        accepted: true,
        entity: { ...candidate, ...prices, instrument, size },
        symbolMapped,
    };
}
