// Builders shared by the copier test suites

import { Channel } from '../../src/shared/message-bus';
import {
    CopierConfig,
    PendingOrderEntity,
    PositionEntity,
    TerminalConfig,
    TrackedRelationship,
} from '../../src/shared/types';

export function terminalConfig(overrides: Partial<TerminalConfig> = {}): TerminalConfig {
    return {
        name: 'target-a',
        bridgeUrl: 'http://127.0.0.1:8701',
        timeoutMs: 1000,
        lotMultiplier: 1,
        minLot: 0.01,
        maxLot: 100,
        allowedOrderTypes: ['BUY_LIMIT', 'SELL_LIMIT', 'BUY_STOP', 'SELL_STOP'],
        symbolMapping: {},
        orphanPolicy: { act: true, thresholdRuns: 3 },
        maxPendingOrders: { enabled: false, limit: 0 },
        ...overrides,
    };
}

export function copierConfig(targets: TerminalConfig[]): CopierConfig {
    return {
        source: { name: 'source', bridgeUrl: 'http://127.0.0.1:8700', timeoutMs: 1000 },
        targets,
        schedule: { mode: 'scheduled', timeframe: 'M5', offsetSeconds: 60, continuousDelaySeconds: 5, maxRuntimeHours: 0 },
        logging: { level: 'info', maxFileSizeMb: 10, backupCount: 5, consoleOutput: true },
        state: { dbPath: ':memory:' },
        gateway: { retryAttempts: 0, retryBaseDelayMs: 0, circuitBreakerThreshold: 5, circuitBreakerResetMs: 60000 },
        matching: { priceTolerance: 1e-5 },
    };
}

export function order(id: string, overrides: Partial<Omit<PendingOrderEntity, 'kind'>> = {}): PendingOrderEntity {
    return {
        kind: 'ORDER',
        id,
        instrument: 'EURUSD',
        side: 'BUY',
        size: 1,
        orderType: 'BUY_LIMIT',
        entryPrice: 1.085,
        stopLoss: 1.08,
        takeProfit: 1.095,
        expiry: null,
        ...overrides,
    };
}

export function position(id: string, overrides: Partial<Omit<PositionEntity, 'kind'>> = {}): PositionEntity {
    return {
        kind: 'POSITION',
        id,
        instrument: 'EURUSD',
        side: 'BUY',
        size: 1,
        entryPrice: 1.085,
        stopLoss: 1.08,
        takeProfit: 1.095,
        ...overrides,
    };
}

export function relationship(tag: string, overrides: Partial<TrackedRelationship> = {}): TrackedRelationship {
    return {
        targetVenue: 'target-a',
        tag,
        state: 'PENDING',
        entityKind: 'ORDER',
        targetEntityId: `t-${tag}`,
        sourceFingerprint: null,
        appliedParams: { entryPrice: 1.085, stopLoss: 1.08, takeProfit: 1.095, expiry: null, size: 1 },
        consecutiveMissingRuns: 0,
        lastUpdatedRunId: 'run-0',
        updatedAt: '2024-01-01T00:00:00.000Z',
        ...overrides,
    };
}

export interface PublishedEvent {
    channel: Channel;
    data: unknown;
}

/** Event publisher that records instead of talking to Redis */
export function recordingEvents(): { publish: <T>(channel: Channel, data: T) => Promise<boolean>; published: PublishedEvent[] } {
    const published: PublishedEvent[] = [];
    return {
        published,
        publish: async <T>(channel: Channel, data: T): Promise<boolean> => {
            published.push({ channel, data });
            return true;
        },
    };
}
