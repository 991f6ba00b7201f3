// Shared domain types for the order copier

export const ORDER_TYPES = [
    'BUY_LIMIT',
    'SELL_LIMIT',
    'BUY_STOP',
    'SELL_STOP',
    'BUY_STOP_LIMIT',
    'SELL_STOP_LIMIT',
] as const;

export type OrderType = typeof ORDER_TYPES[number];

export type Side = 'BUY' | 'SELL';

export type EntityKind = 'ORDER' | 'POSITION';

interface EntityBase {
    /** Venue-native ticket. Unique per venue, may be reused after the entity closes. */
    id: string;
    instrument: string;
    side: Side;
    size: number;
    entryPrice: number;
    stopLoss: number | null;
    takeProfit: number | null;
}

export interface PendingOrderEntity extends EntityBase {
    kind: 'ORDER';
    orderType: OrderType;
    /** ISO-8601 expiry, null for good-till-cancelled */
    expiry: string | null;
}

export interface PositionEntity extends EntityBase {
    kind: 'POSITION';
}

export type SourceEntity = PendingOrderEntity | PositionEntity;

/**
 * An entity as listed by a terminal. `tag` is the source id the copier wrote
 * on it; null for anything the copier did not place.
 */
export type TaggedOrder = PendingOrderEntity & { tag: string | null };
export type TaggedPosition = PositionEntity & { tag: string | null };
export type VenueEntity = TaggedOrder | TaggedPosition;

export type TargetEntity = VenueEntity;

export interface AppliedParams {
    entryPrice: number;
    stopLoss: number | null;
    takeProfit: number | null;
    expiry: string | null;
    size: number;
}

export type ComparableField = 'entryPrice' | 'stopLoss' | 'takeProfit' | 'expiry';

export type ParamChanges = Partial<Pick<AppliedParams, ComparableField>>;

export type PositionChanges = Partial<Pick<AppliedParams, 'stopLoss' | 'takeProfit'>>;

export type RelationshipState = 'PENDING' | 'ACTIVE' | 'ORPHAN_SUSPECTED' | 'CLOSED';

export interface TrackedRelationship {
    targetVenue: string;
    tag: string;
    state: RelationshipState;
    entityKind: EntityKind;
    targetEntityId: string | null;
    sourceFingerprint: string | null;
    appliedParams: AppliedParams;
    consecutiveMissingRuns: number;
    lastUpdatedRunId: string;
    updatedAt: string;
}

export interface OrderSubmission {
    instrument: string;
    side: Side;
    orderType: OrderType;
    size: number;
    entryPrice: number;
    stopLoss: number | null;
    takeProfit: number | null;
    expiry: string | null;
    tag: string;
    comment: string;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface VenueConnectionConfig {
    name: string;
    bridgeUrl: string;
    apiKeyEnv?: string;
    timeoutMs: number;
}

export interface OrphanPolicyConfig {
    act: boolean;
    /** Overrides `act` for copies that are already positions; defaults to `act` */
    actOnPositions?: boolean;
    thresholdRuns: number;
}

export interface MaxPendingOrdersConfig {
    enabled: boolean;
    limit: number;
}

export interface TerminalConfig extends VenueConnectionConfig {
    lotMultiplier: number;
    minLot: number;
    maxLot: number;
    allowedOrderTypes: OrderType[];
    symbolMapping: Record<string, string>;
    orphanPolicy: OrphanPolicyConfig;
    maxPendingOrders: MaxPendingOrdersConfig;
}

export type Timeframe = 'M1' | 'M5' | 'M15' | 'M30' | 'H1' | 'H4' | 'D1';

export interface ScheduleConfig {
    mode: 'scheduled' | 'continuous';
    timeframe: Timeframe;
    offsetSeconds: number;
    continuousDelaySeconds: number;
    maxRuntimeHours: number;
}

export interface LoggingConfig {
    level: 'debug' | 'info' | 'warn' | 'error';
    filePath?: string;
    maxFileSizeMb: number;
    backupCount: number;
    consoleOutput: boolean;
}

export interface GatewayConfig {
    retryAttempts: number;
    retryBaseDelayMs: number;
    circuitBreakerThreshold: number;
    circuitBreakerResetMs: number;
}

export interface CopierConfig {
    source: VenueConnectionConfig;
    targets: TerminalConfig[];
    schedule: ScheduleConfig;
    logging: LoggingConfig;
    state: { dbPath: string };
    gateway: GatewayConfig;
    matching: { priceTolerance: number };
}

// ---------------------------------------------------------------------------
// Run reporting
// ---------------------------------------------------------------------------

export type RejectionStage = 'TYPE_FILTER' | 'LOT_SIZE' | 'CARDINALITY' | 'SUBMISSION' | 'MODIFICATION' | 'CLEANUP';

export interface RejectedCandidate {
    tag: string;
    instrument: string;
    stage: RejectionStage;
    reason: string;
}

export interface RunCounters {
    created: number;
    updated: number;
    orphansCleared: number;
    orphansFlagged: number;
    errors: number;
}

export type TargetRunStatus = 'OK' | 'CONNECTION_ERROR' | 'AUTH_ERROR' | 'FAILED' | 'SKIPPED';

export interface TargetRunSummary extends RunCounters {
    venue: string;
    status: TargetRunStatus;
    rejected: RejectedCandidate[];
    error?: string;
    durationMs: number;
}

export type RunStatus = 'COMPLETED' | 'PARTIAL' | 'ABORTED' | 'SOURCE_UNAVAILABLE';

export interface RunSummary {
    runId: string;
    startedAt: string;
    finishedAt: string;
    status: RunStatus;
    sourceOrders: number;
    sourcePositions: number;
    targets: TargetRunSummary[];
    totals: RunCounters;
}
