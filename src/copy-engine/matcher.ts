// Matcher
// Correlates one source snapshot with one target snapshot by tag and produces
// the three-way diff the orchestrator acts on. Pure: no I/O, no clock.

import crypto from 'crypto';
import logger from '../shared/logger';
import {
    AppliedParams,
    ParamChanges,
    PendingOrderEntity,
    SourceEntity,
    TargetEntity,
    TrackedRelationship,
} from '../shared/types';

export const DEFAULT_PRICE_TOLERANCE = 1e-5;

export interface MatchedPair {
    source: SourceEntity;
    target: TargetEntity;
    relationship: TrackedRelationship | null;
}

export interface UpdateCandidate extends MatchedPair {
    /** Only the fields that differ from the baseline */
    changes: ParamChanges;
}

export interface DiffResult {
    toCreate: PendingOrderEntity[];
    toUpdate: UpdateCandidate[];
    /** Tagged target entities whose tag is no longer a source id. Duplicates of a tag are all listed. */
    toOrphanCheck: TargetEntity[];
    /** Every tag present on both sides, changed or not */
    matched: MatchedPair[];
    /** Tracked relationships whose target entity is gone */
    vanished: TrackedRelationship[];
}

export interface DiffOptions {
    priceTolerance?: number;
}

/**
 * Short fingerprint of what a source id referred to. A different fingerprint
 * for a tracked tag means the venue reused the id.
 */
export function sourceFingerprint(entity: Pick<SourceEntity, 'instrument' | 'side'>): string {
    return crypto.createHash('sha1').update(`${entity.instrument}|${entity.side}`).digest('hex').slice(0, 12);
}

export function pricesEqual(a: number | null, b: number | null, tolerance: number): boolean {
    if (a === null || b === null) return a === b;
    return Math.abs(a - b) <= tolerance;
}

export function expiriesEqual(a: string | null, b: string | null): boolean {
    if (a === null || b === null) return a === b;
    if (a === b) return true;
    const left = Date.parse(a);
    const right = Date.parse(b);
    return !Number.isNaN(left) && left === right;
}

/**
 * What the copier last wrote to the target. With no relationship (lost
 * ledger, entity tagged by an earlier install) the target's own fields are
 * taken as the baseline, so adoption does not rewrite anything.
 */
export function baselineFor(target: TargetEntity, relationship: TrackedRelationship | null): AppliedParams {
    if (relationship) return relationship.appliedParams;
    return {
        entryPrice: target.entryPrice,
        stopLoss: target.stopLoss,
        takeProfit: target.takeProfit,
        expiry: target.kind === 'ORDER' ? target.expiry : null,
        size: target.size,
    };
}

/**
 * Field-by-field comparison. Entry price and expiry only mean something
 * while both sides are still pending orders.
 */
export function computeChanges(
    source: SourceEntity,
    target: TargetEntity,
    baseline: AppliedParams,
    tolerance: number = DEFAULT_PRICE_TOLERANCE
): ParamChanges {
    const changes: ParamChanges = {};

    if (source.kind === 'ORDER' && target.kind === 'ORDER') {
        if (!pricesEqual(source.entryPrice, baseline.entryPrice, tolerance)) {
            changes.entryPrice = source.entryPrice;
        }
        if (!expiriesEqual(source.expiry, baseline.expiry)) {
            changes.expiry = source.expiry;
        }
    }
    if (!pricesEqual(source.stopLoss, baseline.stopLoss, tolerance)) {
        changes.stopLoss = source.stopLoss;
    }
    if (!pricesEqual(source.takeProfit, baseline.takeProfit, tolerance)) {
        changes.takeProfit = source.takeProfit;
    }

    return changes;
}

/** Positions win over orders sharing an id: the order has just triggered */
function indexSource(source: SourceEntity[]): Map<string, SourceEntity> {
    const byId = new Map<string, SourceEntity>();
    for (const entity of source) {
        const existing = byId.get(entity.id);
        if (!existing || entity.kind === 'POSITION') {
            byId.set(entity.id, entity);
        }
    }
    return byId;
}

function groupTargetByTag(target: TargetEntity[]): Map<string, TargetEntity[]> {
    const byTag = new Map<string, TargetEntity[]>();
    for (const entity of target) {
        if (entity.tag === null) continue;
        const group = byTag.get(entity.tag) ?? [];
        group.push(entity);
        byTag.set(entity.tag, group);
    }
    return byTag;
}

function primaryOf(group: TargetEntity[]): TargetEntity {
    return group.find(entity => entity.kind === 'POSITION') ?? group[0];
}

export function diff(
    source: SourceEntity[],
    target: TargetEntity[],
    tracked: TrackedRelationship[],
    options: DiffOptions = {}
): DiffResult {
    const tolerance = options.priceTolerance ?? DEFAULT_PRICE_TOLERANCE;
    const sourceById = indexSource(source);
    const targetByTag = groupTargetByTag(target);
    const liveRelationships = new Map<string, TrackedRelationship>();
    for (const rel of tracked) {
        if (rel.state !== 'CLOSED') liveRelationships.set(rel.tag, rel);
    }

    const result: DiffResult = { toCreate: [], toUpdate: [], toOrphanCheck: [], matched: [], vanished: [] };

    for (const [tag, group] of targetByTag) {
        const sourceEntity = sourceById.get(tag);

        if (!sourceEntity) {
            result.toOrphanCheck.push(...group);
            continue;
        }

        if (group.length > 1) {
            logger.warn(
                `[Matcher] Tag ${tag} is carried by ${group.length} target entities ` +
                `(${group.map(e => `${e.kind} ${e.id}`).join(', ')}), matching the first position`
            );
        }

        const targetEntity = primaryOf(group);
        const relationship = liveRelationships.get(tag) ?? null;
        const pair: MatchedPair = { source: sourceEntity, target: targetEntity, relationship };
        result.matched.push(pair);

        const changes = computeChanges(sourceEntity, targetEntity, baselineFor(targetEntity, relationship), tolerance);
        if (Object.keys(changes).length > 0) {
            result.toUpdate.push({ ...pair, changes });
        }
    }

    for (const entity of sourceById.values()) {
        if (entity.kind !== 'ORDER') continue;
        if (targetByTag.has(entity.id) || liveRelationships.has(entity.id)) continue;
        result.toCreate.push(entity);
    }

    for (const rel of liveRelationships.values()) {
        if (!targetByTag.has(rel.tag)) {
            result.vanished.push(rel);
        }
    }

    return result;
}
