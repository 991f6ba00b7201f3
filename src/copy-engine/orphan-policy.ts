// Orphan Policy Engine
// Hysteresis over consecutive runs: a tag has to be missing from the source
// for `thresholdRuns` runs in a row before its target copies are removed.
// A single reappearance resets the streak.

import logger from '../shared/logger';
import {
    EntityKind,
    OrphanPolicyConfig,
    RelationshipState,
    TargetEntity,
    TrackedRelationship,
} from '../shared/types';
import { baselineFor } from './matcher';

export type OrphanAction = 'CLEANUP' | 'FLAG' | 'WAIT';

export interface OrphanDecision {
    tag: string;
    action: OrphanAction;
    /** Relationship after this run's increment, state ORPHAN_SUSPECTED */
    relationship: TrackedRelationship;
    /** Every target entity carrying the tag; all are removed on cleanup */
    entities: TargetEntity[];
}

export interface RunStamp {
    runId: string;
    now: string;
}

export function stateForKind(kind: EntityKind): RelationshipState {
    return kind === 'POSITION' ? 'ACTIVE' : 'PENDING';
}

function groupByTag(entities: TargetEntity[]): Map<string, TargetEntity[]> {
    const groups = new Map<string, TargetEntity[]>();
    for (const entity of entities) {
        if (entity.tag === null) continue;
        const group = groups.get(entity.tag) ?? [];
        group.push(entity);
        groups.set(entity.tag, group);
    }
    return groups;
}

/**
 * A tagged entity on the target that the ledger does not know about.
 * Adopted so its streak can be counted like any other.
 */
function adopt(venue: string, tag: string, entity: TargetEntity, stamp: RunStamp): TrackedRelationship {
    return {
        targetVenue: venue,
        tag,
        state: stateForKind(entity.kind),
        entityKind: entity.kind,
        targetEntityId: entity.id,
        sourceFingerprint: null,
        appliedParams: baselineFor(entity, null),
        consecutiveMissingRuns: 0,
        lastUpdatedRunId: stamp.runId,
        updatedAt: stamp.now,
    };
}

export class OrphanPolicyEngine {
    /**
     * Advance the streak of every orphaned tag by one and decide what to do with it.
     */
    evaluate(
        venue: string,
        orphans: TargetEntity[],
        tracked: Map<string, TrackedRelationship>,
        policy: OrphanPolicyConfig,
        stamp: RunStamp
    ): OrphanDecision[] {
        const decisions: OrphanDecision[] = [];

        for (const [tag, entities] of groupByTag(orphans)) {
            const primary = entities.find(e => e.kind === 'POSITION') ?? entities[0];
            const existing = tracked.get(tag);
            const base = existing && existing.state !== 'CLOSED' ? existing : adopt(venue, tag, primary, stamp);

            if (!existing) {
                logger.warn(`[OrphanPolicy] ${venue}: untracked tagged ${primary.kind} ${primary.id} (tag ${tag}) adopted as orphan`);
            }

            const relationship: TrackedRelationship = {
                ...base,
                state: 'ORPHAN_SUSPECTED',
                entityKind: primary.kind,
                targetEntityId: primary.id,
                consecutiveMissingRuns: base.consecutiveMissingRuns + 1,
                lastUpdatedRunId: stamp.runId,
                updatedAt: stamp.now,
            };

            const action = this.decide(relationship.consecutiveMissingRuns, policy, primary.kind);
            logger.info(
                `[OrphanPolicy] ${venue}: tag ${tag} missing from source for ` +
                `${relationship.consecutiveMissingRuns}/${policy.thresholdRuns} runs -> ${action}`
            );

            decisions.push({ tag, action, relationship, entities });
        }

        return decisions;
    }

    /**
     * A tag whose copies include a position follows `actOnPositions`, so
     * orphaned orders can be cancelled while live positions are only flagged.
     */
    decide(missingRuns: number, policy: OrphanPolicyConfig, kind: EntityKind): OrphanAction {
        const act = kind === 'POSITION' ? policy.actOnPositions ?? policy.act : policy.act;
        if (!act) return 'FLAG';
        return missingRuns >= policy.thresholdRuns ? 'CLEANUP' : 'WAIT';
    }

    /**
     * The tag is on the source again: the streak ends, whatever its length.
     */
    clear(relationship: TrackedRelationship, targetKind: EntityKind, stamp: RunStamp): TrackedRelationship {
        if (relationship.state === 'ORPHAN_SUSPECTED' || relationship.consecutiveMissingRuns > 0) {
            logger.info(
                `[OrphanPolicy] ${relationship.targetVenue}: tag ${relationship.tag} back on source ` +
                `after ${relationship.consecutiveMissingRuns} missed runs`
            );
        }
        return {
            ...relationship,
            state: stateForKind(targetKind),
            entityKind: targetKind,
            consecutiveMissingRuns: 0,
            lastUpdatedRunId: stamp.runId,
            updatedAt: stamp.now,
        };
    }

    /** Cleanup confirmed by the gateway */
    close(relationship: TrackedRelationship, stamp: RunStamp): TrackedRelationship {
        return { ...relationship, state: 'CLOSED', lastUpdatedRunId: stamp.runId, updatedAt: stamp.now };
    }
}

export default new OrphanPolicyEngine();
