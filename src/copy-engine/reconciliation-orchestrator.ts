// Reconciliation Orchestrator
// One run: read the source once, then bring each target in line with it,
// strictly one target at a time. A target's failure is recorded and the run
// moves on; only a ledger failure stops the run.

import { v4 as uuidv4 } from 'uuid';
import logger from '../shared/logger';
import messageBus, { Channel } from '../shared/message-bus';
import {
    AuthError,
    ConnectionError,
    CopierError,
    errorMessage,
    RejectError,
    StateCorruptionError,
} from '../shared/errors';
import {
    CopierConfig,
    OrderSubmission,
    PendingOrderEntity,
    PositionChanges,
    RejectedCandidate,
    RunCounters,
    RunStatus,
    RunSummary,
    SourceEntity,
    TargetEntity,
    TargetRunSummary,
    TerminalConfig,
    TrackedRelationship,
} from '../shared/types';
import { TerminalGateway } from '../gateway/terminal-gateway';
import { RelationshipStore } from '../data/relationship-store';
import { admit, AdmitContext } from './constraint-pipeline';
import { baselineFor, computeChanges, diff, MatchedPair, sourceFingerprint, UpdateCandidate } from './matcher';
import defaultOrphanPolicy, { OrphanDecision, OrphanPolicyEngine, RunStamp, stateForKind } from './orphan-policy';

export type RelationshipLedger = Pick<RelationshipStore, 'loadAll' | 'replaceTarget' | 'recordRun' | 'pruneVenues'>;

export type EventPublisher = Pick<typeof messageBus, 'publish'>;

export interface OrchestratorDeps {
    gateway: TerminalGateway;
    store: RelationshipLedger;
    orphanPolicy?: OrphanPolicyEngine;
    events?: EventPublisher;
}

/** Per-target working state for one run */
interface TargetWork {
    config: TerminalConfig;
    summary: TargetRunSummary;
    ledger: Map<string, TrackedRelationship>;
    stamp: RunStamp;
    pendingCount: number;
}

function emptyCounters(): RunCounters {
    return { created: 0, updated: 0, orphansCleared: 0, orphansFlagged: 0, errors: 0 };
}

function emptyTargetSummary(venue: string): TargetRunSummary {
    return { venue, status: 'OK', rejected: [], durationMs: 0, ...emptyCounters() };
}

function isSessionFailure(error: unknown): error is ConnectionError | AuthError {
    return error instanceof ConnectionError || error instanceof AuthError;
}

export class ReconciliationOrchestrator {
    private gateway: TerminalGateway;
    private store: RelationshipLedger;
    private orphanPolicy: OrphanPolicyEngine;
    private events: EventPublisher;

    constructor(private config: CopierConfig, deps: OrchestratorDeps) {
        this.gateway = deps.gateway;
        this.store = deps.store;
        this.orphanPolicy = deps.orphanPolicy ?? defaultOrphanPolicy;
        this.events = deps.events ?? messageBus;
    }

    /**
     * Execute one complete reconciliation pass. Cancellation through `signal`
     * is honoured between targets only.
     *
     * @throws StateCorruptionError when the ledger cannot be read or written
     */
    async runOnce(signal?: AbortSignal): Promise<RunSummary> {
        const runId = uuidv4();
        const startedAt = new Date().toISOString();
        logger.info(`[Orchestrator] Run ${runId} started (${this.config.targets.length} targets)`);
        await this.events.publish(Channel.RUN_START, { runId, startedAt }, runId);

        const ledger = await this.loadLedger(runId);

        let source: SourceEntity[];
        try {
            source = await this.fetchSource();
        } catch (error) {
            if (!(error instanceof CopierError)) throw error;
            logger.error(`[Orchestrator] Source ${this.config.source.name} unavailable, no target touched: ${error.message}`);
            return this.finish({
                runId,
                startedAt,
                finishedAt: new Date().toISOString(),
                status: 'SOURCE_UNAVAILABLE',
                sourceOrders: 0,
                sourcePositions: 0,
                targets: [],
                totals: emptyCounters(),
            });
        }

        const targets: TargetRunSummary[] = [];
        let aborted = false;

        for (const target of this.config.targets) {
            if (signal?.aborted) {
                aborted = true;
                targets.push({ ...emptyTargetSummary(target.name), status: 'SKIPPED', error: 'run aborted' });
                continue;
            }

            const tracked = ledger.filter(rel => rel.targetVenue === target.name);
            try {
                targets.push(await this.reconcileTarget(target, source, tracked, runId));
            } catch (error) {
                await this.events.publish(Channel.RUN_ABORTED, { runId, reason: errorMessage(error) }, runId);
                throw error;
            }
        }

        const status: RunStatus = aborted
            ? 'ABORTED'
            : targets.every(t => t.status === 'OK') ? 'COMPLETED' : 'PARTIAL';

        return this.finish({
            runId,
            startedAt,
            finishedAt: new Date().toISOString(),
            status,
            sourceOrders: source.filter(e => e.kind === 'ORDER').length,
            sourcePositions: source.filter(e => e.kind === 'POSITION').length,
            targets,
            totals: this.sumCounters(targets),
        });
    }

    private async loadLedger(runId: string): Promise<TrackedRelationship[]> {
        try {
            // Nothing is deleted until the whole ledger has been read back
            const ledger = this.store.loadAll();
            this.store.pruneVenues(this.config.targets.map(t => t.name));
            return ledger;
        } catch (error) {
            const corruption = error instanceof StateCorruptionError
                ? error
                : new StateCorruptionError(`cannot load relationship ledger: ${errorMessage(error)}`);
            logger.error(`[Orchestrator] Run ${runId} aborted before any change: ${corruption.message}`);
            await this.events.publish(Channel.RUN_ABORTED, { runId, reason: corruption.message }, runId);
            throw corruption;
        }
    }

    private async fetchSource(): Promise<SourceEntity[]> {
        const venue = this.config.source.name;
        const orders = await this.gateway.listPendingOrders(venue);
        const positions = await this.gateway.listPositions(venue);
        logger.info(`[Orchestrator] Source ${venue}: ${orders.length} pending orders, ${positions.length} positions`);
        return [...orders, ...positions];
    }

    private async reconcileTarget(
        config: TerminalConfig,
        source: SourceEntity[],
        tracked: TrackedRelationship[],
        runId: string
    ): Promise<TargetRunSummary> {
        const started = Date.now();
        const summary = emptyTargetSummary(config.name);

        let orders: TargetEntity[];
        let positions: TargetEntity[];
        try {
            orders = await this.gateway.listPendingOrders(config.name);
            positions = await this.gateway.listPositions(config.name);
        } catch (error) {
            if (!(error instanceof CopierError)) throw error;
            summary.status = error instanceof AuthError ? 'AUTH_ERROR' : error instanceof ConnectionError ? 'CONNECTION_ERROR' : 'FAILED';
            summary.error = error.message;
            summary.errors++;
            summary.durationMs = Date.now() - started;
            logger.warn(`[Orchestrator] ${config.name}: skipped, ledger untouched: ${error.message}`);
            await this.events.publish(Channel.TARGET_FAILED, { venue: config.name, error: error.message }, runId);
            return summary;
        }

        const work: TargetWork = {
            config,
            summary,
            ledger: new Map(tracked.map(rel => [rel.tag, rel])),
            stamp: { runId, now: new Date().toISOString() },
            pendingCount: orders.length,
        };

        const result = diff(source, [...orders, ...positions], tracked, {
            priceTolerance: this.config.matching.priceTolerance,
        });
        logger.info(
            `[Orchestrator] ${config.name}: ${result.toCreate.length} to create, ${result.toUpdate.length} to update, ` +
            `${result.toOrphanCheck.length} orphan candidates, ${result.vanished.length} vanished`
        );

        for (const pair of result.matched) {
            await this.trackMatched(work, pair);
        }
        for (const rel of result.vanished) {
            logger.info(`[Orchestrator] ${config.name}: ${rel.entityKind} for tag ${rel.tag} is gone from the target, closing`);
            work.ledger.set(rel.tag, this.orphanPolicy.close(rel, work.stamp));
        }

        const decisions = this.orphanPolicy.evaluate(config.name, result.toOrphanCheck, work.ledger, config.orphanPolicy, work.stamp);
        for (const decision of decisions) {
            work.ledger.set(decision.tag, decision.relationship);
        }

        // create -> update -> cleanup, so a freshly triggered position is never taken for an orphan
        try {
            for (const candidate of result.toCreate) {
                await this.applyCreate(work, candidate);
            }
            for (const update of result.toUpdate) {
                await this.applyUpdate(work, update);
            }
            for (const decision of decisions) {
                if (decision.action === 'CLEANUP') {
                    await this.applyCleanup(work, decision);
                }
            }
        } catch (error) {
            if (!isSessionFailure(error)) throw error;
            summary.status = 'FAILED';
            summary.error = error.message;
            summary.errors++;
            logger.error(`[Orchestrator] ${config.name}: remaining operations abandoned: ${error.message}`);
            await this.events.publish(Channel.TARGET_FAILED, { venue: config.name, error: error.message }, runId);
        }

        for (const decision of decisions) {
            const rel = work.ledger.get(decision.tag);
            if (rel && rel.state === 'ORPHAN_SUSPECTED') {
                summary.orphansFlagged++;
                await this.events.publish(Channel.ORPHAN_FLAGGED, {
                    venue: config.name,
                    tag: decision.tag,
                    missingRuns: rel.consecutiveMissingRuns,
                }, runId);
            }
        }

        this.commit(config.name, Array.from(work.ledger.values()));

        summary.durationMs = Date.now() - started;
        logger.info(
            `[Orchestrator] ${config.name}: ${summary.status} created=${summary.created} updated=${summary.updated} ` +
            `cleared=${summary.orphansCleared} flagged=${summary.orphansFlagged} rejected=${summary.rejected.length} ` +
            `errors=${summary.errors} (${summary.durationMs}ms)`
        );
        return summary;
    }

    /**
     * Bring the relationship of a tag present on both sides up to date:
     * state follows the target's kind and any orphan streak ends.
     */
    private async trackMatched(work: TargetWork, pair: MatchedPair): Promise<void> {
        const fingerprint = sourceFingerprint(pair.source);
        let rel = pair.relationship;

        if (!rel) {
            logger.info(`[Orchestrator] ${work.config.name}: adopting untracked copy ${pair.target.id} of ${pair.source.id}`);
            rel = {
                targetVenue: work.config.name,
                tag: pair.source.id,
                state: stateForKind(pair.target.kind),
                entityKind: pair.target.kind,
                targetEntityId: pair.target.id,
                sourceFingerprint: fingerprint,
                appliedParams: baselineFor(pair.target, null),
                consecutiveMissingRuns: 0,
                lastUpdatedRunId: work.stamp.runId,
                updatedAt: work.stamp.now,
            };
        } else if (rel.sourceFingerprint !== null && rel.sourceFingerprint !== fingerprint) {
            logger.warn(
                `[Orchestrator] ${work.config.name}: source id ${pair.source.id} now refers to ` +
                `${pair.source.side} ${pair.source.instrument}, the venue may have reused it`
            );
        }

        if (rel.state === 'ORPHAN_SUSPECTED' || rel.consecutiveMissingRuns > 0) {
            await this.events.publish(Channel.ORPHAN_CLEARED, {
                venue: work.config.name,
                tag: rel.tag,
                reason: 'reappeared',
            }, work.stamp.runId);
        }

        const cleared = this.orphanPolicy.clear(rel, pair.target.kind, work.stamp);
        work.ledger.set(cleared.tag, { ...cleared, targetEntityId: pair.target.id, sourceFingerprint: fingerprint });
    }

    private admitContext(venue: string, purpose: AdmitContext['purpose']): AdmitContext {
        return {
            purpose,
            roundLot: (instrument, size) => this.gateway.roundLot(venue, instrument, size),
            normalizePrice: (instrument, price) => this.gateway.normalizePrice(venue, instrument, price),
        };
    }

    private async applyCreate(work: TargetWork, candidate: PendingOrderEntity): Promise<void> {
        const venue = work.config.name;
        const admitted = await admit(candidate, work.config, work.pendingCount, this.admitContext(venue, 'create'));

        if (!admitted.accepted) {
            await this.recordRejection(work, {
                tag: candidate.id,
                instrument: candidate.instrument,
                stage: admitted.stage,
                reason: admitted.reason,
            });
            return;
        }

        const copy = admitted.entity;
        if (!admitted.symbolMapped) {
            logger.debug(`[Orchestrator] ${venue}: no symbol mapping for ${copy.instrument}, using it as is`);
        }

        const submission: OrderSubmission = {
            instrument: copy.instrument,
            side: copy.side,
            orderType: copy.orderType,
            size: copy.size,
            entryPrice: copy.entryPrice,
            stopLoss: copy.stopLoss,
            takeProfit: copy.takeProfit,
            expiry: copy.expiry,
            tag: candidate.id,
            comment: `copy of ${candidate.id}`,
        };

        let targetId: string;
        try {
            targetId = await this.gateway.submitOrder(venue, submission);
        } catch (error) {
            if (!(error instanceof RejectError)) throw error;
            work.summary.errors++;
            await this.recordRejection(work, {
                tag: candidate.id,
                instrument: copy.instrument,
                stage: 'SUBMISSION',
                reason: error.reason,
            });
            return;
        }

        work.ledger.set(candidate.id, {
            targetVenue: venue,
            tag: candidate.id,
            state: 'PENDING',
            entityKind: 'ORDER',
            targetEntityId: targetId,
            sourceFingerprint: sourceFingerprint(candidate),
            appliedParams: {
                entryPrice: copy.entryPrice,
                stopLoss: copy.stopLoss,
                takeProfit: copy.takeProfit,
                expiry: copy.expiry,
                size: copy.size,
            },
            consecutiveMissingRuns: 0,
            lastUpdatedRunId: work.stamp.runId,
            updatedAt: work.stamp.now,
        });
        work.pendingCount++;
        work.summary.created++;

        logger.info(
            `[Orchestrator] ${venue}: copied ${candidate.orderType} ${candidate.id} as ${targetId} ` +
            `(${copy.size} ${copy.instrument} @ ${copy.entryPrice})`
        );
        await this.events.publish(Channel.ORDER_COPIED, {
            venue,
            tag: candidate.id,
            targetId,
            instrument: copy.instrument,
            size: copy.size,
        }, work.stamp.runId);
    }

    private async applyUpdate(work: TargetWork, update: UpdateCandidate): Promise<void> {
        const venue = work.config.name;
        const { source, target } = update;

        const admitted = await admit(source, work.config, work.pendingCount, this.admitContext(venue, 'update'));
        if (!admitted.accepted) {
            await this.recordRejection(work, {
                tag: source.id,
                instrument: source.instrument,
                stage: admitted.stage,
                reason: admitted.reason,
            });
            return;
        }

        // Compare again at the target's precision: a difference that rounds away is no change
        const changes = computeChanges(
            admitted.entity,
            target,
            baselineFor(target, update.relationship),
            this.config.matching.priceTolerance
        );
        if (Object.keys(changes).length === 0) {
            logger.debug(`[Orchestrator] ${venue}: tag ${source.id} differs only below ${target.instrument} precision`);
            return;
        }

        try {
            if (target.kind === 'ORDER') {
                await this.gateway.modifyOrder(venue, target.id, changes);
            } else {
                const positionChanges: PositionChanges = {};
                if (changes.stopLoss !== undefined) positionChanges.stopLoss = changes.stopLoss;
                if (changes.takeProfit !== undefined) positionChanges.takeProfit = changes.takeProfit;
                await this.gateway.modifyPosition(venue, target.id, positionChanges);
            }
        } catch (error) {
            if (!(error instanceof RejectError)) throw error;
            work.summary.errors++;
            await this.recordRejection(work, {
                tag: source.id,
                instrument: source.instrument,
                stage: 'MODIFICATION',
                reason: error.reason,
            });
            return;
        }

        const rel = work.ledger.get(source.id);
        if (rel) {
            work.ledger.set(source.id, {
                ...rel,
                appliedParams: { ...rel.appliedParams, ...changes },
                lastUpdatedRunId: work.stamp.runId,
                updatedAt: work.stamp.now,
            });
        }
        work.summary.updated++;
        logger.info(`[Orchestrator] ${venue}: updated ${target.kind} ${target.id} (tag ${source.id}): ${Object.keys(changes).join(', ')}`);
    }

    /**
     * Remove every target entity carrying an orphaned tag. The relationship
     * closes only when all removals are confirmed.
     */
    private async applyCleanup(work: TargetWork, decision: OrphanDecision): Promise<void> {
        const venue = work.config.name;

        for (const entity of decision.entities) {
            try {
                if (entity.kind === 'ORDER') {
                    await this.gateway.cancelOrder(venue, entity.id);
                } else {
                    await this.gateway.closePosition(venue, entity.id);
                }
            } catch (error) {
                if (!(error instanceof RejectError)) throw error;
                work.summary.errors++;
                await this.recordRejection(work, {
                    tag: decision.tag,
                    instrument: entity.instrument,
                    stage: 'CLEANUP',
                    reason: error.reason,
                });
                return;
            }
            logger.info(`[Orchestrator] ${venue}: removed orphaned ${entity.kind} ${entity.id} (tag ${decision.tag})`);
        }

        work.ledger.set(decision.tag, this.orphanPolicy.close(decision.relationship, work.stamp));
        work.summary.orphansCleared++;
        await this.events.publish(Channel.ORPHAN_CLEARED, {
            venue,
            tag: decision.tag,
            reason: 'cleaned up',
        }, work.stamp.runId);
    }

    private async recordRejection(work: TargetWork, rejected: RejectedCandidate): Promise<void> {
        work.summary.rejected.push(rejected);
        logger.warn(`[Orchestrator] ${work.config.name}: tag ${rejected.tag} rejected at ${rejected.stage}: ${rejected.reason}`);
        await this.events.publish(Channel.ORDER_REJECTED, { venue: work.config.name, ...rejected }, work.stamp.runId);
    }

    private commit(venue: string, relationships: TrackedRelationship[]): void {
        try {
            this.store.replaceTarget(venue, relationships);
        } catch (error) {
            throw error instanceof StateCorruptionError
                ? error
                : new StateCorruptionError(`failed to commit relationships of ${venue}: ${errorMessage(error)}`);
        }
    }

    private sumCounters(targets: TargetRunSummary[]): RunCounters {
        const totals = emptyCounters();
        for (const t of targets) {
            totals.created += t.created;
            totals.updated += t.updated;
            totals.orphansCleared += t.orphansCleared;
            totals.orphansFlagged += t.orphansFlagged;
            totals.errors += t.errors;
        }
        return totals;
    }

    private async finish(summary: RunSummary): Promise<RunSummary> {
        try {
            this.store.recordRun(summary);
        } catch (error) {
            logger.error(`[Orchestrator] Could not store summary of run ${summary.runId}:`, error);
        }

        const rejected = summary.targets.reduce((n, t) => n + t.rejected.length, 0);
        logger.info(
            `[Orchestrator] Run ${summary.runId} ${summary.status}: created=${summary.totals.created} ` +
            `updated=${summary.totals.updated} cleared=${summary.totals.orphansCleared} ` +
            `flagged=${summary.totals.orphansFlagged} rejected=${rejected} errors=${summary.totals.errors}`
        );
        await this.events.publish(Channel.RUN_COMPLETE, summary, summary.runId);
        return summary;
    }
}

export default ReconciliationOrchestrator;
