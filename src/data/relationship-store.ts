// Relationship Store - the copier's ledger of which target entity copies which source entity
// One row per (target venue, tag). Written once per target per run, in a single transaction.

import BetterSqlite3 from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import logger from '../shared/logger';
import { errorMessage, StateCorruptionError } from '../shared/errors';
import { RunStatus, RunSummary, TrackedRelationship } from '../shared/types';

export const SCHEMA_VERSION = 1;

const appliedParamsSchema = z.object({
    entryPrice: z.number(),
    stopLoss: z.number().nullable(),
    takeProfit: z.number().nullable(),
    expiry: z.string().nullable(),
    size: z.number(),
});

const relationshipRowSchema = z.object({
    target_venue: z.string().min(1),
    tag: z.string().min(1),
    relationship_state: z.enum(['PENDING', 'ACTIVE', 'ORPHAN_SUSPECTED', 'CLOSED']),
    entity_kind: z.enum(['ORDER', 'POSITION']),
    target_entity_id: z.string().nullable(),
    source_fingerprint: z.string().nullable(),
    applied_params: z.string(),
    consecutive_missing_runs: z.number().int().min(0),
    last_updated_run_id: z.string(),
    updated_at: z.string(),
});

const runRowSchema = z.object({
    run_id: z.string(),
    status: z.string(),
    summary: z.string(),
});

export interface StoredRun {
    runId: string;
    status: RunStatus;
    summary: RunSummary;
}

export class RelationshipStore {
    private db: BetterSqlite3.Database | null = null;
    private initialized: boolean = false;

    constructor(private dbPath: string = process.env.COPIER_DB_PATH || './data/copier.db') {}

    /**
     * Open the database and create tables. A ledger written by an
     * incompatible schema is refused rather than migrated.
     */
    initialize(): void {
        if (this.initialized) return;

        try {
            if (this.dbPath !== ':memory:') {
                fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
            }

            this.db = new BetterSqlite3(this.dbPath);
            this.db.pragma('journal_mode = WAL');

            this.db.exec(`
                CREATE TABLE IF NOT EXISTS store_meta (
                    key TEXT PRIMARY KEY,
                    value TEXT NOT NULL
                )
            `);

            this.db.exec(`
                CREATE TABLE IF NOT EXISTS tracked_relationships (
                    target_venue TEXT NOT NULL,
                    tag TEXT NOT NULL,
                    relationship_state TEXT NOT NULL,
                    entity_kind TEXT NOT NULL,
                    target_entity_id TEXT,
                    source_fingerprint TEXT,
                    applied_params TEXT NOT NULL,
                    consecutive_missing_runs INTEGER NOT NULL DEFAULT 0,
                    last_updated_run_id TEXT NOT NULL,
                    updated_at TEXT NOT NULL,
                    PRIMARY KEY (target_venue, tag)
                )
            `);

            this.db.exec(`
                CREATE TABLE IF NOT EXISTS reconciliation_runs (
                    run_id TEXT PRIMARY KEY,
                    started_at TEXT NOT NULL,
                    finished_at TEXT NOT NULL,
                    status TEXT NOT NULL,
                    summary TEXT NOT NULL
                )
            `);

            this.db.exec(`
                CREATE INDEX IF NOT EXISTS idx_runs_started_at
                ON reconciliation_runs(started_at)
            `);

            this.checkSchemaVersion(this.db);

            this.initialized = true;
            logger.info(`[RelationshipStore] Initialized at ${this.dbPath}`);
        } catch (error) {
            this.db?.close();
            this.db = null;
            if (error instanceof StateCorruptionError) throw error;
            logger.error('[RelationshipStore] Failed to initialize:', error);
            throw new StateCorruptionError(`cannot open relationship store: ${errorMessage(error)}`);
        }
    }

    private checkSchemaVersion(db: BetterSqlite3.Database): void {
        const row: unknown = db.prepare(`SELECT value FROM store_meta WHERE key = 'schema_version'`).get();

        if (row === undefined) {
            db.prepare(`INSERT INTO store_meta (key, value) VALUES ('schema_version', ?)`).run(String(SCHEMA_VERSION));
            return;
        }

        const parsed = z.object({ value: z.string() }).safeParse(row);
        if (!parsed.success || parsed.data.value !== String(SCHEMA_VERSION)) {
            throw new StateCorruptionError(
                `relationship store schema version ${parsed.success ? parsed.data.value : 'unreadable'}, expected ${SCHEMA_VERSION}`
            );
        }
    }

    private getDb(): BetterSqlite3.Database {
        if (!this.db) {
            this.initialize();
        }
        if (!this.db) {
            throw new StateCorruptionError('relationship store is not open');
        }
        return this.db;
    }

    /**
     * Load every relationship. Any row that does not decode aborts the load.
     */
    loadAll(): TrackedRelationship[] {
        const rows: unknown[] = this.getDb()
            .prepare('SELECT * FROM tracked_relationships ORDER BY target_venue, tag')
            .all();
        return rows.map(row => this.rowToRelationship(row));
    }

    getRelationships(targetVenue: string): TrackedRelationship[] {
        const rows: unknown[] = this.getDb()
            .prepare('SELECT * FROM tracked_relationships WHERE target_venue = ? ORDER BY tag')
            .all(targetVenue);
        return rows.map(row => this.rowToRelationship(row));
    }

    /**
     * Replace a target's relationships atomically. CLOSED relationships are
     * dropped, so a source id can be tracked again later.
     */
    replaceTarget(targetVenue: string, relationships: TrackedRelationship[]): void {
        const db = this.getDb();

        const remove = db.prepare('DELETE FROM tracked_relationships WHERE target_venue = ?');
        const insert = db.prepare(`
            INSERT INTO tracked_relationships (
                target_venue, tag, relationship_state, entity_kind, target_entity_id,
                source_fingerprint, applied_params, consecutive_missing_runs,
                last_updated_run_id, updated_at
            ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        `);

        const commit = db.transaction((rows: TrackedRelationship[]) => {
            remove.run(targetVenue);
            for (const rel of rows) {
                if (rel.targetVenue !== targetVenue) {
                    throw new StateCorruptionError(
                        `relationship ${rel.tag} belongs to ${rel.targetVenue}, not ${targetVenue}`
                    );
                }
                if (rel.state === 'CLOSED') continue;
                insert.run(
                    rel.targetVenue,
                    rel.tag,
                    rel.state,
                    rel.entityKind,
                    rel.targetEntityId,
                    rel.sourceFingerprint,
                    JSON.stringify(rel.appliedParams),
                    rel.consecutiveMissingRuns,
                    rel.lastUpdatedRunId,
                    rel.updatedAt
                );
            }
        });

        commit(relationships);
    }

    /**
     * Drop relationships of venues no longer configured
     */
    pruneVenues(activeVenues: string[]): number {
        const db = this.getDb();
        const rows: unknown[] = db.prepare('SELECT DISTINCT target_venue FROM tracked_relationships').all();
        const venueRow = z.object({ target_venue: z.string() });

        let removed = 0;
        for (const row of rows) {
            const parsed = venueRow.safeParse(row);
            if (!parsed.success) {
                throw new StateCorruptionError('unreadable target_venue in relationship store');
            }
            const venue = parsed.data.target_venue;
            if (activeVenues.includes(venue)) continue;

            const result = db.prepare('DELETE FROM tracked_relationships WHERE target_venue = ?').run(venue);
            removed += result.changes;
            logger.info(`[RelationshipStore] Pruned ${result.changes} relationships of unconfigured venue ${venue}`);
        }
        return removed;
    }

    recordRun(summary: RunSummary): void {
        this.getDb().prepare(`
            INSERT OR REPLACE INTO reconciliation_runs (run_id, started_at, finished_at, status, summary)
            VALUES (?, ?, ?, ?, ?)
        `).run(summary.runId, summary.startedAt, summary.finishedAt, summary.status, JSON.stringify(summary));
    }

    getRecentRuns(limit: number = 10): StoredRun[] {
        const rows: unknown[] = this.getDb()
            .prepare('SELECT run_id, status, summary FROM reconciliation_runs ORDER BY started_at DESC LIMIT ?')
            .all(limit);

        const result: StoredRun[] = [];
        for (const row of rows) {
            const parsed = runRowSchema.safeParse(row);
            if (!parsed.success) {
                logger.warn('[RelationshipStore] Skipping unreadable run record');
                continue;
            }
            const summary = this.parseRunSummary(parsed.data.summary);
            if (!summary) {
                logger.warn(`[RelationshipStore] Skipping run ${parsed.data.run_id} with unreadable summary`);
                continue;
            }
            result.push({ runId: parsed.data.run_id, status: summary.status, summary });
        }
        return result;
    }

    private parseRunSummary(json: string): RunSummary | null {
        const counters = {
            created: z.number(),
            updated: z.number(),
            orphansCleared: z.number(),
            orphansFlagged: z.number(),
            errors: z.number(),
        };
        const schema = z.object({
            runId: z.string(),
            startedAt: z.string(),
            finishedAt: z.string(),
            status: z.enum(['COMPLETED', 'PARTIAL', 'ABORTED', 'SOURCE_UNAVAILABLE']),
            sourceOrders: z.number(),
            sourcePositions: z.number(),
            targets: z.array(z.object({
                venue: z.string(),
                status: z.enum(['OK', 'CONNECTION_ERROR', 'AUTH_ERROR', 'FAILED', 'SKIPPED']),
                rejected: z.array(z.object({
                    tag: z.string(),
                    instrument: z.string(),
                    stage: z.enum(['TYPE_FILTER', 'LOT_SIZE', 'CARDINALITY', 'SUBMISSION', 'MODIFICATION', 'CLEANUP']),
                    reason: z.string(),
                })),
                error: z.string().optional(),
                durationMs: z.number(),
                ...counters,
            })),
            totals: z.object(counters),
        });

        try {
            const parsed = schema.safeParse(JSON.parse(json));
            return parsed.success ? parsed.data : null;
        } catch {
            return null;
        }
    }

    private rowToRelationship(row: unknown): TrackedRelationship {
        const parsed = relationshipRowSchema.safeParse(row);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new StateCorruptionError(`malformed relationship row: ${issue.path.join('.')} ${issue.message}`);
        }
        const data = parsed.data;

        let params: unknown;
        try {
            params = JSON.parse(data.applied_params);
        } catch (error) {
            throw new StateCorruptionError(
                `unreadable applied_params for ${data.target_venue}/${data.tag}: ${errorMessage(error)}`
            );
        }
        const appliedParams = appliedParamsSchema.safeParse(params);
        if (!appliedParams.success) {
            throw new StateCorruptionError(`invalid applied_params for ${data.target_venue}/${data.tag}`);
        }

        return {
            targetVenue: data.target_venue,
            tag: data.tag,
            state: data.relationship_state,
            entityKind: data.entity_kind,
            targetEntityId: data.target_entity_id,
            sourceFingerprint: data.source_fingerprint,
            appliedParams: appliedParams.data,
            consecutiveMissingRuns: data.consecutive_missing_runs,
            lastUpdatedRunId: data.last_updated_run_id,
            updatedAt: data.updated_at,
        };
    }

    close(): void {
        if (this.db) {
            this.db.close();
            this.db = null;
            this.initialized = false;
            logger.info('[RelationshipStore] Closed');
        }
    }
}
