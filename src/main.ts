#!/usr/bin/env node
// Main Entry Point - Pending Order Copier
// Keeps target terminals in line with the source terminal, one reconciliation run per bar.
//
//   order-copier                 run on the configured schedule
//   order-copier --once          run once and exit (0 completed, 2 partial, 1 fatal)
//   order-copier --status        print recent runs and tracked relationships
//   order-copier --config <path> use another config file

import 'dotenv/config';

import logger, { configureLogging } from './shared/logger';
import messageBus from './shared/message-bus';
import { ConfigManager } from './shared/config';
import { errorMessage, StateCorruptionError } from './shared/errors';
import { RelationshipStore } from './data/relationship-store';
import { HttpTerminalGateway } from './gateway/http-terminal-gateway';
import { ReconciliationOrchestrator } from './copy-engine/reconciliation-orchestrator';
import { CopierScheduler } from './scheduler/copier-scheduler';

interface CliArgs {
    once: boolean;
    status: boolean;
    configPath?: string;
}

function parseArgs(argv: string[]): CliArgs {
    const args: CliArgs = { once: false, status: false };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === '--once') {
            args.once = true;
        } else if (arg === '--status') {
            args.status = true;
        } else if (arg === '--config') {
            const value = argv[++i];
            if (!value) throw new Error('--config needs a path');
            args.configPath = value;
        } else if (arg.startsWith('--config=')) {
            args.configPath = arg.slice('--config='.length);
        } else {
            throw new Error(`Unknown argument: ${arg}`);
        }
    }
    return args;
}

function printStatus(store: RelationshipStore): void {
    const relationships = store.loadAll();
    const byVenue = new Map<string, Record<string, number>>();
    for (const rel of relationships) {
        const counts = byVenue.get(rel.targetVenue) ?? {};
        counts[rel.state] = (counts[rel.state] ?? 0) + 1;
        byVenue.set(rel.targetVenue, counts);
    }

    logger.info(`[Main] ${relationships.length} tracked relationships`);
    for (const [venue, counts] of byVenue) {
        const parts = Object.entries(counts).map(([state, n]) => `${state}=${n}`).join(' ');
        logger.info(`[Main]   ${venue}: ${parts}`);
    }
    for (const rel of relationships.filter(r => r.state === 'ORPHAN_SUSPECTED')) {
        logger.info(`[Main]   orphan suspected: ${rel.targetVenue} tag ${rel.tag} missing ${rel.consecutiveMissingRuns} runs`);
    }

    for (const run of store.getRecentRuns(10)) {
        const t = run.summary.totals;
        logger.info(
            `[Main] ${run.summary.startedAt} ${run.status.padEnd(18)} created=${t.created} updated=${t.updated} ` +
            `cleared=${t.orphansCleared} flagged=${t.orphansFlagged} errors=${t.errors}`
        );
    }
}

async function main(): Promise<number> {
    const args = parseArgs(process.argv.slice(2));

    const configManager = new ConfigManager(args.configPath);
    const config = configManager.load();
    configureLogging(config.logging);

    logger.info('═══════════════════════════════════════════════════════════');
    logger.info('  Pending Order Copier - Starting');
    logger.info(`  Source ${config.source.name} -> ${config.targets.map(t => t.name).join(', ')}`);
    logger.info('═══════════════════════════════════════════════════════════');
    logger.info(`[Main] Config loaded from ${configManager.getPath()}`);

    const store = new RelationshipStore(config.state.dbPath);
    store.initialize();

    try {
        if (args.status) {
            printStatus(store);
            return 0;
        }

        if (process.env.MESSAGE_BUS_ENABLED === 'true') {
            try {
                await messageBus.connect();
            } catch (error) {
                logger.warn('[Main] Message bus unavailable, continuing without events:', error);
            }
        }

        const gateway = HttpTerminalGateway.fromConfig(config);
        const orchestrator = new ReconciliationOrchestrator(config, { gateway, store });

        if (args.once) {
            const controller = new AbortController();
            const abort = (signal: string) => {
                logger.info(`[Main] Received ${signal}, stopping after the current target`);
                controller.abort();
            };
            process.once('SIGINT', () => abort('SIGINT'));
            process.once('SIGTERM', () => abort('SIGTERM'));

            const summary = await orchestrator.runOnce(controller.signal);
            return summary.status === 'COMPLETED' ? 0 : 2;
        }

        const scheduler = new CopierScheduler(orchestrator, config.schedule);
        const shutdown = (signal: string) => {
            logger.info(`[Main] Received ${signal}, shutting down...`);
            scheduler.stop();
        };
        process.once('SIGINT', () => shutdown('SIGINT'));
        process.once('SIGTERM', () => shutdown('SIGTERM'));

        await scheduler.start();
        return scheduler.getFatalError() ? 1 : 0;
    } finally {
        store.close();
        await messageBus.disconnect();
    }
}

process.on('unhandledRejection', (reason) => {
    logger.error('[Main] Unhandled Rejection:', reason);
});

main()
    .then(code => {
        logger.info(`[Main] Exiting with code ${code}`);
        process.exit(code);
    })
    .catch(error => {
        if (error instanceof StateCorruptionError) {
            logger.error(`[Main] Relationship ledger unusable: ${error.message}`);
        } else {
            logger.error(`[Main] Fatal error: ${errorMessage(error)}`);
        }
        process.exit(1);
    });
