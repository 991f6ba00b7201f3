/**
 * Reconciliation Orchestrator Tests
 * Full runs against the paper gateway and an in-memory relationship store
 */

import { ReconciliationOrchestrator } from '../../src/copy-engine/reconciliation-orchestrator';
import { RelationshipStore } from '../../src/data/relationship-store';
import { PaperTerminalGateway } from '../../src/gateway/paper-terminal-gateway';
import { StateCorruptionError } from '../../src/shared/errors';
import { Channel } from '../../src/shared/message-bus';
import { TerminalConfig } from '../../src/shared/types';
import {
    copierConfig,
    order,
    position,
    recordingEvents,
    relationship,
    terminalConfig,
} from '../helpers/fixtures';

jest.mock('../../src/shared/logger', () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
}));

describe('ReconciliationOrchestrator', () => {
    let gateway: PaperTerminalGateway;
    let store: RelationshipStore;
    let events: ReturnType<typeof recordingEvents>;

    function orchestrator(targets: TerminalConfig[] = [terminalConfig()]): ReconciliationOrchestrator {
        return new ReconciliationOrchestrator(copierConfig(targets), { gateway, store, events });
    }

    function targetCalls(venue: string = 'target-a'): string[] {
        return gateway.mutatingCalls(venue).map(call => `${call.operation}${call.id ? ` ${call.id}` : ''}`);
    }

    beforeEach(() => {
        gateway = new PaperTerminalGateway().addVenue('source').addVenue('target-a');
        store = new RelationshipStore(':memory:');
        store.initialize();
        events = recordingEvents();
    });

    afterEach(() => {
        store.close();
    });

    describe('scenario A: a new limit order is copied', () => {

        it('should submit one scaled copy tagged with the source id', async () => {
            gateway.putOrder('source', order('100', { instrument: 'EURUSD', size: 1.0 }));
            const copier = orchestrator([terminalConfig({ lotMultiplier: 0.5, allowedOrderTypes: ['BUY_LIMIT'] })]);

            const summary = await copier.runOnce();

            const calls = gateway.mutatingCalls('target-a');
            expect(calls).toHaveLength(1);
            expect(calls[0].operation).toBe('submitOrder');
            expect(calls[0].payload).toMatchObject({ tag: '100', size: 0.5, instrument: 'EURUSD', orderType: 'BUY_LIMIT' });

            expect(summary.status).toBe('COMPLETED');
            expect(summary.totals).toEqual({ created: 1, updated: 0, orphansCleared: 0, orphansFlagged: 0, errors: 0 });

            const [rel] = store.getRelationships('target-a');
            expect(rel).toMatchObject({ tag: '100', state: 'PENDING', entityKind: 'ORDER', targetEntityId: '1000' });
            expect(rel.appliedParams.size).toBe(0.5);
        });

        it('should translate mapped symbols before submitting', async () => {
            gateway.addVenue('target-a', { instruments: ['GOLD'] });
            gateway.putOrder('source', order('100', { instrument: 'XAUUSD' }));

            await orchestrator([terminalConfig({ symbolMapping: { XAUUSD: 'GOLD' } })]).runOnce();

            expect(gateway.getOrders('target-a').map(o => o.instrument)).toEqual(['GOLD']);
        });
    });

    describe('scenario B: orphan removed after the threshold', () => {

        it('should close the position on the third consecutive miss only', async () => {
            gateway.putPosition('target-a', { ...position('t1'), tag: '100' });
            store.replaceTarget('target-a', [
                relationship('100', { state: 'ACTIVE', entityKind: 'POSITION', targetEntityId: 't1' }),
            ]);
            const copier = orchestrator([terminalConfig({ orphanPolicy: { act: true, thresholdRuns: 3 } })]);

            await copier.runOnce();
            expect(targetCalls()).toEqual([]);
            expect(store.getRelationships('target-a')[0]).toMatchObject({ state: 'ORPHAN_SUSPECTED', consecutiveMissingRuns: 1 });

            await copier.runOnce();
            expect(targetCalls()).toEqual([]);
            expect(store.getRelationships('target-a')[0].consecutiveMissingRuns).toBe(2);

            const third = await copier.runOnce();
            expect(targetCalls()).toEqual(['closePosition t1']);
            expect(third.totals.orphansCleared).toBe(1);
            expect(store.getRelationships('target-a')).toEqual([]);
        });
    });

    describe('scenario C: the source order comes back', () => {

        it('should reset the streak and never clean up', async () => {
            gateway.putPosition('target-a', { ...position('t1'), tag: '100' });
            store.replaceTarget('target-a', [
                relationship('100', { state: 'ACTIVE', entityKind: 'POSITION', targetEntityId: 't1' }),
            ]);
            const copier = orchestrator([terminalConfig({ orphanPolicy: { act: true, thresholdRuns: 3 } })]);

            await copier.runOnce();
            await copier.runOnce();
            expect(store.getRelationships('target-a')[0]).toMatchObject({ state: 'ORPHAN_SUSPECTED', consecutiveMissingRuns: 2 });

            gateway.putOrder('source', order('100'));
            await copier.runOnce();

            expect(store.getRelationships('target-a')[0]).toMatchObject({ state: 'ACTIVE', consecutiveMissingRuns: 0 });
            expect(targetCalls()).toEqual([]);
            expect(events.published.filter(e => e.channel === Channel.ORPHAN_CLEARED)).toHaveLength(1);
        });
    });

    describe('scenario D: pending order cap', () => {

        it('should reject the new order with a cardinality reason', async () => {
            for (let i = 0; i < 50; i++) {
                gateway.putOrder('target-a', order(`m${i}`));
            }
            gateway.putOrder('source', order('100'));
            const copier = orchestrator([terminalConfig({ maxPendingOrders: { enabled: true, limit: 50 } })]);

            const summary = await copier.runOnce();

            expect(targetCalls()).toEqual([]);
            expect(summary.targets[0].rejected).toEqual([
                { tag: '100', instrument: 'EURUSD', stage: 'CARDINALITY', reason: 'pending order limit reached (50/50)' },
            ]);
            expect(store.getRelationships('target-a')).toEqual([]);
        });

        it('should count copies made earlier in the same run against the cap', async () => {
            gateway.putOrder('target-a', order('m0'));
            gateway.putOrder('source', order('100'));
            gateway.putOrder('source', order('101'));
            const copier = orchestrator([terminalConfig({ maxPendingOrders: { enabled: true, limit: 2 } })]);

            const summary = await copier.runOnce();

            expect(summary.targets[0].created).toBe(1);
            expect(summary.targets[0].rejected.map(r => r.tag)).toEqual(['101']);
        });
    });

    describe('idempotence', () => {

        it('should issue nothing on a second run over an unchanged source', async () => {
            gateway.putOrder('source', order('100'));
            gateway.putOrder('source', order('101', { side: 'SELL', orderType: 'SELL_STOP', stopLoss: 1.09, takeProfit: 1.07 }));
            gateway.putPosition('source', position('900'));
            const copier = orchestrator();

            await copier.runOnce();
            const before = gateway.mutatingCalls().length;
            const second = await copier.runOnce();

            expect(before).toBe(2);
            expect(gateway.mutatingCalls()).toHaveLength(before);
            expect(second.totals).toEqual({ created: 0, updated: 0, orphansCleared: 0, orphansFlagged: 0, errors: 0 });
        });
    });

    describe('updates', () => {

        it('should send only the changed field and remember it', async () => {
            gateway.putOrder('source', order('100'));
            const copier = orchestrator();
            await copier.runOnce();

            gateway.putOrder('source', order('100', { stopLoss: 1.07 }));
            const second = await copier.runOnce();

            const modify = gateway.mutatingCalls('target-a').filter(c => c.operation === 'modifyOrder');
            expect(modify).toEqual([{ venue: 'target-a', operation: 'modifyOrder', id: '1000', payload: { stopLoss: 1.07 } }]);
            expect(second.totals.updated).toBe(1);
            expect(store.getRelationships('target-a')[0].appliedParams.stopLoss).toBe(1.07);

            await copier.runOnce();
            expect(gateway.mutatingCalls('target-a')).toHaveLength(2);
        });

        it('should follow a triggered order and keep syncing SL/TP on the position', async () => {
            gateway.putOrder('source', order('100'));
            const copier = orchestrator();
            await copier.runOnce();

            gateway.triggerOrder('source', '100');
            gateway.triggerOrder('target-a', '1000');
            await copier.runOnce();
            expect(store.getRelationships('target-a')[0]).toMatchObject({ state: 'ACTIVE', entityKind: 'POSITION' });

            gateway.putPosition('source', position('100', { takeProfit: 1.1 }));
            await copier.runOnce();

            const modify = gateway.mutatingCalls('target-a').filter(c => c.operation === 'modifyPosition');
            expect(modify).toEqual([{ venue: 'target-a', operation: 'modifyPosition', id: '1000', payload: { takeProfit: 1.1 } }]);
        });

        it('should not treat a copy that triggered before its source as an orphan', async () => {
            gateway.putOrder('source', order('100'));
            const copier = orchestrator([terminalConfig({ orphanPolicy: { act: true, thresholdRuns: 1 } })]);
            await copier.runOnce();

            gateway.triggerOrder('target-a', '1000');
            await copier.runOnce();

            expect(targetCalls()).toEqual(['submitOrder']);
            expect(store.getRelationships('target-a')[0]).toMatchObject({ state: 'ACTIVE', consecutiveMissingRuns: 0 });
        });
    });

    describe('relationships', () => {

        it('should keep at most one relationship per tag when the target carries duplicates', async () => {
            gateway.putOrder('source', order('100'));
            gateway.putOrder('target-a', { ...order('t1'), tag: '100' });
            gateway.putPosition('target-a', { ...position('t2'), tag: '100' });
            const copier = orchestrator();

            await copier.runOnce();
            await copier.runOnce();

            const rels = store.getRelationships('target-a');
            expect(rels).toHaveLength(1);
            expect(rels[0]).toMatchObject({ tag: '100', targetEntityId: 't2', state: 'ACTIVE' });
            expect(targetCalls()).toEqual([]);
        });

        it('should close a relationship whose copy was removed by hand and copy again next run', async () => {
            gateway.putOrder('source', order('100'));
            const copier = orchestrator();
            await copier.runOnce();

            gateway.removeOrder('target-a', '1000');
            await copier.runOnce();
            expect(store.getRelationships('target-a')).toEqual([]);
            expect(targetCalls()).toEqual(['submitOrder']);

            await copier.runOnce();
            expect(targetCalls()).toEqual(['submitOrder', 'submitOrder']);
        });

        it('should never touch untagged entities', async () => {
            gateway.putOrder('target-a', order('manual'));
            gateway.putPosition('target-a', position('manual-pos'));
            const copier = orchestrator([terminalConfig({ orphanPolicy: { act: true, thresholdRuns: 1 } })]);

            await copier.runOnce();

            expect(targetCalls()).toEqual([]);
            expect(store.getRelationships('target-a')).toEqual([]);
        });
    });

    describe('orphan policy', () => {

        it('should only flag orphans when the policy does not act', async () => {
            gateway.putOrder('target-a', { ...order('t1'), tag: '100' });
            const copier = orchestrator([terminalConfig({ orphanPolicy: { act: false, thresholdRuns: 1 } })]);

            await copier.runOnce();
            const second = await copier.runOnce();

            expect(targetCalls()).toEqual([]);
            expect(second.totals.orphansFlagged).toBe(1);
            expect(store.getRelationships('target-a')[0]).toMatchObject({ state: 'ORPHAN_SUSPECTED', consecutiveMissingRuns: 2 });
        });

        it('should retry a failed cleanup on the next run', async () => {
            gateway.putPosition('target-a', { ...position('t1'), tag: '100' });
            gateway.failNext('target-a', 'closePosition', { reject: 'market closed' });
            const copier = orchestrator([terminalConfig({ orphanPolicy: { act: true, thresholdRuns: 1 } })]);

            const first = await copier.runOnce();
            expect(first.targets[0].rejected).toEqual([
                { tag: '100', instrument: 'EURUSD', stage: 'CLEANUP', reason: 'market closed' },
            ]);
            expect(store.getRelationships('target-a')[0]).toMatchObject({ state: 'ORPHAN_SUSPECTED', consecutiveMissingRuns: 1 });

            const second = await copier.runOnce();
            expect(second.totals.orphansCleared).toBe(1);
            expect(gateway.getPositions('target-a')).toEqual([]);
            expect(store.getRelationships('target-a')).toEqual([]);
        });

        it('should cancel every entity carrying an orphaned tag', async () => {
            gateway.putOrder('target-a', { ...order('t1'), tag: '100' });
            gateway.putPosition('target-a', { ...position('t2'), tag: '100' });
            const copier = orchestrator([terminalConfig({ orphanPolicy: { act: true, thresholdRuns: 1 } })]);

            await copier.runOnce();

            expect(targetCalls()).toEqual(['cancelOrder t1', 'closePosition t2']);
        });
    });

    describe('target precision', () => {

        beforeEach(() => {
            gateway.addVenue('target-a', { digits: 3 });
        });

        it('should submit prices rounded to the target digits and remember them', async () => {
            gateway.putOrder('source', order('100', { entryPrice: 1.08512, stopLoss: 1.07988, takeProfit: null }));

            await orchestrator().runOnce();

            expect(gateway.mutatingCalls('target-a')[0].payload).toMatchObject({
                entryPrice: 1.085,
                stopLoss: 1.08,
                takeProfit: null,
            });
            expect(store.getRelationships('target-a')[0].appliedParams).toMatchObject({ entryPrice: 1.085, stopLoss: 1.08 });
        });

        it('should not modify a copy over differences below the target precision', async () => {
            gateway.putOrder('source', order('100', { entryPrice: 1.08512 }));
            const copier = orchestrator();

            await copier.runOnce();
            const second = await copier.runOnce();

            expect(targetCalls()).toEqual(['submitOrder']);
            expect(second.totals.updated).toBe(0);
        });

        it('should send a visible change at the target precision', async () => {
            gateway.putOrder('source', order('100', { entryPrice: 1.08512 }));
            const copier = orchestrator();
            await copier.runOnce();

            gateway.putOrder('source', order('100', { entryPrice: 1.08512, stopLoss: 1.0791 }));
            const summary = await copier.runOnce();

            const modify = gateway.mutatingCalls('target-a')[1];
            expect(modify).toEqual({ venue: 'target-a', operation: 'modifyOrder', id: '1000', payload: { stopLoss: 1.079 } });
            expect(summary.totals.updated).toBe(1);
            expect(store.getRelationships('target-a')[0].appliedParams.stopLoss).toBe(1.079);
        });
    });

    describe('orphaned positions', () => {

        it('should cancel orphaned orders but only flag positions when positions are excluded', async () => {
            gateway.putOrder('target-a', { ...order('t1'), tag: '100' });
            gateway.putPosition('target-a', { ...position('t2'), tag: '200' });
            const config = terminalConfig({ orphanPolicy: { act: true, actOnPositions: false, thresholdRuns: 1 } });

            const summary = await orchestrator([config]).runOnce();

            expect(targetCalls()).toEqual(['cancelOrder t1']);
            expect(summary.totals).toMatchObject({ orphansCleared: 1, orphansFlagged: 1 });
            expect(store.getRelationships('target-a')).toEqual([
                expect.objectContaining({ tag: '200', state: 'ORPHAN_SUSPECTED', entityKind: 'POSITION', consecutiveMissingRuns: 1 }),
            ]);
        });
    });

    describe('failures', () => {

        it('should record a rejected submission and carry on with the next candidate', async () => {
            gateway.putOrder('source', order('100'));
            gateway.putOrder('source', order('101'));
            gateway.failNext('target-a', 'submitOrder', { reject: 'trading disabled' });

            const summary = await orchestrator().runOnce();

            expect(summary.targets[0]).toMatchObject({ status: 'OK', created: 1, errors: 1 });
            expect(summary.targets[0].rejected).toEqual([
                { tag: '100', instrument: 'EURUSD', stage: 'SUBMISSION', reason: 'trading disabled' },
            ]);
            expect(store.getRelationships('target-a').map(r => r.tag)).toEqual(['101']);
        });

        it('should skip an unreachable target, leave its ledger alone and process the others', async () => {
            gateway.addVenue('target-b');
            gateway.putOrder('source', order('100'));
            store.replaceTarget('target-a', [relationship('555', { consecutiveMissingRuns: 1, state: 'ORPHAN_SUSPECTED' })]);
            gateway.failNext('target-a', 'listPendingOrders', 'CONNECTION');

            const summary = await orchestrator([terminalConfig(), terminalConfig({ name: 'target-b' })]).runOnce();

            expect(summary.status).toBe('PARTIAL');
            expect(summary.targets.map(t => t.status)).toEqual(['CONNECTION_ERROR', 'OK']);
            expect(store.getRelationships('target-a')).toEqual([
                relationship('555', { consecutiveMissingRuns: 1, state: 'ORPHAN_SUSPECTED' }),
            ]);
            expect(targetCalls('target-b')).toEqual(['submitOrder']);
        });

        it('should report an auth failure on listing', async () => {
            gateway.failNext('target-a', 'listPositions', 'AUTH');

            const summary = await orchestrator().runOnce();

            expect(summary.targets[0].status).toBe('AUTH_ERROR');
        });

        it('should commit what succeeded when the connection drops mid-target', async () => {
            gateway.putOrder('source', order('100'));
            gateway.putOrder('source', order('200', { stopLoss: 1.07 }));
            gateway.putOrder('target-a', { ...order('t2'), tag: '200' });
            store.replaceTarget('target-a', [relationship('200', { targetEntityId: 't2' })]);
            gateway.failNext('target-a', 'modifyOrder', 'CONNECTION');

            const summary = await orchestrator().runOnce();

            expect(summary.targets[0]).toMatchObject({ status: 'FAILED', created: 1, updated: 0 });
            const rels = store.getRelationships('target-a');
            expect(rels.map(r => r.tag)).toEqual(['100', '200']);
            expect(rels[1].appliedParams.stopLoss).toBe(1.08);
        });

        it('should not touch any target when the source cannot be read', async () => {
            gateway.putOrder('target-a', { ...order('t1'), tag: '100' });
            gateway.failNext('source', 'listPendingOrders', 'CONNECTION');

            const summary = await orchestrator([terminalConfig({ orphanPolicy: { act: true, thresholdRuns: 1 } })]).runOnce();

            expect(summary.status).toBe('SOURCE_UNAVAILABLE');
            expect(gateway.calls.filter(c => c.venue === 'target-a')).toEqual([]);
        });

        it('should abort before any gateway call when the ledger is corrupt', async () => {
            jest.spyOn(store, 'loadAll').mockImplementation(() => {
                throw new StateCorruptionError('malformed relationship row');
            });
            const prune = jest.spyOn(store, 'pruneVenues');

            await expect(orchestrator().runOnce()).rejects.toThrow('malformed relationship row');
            expect(prune).not.toHaveBeenCalled();
            expect(gateway.calls).toEqual([]);
            expect(events.published.map(e => e.channel)).toEqual([Channel.RUN_START, Channel.RUN_ABORTED]);
        });

        it('should abort the run when a commit fails', async () => {
            gateway.putOrder('source', order('100'));
            jest.spyOn(store, 'replaceTarget').mockImplementation(() => {
                throw new Error('disk full');
            });

            await expect(orchestrator().runOnce()).rejects.toThrow(
                new StateCorruptionError('failed to commit relationships of target-a: disk full')
            );
        });
    });

    describe('run bookkeeping', () => {

        it('should stop at the next target boundary when aborted', async () => {
            gateway.addVenue('target-b');
            gateway.putOrder('source', order('100'));
            const controller = new AbortController();
            const publish = events.publish;
            events.publish = async (channel, data) => {
                if (channel === Channel.ORDER_COPIED) controller.abort();
                return publish(channel, data);
            };

            const summary = await orchestrator([terminalConfig(), terminalConfig({ name: 'target-b' })])
                .runOnce(controller.signal);

            expect(summary.status).toBe('ABORTED');
            expect(summary.targets.map(t => t.status)).toEqual(['OK', 'SKIPPED']);
            expect(gateway.calls.filter(c => c.venue === 'target-b')).toEqual([]);
        });

        it('should store and publish the run summary', async () => {
            gateway.putOrder('source', order('100'));

            const summary = await orchestrator().runOnce();

            expect(store.getRecentRuns(1)[0]).toEqual({ runId: summary.runId, status: 'COMPLETED', summary });
            expect(events.published.map(e => e.channel)).toEqual([
                Channel.RUN_START,
                Channel.ORDER_COPIED,
                Channel.RUN_COMPLETE,
            ]);
            expect(summary.sourceOrders).toBe(1);
            expect(summary.sourcePositions).toBe(0);
        });

        it('should prune relationships of targets no longer configured', async () => {
            store.replaceTarget('retired', [relationship('1', { targetVenue: 'retired' })]);

            await orchestrator().runOnce();

            expect(store.getRelationships('retired')).toEqual([]);
        });
    });
});
