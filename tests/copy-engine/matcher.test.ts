/**
 * Matcher Unit Tests
 */

import {
    computeChanges,
    diff,
    expiriesEqual,
    pricesEqual,
    sourceFingerprint,
} from '../../src/copy-engine/matcher';
import { SourceEntity, TargetEntity } from '../../src/shared/types';
import { order, position, relationship } from '../helpers/fixtures';

jest.mock('../../src/shared/logger', () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
}));

function tagged(entity: SourceEntity, tag: string | null): TargetEntity {
    return entity.kind === 'ORDER' ? { ...entity, tag } : { ...entity, tag };
}

describe('Matcher', () => {

    describe('diff - toCreate', () => {

        it('should create a source order with no copy and no relationship', () => {
            const result = diff([order('100')], [], []);

            expect(result.toCreate.map(o => o.id)).toEqual(['100']);
            expect(result.toUpdate).toEqual([]);
            expect(result.toOrphanCheck).toEqual([]);
        });

        it('should never create source positions', () => {
            const result = diff([position('200')], [], []);

            expect(result.toCreate).toEqual([]);
        });

        it('should not create when a target entity already carries the tag', () => {
            const result = diff([order('100')], [tagged(order('t1'), '100')], []);

            expect(result.toCreate).toEqual([]);
            expect(result.matched).toHaveLength(1);
        });

        it('should not recreate while a live relationship exists for the tag', () => {
            const result = diff([order('100')], [], [relationship('100', { state: 'ORPHAN_SUSPECTED' })]);

            expect(result.toCreate).toEqual([]);
        });

        it('should ignore CLOSED relationships when deciding creation', () => {
            const result = diff([order('100')], [], [relationship('100', { state: 'CLOSED' })]);

            expect(result.toCreate.map(o => o.id)).toEqual(['100']);
        });

        it('should ignore untagged target entities', () => {
            const result = diff([order('100')], [tagged(order('manual-1'), null)], []);

            expect(result.toCreate.map(o => o.id)).toEqual(['100']);
            expect(result.toOrphanCheck).toEqual([]);
            expect(result.matched).toEqual([]);
        });
    });

    describe('diff - toUpdate', () => {

        it('should carry only the changed fields', () => {
            const source = order('100', { stopLoss: 1.075 });
            const target = tagged(order('t1'), '100');

            const result = diff([source], [target], [relationship('100')]);

            expect(result.toUpdate).toHaveLength(1);
            expect(result.toUpdate[0].changes).toEqual({ stopLoss: 1.075 });
        });

        it('should compare against the applied params, not the live target values', () => {
            // Target drifted by hand, source unchanged since last applied: nothing to do
            const source = order('100');
            const target = tagged(order('t1', { stopLoss: 1.07 }), '100');

            const result = diff([source], [target], [relationship('100')]);

            expect(result.toUpdate).toEqual([]);
        });

        it('should adopt the target values as baseline when no relationship exists', () => {
            const source = order('100', { takeProfit: 1.1 });
            const target = tagged(order('t1', { takeProfit: 1.1 }), '100');

            const result = diff([source], [target], []);

            expect(result.toUpdate).toEqual([]);
            expect(result.matched[0].relationship).toBeNull();
        });

        it('should treat prices within tolerance as equal', () => {
            const source = order('100', { entryPrice: 1.085000001 });

            const result = diff([source], [tagged(order('t1'), '100')], [relationship('100')]);

            expect(result.toUpdate).toEqual([]);
        });

        it('should report a cleared stop loss as null', () => {
            const source = order('100', { stopLoss: null });

            const result = diff([source], [tagged(order('t1'), '100')], [relationship('100')]);

            expect(result.toUpdate[0].changes).toEqual({ stopLoss: null });
        });

        it('should compare only SL/TP once the target copy is a position', () => {
            const source = order('100', { entryPrice: 1.09, takeProfit: 1.1 });
            const target = tagged(position('t1'), '100');

            const result = diff([source], [target], [relationship('100', { state: 'ACTIVE', entityKind: 'POSITION' })]);

            expect(result.toUpdate[0].changes).toEqual({ takeProfit: 1.1 });
        });

        it('should include expiry changes for orders', () => {
            const source = order('100', { expiry: '2024-06-01T00:00:00.000Z' });

            const result = diff([source], [tagged(order('t1'), '100')], [relationship('100')]);

            expect(result.toUpdate[0].changes).toEqual({ expiry: '2024-06-01T00:00:00.000Z' });
        });
    });

    describe('diff - toOrphanCheck and vanished', () => {

        it('should flag tagged target entities whose tag is not a source id', () => {
            const orphan = tagged(position('t9'), '900');

            const result = diff([], [orphan], [relationship('900', { state: 'ACTIVE' })]);

            expect(result.toOrphanCheck).toEqual([orphan]);
            expect(result.vanished).toEqual([]);
        });

        it('should list every duplicate carrying an orphaned tag', () => {
            const a = tagged(order('t1'), '900');
            const b = tagged(position('t2'), '900');

            const result = diff([], [a, b], []);

            expect(result.toOrphanCheck).toHaveLength(2);
        });

        it('should report relationships whose target entity is gone as vanished', () => {
            const rel = relationship('100');

            const result = diff([order('100')], [], [rel]);

            expect(result.vanished).toEqual([rel]);
            expect(result.toCreate).toEqual([]);
        });
    });

    describe('diff - id collisions', () => {

        it('should treat an order and a position sharing an id as one entity, preferring the position', () => {
            const result = diff(
                [order('100'), position('100', { stopLoss: 1.07 })],
                [tagged(order('t1'), '100')],
                [relationship('100')]
            );

            expect(result.matched).toHaveLength(1);
            expect(result.matched[0].source.kind).toBe('POSITION');
            expect(result.toCreate).toEqual([]);
            expect(result.toUpdate[0].changes).toEqual({ stopLoss: 1.07 });
        });

        it('should match the position when a tag is duplicated on the target', () => {
            const result = diff(
                [position('100')],
                [tagged(order('t1'), '100'), tagged(position('t2'), '100')],
                []
            );

            expect(result.matched).toHaveLength(1);
            expect(result.matched[0].target.id).toBe('t2');
        });
    });

    describe('partial update minimality', () => {

        it('should never include a field equal to the baseline', () => {
            const baseline = relationship('100').appliedParams;
            const variants = [
                order('100', { entryPrice: 1.2 }),
                order('100', { stopLoss: 1.0 }),
                order('100', { takeProfit: null }),
                order('100', { expiry: '2030-01-01T00:00:00Z' }),
                order('100', { entryPrice: 1.2, takeProfit: 1.3 }),
            ];

            for (const source of variants) {
                const changes = computeChanges(source, tagged(order('t1'), '100'), baseline);
                expect(Object.keys(changes).length).toBeGreaterThan(0);
                if ('entryPrice' in changes) expect(changes.entryPrice).not.toBe(baseline.entryPrice);
                if ('stopLoss' in changes) expect(changes.stopLoss).not.toBe(baseline.stopLoss);
                if ('takeProfit' in changes) expect(changes.takeProfit).not.toBe(baseline.takeProfit);
                if ('expiry' in changes) expect(changes.expiry).not.toBe(baseline.expiry);
            }
        });
    });

    describe('helpers', () => {

        it('should compare nullable prices', () => {
            expect(pricesEqual(null, null, 1e-5)).toBe(true);
            expect(pricesEqual(null, 1.1, 1e-5)).toBe(false);
            expect(pricesEqual(1.10002, 1.1, 1e-5)).toBe(false);
            expect(pricesEqual(1.100001, 1.1, 1e-5)).toBe(true);
        });

        it('should compare expiries as instants', () => {
            expect(expiriesEqual('2024-06-01T00:00:00Z', '2024-06-01T00:00:00.000Z')).toBe(true);
            expect(expiriesEqual('2024-06-01T00:00:00Z', null)).toBe(false);
        });

        it('should fingerprint instrument and side', () => {
            expect(sourceFingerprint(order('1'))).toBe(sourceFingerprint(position('2')));
            expect(sourceFingerprint(order('1'))).not.toBe(sourceFingerprint(order('1', { side: 'SELL' })));
            expect(sourceFingerprint(order('1'))).toHaveLength(12);
        });
    });
});
