import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { PerformanceMonitor, perfMonitor } from '../../src/server/performance';
import { BslWorkspace } from '../../src/server/workspace';
import { createDoc } from '../helpers/doc';

describe('PerformanceMonitor', () => {
    let monitor: PerformanceMonitor;

    beforeEach(() => {
        monitor = new PerformanceMonitor();
    });

    it('records nothing while disabled', () => {
        expect(monitor.isEnabled()).toBe(false);
        expect(monitor.measure('parse', () => 42)).toBe(42);
        expect(monitor.getMetrics()).toEqual([]);
    });

    it('records each measured call once enabled', () => {
        monitor.enable();
        monitor.measure('parse', () => 1, 'file:///a.bsl');
        monitor.measure('parse', () => 2);
        monitor.measure('query', () => 3);

        const metrics = monitor.getMetrics();
        expect(metrics.map(m => [m.operation, m.uri])).toEqual([
            ['parse', 'file:///a.bsl'],
            ['parse', undefined],
            ['query', undefined]
        ]);
        expect(metrics.every(m => m.durationMs >= 0)).toBe(true);
    });

    it('records calls that throw', () => {
        monitor.enable();
        expect(() => monitor.measure('parse', () => {
            throw new Error('boom');
        })).toThrow('boom');
        expect(monitor.getMetrics().map(m => m.operation)).toEqual(['parse']);
    });

    it('summarises durations per operation', () => {
        monitor.enable();
        monitor.measure('parse', () => 1);
        monitor.measure('parse', () => 2);
        monitor.measure('query', () => 3);

        const summary = monitor.getSummary();
        expect(Object.keys(summary).sort()).toEqual(['parse', 'query']);
        expect(summary.parse.count).toBe(2);
        expect(summary.parse.avgMs).toBeCloseTo(summary.parse.totalMs / 2);
        expect(summary.parse.maxMs).toBeLessThanOrEqual(summary.parse.totalMs);
        expect(summary.query.count).toBe(1);
    });

    it('starts over when re-enabled or cleared', () => {
        monitor.enable();
        monitor.measure('parse', () => 1);
        monitor.enable();
        expect(monitor.getMetrics()).toEqual([]);

        monitor.measure('parse', () => 1);
        monitor.clear();
        expect(monitor.getMetrics()).toEqual([]);

        monitor.disable();
        expect(monitor.isEnabled()).toBe(false);
    });
});

describe('workspace timing', () => {
    beforeEach(() => {
        perfMonitor.enable();
    });

    afterEach(() => {
        perfMonitor.disable();
        perfMonitor.clear();
    });

    it('measures indexing per document', () => {
        const workspace = new BslWorkspace();
        const uri = 'file:///timing.bsl';
        workspace.indexDocument(createDoc(['Procedure Run()', 'EndProcedure'], uri));

        expect(perfMonitor.getMetrics().map(m => [m.operation, m.uri])).toEqual([['indexDocument', uri]]);
    });
});
