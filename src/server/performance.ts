export interface PerformanceMetric {
    operation: string;
    durationMs: number;
    // Document the operation worked on, when there is one
    uri?: string;
}

export interface OperationSummary {
    count: number;
    totalMs: number;
    avgMs: number;
    maxMs: number;
}

// Timing of indexing and queries; off unless enabled, then every measured call is recorded
export class PerformanceMonitor {
    private metrics: PerformanceMetric[] = [];
    private enabled: boolean = false;

    enable(): void {
        this.enabled = true;
        this.metrics = [];
    }

    disable(): void {
        this.enabled = false;
    }

    isEnabled(): boolean {
        return this.enabled;
    }

    measure<T>(operation: string, fn: () => T, uri?: string): T {
        if (!this.enabled) {
            return fn();
        }

        const start = performance.now();
        try {
            return fn();
        } finally {
            this.metrics.push({ operation, durationMs: performance.now() - start, uri });
        }
    }

    getMetrics(): PerformanceMetric[] {
        return [...this.metrics];
    }

    getSummary(): Record<string, OperationSummary> {
        const summary: Record<string, OperationSummary> = {};

        for (const metric of this.metrics) {
            const s = summary[metric.operation] ?? { count: 0, totalMs: 0, avgMs: 0, maxMs: 0 };
            s.count++;
            s.totalMs += metric.durationMs;
            s.maxMs = Math.max(s.maxMs, metric.durationMs);
            s.avgMs = s.totalMs / s.count;
            summary[metric.operation] = s;
        }

        return summary;
    }

    clear(): void {
        this.metrics = [];
    }
}

// Global instance
export const perfMonitor = new PerformanceMonitor();
