export type AccessStrategy = "memory" | "mapped" | "streaming";

export interface StrategyThresholds {
    memoryThreshold: number;
    mmapThreshold: number;
}

/**
 * Size based choice of read technique. Each threshold belongs to the strategy
 * above it: a file of exactly `memoryThreshold` bytes is read `mapped`.
 */
export class StrategySelector {
    private readonly memoryThreshold: number;
    private readonly mmapThreshold: number;

    constructor(thresholds: StrategyThresholds) {
        if (thresholds.mmapThreshold < thresholds.memoryThreshold) {
            throw new RangeError(
                `mmapThreshold (${thresholds.mmapThreshold}) must not be below memoryThreshold (${thresholds.memoryThreshold})`
            );
        }
        this.memoryThreshold = thresholds.memoryThreshold;
        this.mmapThreshold = thresholds.mmapThreshold;
    }

    public select(size: number): AccessStrategy {
        if (!Number.isSafeInteger(size) || size < 0) {
            throw new RangeError(`File size must be a non-negative integer, got ${size}`);
        }
        if (size < this.memoryThreshold) {
            return "memory";
        }
        if (size < this.mmapThreshold) {
            return "mapped";
        }
        return "streaming";
    }
}
