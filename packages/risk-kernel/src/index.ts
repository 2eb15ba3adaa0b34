// @floodrisk/risk-kernel
// Entry point exports for the pure classification core.

export * from "./kernel";
export * from "./rainfall/accumulator";
export * from "./risk/levels";
export * from "./risk/bands";
export * from "./risk/classifier";
export * from "./stats/historical_stats";
