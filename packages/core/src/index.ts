export * from "./config.js";
export * from "./defaults.js";
export * from "./errors.js";
export * from "./latency.js";
export * from "./logger.js";
export * from "./resourceProbe.js";
export * from "./ringBuffer.js";
export * from "./sampler.js";
export * from "./simulate.js";
export * from "./timeline.js";
export * from "./trace.js";
export * from "./traceFile.js";
export * from "./traceStore.js";
export * from "./utils.js";
