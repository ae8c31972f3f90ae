export * from "./aggregator.js";
export * from "./config.js";
export * from "./correlator.js";
export * from "./decoders/index.js";
export * from "./defaults.js";
export * from "./diagnostics.js";
export * from "./discovery.js";
export * from "./errors.js";
export * from "./format.js";
export * from "./redaction.js";
export * from "./session.js";
export * from "./snapshot.js";
export * from "./store.js";
export * from "./taskEndReasons.js";
export * from "./utils.js";
