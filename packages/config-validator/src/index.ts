// @floodrisk/config-validator
// Admission control for the two configuration documents. Pure: text/objects in, typed
// config out. Reading files from disk is left to apps/assessor.

export * from "./errors";
export * from "./yaml/parse_yaml_document";
export * from "./gauges/gauge_config_validator";
export * from "./thresholds/thresholds_validator";
