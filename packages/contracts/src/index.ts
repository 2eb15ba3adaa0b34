export * from "./schema/gauge_v1";
export * from "./schema/threshold_bands_v1";
export * from "./schema/stage_observation_v1";
export * from "./schema/precipitation_period_v1";
export * from "./schema/rainfall_estimate_v1";
export * from "./schema/risk_assessment_v1";
export * from "./schema/ingest_result_v1";
export * from "./schema/historical_v1";

export * from "./schema/assessment_run_v1"; // run document emitted by the CLI
