export * from "./errors";
export * from "./passwordEstimator";
