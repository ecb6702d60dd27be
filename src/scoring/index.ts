export * from "./guessEstimators";
export * from "./optimizer";
export * from "./scoreClassifier";
export * from "./timeEstimator";
