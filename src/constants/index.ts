/**
 * Constants barrel exports
 */

export * from "./logger";
export * from "./dictionaries";
export * from "./keyboards";
export * from "./matching";
export * from "./scoring";
export * from "./timeEstimates";
export * from "./evaluation";
