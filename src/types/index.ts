export * from "./logger";
export * from "./dictionaries";
export * from "./keyboards";
export * from "./match";
export * from "./snapshot";
export * from "./timeEstimates";
export * from "./feedback";
export * from "./i18n";
export * from "./evaluation";
