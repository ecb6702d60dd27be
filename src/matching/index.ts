export * from "./dictionaryMatcher";
export * from "./l33tMatcher";
export * from "./spatialMatcher";
export * from "./repeatMatcher";
export * from "./sequenceMatcher";
export * from "./regexMatcher";
export * from "./dateMatcher";
export * from "./omnimatch";
