/**
 * Public API
 */

export type * from "./types";
export { evaluate, assertWithinLength } from "./evaluate";
export { PasswordEstimator, LengthExceededError } from "./estimator";
export { resolveConfig } from "./config";
export {
  buildRankedDictionary,
  buildUserInputsDictionary,
  loadFrequencyLists,
} from "./dictionaries/loader";
export { DictionaryValidationError } from "./utils/dictionaryValidation";
export {
  ADJACENCY_GRAPHS,
  KeyboardLayoutError,
  buildAdjacencyGraph,
} from "./keyboards/adjacencyGraphs";
export { SnapshotStore, buildSnapshot, withUserInputs } from "./snapshot/snapshot";
export { omnimatch } from "./matching";
export {
  estimateAttackTimes,
  estimateGuesses,
  mostGuessableMatchSequence,
  scoreFromGuesses,
} from "./scoring";
export { getFeedback, renderFeedback } from "./feedback";
export {
  createTranslator,
  formatCrackTime,
  resolveLanguageChain,
} from "./i18n";
