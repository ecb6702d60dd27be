/**
 * Snapshot type definitions
 */

import type { RankedDictionaries } from "./dictionaries";
import type { AdjacencyGraphs } from "./keyboards";

/**
 * Immutable tables shared by every evaluation.
 *
 * Built once, deep-frozen, and replaced as a whole when caller inputs
 * change. Matchers only ever read from it.
 */
export type Snapshot = {
  dictionaries: RankedDictionaries;
  graphs: AdjacencyGraphs;
};
