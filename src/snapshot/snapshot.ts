/**
 * Dictionary/graph snapshots
 *
 * A snapshot bundles every table the matchers read. It is built in full,
 * frozen, and only then published, so an evaluation never sees a
 * partially built dictionary.
 */

import type {
  DictionaryName,
  FrequencyLists,
  RankedDictionary,
  Snapshot,
  UserInput,
} from "@/types";
import {
  buildRankedDictionary,
  buildUserInputsDictionary,
} from "@/dictionaries/loader";
import { ADJACENCY_GRAPHS } from "@/keyboards/adjacencyGraphs";
import { FREQUENCY_LIST_NAMES } from "@/constants";
import * as logger from "@/logger";

/**
 * Builds a frozen snapshot from frequency lists and optional caller words.
 *
 * @param lists - Ordered word lists (most frequent first)
 * @param userInputs - Caller words ranked as the `user_inputs` dictionary
 */
export function buildSnapshot(
  lists: FrequencyLists,
  userInputs: readonly UserInput[] = [],
): Snapshot {
  const dictionaries: Partial<Record<DictionaryName, RankedDictionary>> = {};
  for (const name of FREQUENCY_LIST_NAMES) {
    dictionaries[name] = buildRankedDictionary(lists[name]);
  }
  if (userInputs.length > 0) {
    dictionaries.user_inputs = buildUserInputsDictionary(userInputs);
  }

  return Object.freeze({
    dictionaries: Object.freeze(dictionaries),
    graphs: ADJACENCY_GRAPHS,
  });
}

/**
 * Returns a snapshot whose `user_inputs` dictionary also holds `inputs`.
 *
 * The given snapshot is left untouched; the frequency dictionaries and
 * graphs are shared by reference.
 */
export function withUserInputs(
  snapshot: Snapshot,
  inputs: readonly UserInput[],
): Snapshot {
  if (inputs.length === 0) {
    return snapshot;
  }
  return Object.freeze({
    dictionaries: Object.freeze({
      ...snapshot.dictionaries,
      user_inputs: buildUserInputsDictionary(
        inputs,
        snapshot.dictionaries.user_inputs,
      ),
    }),
    graphs: snapshot.graphs,
  });
}

/**
 * Holder for the currently published snapshot.
 *
 * Readers take the reference once per evaluation; `update` builds a new
 * snapshot completely before swapping the reference.
 */
export class SnapshotStore {
  private current: Snapshot;

  constructor(
    private readonly lists: FrequencyLists,
    userInputs: readonly UserInput[] = [],
  ) {
    this.current = buildSnapshot(lists, userInputs);
  }

  get(): Snapshot {
    return this.current;
  }

  /**
   * Rebuilds the snapshot around a new set of caller words and publishes it.
   *
   * @returns The newly published snapshot
   */
  update(userInputs: readonly UserInput[]): Snapshot {
    const next = buildSnapshot(this.lists, userInputs);
    this.current = next;
    logger.info("Dictionary snapshot published", {
      userInputs: next.dictionaries.user_inputs?.size ?? 0,
    });
    return next;
  }
}
