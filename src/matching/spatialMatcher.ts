/**
 * Keyboard pattern matcher
 *
 * Walks each adjacency graph looking for runs of keys where every key
 * touches the previous one ("qwerty", "zxcvb", "7531").
 */

import type {
  AdjacencyGraph,
  AdjacencyGraphs,
  SpatialMatchFields,
} from "@/types";
import { MIN_SPATIAL_LENGTH, SHIFTED_CHARS_PATTERN } from "@/constants";

/**
 * Scans the password for runs on a single graph.
 *
 * A run is extended while the next character appears in one of the
 * neighbour tokens of the current one. Each change of direction counts
 * as a turn; characters found in the shifted half of a key token count
 * as shifted.
 */
function spatialMatchHelper(
  password: string,
  graph: AdjacencyGraph,
): SpatialMatchFields[] {
  const matches: SpatialMatchFields[] = [];
  let i = 0;

  while (i < password.length - 1) {
    let j = i + 1;
    let lastDirection: number | null = null;
    let turns = 0;
    let shiftedCount =
      graph.shiftAware && SHIFTED_CHARS_PATTERN.test(password[i]) ? 1 : 0;

    for (;;) {
      const adjacents = graph.neighbours.get(password[j - 1]) ?? [];
      let found = false;

      if (j < password.length) {
        const current = password[j];
        for (let direction = 0; direction < adjacents.length; direction++) {
          const adjacent = adjacents[direction];
          if (adjacent === null || !adjacent.includes(current)) {
            continue;
          }
          found = true;
          if (adjacent.indexOf(current) === 1) {
            shiftedCount += 1;
          }
          if (lastDirection !== direction) {
            turns += 1;
            lastDirection = direction;
          }
          break;
        }
      }

      if (found) {
        j += 1;
        continue;
      }

      if (j - i >= MIN_SPATIAL_LENGTH) {
        matches.push({
          pattern: "spatial",
          i,
          j: j - 1,
          token: password.slice(i, j),
          graph: graph.name,
          turns,
          shiftedCount,
          startingPositions: graph.startingPositions,
          averageDegree: graph.averageDegree,
        });
      }
      i = j;
      break;
    }
  }

  return matches;
}

/**
 * Finds keyboard runs of length >= 3 on every graph in the snapshot.
 *
 * @param password - Password to scan
 * @param graphs - Adjacency graphs from the snapshot
 * @returns Spatial matches sorted by (i, j)
 */
export function spatialMatch(
  password: string,
  graphs: AdjacencyGraphs,
): SpatialMatchFields[] {
  const matches: SpatialMatchFields[] = [];
  for (const graph of Object.values(graphs)) {
    matches.push(...spatialMatchHelper(password, graph));
  }
  return matches.sort((a, b) => a.i - b.i || a.j - b.j);
}
