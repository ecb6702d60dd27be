/**
 * Keyboard adjacency graphs
 *
 * Builds the adjacency model of each supported input device from its
 * layout string once, at module load. The graphs are frozen and shared by
 * every evaluation.
 */

import type { AdjacencyGraph, AdjacencyGraphs, GraphName } from "@/types";
import {
  DVORAK_LAYOUT,
  KEYPAD_LAYOUT,
  MAC_KEYPAD_LAYOUT,
  QWERTY_LAYOUT,
} from "@/constants";

/**
 * Error thrown when a layout string cannot be mapped to a key grid.
 */
export class KeyboardLayoutError extends Error {
  constructor(message: string) {
    super(`Keyboard layout invalid: ${message}`);
    this.name = "KeyboardLayoutError";
  }
}

type Coord = readonly [number, number];

/**
 * Neighbours on a staggered keyboard, clockwise from the left:
 * left, upper-left, upper-right, right, lower-right, lower-left.
 */
function slantedNeighbourCoords(x: number, y: number): Coord[] {
  return [
    [x - 1, y],
    [x, y - 1],
    [x + 1, y - 1],
    [x + 1, y],
    [x, y + 1],
    [x - 1, y + 1],
  ];
}

/**
 * Neighbours on a grid keypad, clockwise from the left (8 directions).
 */
function alignedNeighbourCoords(x: number, y: number): Coord[] {
  return [
    [x - 1, y],
    [x - 1, y - 1],
    [x, y - 1],
    [x + 1, y - 1],
    [x + 1, y],
    [x + 1, y + 1],
    [x, y + 1],
    [x - 1, y + 1],
  ];
}

/**
 * Builds one adjacency graph from a layout string.
 *
 * Keys are whitespace-separated tokens of equal width. On slanted layouts
 * row y is indented by (y - 1) extra columns relative to the first key
 * row, which puts every key on an integer grid column.
 *
 * @param name - Graph identifier
 * @param layout - Layout string (first line empty)
 * @param slanted - Staggered keyboard (true) or aligned keypad (false)
 * @throws {KeyboardLayoutError} If token widths differ or a key is off-grid
 */
export function buildAdjacencyGraph(
  name: GraphName,
  layout: string,
  slanted: boolean,
): AdjacencyGraph {
  const tokens = layout.split(/\s+/).filter((t) => t.length > 0);
  if (tokens.length === 0) {
    throw new KeyboardLayoutError(`${name} has no keys`);
  }
  const tokenSize = tokens[0].length;
  if (tokens.some((t) => t.length !== tokenSize)) {
    throw new KeyboardLayoutError(`${name} mixes key widths`);
  }
  const xUnit = tokenSize + 1;

  const positions = new Map<string, string>();
  const coordKey = (x: number, y: number): string => `${x},${y}`;

  layout.split("\n").forEach((line, y) => {
    const slant = slanted ? y - 1 : 0;
    const linePattern = /\S+/g;
    for (const found of line.matchAll(linePattern)) {
      const column = (found.index ?? 0) - slant;
      if (column % xUnit !== 0) {
        throw new KeyboardLayoutError(
          `${name} key "${found[0]}" is not aligned on row ${y}`,
        );
      }
      positions.set(coordKey(column / xUnit, y), found[0]);
    }
  });

  const neighbourCoords = slanted
    ? slantedNeighbourCoords
    : alignedNeighbourCoords;
  const neighbours = new Map<string, readonly (string | null)[]>();
  for (const [key, token] of positions) {
    const [x, y] = key.split(",").map(Number);
    const adjacent = Object.freeze(
      neighbourCoords(x, y).map(
        ([nx, ny]) => positions.get(coordKey(nx, ny)) ?? null,
      ),
    );
    for (const char of token) {
      neighbours.set(char, adjacent);
    }
  }

  let degreeSum = 0;
  for (const adjacent of neighbours.values()) {
    degreeSum += adjacent.filter((n) => n !== null).length;
  }

  return Object.freeze({
    name,
    shiftAware: slanted,
    neighbours,
    startingPositions: neighbours.size,
    averageDegree: degreeSum / neighbours.size,
  });
}

export const ADJACENCY_GRAPHS: AdjacencyGraphs = Object.freeze({
  qwerty: buildAdjacencyGraph("qwerty", QWERTY_LAYOUT, true),
  dvorak: buildAdjacencyGraph("dvorak", DVORAK_LAYOUT, true),
  keypad: buildAdjacencyGraph("keypad", KEYPAD_LAYOUT, false),
  mac_keypad: buildAdjacencyGraph("mac_keypad", MAC_KEYPAD_LAYOUT, false),
});
