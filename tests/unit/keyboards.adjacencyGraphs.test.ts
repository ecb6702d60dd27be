/**
 * Unit tests for keyboard adjacency graphs
 */

import { describe, it, expect } from "vitest";
import {
  ADJACENCY_GRAPHS,
  KeyboardLayoutError,
  buildAdjacencyGraph,
} from "@/keyboards/adjacencyGraphs";

describe("ADJACENCY_GRAPHS", () => {
  it("should list slanted neighbours clockwise from the left", () => {
    expect(ADJACENCY_GRAPHS.qwerty.neighbours.get("g")).toEqual([
      "fF",
      "tT",
      "yY",
      "hH",
      "bB",
      "vV",
    ]);
  });

  it("should mark missing neighbours at the keyboard edge", () => {
    expect(ADJACENCY_GRAPHS.qwerty.neighbours.get("q")).toEqual([
      null,
      "1!",
      "2@",
      "wW",
      "aA",
      null,
    ]);
  });

  it("should share neighbours between shifted and unshifted characters", () => {
    const { neighbours } = ADJACENCY_GRAPHS.qwerty;

    expect(neighbours.get("G")).toBe(neighbours.get("g"));
  });

  it("should list aligned keypad neighbours in eight directions", () => {
    expect(ADJACENCY_GRAPHS.keypad.neighbours.get("5")).toEqual([
      "4",
      "7",
      "8",
      "9",
      "6",
      "3",
      "2",
      "1",
    ]);
  });

  it("should count starting positions per character", () => {
    expect(ADJACENCY_GRAPHS.qwerty.startingPositions).toBe(94);
    expect(ADJACENCY_GRAPHS.keypad.startingPositions).toBe(15);
    expect(ADJACENCY_GRAPHS.keypad.shiftAware).toBe(false);
  });
});

describe("buildAdjacencyGraph", () => {
  it("should reject layouts that mix key widths", () => {
    expect(() => buildAdjacencyGraph("keypad", "\n1 2\n33 4\n", false)).toThrow(
      KeyboardLayoutError,
    );
  });

  it("should reject misaligned keys", () => {
    expect(() => buildAdjacencyGraph("keypad", "\n1 2\n 3\n", false)).toThrow(
      'Keyboard layout invalid: keypad key "3" is not aligned on row 2',
    );
  });
});
