/**
 * Keyboard adjacency graph type definitions
 */

export type GraphName = "qwerty" | "dvorak" | "keypad" | "mac_keypad";

/**
 * Adjacency model of one input device.
 *
 * Each character maps to the key tokens around its key, one slot per
 * direction (null where there is no key). A token holds the unshifted
 * character first and the shifted one second ("qQ", "1!").
 */
export type AdjacencyGraph = {
  /** Graph identifier */
  name: GraphName;
  /** Whether shift state is meaningful for this device */
  shiftAware: boolean;
  /** Character → neighbour tokens in fixed direction order */
  neighbours: ReadonlyMap<string, readonly (string | null)[]>;
  /** Number of characters reachable on the device */
  startingPositions: number;
  /** Mean count of non-null neighbours per character */
  averageDegree: number;
};

export type AdjacencyGraphs = Readonly<Record<GraphName, AdjacencyGraph>>;
