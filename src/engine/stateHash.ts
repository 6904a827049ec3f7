import type { Position } from "../types";
import { positionKey } from "./position";

/**
 * Deterministic key of a joint position (all tracked tokens at one instant).
 * Used for visited-set pruning and replay verification.
 */
export function jointKey(positions: readonly Position[]): string {
  return positions.map(positionKey).join("|");
}
