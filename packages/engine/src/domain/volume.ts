import { floorToStep, roundToStep } from "@ratchet/kit";
import type { SymbolSpec } from "../types/broker.js";
import { RoundingInfeasibleError } from "./errors.js";

export interface PartialClosePlan {
  closeVolume: number;
  remainingVolume: number;
}

// Tolerance for comparing step-rounded lot sizes
const LOT_EPSILON = 1e-9;

/**
 * Splits `volume` into a close leg of `fraction` (rounded down to the step) and a remainder.
 * Throws RoundingInfeasibleError when either leg would fall under the broker minimum.
 */
export function planPartialClose(
  volume: number,
  fraction: number,
  spec: Pick<SymbolSpec, "volumeMin" | "volumeStep">,
): PartialClosePlan {
  const closeVolume = floorToStep(volume * fraction, spec.volumeStep);
  if (closeVolume <= 0 || closeVolume + LOT_EPSILON < spec.volumeMin) {
    throw new RoundingInfeasibleError("close_below_minimum", volume, closeVolume);
  }
  const remainingVolume = roundToStep(volume - closeVolume, spec.volumeStep);
  if (remainingVolume <= 0) {
    throw new RoundingInfeasibleError("no_remainder", volume, closeVolume);
  }
  if (remainingVolume + LOT_EPSILON < spec.volumeMin) {
    throw new RoundingInfeasibleError("remainder_below_minimum", volume, closeVolume);
  }
  return { closeVolume, remainingVolume };
}
