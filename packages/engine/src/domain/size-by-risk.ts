import { floorToStep } from "@ratchet/kit";
import type { SymbolSpec } from "../types/broker.js";

export interface SizingInput {
  balance: number;
  riskPct: number;
  entryPrice: number;
  stopLoss: number;
  spec: SymbolSpec;
}

export interface SizingResult {
  volume: number;
  riskAmount: number;
  riskPerLot: number;
}

/**
 * Lots that lose `riskPct` of the balance if the stop is hit, rounded down to
 * the volume step and clamped into [volumeMin, volumeMax]. Null when the
 * inputs cannot produce a size.
 */
export function sizeByRisk(input: SizingInput): SizingResult | null {
  const { balance, riskPct, entryPrice, stopLoss, spec } = input;
  if (!(balance > 0) || !(riskPct > 0)) return null;
  if (!(spec.tickSize > 0) || !(spec.tickValue > 0)) return null;

  const distance = Math.abs(entryPrice - stopLoss);
  if (!(distance > 0)) return null;

  const riskAmount = balance * (riskPct / 100);
  const riskPerLot = (distance / spec.tickSize) * spec.tickValue;
  let volume = floorToStep(riskAmount / riskPerLot, spec.volumeStep);
  if (spec.volumeMin > 0) volume = Math.max(volume, spec.volumeMin);
  if (spec.volumeMax > 0) volume = Math.min(volume, spec.volumeMax);
  if (!(volume > 0)) return null;

  return { volume, riskAmount, riskPerLot };
}
