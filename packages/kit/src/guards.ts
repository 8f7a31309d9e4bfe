/**
 * Range checks for numbers crossing a system boundary (broker replies, setup
 * files) before they reach the state machine.
 */

export function isSanePrice(value: number): boolean {
  return Number.isFinite(value) && value > 0 && value < 10_000_000;
}

/** Lots, not units: anything past 10k lots is a unit mix-up. */
export function isSaneVolume(value: number): boolean {
  return Number.isFinite(value) && value > 0 && value < 10_000;
}
