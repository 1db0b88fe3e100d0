export const DEFAULT_ASSUMED_VOLTAGE = 240;

/**
 * `split` is a North American split-phase circuit where the charger sits
 * across both legs and sees the full nominal voltage. `single_leg` is wired
 * to one leg only and sees half of it.
 */
export type Phase = "split" | "single_leg";

/**
 * Estimates charging power from the amps the charger reports.
 *
 * This is a model, not a measurement: it assumes a fixed voltage and unity
 * power factor. It is only used when the usage endpoint has no sample.
 *
 * @returns kilowatts, rounded to three decimals (whole watts)
 */
export function estimatePower(
  amps: number,
  assumedVoltage: number = DEFAULT_ASSUMED_VOLTAGE,
  phase: Phase = "split"
): number {
  const voltage = phase === "split" ? assumedVoltage : assumedVoltage / 2;
  const watts = Math.max(0, amps) * voltage;

  return Math.round(watts) / 1000;
}
