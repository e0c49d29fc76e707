export type LengthUnit = 'm' | 'mm' | 'pulse';

const METRES_PER_UNIT: Record<Exclude<LengthUnit, 'pulse'>, number> = {
  m: 1,
  mm: 0.001,
};

const toMetres = (value: number, unit: LengthUnit, pulsesPerMeter?: number): number => {
  if (unit === 'pulse') {
    return value / requirePulsesPerMeter(pulsesPerMeter);
  }
  const factor = METRES_PER_UNIT[unit];
  if (factor === undefined) {
    throw new RangeError(`Unknown length unit: ${String(unit)}`);
  }
  return value * factor;
};

const fromMetres = (metres: number, unit: LengthUnit, pulsesPerMeter?: number): number => {
  if (unit === 'pulse') {
    return metres * requirePulsesPerMeter(pulsesPerMeter);
  }
  const factor = METRES_PER_UNIT[unit];
  if (factor === undefined) {
    throw new RangeError(`Unknown length unit: ${String(unit)}`);
  }
  return metres / factor;
};

const requirePulsesPerMeter = (pulsesPerMeter?: number): number => {
  if (pulsesPerMeter === undefined || !Number.isFinite(pulsesPerMeter) || pulsesPerMeter <= 0) {
    throw new RangeError(`Pulse conversion needs a positive pulses-per-metre factor, got ${pulsesPerMeter}`);
  }
  return pulsesPerMeter;
};

/**
 * Converts a length (or, applied to rates, a speed) between units.
 * `pulsesPerMeter` is required whenever either side is `pulse`.
 */
export const convert = (value: number, from: LengthUnit, to: LengthUnit, pulsesPerMeter?: number): number => {
  if (from === to) {
    return value;
  }
  return fromMetres(toMetres(value, from, pulsesPerMeter), to, pulsesPerMeter);
};

export const metersToPulses = (metres: number, pulsesPerMeter: number): number =>
  Math.round(convert(metres, 'm', 'pulse', pulsesPerMeter));

export const pulsesToMeters = (pulses: number, pulsesPerMeter: number): number =>
  convert(pulses, 'pulse', 'm', pulsesPerMeter);
