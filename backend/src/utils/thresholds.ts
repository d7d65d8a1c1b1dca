export interface ImpactThresholds {
  /** Below this sustained speed the rotor turns but generates nothing. */
  cutInSpeedMs: number;
  /** Nameplate output from here up to cut-out. */
  ratedSpeedMs: number;
  /** Sustained speed or gust at/above this triggers an emergency stop. */
  cutOutSpeedMs: number;
  icingTempC: number;
  icingHumidityPct: number;
  criticalEscalationHours: number;
  mediumEscalationHours: number;
}

export interface SynopticThresholds {
  minGridPoints: number;
  neighborRadiusDeg: number;
  highPressureHpa: number;
  lowPressureHpa: number;
  /** °C per degree of arc between adjacent points. */
  frontGradientCPerDeg: number;
  /** Fronts are assumed to travel at this fraction of the mean wind speed. */
  frontSpeedFactor: number;
}

export const DEFAULT_IMPACT_THRESHOLDS: Readonly<ImpactThresholds> = Object.freeze({
  cutInSpeedMs: 3.5,
  ratedSpeedMs: 12.5,
  cutOutSpeedMs: 25.0,
  icingTempC: 0.0,
  icingHumidityPct: 80,
  criticalEscalationHours: 24,
  mediumEscalationHours: 12,
});

export const DEFAULT_SYNOPTIC_THRESHOLDS: Readonly<SynopticThresholds> = Object.freeze({
  minGridPoints: 9,
  neighborRadiusDeg: 2,
  highPressureHpa: 1015,
  lowPressureHpa: 1010,
  frontGradientCPerDeg: 1.5,
  frontSpeedFactor: 0.5,
});

export const withImpactThresholds = (overrides: Partial<ImpactThresholds> = {}): ImpactThresholds => ({
  ...DEFAULT_IMPACT_THRESHOLDS,
  ...overrides,
});

export const withSynopticThresholds = (overrides: Partial<SynopticThresholds> = {}): SynopticThresholds => ({
  ...DEFAULT_SYNOPTIC_THRESHOLDS,
  ...overrides,
});

type Env = Record<string, string | undefined>;

const parseFiniteNumber = (rawValue: string | undefined, fallback: number): number => {
  if (typeof rawValue !== 'string' || !rawValue.trim()) {
    return fallback;
  }
  const parsed = Number(rawValue);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const parsePositiveNumber = (rawValue: string | undefined, fallback: number): number => {
  const parsed = parseFiniteNumber(rawValue, fallback);
  return parsed > 0 ? parsed : fallback;
};

export const resolveImpactThresholds = (env: Env): ImpactThresholds => {
  const defaults = DEFAULT_IMPACT_THRESHOLDS;
  return {
    cutInSpeedMs: parsePositiveNumber(env.CUT_IN_SPEED_MS, defaults.cutInSpeedMs),
    ratedSpeedMs: parsePositiveNumber(env.RATED_SPEED_MS, defaults.ratedSpeedMs),
    cutOutSpeedMs: parsePositiveNumber(env.CUT_OUT_SPEED_MS, defaults.cutOutSpeedMs),
    icingTempC: parseFiniteNumber(env.ICING_TEMP_C, defaults.icingTempC),
    icingHumidityPct: parsePositiveNumber(env.ICING_HUMIDITY_PCT, defaults.icingHumidityPct),
    criticalEscalationHours: parsePositiveNumber(env.CRITICAL_ESCALATION_HOURS, defaults.criticalEscalationHours),
    mediumEscalationHours: parsePositiveNumber(env.MEDIUM_ESCALATION_HOURS, defaults.mediumEscalationHours),
  };
};

export const resolveSynopticThresholds = (env: Env): SynopticThresholds => {
  const defaults = DEFAULT_SYNOPTIC_THRESHOLDS;
  return {
    minGridPoints: Math.round(parsePositiveNumber(env.MIN_GRID_POINTS, defaults.minGridPoints)),
    neighborRadiusDeg: parsePositiveNumber(env.NEIGHBOR_RADIUS_DEG, defaults.neighborRadiusDeg),
    highPressureHpa: parsePositiveNumber(env.HIGH_PRESSURE_HPA, defaults.highPressureHpa),
    lowPressureHpa: parsePositiveNumber(env.LOW_PRESSURE_HPA, defaults.lowPressureHpa),
    frontGradientCPerDeg: parsePositiveNumber(env.FRONT_GRADIENT_C_PER_DEG, defaults.frontGradientCPerDeg),
    frontSpeedFactor: parsePositiveNumber(env.FRONT_SPEED_FACTOR, defaults.frontSpeedFactor),
  };
};
