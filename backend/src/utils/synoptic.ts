import { assertGridPoints, type GridPoint } from './contracts.js';
import { type SynopticThresholds, withSynopticThresholds } from './thresholds.js';

export interface PressureSystem {
  type: 'high' | 'low';
  lat: number;
  lon: number;
  pressureHpa: number;
  symbol: 'H' | 'L';
}

export interface Front {
  type: 'cold' | 'warm';
  lat: number;
  lon: number;
  color: string;
  symbol: string;
  gradient: number;
  tempDiffC: number;
}

export interface FrontMotion {
  velocityMs: number;
  directionDeg: number;
  pressureTrendHpa: number;
}

export interface SynopticAnalysis {
  systems: PressureSystem[];
  fronts: Front[];
  motion: FrontMotion;
}

const FRONT_STYLE = {
  cold: { color: '#0000FF', symbol: '▼' },
  warm: { color: '#FF0000', symbol: '▲' },
} as const;

/**
 * Flags local pressure extrema. A point's neighborhood is every other point
 * within the radius on both axes; a high must beat all of them strictly and sit
 * above the high threshold, a low the mirror image. Too small a grid yields nothing.
 */
export const detectPressureSystems = (grid: readonly GridPoint[], overrides?: Partial<SynopticThresholds>): PressureSystem[] => {
  const points = assertGridPoints(grid);
  const { minGridPoints, neighborRadiusDeg, highPressureHpa, lowPressureHpa } = withSynopticThresholds(overrides);
  if (points.length < minGridPoints) {
    return [];
  }

  const systems: PressureSystem[] = [];
  points.forEach((point, index) => {
    const neighbors = points.filter(
      (other, otherIndex) =>
        otherIndex !== index &&
        Math.abs(other.lat - point.lat) < neighborRadiusDeg &&
        Math.abs(other.lon - point.lon) < neighborRadiusDeg,
    );
    if (neighbors.length === 0) {
      return;
    }

    if (neighbors.every((neighbor) => point.pressureHpa > neighbor.pressureHpa)) {
      if (point.pressureHpa > highPressureHpa) {
        systems.push({ type: 'high', lat: point.lat, lon: point.lon, pressureHpa: point.pressureHpa, symbol: 'H' });
      }
    } else if (neighbors.every((neighbor) => point.pressureHpa < neighbor.pressureHpa)) {
      if (point.pressureHpa < lowPressureHpa) {
        systems.push({ type: 'low', lat: point.lat, lon: point.lon, pressureHpa: point.pressureHpa, symbol: 'L' });
      }
    }
  });

  return systems;
};

// Total order so co-located points pair up the same way whatever the input order.
const northwardOrder = (a: GridPoint, b: GridPoint): number =>
  a.lat - b.lat || a.lon - b.lon || a.temperatureC - b.temperatureC || a.pressureHpa - b.pressureHpa;

/**
 * Temperature-gradient front heuristic over latitude-sorted neighbors. Every
 * qualifying adjacent pair yields its own candidate at the pair's midpoint.
 */
export const detectFronts = (grid: readonly GridPoint[], overrides?: Partial<SynopticThresholds>): Front[] => {
  const { frontGradientCPerDeg } = withSynopticThresholds(overrides);
  const sorted = [...assertGridPoints(grid)].sort(northwardOrder);
  const fronts: Front[] = [];

  for (let i = 0; i < sorted.length - 1; i += 1) {
    const south = sorted[i];
    const north = sorted[i + 1];
    const tempDiffC = Math.abs(north.temperatureC - south.temperatureC);
    const distance = Math.hypot(north.lat - south.lat, north.lon - south.lon);
    if (distance === 0) {
      continue;
    }

    const gradient = tempDiffC / distance;
    if (gradient <= frontGradientCPerDeg) {
      continue;
    }

    const type = north.temperatureC < south.temperatureC ? 'cold' : 'warm';
    fronts.push({
      type,
      lat: (south.lat + north.lat) / 2,
      lon: (south.lon + north.lon) / 2,
      color: FRONT_STYLE[type].color,
      symbol: FRONT_STYLE[type].symbol,
      gradient,
      tempDiffC,
    });
  }

  return fronts;
};

const mean = (values: number[]): number => (values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length);

// Plain arithmetic mean of directions: 350° and 10° average to 180°.
export const estimateFrontMotion = (grid: readonly GridPoint[], overrides?: Partial<SynopticThresholds>): FrontMotion => {
  const points = assertGridPoints(grid);
  const { frontSpeedFactor } = withSynopticThresholds(overrides);
  return {
    velocityMs: mean(points.map((point) => point.windSpeedMs)) * frontSpeedFactor,
    directionDeg: mean(points.map((point) => point.windDirectionDeg)),
    pressureTrendHpa: mean(points.map((point) => point.pressureTrendHpa)),
  };
};

export const analyzeSynoptic = (grid: readonly GridPoint[], overrides?: Partial<SynopticThresholds>): SynopticAnalysis => ({
  systems: detectPressureSystems(grid, overrides),
  fronts: detectFronts(grid, overrides),
  motion: estimateFrontMotion(grid, overrides),
});
