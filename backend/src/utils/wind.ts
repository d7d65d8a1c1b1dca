const CARDINAL_LABELS = ['N', 'NNE', 'NE', 'ENE', 'E', 'ESE', 'SE', 'SSE', 'S', 'SSW', 'SW', 'WSW', 'W', 'WNW', 'NW', 'NNW'];
const ARROWS = ['↑', '↗', '→', '↘', '↓', '↙', '←', '↖'];

export const normalizeDegrees = (degrees: number): number => ((degrees % 360) + 360) % 360;

export const windDegreesToCardinal = (degrees: number | null | undefined): string | null => {
  if (typeof degrees !== 'number' || !Number.isFinite(degrees)) {
    return null;
  }
  const index = Math.round(normalizeDegrees(degrees) / 22.5) % 16;
  return CARDINAL_LABELS[index];
};

/**
 * Eight-way arrow for a bearing (0 = N, 90 = E). Each sector spans 45° centred
 * on its heading, so 22.5° already points north-east.
 */
export const windDegreesToArrow = (degrees: number): string => {
  if (!Number.isFinite(degrees)) {
    return ARROWS[0];
  }
  const index = Math.floor((normalizeDegrees(degrees) + 22.5) / 45) % 8;
  return ARROWS[index];
};
