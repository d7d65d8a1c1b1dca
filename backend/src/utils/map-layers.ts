import { featureCollection, point } from '@turf/helpers';
import type { Feature, FeatureCollection, Point } from 'geojson';
import type { GridPoint } from './contracts.js';
import type { Front, PressureSystem } from './synoptic.js';
import { WEATHER_SYMBOL_GLYPHS, weatherSymbolForCode } from './weather.js';
import { windDegreesToArrow } from './wind.js';
import { IMPACT_COLOR_HEX, type OverallStatus } from './wind-impact.js';
import type { WindFarmSite } from './wind-farms.js';

// A type alias, not an interface: GeoJSON properties need an implicit index signature.
export type MapFeatureProperties = {
  kind: 'pressure_system' | 'front' | 'wind' | 'site';
  label: string;
  symbol: string | null;
  color: string | null;
  type?: string;
  status?: string;
  capacityFactor?: number;
  upcomingEvents?: number;
};

export type MapLayer = FeatureCollection<Point, MapFeatureProperties>;

const PRESSURE_SYSTEM_COLORS = { high: '#FF0000', low: '#0000FF' } as const;

const titleCase = (value: string): string => value.charAt(0).toUpperCase() + value.slice(1);

const systemFeature = (system: PressureSystem): Feature<Point, MapFeatureProperties> =>
  point([system.lon, system.lat], {
    kind: 'pressure_system',
    type: system.type,
    label: `${system.type.toUpperCase()}: ${system.pressureHpa.toFixed(1)} hPa`,
    symbol: system.symbol,
    color: PRESSURE_SYSTEM_COLORS[system.type],
  });

const frontFeature = (front: Front): Feature<Point, MapFeatureProperties> =>
  point([front.lon, front.lat], {
    kind: 'front',
    type: front.type,
    label: `${titleCase(front.type)} Front: ${front.tempDiffC.toFixed(1)}°C change`,
    symbol: front.symbol,
    color: front.color,
  });

const windFeature = (gridPoint: GridPoint): Feature<Point, MapFeatureProperties> => {
  const arrow = windDegreesToArrow(gridPoint.windDirectionDeg);
  const glyph = WEATHER_SYMBOL_GLYPHS[weatherSymbolForCode(gridPoint.weatherCode)];
  return point([gridPoint.lon, gridPoint.lat], {
    kind: 'wind',
    label: `${gridPoint.windSpeedMs.toFixed(1)} m/s ${arrow} | ${Math.round(gridPoint.temperatureC)}°C`,
    symbol: `${glyph}${arrow}`,
    color: null,
  });
};

interface BuildSynopticLayerOptions {
  grid: readonly GridPoint[];
  systems: readonly PressureSystem[];
  fronts: readonly Front[];
}

/**
 * H/L markers, front markers and a wind arrow on every other grid point, in
 * that order. Coordinates follow GeoJSON's lon, lat order.
 */
export const buildSynopticLayer = ({ grid, systems, fronts }: BuildSynopticLayerOptions): MapLayer =>
  featureCollection([
    ...systems.map(systemFeature),
    ...fronts.map(frontFeature),
    ...grid.filter((_, index) => index % 2 === 0).map(windFeature),
  ]);

export interface SiteStatusEntry {
  site: WindFarmSite;
  overall: OverallStatus;
}

export const buildSiteStatusLayer = (entries: readonly SiteStatusEntry[]): MapLayer =>
  featureCollection(
    entries.map(({ site, overall }) =>
      point([site.lon, site.lat], {
        kind: 'site',
        label: overall.priorityIssue ? `${site.name}: ${overall.priorityIssue.description}` : site.name,
        symbol: null,
        color: IMPACT_COLOR_HEX[overall.priorityColor],
        status: overall.current.status,
        capacityFactor: overall.current.capacityFactor,
        upcomingEvents: overall.upcomingEvents.length,
      }),
    ),
  );
