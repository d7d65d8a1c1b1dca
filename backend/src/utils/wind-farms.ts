import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { ContractViolationError, isRecord } from './contracts.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const DEFAULT_WIND_FARMS_FILE = path.resolve(__dirname, '../../data/offshore-wind-farms.geojson');

export interface WindFarmSite {
  name: string;
  lat: number;
  lon: number;
  capacityMw: number;
}

const parseFeature = (feature: unknown): WindFarmSite | null => {
  if (!isRecord(feature) || !isRecord(feature.geometry) || !isRecord(feature.properties)) {
    return null;
  }
  const { coordinates } = feature.geometry;
  const { name, capacity_mw: capacityMw } = feature.properties;
  if (!Array.isArray(coordinates) || coordinates.length < 2) {
    return null;
  }
  const [lon, lat]: unknown[] = coordinates;
  if (typeof name !== 'string' || !name.trim() || typeof lat !== 'number' || typeof lon !== 'number' || typeof capacityMw !== 'number') {
    return null;
  }
  return { name: name.trim(), lat, lon, capacityMw };
};

/**
 * Reads point features (GeoJSON order: lon, lat) with `name` and `capacity_mw`
 * properties. Features missing any of them are dropped with a warning.
 */
export const parseWindFarmSites = (geojson: unknown): WindFarmSite[] => {
  if (!isRecord(geojson) || !Array.isArray(geojson.features)) {
    throw new ContractViolationError('Malformed wind farm registry', 'Expected a GeoJSON FeatureCollection.');
  }
  const sites: WindFarmSite[] = [];
  geojson.features.forEach((feature: unknown, index: number) => {
    const site = parseFeature(feature);
    if (site) {
      sites.push(site);
    } else {
      console.warn(`[WindFarms] Skipping feature ${index}: missing name, capacity_mw or point coordinates`);
    }
  });
  return sites;
};

export const loadWindFarmSites = (filePath: string = DEFAULT_WIND_FARMS_FILE): WindFarmSite[] => {
  const raw = fs.readFileSync(filePath, 'utf8');
  return parseWindFarmSites(JSON.parse(raw));
};
