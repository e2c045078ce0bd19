import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from './errors.js';
import type { LocationReference } from './snow-record.js';

export interface SnowLocation extends LocationReference {
  name: string;
  elevationFt: number;
  website: string;
  region?: string;
  type?: string;
  verticalDropFt?: number;
}

const MAX_REASONABLE_ELEVATION_FT = 30000;

const locationSchema = z.object({
  id: z.string().regex(/^[a-z0-9]+(?:-[a-z0-9]+)*$/, 'must be a lowercase slug'),
  name: z.string().trim().min(1),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  elevationFt: z.number().min(0).max(MAX_REASONABLE_ELEVATION_FT),
  website: z.string().regex(/^https?:\/\//, 'must start with http:// or https://'),
  region: z.string().optional(),
  type: z.string().optional(),
  verticalDropFt: z.number().nonnegative().optional(),
});

const catalogSchema = z.array(locationSchema).min(1, 'at least one location is required');

// Compiled output lives one directory deeper (dist/src/utils) than the sources.
const DEFAULT_CATALOG_CANDIDATES = [
  path.resolve(__dirname, '../../data/locations.json'),
  path.resolve(__dirname, '../../../data/locations.json'),
];

export const resolveDefaultLocationsFile = (): string =>
  DEFAULT_CATALOG_CANDIDATES.find((candidate) => fs.existsSync(candidate)) ?? DEFAULT_CATALOG_CANDIDATES[0];

export const parseLocationCatalog = (raw: unknown): SnowLocation[] => {
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'catalog'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid location catalog (${details})`);
  }

  const seen = new Set<string>();
  for (const location of parsed.data) {
    if (seen.has(location.id)) {
      throw new ConfigurationError(`Invalid location catalog (duplicate id "${location.id}")`);
    }
    seen.add(location.id);
  }
  return parsed.data;
};

export const loadLocationCatalog = (filePath: string = resolveDefaultLocationsFile()): SnowLocation[] => {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (err) {
    throw new ConfigurationError(`Unable to read location catalog ${filePath}: ${errorMessage(err)}`);
  }
  return parseLocationCatalog(raw);
};

/** An empty id list enables the whole catalog. Unknown ids are reported and skipped. */
export const filterEnabledLocations = (locations: SnowLocation[], enabledIds: string[]): SnowLocation[] => {
  if (enabledIds.length === 0) {
    console.log(`[locations] no ENABLED_LOCATIONS set, monitoring all ${locations.length} locations`);
    return locations;
  }

  const byId = new Map(locations.map((location) => [location.id, location]));
  const enabled: SnowLocation[] = [];
  for (const id of enabledIds) {
    const location = byId.get(id);
    if (location) {
      enabled.push(location);
    } else {
      console.warn(`[locations] "${id}" is listed in ENABLED_LOCATIONS but not in the catalog`);
    }
  }

  if (enabled.length === 0) {
    throw new ConfigurationError('ENABLED_LOCATIONS did not match any catalog location.');
  }
  console.log(`[locations] monitoring ${enabled.length} of ${locations.length} locations`);
  return enabled;
};
