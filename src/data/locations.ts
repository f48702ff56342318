// data/locations.ts — Location catalog and name lookup

import type { Location, LocationInfo } from '../types/index.js';
import { UnknownLocation } from '../shared/errors.js';

export const LOCATIONS: readonly LocationInfo[] = [
  { key: 'cafeteria', name: 'Cafeteria', reachable: true },
  { key: 'foo-mine', name: 'Foo Mine', reachable: true },
  { key: 'bar-mine', name: 'Bar Mine', reachable: true },
  { key: 'assembly-line', name: 'Assembly Line', reachable: true },
  { key: 'material-store', name: 'Material Store', reachable: true },
  { key: 'robots-store', name: 'Robots Store', reachable: true },
  { key: 'on-my-way', name: 'On My Way', reachable: false },
];

export const SPAWN_LOCATION: Location = 'cafeteria';

const LOCATION_MAP = new Map<Location, LocationInfo>();
const LOCATION_BY_NAME = new Map<string, Location>();
for (const info of LOCATIONS) {
  LOCATION_MAP.set(info.key, info);
  LOCATION_BY_NAME.set(normalizeName(info.name), info.key);
}

function normalizeName(name: string): string {
  return name.trim().toLowerCase().replace(/[-_\s]+/g, ' ');
}

/**
 * Resolves a human-typed place name ("foo mine", "Foo Mine", "foo-mine").
 * @throws UnknownLocation
 */
export function locationFromName(name: string): Location {
  const location = LOCATION_BY_NAME.get(normalizeName(name));
  if (!location) throw new UnknownLocation(name);
  return location;
}

export function locationName(location: Location): string {
  const info = LOCATION_MAP.get(location);
  return info ? info.name : location;
}

export function isReachable(location: Location): boolean {
  return LOCATION_MAP.get(location)?.reachable ?? false;
}
