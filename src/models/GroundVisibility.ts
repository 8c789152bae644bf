import * as THREE from 'three';
import type { ContactWindow, GeoPosition, GroundStation } from '../types/Network';
import { DEG_TO_RAD, EARTH_RADIUS_KM, EARTH_ROTATION_RAD_S, RAD_TO_DEG } from './PhysicalConstants';
import type { PositionProvider } from './PositionProvider';

export interface TimeRange {
  start: number;
  end: number;
}

export interface GroundVisibilityOptions {
  minElevationDeg?: number;
  // Slant range limit for a usable link, km
  maxRangeKm?: number;
  sampleSeconds?: number;
  // 'inertial' rotates stations with the Earth; 'earth-fixed' keeps them still
  frame?: 'inertial' | 'earth-fixed';
  greenwichAngleAtEpochRad?: number;
}

export function geoToCartesian(position: GeoPosition, earthRadius: number = EARTH_RADIUS_KM): THREE.Vector3 {
  const lat = position.latitude * DEG_TO_RAD;
  const lon = position.longitude * DEG_TO_RAD;
  const radius = earthRadius + (position.altitude ?? 0);

  return new THREE.Vector3(
    radius * Math.cos(lat) * Math.cos(lon),
    radius * Math.cos(lat) * Math.sin(lon),
    radius * Math.sin(lat)
  );
}

// Elevation of the satellite above the station's local horizon, degrees
export function elevationAngle(stationPosition: THREE.Vector3, satellitePosition: THREE.Vector3): number {
  const range = new THREE.Vector3().subVectors(satellitePosition, stationPosition);
  const rangeKm = range.length();
  if (rangeKm === 0) return 90;

  const zenith = stationPosition.clone().normalize();
  const cosAngle = THREE.MathUtils.clamp(range.dot(zenith) / rangeKm, -1, 1);
  return 90 - Math.acos(cosAngle) * RAD_TO_DEG;
}

/**
 * Precomputed contact windows for a set of stations and satellites.
 * Read-only once built, so trials can share one instance.
 */
export class ContactSchedule {
  private bySatellite: Map<string, ContactWindow[]> = new Map();

  constructor(windows: Iterable<ContactWindow>) {
    for (const window of windows) {
      const list = this.bySatellite.get(window.satelliteId) ?? [];
      list.push(window);
      this.bySatellite.set(window.satelliteId, list);
    }
    this.bySatellite.forEach((list) => list.sort((a, b) => a.start - b.start || (a.stationId < b.stationId ? -1 : 1)));
  }

  public windowsFor(satelliteId: string): readonly ContactWindow[] {
    return this.bySatellite.get(satelliteId) ?? [];
  }

  public stationsInContact(satelliteId: string, timestamp: number): string[] {
    return this.windowsFor(satelliteId)
      .filter((window) => window.start <= timestamp && timestamp <= window.end)
      .map((window) => window.stationId)
      .sort();
  }

  public inContact(timestamp: number): Set<string> {
    const result = new Set<string>();
    this.bySatellite.forEach((windows, satelliteId) => {
      if (windows.some((window) => window.start <= timestamp && timestamp <= window.end)) {
        result.add(satelliteId);
      }
    });
    return result;
  }

  // Most recent instant at or before `timestamp` with an open window, or null
  public lastContactAtOrBefore(satelliteId: string, timestamp: number): number | null {
    let latest: number | null = null;
    for (const window of this.windowsFor(satelliteId)) {
      if (window.start > timestamp) continue;
      const seen = Math.min(window.end, timestamp);
      if (latest === null || seen > latest) latest = seen;
    }
    return latest;
  }
}

export class GroundVisibility {
  private provider: PositionProvider;
  private minElevationDeg: number;
  private maxRangeKm: number;
  private sampleSeconds: number;
  private frame: 'inertial' | 'earth-fixed';
  private greenwichAngleAtEpoch: number;

  constructor(provider: PositionProvider, options: GroundVisibilityOptions = {}) {
    this.provider = provider;
    this.minElevationDeg = options.minElevationDeg ?? 25;
    this.maxRangeKm = options.maxRangeKm ?? 2500;
    this.sampleSeconds = options.sampleSeconds ?? 60;
    this.frame = options.frame ?? 'inertial';
    this.greenwichAngleAtEpoch = options.greenwichAngleAtEpochRad ?? 0;
  }

  public stationPositionAt(station: GroundStation, timestamp: number): THREE.Vector3 {
    const position = geoToCartesian(station.position);
    if (this.frame === 'earth-fixed') return position;

    const angle = this.greenwichAngleAtEpoch + EARTH_ROTATION_RAD_S * timestamp;
    return position.applyAxisAngle(new THREE.Vector3(0, 0, 1), angle);
  }

  public contactWindows(station: GroundStation, satelliteId: string, range: TimeRange): ContactWindow[] {
    return this.scan([station], new Set([satelliteId]), range);
  }

  public contactSchedule(
    stations: readonly GroundStation[],
    range: TimeRange,
    satelliteIds?: Iterable<string>
  ): ContactSchedule {
    const filter = satelliteIds ? new Set(satelliteIds) : null;
    return new ContactSchedule(this.scan(stations, filter, range));
  }

  // One provider query per sample, shared by every station
  private scan(
    stations: readonly GroundStation[],
    satelliteIds: ReadonlySet<string> | null,
    range: TimeRange
  ): ContactWindow[] {
    const windows: ContactWindow[] = [];
    const open = new Map<string, ContactWindow>();

    for (let t = range.start; t <= range.end; t += this.sampleSeconds) {
      const positions = this.provider.positionsAt(t);

      for (const station of stations) {
        const stationPosition = this.stationPositionAt(station, t);

        positions.forEach((entry, satelliteId) => {
          if (satelliteIds && !satelliteIds.has(satelliteId)) return;

          const key = `${station.id}|${satelliteId}`;
          const elevation = elevationAngle(stationPosition, entry.position);
          const rangeKm = stationPosition.distanceTo(entry.position);
          const current = open.get(key);

          if (elevation >= this.minElevationDeg && rangeKm <= this.maxRangeKm) {
            if (current) {
              current.end = t;
              current.maxElevation = Math.max(current.maxElevation, elevation);
            } else {
              open.set(key, { stationId: station.id, satelliteId, start: t, end: t, maxElevation: elevation });
            }
          } else if (current) {
            windows.push(current);
            open.delete(key);
          }
        });
      }
    }

    open.forEach((window) => windows.push(window));
    return windows.sort(
      (a, b) => a.start - b.start || (a.stationId < b.stationId ? -1 : a.stationId > b.stationId ? 1 : 0) ||
        (a.satelliteId < b.satelliteId ? -1 : a.satelliteId > b.satelliteId ? 1 : 0)
    );
  }
}
