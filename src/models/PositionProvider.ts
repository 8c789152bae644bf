import * as THREE from 'three';
import type { OrbitalElements, PositionMap, SatellitePosition } from '../types/Satellite';
import { DEG_TO_RAD, EARTH_MU, EARTH_RADIUS_KM } from './PhysicalConstants';
import { ConfigurationError } from './SimulationErrors';

export interface PositionProvider {
  // Must be deterministic for a given timestamp
  positionsAt(timestamp: number): PositionMap;
  // Providers backed by orbital elements expose them for plane classification
  orbitalElements?(): ReadonlyMap<string, OrbitalElements>;
}

/**
 * Position of a satellite on a Keplerian orbit, `timestamp` seconds after epoch.
 * Eccentric anomaly uses the first-order expansion, fine for near-circular LEO.
 */
export function keplerianPosition(elements: OrbitalElements, timestamp: number): THREE.Vector3 {
  const { semiMajorAxis, eccentricity, inclination, raan, argumentOfPeriapsis } = elements;

  const meanMotion = Math.sqrt(EARTH_MU / Math.pow(semiMajorAxis, 3)); // rad/s
  const M = elements.meanAnomaly * DEG_TO_RAD + meanMotion * timestamp;
  const E = M + eccentricity * Math.sin(M);

  const trueAnomaly = 2 * Math.atan2(
    Math.sqrt(1 + eccentricity) * Math.sin(E / 2),
    Math.sqrt(1 - eccentricity) * Math.cos(E / 2)
  );
  const distance = semiMajorAxis * (1 - eccentricity * Math.cos(E));

  // Position in the orbital plane
  const xOrbit = distance * Math.cos(trueAnomaly);
  const yOrbit = distance * Math.sin(trueAnomaly);

  const incRad = inclination * DEG_TO_RAD;
  const raanRad = raan * DEG_TO_RAD;
  const aopRad = argumentOfPeriapsis * DEG_TO_RAD;

  // Rotate by argument of periapsis around z
  const x1 = xOrbit * Math.cos(aopRad) - yOrbit * Math.sin(aopRad);
  const y1 = xOrbit * Math.sin(aopRad) + yOrbit * Math.cos(aopRad);

  // Then by inclination around x
  const y2 = y1 * Math.cos(incRad);
  const z2 = y1 * Math.sin(incRad);

  // Finally by RAAN around z
  return new THREE.Vector3(
    x1 * Math.cos(raanRad) - y2 * Math.sin(raanRad),
    x1 * Math.sin(raanRad) + y2 * Math.cos(raanRad),
    z2
  );
}

export interface WalkerConstellationOptions {
  planes: number;
  satellitesPerPlane: number;
  altitudeKm: number;
  inclinationDeg: number;
  // 360 for a Walker delta pattern, 180 for a star pattern
  raanSpreadDeg?: number;
  phasing?: number;
}

export class WalkerConstellationProvider implements PositionProvider {
  private elements: Map<string, OrbitalElements> = new Map();
  private planeIds: Map<string, string> = new Map();

  constructor(options: WalkerConstellationOptions) {
    const { planes, satellitesPerPlane, altitudeKm, inclinationDeg } = options;
    const raanSpread = options.raanSpreadDeg ?? 360;
    const phasing = options.phasing ?? 0;

    if (!Number.isInteger(planes) || planes < 1) {
      throw new ConfigurationError('constellation.planes', 'must be a positive integer');
    }
    if (!Number.isInteger(satellitesPerPlane) || satellitesPerPlane < 1) {
      throw new ConfigurationError('constellation.satellitesPerPlane', 'must be a positive integer');
    }
    if (!(altitudeKm > 0)) {
      throw new ConfigurationError('constellation.altitudeKm', 'must be positive');
    }

    const total = planes * satellitesPerPlane;
    for (let plane = 0; plane < planes; plane++) {
      const raan = (plane * raanSpread) / planes;

      for (let i = 0; i < satellitesPerPlane; i++) {
        const id = `sat_${plane}_${i}`;
        const meanAnomaly = ((i * 360) / satellitesPerPlane + (plane * phasing * 360) / total) % 360;

        this.elements.set(id, {
          inclination: inclinationDeg,
          raan,
          eccentricity: 0,
          argumentOfPeriapsis: 0,
          meanAnomaly,
          semiMajorAxis: EARTH_RADIUS_KM + altitudeKm,
        });
        this.planeIds.set(id, `plane_${plane}`);
      }
    }
  }

  public positionsAt(timestamp: number): PositionMap {
    const positions = new Map<string, SatellitePosition>();
    this.elements.forEach((elements, id) => {
      positions.set(id, {
        id,
        planeId: this.planeIds.get(id) ?? 'unknown',
        position: keplerianPosition(elements, timestamp),
      });
    });
    return positions;
  }

  public orbitalElements(): ReadonlyMap<string, OrbitalElements> {
    return this.elements;
  }
}

// Fixed geometry, used for the static-network baseline
export class StaticPositionProvider implements PositionProvider {
  private positions: Map<string, SatellitePosition>;

  constructor(positions: Iterable<SatellitePosition>) {
    this.positions = new Map();
    for (const entry of positions) {
      this.positions.set(entry.id, { ...entry, position: entry.position.clone() });
    }
  }

  public positionsAt(_timestamp?: number): PositionMap {
    const copy = new Map<string, SatellitePosition>();
    this.positions.forEach((entry, id) => {
      copy.set(id, { ...entry, position: entry.position.clone() });
    });
    return copy;
  }
}
