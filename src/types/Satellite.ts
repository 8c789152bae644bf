import type * as THREE from 'three';

export type HealthState = 'susceptible' | 'infected' | 'recovered';

export interface OrbitalElements {
  inclination: number; // degrees
  raan: number; // degrees, right ascension of ascending node
  eccentricity: number;
  argumentOfPeriapsis: number; // degrees
  meanAnomaly: number; // degrees at epoch
  semiMajorAxis: number; // km
}

// One satellite as reported by a position provider at a single timestamp
export interface SatellitePosition {
  id: string;
  planeId: string;
  position: THREE.Vector3; // km, Earth-centred, z along the rotation axis
}

export type PositionMap = ReadonlyMap<string, SatellitePosition>;

export interface PlaneGroup {
  key: string;
  inclinationBucket: number;
  raanBucket: number;
  raan: number; // degrees, representative RAAN used for adjacency
  satelliteIds: readonly string[]; // ordered by mean anomaly
}

export interface SatelliteNode {
  id: string;
  planeId: string;
  health: HealthState;
  active: boolean; // only meaningful while infected
  lastC2Contact: number | null; // seconds
  infectedAt: number | null;
  recoveredAt: number | null;
}
