import * as THREE from 'three';
import type { Link, LinkType, TopologySnapshot } from '../src/types/Network';
import type { PlaneGroup, SatellitePosition } from '../src/types/Satellite';
import { linkKey, linkLatency } from '../src/models/LinkGeometry';
import { createSnapshot } from '../src/models/TopologyBuilder';

export const ORBIT_RADIUS_KM = 6921;

// Equatorial position at `angleDeg`, orbit radius by default
export function equatorial(id: string, angleDeg: number, planeId: string = 'p0', radius: number = ORBIT_RADIUS_KM): SatellitePosition {
  const angle = (angleDeg * Math.PI) / 180;
  return { id, planeId, position: new THREE.Vector3(radius * Math.cos(angle), radius * Math.sin(angle), 0) };
}

export function at(id: string, x: number, y: number, z: number, planeId: string = 'p0'): SatellitePosition {
  return { id, planeId, position: new THREE.Vector3(x, y, z) };
}

export function positionMap(entries: SatellitePosition[]): Map<string, SatellitePosition> {
  return new Map(entries.map((entry) => [entry.id, entry]));
}

export function link(a: string, b: string, distance: number = 100, type: LinkType = 'intra_plane'): Link {
  const [first, second] = a < b ? [a, b] : [b, a];
  return { key: linkKey(a, b), a: first, b: second, type, distance, latency: linkLatency(distance) };
}

export function group(key: string, raan: number, satelliteIds: string[]): PlaneGroup {
  return { key, inclinationBucket: 0, raanBucket: Math.floor(raan / 5), raan, satelliteIds };
}

export function nodeIds(count: number, prefix: string = 'n'): string[] {
  return Array.from({ length: count }, (_, i) => `${prefix}${i}`);
}

// Snapshot over the given ids, spaced around the equator, with explicit links
export function graphSnapshot(ids: string[], links: Link[], timestamp: number = 0): TopologySnapshot {
  const positions = positionMap(ids.map((id, i) => equatorial(id, (360 * i) / ids.length)));
  return createSnapshot(timestamp, positions, links);
}

export function chainLinks(ids: string[]): Link[] {
  return ids.slice(1).map((id, i) => link(ids[i], id));
}

export function ringLinks(ids: string[]): Link[] {
  return [...chainLinks(ids), link(ids[ids.length - 1], ids[0])];
}
