import * as THREE from 'three';
import type { OrbitalElements, PlaneGroup, PositionMap } from '../types/Satellite';
import { RAD_TO_DEG } from './PhysicalConstants';
import { ConfigurationError } from './SimulationErrors';

export interface PlaneBuckets {
  inclinationBucketDeg: number;
  raanBucketDeg: number;
}

const DEFAULT_BUCKETS: PlaneBuckets = { inclinationBucketDeg: 1, raanBucketDeg: 5 };

function normalizeDegrees(angle: number): number {
  return ((angle % 360) + 360) % 360;
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Group satellites by (inclination bucket, RAAN bucket) and order each group by
 * mean anomaly.
 */
export function classifyPlanes(
  elements: ReadonlyMap<string, OrbitalElements>,
  buckets: PlaneBuckets = DEFAULT_BUCKETS
): PlaneGroup[] {
  const grouped = new Map<string, { inc: number; raan: number; members: [string, OrbitalElements][] }>();

  elements.forEach((element, id) => {
    const inc = Math.floor(element.inclination / buckets.inclinationBucketDeg);
    const raan = Math.floor(normalizeDegrees(element.raan) / buckets.raanBucketDeg);
    const key = `inc${inc}_raan${raan}`;

    let group = grouped.get(key);
    if (!group) {
      group = { inc, raan, members: [] };
      grouped.set(key, group);
    }
    group.members.push([id, element]);
  });

  const groups: PlaneGroup[] = [];
  grouped.forEach((group, key) => {
    const ordered = group.members
      .slice()
      .sort((a, b) => normalizeDegrees(a[1].meanAnomaly) - normalizeDegrees(b[1].meanAnomaly) || compareIds(a[0], b[0]));
    const meanRaan = ordered.reduce((sum, [, e]) => sum + normalizeDegrees(e.raan), 0) / ordered.length;

    groups.push({
      key,
      inclinationBucket: group.inc,
      raanBucket: group.raan,
      raan: meanRaan,
      satelliteIds: ordered.map(([id]) => id),
    });
  });

  return groups.sort((a, b) => a.raan - b.raan || compareIds(a.key, b.key));
}

/**
 * Group by the provider's plane id and order members by their angle inside the
 * fitted orbital plane. RAAN and inclination come from the plane normal.
 */
export function planeGroupsFromPositions(
  positions: PositionMap,
  buckets: PlaneBuckets = DEFAULT_BUCKETS
): PlaneGroup[] {
  const byPlane = new Map<string, string[]>();
  positions.forEach((entry, id) => {
    const members = byPlane.get(entry.planeId) ?? [];
    members.push(id);
    byPlane.set(entry.planeId, members);
  });

  const groups: PlaneGroup[] = [];
  byPlane.forEach((ids, planeId) => {
    ids.sort(compareIds);
    const reference = positions.get(ids[0])?.position.clone().normalize() ?? new THREE.Vector3(1, 0, 0);

    // Widest cross product gives the best-conditioned normal
    const normal = new THREE.Vector3();
    const cross = new THREE.Vector3();
    for (const id of ids) {
      const position = positions.get(id)?.position;
      if (!position) continue;
      cross.crossVectors(reference, position);
      if (cross.lengthSq() > normal.lengthSq()) normal.copy(cross);
    }

    let raan: number;
    let inclination: number;
    if (normal.lengthSq() === 0) {
      // Single satellite (or collinear members): no plane to fit
      raan = normalizeDegrees(Math.atan2(reference.y, reference.x) * RAD_TO_DEG);
      inclination = 0;
    } else {
      normal.normalize();
      if (normal.z < 0) normal.negate();
      raan = normalizeDegrees(Math.atan2(normal.x, -normal.y) * RAD_TO_DEG);
      inclination = Math.acos(THREE.MathUtils.clamp(normal.z, -1, 1)) * RAD_TO_DEG;
    }

    const angleOf = (id: string): number => {
      const position = positions.get(id)?.position;
      if (!position || normal.lengthSq() === 0) return 0;
      const sin = normal.dot(new THREE.Vector3().crossVectors(reference, position));
      const cos = reference.dot(position);
      const angle = Math.atan2(sin, cos);
      return angle < 0 ? angle + 2 * Math.PI : angle;
    };

    const angles = new Map(ids.map((id) => [id, angleOf(id)] as const));
    const ordered = ids.slice().sort((a, b) => (angles.get(a) ?? 0) - (angles.get(b) ?? 0) || compareIds(a, b));

    groups.push({
      key: planeId,
      inclinationBucket: Math.floor(inclination / buckets.inclinationBucketDeg),
      raanBucket: Math.floor(raan / buckets.raanBucketDeg),
      raan,
      satelliteIds: ordered,
    });
  });

  return groups.sort((a, b) => a.raan - b.raan || compareIds(a.key, b.key));
}

/**
 * Neighbouring plane groups on each side in circular RAAN order.
 * Two groups are each other's only neighbour; a lone group has none.
 */
export function adjacentPlaneGroups(groups: readonly PlaneGroup[]): Map<string, string[]> {
  const ordered = groups.slice().sort((a, b) => a.raan - b.raan || compareIds(a.key, b.key));
  const adjacency = new Map<string, string[]>();

  ordered.forEach((group, index) => {
    const neighbours: string[] = [];
    if (ordered.length > 1) {
      const previous = ordered[(index - 1 + ordered.length) % ordered.length].key;
      const next = ordered[(index + 1) % ordered.length].key;
      neighbours.push(previous);
      if (next !== previous) neighbours.push(next);
    }
    adjacency.set(group.key, neighbours);
  });

  return adjacency;
}

export function validatePlaneGroups(groups: readonly PlaneGroup[]): void {
  if (groups.length === 0) {
    throw new ConfigurationError('planeGroups', 'at least one plane group is required');
  }
  for (const group of groups) {
    if (group.satelliteIds.length === 0) {
      throw new ConfigurationError(`planeGroups.${group.key}`, 'plane group has no satellites');
    }
  }
}
