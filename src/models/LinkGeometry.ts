import * as THREE from 'three';
import { SPEED_OF_LIGHT_KM_S } from './PhysicalConstants';
import { GeometryError } from './SimulationErrors';

export function assertValidPosition(id: string, position: THREE.Vector3): void {
  const { x, y, z } = position;
  if (!Number.isFinite(x) || !Number.isFinite(y) || !Number.isFinite(z)) {
    throw new GeometryError(id, `Non-finite position for satellite '${id}'`);
  }
  if (position.lengthSq() === 0) {
    throw new GeometryError(id, `Zero position vector for satellite '${id}'`);
  }
}

/**
 * Closest approach of the segment posA→posB to the Earth's centre.
 * The projection parameter is clamped to [0, 1] so the endpoints bound it.
 */
export function closestApproachToCenter(posA: THREE.Vector3, posB: THREE.Vector3): number {
  const direction = new THREE.Vector3().subVectors(posB, posA);
  const lengthSq = direction.lengthSq();
  if (lengthSq === 0) {
    return posA.length();
  }

  const t = THREE.MathUtils.clamp(-posA.dot(direction) / lengthSq, 0, 1);
  return direction.multiplyScalar(t).add(posA).length();
}

export function hasLineOfSight(
  posA: THREE.Vector3,
  posB: THREE.Vector3,
  minClearanceKm: number
): boolean {
  return closestApproachToCenter(posA, posB) >= minClearanceKm;
}

export function linkLatency(distanceKm: number): number {
  return distanceKm / SPEED_OF_LIGHT_KM_S;
}

export function linkKey(a: string, b: string): string {
  return a < b ? `${a}|${b}` : `${b}|${a}`;
}
