import * as THREE from 'three';
import type { TopologySnapshot } from '../types/Network';
import type { PositionMap } from '../types/Satellite';
import { EARTH_RADIUS_KM } from './PhysicalConstants';
import type { PositionProvider } from './PositionProvider';

export type SunDirection = (timestamp: number) => THREE.Vector3;

export interface ShadowTransition {
  timestamp: number;
  kind: 'entry' | 'exit';
}

const FIXED_SUN: SunDirection = () => new THREE.Vector3(1, 0, 0);

/**
 * Cylindrical shadow model: the satellite is eclipsed when it is on the night
 * side and within one Earth radius of the Earth–Sun axis.
 */
export function isInShadow(
  position: THREE.Vector3,
  sunDirection: THREE.Vector3,
  earthRadiusKm: number = EARTH_RADIUS_KM
): boolean {
  const sun = sunDirection.clone().normalize();
  const along = position.dot(sun);
  if (along >= 0) return false;

  const perpendicular = position.clone().sub(sun.multiplyScalar(along));
  return perpendicular.length() < earthRadiusKm;
}

export class EclipseSchedule {
  private transitions: Map<string, ShadowTransition[]> = new Map();
  private samples: Map<string, { timestamp: number; inShadow: boolean }[]> = new Map();

  private constructor() {}

  // Sample on the snapshot grid; invalid snapshots contribute nothing
  public static fromSnapshots(
    snapshots: readonly TopologySnapshot[],
    sunDirection: SunDirection = FIXED_SUN
  ): EclipseSchedule {
    const schedule = new EclipseSchedule();
    for (const snapshot of snapshots) {
      if (!snapshot.valid) continue;
      schedule.record(snapshot.timestamp, snapshot.positions, sunDirection(snapshot.timestamp));
    }
    return schedule;
  }

  // Finer sampling straight from the provider for tighter entry/exit times
  public static fromProvider(
    provider: PositionProvider,
    start: number,
    end: number,
    sampleSeconds: number = 60,
    sunDirection: SunDirection = FIXED_SUN
  ): EclipseSchedule {
    const schedule = new EclipseSchedule();
    for (let t = start; t <= end; t += sampleSeconds) {
      schedule.record(t, provider.positionsAt(t), sunDirection(t));
    }
    return schedule;
  }

  private record(timestamp: number, positions: PositionMap, sun: THREE.Vector3): void {
    positions.forEach((entry, id) => {
      const { x, y, z } = entry.position;
      if (!Number.isFinite(x + y + z)) return;

      const inShadow = isInShadow(entry.position, sun);
      const history = this.samples.get(id) ?? [];
      const last = history[history.length - 1];
      history.push({ timestamp, inShadow });
      this.samples.set(id, history);

      if (last && last.inShadow !== inShadow) {
        const transitions = this.transitions.get(id) ?? [];
        transitions.push({
          timestamp: (last.timestamp + timestamp) / 2,
          kind: inShadow ? 'entry' : 'exit',
        });
        this.transitions.set(id, transitions);
      }
    });
  }

  public transitionsOf(satelliteId: string): readonly ShadowTransition[] {
    return this.transitions.get(satelliteId) ?? [];
  }

  // Shadow state of the latest sample at or before `timestamp`
  public isInShadowAt(satelliteId: string, timestamp: number): boolean {
    const history = this.samples.get(satelliteId) ?? [];
    let state = false;
    for (const sample of history) {
      if (sample.timestamp > timestamp) break;
      state = sample.inShadow;
    }
    return state;
  }

  public inTransitionWindow(satelliteId: string, timestamp: number, halfWidthSeconds: number): boolean {
    return this.transitionsOf(satelliteId).some(
      (transition) => Math.abs(transition.timestamp - timestamp) <= halfWidthSeconds
    );
  }

  public transitionSet(timestamp: number, halfWidthSeconds: number): Set<string> {
    const result = new Set<string>();
    this.transitions.forEach((_, id) => {
      if (this.inTransitionWindow(id, timestamp, halfWidthSeconds)) result.add(id);
    });
    return result;
  }
}
