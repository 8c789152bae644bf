import { EventEmitter } from 'events';
import type { TopologySnapshot } from '../types/Network';
import type { PlaneGroup, PositionMap } from '../types/Satellite';
import { classifyPlanes, planeGroupsFromPositions, validatePlaneGroups } from './PlaneClassifier';
import type { PositionProvider } from './PositionProvider';
import { GeometryError } from './SimulationErrors';
import { createSnapshot, TopologyBuilder } from './TopologyBuilder';

export type PlaneClassification = (positions: PositionMap, provider: PositionProvider) => PlaneGroup[];

export interface TopologyTimelineOptions {
  stepSeconds?: number;
  classify?: PlaneClassification;
}

// Elements-based buckets when the provider has them, fitted planes otherwise
export const defaultPlaneClassification: PlaneClassification = (positions, provider) => {
  const elements = provider.orbitalElements?.();
  return elements && elements.size > 0 ? classifyPlanes(elements) : planeGroupsFromPositions(positions);
};

/**
 * Fraction of edges added or removed relative to the previous snapshot.
 * Undefined when either snapshot is invalid or the previous one has no edges.
 */
export function churnRate(prev: TopologySnapshot, curr: TopologySnapshot): number | undefined {
  if (!prev.valid || !curr.valid || prev.links.length === 0) return undefined;

  const before = new Set(prev.links.map((link) => link.key));
  const after = new Set(curr.links.map((link) => link.key));

  let added = 0;
  let removed = 0;
  after.forEach((key) => {
    if (!before.has(key)) added++;
  });
  before.forEach((key) => {
    if (!after.has(key)) removed++;
  });

  return Math.min(1, (added + removed) / before.size);
}

export class TopologyTimeline extends EventEmitter {
  private provider: PositionProvider;
  private builder: TopologyBuilder;
  private classify: PlaneClassification;
  private snapshots: TopologySnapshot[] = [];
  private churnByTimestamp: Map<number, number> = new Map();
  private lastValid: TopologySnapshot | null = null;
  public readonly stepSeconds: number;

  constructor(provider: PositionProvider, builder: TopologyBuilder, options: TopologyTimelineOptions = {}) {
    super();
    this.provider = provider;
    this.builder = builder;
    this.classify = options.classify ?? defaultPlaneClassification;
    this.stepSeconds = options.stepSeconds ?? 300;
  }

  /**
   * Build the snapshot for `timestamp` and append it. Timestamps must increase.
   * A malformed position yields an invalid snapshot instead of stopping the run.
   * The first snapshot throws ConfigurationError when there are no plane groups.
   */
  public advance(timestamp: number): TopologySnapshot {
    const latest = this.latest();
    if (latest && timestamp <= latest.timestamp) {
      throw new Error(`Timeline timestamps must increase (got ${timestamp} after ${latest.timestamp})`);
    }

    const positions = this.provider.positionsAt(timestamp);
    let snapshot: TopologySnapshot;
    try {
      const groups = this.classify(positions, this.provider);
      // The first classification doubles as the constellation check
      if (!latest) validatePlaneGroups(groups);
      snapshot = this.builder.build(positions, groups, timestamp);
    } catch (error) {
      if (!(error instanceof GeometryError)) throw error;

      snapshot = createSnapshot(timestamp, new Map(), [], { valid: false, error: error.message });
      console.warn(`Snapshot at t=${timestamp}s marked invalid: ${error.message}`);
      this.emit('invalidSnapshot', snapshot, error);
    }

    if (snapshot.valid) {
      if (this.lastValid) {
        const rate = churnRate(this.lastValid, snapshot);
        if (rate !== undefined) this.churnByTimestamp.set(timestamp, rate);
      }
      this.lastValid = snapshot;
    }

    this.snapshots.push(snapshot);
    this.emit('snapshot', snapshot);
    return snapshot;
  }

  // Snapshots for every step in [start, end]
  public buildRange(start: number, end: number): readonly TopologySnapshot[] {
    const built: TopologySnapshot[] = [];
    for (let t = start; t <= end; t += this.stepSeconds) {
      built.push(this.advance(t));
    }
    return built;
  }

  public churn(prev: TopologySnapshot, curr: TopologySnapshot): number | undefined {
    return churnRate(prev, curr);
  }

  // Churn against the previous valid snapshot, as recorded during advance()
  public churnAt(timestamp: number): number | undefined {
    return this.churnByTimestamp.get(timestamp);
  }

  public getSnapshots(): readonly TopologySnapshot[] {
    return this.snapshots;
  }

  public latest(): TopologySnapshot | undefined {
    return this.snapshots[this.snapshots.length - 1];
  }

  // Latest snapshot at or before `timestamp`
  public at(timestamp: number): TopologySnapshot | undefined {
    let lo = 0;
    let hi = this.snapshots.length - 1;
    let found: TopologySnapshot | undefined;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      if (this.snapshots[mid].timestamp <= timestamp) {
        found = this.snapshots[mid];
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }
    return found;
  }
}
