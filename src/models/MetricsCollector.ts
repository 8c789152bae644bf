import type { TopologySnapshot } from '../types/Network';
import type { InfectionSample, SimulationState } from '../types/Epidemic';
import { NetworkPathfinding } from './NetworkPathfinding';
import { churnRate } from './TopologyTimeline';

export interface SnapshotMetrics {
  timestamp: number;
  valid: boolean;
  nodeCount: number;
  edgeCount: number;
  intraPlaneEdges: number;
  interPlaneEdges: number;
  avgDegree: number;
  componentCount: number;
  largestComponent: number;
  avgPathLength?: number;
  diameter?: number;
  churnRate?: number;
}

export interface SnapshotMetricsOptions {
  previous?: TopologySnapshot;
  // All-pairs BFS; skip for large constellations when not needed
  includePathStats?: boolean;
}

export interface InfectionCurveSource {
  seed: number;
  states: readonly SimulationState[];
}

export function countStates(state: SimulationState): InfectionSample {
  const sample: InfectionSample = { timestamp: state.timestamp, susceptible: 0, infected: 0, recovered: 0, dormant: 0 };
  state.nodes.forEach((node) => {
    if (node.health === 'susceptible') sample.susceptible++;
    else if (node.health === 'recovered') sample.recovered++;
    else {
      sample.infected++;
      if (!node.active) sample.dormant++;
    }
  });
  return sample;
}

export class MetricsCollector {
  private snapshotSeries: SnapshotMetrics[] = [];

  public snapshotMetrics(snapshot: TopologySnapshot, options: SnapshotMetricsOptions = {}): SnapshotMetrics {
    const nodeCount = snapshot.adjacency.size;
    const edgeCount = snapshot.links.length;
    const intraPlaneEdges = snapshot.links.filter((link) => link.type === 'intra_plane').length;
    const components = NetworkPathfinding.connectedComponents(snapshot);

    const metrics: SnapshotMetrics = {
      timestamp: snapshot.timestamp,
      valid: snapshot.valid,
      nodeCount,
      edgeCount,
      intraPlaneEdges,
      interPlaneEdges: edgeCount - intraPlaneEdges,
      avgDegree: nodeCount === 0 ? 0 : (2 * edgeCount) / nodeCount,
      componentCount: components.length,
      largestComponent: components[0]?.length ?? 0,
    };

    if (options.includePathStats && snapshot.valid) {
      const stats = this.pathStats(snapshot);
      if (stats) {
        metrics.avgPathLength = stats.avgPathLength;
        metrics.diameter = stats.diameter;
      }
    }

    if (options.previous) {
      const rate = churnRate(options.previous, snapshot);
      if (rate !== undefined) metrics.churnRate = rate;
    }

    return metrics;
  }

  /**
   * Metrics for a whole timeline. Invalid snapshots are skipped, and churn is
   * measured against the previous valid snapshot.
   */
  public collect(snapshots: readonly TopologySnapshot[], includePathStats: boolean = false): SnapshotMetrics[] {
    let previous: TopologySnapshot | undefined;
    this.snapshotSeries = [];
    for (const snapshot of snapshots) {
      if (!snapshot.valid) continue;
      this.snapshotSeries.push(this.snapshotMetrics(snapshot, { previous, includePathStats }));
      previous = snapshot;
    }
    return this.snapshotSeries;
  }

  // Mean churn over snapshots where it is defined
  public meanChurn(): number | undefined {
    const rates = this.snapshotSeries.map((m) => m.churnRate).filter((r): r is number => r !== undefined);
    if (rates.length === 0) return undefined;
    return rates.reduce((sum, r) => sum + r, 0) / rates.length;
  }

  public infectionCurve(trial: InfectionCurveSource): InfectionSample[] {
    return trial.states.map(countStates);
  }

  // Hop-count statistics over connected ordered pairs
  private pathStats(snapshot: TopologySnapshot): { avgPathLength: number; diameter: number } | null {
    let total = 0;
    let pairs = 0;
    let diameter = 0;

    snapshot.adjacency.forEach((_, sourceId) => {
      const { distances } = NetworkPathfinding.hopDistances(snapshot, sourceId);
      distances.forEach((hops, targetId) => {
        if (targetId === sourceId) return;
        total += hops;
        pairs++;
        if (hops > diameter) diameter = hops;
      });
    });

    if (pairs === 0) return null;
    return { avgPathLength: total / pairs, diameter };
  }
}
