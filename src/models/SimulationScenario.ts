import { EclipseSchedule } from './EclipseSchedule';
import { GroundVisibility } from './GroundVisibility';
import { MetricsCollector, type SnapshotMetrics } from './MetricsCollector';
import { MonteCarloSweep, type SweepResult, type SweepRunOptions } from './MonteCarloSweep';
import type { PositionProvider } from './PositionProvider';
import { createRandomSource, deriveSeed } from './SeededRandom';
import type { SimulationConfig } from './SimulationConfig';
import type { SimulationInputs } from './SimulationTrial';
import { TopologyBuilder } from './TopologyBuilder';
import { TopologyTimeline } from './TopologyTimeline';

// Sub-stream of the base seed reserved for link failures
const LINK_FAILURE_STREAM = 1000;

export interface ScenarioOptions {
  // Ground-contact sampling interval, seconds
  contactSampleSeconds?: number;
  // Sample eclipse state on the provider at this interval instead of the snapshot grid
  eclipseSampleSeconds?: number;
  zones?: ReadonlyMap<string, number>;
}

export interface PreparedScenario {
  timeline: TopologyTimeline;
  inputs: SimulationInputs;
}

/**
 * Build everything trials share: the snapshot timeline over the horizon, the
 * eclipse schedule and the ground-contact schedule.
 */
export function prepareScenario(
  config: SimulationConfig,
  provider: PositionProvider,
  options: ScenarioOptions = {}
): PreparedScenario {
  const range = { start: 0, end: config.horizonSeconds };
  const builder = new TopologyBuilder(
    config.topology,
    createRandomSource(deriveSeed(config.baseSeed, LINK_FAILURE_STREAM))
  );
  const timeline = new TopologyTimeline(provider, builder, { stepSeconds: config.stepSeconds });
  const snapshots = timeline.buildRange(range.start, range.end);

  const eclipse = options.eclipseSampleSeconds
    ? EclipseSchedule.fromProvider(provider, range.start, range.end, options.eclipseSampleSeconds)
    : EclipseSchedule.fromSnapshots(snapshots);

  const visibility = new GroundVisibility(provider, {
    minElevationDeg: config.minElevationDeg,
    maxRangeKm: config.groundMaxRangeKm,
    sampleSeconds: options.contactSampleSeconds ?? 60,
  });
  const contacts = visibility.contactSchedule(config.groundStations, range);

  return { timeline, inputs: { snapshots, eclipse, contacts, zones: options.zones } };
}

export interface ScenarioResult extends SweepResult {
  snapshotMetrics: SnapshotMetrics[];
  meanChurn: number | undefined;
}

export function runScenario(
  config: SimulationConfig,
  provider: PositionProvider,
  options: ScenarioOptions & SweepRunOptions = {}
): ScenarioResult {
  const { timeline, inputs } = prepareScenario(config, provider, options);

  const metrics = new MetricsCollector();
  const snapshotMetrics = metrics.collect(timeline.getSnapshots());

  const sweep = new MonteCarloSweep(config, inputs);
  const result = sweep.run({ signal: options.signal, shouldCancel: options.shouldCancel });

  return { ...result, snapshotMetrics, meanChurn: metrics.meanChurn() };
}
