import { afterEach, describe, it, expect, vi } from 'vitest';
import { StaticPositionProvider, WalkerConstellationProvider } from '../src/models/PositionProvider';
import { ConfigurationError } from '../src/models/SimulationErrors';
import { parseSimulationConfig } from '../src/models/SimulationConfig';
import { prepareScenario, runScenario } from '../src/models/SimulationScenario';

const provider = new WalkerConstellationProvider({
  planes: 4,
  satellitesPerPlane: 12,
  altitudeKm: 550,
  inclinationDeg: 53,
});

const config = parseSimulationConfig({
  horizonSeconds: 600,
  stepSeconds: 300,
  betaNormal: 0.5,
  trialCount: 2,
  topology: { maxRangeKm: 4000, intraPlaneMaxRangeKm: 4000, linkFailureProbability: 0 },
});

describe('SimulationScenario', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prepares shared snapshots, eclipse and contact schedules', () => {
    const { timeline, inputs } = prepareScenario(config, provider);

    expect(inputs.snapshots.map((s) => s.timestamp)).toEqual([0, 300, 600]);
    expect(timeline.getSnapshots()).toHaveLength(3);
    expect(inputs.snapshots.every((s) => s.valid && s.positions.size === 48)).toBe(true);
    expect(inputs.eclipse).toBeDefined();
    expect(inputs.contacts).toBeDefined();
  });

  it('refuses an empty constellation during setup', () => {
    try {
      prepareScenario(config, new StaticPositionProvider([]));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) expect(error.parameter).toBe('planeGroups');
    }
  });

  it('runs a sweep over a moving constellation', () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const result = runScenario(config, provider);

    expect(result.trials).toHaveLength(2);
    expect(result.trials.every((trial) => trial.series.length === 3)).toBe(true);
    expect(result.snapshotMetrics).toHaveLength(3);
    expect(result.snapshotMetrics.every((m) => m.nodeCount === 48 && m.intraPlaneEdges === 48)).toBe(true);
    expect(result.meanChurn).toBeGreaterThanOrEqual(0);
    expect(result.meanChurn).toBeLessThanOrEqual(1);
    expect(result.aggregate.completedTrials).toBe(2);
  });
});
