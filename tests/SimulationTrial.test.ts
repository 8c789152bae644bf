import { afterEach, describe, it, expect, vi } from 'vitest';
import type { DetectionEvent, SimulationState } from '../src/types/Epidemic';
import type { ContactWindow } from '../src/types/Network';
import { ContactSchedule } from '../src/models/GroundVisibility';
import { MonteCarloSweep, aggregateTrials } from '../src/models/MonteCarloSweep';
import { createRandomSource } from '../src/models/SeededRandom';
import { parseSimulationConfig, type SimulationConfigInput } from '../src/models/SimulationConfig';
import { ConfigurationError, SeedReuseError } from '../src/models/SimulationErrors';
import { SimulationTrial, chooseInitialInfected } from '../src/models/SimulationTrial';
import { createSnapshot } from '../src/models/TopologyBuilder';
import { chainLinks, graphSnapshot, link, nodeIds, ringLinks } from './fixtures';

const ids = nodeIds(10);
const ring = graphSnapshot(ids, ringLinks(ids));

function config(overrides: SimulationConfigInput = {}) {
  return parseSimulationConfig({
    horizonSeconds: 3000,
    stepSeconds: 300,
    betaNormal: 1,
    betaEclipse: 1,
    pDetect: 0,
    c2TimeoutSeconds: 1e9,
    initialInfected: { policy: 'explicit', ids: ['n0'] },
    groundStations: [],
    ...overrides,
  });
}

describe('SimulationTrial', () => {
  it('runs the full horizon on a shared snapshot', () => {
    const trial = new SimulationTrial(config(), 7, { snapshots: [ring] });
    const steps = vi.fn();
    trial.on('step', steps);

    const result = trial.run();

    expect(result.cancelled).toBe(false);
    expect(result.states).toHaveLength(11);
    expect(result.series[4].infected).toBe(9);
    expect(result.series[5].infected).toBe(10);
    expect(result.series[10].timestamp).toBe(3000);
    expect(result.events.filter((e) => e.transition === 'infected')).toHaveLength(10);
    expect(result.events[0]).toEqual({ nodeId: 'n0', transition: 'infected', cause: 'seed', timestamp: 0 });
    expect(steps).toHaveBeenCalledTimes(10);
  });

  it('stops early when cancelled and reports it', () => {
    const trial = new SimulationTrial(config(), 7, { snapshots: [ring] });
    const cancelled = vi.fn();
    trial.on('cancelled', cancelled);

    const result = trial.run({ shouldCancel: (step) => step === 3 });
    expect(result.cancelled).toBe(true);
    expect(result.states).toHaveLength(4);
    expect(cancelled).toHaveBeenCalledWith(3);

    const controller = new AbortController();
    controller.abort();
    const aborted = new SimulationTrial(config(), 7, { snapshots: [ring] }).run({ signal: controller.signal });
    expect(aborted.cancelled).toBe(true);
    expect(aborted.states).toHaveLength(1);
  });

  it('emits detections from IDS hosts and keeps them protected', () => {
    const trial = new SimulationTrial(config({ pDetect: 1, idsNodes: ['n1'] }), 7, { snapshots: [ring] });
    const detections: DetectionEvent[] = [];
    trial.on('detection', (event: DetectionEvent) => detections.push(event));

    const result = trial.run();
    const final = result.states[result.states.length - 1];

    expect(final.nodes.get('n1')?.health).toBe('susceptible');
    expect(result.series[10].infected).toBe(9);
    expect(detections.length).toBeGreaterThan(0);
    expect(detections).toEqual(result.detections);
    expect(result.idsNodes).toEqual(['n1']);
  });

  it('injects background traffic each step', () => {
    const result = new SimulationTrial(config({ trafficPacketsPerStep: 2 }), 7, { snapshots: [ring] }).run();
    expect(result.packetStats.injected).toBe(20);
  });

  it('keeps spreading over the last valid snapshot when one is invalid', () => {
    const chain = graphSnapshot(ids, chainLinks(ids), 0);
    const broken = createSnapshot(300, new Map(), [], { valid: false });
    const later = graphSnapshot(ids, chainLinks(ids), 600);
    const result = new SimulationTrial(config({ horizonSeconds: 900, trafficPacketsPerStep: 5 }), 7, {
      snapshots: [chain, broken, later],
    }).run();

    expect(result.series.map((sample) => sample.infected)).toEqual([1, 2, 3, 4]);
    expect(result.packetStats.dropped['stale-route']).toBe(0);
  });

  it('holds the seed set back until the attack start time', () => {
    const result = new SimulationTrial(
      config({ initialInfected: { policy: 'explicit', ids: ['n0'], startSeconds: 900 } }),
      7,
      { snapshots: [ring] }
    ).run();

    expect(result.series.slice(0, 5).map((sample) => sample.infected)).toEqual([0, 0, 0, 1, 3]);
    expect(result.events[0]).toEqual({ nodeId: 'n0', transition: 'infected', cause: 'seed', timestamp: 900 });
  });

  it('rejects inputs without a valid snapshot', () => {
    expect(() => new SimulationTrial(config(), 7, { snapshots: [] })).toThrow(ConfigurationError);
  });
});

describe('reference scenarios', () => {
  function infectedIn(state: SimulationState, members: string[]): number {
    return members.filter((id) => state.nodes.get(id)?.health === 'infected').length;
  }

  it('never reaches a disconnected component', () => {
    const left = nodeIds(5, 'a');
    const right = nodeIds(5, 'b');
    const split = graphSnapshot([...left, ...right], [...ringLinks(left), ...ringLinks(right)]);
    const result = new SimulationTrial(config({ initialInfected: { policy: 'explicit', ids: ['a0'] } }), 7, {
      snapshots: [split],
    }).run();

    expect(result.states.every((state) => infectedIn(state, right) === 0)).toBe(true);
    expect(infectedIn(result.states[result.states.length - 1], left)).toBe(5);
  });

  it('recovers every infected satellite in one step when the patch budget covers them', () => {
    const windows: ContactWindow[] = ids.map((satelliteId) => ({
      stationId: 'gs1',
      satelliteId,
      start: 0,
      end: 3000,
      maxElevation: 60,
    }));
    const result = new SimulationTrial(
      config({ initialInfected: { policy: 'explicit', ids }, patchRatePerHour: 120 }),
      7,
      { snapshots: [ring], contacts: new ContactSchedule(windows) }
    ).run();

    expect(result.series[0]).toMatchObject({ infected: 10, recovered: 0 });
    expect(result.series[1]).toMatchObject({ timestamp: 300, infected: 0, recovered: 10 });
  });

  it('holds the infection inside its zone behind a closed firewall', () => {
    const zones = new Map(ids.map((id, index) => [id, index < 5 ? 0 : 1]));
    const result = new SimulationTrial(config({ zoneCount: 2, firewallRate: 1 }), 7, {
      snapshots: [ring],
      zones,
    }).run();

    const outside = ids.slice(5);
    expect(result.states).toHaveLength(11);
    expect(result.states.every((state) => infectedIn(state, outside) === 0)).toBe(true);
    expect(infectedIn(result.states[10], ids.slice(0, 5))).toBe(5);
    expect(result.firewallBlocks.length).toBeGreaterThan(0);
  });
});

describe('chooseInitialInfected', () => {
  const star = graphSnapshot(['hub', 'x1', 'x2', 'x3'], [link('hub', 'x1'), link('hub', 'x2'), link('hub', 'x3')]);

  it('picks the highest-degree satellites', () => {
    expect(chooseInitialInfected({ policy: 'highestDegree', count: 1 }, star, createRandomSource(1))).toEqual(['hub']);
    expect(chooseInitialInfected({ policy: 'highestDegree', count: 2 }, star, createRandomSource(1))).toEqual([
      'hub',
      'x1',
    ]);
  });

  it('draws a reproducible random set', () => {
    const first = chooseInitialInfected({ policy: 'random', count: 2 }, ring, createRandomSource(5));
    expect(first).toHaveLength(2);
    expect(chooseInitialInfected({ policy: 'random', count: 2 }, ring, createRandomSource(5))).toEqual(first);
  });

  it('names the invalid policy field', () => {
    const parameter = (run: () => unknown) => {
      try {
        run();
      } catch (error) {
        if (error instanceof ConfigurationError) return error.parameter;
      }
      return undefined;
    };

    expect(parameter(() => chooseInitialInfected({ policy: 'random', count: 11 }, ring, createRandomSource(1)))).toBe(
      'initialInfected.count'
    );
    expect(parameter(() => chooseInitialInfected({ policy: 'explicit', ids: ['ghost'] }, ring, createRandomSource(1)))).toBe(
      'initialInfected.ids'
    );
  });
});

describe('MonteCarloSweep', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('aggregates completed trials with percentiles', () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const sweep = new MonteCarloSweep(config({ trialCount: 3 }), { snapshots: [ring] });
    const { trials, aggregate } = sweep.run();

    expect(trials).toHaveLength(3);
    expect(aggregate.completedTrials).toBe(3);
    expect(aggregate.series).toHaveLength(11);
    expect(aggregate.series[10]).toEqual({ timestamp: 3000, meanInfected: 10, p10: 10, p50: 10, p90: 10, meanRecovered: 0 });
    expect(aggregate.attackRate).toEqual({ mean: 1, p10: 1, p50: 1, p90: 1 });
  });

  it('is reproducible for the same seeds', () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const stochastic = config({ trialCount: 4, betaNormal: 0.4, baseSeed: 99 });
    const first = new MonteCarloSweep(stochastic, { snapshots: [ring] }).run().aggregate;
    const second = new MonteCarloSweep(stochastic, { snapshots: [ring] }).run().aggregate;
    expect(second).toEqual(first);
  });

  it('refuses to bind one seed to two trials', () => {
    expect(() => new MonteCarloSweep(config({ trialCount: 2 }), { snapshots: [ring] }, [5, 5])).toThrow(SeedReuseError);
  });

  it('leaves cancelled trials out of the aggregates', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const sweep = new MonteCarloSweep(config({ trialCount: 3 }), { snapshots: [ring] });
    sweep.cancelTrial(sweep.getSeeds()[1]);

    const { trials, aggregate } = sweep.run();

    expect(trials.map((t) => t.cancelled)).toEqual([false, true, false]);
    expect(aggregate.completedTrials).toBe(2);
    expect(aggregate.cancelledTrials).toBe(1);
    expect(aggregate.series).toEqual(aggregateTrials([trials[0], trials[2]]).series);
    expect(log).toHaveBeenCalledWith('Sweep finished: 2 completed, 1 cancelled, mean attack rate 100.0%');
  });

  it('cancels a single trial through the callback', () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const sweep = new MonteCarloSweep(config({ trialCount: 2 }), { snapshots: [ring] });
    const { trials } = sweep.run({ shouldCancel: (trialIndex, step) => trialIndex === 0 && step === 2 });

    expect(trials[0].cancelled).toBe(true);
    expect(trials[0].states).toHaveLength(3);
    expect(trials[1].cancelled).toBe(false);
  });
});
