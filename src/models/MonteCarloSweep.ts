import { EventEmitter } from 'events';
import type { SimulationState } from '../types/Epidemic';
import type { SimulationConfig } from './SimulationConfig';
import { trialSeeds } from './SimulationConfig';
import { SeedReuseError } from './SimulationErrors';
import { SimulationTrial, type SimulationInputs, type TrialResult } from './SimulationTrial';

export interface SweepRunOptions {
  signal?: AbortSignal;
  shouldCancel?: (trialIndex: number, step: number, state: SimulationState) => boolean;
}

export interface InfectedPercentiles {
  timestamp: number;
  meanInfected: number;
  p10: number;
  p50: number;
  p90: number;
  meanRecovered: number;
}

export interface AttackRateStats {
  mean: number;
  p10: number;
  p50: number;
  p90: number;
}

export interface SweepAggregate {
  completedTrials: number;
  cancelledTrials: number;
  series: InfectedPercentiles[];
  attackRate: AttackRateStats | null;
  meanDetections: number;
  meanFirewallBlocks: number;
}

export interface SweepResult {
  trials: TrialResult[];
  aggregate: SweepAggregate;
}

function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) return 0;
  return sorted[Math.min(sorted.length - 1, Math.floor(sorted.length * p))];
}

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

// Nodes ever infected by the end of the trial, as a share of the constellation
export function attackRate(result: TrialResult): number {
  const final = result.states[result.states.length - 1];
  if (!final || final.nodes.size === 0) return 0;

  const everInfected = new Set(
    result.events.filter((event) => event.transition === 'infected').map((event) => event.nodeId)
  );
  return everInfected.size / final.nodes.size;
}

/**
 * Aggregate completed trials. Cancelled trials are reported only by count.
 */
export function aggregateTrials(trials: readonly TrialResult[]): SweepAggregate {
  const completed = trials.filter((trial) => !trial.cancelled);
  const byTimestamp = new Map<number, { infected: number[]; recovered: number[] }>();

  for (const trial of completed) {
    for (const sample of trial.series) {
      let bucket = byTimestamp.get(sample.timestamp);
      if (!bucket) {
        bucket = { infected: [], recovered: [] };
        byTimestamp.set(sample.timestamp, bucket);
      }
      bucket.infected.push(sample.infected);
      bucket.recovered.push(sample.recovered);
    }
  }

  const series = Array.from(byTimestamp.entries())
    .sort(([a], [b]) => a - b)
    .map(([timestamp, bucket]) => {
      const sorted = bucket.infected.slice().sort((a, b) => a - b);
      return {
        timestamp,
        meanInfected: mean(sorted),
        p10: percentile(sorted, 0.1),
        p50: percentile(sorted, 0.5),
        p90: percentile(sorted, 0.9),
        meanRecovered: mean(bucket.recovered),
      };
    });

  const rates = completed.map(attackRate).sort((a, b) => a - b);

  return {
    completedTrials: completed.length,
    cancelledTrials: trials.length - completed.length,
    series,
    attackRate: rates.length === 0
      ? null
      : { mean: mean(rates), p10: percentile(rates, 0.1), p50: percentile(rates, 0.5), p90: percentile(rates, 0.9) },
    meanDetections: mean(completed.map((trial) => trial.detections.length)),
    meanFirewallBlocks: mean(completed.map((trial) => trial.firewallBlocks.length)),
  };
}

/**
 * Independent trials over shared read-only inputs, one seed each.
 */
export class MonteCarloSweep extends EventEmitter {
  private config: SimulationConfig;
  private inputs: SimulationInputs;
  private seeds: number[];
  private cancelledSeeds: Set<number> = new Set();

  constructor(config: SimulationConfig, inputs: SimulationInputs, seeds: readonly number[] = trialSeeds(config)) {
    super();
    const seen = new Set<number>();
    for (const seed of seeds) {
      if (seen.has(seed)) throw new SeedReuseError(seed);
      seen.add(seed);
    }
    this.config = config;
    this.inputs = inputs;
    this.seeds = seeds.slice();
  }

  public getSeeds(): readonly number[] {
    return this.seeds;
  }

  // Stop the trial bound to `seed` at its next step; other trials continue
  public cancelTrial(seed: number): void {
    this.cancelledSeeds.add(seed);
  }

  public run(options: SweepRunOptions = {}): SweepResult {
    const trials: TrialResult[] = [];

    this.seeds.forEach((seed, trialIndex) => {
      const trial = new SimulationTrial(this.config, seed, this.inputs);
      this.emit('trialStarted', seed, trialIndex);

      const result = trial.run({
        signal: options.signal,
        shouldCancel: (step, state) =>
          this.cancelledSeeds.has(seed) || (options.shouldCancel?.(trialIndex, step, state) ?? false),
      });

      trials.push(result);
      this.emit(result.cancelled ? 'trialCancelled' : 'trialCompleted', result);
    });

    const aggregate = aggregateTrials(trials);
    const rate = aggregate.attackRate;
    console.log(
      `Sweep finished: ${aggregate.completedTrials} completed, ${aggregate.cancelledTrials} cancelled` +
        (rate ? `, mean attack rate ${(rate.mean * 100).toFixed(1)}%` : '')
    );

    return { trials, aggregate };
  }
}
