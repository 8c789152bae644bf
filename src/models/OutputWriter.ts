import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { EpidemicEvent } from '../types/Epidemic';
import type { SnapshotMetrics } from './MetricsCollector';
import type { SweepAggregate } from './MonteCarloSweep';
import type { TrialResult } from './SimulationTrial';

type CsvValue = string | number | boolean | null | undefined;

function csvCell(value: CsvValue): string {
  if (value === null || value === undefined) return '';
  const text = String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(header: readonly string[], rows: readonly (readonly CsvValue[])[]): string {
  return [header, ...rows].map((row) => row.map(csvCell).join(',')).join('\n') + '\n';
}

export function infectionSeriesCsv(trials: readonly TrialResult[]): string {
  const rows = trials.flatMap((trial) =>
    trial.series.map((sample) => [
      trial.seed,
      sample.timestamp,
      sample.susceptible,
      sample.infected,
      sample.recovered,
      sample.dormant,
      trial.cancelled,
    ])
  );
  return toCsv(['seed', 'timestamp', 'susceptible', 'infected', 'recovered', 'dormant', 'cancelled'], rows);
}

export function snapshotMetricsCsv(metrics: readonly SnapshotMetrics[]): string {
  const rows = metrics.map((m) => [
    m.timestamp,
    m.valid,
    m.nodeCount,
    m.edgeCount,
    m.intraPlaneEdges,
    m.interPlaneEdges,
    m.avgDegree,
    m.componentCount,
    m.largestComponent,
    m.avgPathLength,
    m.diameter,
    m.churnRate,
  ]);
  return toCsv(
    [
      'timestamp',
      'valid',
      'nodeCount',
      'edgeCount',
      'intraPlaneEdges',
      'interPlaneEdges',
      'avgDegree',
      'componentCount',
      'largestComponent',
      'avgPathLength',
      'diameter',
      'churnRate',
    ],
    rows
  );
}

export function eventLogCsv(seed: number, events: readonly EpidemicEvent[]): string {
  const rows = events.map((event) => [seed, event.timestamp, event.nodeId, event.transition, event.cause, event.sourceId]);
  return toCsv(['seed', 'timestamp', 'nodeId', 'transition', 'cause', 'sourceId'], rows);
}

export function aggregateCsv(aggregate: SweepAggregate): string {
  const rows = aggregate.series.map((s) => [s.timestamp, s.meanInfected, s.p10, s.p50, s.p90, s.meanRecovered]);
  return toCsv(['timestamp', 'meanInfected', 'p10', 'p50', 'p90', 'meanRecovered'], rows);
}

/**
 * Writes run results as CSV files under one output directory.
 */
export class OutputWriter {
  private directory: string;

  constructor(directory: string) {
    this.directory = directory;
  }

  public async writeTrials(trials: readonly TrialResult[]): Promise<string[]> {
    const written = [await this.write('infection_series.csv', infectionSeriesCsv(trials))];
    for (const trial of trials) {
      written.push(await this.write(`events_${trial.seed}.csv`, eventLogCsv(trial.seed, trial.events)));
    }
    return written;
  }

  public async writeSnapshotMetrics(metrics: readonly SnapshotMetrics[]): Promise<string> {
    return this.write('snapshot_metrics.csv', snapshotMetricsCsv(metrics));
  }

  public async writeAggregate(aggregate: SweepAggregate): Promise<string> {
    return this.write('aggregate.csv', aggregateCsv(aggregate));
  }

  private async write(fileName: string, contents: string): Promise<string> {
    await mkdir(this.directory, { recursive: true });
    const filePath = path.join(this.directory, fileName);
    await writeFile(filePath, contents, 'utf8');
    return filePath;
  }
}
