import { EventEmitter } from 'events';
import type { TopologySnapshot } from '../types/Network';
import type {
  DetectionEvent,
  EpidemicEvent,
  FirewallEvent,
  InfectionSample,
  SimulationState,
} from '../types/Epidemic';
import { DefenseLayer, selectIdsNodes } from './DefenseLayer';
import type { EclipseSchedule } from './EclipseSchedule';
import type { ContactSchedule } from './GroundVisibility';
import { countStates } from './MetricsCollector';
import { PropagationEngine, type AttemptStats } from './PropagationEngine';
import { RoutingEngine, type RoutingStats } from './RoutingEngine';
import { createRandomSource, shuffle, type RandomSource } from './SeededRandom';
import type { InitialInfectedPolicy, SimulationConfig } from './SimulationConfig';
import { ConfigurationError } from './SimulationErrors';

/**
 * Read-only inputs shared by every trial of a sweep.
 */
export interface SimulationInputs {
  snapshots: readonly TopologySnapshot[];
  eclipse?: EclipseSchedule;
  contacts?: ContactSchedule;
  // Overrides the configured zone strategy
  zones?: ReadonlyMap<string, number>;
}

export interface TrialRunOptions {
  signal?: AbortSignal;
  shouldCancel?: (step: number, state: SimulationState) => boolean;
}

export interface TrialResult {
  seed: number;
  cancelled: boolean;
  states: SimulationState[];
  series: InfectionSample[];
  events: EpidemicEvent[];
  detections: readonly DetectionEvent[];
  firewallBlocks: readonly FirewallEvent[];
  idsNodes: string[];
  packetStats: RoutingStats;
  attemptStats: AttemptStats;
}

function firstValid(snapshots: readonly TopologySnapshot[]): TopologySnapshot {
  const snapshot = snapshots.find((s) => s.valid);
  if (!snapshot) {
    throw new ConfigurationError('snapshots', 'no valid topology snapshot to simulate on');
  }
  return snapshot;
}

// Latest valid snapshot at or before `timestamp`; snapshots are in time order
function snapshotAt(snapshots: readonly TopologySnapshot[], timestamp: number): TopologySnapshot {
  let current = firstValid(snapshots);
  for (const snapshot of snapshots) {
    if (snapshot.timestamp > timestamp) break;
    if (snapshot.valid) current = snapshot;
  }
  return current;
}

export function chooseInitialInfected(
  policy: InitialInfectedPolicy,
  snapshot: TopologySnapshot,
  random: RandomSource
): string[] {
  const ids = Array.from(snapshot.positions.keys()).sort();

  switch (policy.policy) {
    case 'explicit': {
      const unknown = policy.ids.find((id) => !snapshot.positions.has(id));
      if (unknown !== undefined) {
        throw new ConfigurationError('initialInfected.ids', `unknown satellite '${unknown}'`);
      }
      return Array.from(new Set(policy.ids)).sort();
    }
    case 'random':
    case 'highestDegree': {
      if (policy.count > ids.length) {
        throw new ConfigurationError(
          'initialInfected.count',
          `${policy.count} exceeds constellation size ${ids.length}`
        );
      }
      if (policy.policy === 'random') {
        return shuffle(ids, random).slice(0, policy.count).sort();
      }
      const degree = (id: string) => snapshot.adjacency.get(id)?.length ?? 0;
      return ids
        .slice()
        .sort((a, b) => degree(b) - degree(a) || (a < b ? -1 : 1))
        .slice(0, policy.count)
        .sort();
    }
  }
}

/**
 * One Monte Carlo trial. Owns its random source, engine, defense layer and
 * state; shares only the read-only inputs.
 */
export class SimulationTrial extends EventEmitter {
  public readonly seed: number;
  private config: SimulationConfig;
  private inputs: SimulationInputs;
  private random: RandomSource;
  private defense: DefenseLayer;
  private router: RoutingEngine;
  private engine: PropagationEngine;
  private idsNodes: string[];
  private satelliteIds: string[];
  private state: SimulationState;
  private events: EpidemicEvent[] = [];
  // Seed set waiting for the attack start time
  private pendingSeeds: string[] | null = null;

  constructor(config: SimulationConfig, seed: number, inputs: SimulationInputs) {
    super();
    this.seed = seed;
    this.config = config;
    this.inputs = inputs;
    this.random = createRandomSource(seed);

    const first = firstValid(inputs.snapshots);
    this.satelliteIds = Array.from(first.positions.keys()).sort();

    const unknownIds = (config.idsNodes ?? []).filter((id) => !first.positions.has(id));
    if (unknownIds.length > 0) {
      throw new ConfigurationError('idsNodes', `unknown satellite '${unknownIds[0]}'`);
    }
    this.idsNodes = config.idsNodes
      ? Array.from(new Set(config.idsNodes)).sort()
      : selectIdsNodes(this.satelliteIds, config.idsCoverage, this.random);

    this.defense = new DefenseLayer(
      {
        pDetect: config.pDetect,
        idsNodes: this.idsNodes,
        patchRatePerHour: config.patchRatePerHour,
        stationPatchCapacity: config.stationPatchCapacity,
        zoneCount: config.zoneCount,
        zoneStrategy: config.zoneStrategy,
        firewallRate: config.firewallRate,
      },
      inputs.zones
    );

    this.router = new RoutingEngine({
      bufferCapacity: config.bufferCapacity,
      inspect: (packet, nodeId, timestamp) => this.defense.inspectPacket(packet, nodeId, timestamp),
    });

    this.engine = new PropagationEngine(
      {
        betaNormal: config.betaNormal,
        betaEclipse: config.betaEclipse,
        c2TimeoutSeconds: config.c2TimeoutSeconds,
        exploitHops: config.exploitHops,
      },
      this.random,
      this.defense,
      config.exploitHops > 1 ? (snapshot, from, to) => this.router.shortestPath(snapshot, from, to) : undefined
    );

    const satellites = Array.from(first.positions.values()).map(({ id, planeId }) => ({ id, planeId }));
    const initial = this.engine.initialState(satellites, inputs.snapshots[0].timestamp);
    const seeds = chooseInitialInfected(config.initialInfected, first, this.random);
    const startSeconds = config.initialInfected.startSeconds ?? initial.timestamp;
    if (startSeconds > initial.timestamp) {
      this.state = initial;
      this.pendingSeeds = seeds;
    } else {
      const seeded = this.engine.seed(initial, seeds);
      this.state = seeded.state;
      this.events.push(...seeded.events);
    }
  }

  public run(options: TrialRunOptions = {}): TrialResult {
    const { stepSeconds, horizonSeconds } = this.config;
    const halfWidth = this.config.eclipseHalfWidthMinutes * 60;
    const steps = Math.floor(horizonSeconds / stepSeconds);
    const states: SimulationState[] = [this.state];
    let cancelled = false;

    for (let step = 0; step < steps; step++) {
      if (options.signal?.aborted || options.shouldCancel?.(step, this.state)) {
        cancelled = true;
        this.emit('cancelled', step);
        break;
      }

      if (this.releaseSeeds()) states[states.length - 1] = this.state;
      const timestamp = this.state.timestamp;
      const detectionsBefore = this.defense.getDetections().length;
      const snapshot = snapshotAt(this.inputs.snapshots, timestamp);
      const contacts = this.inputs.contacts;

      const recoveries = this.defense.selectPatches(
        this.state,
        (id) => contacts?.stationsInContact(id, timestamp) ?? [],
        stepSeconds
      );
      this.generateTraffic(snapshot, timestamp);
      this.router.tick(snapshot);

      const result = this.engine.step(
        this.state,
        {
          snapshot,
          eclipseTransition: this.inputs.eclipse?.transitionSet(timestamp, halfWidth) ?? new Set(),
          lastContact: (id) => contacts?.lastContactAtOrBefore(id, timestamp) ?? null,
          recoveries,
        },
        stepSeconds
      );

      this.state = result.state;
      states.push(result.state);
      for (const event of result.events) {
        this.events.push(event);
        this.emit('transition', event);
      }
      for (const detection of this.defense.getDetections().slice(detectionsBefore)) {
        this.emit('detection', detection);
      }
      this.emit('step', result.state);
    }
    if (!cancelled && this.releaseSeeds()) states[states.length - 1] = this.state;

    return {
      seed: this.seed,
      cancelled,
      states,
      series: states.map(countStates),
      events: this.events.slice(),
      detections: this.defense.getDetections(),
      firewallBlocks: this.defense.getFirewallBlocks(),
      idsNodes: this.idsNodes.slice(),
      packetStats: this.router.getStats(),
      attemptStats: this.engine.getAttemptStats(),
    };
  }

  // Infect the waiting seed set once the attack start time is reached
  private releaseSeeds(): boolean {
    const startSeconds = this.config.initialInfected.startSeconds ?? 0;
    if (!this.pendingSeeds || this.state.timestamp < startSeconds) return false;

    const seeded = this.engine.seed(this.state, this.pendingSeeds);
    this.pendingSeeds = null;
    this.state = seeded.state;
    for (const event of seeded.events) {
      this.events.push(event);
      this.emit('transition', event);
    }
    return true;
  }

  // Background traffic between random satellite pairs
  private generateTraffic(snapshot: TopologySnapshot, timestamp: number): void {
    const count = this.config.trafficPacketsPerStep;
    if (count === 0 || this.satelliteIds.length < 2 || !snapshot.valid) return;

    for (let i = 0; i < count; i++) {
      const sourceIndex = Math.floor(this.random() * this.satelliteIds.length);
      let destinationIndex = Math.floor(this.random() * (this.satelliteIds.length - 1));
      if (destinationIndex >= sourceIndex) destinationIndex++;

      this.router.createPacket(
        this.satelliteIds[sourceIndex],
        this.satelliteIds[destinationIndex],
        this.config.packetSizeBytes,
        timestamp
      );
    }
  }
}
