import type { TopologySnapshot } from '../types/Network';
import type { EpidemicEvent, SimulationState } from '../types/Epidemic';
import type { SatelliteNode } from '../types/Satellite';
import { NetworkPathfinding } from './NetworkPathfinding';
import type { RandomSource } from './SeededRandom';
import { ConfigurationError } from './SimulationErrors';

export interface PropagationParams {
  betaNormal: number;
  betaEclipse: number;
  c2TimeoutSeconds: number;
  // 1 = direct neighbours only; larger values deliver the exploit over routed paths
  exploitHops: number;
}

/**
 * Screening applied to every exploit attempt. Implemented by the defense layer;
 * draws must come from the `random` passed in so a trial stays reproducible.
 */
export interface ExploitScreen {
  firewallBlocks(path: readonly string[], snapshot: TopologySnapshot, random: RandomSource): boolean;
  detectionProbability(path: readonly string[]): number;
  recordDetection(path: readonly string[], timestamp: number): void;
}

export type ExploitRouter = (snapshot: TopologySnapshot, from: string, to: string) => string[] | null;

export interface StepEnvironment {
  snapshot: TopologySnapshot;
  // Victims currently inside their eclipse-transition window
  eclipseTransition: ReadonlySet<string>;
  // Latest ground contact at or before the step's timestamp
  lastContact: (satelliteId: string) => number | null;
  // Recoveries chosen by the defense layer from the same frozen state
  recoveries?: readonly string[];
}

export interface StepResult {
  state: SimulationState;
  events: EpidemicEvent[];
}

export interface AttemptStats {
  attempts: number;
  blockedByFirewall: number;
  detected: number;
  failed: number;
  succeeded: number;
}

function validateParams(params: PropagationParams): void {
  const probabilities: (keyof PropagationParams)[] = ['betaNormal', 'betaEclipse'];
  for (const key of probabilities) {
    const value = params[key];
    if (!(value >= 0 && value <= 1)) {
      throw new ConfigurationError(key, `must be a probability in [0, 1], got ${value}`);
    }
  }
  if (!(params.c2TimeoutSeconds >= 0)) {
    throw new ConfigurationError('c2TimeoutSeconds', 'must be non-negative');
  }
  if (!Number.isInteger(params.exploitHops) || params.exploitHops < 1) {
    throw new ConfigurationError('exploitHops', 'must be an integer >= 1');
  }
}

export class PropagationEngine {
  private params: PropagationParams;
  private random: RandomSource;
  private screen?: ExploitScreen;
  private router?: ExploitRouter;
  private attemptStats: AttemptStats = { attempts: 0, blockedByFirewall: 0, detected: 0, failed: 0, succeeded: 0 };

  constructor(params: PropagationParams, random: RandomSource, screen?: ExploitScreen, router?: ExploitRouter) {
    validateParams(params);
    this.params = { ...params };
    this.random = random;
    this.screen = screen;
    this.router = router;
  }

  public getAttemptStats(): AttemptStats {
    return { ...this.attemptStats };
  }

  public initialState(satellites: Iterable<{ id: string; planeId: string }>, timestamp: number): SimulationState {
    const nodes = new Map<string, SatelliteNode>();
    for (const satellite of satellites) {
      nodes.set(satellite.id, {
        id: satellite.id,
        planeId: satellite.planeId,
        health: 'susceptible',
        active: false,
        lastC2Contact: null,
        infectedAt: null,
        recoveredAt: null,
      });
    }
    return { step: 0, timestamp, nodes };
  }

  // Mark the initial infected set; unknown or non-susceptible ids are ignored
  public seed(state: SimulationState, ids: readonly string[]): StepResult {
    const nodes = new Map(state.nodes);
    const events: EpidemicEvent[] = [];

    for (const id of ids) {
      const node = nodes.get(id);
      if (!node || node.health !== 'susceptible') continue;

      nodes.set(id, this.infect(node, state.timestamp));
      events.push({ nodeId: id, transition: 'infected', cause: 'seed', timestamp: state.timestamp });
    }

    return { state: { ...state, nodes }, events };
  }

  /**
   * Advance from the frozen state at t to t + stepSeconds.
   * Every draw reads the state at t; results are applied together.
   */
  public step(state: SimulationState, env: StepEnvironment, stepSeconds: number): StepResult {
    const timestamp = state.timestamp;
    const events: EpidemicEvent[] = [];

    // C2 reachability at t decides which infected nodes may spread this step
    const frozen = this.refreshCommandAndControl(state, env, events);
    const infections = this.computeInfections(frozen, env);

    const nodes = new Map(frozen.nodes);
    const nextTimestamp = timestamp + stepSeconds;
    const recovering = new Set(env.recoveries ?? []);

    infections.forEach((sourceId, id) => {
      if (recovering.has(id)) return;
      const node = nodes.get(id);
      if (!node || node.health !== 'susceptible') return;

      nodes.set(id, this.infect(node, nextTimestamp));
      events.push({ nodeId: id, transition: 'infected', cause: 'exploit', timestamp: nextTimestamp, sourceId });
    });

    for (const id of recovering) {
      const node = nodes.get(id);
      if (!node || node.health === 'recovered') continue;

      nodes.set(id, { ...node, health: 'recovered', active: false, recoveredAt: nextTimestamp });
      events.push({ nodeId: id, transition: 'recovered', cause: 'patch', timestamp: nextTimestamp });
    }

    return { state: { step: state.step + 1, timestamp: nextTimestamp, nodes }, events };
  }

  private infect(node: SatelliteNode, timestamp: number): SatelliteNode {
    return { ...node, health: 'infected', active: true, infectedAt: timestamp, lastC2Contact: timestamp };
  }

  private refreshCommandAndControl(
    state: SimulationState,
    env: StepEnvironment,
    events: EpidemicEvent[]
  ): SimulationState {
    const timestamp = state.timestamp;
    const nodes = new Map(state.nodes);
    let changed = false;

    for (const [id, node] of state.nodes) {
      if (node.health !== 'infected') continue;

      const contact = env.lastContact(id);
      const lastC2 = Math.max(node.lastC2Contact ?? -Infinity, contact ?? -Infinity);
      const active = timestamp - lastC2 <= this.params.c2TimeoutSeconds;
      const lastC2Contact = Number.isFinite(lastC2) ? lastC2 : node.lastC2Contact;

      if (active === node.active && lastC2Contact === node.lastC2Contact) continue;

      nodes.set(id, { ...node, active, lastC2Contact });
      changed = true;

      if (active && !node.active) {
        events.push({ nodeId: id, transition: 'reactivated', cause: 'c2-contact', timestamp });
      } else if (!active && node.active) {
        events.push({ nodeId: id, transition: 'dormant', cause: 'c2-timeout', timestamp });
      }
    }

    return changed ? { ...state, nodes } : state;
  }

  /**
   * Exploit attempts from every active infected node. Returns victim → source.
   * Spreaders and victims are visited in id order, so the sequence of draws
   * depends only on the frozen state and the snapshot.
   */
  public computeInfections(state: SimulationState, env: StepEnvironment): Map<string, string> {
    const infections = new Map<string, string>();
    const snapshot = env.snapshot;
    if (!snapshot.valid) return infections;

    const spreaders = Array.from(state.nodes.values())
      .filter((node) => node.health === 'infected' && node.active)
      .map((node) => node.id)
      .sort();

    for (const sourceId of spreaders) {
      if (!snapshot.adjacency.has(sourceId)) continue;

      const { distances, parents } = NetworkPathfinding.hopDistances(snapshot, sourceId, this.params.exploitHops);
      const targets = Array.from(distances.keys())
        .filter((id) => id !== sourceId && state.nodes.get(id)?.health === 'susceptible')
        .sort();

      for (const targetId of targets) {
        if (infections.has(targetId)) continue;

        const path = this.exploitPath(snapshot, parents, sourceId, targetId);
        if (path.length < 2) continue;

        if (this.attempt(path, snapshot, env)) {
          infections.set(targetId, sourceId);
        }
      }
    }

    return infections;
  }

  private exploitPath(
    snapshot: TopologySnapshot,
    parents: ReadonlyMap<string, string>,
    sourceId: string,
    targetId: string
  ): string[] {
    if (this.params.exploitHops > 1 && this.router) {
      const routed = this.router(snapshot, sourceId, targetId);
      // The routed path must stay inside the hop budget the target was found with
      if (routed && routed.length >= 2 && routed.length - 1 <= this.params.exploitHops) return routed;
    }
    return NetworkPathfinding.pathFromParents(parents, sourceId, targetId);
  }

  // Success probability: beta_eff × (1 − P_detect)^hops, after the firewall check
  private attempt(path: readonly string[], snapshot: TopologySnapshot, env: StepEnvironment): boolean {
    this.attemptStats.attempts++;
    const hops = path.length - 1;
    const targetId = path[path.length - 1];

    if (this.screen?.firewallBlocks(path, snapshot, this.random)) {
      this.attemptStats.blockedByFirewall++;
      return false;
    }

    const pDetect = this.screen?.detectionProbability(path) ?? 0;
    if (pDetect > 0) {
      let detected = false;
      for (let hop = 0; hop < hops; hop++) {
        if (this.random() < pDetect) detected = true;
      }
      if (detected) {
        this.attemptStats.detected++;
        this.screen?.recordDetection(path, snapshot.timestamp);
        return false;
      }
    }

    const beta = env.eclipseTransition.has(targetId) ? this.params.betaEclipse : this.params.betaNormal;
    if (this.random() < beta) {
      this.attemptStats.succeeded++;
      return true;
    }

    this.attemptStats.failed++;
    return false;
  }
}
