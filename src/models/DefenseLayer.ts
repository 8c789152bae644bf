import type { DataPacket, Link, TopologySnapshot } from '../types/Network';
import type { DetectionEvent, FirewallEvent, SimulationState } from '../types/Epidemic';
import type { ExploitScreen } from './PropagationEngine';
import { linkKey } from './LinkGeometry';
import { RAD_TO_DEG } from './PhysicalConstants';
import { shuffle, type RandomSource } from './SeededRandom';
import { ConfigurationError } from './SimulationErrors';

export type ZoneStrategy = 'plane' | 'geography';

export interface DefenseParams {
  pDetect: number;
  idsNodes: readonly string[];
  patchRatePerHour: number;
  // Patch uploads each station can carry in one step
  stationPatchCapacity: number;
  zoneCount: number;
  zoneStrategy: ZoneStrategy;
  firewallRate: number;
}

export const DEFAULT_DEFENSE_PARAMS: DefenseParams = {
  pDetect: 0.3,
  idsNodes: [],
  patchRatePerHour: 0,
  stationPatchCapacity: Infinity,
  zoneCount: 1,
  zoneStrategy: 'plane',
  firewallRate: 0.7,
};

/**
 * Pick round(coverage × N) IDS hosts with the trial's random source.
 */
export function selectIdsNodes(satelliteIds: readonly string[], coverage: number, random: RandomSource): string[] {
  if (!(coverage >= 0 && coverage <= 1)) {
    throw new ConfigurationError('idsCoverage', `must be in [0, 1], got ${coverage}`);
  }
  const count = Math.round(coverage * satelliteIds.length);
  if (count === 0) return [];
  return shuffle(satelliteIds.slice().sort(), random).slice(0, count).sort();
}

/**
 * Zone per satellite. 'plane' splits the sorted plane ids into contiguous
 * blocks; 'geography' slices the sub-satellite longitude.
 */
export function assignZones(
  snapshot: TopologySnapshot,
  zoneCount: number,
  strategy: ZoneStrategy
): Map<string, number> {
  const zones = new Map<string, number>();

  if (strategy === 'plane') {
    const planes = Array.from(new Set(Array.from(snapshot.positions.values()).map((entry) => entry.planeId))).sort();
    const planeZone = new Map(planes.map((planeId, index) => [planeId, Math.floor((index * zoneCount) / planes.length)]));
    snapshot.positions.forEach((entry, id) => zones.set(id, planeZone.get(entry.planeId) ?? 0));
    return zones;
  }

  snapshot.positions.forEach((entry, id) => {
    const longitude = Math.atan2(entry.position.y, entry.position.x) * RAD_TO_DEG;
    const zone = Math.floor(((longitude + 180) / 360) * zoneCount);
    zones.set(id, Math.min(zoneCount - 1, Math.max(0, zone)));
  });
  return zones;
}

export class DefenseLayer implements ExploitScreen {
  private params: DefenseParams;
  private idsNodes: Set<string>;
  private zones: Map<string, number> | null = null;
  private zonesFor: TopologySnapshot | null = null;
  private explicitZones: ReadonlyMap<string, number> | null;
  private patchCarry: number = 0;
  private detections: DetectionEvent[] = [];
  private firewallBlocksLog: FirewallEvent[] = [];

  constructor(params: Partial<DefenseParams> = {}, explicitZones?: ReadonlyMap<string, number>) {
    this.params = { ...DEFAULT_DEFENSE_PARAMS, ...params };
    this.validate();
    this.idsNodes = new Set(this.params.idsNodes);
    this.explicitZones = explicitZones ?? null;
  }

  private validate(): void {
    const { pDetect, firewallRate, patchRatePerHour, stationPatchCapacity, zoneCount } = this.params;
    if (!(pDetect >= 0 && pDetect <= 1)) throw new ConfigurationError('pDetect', `must be in [0, 1], got ${pDetect}`);
    if (!(firewallRate >= 0 && firewallRate <= 1)) {
      throw new ConfigurationError('firewallRate', `must be in [0, 1], got ${firewallRate}`);
    }
    if (!(patchRatePerHour >= 0)) throw new ConfigurationError('patchRatePerHour', 'must be non-negative');
    if (!(stationPatchCapacity > 0)) throw new ConfigurationError('stationPatchCapacity', 'must be positive');
    if (!Number.isInteger(zoneCount) || zoneCount < 1) {
      throw new ConfigurationError('zoneCount', 'must be an integer >= 1');
    }
  }

  public getDetections(): readonly DetectionEvent[] {
    return this.detections;
  }

  public getFirewallBlocks(): readonly FirewallEvent[] {
    return this.firewallBlocksLog;
  }

  // ---- IDS ----

  public detectionProbability(path: readonly string[]): number {
    return path.some((id) => this.idsNodes.has(id)) ? this.params.pDetect : 0;
  }

  public recordDetection(path: readonly string[], timestamp: number): void {
    const detectorId = path.find((id) => this.idsNodes.has(id));
    if (detectorId === undefined) return;
    this.detections.push({
      timestamp,
      detectorId,
      sourceId: path[0],
      targetId: path[path.length - 1],
      channel: 'exploit',
    });
  }

  // Routing hook: records routed packets crossing an IDS host without blocking them
  public inspectPacket(packet: DataPacket, nodeId: string, timestamp: number): void {
    if (!this.idsNodes.has(nodeId)) return;
    this.detections.push({
      timestamp,
      detectorId: nodeId,
      sourceId: packet.source,
      targetId: packet.destination,
      channel: 'packet',
    });
  }

  // ---- Segmentation ----

  public isCrossZone(link: Link, snapshot: TopologySnapshot): boolean {
    const zones = this.zoneMap(snapshot);
    return zones.get(link.a) !== zones.get(link.b);
  }

  public crossZoneLinks(snapshot: TopologySnapshot): Link[] {
    return snapshot.links.filter((link) => this.isCrossZone(link, snapshot));
  }

  /**
   * One independent draw per zone-crossing hop; any success blocks the attempt.
   */
  public firewallBlocks(path: readonly string[], snapshot: TopologySnapshot, random: RandomSource): boolean {
    if (this.params.zoneCount < 2 && !this.explicitZones) return false;

    const zones = this.zoneMap(snapshot);
    for (let i = 0; i < path.length - 1; i++) {
      const from = path[i];
      const to = path[i + 1];
      if (zones.get(from) === zones.get(to)) continue;

      if (random() < this.params.firewallRate) {
        this.firewallBlocksLog.push({
          timestamp: snapshot.timestamp,
          linkKey: linkKey(from, to),
          sourceId: path[0],
          targetId: path[path.length - 1],
        });
        return true;
      }
    }
    return false;
  }

  private zoneMap(snapshot: TopologySnapshot): ReadonlyMap<string, number> {
    if (this.explicitZones) return this.explicitZones;

    // Plane zones never move; geographic zones follow each snapshot
    const cached = this.zones;
    if (cached && cached.size > 0 && (this.params.zoneStrategy === 'plane' || this.zonesFor === snapshot)) {
      return cached;
    }

    const zones = assignZones(snapshot, this.params.zoneCount, this.params.zoneStrategy);
    this.zones = zones;
    this.zonesFor = snapshot;
    return zones;
  }

  // ---- Patching ----

  /**
   * Choose this step's recoveries from the frozen state. Infected nodes come
   * first, then susceptible ones, each in id order, limited by the patch rate
   * and by per-station upload capacity.
   */
  public selectPatches(
    state: SimulationState,
    stationsInContact: (satelliteId: string) => readonly string[],
    stepSeconds: number
  ): string[] {
    const accrued = this.patchCarry + (this.params.patchRatePerHour * stepSeconds) / 3600;
    const allowance = Math.floor(accrued + 1e-9);
    this.patchCarry = Math.max(0, accrued - allowance);
    if (allowance === 0) return [];

    const infected: string[] = [];
    const susceptible: string[] = [];
    state.nodes.forEach((node, id) => {
      if (node.health === 'infected') infected.push(id);
      else if (node.health === 'susceptible') susceptible.push(id);
    });

    const stationLoad = new Map<string, number>();
    const selected: string[] = [];
    for (const id of [...infected.sort(), ...susceptible.sort()]) {
      if (selected.length >= allowance) break;

      const station = stationsInContact(id).find(
        (stationId) => (stationLoad.get(stationId) ?? 0) < this.params.stationPatchCapacity
      );
      if (station === undefined) continue;

      stationLoad.set(station, (stationLoad.get(station) ?? 0) + 1);
      selected.push(id);
    }
    return selected;
  }
}
