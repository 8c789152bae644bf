import type { Link, LinkType, Neighbor, TopologySnapshot } from '../types/Network';
import type { PlaneGroup, PositionMap, SatellitePosition } from '../types/Satellite';
import {
  assertValidPosition,
  hasLineOfSight,
  linkKey,
  linkLatency,
} from './LinkGeometry';
import { adjacentPlaneGroups } from './PlaneClassifier';
import { EARTH_RADIUS_KM } from './PhysicalConstants';
import type { RandomSource } from './SeededRandom';

export interface TopologyParams {
  maxRangeKm: number;
  intraPlaneMaxRangeKm: number;
  // Minimum distance of a link's segment from the Earth's centre
  minClearanceKm: number;
  linkFailureProbability: number;
}

export const DEFAULT_TOPOLOGY_PARAMS: TopologyParams = {
  maxRangeKm: 2500,
  intraPlaneMaxRangeKm: 700,
  minClearanceKm: EARTH_RADIUS_KM + 100,
  linkFailureProbability: 1e-4,
};

function byId(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function makeLink(a: SatellitePosition, b: SatellitePosition, type: LinkType): Link {
  const distance = a.position.distanceTo(b.position);
  const [first, second] = a.id < b.id ? [a.id, b.id] : [b.id, a.id];
  return {
    key: linkKey(first, second),
    a: first,
    b: second,
    type,
    distance,
    latency: linkLatency(distance),
  };
}

/**
 * Assemble an immutable snapshot. Adjacency lists are sorted by neighbour id so
 * that every traversal over a snapshot is order-stable.
 */
export function createSnapshot(
  timestamp: number,
  positions: PositionMap,
  links: readonly Link[],
  options: { valid?: boolean; error?: string } = {}
): TopologySnapshot {
  const positionCopy = new Map<string, SatellitePosition>();
  positions.forEach((entry, id) => {
    positionCopy.set(id, Object.freeze({ ...entry, position: entry.position.clone() }));
  });

  const sortedLinks = links.slice().sort((x, y) => byId(x.key, y.key)).map((link) => Object.freeze({ ...link }));
  const adjacency = new Map<string, Neighbor[]>();
  positionCopy.forEach((_, id) => adjacency.set(id, []));
  for (const link of sortedLinks) {
    adjacency.get(link.a)?.push({ id: link.b, link });
    adjacency.get(link.b)?.push({ id: link.a, link });
  }
  adjacency.forEach((neighbors) => neighbors.sort((x, y) => byId(x.id, y.id)));

  return Object.freeze({
    timestamp,
    positions: positionCopy,
    links: Object.freeze(sortedLinks),
    adjacency,
    valid: options.valid ?? true,
    ...(options.error !== undefined ? { error: options.error } : {}),
  });
}

export class TopologyBuilder {
  private params: TopologyParams;
  private random?: RandomSource;

  // Link failures are only sampled when a random source is injected
  constructor(params: Partial<TopologyParams> = {}, random?: RandomSource) {
    this.params = { ...DEFAULT_TOPOLOGY_PARAMS, ...params };
    this.random = random;
  }

  public getParams(): Readonly<TopologyParams> {
    return this.params;
  }

  /**
   * Derive the +Grid link set for one instant. Throws GeometryError when a
   * position is malformed.
   */
  public build(
    positions: PositionMap,
    planeGroups: readonly PlaneGroup[],
    timestamp: number = 0
  ): TopologySnapshot {
    const ids = Array.from(positions.keys()).sort(byId);
    for (const id of ids) {
      const entry = positions.get(id);
      if (entry) assertValidPosition(id, entry.position);
    }

    const links = new Map<string, Link>();
    this.buildIntraPlaneLinks(positions, planeGroups, links);
    this.buildInterPlaneLinks(positions, planeGroups, ids, links);

    const accepted = this.applyLinkFailures(Array.from(links.values()));
    return createSnapshot(timestamp, positions, accepted);
  }

  private passes(a: SatellitePosition, b: SatellitePosition, maxRange: number): boolean {
    const distance = a.position.distanceTo(b.position);
    if (distance > maxRange) return false;
    return hasLineOfSight(a.position, b.position, this.params.minClearanceKm);
  }

  private buildIntraPlaneLinks(
    positions: PositionMap,
    planeGroups: readonly PlaneGroup[],
    links: Map<string, Link>
  ): void {
    const maxRange = Math.min(this.params.maxRangeKm, this.params.intraPlaneMaxRangeKm);

    for (const group of planeGroups) {
      const members: SatellitePosition[] = [];
      for (const id of group.satelliteIds) {
        const entry = positions.get(id);
        if (entry) members.push(entry);
      }
      if (members.length < 2) continue;

      // A ring of two satellites has a single edge
      const pairCount = members.length === 2 ? 1 : members.length;
      for (let i = 0; i < pairCount; i++) {
        const a = members[i];
        const b = members[(i + 1) % members.length];
        if (!this.passes(a, b, maxRange)) continue;

        const link = makeLink(a, b, 'intra_plane');
        links.set(link.key, link);
      }
    }
  }

  private buildInterPlaneLinks(
    positions: PositionMap,
    planeGroups: readonly PlaneGroup[],
    ids: readonly string[],
    links: Map<string, Link>
  ): void {
    const groupOf = new Map<string, string>();
    const membersOf = new Map<string, string[]>();
    for (const group of planeGroups) {
      const present = group.satelliteIds.filter((id) => positions.has(id)).sort(byId);
      membersOf.set(group.key, present);
      for (const id of present) groupOf.set(id, group.key);
    }
    const neighbourGroups = adjacentPlaneGroups(planeGroups);

    // One slot per (satellite, adjacent group) keeps inter-plane degree <= 2
    const usedSlots = new Set<string>();
    const slot = (satelliteId: string, towardGroup: string) => `${satelliteId}|${towardGroup}`;

    for (const id of ids) {
      const ownGroup = groupOf.get(id);
      const self = positions.get(id);
      if (ownGroup === undefined || !self) continue;

      for (const otherGroup of neighbourGroups.get(ownGroup) ?? []) {
        if (usedSlots.has(slot(id, otherGroup))) continue;

        let best: SatellitePosition | null = null;
        let bestDistance = Infinity;
        for (const candidateId of membersOf.get(otherGroup) ?? []) {
          if (usedSlots.has(slot(candidateId, ownGroup))) continue;
          if (links.has(linkKey(id, candidateId))) continue;

          const candidate = positions.get(candidateId);
          if (!candidate || !this.passes(self, candidate, this.params.maxRangeKm)) continue;

          // Members are iterated in id order, so strict < keeps the lowest id on ties
          const distance = self.position.distanceTo(candidate.position);
          if (distance < bestDistance) {
            bestDistance = distance;
            best = candidate;
          }
        }

        if (best) {
          const link = makeLink(self, best, 'inter_plane');
          links.set(link.key, link);
          usedSlots.add(slot(id, otherGroup));
          usedSlots.add(slot(best.id, ownGroup));
        }
      }
    }
  }

  private applyLinkFailures(links: Link[]): Link[] {
    const sorted = links.sort((x, y) => byId(x.key, y.key));
    const random = this.random;
    const probability = this.params.linkFailureProbability;
    if (!random || probability <= 0) return sorted;

    return sorted.filter(() => random() >= probability);
  }
}
