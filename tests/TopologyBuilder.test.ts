import { describe, it, expect } from 'vitest';
import { hasLineOfSight } from '../src/models/LinkGeometry';
import { classifyPlanes } from '../src/models/PlaneClassifier';
import { WalkerConstellationProvider } from '../src/models/PositionProvider';
import { createRandomSource } from '../src/models/SeededRandom';
import { GeometryError } from '../src/models/SimulationErrors';
import { TopologyBuilder } from '../src/models/TopologyBuilder';
import { at, equatorial, group, positionMap } from './fixtures';

describe('TopologyBuilder', () => {
  it('links consecutive plane members and skips pairs beyond the intra-plane range', () => {
    const positions = positionMap([
      equatorial('s0', 0),
      equatorial('s1', 5),
      equatorial('s2', 10),
      equatorial('s3', 15),
    ]);
    const snapshot = new TopologyBuilder().build(positions, [group('p0', 0, ['s0', 's1', 's2', 's3'])], 60);

    expect(snapshot.timestamp).toBe(60);
    expect(snapshot.valid).toBe(true);
    expect(snapshot.links.map((l) => l.key)).toEqual(['s0|s1', 's1|s2', 's2|s3']);
    expect(snapshot.links.every((l) => l.type === 'intra_plane')).toBe(true);
    expect(snapshot.adjacency.get('s1')?.map((n) => n.id)).toEqual(['s0', 's2']);
  });

  it('creates a single link for a two-satellite plane', () => {
    const positions = positionMap([equatorial('s0', 0), equatorial('s1', 5)]);
    const snapshot = new TopologyBuilder().build(positions, [group('p0', 0, ['s0', 's1'])]);

    expect(snapshot.links).toHaveLength(1);
    expect(snapshot.links[0].distance).toBeCloseTo(2 * 6921 * Math.sin((2.5 * Math.PI) / 180), 6);
  });

  it('breaks equal-distance inter-plane ties toward the lowest id', () => {
    const positions = positionMap([
      at('a0', 7000, 0, 0, 'A'),
      at('b1', 7000, 500, 0, 'B'),
      at('b0', 7000, -500, 0, 'B'),
    ]);
    const snapshot = new TopologyBuilder().build(positions, [
      group('A', 0, ['a0']),
      group('B', 10, ['b0', 'b1']),
    ]);

    expect(snapshot.links.map((l) => [l.key, l.type])).toEqual([['a0|b0', 'inter_plane']]);
  });

  it('rejects links that exceed the range or cross the Earth', () => {
    const far = positionMap([equatorial('a0', 0, 'A'), equatorial('b0', 30, 'B')]);
    const farSnapshot = new TopologyBuilder().build(far, [group('A', 0, ['a0']), group('B', 10, ['b0'])]);
    expect(farSnapshot.links).toHaveLength(0);

    const blocked = positionMap([equatorial('a0', 0, 'A'), equatorial('b0', 90, 'B')]);
    const blockedSnapshot = new TopologyBuilder({ maxRangeKm: 20000 }).build(blocked, [
      group('A', 0, ['a0']),
      group('B', 10, ['b0']),
    ]);
    expect(blockedSnapshot.links).toHaveLength(0);
  });

  it('keeps every satellite within the +Grid degree caps', () => {
    const provider = new WalkerConstellationProvider({
      planes: 6,
      satellitesPerPlane: 12,
      altitudeKm: 550,
      inclinationDeg: 53,
    });
    const params = { maxRangeKm: 4000, intraPlaneMaxRangeKm: 4000 };
    const builder = new TopologyBuilder(params);
    const positions = provider.positionsAt(0);
    const snapshot = builder.build(positions, classifyPlanes(provider.orbitalElements()));

    expect(snapshot.links.filter((l) => l.type === 'intra_plane')).toHaveLength(72);

    snapshot.adjacency.forEach((neighbors) => {
      expect(neighbors.filter((n) => n.link.type === 'intra_plane').length).toBeLessThanOrEqual(2);
      expect(neighbors.filter((n) => n.link.type === 'inter_plane').length).toBeLessThanOrEqual(2);
    });

    for (const l of snapshot.links) {
      const a = positions.get(l.a);
      const b = positions.get(l.b);
      if (!a || !b) throw new Error(`missing endpoint of ${l.key}`);
      expect(l.distance).toBeLessThanOrEqual(4000);
      expect(hasLineOfSight(a.position, b.position, 6471)).toBe(true);
    }
  });

  it('draws link failures reproducibly from the injected source', () => {
    const positions = positionMap(Array.from({ length: 20 }, (_, i) => equatorial(`s${String(i).padStart(2, '0')}`, i * 5)));
    const groups = [group('p0', 0, Array.from(positions.keys()))];

    const first = new TopologyBuilder({ linkFailureProbability: 0.5 }, createRandomSource(42)).build(positions, groups);
    const second = new TopologyBuilder({ linkFailureProbability: 0.5 }, createRandomSource(42)).build(positions, groups);
    expect(first.links.map((l) => l.key)).toEqual(second.links.map((l) => l.key));

    const allFail = new TopologyBuilder({ linkFailureProbability: 1 }, createRandomSource(7)).build(positions, groups);
    expect(allFail.links).toHaveLength(0);

    const noSource = new TopologyBuilder({ linkFailureProbability: 1 }).build(positions, groups);
    expect(noSource.links.length).toBeGreaterThan(0);
  });

  it('throws a GeometryError naming the malformed satellite', () => {
    const positions = positionMap([equatorial('s0', 0), at('s1', NaN, 0, 0)]);
    const build = () => new TopologyBuilder().build(positions, [group('p0', 0, ['s0', 's1'])]);

    expect(build).toThrow(GeometryError);
    expect(build).toThrow(/s1/);
  });

  it('returns frozen snapshots', () => {
    const snapshot = new TopologyBuilder().build(positionMap([equatorial('s0', 0)]), [group('p0', 0, ['s0'])]);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.links)).toBe(true);
  });
});
