import { describe, it, expect } from 'vitest';
import * as THREE from 'three';
import type { ContactWindow, GroundStation } from '../src/types/Network';
import { ContactSchedule, GroundVisibility, elevationAngle, geoToCartesian } from '../src/models/GroundVisibility';
import { StaticPositionProvider } from '../src/models/PositionProvider';
import { at } from './fixtures';

const equatorStation: GroundStation = { id: 'gs_equator', name: 'Equator', position: { latitude: 0, longitude: 0 } };
const overhead = new StaticPositionProvider([at('s0', 6921, 0, 0), at('s1', -6921, 0, 0)]);

describe('geometry helpers', () => {
  it('converts geodetic coordinates with z along the pole', () => {
    const equator = geoToCartesian({ latitude: 0, longitude: 0 });
    expect(equator.x).toBeCloseTo(6371, 6);
    expect(equator.y).toBeCloseTo(0, 6);

    const pole = geoToCartesian({ latitude: 90, longitude: 0 });
    expect(pole.z).toBeCloseTo(6371, 6);
  });

  it('measures elevation from the local horizon', () => {
    const station = new THREE.Vector3(6371, 0, 0);
    expect(elevationAngle(station, new THREE.Vector3(6921, 0, 0))).toBeCloseTo(90, 6);
    expect(elevationAngle(station, new THREE.Vector3(6371, 1000, 0))).toBeCloseTo(0, 6);
    expect(elevationAngle(station, new THREE.Vector3(-6921, 0, 0))).toBeCloseTo(-90, 6);
  });
});

describe('GroundVisibility', () => {
  it('keeps a window open while an earth-fixed station sees the satellite', () => {
    const visibility = new GroundVisibility(overhead, { frame: 'earth-fixed', sampleSeconds: 60 });
    const windows = visibility.contactWindows(equatorStation, 's0', { start: 0, end: 600 });

    expect(windows).toHaveLength(1);
    expect(windows[0]).toMatchObject({ stationId: 'gs_equator', satelliteId: 's0', start: 0, end: 600 });
    expect(windows[0].maxElevation).toBeCloseTo(90, 6);
    expect(visibility.contactWindows(equatorStation, 's1', { start: 0, end: 600 })).toEqual([]);
  });

  it('closes the window once Earth rotation drops the elevation below the mask', () => {
    const visibility = new GroundVisibility(overhead, { minElevationDeg: 25, sampleSeconds: 60 });
    const windows = visibility.contactWindows(equatorStation, 's0', { start: 0, end: 3600 });

    expect(windows).toHaveLength(1);
    expect(windows[0].start).toBe(0);
    expect(windows[0].end).toBe(1980);
  });

  it('needs the satellite within communication range as well as above the mask', () => {
    const distant = new StaticPositionProvider([at('far', 10000, 0, 0)]);
    const range = { start: 0, end: 300 };

    expect(new GroundVisibility(distant, { frame: 'earth-fixed' }).contactWindows(equatorStation, 'far', range)).toEqual([]);

    const longRange = new GroundVisibility(distant, { frame: 'earth-fixed', maxRangeKm: 4000 });
    expect(longRange.contactWindows(equatorStation, 'far', range)).toMatchObject([{ start: 0, end: 300 }]);
  });

  it('builds a shared contact schedule', () => {
    const visibility = new GroundVisibility(overhead, { frame: 'earth-fixed' });
    const schedule = visibility.contactSchedule([equatorStation], { start: 0, end: 300 });

    expect(schedule.stationsInContact('s0', 120)).toEqual(['gs_equator']);
    expect(Array.from(schedule.inContact(120))).toEqual(['s0']);
  });
});

describe('ContactSchedule', () => {
  const windows: ContactWindow[] = [
    { stationId: 'gs_b', satelliteId: 's0', start: 100, end: 200, maxElevation: 40 },
    { stationId: 'gs_a', satelliteId: 's0', start: 150, end: 400, maxElevation: 60 },
  ];
  const schedule = new ContactSchedule(windows);

  it('lists stations in contact in id order', () => {
    expect(schedule.stationsInContact('s0', 175)).toEqual(['gs_a', 'gs_b']);
    expect(schedule.stationsInContact('s0', 450)).toEqual([]);
  });

  it('finds the latest contact at or before a time', () => {
    expect(schedule.lastContactAtOrBefore('s0', 50)).toBeNull();
    expect(schedule.lastContactAtOrBefore('s0', 120)).toBe(120);
    expect(schedule.lastContactAtOrBefore('s0', 900)).toBe(400);
    expect(schedule.lastContactAtOrBefore('s9', 900)).toBeNull();
  });
});
