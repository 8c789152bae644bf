import type { PositionMap } from './Satellite';

export type LinkType = 'intra_plane' | 'inter_plane';

export interface Link {
  key: string; // `${a}|${b}` with a < b
  a: string;
  b: string;
  type: LinkType;
  distance: number; // km
  latency: number; // seconds
}

export interface Neighbor {
  id: string;
  link: Link;
}

export interface TopologySnapshot {
  readonly timestamp: number; // seconds since simulation epoch
  readonly positions: PositionMap;
  readonly links: readonly Link[];
  readonly adjacency: ReadonlyMap<string, readonly Neighbor[]>;
  readonly valid: boolean;
  readonly error?: string;
}

export interface GeoPosition {
  latitude: number;
  longitude: number;
  altitude?: number; // km above the reference sphere
}

export interface GroundStation {
  id: string;
  name: string;
  position: GeoPosition;
}

export interface ContactWindow {
  stationId: string;
  satelliteId: string;
  start: number;
  end: number;
  maxElevation: number; // degrees
}

export type PacketStatus = 'in-flight' | 'delivered' | 'dropped';
export type PacketClass = 'data' | 'control';
export type DropReason = 'no-route' | 'capacity-exceeded' | 'stale-route' | 'preempted';

export interface DataPacket {
  id: string;
  source: string;
  destination: string;
  size: number; // bytes
  createdAt: number;
  holder: string;
  hopCount: number;
  packetClass: PacketClass;
  status: PacketStatus;
  dropReason?: DropReason;
  path: string[]; // nodes visited so far, source first
}

export type RouteOutcome =
  | { kind: 'advanced'; from: string; nextHop: string }
  | { kind: 'delivered' }
  | { kind: 'dropped'; reason: DropReason };
