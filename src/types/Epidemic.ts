import type { SatelliteNode } from './Satellite';

export type TransitionKind =
  | 'infected'
  | 'dormant'
  | 'reactivated'
  | 'recovered';

export type TransitionCause =
  | 'seed'
  | 'exploit'
  | 'c2-timeout'
  | 'c2-contact'
  | 'patch';

export interface EpidemicEvent {
  nodeId: string;
  transition: TransitionKind;
  cause: TransitionCause;
  timestamp: number;
  sourceId?: string;
}

export interface DetectionEvent {
  timestamp: number;
  detectorId: string;
  sourceId: string;
  targetId: string;
  channel: 'exploit' | 'packet';
}

export interface FirewallEvent {
  timestamp: number;
  linkKey: string;
  sourceId: string;
  targetId: string;
}

// Explicit per-trial state; each step produces a new value
export interface SimulationState {
  readonly step: number;
  readonly timestamp: number;
  readonly nodes: ReadonlyMap<string, SatelliteNode>;
}

export interface InfectionSample {
  timestamp: number;
  susceptible: number;
  infected: number;
  recovered: number;
  dormant: number;
}
