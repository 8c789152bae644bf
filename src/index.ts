export * from './types/Satellite';
export * from './types/Network';
export * from './types/Epidemic';

export * from './models/SimulationErrors';
export * from './models/SeededRandom';
export * from './models/PhysicalConstants';
export * from './models/LinkGeometry';
export * from './models/PositionProvider';
export * from './models/PlaneClassifier';
export * from './models/TopologyBuilder';
export * from './models/TopologyTimeline';
export * from './models/NetworkPathfinding';
export * from './models/RoutingEngine';
export * from './models/EclipseSchedule';
export * from './models/GroundVisibility';
export * from './models/PropagationEngine';
export * from './models/DefenseLayer';
export * from './models/MetricsCollector';
export * from './models/SimulationConfig';
export * from './models/SimulationTrial';
export * from './models/MonteCarloSweep';
export * from './models/SimulationScenario';
export * from './models/OutputWriter';
