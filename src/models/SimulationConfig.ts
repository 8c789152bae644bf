import { z } from 'zod';
import defaultStations from '../data/ground-stations.json';
import { deriveSeed } from './SeededRandom';
import { ConfigurationError } from './SimulationErrors';
import { DEFAULT_TOPOLOGY_PARAMS } from './TopologyBuilder';

const ProbabilitySchema = z.number().min(0).max(1);
const NonNegativeNumberSchema = z.number().nonnegative();
const PositiveNumberSchema = z.number().positive();

export const GroundStationSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  position: z.object({
    latitude: z.number().min(-90).max(90),
    longitude: z.number().min(-180).max(180),
    altitude: NonNegativeNumberSchema.optional(),
  }),
});

// The seed set is infected at the first step at or after startSeconds (default: the first step)
const attackStart = { startSeconds: NonNegativeNumberSchema.optional() };

const InitialInfectedSchema = z.discriminatedUnion('policy', [
  z.object({ policy: z.literal('explicit'), ids: z.array(z.string().min(1)).min(1), ...attackStart }),
  z.object({ policy: z.literal('random'), count: z.number().int().positive(), ...attackStart }),
  z.object({ policy: z.literal('highestDegree'), count: z.number().int().positive(), ...attackStart }),
]);

const TopologySchema = z.object({
  maxRangeKm: PositiveNumberSchema.default(DEFAULT_TOPOLOGY_PARAMS.maxRangeKm),
  intraPlaneMaxRangeKm: PositiveNumberSchema.default(DEFAULT_TOPOLOGY_PARAMS.intraPlaneMaxRangeKm),
  minClearanceKm: PositiveNumberSchema.default(DEFAULT_TOPOLOGY_PARAMS.minClearanceKm),
  linkFailureProbability: ProbabilitySchema.default(DEFAULT_TOPOLOGY_PARAMS.linkFailureProbability),
});

export const SimulationConfigSchema = z
  .object({
    horizonSeconds: PositiveNumberSchema.default(86400),
    stepSeconds: PositiveNumberSchema.default(300),
    betaNormal: ProbabilitySchema.default(0.1),
    betaEclipse: ProbabilitySchema.default(0.2),
    eclipseHalfWidthMinutes: NonNegativeNumberSchema.default(5),
    pDetect: ProbabilitySchema.default(0.3),
    idsCoverage: ProbabilitySchema.default(0),
    idsNodes: z.array(z.string().min(1)).optional(),
    c2TimeoutSeconds: NonNegativeNumberSchema.default(7200),
    patchRatePerHour: NonNegativeNumberSchema.default(0),
    stationPatchCapacity: PositiveNumberSchema.default(Infinity),
    zoneCount: z.number().int().min(1).default(1),
    zoneStrategy: z.enum(['plane', 'geography']).default('plane'),
    firewallRate: ProbabilitySchema.default(0.7),
    exploitHops: z.number().int().min(1).default(1),
    baseSeed: z.number().int().nonnegative().default(1),
    seeds: z.array(z.number().int().nonnegative()).optional(),
    trialCount: z.number().int().positive().default(1),
    initialInfected: InitialInfectedSchema.default({ policy: 'random', count: 1 }),
    minElevationDeg: z.number().min(-90).max(90).default(25),
    groundMaxRangeKm: PositiveNumberSchema.default(2500),
    groundStations: z.array(GroundStationSchema).default(defaultStations),
    bufferCapacity: z.number().int().positive().default(66000),
    trafficPacketsPerStep: z.number().int().nonnegative().default(0),
    packetSizeBytes: PositiveNumberSchema.default(1024),
    topology: TopologySchema.default({}),
  })
  .superRefine((config, ctx) => {
    if (config.seeds) {
      if (config.seeds.length !== config.trialCount) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['seeds'],
          message: `expected ${config.trialCount} seeds, got ${config.seeds.length}`,
        });
      }
      if (new Set(config.seeds).size !== config.seeds.length) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['seeds'], message: 'seeds must be distinct' });
      }
    }
    if (config.stepSeconds > config.horizonSeconds) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['stepSeconds'],
        message: 'must not exceed horizonSeconds',
      });
    }
    const start = config.initialInfected.startSeconds;
    if (start !== undefined && start > config.horizonSeconds) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['initialInfected', 'startSeconds'],
        message: 'must not exceed horizonSeconds',
      });
    }
    const stationIds = config.groundStations.map((station) => station.id);
    if (new Set(stationIds).size !== stationIds.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['groundStations'], message: 'station ids must be unique' });
    }
  });

export type SimulationConfig = z.output<typeof SimulationConfigSchema>;
export type SimulationConfigInput = z.input<typeof SimulationConfigSchema>;
export type InitialInfectedPolicy = SimulationConfig['initialInfected'];

/**
 * Validate and fill defaults. The first failing field is reported as a
 * ConfigurationError carrying its dotted path.
 */
export function parseSimulationConfig(input: unknown = {}): SimulationConfig {
  const result = SimulationConfigSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const parameter = issue.path.length > 0 ? issue.path.join('.') : 'config';
    throw new ConfigurationError(parameter, issue.message);
  }
  return result.data;
}

export function trialSeeds(config: SimulationConfig): number[] {
  if (config.seeds) return config.seeds.slice();
  return Array.from({ length: config.trialCount }, (_, index) => deriveSeed(config.baseSeed, index));
}
