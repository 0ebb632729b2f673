import { z } from 'zod';

export const TimeoutsSchema = z.object({
  readinessMs: z.number().int().positive(),
  externalReadinessMs: z.number().int().positive(),
  shutdownGraceMs: z.number().int().positive(),
  forceKillWaitMs: z.number().int().positive(),
  portReleaseMs: z.number().int().positive(),
  containerStartupMs: z.number().int().positive(),
  driverStartupMs: z.number().int().positive(),
  suiteMs: z.number().int().positive(),
  browserMs: z.number().int().positive(),
  requestMs: z.number().int().positive(),
  probeRequestMs: z.number().int().positive(),
  pollIntervalMs: z.number().int().positive(),
  sseReadMs: z.number().int().positive(),
});

export type Timeouts = z.infer<typeof TimeoutsSchema>;

export const BackendKindSchema = z.enum(['local', 'external', 'containerized']);
export type BackendKind = z.infer<typeof BackendKindSchema>;

export const HarnessConfigSchema = z.object({
  projectRoot: z.string(),
  resultsRoot: z.string(),
  service: z.object({
    binaryName: z.string().min(1),
    // Searched in order after TESTBED_SERVICE_BINARY and PATH; relative to projectRoot.
    binaryPaths: z.array(z.string()),
    // Run once per test run before the first local environment starts.
    buildCommand: z.array(z.string()).nullable(),
    // {config} and {dataDir} are substituted per environment.
    args: z.array(z.string()),
    healthPath: z.string().startsWith('/'),
    internalPort: z.number().int().positive(),
  }),
  containers: z.object({
    networkDriver: z.string(),
    serviceImage: z.string(),
    driverImage: z.string(),
    serviceDockerfile: z.string().nullable(),
    driverDockerfile: z.string().nullable(),
    serviceAlias: z.string(),
    driverAlias: z.string(),
    driverHome: z.string(),
    driverUser: z.string(),
    // Local file copied into the driver container; tests needing it skip when absent.
    credentialsPath: z.string(),
    credentialsTarget: z.string(),
  }),
  timeouts: TimeoutsSchema,
  portRangeStart: z.number().int().min(1024).max(65000),
  portProbeAttempts: z.number().int().positive(),
  forwardEnv: z.array(z.string()),
  externalBaseUrl: z.string().url().nullable(),
  backend: BackendKindSchema.nullable(),
  serviceConfigOverlay: z.string().nullable(),
});

export type HarnessConfig = z.infer<typeof HarnessConfigSchema>;
