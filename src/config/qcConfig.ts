import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { DEBUG_QC_ENV_KEY, isDebugQcEnabled } from '../utils/debugQc';

export const metricsSourceSchema = z.enum(['raw', 'detrended']);
export type MetricsSource = z.infer<typeof metricsSourceSchema>;

export const qcConfigSchema = z.object({
  /** Root holding `<scanner>/<YYYYMMDD>/` analysis directories. */
  dataRoot: z.string().min(1),
  /** Optional JSON file overriding the default acceptance limits. */
  limitsFile: z.string().min(1).optional(),
  phaseEncodeAxis: z.union([z.literal(0), z.literal(1), z.literal(2)]),
  mcflirtCommand: z.string().min(1),
  dcm2niixCommand: z.string().min(1),
  /** Which ROI series feeds the summary metrics. */
  metricsSource: metricsSourceSchema,
  debug: z.boolean(),
});

export type QcConfig = z.infer<typeof qcConfigSchema>;

export const DEFAULT_QC_CONFIG: Omit<QcConfig, 'dataRoot'> = {
  phaseEncodeAxis: 1,
  mcflirtCommand: 'mcflirt',
  dcm2niixCommand: 'dcm2niix',
  metricsSource: 'raw',
  debug: false,
};

function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const v = env[key]?.trim();
  return v ? v : undefined;
}

/**
 * Build the config from environment variables:
 * QC_DATA_ROOT (required), QC_LIMITS_FILE, QC_PHASE_AXIS, QC_MCFLIRT,
 * QC_DCM2NIIX, QC_METRICS_SOURCE, QC_DEBUG.
 */
export function loadQcConfigFromEnv(env: NodeJS.ProcessEnv = process.env, overrides: Partial<QcConfig> = {}): QcConfig {
  const axis = envValue(env, 'QC_PHASE_AXIS');

  const candidate = {
    dataRoot: envValue(env, 'QC_DATA_ROOT'),
    limitsFile: envValue(env, 'QC_LIMITS_FILE'),
    phaseEncodeAxis: axis === undefined ? DEFAULT_QC_CONFIG.phaseEncodeAxis : Number(axis),
    mcflirtCommand: envValue(env, 'QC_MCFLIRT') ?? DEFAULT_QC_CONFIG.mcflirtCommand,
    dcm2niixCommand: envValue(env, 'QC_DCM2NIIX') ?? DEFAULT_QC_CONFIG.dcm2niixCommand,
    metricsSource: envValue(env, 'QC_METRICS_SOURCE') ?? DEFAULT_QC_CONFIG.metricsSource,
    debug: env[DEBUG_QC_ENV_KEY] === undefined ? DEFAULT_QC_CONFIG.debug : isDebugQcEnabled(env),
    ...overrides,
  };

  const parsed = qcConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.') || 'config'}: ${i.message}`);
    throw new ConfigurationError(`Invalid QC configuration (${problems.join('; ')})`);
  }
  return parsed.data;
}
