/**
 * Debug QC logging.
 *
 * Off by default. Enable with the environment variable:
 *   QC_DEBUG=1 phantom-qc analyze <dir>
 */

export const DEBUG_QC_ENV_KEY = 'QC_DEBUG';

export function isDebugQcEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const v = env[DEBUG_QC_ENV_KEY]?.trim().toLowerCase();
  return v === '1' || v === 'true' || v === 'yes';
}

export function debugQcLog(step: string, details: Record<string, unknown>, enabled: boolean): void {
  if (!enabled) return;
  console.log(`[qc] ${step}`, details);
}
