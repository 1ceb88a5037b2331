/**
 * Environment variable overrides for project configuration.
 *
 * DECISION_LOG_SOURCE → source
 * DECISION_LOG_LEVEL  → log_level
 */

export type ConfigEnv = Readonly<Record<string, string | undefined>>;

const ENV_OVERRIDES: ReadonlyArray<{ env: string; key: string }> = [
  { env: 'DECISION_LOG_SOURCE', key: 'source' },
  { env: 'DECISION_LOG_LEVEL', key: 'log_level' },
];

/** Overwrite raw config keys in place with non-blank env values */
export function applyProjectConfigEnvOverrides(raw: Record<string, unknown>, env: ConfigEnv): void {
  for (const { env: name, key } of ENV_OVERRIDES) {
    const value = env[name]?.trim();
    if (value) {
      raw[key] = value;
    }
  }
}
