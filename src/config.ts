import { z } from 'zod';

export const logLevels = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;

export type LogLevel = (typeof logLevels)[number];

export type ReinterpretMode = 'copy' | 'alias';

/**
 * Configuration for an engine.
 */
export interface EngineConfig {
  /**
   * Tag whose value `-` keeps a field out of struct copies and map
   * conversions. Default is `kv`.
   */
  excludeTag: string;

  /**
   * Tag overriding a field's key when converting to or from a dynamic map.
   * Default is `key`.
   */
  mapKeyTag: string;

  /**
   * Default is 'silent'.
   */
  logLevel: LogLevel;

  /**
   * How reinterpreters built without an explicit mode work:
   * 'copy' rebuilds the value, 'alias' reuses its bytes.
   * Default is 'copy'.
   */
  reinterpretMode: ReinterpretMode;

  /**
   * Initial capacity in bytes of heaps created by the engine.
   * Default is 1024.
   */
  heapCapacity: number;
}

export const DEFAULT_CONFIG: EngineConfig = {
  excludeTag: 'kv',
  mapKeyTag: 'key',
  logLevel: 'silent',
  reinterpretMode: 'copy',
  heapCapacity: 1024,
};

export const configSchema = z.object({
  excludeTag: z.string().min(1),
  mapKeyTag: z.string().min(1),
  logLevel: z.enum(logLevels),
  reinterpretMode: z.enum(['copy', 'alias']),
  heapCapacity: z.coerce.number().int().positive(),
});

/** Environment variables read by `resolveConfig` */
export const ENV_KEYS = {
  logLevel: 'MEMCAST_LOG_LEVEL',
  reinterpretMode: 'MEMCAST_REINTERPRET_MODE',
} as const;

/**
 * Merge defaults, environment and explicit overrides (in increasing
 * precedence) and validate the result.
 *
 * @throws Error listing every invalid setting
 */
export function resolveConfig(
  overrides: Partial<EngineConfig> = {},
  env: Readonly<Record<string, string | undefined>> = process.env,
): EngineConfig {
  const merged: Record<string, unknown> = { ...DEFAULT_CONFIG };
  for (const [key, name] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined && value !== '') merged[key] = value;
  }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    throw new Error(`Configuration validation failed:\n${z.prettifyError(result.error)}`);
  }
  return result.data;
}
