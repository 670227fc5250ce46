import { ConfigError } from './errors.js';

export type KeyRepeatPolicy = 'strict-fifo';

export const KEY_REPEAT_POLICIES: readonly KeyRepeatPolicy[] = ['strict-fifo'];

export interface GradeRatios {
  /** |delta| / tolerance at or below which a hit is `perfect`. */
  perfect: number;
  /** |delta| / tolerance at or below which a hit is `good`. */
  good: number;
}

export interface DojoConfig {
  /** Half-width of the match window when an action has no override. */
  defaultToleranceMs: number;
  /** Score points removed per extra candidate; 0 disables the penalty. */
  penaltyPerExtra: number;
  keyRepeatPolicy: KeyRepeatPolicy;
  /** A clock reading further than this from the extrapolated one is a seek. */
  seekThresholdMs: number;
  gradeRatios: GradeRatios;
  /** Keys the recorder skips (e.g. the key that ends a session). */
  ignoreKeys: string[];
}

export const DEFAULT_CONFIG: Readonly<DojoConfig> = {
  defaultToleranceMs: 100,
  penaltyPerExtra: 0,
  keyRepeatPolicy: 'strict-fifo',
  seekThresholdMs: 250,
  // 3 and 5 frames out of an 8 frame window at 30 fps
  gradeRatios: { perfect: 0.375, good: 0.625 },
  ignoreKeys: [],
};

// JSON key -> config key
const KEY_ALIASES: Record<string, keyof DojoConfig> = {
  default_tolerance_ms: 'defaultToleranceMs',
  penalty_per_extra: 'penaltyPerExtra',
  key_repeat_policy: 'keyRepeatPolicy',
  seek_threshold_ms: 'seekThresholdMs',
  grade_ratios: 'gradeRatios',
  ignore_keys: 'ignoreKeys',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonNegativeNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

function isKeyRepeatPolicy(value: unknown): value is KeyRepeatPolicy {
  return typeof value === 'string' && (KEY_REPEAT_POLICIES as readonly string[]).includes(value);
}

/**
 * Build a configuration from defaults and a user-supplied object (usually a
 * parsed JSON file). Accepts snake_case or camelCase keys. Throws a
 * ConfigError listing every invalid or unknown entry.
 */
export function resolveConfig(input: unknown = {}, base: Readonly<DojoConfig> = DEFAULT_CONFIG): DojoConfig {
  const config: DojoConfig = {
    ...base,
    gradeRatios: { ...base.gradeRatios },
    ignoreKeys: [...base.ignoreKeys],
  };
  const problems: string[] = [];

  if (!isRecord(input)) {
    throw new ConfigError(['configuration must be an object']);
  }

  for (const [rawKey, value] of Object.entries(input)) {
    const key = KEY_ALIASES[rawKey] ?? rawKey;
    switch (key) {
      case 'defaultToleranceMs':
        if (isNonNegativeNumber(value) && value > 0) config.defaultToleranceMs = value;
        else problems.push(`${rawKey} must be a positive number`);
        break;
      case 'penaltyPerExtra':
        if (isNonNegativeNumber(value)) config.penaltyPerExtra = value;
        else problems.push(`${rawKey} must be a non-negative number`);
        break;
      case 'keyRepeatPolicy':
        if (isKeyRepeatPolicy(value)) config.keyRepeatPolicy = value;
        else problems.push(`${rawKey} must be one of: ${KEY_REPEAT_POLICIES.join(', ')}`);
        break;
      case 'seekThresholdMs':
        if (isNonNegativeNumber(value) && value > 0) config.seekThresholdMs = value;
        else problems.push(`${rawKey} must be a positive number`);
        break;
      case 'gradeRatios': {
        if (!isRecord(value)) {
          problems.push(`${rawKey} must be an object with 'perfect' and 'good'`);
          break;
        }
        const perfect = value.perfect ?? config.gradeRatios.perfect;
        const good = value.good ?? config.gradeRatios.good;
        if (!isNonNegativeNumber(perfect) || !isNonNegativeNumber(good) || perfect > good || good > 1) {
          problems.push(`${rawKey} must satisfy 0 <= perfect <= good <= 1`);
        } else {
          config.gradeRatios = { perfect, good };
        }
        break;
      }
      case 'ignoreKeys':
        if (Array.isArray(value) && value.every((k): k is string => typeof k === 'string')) {
          config.ignoreKeys = [...value];
        } else {
          problems.push(`${rawKey} must be an array of strings`);
        }
        break;
      default:
        problems.push(`unknown option '${rawKey}'`);
    }
  }

  if (problems.length > 0) throw new ConfigError(problems);
  return config;
}
