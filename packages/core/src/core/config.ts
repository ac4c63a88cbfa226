import type { NamingOptions, TimeframeOverrides } from './types.js';
import { ConfigError } from './errors.js';
import { unknownTimeframes } from './timeframes.js';

// ── LookformConfig ──────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LookformConfig {
  readonly naming?: {
    readonly useTableName?: boolean;
    readonly includeIsoFields?: boolean;
    readonly timeframes?: TimeframeOverrides;
  };
  readonly generator?: {
    /** Directory holding `manifest.json` and `catalog.json`. */
    readonly targetDir?: string;
    readonly outputDir?: string;
    /** Only the model with this name. */
    readonly select?: string;
    readonly tag?: string;
    readonly includeModels?: readonly string[];
    readonly excludeModels?: readonly string[];
    /** Skip failing models instead of aborting the batch. */
    readonly continueOnError?: boolean;
    readonly logLevel?: LogLevel;
  };
}

// ── defineConfig ─────────────────────────────────────────────────────

function checkTimeframes(kind: string, list: readonly string[] | undefined): void {
  if (list === undefined) return;

  if (list.length === 0) {
    throw new ConfigError(`naming.timeframes.${kind} must list at least one timeframe`);
  }

  const unknown = unknownTimeframes(list);
  if (unknown.length > 0) {
    throw new ConfigError(
      `Unknown timeframe(s) in naming.timeframes.${kind}: ${unknown.join(', ')}`,
    );
  }

  const seen = new Set<string>();
  for (const timeframe of list) {
    if (seen.has(timeframe)) {
      throw new ConfigError(`Duplicate timeframe '${timeframe}' in naming.timeframes.${kind}`);
    }
    seen.add(timeframe);
  }
}

export function defineConfig(config: LookformConfig): LookformConfig {
  checkTimeframes('date', config.naming?.timeframes?.date);
  checkTimeframes('time', config.naming?.timeframes?.time);

  const excluded = new Set(config.generator?.excludeModels ?? []);
  for (const name of config.generator?.includeModels ?? []) {
    if (excluded.has(name)) {
      throw new ConfigError(
        `Model '${name}' is listed in both generator.includeModels and generator.excludeModels`,
      );
    }
  }

  return Object.freeze(config);
}

// ── Resolution ──────────────────────────────────────────────────────

export function resolveNamingOptions(config?: LookformConfig): NamingOptions {
  return {
    useTableName: config?.naming?.useTableName ?? false,
    includeIsoFields: config?.naming?.includeIsoFields ?? false,
    timeframes: config?.naming?.timeframes,
  };
}
