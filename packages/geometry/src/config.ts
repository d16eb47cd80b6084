/**
 * Diagnostics configuration
 *
 * Loaded from (in priority order):
 *
 * 1. Environment variable `RATTRIG_LOG` (e.g. `RATTRIG_LOG=debug`)
 * 2. Config files: `.rattrigrc`, `.rattrigrc.json`, `.rattrigrc.yaml`, `rattrig.config.js`, ...
 * 3. package.json: "rattrig" key
 * 4. Defaults (diagnostics off)
 *
 * @example Config file (.rattrigrc.json)
 * ```json
 * { "diagnostics": { "level": "debug" } }
 * ```
 *
 * @example
 * ```typescript
 * const sink = createSink(loadDiagnosticsConfig());
 * safeSpread([0, 0], [1, 0], float64, sink);
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import {
  LEVELS,
  consoleSink,
  silentSink,
  type DiagnosticSink,
  type LevelFilter,
} from "./diagnostics.js";

export const MODULE_NAME = "rattrig";
export const ENV_VAR = "RATTRIG_LOG";

export interface DiagnosticsConfig {
  readonly level: LevelFilter;
}

export const DEFAULT_CONFIG: DiagnosticsConfig = { level: "off" };

export type Environment = Readonly<Record<string, string | undefined>>;

export interface LoadOptions {
  /** Directory to look for a config file in; defaults to the working directory */
  readonly searchFrom?: string;
  /** Environment to read `RATTRIG_LOG` from; defaults to `process.env` */
  readonly env?: Environment;
}

function isLevel(value: string): value is LevelFilter {
  return LEVELS.some((level) => level === value);
}

/**
 * Parse a level name, case-insensitively.
 *
 * @throws RangeError for an unknown level
 */
export function parseLevel(value: string): LevelFilter {
  const level = value.trim().toLowerCase();
  if (!isLevel(level)) {
    throw new RangeError(
      `Unknown diagnostics level "${value}", expected one of ${LEVELS.join(", ")}`
    );
  }
  return level;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Merge a raw config file payload with the environment.
 */
export function resolveDiagnosticsConfig(fileConfig: unknown, env: Environment): DiagnosticsConfig {
  let level = DEFAULT_CONFIG.level;

  if (isRecord(fileConfig) && isRecord(fileConfig.diagnostics)) {
    const configured = fileConfig.diagnostics.level;
    if (typeof configured === "string") {
      level = parseLevel(configured);
    } else if (configured !== undefined) {
      throw new RangeError(`diagnostics.level must be a string, got ${typeof configured}`);
    }
  }

  const fromEnv = env[ENV_VAR];
  if (fromEnv !== undefined && fromEnv.trim() !== "") {
    level = parseLevel(fromEnv);
  }

  return { level };
}

/**
 * Find and read the config file, then apply the environment override.
 */
export function loadDiagnosticsConfig(options: LoadOptions = {}): DiagnosticsConfig {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `.${MODULE_NAME}rc.js`,
      `.${MODULE_NAME}rc.cjs`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });
  const result = explorer.search(options.searchFrom);
  const fileConfig: unknown = result && !result.isEmpty ? result.config : undefined;
  return resolveDiagnosticsConfig(fileConfig, options.env ?? process.env);
}

/**
 * The sink a configuration asks for.
 */
export function createSink(config: DiagnosticsConfig): DiagnosticSink {
  return config.level === "off" ? silentSink : consoleSink(config.level);
}
