/**
 * Library-wide options. They only shape the debug logger; arithmetic does not read them.
 */
export interface CoordinateOptions {
  /** Maximum number of entries kept by the debug logger */
  readonly maxDebugLogs: number;
  /** Start with debug logging enabled */
  readonly debugLogging: boolean;
}

/**
 * Default library options
 */
export const DEFAULT_COORDINATE_OPTIONS: CoordinateOptions = {
  maxDebugLogs: 100,
  debugLogging: false,
};

/**
 * Creates a full option set from partial overrides
 */
export function createCoordinateConfig(options: Partial<CoordinateOptions> = {}): CoordinateOptions {
  const opts = { ...DEFAULT_COORDINATE_OPTIONS, ...options };

  if (!Number.isInteger(opts.maxDebugLogs) || opts.maxDebugLogs < 1) {
    throw new RangeError(`maxDebugLogs must be a positive integer, got ${opts.maxDebugLogs}`);
  }

  return opts;
}

let activeConfig: CoordinateOptions = DEFAULT_COORDINATE_OPTIONS;

/**
 * Install options for the whole library. Returns the resulting configuration.
 */
export function configureCoordinates(options: Partial<CoordinateOptions>): CoordinateOptions {
  activeConfig = createCoordinateConfig({ ...activeConfig, ...options });
  return activeConfig;
}

export function getCoordinateConfig(): CoordinateOptions {
  return activeConfig;
}

/**
 * Restore the defaults (mainly for tests).
 */
export function resetCoordinateConfig(): void {
  activeConfig = DEFAULT_COORDINATE_OPTIONS;
}
