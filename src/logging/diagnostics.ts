import pino, {
  type DestinationStream,
  type LevelWithSilent,
  type Logger,
} from "pino";

/** Environment variable that turns on debug output of the library. */
export const DEBUG_ENV_VAR = "FIELDLOG_DEBUG";

/**
 * Options for {@link createDiagnostics}.
 */
export interface DiagnosticsOptions {
  /** Explicit level. Overrides the environment. */
  level?: LevelWithSilent;
  /** Environment consulted when no level is given. */
  env?: NodeJS.ProcessEnv;
  /** Where entries are written. Defaults to standard error. */
  destination?: DestinationStream;
}

/**
 * Level of the library's own logger derived from the environment: `debug`
 * when {@link DEBUG_ENV_VAR} is set to anything but `""`, `0` or `false`,
 * `silent` otherwise.
 */
export function diagnosticsLevelFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): LevelWithSilent {
  const flag = env[DEBUG_ENV_VAR];
  if (flag === undefined || flag === "" || flag === "0" || flag === "false") {
    return "silent";
  }
  return "debug";
}

/**
 * Creates the pino logger the library reports its own problems to (parser
 * and formatter failures, configuration). Silent unless enabled.
 */
export function createDiagnostics(options: DiagnosticsOptions = {}): Logger {
  const level = options.level ?? diagnosticsLevelFromEnv(options.env);
  return pino(
    {
      name: "fieldlog",
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    options.destination ?? pino.destination(2),
  );
}
