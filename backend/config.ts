import { Either, ParseResult, Schema } from "effect";
import { ConfigError } from "./errors";
import { LogLevel } from "./logger";

const Environment = Schema.Struct({
  REVIEW_SESSION_IDLE_MINUTES: Schema.optionalWith(
    Schema.NumberFromString.pipe(Schema.positive()),
    { default: () => 30 },
  ),
  LOG_LEVEL: Schema.optionalWith(LogLevel, { default: () => "info" as const }),
});

export interface ReviewConfig {
  sessionIdleMinutes: number;
  logLevel: LogLevel;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): ReviewConfig {
  // Unset and empty variables fall back to their defaults.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );
  const result = Schema.decodeUnknownEither(Environment)(present);
  if (Either.isLeft(result)) {
    throw new ConfigError({
      message: ParseResult.TreeFormatter.formatErrorSync(result.left),
    });
  }
  return {
    sessionIdleMinutes: result.right.REVIEW_SESSION_IDLE_MINUTES,
    logLevel: result.right.LOG_LEVEL,
  };
}
