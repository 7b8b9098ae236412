/**
 * Server configuration, read from the environment through Effect's `Config`.
 *
 * | variable       | default   |
 * |----------------|-----------|
 * | `PORT`         | `8080`    |
 * | `HOST`         | `0.0.0.0` |
 * | `CORS_ORIGINS` | `*`       |
 * | `LOG_LEVEL`    | `Info`    |
 * | `LOG_FORMAT`   | `pretty`  |
 *
 * @module
 */

import { Config, Layer, Logger, LogLevel } from "effect";

export type LogFormat = "pretty" | "json" | "logfmt";

export interface ServerConfig {
	readonly port: number;
	readonly host: string;
	/** Allowed CORS origins; `["*"]` allows any. */
	readonly corsOrigins: ReadonlyArray<string>;
	readonly logLevel: LogLevel.LogLevel;
	readonly logFormat: LogFormat;
}

const port = Config.integer("PORT").pipe(
	Config.withDefault(8080),
	Config.validate({
		message: "Expected a port between 1 and 65535",
		validation: (value: number) => value >= 1 && value <= 65535,
	}),
);

const host = Config.string("HOST").pipe(Config.withDefault("0.0.0.0"));

const corsOrigins: Config.Config<ReadonlyArray<string>> = Config.array(
	Config.string(),
	"CORS_ORIGINS",
).pipe(
	Config.map((origins) =>
		origins.map((origin) => origin.trim()).filter((origin) => origin !== ""),
	),
	Config.withDefault(["*"]),
);

const logLevel = Config.logLevel("LOG_LEVEL").pipe(
	Config.withDefault(LogLevel.Info),
);

const logFormat = Config.literal(
	"pretty",
	"json",
	"logfmt",
)("LOG_FORMAT").pipe(Config.withDefault<LogFormat>("pretty"));

export const serverConfig: Config.Config<ServerConfig> = Config.all({
	port,
	host,
	corsOrigins,
	logLevel,
	logFormat,
});

// ============================================================================
// Logging
// ============================================================================

const loggerFormats: Record<LogFormat, Layer.Layer<never>> = {
	pretty: Logger.pretty,
	json: Logger.json,
	logfmt: Logger.logFmt,
};

/**
 * Replaces the default logger with the configured format and sets the
 * minimum level.
 */
export const makeLoggerLayer = (
	config: Pick<ServerConfig, "logLevel" | "logFormat">,
): Layer.Layer<never> =>
	Layer.merge(
		loggerFormats[config.logFormat],
		Logger.minimumLogLevel(config.logLevel),
	);
