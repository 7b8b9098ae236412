/**
 * @synonymy/server — HTTP server for a synonym index.
 *
 * @example
 * ```ts
 * import { createApp } from "@synonymy/server"
 * import { makeSynonymIndex } from "@synonymy/core"
 *
 * const app = createApp({ index: await Effect.runPromise(makeSynonymIndex) })
 * const response = await app.request("/synonyms?word=quick")
 * ```
 *
 * @module
 */

export { type AppOptions, CORS_METHODS, createApp } from "./app.js";
export {
	type LogFormat,
	makeLoggerLayer,
	type ServerConfig,
	serverConfig,
} from "./config.js";
export { main, type RunningServer, startServer } from "./main.js";
