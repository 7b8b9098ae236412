/**
 * Entry point: loads configuration, builds the runtime and serves the app.
 *
 * @module
 */

import { fileURLToPath } from "node:url";
import { serve } from "@hono/node-server";
import { SynonymIndex, SynonymIndexLive } from "@synonymy/core";
import { Effect, Layer, ManagedRuntime } from "effect";
import { createApp } from "./app.js";
import { makeLoggerLayer, type ServerConfig, serverConfig } from "./config.js";

export interface RunningServer {
	/** Stops accepting connections, then disposes the runtime. */
	readonly stop: () => Promise<void>;
}

export const startServer = async (
	config: ServerConfig,
): Promise<RunningServer> => {
	const runtime = ManagedRuntime.make(
		Layer.merge(SynonymIndexLive, makeLoggerLayer(config)),
	);
	const index = await runtime.runPromise(SynonymIndex);
	const app = createApp({
		index,
		runtime: await runtime.runtime(),
		corsOrigins: config.corsOrigins,
	});

	const server = serve(
		{ fetch: app.fetch, port: config.port, hostname: config.host },
		(info) => {
			runtime.runSync(
				Effect.logInfo("synonym server listening").pipe(
					Effect.annotateLogs({ address: info.address, port: info.port }),
				),
			);
		},
	);

	const stop = async (): Promise<void> => {
		await new Promise<void>((resolve, reject) => {
			server.close((error) => (error ? reject(error) : resolve()));
		});
		await runtime.runPromise(Effect.logInfo("synonym server stopped"));
		await runtime.dispose();
	};

	return { stop };
};

export const main = async (): Promise<void> => {
	const config = await Effect.runPromise(serverConfig);
	const server = await startServer(config);

	const shutdown = (signal: NodeJS.Signals): void => {
		server.stop().then(
			() => process.exit(0),
			(error: unknown) => {
				console.error(`Shutdown after ${signal} failed:`, error);
				process.exit(1);
			},
		);
	};

	process.once("SIGINT", shutdown);
	process.once("SIGTERM", shutdown);
};

if (process.argv[1] === fileURLToPath(import.meta.url)) {
	main().catch((error: unknown) => {
		console.error(error);
		process.exitCode = 1;
	});
}
