/**
 * Hono adapter for the synonym REST handlers.
 *
 * @module
 */

import type { SynonymIndexShape } from "@synonymy/core";
import {
	createRestHandlers,
	mapErrorToResponse,
	RequestValidationError,
	type RestResponse,
} from "@synonymy/rest";
import { Effect, Runtime } from "effect";
import { type Context, Hono } from "hono";
import { cors } from "hono/cors";

export interface AppOptions {
	readonly index: SynonymIndexShape;
	/** Runtime carrying the configured logger. Defaults to `Runtime.defaultRuntime`. */
	readonly runtime?: Runtime.Runtime<never>;
	/** Allowed CORS origins; `["*"]` (the default) allows any. */
	readonly corsOrigins?: ReadonlyArray<string>;
}

export const CORS_METHODS = [
	"HEAD",
	"GET",
	"POST",
	"PUT",
	"PATCH",
	"DELETE",
] as const;

const toResponse = ({ status, body, headers }: RestResponse): Response =>
	body === null
		? new Response(null, { status, headers })
		: new Response(JSON.stringify(body), {
				status,
				headers: { "content-type": "application/json", ...headers },
			});

const malformedBody = (): RequestValidationError =>
	new RequestValidationError({
		parameter: "body",
		message: "Request body is not valid JSON",
	});

/**
 * Reads a JSON or form body. Any other content type yields no body.
 */
const readBody = async (c: Context): Promise<unknown> => {
	const contentType = c.req.header("content-type") ?? "";
	if (contentType.includes("application/json")) {
		try {
			return await c.req.json<unknown>();
		} catch {
			throw malformedBody();
		}
	}
	if (
		contentType.includes("application/x-www-form-urlencoded") ||
		contentType.includes("multipart/form-data")
	) {
		return c.req.parseBody({ all: true });
	}
	return undefined;
};

/**
 * Builds the HTTP application: CORS, `GET /health` and every synonym route.
 */
export const createApp = (options: AppOptions): Hono => {
	const runtime = options.runtime ?? Runtime.defaultRuntime;
	const origins = options.corsOrigins ?? ["*"];
	const app = new Hono();

	app.use(
		"*",
		cors({
			origin: origins.includes("*") ? "*" : [...origins],
			allowMethods: [...CORS_METHODS],
		}),
	);

	app.onError((error, c) => {
		const response = mapErrorToResponse(error);
		if (response.status >= 500) {
			Runtime.runSync(runtime)(
				Effect.logError(`${c.req.method} ${c.req.path} failed`).pipe(
					Effect.annotateLogs({ error: error.message }),
				),
			);
		}
		return toResponse(response);
	});

	app.get("/health", (c) => c.json({ status: "ok" }));

	for (const route of createRestHandlers(options.index, { runtime })) {
		app.on(route.method, route.path, async (c) => {
			const body = c.req.method === "POST" ? await readBody(c) : undefined;
			const response = await route.handler({
				params: {},
				query: c.req.queries(),
				body,
			});
			return toResponse(response);
		});
	}

	return app;
};
