import type { FetchLike } from "../../src/http/fetch-stream";

/** A body, an HTTP status to fail with, or "hang" to never answer. */
export type FakeRoute = string | Buffer | number | "hang";

export type FakeFetch = {
	fetch: FetchLike;
	requests: string[];
	set: (relativePath: string, route: FakeRoute) => void;
	remove: (relativePath: string) => void;
};

export const BASE_URL = "http://mirror.test/repo";

/**
 * In-process stand-in for `fetch`, answering paths under BASE_URL. Unknown
 * paths get a 404.
 */
export const createFakeFetch = (
	routes: Record<string, FakeRoute> = {},
	baseUrl = BASE_URL,
): FakeFetch => {
	const table = new Map(Object.entries(routes));
	const requests: string[] = [];
	const fetch: FetchLike = async (url, init) => {
		requests.push(url);
		const relativePath = url.startsWith(`${baseUrl}/`)
			? url.slice(baseUrl.length + 1)
			: url;
		const route = table.get(relativePath);
		if (route === "hang") {
			return new Promise<Response>((_resolve, reject) => {
				init.signal?.addEventListener("abort", () =>
					reject(init.signal?.reason),
				);
			});
		}
		if (route === undefined) {
			return new Response("not found", { status: 404 });
		}
		if (typeof route === "number") {
			return new Response("failure", { status: route });
		}
		return new Response(route, { status: 200 });
	};
	return {
		fetch,
		requests,
		set: (relativePath, route) => table.set(relativePath, route),
		remove: (relativePath) => table.delete(relativePath),
	};
};

export const requestedPaths = (fake: FakeFetch, baseUrl = BASE_URL) =>
	fake.requests.map((url) => url.slice(baseUrl.length + 1));
