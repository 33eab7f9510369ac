import { PassThrough, Readable, type Transform } from "node:stream";
import { finished, pipeline } from "node:stream/promises";
import { HttpError } from "../errors";

export type FetchLike = (
	url: string,
	init: { signal?: AbortSignal },
) => Promise<Response>;

export type FetchOptions = {
	fetch?: FetchLike;
	/** Deadline for the response headers; the body is never cut short. */
	timeoutMs?: number;
};

export type StreamConsumer<T> = (stream: Readable) => Promise<T>;

export const joinUrl = (baseUrl: string, relativePath: string) =>
	`${baseUrl.replace(/\/+$/, "")}/${relativePath.replace(/^\/+/, "")}`;

export const fetchStream = async (
	url: string,
	options: FetchOptions = {},
): Promise<Readable> => {
	const fetchImpl: FetchLike = options.fetch ?? fetch;
	const controller = new AbortController();
	const timer = options.timeoutMs
		? setTimeout(
				() =>
					controller.abort(
						new Error(`No response within ${options.timeoutMs}ms`),
					),
				options.timeoutMs,
			)
		: null;
	let response: Response;
	try {
		response = await fetchImpl(url, { signal: controller.signal });
	} catch (error) {
		throw new HttpError(url, 0, { cause: error });
	} finally {
		if (timer) {
			clearTimeout(timer);
		}
	}
	if (!response.ok) {
		await response.body?.cancel();
		throw new HttpError(url, response.status);
	}
	if (!response.body) {
		return Readable.from([]);
	}
	return Readable.fromWeb(response.body);
};

/**
 * Reads everything and discards it; stores still receive every chunk.
 */
export const drain: StreamConsumer<void> = async (stream) => {
	stream.resume();
	await finished(stream);
};

/**
 * GET `url` and run its body through `transforms` (e.g. store sinks) into
 * `consume`. Chunks flow through each stage once; whatever `consume` leaves
 * unread is drained so every transform sees the full body.
 */
export const downloadApply = async <T>(
	url: string,
	transforms: Transform[],
	consume: StreamConsumer<T>,
	options: FetchOptions = {},
): Promise<T> => {
	const body = await fetchStream(url, options);
	const output = new PassThrough();
	const flowing = pipeline([body, ...transforms, output]);
	let result: T;
	try {
		result = await consume(output);
	} catch (error) {
		output.destroy(error instanceof Error ? error : new Error(String(error)));
		try {
			await flowing;
		} catch {
			// The consumer error is the root cause.
		}
		throw error;
	}
	output.resume();
	await flowing;
	return result;
};
