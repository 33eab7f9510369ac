export type ErrnoException = NodeJS.ErrnoException;

export const isErrnoException = (error: unknown): error is ErrnoException =>
	typeof error === "object" &&
	error !== null &&
	"code" in error &&
	(typeof (error as ErrnoException).code === "string" ||
		typeof (error as ErrnoException).code === "number" ||
		(error as ErrnoException).code === undefined);

export const getErrnoCode = (error: unknown): string | undefined =>
	isErrnoException(error) && typeof error.code === "string"
		? error.code
		: undefined;

export const isNotFoundError = (error: unknown) => {
	const code = getErrnoCode(error);
	return code === "ENOENT" || code === "ENOTDIR";
};

export const toErrorMessage = (error: unknown) =>
	error instanceof Error ? error.message : String(error);

/**
 * Base error for everything a mirror run can fail with.
 */
export class MirrorError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "MirrorError";
	}
}

/**
 * Non-2xx response. `statusCode` is 0 when the request never got a response.
 */
export class HttpError extends MirrorError {
	readonly url: string;
	readonly statusCode: number;

	constructor(url: string, statusCode: number, options?: { cause?: unknown }) {
		super(
			statusCode > 0
				? `GET ${url} failed with HTTP ${statusCode}`
				: `GET ${url} failed: ${toErrorMessage(options?.cause)}`,
			options,
		);
		this.name = "HttpError";
		this.url = url;
		this.statusCode = statusCode;
	}
}

export const isHttpStatus = (error: unknown, statusCode: number) =>
	error instanceof HttpError && error.statusCode === statusCode;

export class MalformedMetadataError extends MirrorError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "MalformedMetadataError";
	}
}

export class DecompressionError extends MirrorError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "DecompressionError";
	}
}

export class FileNotFoundError extends MirrorError {
	readonly path: string;

	constructor(path: string, options?: { cause?: unknown }) {
		super(`File not found in storage: ${path}`, options);
		this.name = "FileNotFoundError";
		this.path = path;
	}
}

export class ChecksumError extends MirrorError {
	readonly path: string;

	constructor(path: string, message: string, options?: { cause?: unknown }) {
		super(`Cannot compute checksum of ${path}: ${message}`, options);
		this.name = "ChecksumError";
		this.path = path;
	}
}

export class RecycleError extends MirrorError {
	readonly path: string;

	constructor(path: string, options?: { cause?: unknown }) {
		super(
			`Cannot recycle ${path}: ${toErrorMessage(options?.cause)}`,
			options,
		);
		this.name = "RecycleError";
		this.path = path;
	}
}

export class CommitError extends MirrorError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "CommitError";
	}
}

export class UnsafePathError extends MirrorError {
	readonly path: string;

	constructor(path: string) {
		super(`Path escapes the storage root: ${path}`);
		this.name = "UnsafePathError";
		this.path = path;
	}
}
