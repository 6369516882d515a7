/**
 * Filesystem-style error classes with native cause support and serialization
 */

const FILESYSTEM_ERROR = Symbol.for("bucketpath.filesystem-error");

/** POSIX-style error codes raised by bucket paths */
export type FileSystemErrorCode =
	| "ENOENT"
	| "EEXIST"
	| "ENOTDIR"
	| "EISDIR"
	| "ENOTEMPTY"
	| "ENOTSUP"
	| "EINVAL";

/** Options for creating filesystem errors */
export interface FileSystemErrorOptions {
	/** Original error that caused this one */
	cause?: unknown;
	/** Path string the failing operation was applied to */
	path?: string;
}

/** Base filesystem error class */
export class FileSystemError extends Error {
	readonly code: FileSystemErrorCode;
	readonly path?: string;

	constructor(
		code: FileSystemErrorCode,
		message: string,
		options: FileSystemErrorOptions = {},
	) {
		super(message, {cause: options.cause});
		this.name = this.constructor.name;
		this.code = code;
		this.path = options.path;
	}

	/**
	 * Convert error to a plain object for serialization
	 */
	toJSON() {
		return {
			name: this.name,
			code: this.code,
			message: this.message,
			path: this.path,
		};
	}
}

Object.defineProperty(FileSystemError.prototype, FILESYSTEM_ERROR, {
	value: true,
});

/**
 * Check if a value is a filesystem error
 */
export function isFileSystemError(value: unknown): value is FileSystemError {
	return (
		typeof value === "object" &&
		value !== null &&
		FILESYSTEM_ERROR in value &&
		value[FILESYSTEM_ERROR] === true
	);
}

export class NotFoundError extends FileSystemError {
	constructor(message: string, options?: FileSystemErrorOptions) {
		super("ENOENT", message, options);
	}
}

export class AlreadyExistsError extends FileSystemError {
	constructor(message: string, options?: FileSystemErrorOptions) {
		super("EEXIST", message, options);
	}
}

export class NotADirectoryError extends FileSystemError {
	constructor(message: string, options?: FileSystemErrorOptions) {
		super("ENOTDIR", message, options);
	}
}

export class IsADirectoryError extends FileSystemError {
	constructor(message: string, options?: FileSystemErrorOptions) {
		super("EISDIR", message, options);
	}
}

export class NotEmptyError extends FileSystemError {
	constructor(message: string, options?: FileSystemErrorOptions) {
		super("ENOTEMPTY", message, options);
	}
}

/** Raised for modes, patterns and path shapes object storage cannot serve */
export class UnsupportedOperation extends FileSystemError {
	constructor(message: string, options?: FileSystemErrorOptions) {
		super("ENOTSUP", message, options);
	}
}

export class ValidationError extends FileSystemError {
	constructor(message: string, options?: FileSystemErrorOptions) {
		super("EINVAL", message, options);
	}
}

/** Raised when an environment override cannot be parsed */
export class ConfigurationError extends FileSystemError {
	readonly variable: string;

	constructor(
		variable: string,
		message: string,
		options?: FileSystemErrorOptions,
	) {
		super("EINVAL", message, options);
		this.variable = variable;
	}
}

// ============================================================================
// STORAGE CLIENT ERRORS
// ============================================================================

/** Options for creating storage client errors */
export interface StorageClientErrorOptions {
	cause?: unknown;
	/** Backend error code, e.g. "NoSuchKey" */
	code?: string;
	/** HTTP status reported by the backend, when there is one */
	status?: number;
}

/**
 * Signal raised by a storage client when the backend rejects a request.
 *
 * Bucket paths catch this at the narrowest point and translate it; any other
 * error thrown by a client propagates unchanged.
 */
export class StorageClientError extends Error {
	readonly code?: string;
	readonly status?: number;

	constructor(message: string, options: StorageClientErrorOptions = {}) {
		super(message, {cause: options.cause});
		this.name = "StorageClientError";
		this.code = options.code;
		this.status = options.status;
	}

	get notFound(): boolean {
		return (
			this.status === 404 ||
			this.code === "NoSuchKey" ||
			this.code === "NotFound"
		);
	}
}
