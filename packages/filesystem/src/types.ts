/**
 * Storage client contract and the path-like capability set built on it
 */

// ============================================================================
// STORAGE CLIENT CONTRACT
// ============================================================================

/**
 * Metadata for one stored object
 */
export interface ObjectInfo {
	key: string;
	size: number;
	lastModified?: Date;
}

/**
 * One page of a prefix listing. Common prefixes and objects are disjoint.
 */
export interface ListingPage {
	/** Key prefixes up to the next delimiter (synthetic subdirectories) */
	commonPrefixes: string[];
	objectInfo: ObjectInfo[];
}

/**
 * Primitive object operations a bucket path is built on.
 *
 * Failures the backend reports are raised as StorageClientError; a missing
 * object has `notFound` set.
 */
export interface StorageClient {
	/**
	 * Open an object for reading
	 * @throws StorageClientError if the object does not exist
	 */
	getObject(bucket: string, key: string): Promise<ReadableStream<Uint8Array>>;

	/**
	 * Open an object for writing. Closing the stream finalizes the object;
	 * aborting it discards what was written.
	 */
	putObject(bucket: string, key: string): WritableStream<Uint8Array>;

	/**
	 * @throws StorageClientError if the object does not exist
	 */
	headObject(bucket: string, key: string): Promise<ObjectInfo>;

	/**
	 * List keys under a prefix, one page at a time. With a delimiter, keys
	 * sharing a prefix up to the next delimiter collapse into a common prefix.
	 */
	listObjects(
		bucket: string,
		prefix: string,
		delimiter?: string,
	): AsyncIterable<ListingPage>;

	/**
	 * Delete an object. Deleting a missing key succeeds.
	 */
	deleteObject(bucket: string, key: string): Promise<void>;
}

// ============================================================================
// PATH CAPABILITIES
// ============================================================================

/**
 * Stat record synthesized for a bucket location
 */
export interface StatResult {
	kind: "file" | "directory";
	/** S_IFREG or S_IFDIR */
	mode: number;
	size?: number;
	lastModified?: Date;
	dev: string;
}

export type ReadBinaryMode = "rb" | "br";
export type WriteBinaryMode = "wb" | "bw";
export type ReadTextMode = "r" | "rt" | "tr";
export type WriteTextMode = "w" | "wt" | "tw";
export type OpenMode =
	| ReadBinaryMode
	| WriteBinaryMode
	| ReadTextMode
	| WriteTextMode;

/**
 * Options for opening a path in text mode
 */
export interface OpenOptions {
	/** Must be -1; object streams are always buffered by the client */
	buffering?: number;
	/** Text encoding, "utf-8" by default */
	encoding?: string;
	/** "strict" rejects malformed input, "replace" substitutes U+FFFD */
	errors?: "strict" | "replace";
	/**
	 * undefined translates "\r\n" and "\r" to "\n" on read; "" disables
	 * translation; any other value replaces "\n" on write
	 */
	newline?: "" | "\n" | "\r" | "\r\n";
}

export interface GlobOptions {
	caseSensitive?: boolean;
}

/**
 * Capabilities shared by hierarchical path values.
 *
 * Code that accepts "any path" types against this rather than a concrete
 * path class.
 */
export interface PathLike {
	readonly name: string;
	readonly parent: this;
	readonly parts: readonly string[];
	isAbsolute(): boolean;
	joinpath(...segments: string[]): this;
	withName(name: string): this;
	equals(other: unknown): boolean;
	toString(): string;

	stat(): Promise<StatResult>;
	exists(): Promise<boolean>;
	isDir(): Promise<boolean>;
	isFile(): Promise<boolean>;
	iterdir(): AsyncGenerator<this, void, undefined>;
	glob(
		pattern: string,
		options?: GlobOptions,
	): AsyncGenerator<this, void, undefined>;

	open(
		mode: ReadBinaryMode,
		options?: OpenOptions,
	): Promise<ReadableStream<Uint8Array>>;
	open(
		mode: WriteBinaryMode,
		options?: OpenOptions,
	): Promise<WritableStream<Uint8Array>>;
	open(
		mode?: ReadTextMode,
		options?: OpenOptions,
	): Promise<ReadableStream<string>>;
	open(
		mode: WriteTextMode,
		options?: OpenOptions,
	): Promise<WritableStream<string>>;
}
