/**
 * Hierarchical paths over S3 object keys
 *
 * Directories do not exist in S3. An S3Path is a directory when its key is
 * the bucket root, when a zero-byte marker object `key/` exists, or when
 * other keys live below `key/`.
 */

import * as FS from "fs";
import {getLogger} from "@logtape/logtape";
import {z} from "zod";
import {
	AlreadyExistsError,
	IsADirectoryError,
	NotADirectoryError,
	NotEmptyError,
	NotFoundError,
	StorageClientError,
	UnsupportedOperation,
	ValidationError,
	assertDecodable,
	assertEncodable,
	compileSelector,
	decodeText,
	encodeText,
	parser,
	parseURI,
	type GlobOptions,
	type GlobTarget,
	type OpenOptions,
	type PathLike,
	type ReadBinaryMode,
	type ReadTextMode,
	type ScanEntry,
	type StatResult,
	type StorageClient,
	type WriteBinaryMode,
	type WriteTextMode,
} from "@bucketpath/filesystem";
import {AWSStorageClient} from "./client.js";
import {
	resolveClientConfig,
	resolveRegion,
	type S3ClientConfig,
} from "./config.js";

const logger = getLogger(["bucketpath", "s3"]);

const {S_IFDIR, S_IFREG} = FS.constants;

export interface S3PathOptions {
	/** Client to share; built lazily from region and config otherwise */
	client?: StorageClient;
	region?: string;
	clientConfig?: Partial<S3ClientConfig>;
}

/**
 * Serialized form of an S3Path. The client is never part of it.
 */
export interface S3PathState {
	path: string;
	region?: string;
	clientConfig?: S3ClientConfig;
}

const S3PathStateSchema = z.object({
	path: z.string(),
	region: z.string().optional(),
	clientConfig: z
		.object({
			throughputTargetGbps: z.number().positive(),
			partSize: z.number().int().positive(),
		})
		.optional(),
});

/**
 * Lazily built client, shared by every path derived from the same origin
 */
class ClientHandle {
	readonly region: string;
	readonly config: S3ClientConfig;
	#client?: StorageClient;

	constructor(region: string, config: S3ClientConfig, client?: StorageClient) {
		this.region = region;
		this.config = config;
		this.#client = client;
	}

	get client(): StorageClient {
		if (!this.#client) {
			logger.debug("Creating storage client for {region}", {
				region: this.region,
			});
			this.#client = new AWSStorageClient({
				region: this.region,
				config: this.config,
			});
		}

		return this.#client;
	}
}

export class S3Path implements PathLike, GlobTarget<S3Path> {
	static readonly parser = parser;

	#drive: string;
	#tail: string[];
	#handle: ClientHandle;

	constructor(path: string = "", options: S3PathOptions = {}) {
		const [drive, rest] = parser.splitdrive(path);
		this.#drive = drive;
		this.#tail = rest.split(parser.sep).filter((part) => part && part !== ".");
		this.#handle = new ClientHandle(
			resolveRegion(options.region),
			resolveClientConfig(options.clientConfig),
			options.client,
		);
	}

	/**
	 * Rebuild a path from its serialized state with a fresh client
	 */
	static fromJSON(state: unknown): S3Path {
		const result = S3PathStateSchema.safeParse(state);
		if (!result.success) {
			throw new ValidationError(
				`Invalid S3Path state: ${result.error.issues
					.map((issue) => `${issue.path.join(".") || "state"} ${issue.message}`)
					.join(", ")}`,
				{cause: result.error},
			);
		}

		const {path, region, clientConfig} = result.data;
		return new S3Path(path, {region, clientConfig});
	}

	// ==========================================================================
	// Pure path accessors
	// ==========================================================================

	/** `scheme://bucket`, empty for relative paths */
	get drive(): string {
		return this.#drive;
	}

	get region(): string {
		return this.#handle.region;
	}

	get clientConfig(): S3ClientConfig {
		return this.#handle.config;
	}

	get client(): StorageClient {
		return this.#handle.client;
	}

	get bucket(): string {
		return this.drive ? parseURI(this.drive).bucket : "";
	}

	get key(): string {
		return this.drive ? this.#tail.join(parser.sep) : "";
	}

	get anchor(): string {
		return this.drive ? this.drive + parser.sep : "";
	}

	get parts(): readonly string[] {
		return this.drive ? [this.anchor, ...this.#tail] : [...this.#tail];
	}

	get name(): string {
		return this.#tail[this.#tail.length - 1] ?? "";
	}

	get stem(): string {
		return parser.splitext(this.name)[0];
	}

	get suffix(): string {
		return parser.splitext(this.name)[1];
	}

	get suffixes(): string[] {
		const name = this.name;
		if (name.endsWith(".")) {
			return [];
		}

		return name
			.replace(/^\.+/, "")
			.split(".")
			.slice(1)
			.map((suffix) => "." + suffix);
	}

	get parent(): S3Path {
		if (!this.#tail.length) {
			return this;
		}

		return this.#derive(this.drive, this.#tail.slice(0, -1));
	}

	get parents(): S3Path[] {
		const parents: S3Path[] = [];
		for (let length = this.#tail.length - 1; length >= 0; length--) {
			parents.push(this.#derive(this.drive, this.#tail.slice(0, length)));
		}

		return parents;
	}

	isAbsolute(): boolean {
		return this.drive !== "";
	}

	toString(): string {
		if (this.drive) {
			return this.anchor + this.#tail.join(parser.sep);
		}

		return this.#tail.join(parser.sep) || ".";
	}

	toJSON(): S3PathState {
		return {
			path: this.toString(),
			region: this.region,
			clientConfig: {...this.clientConfig},
		};
	}

	/**
	 * Paths are equal when their string forms are; client, region and config
	 * take no part. Use the string form as the key in maps and sets.
	 */
	equals(other: unknown): boolean {
		return other instanceof S3Path && other.toString() === this.toString();
	}

	/**
	 * Build a path from segments, anchored to this path's bucket and sharing
	 * its client, region and config
	 */
	withSegments(...segments: string[]): S3Path {
		let path = segments.join(parser.sep);
		if (path.startsWith(parser.sep)) {
			path = path.slice(1);
		}

		if (!parser.isabs(path) && !path.startsWith(this.anchor)) {
			path = this.anchor + path;
		}

		const [drive, rest] = parser.splitdrive(path);
		return this.#derive(
			drive,
			rest.split(parser.sep).filter((part) => part && part !== "."),
		);
	}

	/**
	 * Append segments; a segment naming a bucket starts over from it
	 */
	joinpath(...segments: string[]): S3Path {
		let drive = this.drive;
		let tail = this.#tail;
		for (const segment of segments) {
			const [segmentDrive, rest] = parser.splitdrive(segment);
			const parts = rest
				.split(parser.sep)
				.filter((part) => part && part !== ".");
			if (segmentDrive) {
				drive = segmentDrive;
				tail = parts;
			} else {
				tail = [...tail, ...parts];
			}
		}

		return this.#derive(drive, tail);
	}

	withName(name: string): S3Path {
		if (!name || name === "." || name.includes(parser.sep)) {
			throw new ValidationError(`Invalid name ${JSON.stringify(name)}`, {
				path: this.toString(),
			});
		}

		if (!this.name) {
			throw new ValidationError(`${this} has an empty name`, {
				path: this.toString(),
			});
		}

		return this.#derive(this.drive, [...this.#tail.slice(0, -1), name]);
	}

	withStem(stem: string): S3Path {
		return this.withName(stem + this.suffix);
	}

	withSuffix(suffix: string): S3Path {
		if ((suffix && !suffix.startsWith(".")) || suffix === ".") {
			throw new ValidationError(`Invalid suffix ${JSON.stringify(suffix)}`, {
				path: this.toString(),
			});
		}

		return this.withName(this.stem + suffix);
	}

	// ==========================================================================
	// I/O
	// ==========================================================================

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
	open(
		mode: string,
		options?: OpenOptions,
	): Promise<
		| ReadableStream<Uint8Array>
		| ReadableStream<string>
		| WritableStream<Uint8Array>
		| WritableStream<string>
	>;
	async open(
		mode: string = "r",
		options: OpenOptions = {},
	): Promise<
		| ReadableStream<Uint8Array>
		| ReadableStream<string>
		| WritableStream<Uint8Array>
		| WritableStream<string>
	> {
		this.#assertAbsolute("open");
		if (options.buffering !== undefined && options.buffering !== -1) {
			throw new UnsupportedOperation(
				`Explicit buffering is unsupported when opening ${this}`,
				{path: this.toString()},
			);
		}

		if (!this.key) {
			throw new IsADirectoryError(`Cannot open bucket root ${this}`, {
				path: this.toString(),
			});
		}

		const binary = mode.includes("b");
		const action = Array.from(mode)
			.filter((char) => !"btU".includes(char))
			.join("");
		if (binary && mode.includes("t")) {
			throw new UnsupportedOperation(
				`Mode ${JSON.stringify(mode)} is both binary and text for ${this}`,
				{path: this.toString()},
			);
		}

		if (action === "r") {
			if (!binary) {
				assertDecodable(options, this.toString());
			}

			let stream: ReadableStream<Uint8Array>;
			try {
				stream = await this.client.getObject(this.bucket, this.key);
			} catch (error) {
				if (error instanceof StorageClientError && error.notFound) {
					throw new NotFoundError(`No such file: ${this}`, {
						path: this.toString(),
						cause: error,
					});
				}

				throw error;
			}

			return binary ? stream : decodeText(stream, options);
		} else if (action === "w") {
			if (!binary) {
				assertEncodable(options, this.toString());
			}

			const stream = this.client.putObject(this.bucket, this.key);
			return binary ? stream : encodeText(stream, options);
		}

		throw new UnsupportedOperation(
			`Unsupported mode ${JSON.stringify(mode)} for ${this}`,
			{path: this.toString()},
		);
	}

	async readBytes(): Promise<Uint8Array> {
		const reader = (await this.open("rb")).getReader();
		const chunks: Uint8Array[] = [];
		for (;;) {
			const {done, value} = await reader.read();
			if (done) break;
			chunks.push(value);
		}

		const content = new Uint8Array(
			chunks.reduce((sum, chunk) => sum + chunk.length, 0),
		);
		let offset = 0;
		for (const chunk of chunks) {
			content.set(chunk, offset);
			offset += chunk.length;
		}

		return content;
	}

	async readText(options?: OpenOptions): Promise<string> {
		const reader = (await this.open("r", options)).getReader();
		let text = "";
		for (;;) {
			const {done, value} = await reader.read();
			if (done) break;
			text += value;
		}

		return text;
	}

	/**
	 * @returns the number of bytes written
	 */
	async writeBytes(data: Uint8Array): Promise<number> {
		const writer = (await this.open("wb")).getWriter();
		try {
			await writer.write(data);
		} catch (error) {
			await writer.abort(error);
			throw error;
		}

		await writer.close();
		return data.length;
	}

	/**
	 * @returns the number of characters (code points) written
	 */
	async writeText(text: string, options?: OpenOptions): Promise<number> {
		const writer = (await this.open("w", options)).getWriter();
		try {
			await writer.write(text);
		} catch (error) {
			await writer.abort(error);
			throw error;
		}

		await writer.close();
		return Array.from(text).length;
	}

	/**
	 * Stat the object at this key, falling back to a directory marker and then
	 * to any keys below it
	 *
	 * @throws NotFoundError if none of the probes finds anything
	 */
	async stat(): Promise<StatResult> {
		this.#assertAbsolute("stat");
		if (!this.key) {
			return directoryStat();
		}

		const result =
			(await this.#statObject()) ??
			(await this.#statDirectoryMarker()) ??
			(await this.#statPrefix());
		if (!result) {
			throw new NotFoundError(
				`No stats available for ${this}; it may not exist.`,
				{path: this.toString()},
			);
		}

		return result;
	}

	async exists(): Promise<boolean> {
		return (await this.#statOrUndefined()) !== undefined;
	}

	async isDir(): Promise<boolean> {
		return (await this.#statOrUndefined())?.kind === "directory";
	}

	async isFile(): Promise<boolean> {
		return (await this.#statOrUndefined())?.kind === "file";
	}

	/**
	 * Yield the children of this directory: subdirectories of each listing
	 * page first, then objects.
	 *
	 * @throws NotADirectoryError if this path is not a directory
	 */
	async *iterdir(): AsyncGenerator<S3Path, void, undefined> {
		this.#assertAbsolute("iterdir");
		if (!(await this.isDir())) {
			throw new NotADirectoryError(`Not a directory: ${this}`, {
				path: this.toString(),
			});
		}

		for await (const entry of this.scandir()) {
			yield entry.path;
		}
	}

	/**
	 * Children with their kind, without checking that this path is a
	 * directory. Listing failures end the scan.
	 */
	async *scandir(): AsyncGenerator<ScanEntry<S3Path>, void, undefined> {
		this.#assertAbsolute("scandir");
		const prefix = this.#directoryKey;
		try {
			for await (const page of this.client.listObjects(
				this.bucket,
				prefix,
				parser.sep,
			)) {
				for (const common of page.commonPrefixes) {
					yield {
						path: this.withSegments(common.replace(/\/+$/, "")),
						isDir: true,
					};
				}

				for (const info of page.objectInfo) {
					if (info.key !== prefix) {
						yield {
							path: this.withSegments(info.key),
							isDir: info.key.endsWith(parser.sep),
						};
					}
				}
			}
		} catch (error) {
			if (!(error instanceof StorageClientError)) {
				throw error;
			}

			logger.debug("Listing {prefix} failed: {error}", {prefix, error});
		}
	}

	/**
	 * Create a directory by writing a zero-byte marker object `key/`
	 *
	 * @throws AlreadyExistsError if the path exists, unless it is a directory
	 * and `existOk` is set
	 */
	async mkdir(options: {existOk?: boolean} = {}): Promise<void> {
		this.#assertAbsolute("mkdir");
		const stat = await this.#statOrUndefined();
		if (stat) {
			if (options.existOk && stat.kind === "directory") {
				return;
			}

			throw new AlreadyExistsError(`Path already exists: ${this}`, {
				path: this.toString(),
			});
		}

		logger.debug("Creating directory marker for {path}", {
			path: this.toString(),
		});
		const marker = this.client.putObject(this.bucket, this.#directoryKey);
		await marker.close();
	}

	/**
	 * Delete the object at this key
	 *
	 * @throws IsADirectoryError if the path is a directory
	 * @throws NotFoundError if nothing exists here, unless `missingOk` is set
	 */
	async unlink(options: {missingOk?: boolean} = {}): Promise<void> {
		this.#assertAbsolute("unlink");
		const stat = await this.#statOrUndefined();
		if (stat?.kind === "directory") {
			throw new IsADirectoryError(
				`Path ${this} is a directory; call rmdir instead of unlink`,
				{path: this.toString()},
			);
		}

		if (!stat) {
			if (options.missingOk) {
				return;
			}

			throw new NotFoundError(`No such file: ${this}`, {
				path: this.toString(),
			});
		}

		logger.debug("Deleting {path}", {path: this.toString()});
		await this.client.deleteObject(this.bucket, this.key);
	}

	/**
	 * Remove an empty directory's marker object
	 *
	 * @throws NotADirectoryError if the path is not a directory
	 * @throws NotEmptyError if the directory has at least one child
	 */
	async rmdir(): Promise<void> {
		this.#assertAbsolute("rmdir");
		if (!this.key) {
			throw new UnsupportedOperation(`Cannot remove bucket root ${this}`, {
				path: this.toString(),
			});
		}

		const children = this.iterdir();
		try {
			const first = await children.next();
			if (!first.done) {
				throw new NotEmptyError(`Directory not empty: ${this}`, {
					path: this.toString(),
				});
			}
		} finally {
			await children.return();
		}

		logger.debug("Removing directory marker for {path}", {
			path: this.toString(),
		});
		await this.client.deleteObject(this.bucket, this.#directoryKey);
	}

	/**
	 * Yield paths below this directory matching a relative pattern
	 *
	 * Supports `*`, `?`, `[...]` and `**`; a trailing `/` matches directories
	 * only. Patterns are checked before the first result is requested.
	 */
	glob(
		pattern: string,
		options: GlobOptions = {},
	): AsyncGenerator<S3Path, void, undefined> {
		this.#assertAbsolute("glob");
		if (!pattern) {
			throw new ValidationError(
				`Unacceptable pattern: ${JSON.stringify(pattern)}`,
				{path: this.toString()},
			);
		}

		const segments = pattern.split(parser.sep);
		if (segments.includes("..")) {
			throw new UnsupportedOperation(
				`Relative paths with '..' not supported in glob patterns: ${pattern}`,
				{path: this.toString()},
			);
		}

		if (pattern.startsWith(parser.sep) || parser.isabs(pattern)) {
			throw new UnsupportedOperation(
				`Non-relative patterns are unsupported: ${pattern}`,
				{path: this.toString()},
			);
		}

		const select = compileSelector<S3Path>(
			segments.filter((segment) => segment && segment !== "."),
			{
				caseSensitive: options.caseSensitive,
				dirOnly: pattern.endsWith(parser.sep),
			},
		);
		return select(this);
	}

	/**
	 * Glob recursively: `rglob(p)` is `glob("**\/" + p)`
	 */
	rglob(
		pattern: string,
		options: GlobOptions = {},
	): AsyncGenerator<S3Path, void, undefined> {
		return this.glob(`**/${pattern}`, options);
	}

	// ==========================================================================
	// Internals
	// ==========================================================================

	/** Key used for the directory marker and for listing children */
	get #directoryKey(): string {
		const key = this.key;
		if (!key) {
			return "";
		}

		return key.endsWith(parser.sep) ? key : key + parser.sep;
	}

	#derive(drive: string, tail: string[]): S3Path {
		const path = new S3Path("", {
			region: this.region,
			clientConfig: this.clientConfig,
		});
		path.#drive = drive;
		path.#tail = tail;
		path.#handle = this.#handle;
		return path;
	}

	#assertAbsolute(operation: string): void {
		if (!this.isAbsolute()) {
			throw new UnsupportedOperation(
				`${operation} requires an absolute path naming a bucket: ${this}`,
				{path: this.toString()},
			);
		}
	}

	async #statOrUndefined(): Promise<StatResult | undefined> {
		try {
			return await this.stat();
		} catch (error) {
			if (error instanceof NotFoundError) {
				return undefined;
			}

			throw error;
		}
	}

	async #statObject(): Promise<StatResult | undefined> {
		try {
			const info = await this.client.headObject(this.bucket, this.key);
			return info.key.endsWith(parser.sep)
				? directoryStat(info.size, info.lastModified)
				: {
						kind: "file",
						mode: S_IFREG,
						size: info.size,
						lastModified: info.lastModified,
						dev: "s3://",
					};
		} catch (error) {
			if (error instanceof StorageClientError) {
				return undefined;
			}

			throw error;
		}
	}

	async #statDirectoryMarker(): Promise<StatResult | undefined> {
		try {
			const info = await this.client.headObject(
				this.bucket,
				this.#directoryKey,
			);
			return directoryStat(info.size, info.lastModified);
		} catch (error) {
			if (error instanceof StorageClientError) {
				return undefined;
			}

			throw error;
		}
	}

	async #statPrefix(): Promise<StatResult | undefined> {
		try {
			for await (const page of this.client.listObjects(
				this.bucket,
				this.#directoryKey,
			)) {
				if (page.objectInfo.length || page.commonPrefixes.length) {
					return directoryStat(0);
				}

				// Only the first page is consulted
				break;
			}
		} catch (error) {
			if (!(error instanceof StorageClientError)) {
				throw error;
			}
		}

		return undefined;
	}
}

function directoryStat(size?: number, lastModified?: Date): StatResult {
	return {kind: "directory", mode: S_IFDIR, size, lastModified, dev: "s3://"};
}
