/**
 * In-memory storage client
 *
 * Implements StorageClient over plain maps, with S3-style delimiter listing
 * and pagination. Buckets are created by writing to them or up front.
 */

import {StorageClientError} from "./errors.js";
import type {ListingPage, ObjectInfo, StorageClient} from "./types.js";

/**
 * In-memory object data
 */
interface MemoryObject {
	content: Uint8Array;
	lastModified: Date;
}

/**
 * A request the client has served, recorded for inspection
 */
export interface MemoryCall {
	method:
		| "getObject"
		| "putObject"
		| "headObject"
		| "listObjects"
		| "deleteObject";
	bucket: string;
	key: string;
	delimiter?: string;
}

export interface MemoryStorageClientOptions {
	/** Buckets that exist before anything is written */
	buckets?: string[];
	/** Entries per listing page (prefixes and objects both count) */
	pageSize?: number;
	/** Chunk size of object read streams */
	chunkSize?: number;
}

/**
 * Storage client that keeps every bucket in process memory
 */
export class MemoryStorageClient implements StorageClient {
	readonly calls: MemoryCall[];
	#buckets: Map<string, Map<string, MemoryObject>>;
	#pageSize: number;
	#chunkSize: number;

	constructor(options: MemoryStorageClientOptions = {}) {
		this.calls = [];
		this.#buckets = new Map();
		this.#pageSize = options.pageSize ?? 1000;
		this.#chunkSize = options.chunkSize ?? 64 * 1024;
		for (const bucket of options.buckets ?? []) {
			this.#buckets.set(bucket, new Map());
		}
	}

	async getObject(
		bucket: string,
		key: string,
	): Promise<ReadableStream<Uint8Array>> {
		this.calls.push({method: "getObject", bucket, key});
		const object = this.#getObject(bucket, key);
		const content = object.content.slice();
		const chunkSize = this.#chunkSize;
		let offset = 0;
		return new ReadableStream<Uint8Array>({
			pull(controller) {
				if (offset >= content.length) {
					controller.close();
					return;
				}

				controller.enqueue(content.slice(offset, offset + chunkSize));
				offset += chunkSize;
			},
		});
	}

	putObject(bucket: string, key: string): WritableStream<Uint8Array> {
		this.calls.push({method: "putObject", bucket, key});
		const chunks: Uint8Array[] = [];
		return new WritableStream<Uint8Array>({
			write: (chunk) => {
				chunks.push(chunk.slice());
			},
			close: () => {
				this.putBytes(bucket, key, concat(chunks));
			},
			abort: () => {
				chunks.length = 0;
			},
		});
	}

	async headObject(bucket: string, key: string): Promise<ObjectInfo> {
		this.calls.push({method: "headObject", bucket, key});
		const object = this.#getObject(bucket, key);
		return {
			key,
			size: object.content.length,
			lastModified: object.lastModified,
		};
	}

	async *listObjects(
		bucket: string,
		prefix: string,
		delimiter?: string,
	): AsyncGenerator<ListingPage, void, undefined> {
		this.calls.push({method: "listObjects", bucket, key: prefix, delimiter});
		const objects = this.#getBucket(bucket);

		type Entry = {prefix: string} | {info: ObjectInfo};
		const entries: Entry[] = [];
		const seen = new Set<string>();
		const keys = Array.from(objects.keys())
			.filter((key) => key.startsWith(prefix))
			.sort();
		for (const key of keys) {
			const rest = key.slice(prefix.length);
			const index = delimiter ? rest.indexOf(delimiter) : -1;
			if (delimiter && index !== -1) {
				const common = prefix + rest.slice(0, index + delimiter.length);
				if (!seen.has(common)) {
					seen.add(common);
					entries.push({prefix: common});
				}
			} else {
				const object = objects.get(key);
				if (object) {
					entries.push({
						info: {
							key,
							size: object.content.length,
							lastModified: object.lastModified,
						},
					});
				}
			}
		}

		for (let start = 0; start === 0 || start < entries.length; ) {
			const page: ListingPage = {commonPrefixes: [], objectInfo: []};
			for (const entry of entries.slice(start, start + this.#pageSize)) {
				if ("prefix" in entry) {
					page.commonPrefixes.push(entry.prefix);
				} else {
					page.objectInfo.push(entry.info);
				}
			}

			yield page;
			start += this.#pageSize;
		}
	}

	async deleteObject(bucket: string, key: string): Promise<void> {
		this.calls.push({method: "deleteObject", bucket, key});
		this.#getBucket(bucket).delete(key);
	}

	// ==========================================================================
	// Direct access, bypassing the call record
	// ==========================================================================

	createBucket(bucket: string): void {
		if (!this.#buckets.has(bucket)) {
			this.#buckets.set(bucket, new Map());
		}
	}

	putBytes(bucket: string, key: string, content: Uint8Array | string): void {
		this.createBucket(bucket);
		const bytes =
			typeof content === "string"
				? new TextEncoder().encode(content)
				: content.slice();
		this.#getBucket(bucket).set(key, {
			content: bytes,
			lastModified: new Date(),
		});
	}

	getBytes(bucket: string, key: string): Uint8Array | undefined {
		return this.#buckets.get(bucket)?.get(key)?.content.slice();
	}

	keys(bucket: string): string[] {
		return Array.from(this.#buckets.get(bucket)?.keys() ?? []).sort();
	}

	#getBucket(bucket: string): Map<string, MemoryObject> {
		const objects = this.#buckets.get(bucket);
		if (!objects) {
			throw new StorageClientError(`The specified bucket does not exist`, {
				code: "NoSuchBucket",
				status: 404,
			});
		}

		return objects;
	}

	#getObject(bucket: string, key: string): MemoryObject {
		const object = this.#getBucket(bucket).get(key);
		if (!object) {
			throw new StorageClientError(`The specified key does not exist`, {
				code: "NoSuchKey",
				status: 404,
			});
		}

		return object;
	}
}

function concat(chunks: Uint8Array[]): Uint8Array {
	const totalLength = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
	const content = new Uint8Array(totalLength);
	let offset = 0;
	for (const chunk of chunks) {
		content.set(chunk, offset);
		offset += chunk.length;
	}

	return content;
}
