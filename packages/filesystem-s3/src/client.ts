/**
 * StorageClient implementation over the AWS SDK
 *
 * Works with AWS S3 and S3-compatible stores. SDK service exceptions are
 * translated to StorageClientError; anything else propagates unchanged.
 */

import {
	S3Client,
	S3ServiceException,
	AbortMultipartUploadCommand,
	CompleteMultipartUploadCommand,
	CreateMultipartUploadCommand,
	DeleteObjectCommand,
	GetObjectCommand,
	HeadObjectCommand,
	ListObjectsV2Command,
	PutObjectCommand,
	UploadPartCommand,
	type AbortMultipartUploadCommandInput,
	type CompleteMultipartUploadCommandInput,
	type CompletedPart,
	type CreateMultipartUploadCommandInput,
	type CreateMultipartUploadCommandOutput,
	type DeleteObjectCommandInput,
	type GetObjectCommandInput,
	type HeadObjectCommandInput,
	type HeadObjectCommandOutput,
	type ListObjectsV2CommandInput,
	type ListObjectsV2CommandOutput,
	type PutObjectCommandInput,
	type UploadPartCommandInput,
	type UploadPartCommandOutput,
} from "@aws-sdk/client-s3";
import {getLogger} from "@logtape/logtape";
import mime from "mime";
import {
	StorageClientError,
	type ListingPage,
	type ObjectInfo,
	type StorageClient,
} from "@bucketpath/filesystem";
import {resolveClientConfig, resolveRegion, type S3ClientConfig} from "./config.js";

const logger = getLogger(["bucketpath", "s3", "client"]);

/**
 * The S3 operations the client issues, each taking the SDK's command input.
 * Only the output fields the client reads are required.
 */
export interface S3Operations {
	getObject(
		input: GetObjectCommandInput,
	): Promise<{Body?: {transformToWebStream(): ReadableStream}}>;
	putObject(input: PutObjectCommandInput): Promise<unknown>;
	headObject(
		input: HeadObjectCommandInput,
	): Promise<Pick<HeadObjectCommandOutput, "ContentLength" | "LastModified">>;
	listObjectsV2(
		input: ListObjectsV2CommandInput,
	): Promise<
		Pick<
			ListObjectsV2CommandOutput,
			"CommonPrefixes" | "Contents" | "IsTruncated" | "NextContinuationToken"
		>
	>;
	deleteObject(input: DeleteObjectCommandInput): Promise<unknown>;
	createMultipartUpload(
		input: CreateMultipartUploadCommandInput,
	): Promise<Pick<CreateMultipartUploadCommandOutput, "UploadId">>;
	uploadPart(
		input: UploadPartCommandInput,
	): Promise<Pick<UploadPartCommandOutput, "ETag">>;
	completeMultipartUpload(
		input: CompleteMultipartUploadCommandInput,
	): Promise<unknown>;
	abortMultipartUpload(input: AbortMultipartUploadCommandInput): Promise<unknown>;
}

/**
 * Send each operation as a command through an SDK client
 */
export function createS3Operations(client: S3Client): S3Operations {
	return {
		getObject: (input) => client.send(new GetObjectCommand(input)),
		putObject: (input) => client.send(new PutObjectCommand(input)),
		headObject: (input) => client.send(new HeadObjectCommand(input)),
		listObjectsV2: (input) => client.send(new ListObjectsV2Command(input)),
		deleteObject: (input) => client.send(new DeleteObjectCommand(input)),
		createMultipartUpload: (input) =>
			client.send(new CreateMultipartUploadCommand(input)),
		uploadPart: (input) => client.send(new UploadPartCommand(input)),
		completeMultipartUpload: (input) =>
			client.send(new CompleteMultipartUploadCommand(input)),
		abortMultipartUpload: (input) =>
			client.send(new AbortMultipartUploadCommand(input)),
	};
}

export interface AWSStorageClientOptions {
	region?: string;
	config?: Partial<S3ClientConfig>;
	/** Operations to issue instead of an SDK client built for the region */
	operations?: S3Operations;
}

/**
 * Parts uploaded at once: one per 10 Gbps of throughput target, 1 to 64
 */
export function getUploadConcurrency(config: S3ClientConfig): number {
	return Math.max(1, Math.min(64, Math.ceil(config.throughputTargetGbps / 10)));
}

/**
 * Storage client backed by the AWS SDK
 */
export class AWSStorageClient implements StorageClient {
	readonly region: string;
	readonly config: S3ClientConfig;
	#operations: S3Operations;
	#s3Client?: S3Client;

	constructor(options: AWSStorageClientOptions = {}) {
		this.region = resolveRegion(options.region);
		this.config = resolveClientConfig(options.config);
		if (options.operations) {
			this.#operations = options.operations;
		} else {
			this.#s3Client = new S3Client({region: this.region});
			this.#operations = createS3Operations(this.#s3Client);
		}
	}

	async getObject(
		bucket: string,
		key: string,
	): Promise<ReadableStream<Uint8Array>> {
		logger.debug("GET {bucket}/{key}", {bucket, key});
		let response: Awaited<ReturnType<S3Operations["getObject"]>>;
		try {
			response = await this.#operations.getObject({Bucket: bucket, Key: key});
		} catch (error) {
			throw translateError(error, bucket, key);
		}

		if (!response.Body) {
			throw new StorageClientError(`No body returned for ${bucket}/${key}`, {
				code: "NoSuchKey",
				status: 404,
			});
		}

		return response.Body.transformToWebStream();
	}

	/**
	 * Writes are buffered until a part is full; objects smaller than one part
	 * are stored with a single request when the stream closes.
	 */
	putObject(bucket: string, key: string): WritableStream<Uint8Array> {
		const operations = this.#operations;
		const partSize = this.config.partSize;
		const concurrency = getUploadConcurrency(this.config);
		const contentType = mime.getType(key) || "application/octet-stream";

		let buffered: Uint8Array[] = [];
		let bufferedSize = 0;
		let uploadId: string | undefined;
		let partNumber = 0;
		let failure: unknown;
		const parts: CompletedPart[] = [];
		const inFlight = new Set<Promise<void>>();

		const uploadPart = async (body: Uint8Array) => {
			if (uploadId === undefined) {
				logger.debug("Starting multipart upload of {bucket}/{key}", {
					bucket,
					key,
				});
				const created = await operations.createMultipartUpload({
					Bucket: bucket,
					Key: key,
					ContentType: contentType,
				});
				if (!created.UploadId) {
					throw new StorageClientError(
						`No upload id returned for ${bucket}/${key}`,
					);
				}

				uploadId = created.UploadId;
			}

			while (inFlight.size >= concurrency) {
				await Promise.race(inFlight);
			}

			const currentUploadId = uploadId;
			const currentPartNumber = ++partNumber;
			const task: Promise<void> = operations
				.uploadPart({
					Bucket: bucket,
					Key: key,
					UploadId: currentUploadId,
					PartNumber: currentPartNumber,
					Body: body,
				})
				.then(
					(output) => {
						parts.push({ETag: output.ETag, PartNumber: currentPartNumber});
					},
					(error: unknown) => {
						failure ??= error;
					},
				)
				.finally(() => {
					inFlight.delete(task);
				});
			inFlight.add(task);
		};

		const drainFullParts = async () => {
			if (bufferedSize < partSize) {
				return;
			}

			const data = concat(buffered);
			let offset = 0;
			for (; data.length - offset >= partSize; offset += partSize) {
				await uploadPart(data.subarray(offset, offset + partSize));
			}

			buffered = offset < data.length ? [data.subarray(offset)] : [];
			bufferedSize = data.length - offset;
		};

		const abortUpload = async () => {
			buffered = [];
			bufferedSize = 0;
			await Promise.all(inFlight);
			if (uploadId !== undefined) {
				logger.debug("Aborting multipart upload of {bucket}/{key}", {
					bucket,
					key,
				});
				await operations.abortMultipartUpload({
					Bucket: bucket,
					Key: key,
					UploadId: uploadId,
				});
			}
		};

		const checkFailure = () => {
			if (failure !== undefined) {
				throw failure;
			}
		};

		// The original error wins over one raised while aborting
		const failUpload = async (error: unknown): Promise<never> => {
			try {
				await abortUpload();
			} catch (abortError) {
				logger.warn("Failed to abort multipart upload of {bucket}/{key}: {error}", {
					bucket,
					key,
					error: abortError,
				});
			}

			throw translateError(error, bucket, key);
		};

		return new WritableStream<Uint8Array>({
			write: async (chunk) => {
				buffered.push(chunk);
				bufferedSize += chunk.length;
				try {
					await drainFullParts();
					checkFailure();
				} catch (error) {
					await failUpload(error);
				}
			},
			close: async () => {
				try {
					if (uploadId === undefined) {
						logger.debug("PUT {bucket}/{key}", {bucket, key});
						await operations.putObject({
							Bucket: bucket,
							Key: key,
							Body: concat(buffered),
							ContentType: contentType,
						});
						return;
					}

					if (bufferedSize > 0) {
						await uploadPart(concat(buffered));
					}

					await Promise.all(inFlight);
					checkFailure();
					await operations.completeMultipartUpload({
						Bucket: bucket,
						Key: key,
						UploadId: uploadId,
						MultipartUpload: {
							Parts: [...parts].sort(
								(a, b) => (a.PartNumber ?? 0) - (b.PartNumber ?? 0),
							),
						},
					});
				} catch (error) {
					await failUpload(error);
				}
			},
			abort: abortUpload,
		});
	}

	async headObject(bucket: string, key: string): Promise<ObjectInfo> {
		logger.debug("HEAD {bucket}/{key}", {bucket, key});
		try {
			const response = await this.#operations.headObject({
				Bucket: bucket,
				Key: key,
			});
			return {
				key,
				size: response.ContentLength ?? 0,
				lastModified: response.LastModified,
			};
		} catch (error) {
			throw translateError(error, bucket, key);
		}
	}

	async *listObjects(
		bucket: string,
		prefix: string,
		delimiter?: string,
	): AsyncGenerator<ListingPage, void, undefined> {
		let continuationToken: string | undefined;
		do {
			logger.debug("Listing {bucket}/{prefix}", {bucket, prefix});
			let response: Awaited<ReturnType<S3Operations["listObjectsV2"]>>;
			try {
				response = await this.#operations.listObjectsV2({
					Bucket: bucket,
					Prefix: prefix,
					Delimiter: delimiter,
					ContinuationToken: continuationToken,
				});
			} catch (error) {
				throw translateError(error, bucket, prefix);
			}

			const page: ListingPage = {commonPrefixes: [], objectInfo: []};
			for (const common of response.CommonPrefixes ?? []) {
				if (common.Prefix) {
					page.commonPrefixes.push(common.Prefix);
				}
			}

			for (const object of response.Contents ?? []) {
				if (object.Key) {
					page.objectInfo.push({
						key: object.Key,
						size: object.Size ?? 0,
						lastModified: object.LastModified,
					});
				}
			}

			yield page;
			continuationToken = response.IsTruncated
				? response.NextContinuationToken
				: undefined;
		} while (continuationToken);
	}

	async deleteObject(bucket: string, key: string): Promise<void> {
		logger.debug("DELETE {bucket}/{key}", {bucket, key});
		try {
			await this.#operations.deleteObject({Bucket: bucket, Key: key});
		} catch (error) {
			throw translateError(error, bucket, key);
		}
	}

	/**
	 * Release the SDK client's connection pool
	 */
	destroy(): void {
		this.#s3Client?.destroy();
	}
}

function translateError(error: unknown, bucket: string, key: string): unknown {
	if (error instanceof S3ServiceException) {
		return new StorageClientError(
			`${error.name} for ${bucket}/${key}: ${error.message}`,
			{
				cause: error,
				code: error.name,
				status: error.$metadata?.httpStatusCode,
			},
		);
	}

	return error;
}

function concat(chunks: Uint8Array[]): Uint8Array {
	const totalLength = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
	const buffer = new Uint8Array(totalLength);
	let offset = 0;
	for (const chunk of chunks) {
		buffer.set(chunk, offset);
		offset += chunk.length;
	}

	return buffer;
}
