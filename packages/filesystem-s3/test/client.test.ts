import {test, expect, describe} from "vitest";
import {NoSuchKey, type CompleteMultipartUploadCommandInput} from "@aws-sdk/client-s3";
import {StorageClientError} from "@bucketpath/filesystem";
import {
	AWSStorageClient,
	getUploadConcurrency,
	type S3Operations,
} from "../src/index.js";

interface Call {
	operation: string;
	input: Record<string, unknown>;
}

/**
 * Records every operation and answers from canned responses
 */
function createOperations(overrides: Partial<S3Operations> = {}): {
	operations: S3Operations;
	calls: Call[];
} {
	const calls: Call[] = [];
	const record = (operation: string, input: object) => {
		calls.push({operation, input: {...input}});
	};

	const operations: S3Operations = {
		async getObject(input) {
			record("getObject", input);
			return {
				Body: {
					transformToWebStream: () =>
						new ReadableStream<Uint8Array>({
							start(controller) {
								controller.enqueue(new TextEncoder().encode("content"));
								controller.close();
							},
						}),
				},
			};
		},
		async putObject(input) {
			record("putObject", input);
			return {};
		},
		async headObject(input) {
			record("headObject", input);
			return {ContentLength: 7, LastModified: new Date(0)};
		},
		async listObjectsV2(input) {
			record("listObjectsV2", input);
			return {};
		},
		async deleteObject(input) {
			record("deleteObject", input);
			return {};
		},
		async createMultipartUpload(input) {
			record("createMultipartUpload", input);
			return {UploadId: "upload-1"};
		},
		async uploadPart(input) {
			record("uploadPart", input);
			return {ETag: `etag-${input.PartNumber}`};
		},
		async completeMultipartUpload(input) {
			record("completeMultipartUpload", input);
			return {};
		},
		async abortMultipartUpload(input) {
			record("abortMultipartUpload", input);
			return {};
		},
		...overrides,
	};

	return {operations, calls};
}

function createClient(
	operations: S3Operations,
	partSize = 64 * 1024 * 1024,
): AWSStorageClient {
	return new AWSStorageClient({
		region: "us-east-1",
		config: {throughputTargetGbps: 10, partSize},
		operations,
	});
}

function noSuchKey(): NoSuchKey {
	return new NoSuchKey({
		$metadata: {httpStatusCode: 404},
		message: "The specified key does not exist.",
	});
}

test("getUploadConcurrency should scale with the throughput target", () => {
	expect(getUploadConcurrency({throughputTargetGbps: 400, partSize: 1})).toBe(40);
	expect(getUploadConcurrency({throughputTargetGbps: 5, partSize: 1})).toBe(1);
	expect(getUploadConcurrency({throughputTargetGbps: 1000, partSize: 1})).toBe(64);
});

describe("AWSStorageClient", () => {
	test("should read object bodies as web streams", async () => {
		const {operations, calls} = createOperations();
		const client = createClient(operations);
		const stream = await client.getObject("bucket", "a.txt");
		const {value} = await stream.getReader().read();

		expect(new TextDecoder().decode(value)).toBe("content");
		expect(calls).toEqual([
			{operation: "getObject", input: {Bucket: "bucket", Key: "a.txt"}},
		]);
	});

	test("should translate service exceptions", async () => {
		const {operations} = createOperations({
			async headObject() {
				throw noSuchKey();
			},
		});
		const client = createClient(operations);
		const error = await client
			.headObject("bucket", "missing")
			.catch((error: unknown) => error);

		expect(error).toBeInstanceOf(StorageClientError);
		if (error instanceof StorageClientError) {
			expect(error.code).toBe("NoSuchKey");
			expect(error.status).toBe(404);
			expect(error.notFound).toBe(true);
			expect(error.message).toBe(
				"NoSuchKey for bucket/missing: The specified key does not exist.",
			);
			expect(error.cause).toBeInstanceOf(NoSuchKey);
		}
	});

	test("should let other errors through unchanged", async () => {
		const failure = new Error("socket hang up");
		const {operations} = createOperations({
			async deleteObject() {
				throw failure;
			},
		});
		const client = createClient(operations);

		await expect(client.deleteObject("bucket", "a.txt")).rejects.toBe(failure);
	});

	test("should treat a missing body as a missing key", async () => {
		const {operations} = createOperations({
			async getObject() {
				return {};
			},
		});
		const client = createClient(operations);
		const error = await client
			.getObject("bucket", "a.txt")
			.catch((error: unknown) => error);

		expect(error).toBeInstanceOf(StorageClientError);
		if (error instanceof StorageClientError) {
			expect(error.notFound).toBe(true);
		}
	});

	test("should head objects", async () => {
		const {operations} = createOperations();
		const client = createClient(operations);

		expect(await client.headObject("bucket", "a.txt")).toEqual({
			key: "a.txt",
			size: 7,
			lastModified: new Date(0),
		});
	});

	test("should follow continuation tokens", async () => {
		const tokens: (string | undefined)[] = [];
		const {operations} = createOperations({
			async listObjectsV2(input) {
				tokens.push(input.ContinuationToken);
				if (!input.ContinuationToken) {
					return {
						CommonPrefixes: [{Prefix: "a/c/"}],
						Contents: [{Key: "a/", Size: 0}],
						IsTruncated: true,
						NextContinuationToken: "page-2",
					};
				}

				return {
					Contents: [{Key: "a/b.txt", Size: 3}],
					IsTruncated: false,
				};
			},
		});
		const client = createClient(operations);
		const pages = [];
		for await (const page of client.listObjects("bucket", "a/", "/")) {
			pages.push(page);
		}

		expect(pages).toEqual([
			{
				commonPrefixes: ["a/c/"],
				objectInfo: [{key: "a/", size: 0, lastModified: undefined}],
			},
			{
				commonPrefixes: [],
				objectInfo: [{key: "a/b.txt", size: 3, lastModified: undefined}],
			},
		]);
		expect(tokens).toEqual([undefined, "page-2"]);
	});

	test("should store small objects with a single put", async () => {
		const {operations, calls} = createOperations();
		const client = createClient(operations);
		const writer = client.putObject("bucket", "notes/a.txt").getWriter();
		await writer.write(new TextEncoder().encode("hello"));
		await writer.close();

		expect(calls.map((call) => call.operation)).toEqual(["putObject"]);
		expect(calls[0].input.ContentType).toBe("text/plain");
		expect(calls[0].input.Body).toEqual(new TextEncoder().encode("hello"));
	});

	test("should fall back to a generic content type", async () => {
		const {operations, calls} = createOperations();
		const client = createClient(operations);
		const writer = client.putObject("bucket", "blob").getWriter();
		await writer.close();

		expect(calls[0].input.ContentType).toBe("application/octet-stream");
	});

	test("should upload large objects in parts", async () => {
		const completed: CompleteMultipartUploadCommandInput[] = [];
		const {operations, calls} = createOperations();
		const client = createClient(
			{
				...operations,
				async completeMultipartUpload(input) {
					completed.push(input);
					return operations.completeMultipartUpload(input);
				},
			},
			4,
		);
		const writer = client.putObject("bucket", "data.bin").getWriter();
		await writer.write(new TextEncoder().encode("abcdefghij"));
		await writer.close();

		expect(calls.map((call) => call.operation)).toEqual([
			"createMultipartUpload",
			"uploadPart",
			"uploadPart",
			"uploadPart",
			"completeMultipartUpload",
		]);
		expect(
			calls
				.filter((call) => call.operation === "uploadPart")
				.map((call) => call.input.PartNumber),
		).toEqual([1, 2, 3]);

		expect(completed).toHaveLength(1);
		expect(completed[0].UploadId).toBe("upload-1");
		expect(completed[0].MultipartUpload?.Parts).toEqual([
			{ETag: "etag-1", PartNumber: 1},
			{ETag: "etag-2", PartNumber: 2},
			{ETag: "etag-3", PartNumber: 3},
		]);
	});

	test("should abort the upload when a part fails", async () => {
		const {operations, calls} = createOperations({
			async uploadPart() {
				throw noSuchKey();
			},
		});
		const client = createClient(operations, 4);
		const writer = client.putObject("bucket", "data.bin").getWriter();

		await expect(
			writer.write(new TextEncoder().encode("abcdefgh")),
		).rejects.toBeInstanceOf(StorageClientError);
		expect(calls.map((call) => call.operation)).toContain("abortMultipartUpload");
	});

	test("should abort the upload when completing it fails", async () => {
		const {operations, calls} = createOperations({
			async completeMultipartUpload() {
				throw noSuchKey();
			},
		});
		const client = createClient(operations, 4);
		const writer = client.putObject("bucket", "data.bin").getWriter();
		await writer.write(new TextEncoder().encode("abcdefghij"));

		await expect(writer.close()).rejects.toBeInstanceOf(StorageClientError);
		expect(calls.map((call) => call.operation)).toEqual([
			"createMultipartUpload",
			"uploadPart",
			"uploadPart",
			"uploadPart",
			"abortMultipartUpload",
		]);
	});

	test("should keep the original error when aborting also fails", async () => {
		const {operations} = createOperations({
			async uploadPart() {
				throw noSuchKey();
			},
			async abortMultipartUpload() {
				throw new Error("abort failed");
			},
		});
		const client = createClient(operations, 4);
		const writer = client.putObject("bucket", "data.bin").getWriter();
		const error = await writer
			.write(new TextEncoder().encode("abcdefgh"))
			.catch((error: unknown) => error);

		expect(error).toBeInstanceOf(StorageClientError);
		if (error instanceof StorageClientError) {
			expect(error.code).toBe("NoSuchKey");
		}
	});

	test("should abort a started upload when the stream is aborted", async () => {
		const {operations, calls} = createOperations();
		const client = createClient(operations, 4);
		const writer = client.putObject("bucket", "data.bin").getWriter();
		await writer.write(new TextEncoder().encode("abcdef"));
		await writer.abort();

		expect(calls.map((call) => call.operation)).toEqual([
			"createMultipartUpload",
			"uploadPart",
			"abortMultipartUpload",
		]);
	});
});
