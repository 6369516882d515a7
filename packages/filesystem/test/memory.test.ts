import {test, expect, describe} from "vitest";
import {
	MemoryStorageClient,
	StorageClientError,
	type ListingPage,
} from "../src/index.js";

async function readAll(stream: ReadableStream<Uint8Array>): Promise<string> {
	const decoder = new TextDecoder();
	const reader = stream.getReader();
	let text = "";
	for (;;) {
		const {done, value} = await reader.read();
		if (done) break;
		text += decoder.decode(value, {stream: true});
	}

	return text + decoder.decode();
}

async function listAll(
	client: MemoryStorageClient,
	bucket: string,
	prefix: string,
	delimiter?: string,
): Promise<ListingPage[]> {
	const pages: ListingPage[] = [];
	for await (const page of client.listObjects(bucket, prefix, delimiter)) {
		pages.push(page);
	}

	return pages;
}

describe("MemoryStorageClient", () => {
	test("should store what is written once the stream closes", async () => {
		const client = new MemoryStorageClient();
		const writer = client.putObject("bucket", "a/b.txt").getWriter();
		await writer.write(new TextEncoder().encode("hello "));
		await writer.write(new TextEncoder().encode("world"));
		expect(client.keys("bucket")).toEqual([]);
		await writer.close();

		expect(client.keys("bucket")).toEqual(["a/b.txt"]);
		expect(await readAll(await client.getObject("bucket", "a/b.txt"))).toBe(
			"hello world",
		);
	});

	test("should copy bytes in and out of the store", () => {
		const client = new MemoryStorageClient();
		const content = new Uint8Array([1, 2, 3]);
		client.putBytes("bucket", "a.bin", content);
		content[0] = 9;

		const stored = client.getBytes("bucket", "a.bin");
		expect(stored).toEqual(new Uint8Array([1, 2, 3]));
		stored?.fill(0);
		expect(client.getBytes("bucket", "a.bin")).toEqual(new Uint8Array([1, 2, 3]));
	});

	test("should discard an aborted write", async () => {
		const client = new MemoryStorageClient({buckets: ["bucket"]});
		const writer = client.putObject("bucket", "a.txt").getWriter();
		await writer.write(new Uint8Array([1, 2, 3]));
		await writer.abort();

		expect(client.keys("bucket")).toEqual([]);
	});

	test("should read objects in chunks", async () => {
		const client = new MemoryStorageClient({chunkSize: 2});
		client.putBytes("bucket", "a.txt", "abcde");
		const reader = (await client.getObject("bucket", "a.txt")).getReader();
		const sizes: number[] = [];
		for (;;) {
			const {done, value} = await reader.read();
			if (done) break;
			sizes.push(value.length);
		}

		expect(sizes).toEqual([2, 2, 1]);
	});

	test("should head objects", async () => {
		const client = new MemoryStorageClient();
		client.putBytes("bucket", "a.txt", "abc");
		const info = await client.headObject("bucket", "a.txt");

		expect(info.key).toBe("a.txt");
		expect(info.size).toBe(3);
		expect(info.lastModified).toBeInstanceOf(Date);
	});

	test("should signal missing keys and buckets", async () => {
		const client = new MemoryStorageClient({buckets: ["bucket"]});

		const error = await client
			.headObject("bucket", "nope")
			.catch((error: unknown) => error);
		expect(error).toBeInstanceOf(StorageClientError);
		if (error instanceof StorageClientError) {
			expect(error.code).toBe("NoSuchKey");
			expect(error.notFound).toBe(true);
		}

		await expect(client.getObject("other", "a")).rejects.toMatchObject({
			code: "NoSuchBucket",
		});
		await expect(listAll(client, "other", "")).rejects.toBeInstanceOf(
			StorageClientError,
		);
	});

	test("should group keys by delimiter", async () => {
		const client = new MemoryStorageClient();
		client.putBytes("bucket", "a/", "");
		client.putBytes("bucket", "a/b.txt", "b");
		client.putBytes("bucket", "a/c/d.txt", "d");
		client.putBytes("bucket", "a/c/e.txt", "e");
		client.putBytes("bucket", "top.txt", "t");

		const pages = await listAll(client, "bucket", "a/", "/");
		expect(pages).toHaveLength(1);
		expect(pages[0].commonPrefixes).toEqual(["a/c/"]);
		expect(pages[0].objectInfo.map((info) => info.key)).toEqual([
			"a/",
			"a/b.txt",
		]);
	});

	test("should list every key under a prefix without a delimiter", async () => {
		const client = new MemoryStorageClient();
		client.putBytes("bucket", "a/b.txt", "b");
		client.putBytes("bucket", "a/c/d.txt", "d");
		client.putBytes("bucket", "ab.txt", "x");

		const pages = await listAll(client, "bucket", "a/");
		expect(pages[0].commonPrefixes).toEqual([]);
		expect(pages[0].objectInfo.map((info) => info.key)).toEqual([
			"a/b.txt",
			"a/c/d.txt",
		]);
	});

	test("should paginate listings", async () => {
		const client = new MemoryStorageClient({pageSize: 1});
		client.putBytes("bucket", "a/", "");
		client.putBytes("bucket", "a/b.txt", "b");
		client.putBytes("bucket", "a/c/d.txt", "d");

		const pages = await listAll(client, "bucket", "a/", "/");
		expect(pages).toEqual([
			{commonPrefixes: [], objectInfo: [expect.objectContaining({key: "a/"})]},
			{
				commonPrefixes: [],
				objectInfo: [expect.objectContaining({key: "a/b.txt", size: 1})],
			},
			{commonPrefixes: ["a/c/"], objectInfo: []},
		]);
	});

	test("should yield one empty page for an empty prefix", async () => {
		const client = new MemoryStorageClient({buckets: ["bucket"]});
		expect(await listAll(client, "bucket", "nothing/", "/")).toEqual([
			{commonPrefixes: [], objectInfo: []},
		]);
	});

	test("should treat deleting a missing key as success", async () => {
		const client = new MemoryStorageClient({buckets: ["bucket"]});
		await expect(client.deleteObject("bucket", "nope")).resolves.toBeUndefined();
	});

	test("should record the calls it serves", async () => {
		const client = new MemoryStorageClient();
		client.putBytes("bucket", "a.txt", "a");
		await client.headObject("bucket", "a.txt");
		await listAll(client, "bucket", "", "/");
		await client.deleteObject("bucket", "a.txt");

		expect(client.calls).toEqual([
			{method: "headObject", bucket: "bucket", key: "a.txt"},
			{method: "listObjects", bucket: "bucket", key: "", delimiter: "/"},
			{method: "deleteObject", bucket: "bucket", key: "a.txt"},
		]);
	});
});
