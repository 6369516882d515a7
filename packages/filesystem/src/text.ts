/**
 * Text adapters for object byte streams
 */

import {UnsupportedOperation} from "./errors.js";
import type {OpenOptions} from "./types.js";

/**
 * Decode an object stream into text
 *
 * With `newline` unset, "\r\n" and lone "\r" are read as "\n".
 */
export function decodeText(
	stream: ReadableStream<Uint8Array>,
	options: OpenOptions = {},
): ReadableStream<string> {
	assertDecodable(options);
	const decoder = new TextDecoder(options.encoding ?? "utf-8", {
		fatal: options.errors !== "replace",
	});
	const translate = options.newline === undefined;
	let pendingCR = false;

	const emit = (
		text: string,
		controller: TransformStreamDefaultController<string>,
		final: boolean,
	) => {
		if (translate) {
			if (pendingCR) {
				text = "\r" + text;
				pendingCR = false;
			}

			// A trailing "\r" may be the first half of "\r\n"
			if (!final && text.endsWith("\r")) {
				text = text.slice(0, -1);
				pendingCR = true;
			}

			text = text.replace(/\r\n?/g, "\n");
		}

		if (text) {
			controller.enqueue(text);
		}
	};

	return stream.pipeThrough(
		new TransformStream<Uint8Array, string>({
			transform(chunk, controller) {
				emit(decoder.decode(chunk, {stream: true}), controller, false);
			},
			flush(controller) {
				emit(decoder.decode(), controller, true);
			},
		}),
	);
}

/**
 * Encode text written to the returned stream into an object writer.
 *
 * Closing the returned stream closes the object writer, so the promise from
 * `close()` settles once the object is stored.
 */
export function encodeText(
	stream: WritableStream<Uint8Array>,
	options: OpenOptions = {},
): WritableStream<string> {
	assertEncodable(options);
	const encoder = new TextEncoder();
	const newline = options.newline;
	const writer = stream.getWriter();
	return new WritableStream<string>({
		write(chunk) {
			const text =
				newline === "\r" || newline === "\r\n"
					? chunk.replace(/\n/g, newline)
					: chunk;
			return writer.write(encoder.encode(text));
		},
		close() {
			return writer.close();
		},
		abort(reason) {
			return writer.abort(reason);
		},
	});
}

/**
 * Text is written as UTF-8 only
 */
export function assertEncodable(options: OpenOptions, path?: string): void {
	const encoding = (options.encoding ?? "utf-8").toLowerCase();
	if (encoding !== "utf-8" && encoding !== "utf8") {
		throw new UnsupportedOperation(
			`Writing text as ${options.encoding} is unsupported; only utf-8 can be encoded${path ? ` (${path})` : ""}`,
			{path},
		);
	}
}

/**
 * Check that text in the requested encoding can be decoded
 */
export function assertDecodable(options: OpenOptions, path?: string): void {
	try {
		new TextDecoder(options.encoding ?? "utf-8");
	} catch (error) {
		if (error instanceof RangeError) {
			throw new UnsupportedOperation(
				`Unknown encoding ${JSON.stringify(options.encoding)}${path ? ` for ${path}` : ""}`,
				{path, cause: error},
			);
		}

		throw error;
	}
}
