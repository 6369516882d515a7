/**
 * String-level grammar for storage paths of the form `scheme://bucket/key`
 *
 * Pure functions only; malformed input parses into empty components.
 */

import * as Path from "path";

const SCHEME_DELIMITER = "://";
const URI_PATTERN = /^([A-Za-z][A-Za-z0-9+.-]*):\/\/([^/]*)(.*)$/s;

/**
 * Components of a storage URI. All fields are empty for relative fragments,
 * in which case `prefix` holds the whole string.
 */
export interface ParsedURI {
	scheme: string;
	bucket: string;
	prefix: string;
}

export function parseURI(path: string): ParsedURI {
	const match = URI_PATTERN.exec(path);
	if (!match) {
		return {scheme: "", bucket: "", prefix: path};
	}

	return {scheme: match[1], bucket: match[2], prefix: match[3]};
}

/**
 * Path grammar for object storage. Mirrors the POSIX path module, with the
 * `scheme://bucket` part of a path treated as its drive.
 */
export class StorageParser {
	readonly sep = "/";

	/**
	 * POSIX-style join: a segment starting with "/" restarts the path, and
	 * "." and ".." are left as they are.
	 */
	join(base: string, ...segments: string[]): string {
		let path = base;
		for (const segment of segments) {
			if (segment.startsWith(this.sep)) {
				path = segment;
			} else if (path === "" || path.endsWith(this.sep)) {
				path += segment;
			} else {
				path += this.sep + segment;
			}
		}

		return path;
	}

	/**
	 * Split a path into its parent and its last key segment
	 *
	 * Relative fragments have no bucket and split into `["", name]`.
	 */
	split(path: string): [string, string] {
		const {scheme, bucket, prefix} = parseURI(path);
		const stripped = stripLeadingSeparators(prefix);
		const index = stripped.lastIndexOf(this.sep);
		const parent = index === -1 ? "" : stripped.slice(0, index);
		const name = stripped.slice(index + 1);
		if (!bucket) {
			return ["", name];
		}

		return [`${scheme}${SCHEME_DELIMITER}${bucket}${this.sep}${parent}`, name];
	}

	/**
	 * Split a path into `scheme://bucket` and the key below it
	 */
	splitdrive(path: string): [string, string] {
		const {scheme, bucket, prefix} = parseURI(path);
		if (!scheme) {
			return ["", path];
		}

		return [
			`${scheme}${SCHEME_DELIMITER}${bucket}`,
			stripLeadingSeparators(prefix),
		];
	}

	splitext(path: string): [string, string] {
		const ext = Path.posix.extname(path);
		return [path.slice(0, path.length - ext.length), ext];
	}

	normcase(path: string): string {
		return path;
	}

	/**
	 * Only a path naming a bucket is absolute
	 */
	isabs(path: string): boolean {
		return path.includes(SCHEME_DELIMITER);
	}
}

function stripLeadingSeparators(path: string): string {
	let start = 0;
	while (start < path.length && path[start] === "/") {
		start++;
	}

	return path.slice(start);
}

export const parser = new StorageParser();
