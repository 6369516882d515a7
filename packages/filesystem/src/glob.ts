/**
 * Glob selectors over a synthetic directory hierarchy
 *
 * A pattern is compiled into a chain of selectors, one per segment. Each
 * selector takes a directory and yields matching paths, handing directories
 * to the next selector in the chain.
 */

/**
 * One child reported by a directory scan
 */
export interface ScanEntry<T> {
	path: T;
	isDir: boolean;
}

/**
 * What a path type needs to provide to be globbed
 */
export interface GlobTarget<T> {
	readonly name: string;
	joinpath(...segments: string[]): T;
	/** Children of this directory; nothing if it is not a directory */
	scandir(): AsyncIterable<ScanEntry<T>>;
	exists(): Promise<boolean>;
	isDir(): Promise<boolean>;
}

export type Selector<T> = (path: T) => AsyncGenerator<T, void, undefined>;

export interface SelectorOptions {
	caseSensitive?: boolean;
	/** Only yield directories (the pattern ended with a separator) */
	dirOnly?: boolean;
}

const MAGIC = /[*?[]/;

export function isMagic(segment: string): boolean {
	return MAGIC.test(segment);
}

/**
 * Translate one pattern segment into an anchored regular expression
 */
export function translateSegment(
	segment: string,
	caseSensitive = true,
): RegExp {
	let source = "";
	for (let i = 0; i < segment.length; i++) {
		const char = segment[i];
		if (char === "*") {
			// Runs of stars within a segment behave like one
			while (segment[i + 1] === "*") {
				i++;
			}

			source += "[^/]*";
		} else if (char === "?") {
			source += "[^/]";
		} else if (char === "[") {
			const end = segment.indexOf("]", i + 2);
			if (end === -1) {
				source += "\\[";
				continue;
			}

			let stuff = segment.slice(i + 1, end).replace(/\\/g, "\\\\");
			if (stuff.startsWith("!")) {
				stuff = "^" + stuff.slice(1);
			} else if (stuff.startsWith("^")) {
				stuff = "\\" + stuff;
			}

			source += `[${stuff}]`;
			i = end;
		} else {
			source += char.replace(/[.+^${}()|\\\]/-]/g, "\\$&");
		}
	}

	return new RegExp(`^${source}$`, caseSensitive ? "" : "i");
}

/**
 * Build a selector for the given pattern segments.
 *
 * Segments are literal names, wildcards (`*`, `?`, `[...]`), or `**`, which
 * matches this directory and every directory below it.
 */
export function compileSelector<T extends GlobTarget<T>>(
	parts: readonly string[],
	options: SelectorOptions = {},
): Selector<T> {
	const caseSensitive = options.caseSensitive ?? true;
	const dirOnly = options.dirOnly ?? false;

	if (!parts.length) {
		return async function* selectSelf(path) {
			if (!dirOnly || (await path.isDir())) {
				yield path;
			}
		};
	}

	const [part, ...rest] = parts;
	if (part === "**") {
		// Consecutive "**" segments match the same paths as one
		let index = 0;
		while (rest[index] === "**") {
			index++;
		}

		const remaining = rest.slice(index);
		if (!remaining.length) {
			return recursiveTerminalSelector<T>(dirOnly);
		}

		return recursiveSelector(
			compileSelector<T>(remaining, {caseSensitive, dirOnly}),
		);
	}

	// Keys compare case-sensitively in storage, so a case-insensitive literal
	// has to be matched against the listing like a wildcard
	if (!isMagic(part) && caseSensitive) {
		if (!rest.length) {
			return async function* selectLiteral(path) {
				const child = path.joinpath(part);
				const found = dirOnly ? await child.isDir() : await child.exists();
				if (found) {
					yield child;
				}
			};
		}

		const next = compileSelector<T>(rest, {caseSensitive, dirOnly});
		return async function* selectLiteralDirectory(path) {
			yield* next(path.joinpath(part));
		};
	}

	const regex = translateSegment(part, caseSensitive);
	if (!rest.length) {
		return async function* selectWildcard(path) {
			for await (const entry of path.scandir()) {
				if (dirOnly && !entry.isDir) {
					continue;
				}

				if (regex.test(entry.path.name)) {
					yield entry.path;
				}
			}
		};
	}

	const next = compileSelector<T>(rest, {caseSensitive, dirOnly});
	return async function* selectWildcardDirectory(path) {
		for await (const entry of path.scandir()) {
			if (entry.isDir && regex.test(entry.path.name)) {
				yield* next(entry.path);
			}
		}
	};
}

function recursiveSelector<T extends GlobTarget<T>>(
	next: Selector<T>,
): Selector<T> {
	return async function* selectRecursive(path: T): AsyncGenerator<T, void, undefined> {
		yield* next(path);
		for await (const entry of path.scandir()) {
			if (entry.isDir) {
				yield* selectRecursive(entry.path);
			}
		}
	};
}

function recursiveTerminalSelector<T extends GlobTarget<T>>(
	dirOnly: boolean,
): Selector<T> {
	async function* selectDescendants(path: T): AsyncGenerator<T, void, undefined> {
		for await (const entry of path.scandir()) {
			if (entry.isDir) {
				yield entry.path;
				yield* selectDescendants(entry.path);
			} else if (!dirOnly) {
				yield entry.path;
			}
		}
	}

	return async function* selectAll(path) {
		yield path;
		yield* selectDescendants(path);
	};
}
