export {
	FileSystemError,
	type FileSystemErrorCode,
	type FileSystemErrorOptions,
	isFileSystemError,
	NotFoundError,
	AlreadyExistsError,
	NotADirectoryError,
	IsADirectoryError,
	NotEmptyError,
	UnsupportedOperation,
	ValidationError,
	ConfigurationError,
	StorageClientError,
	type StorageClientErrorOptions,
} from "./errors.js";
export {StorageParser, parser, parseURI, type ParsedURI} from "./parser.js";
export {
	compileSelector,
	translateSegment,
	isMagic,
	type GlobTarget,
	type ScanEntry,
	type Selector,
	type SelectorOptions,
} from "./glob.js";
export {
	decodeText,
	encodeText,
	assertEncodable,
	assertDecodable,
} from "./text.js";
export {
	MemoryStorageClient,
	type MemoryCall,
	type MemoryStorageClientOptions,
} from "./memory.js";
export type {
	ObjectInfo,
	ListingPage,
	StorageClient,
	StatResult,
	OpenMode,
	ReadBinaryMode,
	WriteBinaryMode,
	ReadTextMode,
	WriteTextMode,
	OpenOptions,
	GlobOptions,
	PathLike,
} from "./types.js";
