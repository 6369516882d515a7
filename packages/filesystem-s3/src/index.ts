/**
 * S3 paths: hierarchical filesystem operations over S3 object keys
 */

export {
	S3Path,
	type S3PathOptions,
	type S3PathState,
} from "./path.js";
export {
	AWSStorageClient,
	createS3Operations,
	getUploadConcurrency,
	type AWSStorageClientOptions,
	type S3Operations,
} from "./client.js";
export {
	DEFAULT_PART_SIZE,
	DEFAULT_REGION,
	DEFAULT_THROUGHPUT_TARGET_GBPS,
	PART_SIZE_VARIABLE,
	REGION_VARIABLES,
	THROUGHPUT_TARGET_VARIABLE,
	resolveClientConfig,
	resolvePartSize,
	resolveRegion,
	resolveThroughputTargetGbps,
	type Env,
	type S3ClientConfig,
} from "./config.js";
