/**
 * Region and transfer configuration for S3 paths
 *
 * Explicit options win; otherwise values come from the environment, and
 * finally from fixed defaults.
 */

import {z} from "zod";
import {ConfigurationError} from "@bucketpath/filesystem";

export type Env = Record<string, string | undefined>;

export const DEFAULT_REGION = "us-east-1";
export const DEFAULT_THROUGHPUT_TARGET_GBPS = 400;
export const DEFAULT_PART_SIZE = 64 * 1024 * 1024;

/** Checked in order; the first one set names the region */
export const REGION_VARIABLES = ["BUCKET_REGION", "AWS_REGION", "REGION"] as const;
export const THROUGHPUT_TARGET_VARIABLE = "S3_CRT_THROUGHPUT_TARGET_GPBS";
export const PART_SIZE_VARIABLE = "S3_CRT_PART_SIZE_MB";

/**
 * Transfer settings handed to the storage client
 */
export interface S3ClientConfig {
	throughputTargetGbps: number;
	/** Bytes */
	partSize: number;
}

const ThroughputSchema = z.coerce.number().positive();
const PartSizeMBSchema = z.coerce.number().int().positive();

const S3ClientConfigSchema = z.object({
	throughputTargetGbps: z.number().positive(),
	partSize: z.number().int().positive(),
});

function getEnv(): Env {
	if (typeof process !== "undefined" && process.env) {
		return process.env;
	}

	return {};
}

export function resolveRegion(region?: string, env: Env = getEnv()): string {
	if (region) {
		return region;
	}

	for (const variable of REGION_VARIABLES) {
		const value = env[variable];
		if (value !== undefined) {
			return value;
		}
	}

	return DEFAULT_REGION;
}

export function resolveThroughputTargetGbps(env: Env = getEnv()): number {
	const value = env[THROUGHPUT_TARGET_VARIABLE];
	if (value === undefined) {
		return DEFAULT_THROUGHPUT_TARGET_GBPS;
	}

	const result = ThroughputSchema.safeParse(value);
	if (!result.success) {
		throw new ConfigurationError(
			THROUGHPUT_TARGET_VARIABLE,
			`Invalid ${THROUGHPUT_TARGET_VARIABLE}: ${JSON.stringify(value)} is not a positive number`,
			{cause: result.error},
		);
	}

	return result.data;
}

/**
 * Part size in bytes; the environment gives it in MiB
 */
export function resolvePartSize(env: Env = getEnv()): number {
	const value = env[PART_SIZE_VARIABLE];
	if (value === undefined) {
		return DEFAULT_PART_SIZE;
	}

	const result = PartSizeMBSchema.safeParse(value);
	if (!result.success) {
		throw new ConfigurationError(
			PART_SIZE_VARIABLE,
			`Invalid ${PART_SIZE_VARIABLE}: ${JSON.stringify(value)} is not a positive integer`,
			{cause: result.error},
		);
	}

	return result.data * 1024 * 1024;
}

export function resolveClientConfig(
	config?: Partial<S3ClientConfig>,
	env: Env = getEnv(),
): S3ClientConfig {
	const resolved = {
		throughputTargetGbps:
			config?.throughputTargetGbps ?? resolveThroughputTargetGbps(env),
		partSize: config?.partSize ?? resolvePartSize(env),
	};

	const result = S3ClientConfigSchema.safeParse(resolved);
	if (!result.success) {
		throw new ConfigurationError(
			"clientConfig",
			`Invalid S3 client config: ${result.error.issues
				.map((issue) => `${issue.path.join(".")} ${issue.message}`)
				.join(", ")}`,
			{cause: result.error},
		);
	}

	return result.data;
}
