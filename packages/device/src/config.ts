/**
 * Session configuration.
 *
 * Resolved from (lowest to highest priority):
 * 1. Defaults
 * 2. Environment variables (DMM_DEVICE_NAME, DMM_HISTORY_DEPTH,
 *    DMM_POLL_INTERVAL_MS, DMM_LOG_LEVEL)
 * 3. Explicit overrides passed by the caller
 */

import { z } from "zod";
import type { LogLevel } from "./types.js";

export interface SessionConfig {
	/** Display name stamped on every measurement */
	name: string;
	/** Frames kept before the oldest is evicted */
	historyDepth: number;
	/** Delay between transport polls */
	pollIntervalMs: number;
	logLevel: LogLevel;
}

export const DEFAULT_SESSION_CONFIG: SessionConfig = {
	name: "TP8236",
	historyDepth: 10,
	pollIntervalMs: 50,
	logLevel: "info",
};

const sessionConfigSchema = z.object({
	name: z.string().min(1),
	historyDepth: z.coerce.number().int().positive(),
	pollIntervalMs: z.coerce.number().int().positive(),
	logLevel: z.enum(["debug", "info", "warn", "error", "silent"]),
});

const CONFIG_KEYS = ["name", "historyDepth", "pollIntervalMs", "logLevel"] as const;

const ENV_KEYS: Record<keyof SessionConfig, string> = {
	name: "DMM_DEVICE_NAME",
	historyDepth: "DMM_HISTORY_DEPTH",
	pollIntervalMs: "DMM_POLL_INTERVAL_MS",
	logLevel: "DMM_LOG_LEVEL",
};

function readEnv(
	env: Record<string, string | undefined>,
): Partial<Record<keyof SessionConfig, string>> {
	const values: Partial<Record<keyof SessionConfig, string>> = {};
	for (const key of CONFIG_KEYS) {
		const raw = env[ENV_KEYS[key]]?.trim();
		if (raw) {
			values[key] = raw;
		}
	}
	return values;
}

/** Drop keys whose value is undefined so they cannot mask lower layers */
function definedOnly(
	overrides: Partial<SessionConfig>,
): Partial<Record<keyof SessionConfig, unknown>> {
	const values: Partial<Record<keyof SessionConfig, unknown>> = {};
	for (const key of CONFIG_KEYS) {
		if (overrides[key] !== undefined) {
			values[key] = overrides[key];
		}
	}
	return values;
}

/**
 * Load session configuration from all sources.
 *
 * @param env - Environment to read (default: process.env)
 * @param overrides - Values that win over the environment
 * @returns Validated configuration
 * @throws Error naming the first invalid setting
 */
export function loadSessionConfig(
	env: Record<string, string | undefined> = process.env,
	overrides: Partial<SessionConfig> = {},
): SessionConfig {
	const merged = {
		...DEFAULT_SESSION_CONFIG,
		...readEnv(env),
		...definedOnly(overrides),
	};

	const parsed = sessionConfigSchema.safeParse(merged);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const key = issue?.path.join(".") ?? "config";
		throw new Error(
			`Invalid session setting "${key}": ${issue?.message ?? "invalid value"}`,
		);
	}
	return parsed.data;
}
