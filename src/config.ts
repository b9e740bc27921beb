import "dotenv/config";
import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";

export const DEFAULT_CONFIG_FILE = "watchlog.yaml";

export const DEFAULT_ID_PATTERN =
	"(?:youtu\\.be/|youtube\\.com/(?:watch\\?(?:.*&)?v=|shorts/|embed/|live/))([A-Za-z0-9_-]{11})";

const youtubeConfigSchema = z
	.object({
		/** Either a literal key or `env.NAME` */
		apiKey: z.string().default("env.API_KEY"),
		endpoint: z
			.string()
			.url()
			.default("https://www.googleapis.com/youtube/v3/videos"),
	})
	.default({});

const linksConfigSchema = z
	.object({
		/** First capture group must be the video id */
		idPattern: z
			.string()
			.default(DEFAULT_ID_PATTERN)
			.refine(isValidPattern, { message: "idPattern is not a valid regular expression" }),
		missingMarker: z.string().default("non-existent"),
	})
	.default({});

const sheetConfigSchema = z
	.object({
		keyColumn: z.coerce.number().int().positive().default(2),
		placeholder: z.string().default("."),
	})
	.default({});

const tagsConfigSchema = z
	.object({
		headerMatch: z.string().min(1).default("Tag"),
		priority: z.array(z.string()).default([]),
	})
	.default({});

const routinesConfigSchema = z
	.object({
		colors: z.record(z.string(), z.string()).default({
			FFFF0000: "red",
			FF00FF00: "green",
			FFFFFF00: "yellow",
		}),
		fallbackCategory: z.string().default("uncategorized"),
	})
	.default({});

const directoriesConfigSchema = z
	.object({
		inputs: z.string().default("inputs"),
		outputs: z.string().default("outputs"),
		logs: z.string().default("logs"),
	})
	.default({});

const configSchema = z.object({
	youtube: youtubeConfigSchema,
	links: linksConfigSchema,
	sheet: sheetConfigSchema,
	tags: tagsConfigSchema,
	routines: routinesConfigSchema,
	directories: directoriesConfigSchema,
});

export type Config = z.infer<typeof configSchema>;
export type SheetConfig = Config["sheet"];
export type RoutinesConfig = Config["routines"];

function isValidPattern(pattern: string): boolean {
	try {
		new RegExp(pattern);
		return true;
	} catch {
		return false;
	}
}

export function resolveEnvVars(
	obj: Record<string, unknown>,
	env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
	const resolved: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		if (typeof value === "string" && value.startsWith("env.")) {
			resolved[key] = env[value.slice(4)];
		} else if (isPlainObject(value)) {
			resolved[key] = resolveEnvVars(value, env);
		} else {
			resolved[key] = value;
		}
	}
	return resolved;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Builds the config from a parsed YAML document. Defaults are applied before
 * `env.` references resolve, so the default API key reference is honoured too.
 */
export function parseConfig(
	raw: unknown,
	env: NodeJS.ProcessEnv = process.env,
): Config {
	const withDefaults = configSchema.safeParse(raw ?? {});
	if (!withDefaults.success) {
		throw new ConfigError(`Invalid configuration: ${formatIssues(withDefaults.error)}`);
	}

	// An unset `env.` reference resolves to undefined and falls back to the default.
	const resolved = configSchema.safeParse(resolveEnvVars(withDefaults.data, env));
	if (!resolved.success) {
		throw new ConfigError(`Invalid configuration: ${formatIssues(resolved.error)}`);
	}
	return resolved.data;
}

export async function loadConfig(
	configPath?: string,
	env: NodeJS.ProcessEnv = process.env,
): Promise<Config> {
	const target = configPath ?? DEFAULT_CONFIG_FILE;
	if (!existsSync(target)) {
		if (configPath) {
			throw new ConfigError(`Config file ${configPath} does not exist`);
		}
		return parseConfig({}, env);
	}

	let parsed: unknown;
	try {
		const rawText = await readFile(target, "utf8");
		const clean = rawText.replace(/^\uFEFF/, "");
		parsed = parse(clean);
	} catch (error) {
		throw new ConfigError(`Failed to read config ${target}: ${errorMessage(error)}`, {
			cause: error,
		});
	}

	return parseConfig(parsed, env);
}

export function requireApiKey(config: Config): string {
	const { apiKey } = config.youtube;
	if (!apiKey || apiKey.startsWith("env.")) {
		throw new ConfigError(
			"YouTube API key is not set. Export API_KEY (or set youtube.apiKey in the config file).",
		);
	}
	return apiKey;
}

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
		.join("; ");
}
