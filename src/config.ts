import { z } from "zod";
import { logger } from "./logger.js";

export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

const baseUrl = (fallback: string) =>
	z
		.string()
		.url()
		.default(fallback)
		.transform((url) => url.replace(/\/+$/, ""));

export const ConfigSchema = z.object({
	DOI2BIB_URL: baseUrl("https://doi2bib.org/bib"),
	CROSSREF_WORKS_URL: baseUrl("https://api.crossref.org/works"),
	ARXIV_ABS_URL: baseUrl("https://arxiv.org/abs"),
	CROSSREF_MAILTO: z.string().email().optional(),
	HTTP_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
	HTTP_BACKOFF_MS: z.coerce.number().int().min(0).default(1000),
	LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
	const result = ConfigSchema.safeParse(env);
	if (!result.success) {
		const message = `Invalid configuration: ${result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ")}`;
		logger.error(message);
		throw new ConfigError(message);
	}
	return result.data;
}
