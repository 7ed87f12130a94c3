import { type Config, loadConfig } from "./config.js";
import { type BibEnricher, createEnricher } from "./enricher.js";
import { logger, setLogLevel } from "./logger.js";

export const USAGE = `Usage: bib-enrich <input.bib> <output.bib>

Enrich a .bib file: URL-only entries become @misc, arXiv links and DOIs are
resolved to canonical BibTeX, entries without a DOI are matched on Crossref by
exact title, and a DOI is never emitted twice.

Options:
  -h, --help  Show this message

Environment:
  DOI2BIB_URL, CROSSREF_WORKS_URL, ARXIV_ABS_URL  Service base URLs
  CROSSREF_MAILTO                                 Contact address for Crossref
  HTTP_MAX_ATTEMPTS, HTTP_BACKOFF_MS              Retry policy for HTTP 429
  LOG_LEVEL                                       debug | info | warn | error`;

export class UsageError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "UsageError";
	}
}

export type CliCommand = { kind: "help" } | { kind: "enrich"; inputPath: string; outputPath: string };

export function parseCliArgs(argv: readonly string[]): CliCommand {
	if (argv.includes("-h") || argv.includes("--help")) {
		return { kind: "help" };
	}
	const unknown = argv.find((arg) => arg.startsWith("-") && arg !== "-");
	if (unknown) {
		throw new UsageError(`Unknown option: ${unknown}`);
	}
	if (argv.length !== 2) {
		throw new UsageError(`Expected 2 arguments (input and output path), got ${argv.length}`);
	}
	const [inputPath, outputPath] = argv;
	return { kind: "enrich", inputPath, outputPath };
}

/** Returns the process exit code: 0 on success, 1 when the run fails, 2 on bad arguments. */
export async function runCli(
	argv: readonly string[],
	env: NodeJS.ProcessEnv = process.env,
	buildEnricher: (config: Config) => BibEnricher = createEnricher,
): Promise<number> {
	let command: CliCommand;
	try {
		command = parseCliArgs(argv);
	} catch (err) {
		if (!(err instanceof UsageError)) throw err;
		console.error(`${err.message}\n\n${USAGE}`);
		return 2;
	}

	if (command.kind === "help") {
		console.log(USAGE);
		return 0;
	}

	try {
		const config = loadConfig(env);
		setLogLevel(config.LOG_LEVEL);
		await buildEnricher(config).enrichFile(command.inputPath, command.outputPath);
		return 0;
	} catch (err) {
		logger.error("Enrichment failed:", err instanceof Error ? err.message : String(err));
		return 1;
	}
}
