import { Command, CommanderError } from "commander";
import { assertByte } from "./bytes";
import { loadConfig, resolveConfig } from "./config";
import { SearchError, isSearchError } from "./error";
import { entrypoint, reachableValues } from "./fixture";
import { log } from "./log";

export interface CliIo {
	out: (line: string) => void;
	err: (line: string) => void;
	env: NodeJS.ProcessEnv;
}

interface CliOptions {
	midpoint?: string;
	reachable?: boolean;
}

const defaultIo: CliIo = {
	out: line => process.stdout.write(`${line}\n`),
	err: line => process.stderr.write(`${line}\n`),
	env: process.env,
};

/** Accepts decimal (`49`) or hex (`0x31`). */
export function parseByte(text: string): number {
	let value: number;
	if (/^\d+$/.test(text)) {
		value = Number.parseInt(text, 10);
	} else if (/^0x[0-9a-f]+$/i.test(text)) {
		value = Number.parseInt(text.slice(2), 16);
	} else {
		throw new SearchError("INVALID_BYTE", `not a number: ${JSON.stringify(text)}`, { text });
	}
	assertByte(value, "byte argument");
	return value;
}

function createProgram(io: CliIo): Command {
	const program = new Command("bsearch-fixture");
	program
		.description("Search the fixture table for one byte and print the u64 result (255 when absent)")
		.argument("[byte]", "query byte, decimal or 0x-prefixed hex")
		.option("-m, --midpoint <rule>", "midpoint rule: halving or literal")
		.option("--reachable", "print every value the search can find")
		.exitOverride()
		.configureOutput({
			writeOut: str => io.out(str.trimEnd()),
			writeErr: str => io.err(str.trimEnd()),
		})
		.action((byte: string | undefined, options: CliOptions) => {
			const config =
				options.midpoint === undefined ? loadConfig(io.env) : resolveConfig({ midpoint: options.midpoint });
			log.cli("byte=%s config=%o", byte, config);

			if (options.reachable) {
				io.out(reachableValues(config).join(" "));
				return;
			}
			if (byte === undefined) {
				return program.error("error: missing byte argument");
			}
			io.out(entrypoint([parseByte(byte)], config).toString());
		});
	return program;
}

/** Returns the process exit code. */
export function run(argv: string[], io: CliIo = defaultIo): number {
	try {
		createProgram(io).parse(argv, { from: "user" });
		return 0;
	} catch (err) {
		if (isSearchError(err)) {
			io.err(`error[${err.code}]: ${err.message}`);
			return 1;
		}
		if (err instanceof CommanderError) {
			return err.exitCode;
		}
		throw err;
	}
}
