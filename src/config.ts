import { z } from "zod";
import type { Midpoint } from "./bsearch";
import { SearchError } from "./error";

export interface FixtureConfig {
	midpoint: Midpoint;
}

export const defaultConfig: Readonly<FixtureConfig> = { midpoint: "halving" };

const configSchema = z.object({
	midpoint: z.enum(["halving", "literal"]),
});

const envSchema = z.object({
	BSEARCH_FIXTURE_MIDPOINT: z.string().optional(),
});

function parse(raw: unknown): FixtureConfig {
	const result = configSchema.safeParse(raw);
	if (!result.success) {
		const issue = result.error.issues[0];
		throw new SearchError("INVALID_CONFIG", `invalid config: ${issue.path.join(".")}: ${issue.message}`, {
			issues: result.error.issues,
		});
	}
	return result.data;
}

export function resolveConfig(overrides: Partial<Record<keyof FixtureConfig, unknown>> = {}): FixtureConfig {
	const merged: Record<string, unknown> = { ...defaultConfig };
	for (const [key, value] of Object.entries(overrides)) {
		if (value !== undefined) merged[key] = value;
	}
	return parse(merged);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): FixtureConfig {
	const vars = envSchema.parse(env);
	return resolveConfig({ midpoint: vars.BSEARCH_FIXTURE_MIDPOINT });
}
