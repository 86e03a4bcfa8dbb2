/**
 * The search fixture: a fixed table of 27 bytes, searched over `[0, 26)`.
 *
 * The upper bound leaves the last slot (240) outside the searched range.
 * Consumers of the fixture depend on that bound.
 */
import { searchBytes, type SearchRange } from "./bsearch";
import { readQuery, sortedBytes } from "./bytes";
import { isSearchError } from "./error";
import { defaultConfig, type FixtureConfig } from "./config";
import { log } from "./log";
import { isFound, toSentinel, type SearchResult } from "./result";

export const FIXTURE_VALUES = sortedBytes([
	0, 1, 3, 7, 7, 7, 9, 13, 17, 17, 18, 19, 20, 27, 31, 34, 37, 37, 37, 42, 49, 194, 200, 201,
	210, 210, 240,
]);

export const FIXTURE_RANGE: Readonly<SearchRange> = { lo: 0, hi: 26 };

export const SENTINEL = 255n;

export function search(query: number, config: FixtureConfig = defaultConfig): SearchResult<number> {
	return searchBytes(FIXTURE_VALUES, query, FIXTURE_RANGE, config.midpoint);
}

/** Search for `input[0]`; returns the matched byte or `SENTINEL`. */
export function entrypoint(input: ArrayLike<number>, config: FixtureConfig = defaultConfig): bigint {
	const query = readQuery(input);
	const result = search(query, config);
	log.fixture("query=%d midpoint=%s -> %s", query, config.midpoint, result.kind);
	return toSentinel(result, SENTINEL);
}

/**
 * Distinct values the configured search finds when probed with every byte.
 * Queries that fail with a `SearchError` count as unreachable.
 */
export function reachableValues(config: FixtureConfig = defaultConfig): number[] {
	const values: number[] = [];
	for (let query = 0; query <= 0xff; query++) {
		let result: SearchResult<number>;
		try {
			result = search(query, config);
		} catch (err) {
			if (!isSearchError(err)) throw err;
			log.fixture("query=%d failed: %s", query, err.code);
			continue;
		}
		if (isFound(result)) values.push(result.value);
	}
	return values;
}
