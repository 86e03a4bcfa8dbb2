export type Found<T> = {
	readonly kind: "found";
	readonly value: T;
	/** Index of the match in the searched haystack. */
	readonly index: number;
};

export type NotFound = {
	readonly kind: "not_found";
};

export type SearchResult<T> = Found<T> | NotFound;

export const notFound: NotFound = Object.freeze({ kind: "not_found" });

export function found<T>(value: T, index: number): Found<T> {
	return { kind: "found", value, index };
}

export function isFound<T>(result: SearchResult<T>): result is Found<T> {
	return result.kind === "found";
}

/**
 * Collapse a byte result into the fixture's u64 return value.
 *
 * The sentinel shares a domain with real values, so this belongs at the
 * outermost boundary only.
 */
export function toSentinel(result: SearchResult<number>, sentinel = 255n): bigint {
	return isFound(result) ? BigInt(result.value) : sentinel;
}
