import { assertByte } from "./bytes";
import { SearchError } from "./error";
import { log } from "./log";
import { found, notFound, type SearchResult } from "./result";

/**
 * How the probe index is chosen inside `[lo, hi)`.
 *
 * - `halving` splits the range in two and always shrinks it.
 * - `literal` computes `hi - lo / 2`, a precedence slip kept for fixtures
 *   that depend on its exact probe sequence. It can revisit a range forever.
 */
export type Midpoint = "halving" | "literal";

export interface SearchRange {
	lo: number;
	hi: number;
}

export interface BinarySearchOptions extends Partial<SearchRange> {
	midpoint?: Midpoint;
}

export type Comparator<A, B> = (a: A, b: B, index: number) => number;

const midpoints: Record<Midpoint, (lo: number, hi: number) => number> = {
	// `lo + hi >>> 1` fails for lengths > 2^31 because `>>>` converts to int32.
	halving: (lo, hi) => lo + ((hi - lo) >>> 1),
	literal: (lo, hi) => hi - (lo >>> 1),
};

function checkRange(length: number, lo: number, hi: number): void {
	if (!Number.isInteger(lo) || !Number.isInteger(hi) || lo < 0 || lo > hi || hi > length) {
		throw new SearchError("INVALID_RANGE", `invalid range [${lo}, ${hi}) for length ${length}`, {
			lo,
			hi,
			length,
		});
	}
}

function probe<A>(haystack: ArrayLike<A>, index: number): A {
	if (index < 0 || index >= haystack.length) {
		throw new SearchError("INDEX_OUT_OF_RANGE", `probe index ${index} outside [0, ${haystack.length})`, {
			index,
			length: haystack.length,
		});
	}
	return haystack[index];
}

/**
 * Find `needle` in the half-open range `[lo, hi)` of a `haystack` presorted
 * by `comparator`. The range defaults to the whole haystack.
 *
 * Once the range holds at most one slot, only `haystack[lo]` is compared,
 * even when the range is empty. An empty haystack therefore throws
 * `INDEX_OUT_OF_RANGE` rather than returning `notFound`.
 *
 * Throws `SearchError` when a probe leaves the haystack, a step inverts the
 * range, or the search revisits a range it has already seen. Absence is
 * never an error.
 */
export default function binarySearch<A, B>(
	haystack: ArrayLike<A>,
	needle: B,
	comparator: Comparator<A, B>,
	options: BinarySearchOptions = {},
): SearchResult<A> {
	let lo = options.lo ?? 0;
	let hi = options.hi ?? haystack.length;
	const midpoint = options.midpoint ?? "halving";
	checkRange(haystack.length, lo, hi);

	const pick = midpoints[midpoint];
	const seen = new Set<string>();

	while (hi - lo > 1) {
		const key = `${lo}:${hi}`;
		if (seen.has(key)) {
			throw new SearchError("NO_PROGRESS", `${midpoint} midpoint revisited range [${lo}, ${hi})`, {
				lo,
				hi,
				midpoint,
			});
		}
		seen.add(key);

		const mid = pick(lo, hi);
		const item = probe(haystack, mid);
		const cmp = comparator(item, needle, mid);
		log.search("[%d, %d) mid=%d cmp=%d", lo, hi, mid, cmp);

		if (cmp < 0) {
			lo = mid;
		} else if (cmp > 0) {
			hi = mid;
		} else {
			return found(item, mid);
		}

		// `literal` can probe below `lo`; narrowing to that probe inverts the range.
		if (hi < lo) {
			throw new SearchError("INVALID_RANGE", `${midpoint} midpoint inverted range to [${lo}, ${hi})`, {
				lo,
				hi,
				mid,
				midpoint,
			});
		}
	}

	const item = probe(haystack, lo);
	return comparator(item, needle, lo) === 0 ? found(item, lo) : notFound;
}

const byteOrder: Comparator<number, number> = (a, b) => a - b;

export function searchBytes(
	array: ArrayLike<number>,
	query: number,
	range: SearchRange,
	midpoint: Midpoint = "halving",
): SearchResult<number> {
	assertByte(query, "query");
	return binarySearch(array, query, byteOrder, { ...range, midpoint });
}
