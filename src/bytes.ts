import { SearchError } from "./error";

/** Read-only view over a non-decreasing byte sequence. Duplicates allowed. */
export interface SortedBytes extends ArrayLike<number>, Iterable<number> {
	readonly length: number;
	at(index: number): number | undefined;
}

export function isByte(value: number): boolean {
	return Number.isInteger(value) && value >= 0 && value <= 0xff;
}

export function assertByte(value: number, what: string): void {
	if (!isByte(value)) {
		throw new SearchError("INVALID_BYTE", `${what} is not a byte: ${value}`, { value });
	}
}

export function sortedBytes(values: Iterable<number>): SortedBytes {
	const items = [...values];
	items.forEach((v, i) => {
		assertByte(v, `value at index ${i}`);
		if (i > 0 && v < items[i - 1]) {
			throw new SearchError("NOT_SORTED", `value ${v} at index ${i} is below ${items[i - 1]}`, {
				index: i,
			});
		}
	});
	return Object.freeze(items);
}

/** Read the query byte. Only `input[0]` is consumed. */
export function readQuery(input: ArrayLike<number>): number {
	if (input.length < 1) throw new SearchError("EMPTY_INPUT", "input must hold at least one byte");
	const query = input[0];
	assertByte(query, "input[0]");
	return query;
}
