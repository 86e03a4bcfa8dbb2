import { SearchError, type SearchErrorCode } from "./error";

/** Run `fn` and return the code of the `SearchError` it throws. */
export function errorCode(fn: () => unknown): SearchErrorCode | undefined {
	try {
		fn();
	} catch (err) {
		if (err instanceof SearchError) return err.code;
		throw err;
	}
	return undefined;
}
