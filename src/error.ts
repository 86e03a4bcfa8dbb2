export type SearchErrorCode =
	| "INVALID_RANGE"
	| "INDEX_OUT_OF_RANGE"
	| "NO_PROGRESS"
	| "EMPTY_INPUT"
	| "INVALID_BYTE"
	| "NOT_SORTED"
	| "INVALID_CONFIG";

export class SearchError extends Error {
	readonly code: SearchErrorCode;
	readonly details?: Record<string, unknown>;

	constructor(code: SearchErrorCode, message: string, details?: Record<string, unknown>) {
		super(message);
		this.name = "SearchError";
		this.code = code;
		if (details) this.details = details;
	}
}

export function isSearchError(err: unknown): err is SearchError {
	return err instanceof SearchError;
}
