export { default as binarySearch, searchBytes } from "./bsearch";
export type { BinarySearchOptions, Comparator, Midpoint, SearchRange } from "./bsearch";
export { isByte, readQuery, sortedBytes } from "./bytes";
export type { SortedBytes } from "./bytes";
export { defaultConfig, loadConfig, resolveConfig } from "./config";
export type { FixtureConfig } from "./config";
export { SearchError, isSearchError } from "./error";
export type { SearchErrorCode } from "./error";
export { FIXTURE_RANGE, FIXTURE_VALUES, SENTINEL, entrypoint, reachableValues, search } from "./fixture";
export { found, isFound, notFound, toSentinel } from "./result";
export type { Found, NotFound, SearchResult } from "./result";
