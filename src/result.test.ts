import { test, expect } from "vitest";
import { found, isFound, notFound, toSentinel } from "./result";

test("toSentinel", () => {
	expect(toSentinel(found(7, 3))).toBe(7n);
	expect(toSentinel(notFound)).toBe(255n);
	expect(toSentinel(notFound, 0n)).toBe(0n);
});

test("a found 255 is distinct from not found", () => {
	const hit = found(255, 0);

	expect(isFound(hit)).toBe(true);
	expect(isFound(notFound)).toBe(false);
	expect(toSentinel(hit)).toBe(toSentinel(notFound));
});
