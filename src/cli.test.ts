import { test, expect } from "vitest";
import { parseByte, run, type CliIo } from "./cli";
import { errorCode } from "./test-helpers";

function capture(env: NodeJS.ProcessEnv = {}) {
	const out: string[] = [];
	const err: string[] = [];
	const io: CliIo = { out: line => out.push(line), err: line => err.push(line), env };
	return { io, out, err };
}

test("parseByte", () => {
	expect(parseByte("49")).toBe(49);
	expect(parseByte("0x31")).toBe(49);
	expect(parseByte("0XfF")).toBe(255);
	expect(errorCode(() => parseByte("0x"))).toBe("INVALID_BYTE");
	expect(errorCode(() => parseByte("300"))).toBe("INVALID_BYTE");
});

test("prints the entrypoint result", () => {
	const found = capture();
	expect(run(["7"], found.io)).toBe(0);
	expect(found.out).toEqual(["7"]);

	const missing = capture();
	expect(run(["240"], missing.io)).toBe(0);
	expect(missing.out).toEqual(["255"]);

	const hex = capture();
	expect(run(["0x31"], hex.io)).toBe(0);
	expect(hex.out).toEqual(["49"]);
});

test("midpoint comes from the flag, then the environment", () => {
	const fromEnv = capture({ BSEARCH_FIXTURE_MIDPOINT: "literal" });
	expect(run(["240"], fromEnv.io)).toBe(0);
	expect(fromEnv.out).toEqual(["240"]);

	const fromFlag = capture({ BSEARCH_FIXTURE_MIDPOINT: "literal" });
	expect(run(["-m", "halving", "240"], fromFlag.io)).toBe(0);
	expect(fromFlag.out).toEqual(["255"]);
});

test("search errors exit with 1", () => {
	const stuck = capture();
	expect(run(["-m", "literal", "0"], stuck.io)).toBe(1);
	expect(stuck.out).toEqual([]);
	expect(stuck.err).toEqual(["error[NO_PROGRESS]: literal midpoint revisited range [0, 26)"]);

	const big = capture();
	expect(run(["300"], big.io)).toBe(1);
	expect(big.err).toEqual(["error[INVALID_BYTE]: byte argument is not a byte: 300"]);

	const bad = capture();
	expect(run(["-m", "middle", "3"], bad.io)).toBe(1);
	expect(bad.err).toHaveLength(1);
	expect(bad.err[0]).toMatch(/^error\[INVALID_CONFIG\]: invalid config: midpoint: /);
});

test("missing byte", () => {
	const { io, err } = capture();
	expect(run([], io)).toBe(1);
	expect(err).toEqual(["error: missing byte argument"]);
});

test("--reachable lists what the search can find", () => {
	const { io, out } = capture();
	expect(run(["--reachable"], io)).toBe(0);
	expect(out).toEqual(["0 1 3 7 9 13 17 18 19 20 27 31 34 37 42 49 194 200 201 210"]);
});

test("the midpoint flag wins over an invalid environment", () => {
	const { io, out, err } = capture({ BSEARCH_FIXTURE_MIDPOINT: "middle" });
	expect(run(["-m", "halving", "7"], io)).toBe(0);
	expect(out).toEqual(["7"]);
	expect(err).toEqual([]);

	const fromEnv = capture({ BSEARCH_FIXTURE_MIDPOINT: "middle" });
	expect(run(["7"], fromEnv.io)).toBe(1);
	expect(fromEnv.err[0]).toMatch(/^error\[INVALID_CONFIG\]: /);
});
