import debug from "debug";

const root = debug("bsearch-fixture");

export const log = {
	search: root.extend("search"),
	fixture: root.extend("fixture"),
	cli: root.extend("cli"),
};
