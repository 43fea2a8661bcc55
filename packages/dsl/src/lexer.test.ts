import { describe, expect, it } from "vitest";
import { DslSyntaxError } from "./errors";
import { tokenize } from "./lexer";

const summarize = (text: string) =>
	tokenize(text).map(({ kind, text: tokenText, value }) => ({ kind, text: tokenText, value }));

describe("tokenize", () => {
	it("records 1-based line and column for every token", () => {
		const tokens = tokenize("ENTRY: close > 50,100");
		expect(tokens.map((token) => [token.kind, token.text, token.line, token.column])).toEqual([
			["keyword", "ENTRY", 1, 1],
			["punctuation", ":", 1, 6],
			["identifier", "close", 1, 8],
			["operator", ">", 1, 14],
			["number", "50,100", 1, 16],
			["eof", "", 1, 22],
		]);
		expect(tokens[4].value).toBe(50100);
	});

	it("upper-cases keywords regardless of how they were written", () => {
		const keywords = tokenize("entry: close > 1 and open < 2 Or high > 3")
			.filter((token) => token.kind === "keyword")
			.map((token) => token.text);
		expect(keywords).toEqual(["ENTRY", "AND", "OR"]);
	});

	it("keeps a comma as punctuation unless exactly three digits follow", () => {
		expect(summarize("1,2345")).toEqual([
			{ kind: "number", text: "1", value: 1 },
			{ kind: "punctuation", text: ",", value: undefined },
			{ kind: "number", text: "2345", value: 2345 },
			{ kind: "eof", text: "", value: undefined },
		]);
		expect(summarize("rsi(close,14)").map((token) => token.text)).toEqual([
			"rsi",
			"(",
			"close",
			",",
			"14",
			")",
			"",
		]);
		expect(tokenize("1,000,000")[0].value).toBe(1000000);
	});

	it("never groups digits directly inside a call's arguments", () => {
		expect(summarize("crosses_above(50,200)").map((token) => token.text)).toEqual([
			"crosses_above",
			"(",
			"50",
			",",
			"200",
			")",
			"",
		]);
		expect(summarize("(volume > 1,500)").map((token) => token.text)).toEqual([
			"(",
			"volume",
			">",
			"1,500",
			")",
			"",
		]);
		expect(summarize("sma(close, 5) > 2,000")[7]).toEqual({
			kind: "number",
			text: "2,000",
			value: 2000,
		});
	});

	it("reads percentages, decimals and signed numbers", () => {
		expect(summarize("30% 2.5 -5")).toEqual([
			{ kind: "percentage", text: "30%", value: 30 },
			{ kind: "number", text: "2.5", value: 2.5 },
			{ kind: "number", text: "-5", value: -5 },
			{ kind: "eof", text: "", value: undefined },
		]);
	});

	it("reads two-character operators before single ones", () => {
		expect(summarize(">= <= == != > <").map((token) => token.text)).toEqual([
			">=",
			"<=",
			"==",
			"!=",
			">",
			"<",
			"",
		]);
	});

	it("tracks lines across newlines", () => {
		const tokens = tokenize("ENTRY:\n  close > 1");
		expect(tokens[2]).toMatchObject({ text: "close", line: 2, column: 3 });
	});

	it("rejects characters outside the grammar with their position", () => {
		let caught: unknown;
		try {
			tokenize("ENTRY:\n  close @ 1");
		} catch (error) {
			caught = error;
		}
		expect(caught).toBeInstanceOf(DslSyntaxError);
		expect(caught).toMatchObject({ line: 2, column: 9, reason: "Unexpected character '@'" });
		expect(caught instanceof Error ? caught.message : "").toBe("2:9 Unexpected character '@'");
	});
});
