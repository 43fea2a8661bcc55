import { DslSyntaxError, type SourcePosition } from "./errors";

export type TokenKind =
	| "keyword"
	| "identifier"
	| "operator"
	| "number"
	| "percentage"
	| "punctuation"
	| "eof";

export type Keyword = "ENTRY" | "EXIT" | "AND" | "OR";

export interface Token extends SourcePosition {
	kind: TokenKind;
	/** Source text; keywords are upper-cased. */
	text: string;
	/** Numeric value for number and percentage tokens. */
	value?: number;
	/** Offset of the token's first character in the input. */
	offset: number;
}

const KEYWORDS: ReadonlySet<string> = new Set<Keyword>(["ENTRY", "EXIT", "AND", "OR"]);
const TWO_CHAR_OPERATORS = [">=", "<=", "==", "!="];
const ONE_CHAR_OPERATORS = [">", "<"];
const PUNCTUATION = ["(", ")", ",", ":"];

const isDigit = (char: string | undefined): boolean =>
	char !== undefined && char >= "0" && char <= "9";

const isIdentifierStart = (char: string): boolean => /[A-Za-z_]/.test(char);
const isIdentifierPart = (char: string | undefined): boolean =>
	char !== undefined && /[A-Za-z0-9_]/.test(char);

/**
 * Splits DSL text into tokens. The returned list always ends with an `eof`
 * token carrying the position just past the input.
 */
export function tokenize(text: string): Token[] {
	const tokens: Token[] = [];
	let offset = 0;
	let line = 1;
	let column = 1;
	// One entry per open parenthesis: true when it opened a call's argument list.
	const openParens: boolean[] = [];

	const advance = (count: number): void => {
		for (let i = 0; i < count; i += 1) {
			if (text[offset] === "\n") {
				line += 1;
				column = 1;
			} else {
				column += 1;
			}
			offset += 1;
		}
	};

	const push = (kind: TokenKind, tokenText: string, length: number, value?: number): void => {
		const token: Token = { kind, text: tokenText, line, column, offset };
		if (value !== undefined) {
			token.value = value;
		}
		tokens.push(token);
		advance(length);
	};

	while (offset < text.length) {
		const char = text[offset];

		if (/\s/.test(char)) {
			advance(1);
			continue;
		}

		const pair = text.slice(offset, offset + 2);
		if (TWO_CHAR_OPERATORS.includes(pair)) {
			push("operator", pair, 2);
			continue;
		}
		if (ONE_CHAR_OPERATORS.includes(char)) {
			push("operator", char, 1);
			continue;
		}
		if (PUNCTUATION.includes(char)) {
			if (char === "(") {
				openParens.push(tokens[tokens.length - 1]?.kind === "identifier");
			} else if (char === ")") {
				openParens.pop();
			}
			push("punctuation", char, 1);
			continue;
		}

		const signed = (char === "-" || char === "+") && isDigit(text[offset + 1]);
		if (isDigit(char) || signed) {
			const inArguments = openParens[openParens.length - 1] === true;
			const { raw, value } = readNumber(text, offset, !inArguments);
			if (text[offset + raw.length] === "%") {
				push("percentage", `${raw}%`, raw.length + 1, value);
			} else {
				push("number", raw, raw.length, value);
			}
			continue;
		}

		if (isIdentifierStart(char)) {
			let end = offset + 1;
			while (isIdentifierPart(text[end])) {
				end += 1;
			}
			const word = text.slice(offset, end);
			const upper = word.toUpperCase();
			if (KEYWORDS.has(upper)) {
				push("keyword", upper, word.length);
			} else {
				push("identifier", word, word.length);
			}
			continue;
		}

		throw new DslSyntaxError(`Unexpected character '${char}'`, { line, column });
	}

	tokens.push({ kind: "eof", text: "", line, column, offset });
	return tokens;
}

/**
 * Reads `[+-]digits(,ddd)*(.digits)?`. A comma belongs to the number only
 * when it sits between digits and is followed by exactly three digits, and
 * never directly inside a call's argument list, so `crosses_above(50,200)`
 * reads two arguments.
 */
const readNumber = (
	text: string,
	start: number,
	allowGrouping: boolean
): { raw: string; value: number } => {
	let end = start;
	if (text[end] === "-" || text[end] === "+") {
		end += 1;
	}
	while (isDigit(text[end])) {
		end += 1;
	}
	while (
		allowGrouping &&
		text[end] === "," &&
		isDigit(text[end + 1]) &&
		isDigit(text[end + 2]) &&
		isDigit(text[end + 3]) &&
		!isDigit(text[end + 4])
	) {
		end += 4;
	}
	if (text[end] === "." && isDigit(text[end + 1])) {
		end += 1;
		while (isDigit(text[end])) {
			end += 1;
		}
	}
	const raw = text.slice(start, end);
	return { raw, value: Number(raw.replace(/,/g, "")) };
};
