import { createLogger } from "@rulecraft/core";
import {
	booleanExprNode,
	changeFunctionNode,
	changeModeOf,
	comparisonNode,
	crossDirectionOf,
	crossFunctionNode,
	indicatorNode,
	isChangeFunctionName,
	isComparisonOperator,
	isCrossFunctionName,
	isIndicatorName,
	isSeriesName,
	isTimeFunctionName,
	numberNode,
	percentageNode,
	seriesNode,
	strategyNode,
	timeFunctionNode,
	SERIES_NAMES,
	TIME_FUNCTION_LAGS,
	type BooleanOperator,
	type CrossFunctionNode,
	type ExpressionNode,
	type RuleNode,
	type SeriesNode,
	type StrategyNode,
} from "./ast";
import { DslSyntaxError } from "./errors";
import { tokenize, type Keyword, type Token } from "./lexer";

const logger = createLogger("dsl");

type Operand = ExpressionNode | CrossFunctionNode;

interface Located<T> {
	node: T;
	token: Token;
}

const describeToken = (token: Token): string =>
	token.kind === "eof" ? "end of input" : `'${token.text}'`;

const crossText = (node: CrossFunctionNode): string =>
	node.direction === "above" ? "crosses_above" : "crosses_below";

/**
 * Recursive-descent parser over the token list. AND/OR share one precedence
 * level and fold left to right; grouping needs explicit parentheses.
 */
class Parser {
	private position = 0;

	constructor(private readonly tokens: readonly Token[]) {}

	parseStrategy(): StrategyNode {
		let entry: RuleNode | undefined;
		let exit: RuleNode | undefined;

		if (this.matchKeyword("ENTRY")) {
			this.expectPunctuation(":", "after ENTRY");
			entry = this.parseRuleList();
		}
		if (this.matchKeyword("EXIT")) {
			this.expectPunctuation(":", "after EXIT");
			exit = this.parseRuleList();
		}

		const next = this.peek();
		if (!entry && !exit) {
			throw this.error("Expected an ENTRY: or EXIT: section", next);
		}
		if (next.kind === "keyword" && next.text === "ENTRY") {
			throw this.error(
				entry ? "Duplicate ENTRY section" : "The ENTRY section must come before EXIT",
				next
			);
		}
		if (next.kind === "keyword" && next.text === "EXIT" && exit) {
			throw this.error("Duplicate EXIT section", next);
		}
		this.expectEnd();

		return strategyNode(entry, exit);
	}

	parseStandaloneExpression(): ExpressionNode {
		const expression = this.parseNumericExpression();
		this.expectEnd();
		return expression;
	}

	private parseRuleList(): RuleNode {
		let left = this.parseRule();
		for (;;) {
			const token = this.peek();
			if (token.kind !== "keyword" || (token.text !== "AND" && token.text !== "OR")) {
				return left;
			}
			this.advance();
			const op: BooleanOperator = token.text === "AND" ? "AND" : "OR";
			left = booleanExprNode(op, left, this.parseRule());
		}
	}

	private parseRule(): RuleNode {
		const token = this.peek();
		if (this.isPunctuation(token, "(") && this.opensRuleGroup(this.position)) {
			this.advance();
			const inner = this.parseRuleList();
			this.expectPunctuation(")", "to close the rule group");
			return inner;
		}
		return this.parseComparison();
	}

	/**
	 * Decides whether the `(` at `index` groups rules or wraps an expression:
	 * it groups rules when a comparison, infix cross or AND/OR appears inside
	 * it outside of any function-call parentheses.
	 */
	private opensRuleGroup(index: number): boolean {
		const callStack: boolean[] = [false];
		let found = false;
		for (let i = index + 1; i < this.tokens.length; i += 1) {
			const token = this.tokens[i];
			if (token.kind === "eof") {
				break;
			}
			if (this.isPunctuation(token, "(")) {
				callStack.push(this.tokens[i - 1].kind === "identifier");
				continue;
			}
			if (this.isPunctuation(token, ")")) {
				callStack.pop();
				if (callStack.length === 0) {
					return found;
				}
				continue;
			}
			if (callStack.some((isCall) => isCall)) {
				continue;
			}
			if (
				token.kind === "operator" ||
				(token.kind === "keyword" && (token.text === "AND" || token.text === "OR")) ||
				(token.kind === "identifier" &&
					isCrossFunctionName(token.text) &&
					!this.isPunctuation(this.tokens[i + 1], "("))
			) {
				found = true;
			}
		}
		throw this.error("Unmatched '('", this.tokens[index]);
	}

	private parseComparison(): RuleNode {
		const left = this.parseOperand();
		const token = this.peek();

		if (token.kind === "operator" && isComparisonOperator(token.text)) {
			this.advance();
			const right = this.parseOperand();
			return comparisonNode(
				token.text,
				this.requireNumeric(left, `comparison '${token.text}'`),
				this.requireNumeric(right, `comparison '${token.text}'`)
			);
		}

		if (token.kind === "identifier" && isCrossFunctionName(token.text)) {
			this.advance();
			const right = this.parseOperand();
			return crossFunctionNode(
				crossDirectionOf(token.text),
				this.requireNumeric(left, token.text),
				this.requireNumeric(right, token.text)
			);
		}

		if (left.node.kind === "CrossFunction") {
			return left.node;
		}

		throw this.error(
			`Expected a comparison operator but found ${describeToken(token)}`,
			token
		);
	}

	private requireNumeric(operand: Located<Operand>, context: string): ExpressionNode {
		const { node, token } = operand;
		if (node.kind === "CrossFunction") {
			throw this.error(
				`${crossText(node)}(...) is a condition, not a number; it cannot be an operand of ${context}`,
				token
			);
		}
		return node;
	}

	private parseNumericExpression(context = "expression"): ExpressionNode {
		return this.requireNumeric(this.parseOperand(), context);
	}

	private parseOperand(): Located<Operand> {
		const token = this.advance();

		switch (token.kind) {
			case "number":
				return { node: numberNode(token.value ?? Number(token.text)), token };
			case "percentage":
				return { node: percentageNode(token.value ?? Number.parseFloat(token.text)), token };
			case "punctuation":
				if (token.text === "(") {
					const inner = this.parseOperand();
					this.expectPunctuation(")", "to close the expression");
					return { node: inner.node, token };
				}
				break;
			case "identifier":
				return { node: this.parseNamedOperand(token), token };
			default:
				break;
		}

		throw this.error(`Expected an expression but found ${describeToken(token)}`, token);
	}

	private parseNamedOperand(token: Token): Operand {
		const name = token.text;

		if (isSeriesName(name)) {
			if (this.isPunctuation(this.peek(), "(")) {
				throw this.error(`'${name}' is a series and cannot be called`, this.peek());
			}
			return seriesNode(name);
		}

		if (isIndicatorName(name)) {
			this.expectPunctuation("(", `after ${name}`);
			const source = this.parseNumericExpression(`${name}(...)`);
			let period: number | undefined;
			if (this.matchPunctuation(",")) {
				period = this.expectPositiveInteger(`${name} period`);
			}
			this.expectPunctuation(")", `to close ${name}(`);
			return indicatorNode(name, source, period);
		}

		if (isTimeFunctionName(name)) {
			this.expectPunctuation("(", `after ${name}`);
			const source = this.expectSeries(name);
			if (name === "n_days_ago") {
				this.expectPunctuation(",", "before the n_days_ago lag");
				const lag = this.expectPositiveInteger("n_days_ago lag");
				this.expectPunctuation(")", "to close n_days_ago(");
				return timeFunctionNode(name, source, lag);
			}
			this.expectPunctuation(")", `; ${name} takes a single series`);
			return timeFunctionNode(name, source, TIME_FUNCTION_LAGS[name]);
		}

		if (isChangeFunctionName(name)) {
			this.expectPunctuation("(", `after ${name}`);
			const source = this.expectSeries(name);
			this.expectPunctuation(",", `before the ${name} lag`);
			const lag = this.expectPositiveInteger(`${name} lag`);
			this.expectPunctuation(")", `to close ${name}(`);
			return changeFunctionNode(changeModeOf(name), source, lag);
		}

		if (isCrossFunctionName(name)) {
			this.expectPunctuation("(", `after ${name}`);
			const left = this.parseNumericExpression(name);
			this.expectPunctuation(",", `between the ${name} arguments`);
			const right = this.parseNumericExpression(name);
			this.expectPunctuation(")", `to close ${name}(`);
			return crossFunctionNode(crossDirectionOf(name), left, right);
		}

		throw this.error(`Unknown series or function '${name}'`, token);
	}

	private expectSeries(functionName: string): SeriesNode {
		const token = this.advance();
		if (token.kind === "identifier" && isSeriesName(token.text)) {
			return seriesNode(token.text);
		}
		throw this.error(
			`${functionName} expects a series (${SERIES_NAMES.join(", ")}) but found ${describeToken(token)}`,
			token
		);
	}

	private expectPositiveInteger(label: string): number {
		const token = this.advance();
		if (token.kind !== "number") {
			throw this.error(
				`Expected a whole number for the ${label} but found ${describeToken(token)}`,
				token
			);
		}
		const value = token.value ?? Number(token.text);
		if (!Number.isInteger(value) || value <= 0) {
			throw this.error(`The ${label} must be a positive integer, got ${token.text}`, token);
		}
		return value;
	}

	private expectEnd(): void {
		const token = this.peek();
		if (token.kind === "eof") {
			return;
		}
		if (this.isPunctuation(token, ")")) {
			throw this.error("Unmatched ')'", token);
		}
		throw this.error(`Unexpected ${describeToken(token)}`, token);
	}

	private expectPunctuation(text: string, context: string): Token {
		const token = this.advance();
		if (!this.isPunctuation(token, text)) {
			const separator = context.startsWith(";") ? "" : " ";
			throw this.error(
				`Expected '${text}'${separator}${context} but found ${describeToken(token)}`,
				token
			);
		}
		return token;
	}

	private matchPunctuation(text: string): boolean {
		if (this.isPunctuation(this.peek(), text)) {
			this.advance();
			return true;
		}
		return false;
	}

	private matchKeyword(keyword: Keyword): boolean {
		const token = this.peek();
		if (token.kind === "keyword" && token.text === keyword) {
			this.advance();
			return true;
		}
		return false;
	}

	private isPunctuation(token: Token | undefined, text: string): boolean {
		return token !== undefined && token.kind === "punctuation" && token.text === text;
	}

	private peek(): Token {
		return this.tokens[Math.min(this.position, this.tokens.length - 1)];
	}

	private advance(): Token {
		const token = this.peek();
		if (token.kind !== "eof") {
			this.position += 1;
		}
		return token;
	}

	private error(reason: string, token: Token): DslSyntaxError {
		return new DslSyntaxError(reason, token);
	}
}

/**
 * Parses strategy text into an immutable AST. Throws `DslSyntaxError` on the
 * first problem; nothing is returned for malformed input.
 */
export function parse(text: string): StrategyNode {
	try {
		const tokens = tokenize(text);
		const ast = new Parser(tokens).parseStrategy();
		logger.debug("dsl_parsed", {
			tokens: tokens.length - 1,
			entry: ast.entry !== undefined,
			exit: ast.exit !== undefined,
		});
		return ast;
	} catch (error) {
		if (error instanceof DslSyntaxError) {
			logger.warn("dsl_parse_failed", {
				line: error.line,
				column: error.column,
				reason: error.reason,
			});
		}
		throw error;
	}
}

/** Parses a single numeric expression such as `sma(close, 20)`. */
export function parseExpression(text: string): ExpressionNode {
	return new Parser(tokenize(text)).parseStandaloneExpression();
}

export function validate(text: string): boolean {
	try {
		parse(text);
		return true;
	} catch (error) {
		if (error instanceof DslSyntaxError) {
			return false;
		}
		throw error;
	}
}
