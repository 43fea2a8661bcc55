import {
	isComparisonOperator,
	isExpressionNode,
	isIndicatorName,
	isRuleNode,
	isSeriesName,
	isTimeFunctionName,
	BOOLEAN_OPERATORS,
	type AstNode,
	type RuleNode,
	type StrategyNode,
} from "@rulecraft/dsl";
import { CompileError } from "./errors";

export const describeKind = (value: unknown): string => {
	if (typeof value === "object" && value !== null && "kind" in value) {
		return String(value.kind);
	}
	return typeof value;
};

const isPositiveInteger = (value: unknown): boolean =>
	typeof value === "number" && Number.isInteger(value) && value > 0;

const requirePositiveInteger = (value: unknown, label: string, kind: string): void => {
	if (!isPositiveInteger(value)) {
		throw new CompileError(`${label} must be a positive integer, got ${String(value)}`, kind);
	}
};

const requireFinite = (value: unknown, kind: string): void => {
	if (typeof value !== "number" || !Number.isFinite(value)) {
		throw new CompileError(`${kind} literal must be a finite number, got ${String(value)}`, kind);
	}
};

function validateExpression(node: AstNode, context: string): void {
	if (!isExpressionNode(node)) {
		throw new CompileError(
			`${describeKind(node)} yields a condition and cannot be used as the ${context}`,
			describeKind(node)
		);
	}

	switch (node.kind) {
		case "Series":
			if (!isSeriesName(node.name)) {
				throw new CompileError(`Unknown series '${node.name}'`, node.kind);
			}
			return;
		case "Number":
		case "Percentage":
			requireFinite(node.value, node.kind);
			return;
		case "Indicator":
			if (!isIndicatorName(node.name)) {
				throw new CompileError(`Unknown indicator '${node.name}'`, node.kind);
			}
			if (node.period !== undefined) {
				requirePositiveInteger(node.period, `${node.name} period`, node.kind);
			}
			validateExpression(node.source, `${node.name} source`);
			return;
		case "TimeFunction":
			if (!isTimeFunctionName(node.name)) {
				throw new CompileError(`Unknown time function '${node.name}'`, node.kind);
			}
			requirePositiveInteger(node.lag, `${node.name} lag`, node.kind);
			validateSeriesSource(node.source, node.name);
			return;
		case "ChangeFunction":
			if (node.mode !== "absolute" && node.mode !== "percent") {
				throw new CompileError(`Unknown change mode '${String(node.mode)}'`, node.kind);
			}
			requirePositiveInteger(node.lag, "change lag", node.kind);
			validateSeriesSource(node.source, "change");
			return;
		default: {
			const unhandled: never = node;
			throw new CompileError(
				`Unsupported expression kind '${describeKind(unhandled)}'`,
				describeKind(unhandled)
			);
		}
	}
}

function validateSeriesSource(node: AstNode, owner: string): void {
	if (node.kind !== "Series") {
		throw new CompileError(`${owner} expects a series, got ${node.kind}`, node.kind);
	}
	validateExpression(node, `${owner} source`);
}

function validateRule(node: AstNode): void {
	if (!isRuleNode(node)) {
		throw new CompileError(
			`${describeKind(node)} is not a condition; a rule must compare or cross values`,
			describeKind(node)
		);
	}

	switch (node.kind) {
		case "Comparison":
			if (!isComparisonOperator(node.operator)) {
				throw new CompileError(`Unknown comparison operator '${node.operator}'`, node.kind);
			}
			validateExpression(node.left, `left side of '${node.operator}'`);
			validateExpression(node.right, `right side of '${node.operator}'`);
			return;
		case "CrossFunction":
			if (node.direction !== "above" && node.direction !== "below") {
				throw new CompileError(`Unknown cross direction '${String(node.direction)}'`, node.kind);
			}
			validateExpression(node.left, "first cross argument");
			validateExpression(node.right, "second cross argument");
			return;
		case "BooleanExpr":
			if (!BOOLEAN_OPERATORS.some((op) => op === node.op)) {
				throw new CompileError(`Unknown boolean operator '${String(node.op)}'`, node.kind);
			}
			validateRule(node.left);
			validateRule(node.right);
			return;
		default: {
			const unhandled: never = node;
			throw new CompileError(
				`Unsupported rule kind '${describeKind(unhandled)}'`,
				describeKind(unhandled)
			);
		}
	}
}

/**
 * Walks the whole tree before any data is touched so that a malformed AST
 * fails at compile time rather than part-way through an evaluation.
 */
export function validateStrategy(ast: StrategyNode): void {
	if (describeKind(ast) !== "Strategy") {
		throw new CompileError(
			`Expected a Strategy node, got ${describeKind(ast)}`,
			describeKind(ast)
		);
	}
	const sections: Array<RuleNode | undefined> = [ast.entry, ast.exit];
	sections.forEach((section) => {
		if (section !== undefined) {
			validateRule(section);
		}
	});
}
