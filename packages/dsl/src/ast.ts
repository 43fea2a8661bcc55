import { PRICE_COLUMNS, type PriceColumn } from "@rulecraft/core";

export const SERIES_NAMES = PRICE_COLUMNS;
export type SeriesName = PriceColumn;

export const INDICATOR_NAMES = ["sma", "rsi", "ema"] as const;
export type IndicatorName = (typeof INDICATOR_NAMES)[number];

export const TIME_FUNCTIONS = ["yesterday", "last_week", "n_days_ago"] as const;
export type TimeFunctionName = (typeof TIME_FUNCTIONS)[number];

export const CHANGE_FUNCTIONS = ["change", "percent_change"] as const;
export type ChangeFunctionName = (typeof CHANGE_FUNCTIONS)[number];

export const CROSS_FUNCTIONS = ["crosses_above", "crosses_below"] as const;
export type CrossFunctionName = (typeof CROSS_FUNCTIONS)[number];

export const COMPARISON_OPERATORS = [">", "<", ">=", "<=", "==", "!="] as const;
export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

export const BOOLEAN_OPERATORS = ["AND", "OR"] as const;
export type BooleanOperator = (typeof BOOLEAN_OPERATORS)[number];

export type CrossDirection = "above" | "below";
export type ChangeMode = "absolute" | "percent";

/** Fixed lag of the single-argument time functions. */
export const TIME_FUNCTION_LAGS: Readonly<Record<"yesterday" | "last_week", number>> =
	Object.freeze({ yesterday: 1, last_week: 7 });

export interface SeriesNode {
	readonly kind: "Series";
	readonly name: SeriesName;
}

export interface NumberNode {
	readonly kind: "Number";
	readonly value: number;
}

export interface PercentageNode {
	readonly kind: "Percentage";
	readonly value: number;
}

export interface IndicatorNode {
	readonly kind: "Indicator";
	readonly name: IndicatorName;
	readonly source: ExpressionNode;
	/** Omitted when the text gave none; the compiler fills in its default. */
	readonly period?: number;
}

export interface TimeFunctionNode {
	readonly kind: "TimeFunction";
	readonly name: TimeFunctionName;
	readonly source: SeriesNode;
	readonly lag: number;
}

export interface ChangeFunctionNode {
	readonly kind: "ChangeFunction";
	readonly mode: ChangeMode;
	readonly source: SeriesNode;
	readonly lag: number;
}

export interface CrossFunctionNode {
	readonly kind: "CrossFunction";
	readonly direction: CrossDirection;
	readonly left: ExpressionNode;
	readonly right: ExpressionNode;
}

export interface ComparisonNode {
	readonly kind: "Comparison";
	readonly operator: ComparisonOperator;
	readonly left: ExpressionNode;
	readonly right: ExpressionNode;
}

export interface BooleanExprNode {
	readonly kind: "BooleanExpr";
	readonly op: BooleanOperator;
	readonly left: RuleNode;
	readonly right: RuleNode;
}

export interface StrategyNode {
	readonly kind: "Strategy";
	readonly entry?: RuleNode;
	readonly exit?: RuleNode;
}

/** Nodes that evaluate to a numeric sequence. */
export type ExpressionNode =
	| SeriesNode
	| NumberNode
	| PercentageNode
	| IndicatorNode
	| TimeFunctionNode
	| ChangeFunctionNode;

/** Nodes that evaluate to a boolean sequence. */
export type RuleNode = ComparisonNode | CrossFunctionNode | BooleanExprNode;

export type AstNode = ExpressionNode | RuleNode | StrategyNode;

export type AstNodeKind = AstNode["kind"];

const EXPRESSION_KINDS: ReadonlySet<AstNodeKind> = new Set<AstNodeKind>([
	"Series",
	"Number",
	"Percentage",
	"Indicator",
	"TimeFunction",
	"ChangeFunction",
]);

const RULE_KINDS: ReadonlySet<AstNodeKind> = new Set<AstNodeKind>([
	"Comparison",
	"CrossFunction",
	"BooleanExpr",
]);

export const isExpressionNode = (node: AstNode): node is ExpressionNode =>
	EXPRESSION_KINDS.has(node.kind);

export const isRuleNode = (node: AstNode): node is RuleNode =>
	RULE_KINDS.has(node.kind);

const includes = <T extends string>(
	values: readonly T[],
	candidate: string
): candidate is T => values.some((value) => value === candidate);

export const isSeriesName = (value: string): value is SeriesName =>
	includes(SERIES_NAMES, value);
export const isIndicatorName = (value: string): value is IndicatorName =>
	includes(INDICATOR_NAMES, value);
export const isTimeFunctionName = (value: string): value is TimeFunctionName =>
	includes(TIME_FUNCTIONS, value);
export const isChangeFunctionName = (value: string): value is ChangeFunctionName =>
	includes(CHANGE_FUNCTIONS, value);
export const isCrossFunctionName = (value: string): value is CrossFunctionName =>
	includes(CROSS_FUNCTIONS, value);
export const isComparisonOperator = (value: string): value is ComparisonOperator =>
	includes(COMPARISON_OPERATORS, value);

const freezeNode = <T extends AstNode>(node: T): T => {
	Object.freeze(node);
	return node;
};

export const seriesNode = (name: SeriesName): SeriesNode =>
	freezeNode({ kind: "Series", name });

export const numberNode = (value: number): NumberNode =>
	freezeNode({ kind: "Number", value });

export const percentageNode = (value: number): PercentageNode =>
	freezeNode({ kind: "Percentage", value });

export const indicatorNode = (
	name: IndicatorName,
	source: ExpressionNode,
	period?: number
): IndicatorNode => {
	const node: IndicatorNode =
		period === undefined
			? { kind: "Indicator", name, source }
			: { kind: "Indicator", name, source, period };
	return freezeNode(node);
};

export const timeFunctionNode = (
	name: TimeFunctionName,
	source: SeriesNode,
	lag: number
): TimeFunctionNode => freezeNode({ kind: "TimeFunction", name, source, lag });

export const changeFunctionNode = (
	mode: ChangeMode,
	source: SeriesNode,
	lag: number
): ChangeFunctionNode =>
	freezeNode({ kind: "ChangeFunction", mode, source, lag });

export const crossFunctionNode = (
	direction: CrossDirection,
	left: ExpressionNode,
	right: ExpressionNode
): CrossFunctionNode =>
	freezeNode({ kind: "CrossFunction", direction, left, right });

export const comparisonNode = (
	operator: ComparisonOperator,
	left: ExpressionNode,
	right: ExpressionNode
): ComparisonNode => freezeNode({ kind: "Comparison", operator, left, right });

export const booleanExprNode = (
	op: BooleanOperator,
	left: RuleNode,
	right: RuleNode
): BooleanExprNode => freezeNode({ kind: "BooleanExpr", op, left, right });

/** Sections left undefined are omitted so equal strategies compare equal. */
export const strategyNode = (entry?: RuleNode, exit?: RuleNode): StrategyNode => {
	if (entry && exit) {
		return freezeNode({ kind: "Strategy", entry, exit });
	}
	if (entry) {
		return freezeNode({ kind: "Strategy", entry });
	}
	if (exit) {
		return freezeNode({ kind: "Strategy", exit });
	}
	return freezeNode({ kind: "Strategy" });
};

export const crossDirectionOf = (name: CrossFunctionName): CrossDirection =>
	name === "crosses_above" ? "above" : "below";

export const crossFunctionName = (direction: CrossDirection): CrossFunctionName =>
	direction === "above" ? "crosses_above" : "crosses_below";

export const changeModeOf = (name: ChangeFunctionName): ChangeMode =>
	name === "change" ? "absolute" : "percent";

export const changeFunctionName = (mode: ChangeMode): ChangeFunctionName =>
	mode === "absolute" ? "change" : "percent_change";
