import { z } from "zod";
import {
	booleanExprNode,
	comparisonNode,
	crossFunctionNode,
	numberNode,
	strategyNode,
	type ExpressionNode,
	type RuleNode,
	type StrategyNode,
} from "./ast";
import { DslSyntaxError, StructuredRuleError, type StructuredRuleIssue } from "./errors";
import { formatStrategy } from "./format";
import { parseExpression } from "./parser";

/**
 * Structured rule documents as produced by the rule-extraction service:
 * `{ entry: [{ left, operator, right }], exit: [...] }`. Operands are numbers
 * or DSL expression text such as `"sma(close,20)"`.
 */
export const StructuredOperatorSchema = z.enum([
	">",
	"<",
	">=",
	"<=",
	"==",
	"!=",
	"crosses_above",
	"crosses_below",
]);

export type StructuredOperator = z.infer<typeof StructuredOperatorSchema>;

export const StructuredOperandSchema = z.union([
	z.number().finite(),
	z.string().trim().min(1),
]);

export const StructuredConditionSchema = z.object({
	left: StructuredOperandSchema,
	operator: StructuredOperatorSchema,
	right: StructuredOperandSchema,
});

export type StructuredCondition = z.infer<typeof StructuredConditionSchema>;

export const StructuredSectionSchema = z.union([
	z
		.array(StructuredConditionSchema)
		.transform((conditions) => ({ logic: "AND" as const, conditions })),
	z.object({
		logic: z.enum(["AND", "OR"]).default("AND"),
		conditions: z.array(StructuredConditionSchema),
	}),
]);

export type StructuredSection = z.infer<typeof StructuredSectionSchema>;

export const StructuredStrategySchema = z
	.object({
		entry: StructuredSectionSchema.optional(),
		exit: StructuredSectionSchema.optional(),
	})
	.refine(
		(doc) =>
			(doc.entry?.conditions.length ?? 0) > 0 ||
			(doc.exit?.conditions.length ?? 0) > 0,
		{ message: "At least one entry or exit condition is required" }
	);

export type StructuredStrategy = z.infer<typeof StructuredStrategySchema>;
export type StructuredStrategyInput = z.input<typeof StructuredStrategySchema>;

const toIssue = (path: ReadonlyArray<string | number>, message: string): StructuredRuleIssue => ({
	path: path.join("."),
	message,
});

const buildOperand = (
	operand: string | number,
	path: Array<string | number>,
	issues: StructuredRuleIssue[]
): ExpressionNode | undefined => {
	if (typeof operand === "number") {
		return numberNode(operand);
	}
	try {
		return parseExpression(operand);
	} catch (error) {
		if (error instanceof DslSyntaxError) {
			issues.push(toIssue(path, `'${operand}': ${error.reason}`));
			return undefined;
		}
		throw error;
	}
};

const buildCondition = (
	condition: StructuredCondition,
	path: Array<string | number>,
	issues: StructuredRuleIssue[]
): RuleNode | undefined => {
	const left = buildOperand(condition.left, [...path, "left"], issues);
	const right = buildOperand(condition.right, [...path, "right"], issues);
	if (!left || !right) {
		return undefined;
	}
	switch (condition.operator) {
		case "crosses_above":
			return crossFunctionNode("above", left, right);
		case "crosses_below":
			return crossFunctionNode("below", left, right);
		default:
			return comparisonNode(condition.operator, left, right);
	}
};

const buildSection = (
	section: StructuredSection | undefined,
	name: "entry" | "exit",
	issues: StructuredRuleIssue[]
): RuleNode | undefined => {
	if (!section) {
		return undefined;
	}
	let rule: RuleNode | undefined;
	for (const [index, condition] of section.conditions.entries()) {
		const next = buildCondition(condition, [name, "conditions", index], issues);
		if (next) {
			rule = rule ? booleanExprNode(section.logic, rule, next) : next;
		}
	}
	return rule;
};

/**
 * Validates a structured rule document and builds the strategy AST it
 * describes. Conditions in a section are chained left to right with the
 * section's `logic` (AND unless stated).
 */
export function strategyFromStructuredRules(input: unknown): StrategyNode {
	const parsed = StructuredStrategySchema.safeParse(input);
	if (!parsed.success) {
		const issues = parsed.error.issues.map((issue) => toIssue(issue.path, issue.message));
		throw new StructuredRuleError(
			`Invalid structured rules: ${issues[0]?.message ?? "unknown error"}`,
			issues
		);
	}

	const issues: StructuredRuleIssue[] = [];
	const entry = buildSection(parsed.data.entry, "entry", issues);
	const exit = buildSection(parsed.data.exit, "exit", issues);
	if (issues.length > 0) {
		throw new StructuredRuleError(
			`Invalid structured rules: ${issues[0].path} ${issues[0].message}`,
			issues
		);
	}
	return strategyNode(entry, exit);
}

/** Emits canonical DSL text for a structured rule document. */
export function generateDsl(input: unknown): string {
	return formatStrategy(strategyFromStructuredRules(input));
}
