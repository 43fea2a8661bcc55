import {
	changeFunctionName,
	crossFunctionName,
	type ExpressionNode,
	type RuleNode,
	type StrategyNode,
} from "./ast";

/**
 * Prints a number in positional notation. `String` switches to exponent form
 * below 1e-6 and from 1e21, which the lexer does not read; the shortest
 * round-trip digits are kept and only the decimal point moves.
 */
export const formatNumber = (value: number): string => {
	const text = String(value);
	const match = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
	if (!match) {
		return text;
	}
	const [, sign, whole, fraction = "", exponent] = match;
	const digits = whole + fraction;
	const point = whole.length + Number(exponent);
	if (point <= 0) {
		return `${sign}0.${"0".repeat(-point)}${digits}`;
	}
	if (point >= digits.length) {
		return `${sign}${digits}${"0".repeat(point - digits.length)}`;
	}
	return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
};

export function formatExpression(node: ExpressionNode): string {
	switch (node.kind) {
		case "Series":
			return node.name;
		case "Number":
			return formatNumber(node.value);
		case "Percentage":
			return `${formatNumber(node.value)}%`;
		case "Indicator": {
			const source = formatExpression(node.source);
			return node.period === undefined
				? `${node.name}(${source})`
				: `${node.name}(${source}, ${node.period})`;
		}
		case "TimeFunction":
			return node.name === "n_days_ago"
				? `n_days_ago(${node.source.name}, ${node.lag})`
				: `${node.name}(${node.source.name})`;
		case "ChangeFunction":
			return `${changeFunctionName(node.mode)}(${node.source.name}, ${node.lag})`;
	}
}

/**
 * Renders a rule in canonical form: crosses use the call syntax and a
 * right-hand AND/OR chain is parenthesised so it re-parses with the same
 * grouping.
 */
export function formatRule(node: RuleNode): string {
	switch (node.kind) {
		case "Comparison":
			return `${formatExpression(node.left)} ${node.operator} ${formatExpression(node.right)}`;
		case "CrossFunction":
			return `${crossFunctionName(node.direction)}(${formatExpression(node.left)}, ${formatExpression(node.right)})`;
		case "BooleanExpr": {
			const right =
				node.right.kind === "BooleanExpr"
					? `(${formatRule(node.right)})`
					: formatRule(node.right);
			return `${formatRule(node.left)} ${node.op} ${right}`;
		}
	}
}

export function formatStrategy(node: StrategyNode): string {
	const lines: string[] = [];
	if (node.entry) {
		lines.push("ENTRY:", formatRule(node.entry));
	}
	if (node.exit) {
		lines.push("EXIT:", formatRule(node.exit));
	}
	return lines.join("\n");
}
