import {
	createLogger,
	pluckColumn,
	DEFAULT_INDICATOR_PERIODS,
	type IndicatorDefaults,
	type NumericSeries,
	type PriceTable,
	type SignalSeries,
	type TriStateSeries,
} from "@rulecraft/core";
import {
	INDICATOR_NAMES,
	type ComparisonOperator,
	type ExpressionNode,
	type IndicatorName,
	type RuleNode,
	type StrategyNode,
} from "@rulecraft/dsl";
import {
	changeSeries,
	crossSeries,
	emaSeries,
	isDefinedNumber,
	percentChangeSeries,
	rsiSeries,
	shiftSeries,
	smaSeries,
} from "@rulecraft/indicators";
import { CompileError } from "./errors";
import { describeKind, validateStrategy } from "./validateAst";

const logger = createLogger("strategy-engine");

export interface CompilerOptions {
	/** Periods used by `sma(x)`, `ema(x)` and `rsi(x)` when the text gives none. */
	indicatorDefaults?: Partial<IndicatorDefaults>;
}

export interface StrategySignals {
	entry: SignalSeries;
	exit: SignalSeries;
}

/** Condition results before warm-up rows are collapsed to false. */
export interface RawStrategySignals {
	entry: TriStateSeries;
	exit: TriStateSeries;
}

export interface Evaluator {
	(table: PriceTable): StrategySignals;
	evaluateRaw(table: PriceTable): RawStrategySignals;
	readonly strategy: StrategyNode;
	readonly indicatorDefaults: Readonly<IndicatorDefaults>;
}

const resolveDefaults = (overrides?: Partial<IndicatorDefaults>): Readonly<IndicatorDefaults> => {
	const defaults: IndicatorDefaults = { ...DEFAULT_INDICATOR_PERIODS, ...overrides };
	INDICATOR_NAMES.forEach((name) => {
		const period = defaults[name];
		if (!Number.isInteger(period) || period <= 0) {
			throw new CompileError(
				`indicatorDefaults.${name} must be a positive integer, got ${period}`,
				"Indicator"
			);
		}
	});
	return Object.freeze(defaults);
};

const finiteOrUndefined = (values: NumericSeries): NumericSeries =>
	values.map((value) => (isDefinedNumber(value) ? value : undefined));

const COMPARATORS: Readonly<Record<ComparisonOperator, (left: number, right: number) => boolean>> = {
	">": (left, right) => left > right,
	"<": (left, right) => left < right,
	">=": (left, right) => left >= right,
	"<=": (left, right) => left <= right,
	"==": (left, right) => left === right,
	"!=": (left, right) => left !== right,
};

const indicatorSeries = (
	name: IndicatorName,
	source: NumericSeries,
	period: number
): NumericSeries => {
	switch (name) {
		case "sma":
			return smaSeries(source, period);
		case "ema":
			return emaSeries(source, period);
		case "rsi":
			return rsiSeries(source, period);
		default: {
			const unhandled: never = name;
			throw new CompileError(`Unsupported indicator '${String(unhandled)}'`, "Indicator");
		}
	}
};

/** Kleene AND: false wins, otherwise any unknown side makes the row unknown. */
const andValue = (left: boolean | undefined, right: boolean | undefined): boolean | undefined => {
	if (left === false || right === false) {
		return false;
	}
	if (left === undefined || right === undefined) {
		return undefined;
	}
	return true;
};

/** OR with an unknown side takes the other side's value. */
const orValue = (left: boolean | undefined, right: boolean | undefined): boolean | undefined => {
	if (left === undefined) {
		return right;
	}
	if (right === undefined) {
		return left;
	}
	return left || right;
};

/**
 * Evaluation state for one table. Numeric sub-expressions are cached by node
 * identity so shared subtrees are computed once per call.
 */
class TableEvaluation {
	private readonly cache = new Map<ExpressionNode, NumericSeries>();

	constructor(
		private readonly table: PriceTable,
		private readonly defaults: Readonly<IndicatorDefaults>
	) {}

	numeric(node: ExpressionNode): NumericSeries {
		const cached = this.cache.get(node);
		if (cached) {
			return cached;
		}
		const values = finiteOrUndefined(this.computeNumeric(node));
		this.cache.set(node, values);
		return values;
	}

	rule(node: RuleNode): TriStateSeries {
		switch (node.kind) {
			case "Comparison": {
				const compare = COMPARATORS[node.operator];
				const left = this.numeric(node.left);
				const right = this.numeric(node.right);
				return left.map((value, i) => {
					const other = right[i];
					return value === undefined || other === undefined ? undefined : compare(value, other);
				});
			}
			case "CrossFunction":
				return crossSeries(this.numeric(node.left), this.numeric(node.right), node.direction);
			case "BooleanExpr": {
				const combine = node.op === "AND" ? andValue : orValue;
				const left = this.rule(node.left);
				const right = this.rule(node.right);
				return left.map((value, i) => combine(value, right[i]));
			}
			default: {
				const unhandled: never = node;
				throw new CompileError(
					`Unsupported rule kind '${describeKind(unhandled)}'`,
					describeKind(unhandled)
				);
			}
		}
	}

	section(node: RuleNode | undefined): TriStateSeries {
		return node ? this.rule(node) : new Array<boolean | undefined>(this.table.length).fill(false);
	}

	private constant(value: number): NumericSeries {
		return new Array<number>(this.table.length).fill(value);
	}

	private computeNumeric(node: ExpressionNode): NumericSeries {
		switch (node.kind) {
			case "Series":
				return pluckColumn(this.table, node.name);
			case "Number":
			case "Percentage":
				return this.constant(node.value);
			case "Indicator": {
				const source = this.numeric(node.source);
				return indicatorSeries(node.name, source, node.period ?? this.defaults[node.name]);
			}
			case "TimeFunction":
				return shiftSeries(this.numeric(node.source), node.lag);
			case "ChangeFunction": {
				const source = this.numeric(node.source);
				return node.mode === "absolute"
					? changeSeries(source, node.lag)
					: percentChangeSeries(source, node.lag);
			}
			default: {
				const unhandled: never = node;
				throw new CompileError(
					`Unsupported expression kind '${describeKind(unhandled)}'`,
					describeKind(unhandled)
				);
			}
		}
	}
}

const collapse = (values: TriStateSeries): SignalSeries => values.map((value) => value === true);

const countTrue = (values: SignalSeries): number =>
	values.reduce((count, value) => (value ? count + 1 : count), 0);

/**
 * Compiles a strategy AST into a reusable evaluator. The tree is validated
 * up front; evaluation itself never throws on warm-up gaps, which surface as
 * `false` in the returned signals (or `undefined` from `evaluateRaw`).
 */
export function compile(ast: StrategyNode, options: CompilerOptions = {}): Evaluator {
	const defaults = resolveDefaults(options.indicatorDefaults);
	validateStrategy(ast);
	logger.debug("strategy_compiled", {
		entry: ast.entry !== undefined,
		exit: ast.exit !== undefined,
		indicatorDefaults: defaults,
	});

	const evaluateRaw = (table: PriceTable): RawStrategySignals => {
		const evaluation = new TableEvaluation(table, defaults);
		return {
			entry: evaluation.section(ast.entry),
			exit: evaluation.section(ast.exit),
		};
	};

	const evaluate = (table: PriceTable): StrategySignals => {
		const raw = evaluateRaw(table);
		const signals: StrategySignals = {
			entry: collapse(raw.entry),
			exit: collapse(raw.exit),
		};
		logger.debug("signals_evaluated", {
			rows: table.length,
			entrySignals: countTrue(signals.entry),
			exitSignals: countTrue(signals.exit),
		});
		return signals;
	};

	return Object.assign(evaluate, {
		evaluateRaw,
		strategy: ast,
		indicatorDefaults: defaults,
	});
}
