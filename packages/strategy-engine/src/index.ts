export {
	compile,
	type CompilerOptions,
	type Evaluator,
	type RawStrategySignals,
	type StrategySignals,
} from "./compile";
export { CompileError } from "./errors";
export { validateStrategy } from "./validateAst";
