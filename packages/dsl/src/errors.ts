export interface SourcePosition {
	line: number;
	column: number;
}

/**
 * Malformed DSL text. `line` and `column` are 1-based and point at the
 * offending token; the message repeats them as `line:column`.
 */
export class DslSyntaxError extends Error {
	readonly line: number;
	readonly column: number;
	readonly reason: string;

	constructor(reason: string, position: SourcePosition) {
		super(`${position.line}:${position.column} ${reason}`);
		this.name = "DslSyntaxError";
		this.line = position.line;
		this.column = position.column;
		this.reason = reason;
	}
}

export interface StructuredRuleIssue {
	path: string;
	message: string;
}

export class StructuredRuleError extends Error {
	readonly issues: readonly StructuredRuleIssue[];

	constructor(message: string, issues: readonly StructuredRuleIssue[]) {
		super(message);
		this.name = "StructuredRuleError";
		this.issues = issues;
	}
}
