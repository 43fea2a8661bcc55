/** A hand-built or corrupted AST that cannot be turned into an evaluator. */
export class CompileError extends Error {
	readonly nodeKind: string;

	constructor(message: string, nodeKind: string) {
		super(message);
		this.name = "CompileError";
		this.nodeKind = nodeKind;
	}
}
