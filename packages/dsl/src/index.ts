export * from "./ast";
export { DslSyntaxError, StructuredRuleError } from "./errors";
export type { SourcePosition, StructuredRuleIssue } from "./errors";
export { tokenize, type Token, type TokenKind, type Keyword } from "./lexer";
export { parse, parseExpression, validate } from "./parser";
export { formatExpression, formatRule, formatStrategy } from "./format";
export * from "./generator";
