export class PriceTableError extends Error {
	readonly index: number;

	constructor(message: string, index: number) {
		super(message);
		this.name = "PriceTableError";
		this.index = index;
	}
}

export class ConfigError extends Error {
	readonly field: string;

	constructor(message: string, field: string) {
		super(message);
		this.name = "ConfigError";
		this.field = field;
	}
}
