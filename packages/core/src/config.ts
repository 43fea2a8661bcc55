import fs from "node:fs";
import path from "node:path";

import { ConfigError } from "./errors";
import { loadEnvFile, loadEnvFiles } from "./env";
import { PRICE_FIELDS, type PriceField } from "./types";

export type OpenPositionPolicy = "exclude" | "close_at_end";

export const OPEN_POSITION_POLICIES: readonly OpenPositionPolicy[] = [
	"exclude",
	"close_at_end",
];

export interface IndicatorDefaults {
	sma: number;
	ema: number;
	rsi: number;
}

export const DEFAULT_INDICATOR_PERIODS: Readonly<IndicatorDefaults> =
	Object.freeze({ sma: 20, ema: 20, rsi: 14 });

export interface BacktestDefaults {
	initialCapital: number;
	annualizationFactor: number;
	openPositionPolicy: OpenPositionPolicy;
	priceField: PriceField;
}

export const DEFAULT_BACKTEST_SETTINGS: Readonly<BacktestDefaults> =
	Object.freeze({
		initialCapital: 100_000,
		annualizationFactor: 252,
		openPositionPolicy: "exclude",
		priceField: "close",
	});

export type ConfigSourceType = "env" | "file" | "merged";

export interface ConfigMetadata {
	path?: string;
	source: ConfigSourceType;
	profile?: string;
}

const CONFIG_META_SYMBOL = Symbol.for("rulecraft.config.meta");

const isMetadata = (value: unknown): value is ConfigMetadata =>
	typeof value === "object" &&
	value !== null &&
	"source" in value &&
	typeof value.source === "string";

export const getConfigMetadata = (config: unknown): ConfigMetadata | null => {
	if (!config || typeof config !== "object") {
		return null;
	}
	const meta: unknown = Reflect.get(config, CONFIG_META_SYMBOL);
	return isMetadata(meta) ? meta : null;
};

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	const existing = getConfigMetadata(config);
	Object.defineProperty(config, CONFIG_META_SYMBOL, {
		value: { ...existing, ...metadata },
		enumerable: false,
		configurable: true,
		writable: true,
	});
	return config;
};

export interface EnvConfig {
	backtest: BacktestDefaults;
	indicators: IndicatorDefaults;
}

export interface BacktestProfile {
	initialCapital?: number;
	annualizationFactor?: number;
	openPositionPolicy?: OpenPositionPolicy;
	priceField?: PriceField;
	indicators?: Partial<IndicatorDefaults>;
}

export interface RulecraftConfig {
	backtest: BacktestDefaults;
	indicators: IndicatorDefaults;
}

export interface ConfigLoadOptions {
	envPath?: string;
	configDir?: string;
	backtestProfile?: string;
}

let cachedWorkspaceRoot: string | undefined;

const WORKSPACE_SENTINELS = [".git"];

const hasWorkspacesManifest = (dir: string): boolean => {
	const manifest = path.join(dir, "package.json");
	if (!fs.existsSync(manifest)) {
		return false;
	}
	const parsed: unknown = JSON.parse(fs.readFileSync(manifest, "utf-8"));
	return typeof parsed === "object" && parsed !== null && "workspaces" in parsed;
};

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();

	while (
		!WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(current, file))) &&
		!hasWorkspacesManifest(current)
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

export const getDefaultConfigDir = (): string =>
	path.join(findWorkspaceRoot(), "config");

const readOptionalEnvVar = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const readPositiveNumber = (
	key: string,
	fallback: number,
	integer = false
): number => {
	const raw = readOptionalEnvVar(key);
	if (raw === undefined) {
		return fallback;
	}
	const value = Number(raw);
	if (!Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
		throw new ConfigError(
			`Environment variable ${key} must be a positive ${
				integer ? "integer" : "number"
			}, got "${raw}"`,
			key
		);
	}
	return value;
};

const parseOpenPositionPolicy = (
	value: string,
	field: string
): OpenPositionPolicy => {
	const normalized = value.toLowerCase();
	const match = OPEN_POSITION_POLICIES.find((policy) => policy === normalized);
	if (!match) {
		throw new ConfigError(
			`${field} must be one of ${OPEN_POSITION_POLICIES.join(", ")}, got "${value}"`,
			field
		);
	}
	return match;
};

const parsePriceField = (value: string, field: string): PriceField => {
	const normalized = value.toLowerCase();
	const match = PRICE_FIELDS.find((candidate) => candidate === normalized);
	if (!match) {
		throw new ConfigError(
			`${field} must be one of ${PRICE_FIELDS.join(", ")}, got "${value}"`,
			field
		);
	}
	return match;
};

/**
 * Reads backtest and indicator defaults from the process environment after
 * loading `envPath`, or the `.env` files at the workspace root.
 */
export const loadEnvConfig = (envPath?: string): EnvConfig => {
	if (envPath) {
		loadEnvFile(envPath);
	} else {
		loadEnvFiles(findWorkspaceRoot());
	}

	const policy = readOptionalEnvVar("BACKTEST_OPEN_POSITION_POLICY");
	const priceField = readOptionalEnvVar("BACKTEST_PRICE_FIELD");

	return withConfigMetadata(
		{
			backtest: {
				initialCapital: readPositiveNumber(
					"BACKTEST_INITIAL_CAPITAL",
					DEFAULT_BACKTEST_SETTINGS.initialCapital
				),
				annualizationFactor: readPositiveNumber(
					"BACKTEST_ANNUALIZATION_FACTOR",
					DEFAULT_BACKTEST_SETTINGS.annualizationFactor
				),
				openPositionPolicy: policy
					? parseOpenPositionPolicy(policy, "BACKTEST_OPEN_POSITION_POLICY")
					: DEFAULT_BACKTEST_SETTINGS.openPositionPolicy,
				priceField: priceField
					? parsePriceField(priceField, "BACKTEST_PRICE_FIELD")
					: DEFAULT_BACKTEST_SETTINGS.priceField,
			},
			indicators: {
				sma: readPositiveNumber(
					"INDICATOR_DEFAULT_SMA",
					DEFAULT_INDICATOR_PERIODS.sma,
					true
				),
				ema: readPositiveNumber(
					"INDICATOR_DEFAULT_EMA",
					DEFAULT_INDICATOR_PERIODS.ema,
					true
				),
				rsi: readPositiveNumber(
					"INDICATOR_DEFAULT_RSI",
					DEFAULT_INDICATOR_PERIODS.rsi,
					true
				),
			},
		},
		{ source: "env", path: envPath }
	);
};

const readJsonFile = (filePath: string): unknown => {
	const contents = fs.readFileSync(filePath, "utf-8");
	return JSON.parse(contents);
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const ensurePositiveNumber = (
	value: unknown,
	field: string,
	integer = false
): number | undefined => {
	if (value === undefined) {
		return undefined;
	}
	if (
		typeof value !== "number" ||
		!Number.isFinite(value) ||
		value <= 0 ||
		(integer && !Number.isInteger(value))
	) {
		throw new ConfigError(
			`${field} must be a positive ${integer ? "integer" : "number"}`,
			field
		);
	}
	return value;
};

const ensureString = (value: unknown, field: string): string | undefined => {
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "string") {
		throw new ConfigError(`${field} must be a string`, field);
	}
	return value;
};

export const resolveBacktestProfilePath = (
	configDir: string,
	profile: string
): string => {
	const profileName = profile.endsWith(".json") ? profile : `${profile}.json`;
	const candidates = [
		path.join(configDir, "backtest", profileName),
		path.join(configDir, profileName),
	];
	for (const candidate of candidates) {
		if (fs.existsSync(candidate)) {
			return candidate;
		}
	}
	throw new ConfigError(
		`Backtest profile not found. Looked for ${candidates.join(", ")}`,
		"backtestProfile"
	);
};

export const loadBacktestProfile = (
	configDir = getDefaultConfigDir(),
	profile = "default"
): BacktestProfile => {
	const profilePath = resolveBacktestProfilePath(configDir, profile);
	const file = readJsonFile(profilePath);
	if (!isRecord(file)) {
		throw new ConfigError(
			`Backtest profile at ${profilePath} must be a JSON object`,
			"backtestProfile"
		);
	}

	const policy = ensureString(file.openPositionPolicy, "backtest.openPositionPolicy");
	const priceField = ensureString(file.priceField, "backtest.priceField");
	const indicators = file.indicators;
	if (indicators !== undefined && !isRecord(indicators)) {
		throw new ConfigError(
			"backtest.indicators must be an object",
			"backtest.indicators"
		);
	}

	return withConfigMetadata(
		{
			initialCapital: ensurePositiveNumber(
				file.initialCapital,
				"backtest.initialCapital"
			),
			annualizationFactor: ensurePositiveNumber(
				file.annualizationFactor,
				"backtest.annualizationFactor"
			),
			openPositionPolicy: policy
				? parseOpenPositionPolicy(policy, "backtest.openPositionPolicy")
				: undefined,
			priceField: priceField
				? parsePriceField(priceField, "backtest.priceField")
				: undefined,
			indicators: indicators
				? {
						sma: ensurePositiveNumber(indicators.sma, "backtest.indicators.sma", true),
						ema: ensurePositiveNumber(indicators.ema, "backtest.indicators.ema", true),
						rsi: ensurePositiveNumber(indicators.rsi, "backtest.indicators.rsi", true),
					}
				: undefined,
		},
		{ source: "file", path: profilePath, profile }
	);
};

/**
 * Environment values first, then the JSON profile on top of them; fields the
 * profile leaves out keep their environment (or built-in) value.
 */
export const mergeBacktestProfile = (
	env: EnvConfig,
	profile: BacktestProfile
): RulecraftConfig => ({
	backtest: {
		initialCapital: profile.initialCapital ?? env.backtest.initialCapital,
		annualizationFactor:
			profile.annualizationFactor ?? env.backtest.annualizationFactor,
		openPositionPolicy:
			profile.openPositionPolicy ?? env.backtest.openPositionPolicy,
		priceField: profile.priceField ?? env.backtest.priceField,
	},
	indicators: {
		sma: profile.indicators?.sma ?? env.indicators.sma,
		ema: profile.indicators?.ema ?? env.indicators.ema,
		rsi: profile.indicators?.rsi ?? env.indicators.rsi,
	},
});

export const loadRulecraftConfig = (
	options: ConfigLoadOptions = {}
): RulecraftConfig => {
	const env = loadEnvConfig(options.envPath);
	if (!options.backtestProfile) {
		return env;
	}
	const configDir = options.configDir ?? getDefaultConfigDir();
	const profile = loadBacktestProfile(configDir, options.backtestProfile);
	return withConfigMetadata(mergeBacktestProfile(env, profile), {
		source: "merged",
		path: getConfigMetadata(profile)?.path,
		profile: options.backtestProfile,
	});
};
