import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
	DEFAULT_BACKTEST_SETTINGS,
	getConfigMetadata,
	loadBacktestProfile,
	loadEnvConfig,
	loadRulecraftConfig,
	mergeBacktestProfile,
} from "./config";
import { ConfigError } from "./errors";

const FIXTURE_DIR = path.join(__dirname, "__tests__", "fixtures");
const ROOT_CONFIG_DIR = path.join(__dirname, "../../../config");
const MISSING_ENV = path.join(FIXTURE_DIR, "missing.env");

const ENV_KEYS = [
	"BACKTEST_INITIAL_CAPITAL",
	"BACKTEST_ANNUALIZATION_FACTOR",
	"BACKTEST_OPEN_POSITION_POLICY",
	"BACKTEST_PRICE_FIELD",
	"INDICATOR_DEFAULT_SMA",
	"INDICATOR_DEFAULT_EMA",
	"INDICATOR_DEFAULT_RSI",
];

afterEach(() => {
	for (const key of ENV_KEYS) {
		delete process.env[key];
	}
});

describe("loadEnvConfig", () => {
	it("reads overrides from the given env file and keeps defaults elsewhere", () => {
		const config = loadEnvConfig(path.join(FIXTURE_DIR, "test.env"));
		expect(config.backtest).toEqual({
			initialCapital: 25_000,
			annualizationFactor: 365,
			openPositionPolicy: "exclude",
			priceField: "open",
		});
		expect(config.indicators).toEqual({ sma: 20, ema: 20, rsi: 10 });
		expect(getConfigMetadata(config)?.source).toBe("env");
	});

	it("rejects a non-integer indicator period", () => {
		process.env.INDICATOR_DEFAULT_SMA = "12.5";
		expect(() => loadEnvConfig(path.join(FIXTURE_DIR, "missing.env"))).toThrowError(
			/INDICATOR_DEFAULT_SMA must be a positive integer/
		);
	});

	it("rejects an unknown open position policy", () => {
		process.env.BACKTEST_OPEN_POSITION_POLICY = "sometimes";
		expect(() => loadEnvConfig(path.join(FIXTURE_DIR, "missing.env"))).toThrow(
			ConfigError
		);
	});
});

describe("loadBacktestProfile", () => {
	it("loads a profile and tags it with file metadata", () => {
		const profile = loadBacktestProfile(FIXTURE_DIR, "close-at-end");
		expect(profile.initialCapital).toBe(50_000);
		expect(profile.openPositionPolicy).toBe("close_at_end");
		expect(profile.indicators).toEqual({ sma: undefined, ema: undefined, rsi: 7 });
		expect(getConfigMetadata(profile)).toEqual({
			source: "file",
			path: path.join(FIXTURE_DIR, "backtest", "close-at-end.json"),
			profile: "close-at-end",
		});
	});

	it("throws when the profile does not exist", () => {
		expect(() => loadBacktestProfile(FIXTURE_DIR, "nope")).toThrowError(
			/Backtest profile not found/
		);
	});

	it("throws on an unknown policy value", () => {
		expect(() => loadBacktestProfile(FIXTURE_DIR, "bad-policy")).toThrowError(
			/backtest.openPositionPolicy must be one of exclude, close_at_end/
		);
	});

	it("throws on a fractional indicator period", () => {
		expect(() => loadBacktestProfile(FIXTURE_DIR, "bad-period")).toThrowError(
			/backtest.indicators.sma must be a positive integer/
		);
	});
});

describe("mergeBacktestProfile", () => {
	it("layers profile values over environment values", () => {
		const env = loadEnvConfig(path.join(FIXTURE_DIR, "missing.env"));
		const merged = mergeBacktestProfile(
			env,
			loadBacktestProfile(FIXTURE_DIR, "close-at-end")
		);
		expect(merged.backtest).toEqual({
			...DEFAULT_BACKTEST_SETTINGS,
			initialCapital: 50_000,
			openPositionPolicy: "close_at_end",
		});
		expect(merged.indicators).toEqual({ sma: 20, ema: 20, rsi: 7 });
	});
});

describe("loadRulecraftConfig", () => {
	it("returns the environment values when no profile is named", () => {
		expect(loadRulecraftConfig({ envPath: MISSING_ENV })).toEqual({
			backtest: DEFAULT_BACKTEST_SETTINGS,
			indicators: { sma: 20, ema: 20, rsi: 14 },
		});
	});

	it("merges the named profile and records where it came from", () => {
		const config = loadRulecraftConfig({
			envPath: MISSING_ENV,
			configDir: FIXTURE_DIR,
			backtestProfile: "close-at-end",
		});
		expect(config.backtest.openPositionPolicy).toBe("close_at_end");
		expect(config.indicators.rsi).toBe(7);
		expect(getConfigMetadata(config)).toEqual({
			source: "merged",
			path: path.join(FIXTURE_DIR, "backtest", "close-at-end.json"),
			profile: "close-at-end",
		});
	});

	it("ships a default profile matching the built-in settings", () => {
		const config = loadRulecraftConfig({
			envPath: MISSING_ENV,
			configDir: ROOT_CONFIG_DIR,
			backtestProfile: "default",
		});
		expect(config.backtest).toEqual(DEFAULT_BACKTEST_SETTINGS);
		expect(config.indicators).toEqual({ sma: 20, ema: 20, rsi: 14 });
	});
});
