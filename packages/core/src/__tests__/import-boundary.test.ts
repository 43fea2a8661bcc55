import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";

const PACKAGES_DIR = path.join(__dirname, "../../..");

/** Workspace packages each package may depend on; lower layers never reach up. */
const ALLOWED: Record<string, readonly string[]> = {
	core: [],
	metrics: [],
	indicators: ["core"],
	dsl: ["core"],
	"strategy-engine": ["core", "dsl", "indicators"],
	"backtest-core": ["core", "dsl", "metrics", "strategy-engine"],
};

const IMPORT_PATTERN = /from\s+["']@rulecraft\/([a-z-]+)["']/g;

const walkFiles = (root: string): string[] => {
	const results: string[] = [];
	const stack = [root];
	while (stack.length) {
		const current = stack.pop();
		if (current === undefined) {
			break;
		}
		const stat = fs.statSync(current);
		if (stat.isDirectory()) {
			for (const entry of fs.readdirSync(current)) {
				if (entry === "node_modules" || entry === "dist") continue;
				stack.push(path.join(current, entry));
			}
			continue;
		}
		if (current.endsWith(".ts")) {
			results.push(current);
		}
	}
	return results;
};

const readDependencies = (pkgPath: string): string[] => {
	const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
	if (typeof pkg !== "object" || pkg === null || !("dependencies" in pkg)) {
		return [];
	}
	const deps = pkg.dependencies;
	return typeof deps === "object" && deps !== null ? Object.keys(deps) : [];
};

describe("workspace layering", () => {
	it("sources import only the packages below them", () => {
		const offenders: string[] = [];
		for (const [name, allowed] of Object.entries(ALLOWED)) {
			const srcDir = path.join(PACKAGES_DIR, name, "src");
			for (const file of walkFiles(srcDir)) {
				const content = fs.readFileSync(file, "utf8");
				for (const match of content.matchAll(IMPORT_PATTERN)) {
					const target = match[1];
					if (target !== name && !allowed.includes(target)) {
						offenders.push(`${name}:${path.relative(srcDir, file)} -> ${target}`);
					}
				}
			}
		}
		expect(offenders).toEqual([]);
	});

	it("package.json files declare every workspace package they import", () => {
		const missing: string[] = [];
		for (const [name, allowed] of Object.entries(ALLOWED)) {
			const deps = readDependencies(path.join(PACKAGES_DIR, name, "package.json"));
			for (const dep of allowed) {
				if (!deps.includes(`@rulecraft/${dep}`)) {
					missing.push(`${name} -> ${dep}`);
				}
			}
		}
		expect(missing).toEqual([]);
	});
});
