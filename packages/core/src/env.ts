import { config as dotenvConfig } from "dotenv";
import { existsSync } from "node:fs";
import path from "node:path";

const loaded = new Set<string>();

export function loadEnvFiles(projectRoot: string): void {
	const candidates = filterUnique(
		[process.env.RULECRAFT_ENV_FILE, ".env", ".env.local"].filter(
			(value): value is string => typeof value === "string" && value.length > 0
		)
	);

	candidates.forEach((candidate) => {
		loadEnvFile(
			path.isAbsolute(candidate) ? candidate : path.join(projectRoot, candidate)
		);
	});
}

export function loadEnvFile(fullPath: string): void {
	if (!existsSync(fullPath) || loaded.has(fullPath)) {
		return;
	}
	dotenvConfig({ path: fullPath, override: true });
	loaded.add(fullPath);
}

function filterUnique(values: string[]): string[] {
	return values.filter((value, index) => values.indexOf(value) === index);
}
