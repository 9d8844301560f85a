#!/usr/bin/env node
import { createRequire } from "module";
import { loadConfig } from "./config/index.js";
import { loadEnvironmentVariables, configureComponents } from "./config/setup.js";
import { createProgram } from "./cli/program.js";

// Use createRequire to load package.json in ESM context
const require = createRequire(import.meta.url);

const readVersion = (): string => {
	const pkg: unknown = require("../package.json");
	return typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
		? pkg.version
		: "0.0.0";
};

const main = async () => {
	await loadEnvironmentVariables();

	const { config } = await loadConfig();
	await configureComponents(config);

	const program = createProgram(config, { version: readVersion() });
	await program.parseAsync(process.argv);
};

main().catch((err) => {
	console.error(err);
	process.exit(1);
});
