#!/usr/bin/env node
import { run } from "./cli.js";

await run({
	argv: process.argv.slice(2),
	env: process.env,
	exit: (code) => process.exit(code),
});
