#!/usr/bin/env node
import { buildProgram } from "./program.js";

buildProgram()
	.parseAsync(process.argv)
	.catch((err: unknown) => {
		console.error("[prsync] Unexpected failure:", err);
		process.exitCode = 1;
	});
