#!/usr/bin/env node

import { runApp } from './app.js';

function describeCauses(error: unknown): string[] {
	const lines: string[] = [];
	let cause = error instanceof Error ? error.cause : undefined;
	while (cause != null) {
		lines.push(`Caused by: ${cause instanceof Error ? cause.message : String(cause)}`);
		cause = cause instanceof Error ? cause.cause : undefined;
	}
	return lines;
}

runApp(process.argv.slice(2)).catch((error: unknown) => {
	const message = error instanceof Error ? error.message : String(error);
	console.error(`Error: ${message}`);
	for (const line of describeCauses(error)) {
		console.error(line);
	}
	process.exitCode = 1;
});
