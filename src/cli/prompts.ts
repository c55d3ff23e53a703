import type { CliOptions } from './options.js';
import { createInterface } from 'node:readline/promises';

export async function resolveApiKey(options: CliOptions): Promise<string> {
	if (options.apiKey != null && options.apiKey !== '') {
		return options.apiKey;
	}

	const rl = createInterface({ input: process.stdin, output: process.stdout, terminal: process.stdin.isTTY });
	try {
		const answer = process.stdin.isTTY
			? await rl.question('Clockify API key: ')
			: await readFirstLine(rl);
		const apiKey = answer.trim();
		if (apiKey === '') {
			throw new Error('No API key provided.');
		}
		return apiKey;
	} finally {
		rl.close();
	}
}

async function readFirstLine(rl: AsyncIterable<string>): Promise<string> {
	for await (const line of rl) {
		return line;
	}
	return '';
}
