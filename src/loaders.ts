import type { ActivityEvent, TokenUsage } from './types.js';
import {
	asRecord,
	asTrimmedString,
	getHomeDirectory,
	listDirectory,
	normalizeNumber,
	readJsonlLines,
} from './utils.js';
import path from 'node:path';

const MESSAGE_TYPES = new Set(['user', 'assistant']);

export function getClaudeProjectsDir(): string {
	const env = process.env.CLAUDE_CONFIG_DIR?.trim();
	if (env != null && env !== '') {
		return path.join(path.resolve(env), 'projects');
	}
	return path.join(getHomeDirectory(), '.claude', 'projects');
}

/**
 * Transcript files one level below the projects directory.
 * Sub-agent transcripts (`agent-*.jsonl`) belong to their parent session and are skipped.
 */
export async function findSessionFiles(projectsDir: string): Promise<string[]> {
	const files: string[] = [];

	for (const projectEntry of await listDirectory(projectsDir)) {
		if (!projectEntry.isDirectory) {
			continue;
		}
		for (const fileEntry of await listDirectory(projectEntry.fullPath)) {
			if (!fileEntry.isFile) {
				continue;
			}
			if (!fileEntry.name.endsWith('.jsonl') || fileEntry.name.startsWith('agent-')) {
				continue;
			}
			files.push(fileEntry.fullPath);
		}
	}

	files.sort();
	return files;
}

// Token counts are unsigned; anything negative or fractional counts as 0.
function normalizeTokenCount(value: unknown): number {
	const count = normalizeNumber(value);
	return Number.isInteger(count) && count > 0 ? count : 0;
}

function extractTokenUsage(value: unknown): TokenUsage | undefined {
	const usage = asRecord(value);
	if (usage == null) {
		return undefined;
	}
	return {
		input: normalizeTokenCount(usage.input_tokens),
		output: normalizeTokenCount(usage.output_tokens),
		cacheCreate: normalizeTokenCount(usage.cache_creation_input_tokens),
		cacheRead: normalizeTokenCount(usage.cache_read_input_tokens),
	};
}

export function parseEventRecord(value: unknown): ActivityEvent | null {
	const lineRecord = asRecord(value);
	if (lineRecord == null) {
		return null;
	}

	const type = asTrimmedString(lineRecord.type);
	if (type == null || !MESSAGE_TYPES.has(type)) {
		return null;
	}

	const timestamp = asTrimmedString(lineRecord.timestamp);
	if (timestamp == null) {
		return null;
	}
	const date = new Date(timestamp);
	if (Number.isNaN(date.getTime())) {
		return null;
	}

	const event: ActivityEvent = { timestamp: date };
	if (typeof lineRecord.cwd === 'string') {
		event.directory = lineRecord.cwd;
	}
	const tokenUsage = extractTokenUsage(asRecord(lineRecord.message)?.usage);
	if (tokenUsage != null) {
		event.tokenUsage = tokenUsage;
	}
	return event;
}

export async function loadEventsFromFile(filePath: string): Promise<ActivityEvent[]> {
	const events: ActivityEvent[] = [];
	for (const parsedLine of await readJsonlLines(filePath)) {
		const event = parseEventRecord(parsedLine);
		if (event != null) {
			events.push(event);
		}
	}
	return events;
}
