import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { findSessionFiles, loadEventsFromFile, parseEventRecord } from './loaders.js';

const USER_MESSAGE = JSON.stringify({
	type: 'user',
	timestamp: '2026-02-03T17:36:56.625Z',
	cwd: '/home/dev/tools/cli',
	sessionId: 'session-1',
	message: { role: 'user', content: [{ type: 'text', text: 'hello' }] },
	uuid: 'uuid-1',
	parentUuid: null,
});

const ASSISTANT_MESSAGE = JSON.stringify({
	type: 'assistant',
	timestamp: '2026-02-03T17:37:02.289Z',
	cwd: '/home/dev/tools/cli',
	message: {
		role: 'assistant',
		content: [{ type: 'text', text: 'Hi there' }],
		usage: { input_tokens: 100, output_tokens: 50, cache_read_input_tokens: 7 },
	},
});

const QUEUE_OPERATION = JSON.stringify({
	type: 'queue-operation',
	operation: 'dequeue',
	timestamp: '2026-02-03T17:36:56.582Z',
});

const FILE_HISTORY_SNAPSHOT = JSON.stringify({
	type: 'file-history-snapshot',
	snapshot: { trackedFileBackups: {}, timestamp: '2026-02-03T17:36:56.628Z' },
});

function parseLine(line: string) {
	return parseEventRecord(JSON.parse(line));
}

describe('parseEventRecord', () => {
	it('parses a user message', () => {
		const event = parseLine(USER_MESSAGE);

		expect(event).toEqual({
			timestamp: new Date('2026-02-03T17:36:56.625Z'),
			directory: '/home/dev/tools/cli',
		});
	});

	it('reads token usage from assistant messages', () => {
		const event = parseLine(ASSISTANT_MESSAGE);

		expect(event?.tokenUsage).toEqual({ input: 100, output: 50, cacheCreate: 0, cacheRead: 7 });
	});

	it('counts negative and fractional token values as zero', () => {
		const event = parseEventRecord({
			type: 'assistant',
			timestamp: '2026-02-03T17:37:02.289Z',
			message: {
				usage: {
					input_tokens: -5,
					output_tokens: 2.5,
					cache_creation_input_tokens: 12,
					cache_read_input_tokens: '40',
				},
			},
		});

		expect(event?.tokenUsage).toEqual({ input: 0, output: 0, cacheCreate: 12, cacheRead: 0 });
	});

	it('ignores other entry types', () => {
		expect(parseLine(QUEUE_OPERATION)).toBeNull();
		expect(parseLine(FILE_HISTORY_SNAPSHOT)).toBeNull();
	});

	it('ignores malformed records', () => {
		expect(parseEventRecord([1, 2, 3])).toBeNull();
		expect(parseEventRecord('user')).toBeNull();
		expect(parseEventRecord({ type: 'user', timestamp: 'yesterday' })).toBeNull();
		expect(parseEventRecord({ type: 'user' })).toBeNull();
	});
});

describe('transcript files', () => {
	let projectsDir = '';

	beforeEach(async () => {
		projectsDir = await mkdtemp(path.join(os.tmpdir(), 'agent-timesheet-projects-'));
	});

	afterEach(async () => {
		await rm(projectsDir, { recursive: true, force: true });
	});

	async function touch(relativePath: string, content = ''): Promise<string> {
		const fullPath = path.join(projectsDir, relativePath);
		await mkdir(path.dirname(fullPath), { recursive: true });
		await writeFile(fullPath, content, 'utf8');
		return fullPath;
	}

	it('finds transcripts one level down and skips sub-agent files', async () => {
		const first = await touch('-home-dev-project1/aaaaaaaa.jsonl');
		const second = await touch('-home-dev-project1/bbbbbbbb.jsonl');
		const third = await touch('-home-dev-project2/cccccccc.jsonl');
		await touch('-home-dev-project1/agent-a095737.jsonl');
		await touch('-home-dev-project1/notes.txt');
		await touch('-home-dev-project1/dddddddd/nested.jsonl');
		await touch('top-level.jsonl');

		expect(await findSessionFiles(projectsDir)).toEqual([first, second, third]);
	});

	it('returns nothing for a missing directory', async () => {
		expect(await findSessionFiles(path.join(projectsDir, 'missing'))).toEqual([]);
	});

	it('loads events in file order and drops noise', async () => {
		const filePath = await touch(
			'-home-dev-project1/session.jsonl',
			[USER_MESSAGE, QUEUE_OPERATION, 'garbage', '', ASSISTANT_MESSAGE].join('\n'),
		);

		const events = await loadEventsFromFile(filePath);

		expect(events.map((event) => event.timestamp.toISOString())).toEqual([
			'2026-02-03T17:36:56.625Z',
			'2026-02-03T17:37:02.289Z',
		]);
	});
});
