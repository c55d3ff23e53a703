import { describe, expect, it } from 'vitest';
import type { Session } from '../types.js';
import { renderDayReport, renderProjectList } from './render.js';

function makeSession(start: string, end: string, activeSeconds: number, project: string, tokens = 0): Session {
	return {
		start: new Date(start),
		end: new Date(end),
		activeSeconds,
		project,
		inputTokens: tokens,
		outputTokens: 0,
		cacheCreationTokens: 0,
		cacheReadTokens: 0,
	};
}

describe('renderDayReport', () => {
	it('says so when there are no sessions', () => {
		expect(renderDayReport('2026-02-04', [], false)).toBe('No sessions today.');
	});

	it('lists sessions in local time with their share of the day', () => {
		const report = renderDayReport(
			'2026-02-04',
			[
				makeSession('2026-02-04T16:00:00Z', '2026-02-04T17:00:00Z', 1800, '', 50),
				makeSession('2026-02-04T15:00:00Z', '2026-02-04T16:00:00Z', 1800, '/work/a', 1500),
			],
			false,
		);

		expect(report.split('\n')).toEqual([
			'Sessions for 2026-02-04:',
			`  ${'█'.repeat(10)}${'░'.repeat(10)}  /work/a  30m  (10:00–11:00)  1,500 tokens`,
			`  ${'█'.repeat(10)}${'░'.repeat(10)}  (no project)  30m  (11:00–12:00)  50 tokens`,
			'Total: 60m across 2 session(s), 1,550 tokens',
		]);
	});
});

describe('renderProjectList', () => {
	it('sorts by name and marks archived projects', () => {
		const output = renderProjectList(
			[
				{ id: 'p-22', name: 'Website', archived: false },
				{ id: 'p-1', name: 'Backend', archived: true },
			],
			false,
		);

		expect(output.split('\n')).toEqual(['p-1   Backend (archived)', 'p-22  Website']);
	});

	it('handles an empty workspace', () => {
		expect(renderProjectList([], false)).toBe('No projects in this workspace.');
	});
});
