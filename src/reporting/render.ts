import type { ClockifyProject } from '../clockify.js';
import type { Session } from '../types.js';
import { bold, color, formatLocalTime, formatMinutes, formatNumber } from '../utils.js';

const BAR_WIDTH = 20;

function renderProgressBar(
	width: number,
	percent: number,
	fillCode: string,
	emptyCode: string,
	colorsEnabled: boolean,
): string {
	const clamped = Math.max(0, Math.min(100, percent));
	const filled = Math.round((clamped / 100) * width);
	const filledBar = filled > 0 ? color('█'.repeat(filled), fillCode, colorsEnabled) : '';
	const emptyBar = width - filled > 0 ? color('░'.repeat(width - filled), emptyCode, colorsEnabled) : '';
	return filledBar + emptyBar;
}

function sessionTokens(session: Session): number {
	return session.inputTokens + session.outputTokens + session.cacheCreationTokens + session.cacheReadTokens;
}

/** Today's sessions in start order, each with its share of the day's active time. */
export function renderDayReport(localDate: string, sessions: Session[], colorsEnabled: boolean): string {
	if (sessions.length === 0) {
		return 'No sessions today.';
	}

	const ordered = [...sessions].sort((a, b) => a.start.getTime() - b.start.getTime());
	const totalSeconds = ordered.reduce((sum, session) => sum + session.activeSeconds, 0);
	const totalTokens = ordered.reduce((sum, session) => sum + sessionTokens(session), 0);

	const lines: string[] = [bold(`Sessions for ${localDate}:`, colorsEnabled)];
	for (const session of ordered) {
		const percent = totalSeconds === 0 ? 0 : Math.round((session.activeSeconds / totalSeconds) * 100);
		const project = session.project === '' ? '(no project)' : session.project;
		lines.push(
			[
				`  ${renderProgressBar(BAR_WIDTH, percent, '36', '90', colorsEnabled)}`,
				color(project, '34', colorsEnabled),
				formatMinutes(session.activeSeconds),
				`(${formatLocalTime(session.start)}–${formatLocalTime(session.end)})`,
				color(`${formatNumber(sessionTokens(session))} tokens`, '90', colorsEnabled),
			].join('  '),
		);
	}
	lines.push(
		`Total: ${bold(color(formatMinutes(totalSeconds), '32', colorsEnabled), colorsEnabled)} across ${ordered.length} session(s), ${formatNumber(totalTokens)} tokens`,
	);
	return lines.join('\n');
}

export function renderProjectList(projects: ClockifyProject[], colorsEnabled: boolean): string {
	if (projects.length === 0) {
		return 'No projects in this workspace.';
	}

	const idWidth = Math.max(...projects.map((project) => project.id.length));
	const sorted = [...projects].sort((a, b) => a.name.localeCompare(b.name, 'en'));
	return sorted
		.map((project) => {
			const archived = project.archived ? ` ${color('(archived)', '90', colorsEnabled)}` : '';
			return `${color(project.id.padEnd(idWidth, ' '), '90', colorsEnabled)}  ${project.name}${archived}`;
		})
		.join('\n');
}
