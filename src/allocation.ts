import type { Allocation, AllocationResult, Session, SyncConfig } from './types.js';
import { parseLocalDate } from './utils.js';

export type WorkdayWindow = {
	start: Date;
	end: Date;
};

const HOUR_MS = 60 * 60 * 1000;

function parseClockTime(value: string, setting: string): { hours: number; minutes: number } {
	const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
	const hours = Number(match?.[1]);
	const minutes = Number(match?.[2]);
	if (match == null || hours > 23 || minutes > 59) {
		throw new Error(`parsing ${setting}: "${value}" is not a valid HH:MM time`);
	}
	return { hours, minutes };
}

function sameLocalFields(date: Date, year: number, monthIndex: number, day: number, hours: number, minutes: number): boolean {
	return (
		date.getFullYear() === year &&
		date.getMonth() === monthIndex &&
		date.getDate() === day &&
		date.getHours() === hours &&
		date.getMinutes() === minutes
	);
}

/**
 * Resolves a local wall-clock time on `localDate` to a single instant.
 * Times skipped or repeated by a DST transition are rejected rather than guessed.
 */
function resolveLocalTime(localDate: string, value: string, setting: string): Date {
	const { year, monthIndex, day } = parseLocalDate(localDate);
	const { hours, minutes } = parseClockTime(value, setting);
	const candidate = new Date(year, monthIndex, day, hours, minutes, 0, 0);

	if (!sameLocalFields(candidate, year, monthIndex, day, hours, minutes)) {
		throw new Error(`nonexistent local time for ${setting}: ${localDate} ${value}`);
	}
	for (const shift of [-HOUR_MS, HOUR_MS]) {
		const other = new Date(candidate.getTime() + shift);
		if (sameLocalFields(other, year, monthIndex, day, hours, minutes)) {
			throw new Error(`ambiguous local time for ${setting}: ${localDate} ${value}`);
		}
	}
	return candidate;
}

export function workdayBoundaries(workDayStart: string, workDayEnd: string, localDate: string): WorkdayWindow {
	const start = resolveLocalTime(localDate, workDayStart, 'work_day_start');
	const end = resolveLocalTime(localDate, workDayEnd, 'work_day_end');
	if (end.getTime() <= start.getTime()) {
		throw new Error(`work_day_end (${workDayEnd}) must be after work_day_start (${workDayStart})`);
	}
	return { start, end };
}

function compareIds(a: string, b: string): number {
	if (a < b) {
		return -1;
	}
	return a > b ? 1 : 0;
}

/**
 * Splits the workday window between destinations in proportion to tracked time.
 *
 * Each share is floored to whole seconds and the leftover goes to the last destination
 * in id order, so the blocks always tile the window exactly. Destinations that tracked
 * nothing are left out; a day with no tracked time yields no allocations.
 */
export function computeAllocations(
	sessions: Session[],
	projectMapping: ReadonlyMap<string, string>,
	otherProjectId: string | undefined,
	workdayStart: Date,
	workdayEnd: Date,
): AllocationResult {
	const buckets = new Map<string, number>();
	const skipped: string[] = [];
	let totalIncluded = 0;

	for (const session of sessions) {
		const destinationId = projectMapping.get(session.project) ?? otherProjectId;
		if (destinationId == null) {
			if (!skipped.includes(session.project)) {
				skipped.push(session.project);
			}
			continue;
		}
		buckets.set(destinationId, (buckets.get(destinationId) ?? 0) + session.activeSeconds);
		totalIncluded += session.activeSeconds;
	}

	if (totalIncluded === 0) {
		return { allocations: [], skipped };
	}

	const workdaySeconds = Math.floor((workdayEnd.getTime() - workdayStart.getTime()) / 1000);
	// Destinations with no tracked time get no block and never take the remainder.
	const destinationIds = [...buckets.keys()].filter((id) => (buckets.get(id) ?? 0) > 0).sort(compareIds);
	const durations = destinationIds.map((destinationId) => {
		const tracked = buckets.get(destinationId) ?? 0;
		return Math.floor((workdaySeconds * tracked) / totalIncluded);
	});

	const allocatedSum = durations.reduce((sum, value) => sum + value, 0);
	const lastIndex = durations.length - 1;
	durations[lastIndex] = (durations[lastIndex] ?? 0) + (workdaySeconds - allocatedSum);

	const allocations: Allocation[] = [];
	let cursor = workdayStart.getTime();
	destinationIds.forEach((destinationId, index) => {
		const end = cursor + (durations[index] ?? 0) * 1000;
		allocations.push({ destinationId, start: new Date(cursor), end: new Date(end) });
		cursor = end;
	});

	return { allocations, skipped };
}

export function allocateDay(sessions: Session[], config: SyncConfig, localDate: string): AllocationResult {
	if (sessions.length === 0) {
		return { allocations: [], skipped: [] };
	}
	const window = workdayBoundaries(config.workDayStart, config.workDayEnd, localDate);
	return computeAllocations(sessions, config.projectMapping, config.otherProjectId, window.start, window.end);
}
