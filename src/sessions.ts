import type { ActivityEvent, Session } from './types.js';
import { localDateString } from './utils.js';

export const DEFAULT_IDLE_TIMEOUT_MINUTES = 15;

/**
 * Collapses one transcript's events into a session.
 *
 * Gaps between consecutive events count toward `activeSeconds` only while they stay
 * below `idleThresholdSeconds`; longer stretches are treated as time away.
 */
export function assembleSession(events: ActivityEvent[], idleThresholdSeconds: number): Session | null {
	const first = events[0];
	const last = events[events.length - 1];
	if (first == null || last == null) {
		return null;
	}

	let activeSeconds = 0;
	for (let index = 1; index < events.length; index += 1) {
		const previous = events[index - 1];
		const current = events[index];
		if (previous == null || current == null) {
			continue;
		}
		const gapSeconds = Math.floor((current.timestamp.getTime() - previous.timestamp.getTime()) / 1000);
		if (gapSeconds < idleThresholdSeconds) {
			activeSeconds += gapSeconds;
		}
	}

	const project = events.find((event) => event.directory != null)?.directory ?? '';

	let inputTokens = 0;
	let outputTokens = 0;
	let cacheCreationTokens = 0;
	let cacheReadTokens = 0;
	for (const event of events) {
		if (event.tokenUsage == null) {
			continue;
		}
		inputTokens += event.tokenUsage.input;
		outputTokens += event.tokenUsage.output;
		cacheCreationTokens += event.tokenUsage.cacheCreate;
		cacheReadTokens += event.tokenUsage.cacheRead;
	}

	return {
		start: first.timestamp,
		end: last.timestamp,
		activeSeconds,
		project,
		inputTokens,
		outputTokens,
		cacheCreationTokens,
		cacheReadTokens,
	};
}

/** True if the session touches the given local calendar date at either end. */
export function touchesLocalDate(session: Session, localDate: string): boolean {
	return localDateString(session.start) === localDate || localDateString(session.end) === localDate;
}
