import { allocateDay, workdayBoundaries } from './allocation.js';
import type { TimeEntryPoster } from './clockify.js';
import type { SessionStore } from './store.js';
import type { SyncConfig, SyncSummary } from './types.js';
import { addDays, describeError, isWeekday, localDateString } from './utils.js';

export type SyncOptions = {
	store: SessionStore;
	config: SyncConfig;
	poster: TimeEntryPoster;
	/** Local calendar date treated as today; it is never synced because its workday is still open. */
	today?: string;
	log?: (line: string) => void;
};

/**
 * Posts one entry per destination for every complete, unsynced weekday.
 *
 * Progress is committed per entry and then per day, so a run that stops on a failed
 * post can simply be repeated: the split is re-derived from the same stored sessions
 * and destinations that already have an entry are not posted again.
 */
export async function runSync(options: SyncOptions): Promise<SyncSummary> {
	const { store, config, poster } = options;
	const log = options.log ?? ((line: string) => console.log(line));
	const summary: SyncSummary = { days: 0, entries: 0 };

	const startDate = store.earliestSessionDate();
	if (startDate == null) {
		log('No sessions found. Nothing to sync.');
		return summary;
	}

	const yesterday = addDays(options.today ?? localDateString(new Date()), -1);
	if (startDate > yesterday) {
		log('No complete workdays to sync.');
		return summary;
	}

	log(`Syncing workdays from ${startDate} to ${yesterday}...`);

	for (let date = startDate; date <= yesterday; date = addDays(date, 1)) {
		if (!isWeekday(date) || store.isDaySynced(date, config.workspaceId)) {
			continue;
		}

		const window = workdayBoundaries(config.workDayStart, config.workDayEnd, date);
		const sessions = store.queryRange(window.start, window.end);
		if (sessions.length === 0) {
			continue;
		}

		const { allocations, skipped } = allocateDay(sessions, config, date);
		if (allocations.length === 0) {
			const reason =
				skipped.length > 0 ? `all projects skipped: ${skipped.join(', ')}` : 'no tracked time';
			log(`  ${date} - no allocations (${reason})`);
			continue;
		}

		let dayEntries = 0;
		for (const allocation of allocations) {
			if (store.isEntrySynced(date, config.workspaceId, allocation.destinationId)) {
				continue;
			}

			let entryId: string;
			try {
				entryId = await poster.postTimeEntry(
					allocation.destinationId,
					allocation.start,
					allocation.end,
					config.workspaceId,
				);
			} catch (error) {
				throw new Error(
					`posting entry for ${allocation.destinationId} on ${date}: ${describeError(error)}`,
					{ cause: error },
				);
			}

			store.markEntrySynced(date, config.workspaceId, allocation.destinationId, entryId);
			dayEntries += 1;
		}

		store.markDaySynced(date, config.workspaceId);
		log(`  ${date} - ${dayEntries} entries posted`);
		summary.days += 1;
		summary.entries += dayEntries;
	}

	log('---');
	log(`Synced ${summary.days} days, ${summary.entries} total entries`);
	return summary;
}
