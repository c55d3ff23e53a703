import { findSessionFiles, loadEventsFromFile } from './loaders.js';
import { assembleSession } from './sessions.js';
import type { SessionStore } from './store.js';
import type { Session } from './types.js';

export type ScannedSession = {
	sourcePath: string;
	session: Session;
};

export type ScanResult = {
	fileCount: number;
	sessions: ScannedSession[];
};

/** Rebuilds a session from every transcript under `projectsDir` and upserts it. */
export async function scanSessions(
	store: SessionStore,
	projectsDir: string,
	idleTimeoutMinutes: number,
): Promise<ScanResult> {
	const files = await findSessionFiles(projectsDir);
	const sessions: ScannedSession[] = [];

	for (const sourcePath of files) {
		const session = assembleSession(await loadEventsFromFile(sourcePath), idleTimeoutMinutes * 60);
		if (session == null) {
			continue;
		}
		store.upsert(sourcePath, session);
		sessions.push({ sourcePath, session });
	}

	return { fileCount: files.length, sessions };
}
