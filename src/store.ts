import type { Session, SyncedEntry } from './types.js';
import { describeError, formatUtcSeconds, localDateString } from './utils.js';
import sqlJs from 'sql.js';
import type { Database, ParamsObject, SqlValue } from 'sql.js';
import { mkdirSync, writeFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';

// The CommonJS bundle exports the factory both as the module and as its default.
const initSqlJs = sqlJs.default;

const SCHEMA = `
CREATE TABLE IF NOT EXISTS sessions (
	source_path                  TEXT    PRIMARY KEY,
	project                      TEXT    NOT NULL,
	date                         TEXT    NOT NULL,
	start_time                   TEXT    NOT NULL,
	end_time                     TEXT    NOT NULL,
	duration_seconds             INTEGER NOT NULL,
	input_tokens                 INTEGER NOT NULL DEFAULT 0,
	output_tokens                INTEGER NOT NULL DEFAULT 0,
	cache_creation_input_tokens  INTEGER NOT NULL DEFAULT 0,
	cache_read_input_tokens      INTEGER NOT NULL DEFAULT 0
);
CREATE INDEX IF NOT EXISTS sessions_start_time ON sessions (start_time);
CREATE TABLE IF NOT EXISTS synced_days (
	date          TEXT NOT NULL,
	workspace_id  TEXT NOT NULL,
	synced_at     TEXT NOT NULL,
	PRIMARY KEY (date, workspace_id)
);
CREATE TABLE IF NOT EXISTS synced_entries (
	date          TEXT NOT NULL,
	workspace_id  TEXT NOT NULL,
	project_id    TEXT NOT NULL,
	entry_id      TEXT NOT NULL,
	synced_at     TEXT NOT NULL,
	PRIMARY KEY (date, workspace_id, project_id)
);
`;

function withContext<T>(operation: string, work: () => T): T {
	try {
		return work();
	} catch (error) {
		throw new Error(`${operation}: ${describeError(error)}`, { cause: error });
	}
}

async function withContextAsync<T>(operation: string, work: () => Promise<T>): Promise<T> {
	try {
		return await work();
	} catch (error) {
		throw new Error(`${operation}: ${describeError(error)}`, { cause: error });
	}
}

function textColumn(row: ParamsObject, name: string): string {
	const value = row[name];
	if (typeof value !== 'string') {
		throw new Error(`column ${name} is not text`);
	}
	return value;
}

function integerColumn(row: ParamsObject, name: string): number {
	const value = row[name];
	if (typeof value !== 'number') {
		throw new Error(`column ${name} is not a number`);
	}
	return value;
}

function rowToSession(row: ParamsObject): Session {
	return {
		start: new Date(textColumn(row, 'start_time')),
		end: new Date(textColumn(row, 'end_time')),
		activeSeconds: integerColumn(row, 'duration_seconds'),
		project: textColumn(row, 'project'),
		inputTokens: integerColumn(row, 'input_tokens'),
		outputTokens: integerColumn(row, 'output_tokens'),
		cacheCreationTokens: integerColumn(row, 'cache_creation_input_tokens'),
		cacheReadTokens: integerColumn(row, 'cache_read_input_tokens'),
	};
}

async function readDatabaseFile(filePath: string): Promise<Uint8Array | null> {
	try {
		return await readFile(filePath);
	} catch (error) {
		if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
			return null;
		}
		throw error;
	}
}

/**
 * SQLite-backed session table plus the bookkeeping that makes sync resumable.
 *
 * The database lives in memory and, when opened from a path, is written back to that
 * file after every change, so a run that stops midway keeps what it already recorded.
 * Instants are stored as second-precision UTC strings so that SQL string comparison
 * matches chronological order.
 */
export class SessionStore {
	private constructor(
		private readonly db: Database,
		private readonly filePath: string | null,
	) {
		withContext('initializing database', () => {
			db.run(SCHEMA);
		});
		this.persist();
	}

	static async open(filePath: string): Promise<SessionStore> {
		const db = await withContextAsync(`opening database ${filePath}`, async () => {
			const SQL = await initSqlJs();
			const data = await readDatabaseFile(filePath);
			mkdirSync(path.dirname(filePath), { recursive: true });
			return new SQL.Database(data);
		});
		return new SessionStore(db, filePath);
	}

	static async inMemory(): Promise<SessionStore> {
		const SQL = await initSqlJs();
		return new SessionStore(new SQL.Database(), null);
	}

	close(): void {
		this.db.close();
	}

	private persist(): void {
		if (this.filePath == null) {
			return;
		}
		const filePath = this.filePath;
		withContext(`saving database ${filePath}`, () => {
			writeFileSync(filePath, this.db.export());
		});
	}

	private select(sql: string, params: SqlValue[]): ParamsObject[] {
		const statement = this.db.prepare(sql);
		try {
			statement.bind(params);
			const rows: ParamsObject[] = [];
			while (statement.step()) {
				rows.push(statement.getAsObject());
			}
			return rows;
		} finally {
			statement.free();
		}
	}

	private write(operation: string, sql: string, params: SqlValue[]): void {
		withContext(operation, () => {
			this.db.run(sql, params);
		});
		this.persist();
	}

	upsert(sourcePath: string, session: Session): void {
		this.write(
			'upserting session',
			`INSERT OR REPLACE INTO sessions (
				source_path, project, date, start_time, end_time,
				duration_seconds, input_tokens, output_tokens,
				cache_creation_input_tokens, cache_read_input_tokens
			) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
			[
				sourcePath,
				session.project,
				localDateString(session.start),
				formatUtcSeconds(session.start),
				formatUtcSeconds(session.end),
				session.activeSeconds,
				session.inputTokens,
				session.outputTokens,
				session.cacheCreationTokens,
				session.cacheReadTokens,
			],
		);
	}

	/** Sessions whose [start, end) interval intersects [rangeStart, rangeEnd). */
	queryRange(rangeStart: Date, rangeEnd: Date): Session[] {
		return withContext('querying sessions', () => {
			const rows = this.select(
				`SELECT project, start_time, end_time, duration_seconds,
					input_tokens, output_tokens,
					cache_creation_input_tokens, cache_read_input_tokens
				FROM sessions
				WHERE start_time < ? AND end_time >= ?
				ORDER BY start_time, source_path`,
				[formatUtcSeconds(rangeEnd), formatUtcSeconds(rangeStart)],
			);
			return rows.map(rowToSession);
		});
	}

	sessionCount(): number {
		return withContext('counting sessions', () => {
			const [row] = this.select('SELECT COUNT(*) AS count FROM sessions', []);
			return row == null ? 0 : integerColumn(row, 'count');
		});
	}

	earliestSessionDate(): string | null {
		return withContext('finding earliest session', () => {
			const [row] = this.select('SELECT MIN(start_time) AS earliest FROM sessions', []);
			const earliest = row?.earliest;
			if (typeof earliest !== 'string') {
				return null;
			}
			return localDateString(new Date(earliest));
		});
	}

	isDaySynced(date: string, workspaceId: string): boolean {
		return withContext('checking synced day', () => {
			const rows = this.select('SELECT 1 AS found FROM synced_days WHERE date = ? AND workspace_id = ?', [
				date,
				workspaceId,
			]);
			return rows.length > 0;
		});
	}

	markDaySynced(date: string, workspaceId: string): void {
		this.write('marking day synced', 'INSERT INTO synced_days (date, workspace_id, synced_at) VALUES (?, ?, ?)', [
			date,
			workspaceId,
			new Date().toISOString(),
		]);
	}

	isEntrySynced(date: string, workspaceId: string, destinationId: string): boolean {
		return withContext('checking synced entry', () => {
			const rows = this.select(
				'SELECT 1 AS found FROM synced_entries WHERE date = ? AND workspace_id = ? AND project_id = ?',
				[date, workspaceId, destinationId],
			);
			return rows.length > 0;
		});
	}

	markEntrySynced(date: string, workspaceId: string, destinationId: string, entryId: string): void {
		this.write(
			'recording synced entry',
			`INSERT INTO synced_entries (date, workspace_id, project_id, entry_id, synced_at)
			VALUES (?, ?, ?, ?, ?)`,
			[date, workspaceId, destinationId, entryId, new Date().toISOString()],
		);
	}

	syncedEntries(date: string, workspaceId: string): SyncedEntry[] {
		return withContext('listing synced entries', () => {
			const rows = this.select(
				`SELECT project_id, entry_id FROM synced_entries
				WHERE date = ? AND workspace_id = ?
				ORDER BY project_id`,
				[date, workspaceId],
			);
			return rows.map((row) => ({
				destinationId: textColumn(row, 'project_id'),
				entryId: textColumn(row, 'entry_id'),
			}));
		});
	}
}
