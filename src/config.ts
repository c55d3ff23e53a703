import { DEFAULT_IDLE_TIMEOUT_MINUTES } from './sessions.js';
import type { AppConfig, SyncConfig } from './types.js';
import { asRecord, asTrimmedString, describeError, expandHome, getConfigDirectory, getDataDirectory } from './utils.js';
import * as TOML from '@iarna/toml';
import { readFile } from 'node:fs/promises';
import path from 'node:path';

const CLOCK_TIME = /^\d{1,2}:\d{2}$/;

export function getDefaultConfigPath(): string {
	return path.join(getConfigDirectory(), 'config.toml');
}

export function getDefaultDatabasePath(): string {
	return path.join(getDataDirectory(), 'sessions.db');
}

function requireString(record: Record<string, unknown>, key: string, section: string): string {
	const value = asTrimmedString(record[key]);
	if (value == null) {
		throw new Error(`Invalid config: ${section}.${key} must be a non-empty string`);
	}
	return value;
}

function parseClockSetting(record: Record<string, unknown>, key: string): string {
	const value = requireString(record, key, 'sync');
	if (!CLOCK_TIME.test(value)) {
		throw new Error(`Invalid config: sync.${key} must be HH:MM, got "${value}"`);
	}
	return value;
}

function parseSyncSection(value: unknown): SyncConfig | undefined {
	if (value == null) {
		return undefined;
	}
	const record = asRecord(value);
	if (record == null) {
		throw new Error('Invalid config: [sync] must be a table');
	}

	const projectMapping = new Map<string, string>();
	if (record.project_mapping != null) {
		const mappingRecord = asRecord(record.project_mapping);
		if (mappingRecord == null) {
			throw new Error('Invalid config: [sync.project_mapping] must be a table');
		}
		for (const [project, destination] of Object.entries(mappingRecord)) {
			const destinationId = asTrimmedString(destination);
			if (destinationId == null) {
				throw new Error(`Invalid config: sync.project_mapping."${project}" must be a project id string`);
			}
			projectMapping.set(project, destinationId);
		}
	}

	const sync: SyncConfig = {
		workspaceId: requireString(record, 'workspace_id', 'sync'),
		workDayStart: parseClockSetting(record, 'work_day_start'),
		workDayEnd: parseClockSetting(record, 'work_day_end'),
		projectMapping,
	};
	if (record.other_project_id != null) {
		sync.otherProjectId = requireString(record, 'other_project_id', 'sync');
	}
	return sync;
}

export function parseConfig(text: string): AppConfig {
	let parsed: TOML.JsonMap;
	try {
		parsed = TOML.parse(text);
	} catch (error) {
		throw new Error(`Invalid config TOML: ${describeError(error)}`, { cause: error });
	}

	const idle = parsed.idle_timeout_minutes ?? DEFAULT_IDLE_TIMEOUT_MINUTES;
	if (typeof idle !== 'number' || !Number.isFinite(idle) || idle <= 0) {
		throw new Error('Invalid config: idle_timeout_minutes must be a positive number');
	}

	const database = parsed.database;
	if (database != null && asTrimmedString(database) == null) {
		throw new Error('Invalid config: database must be a non-empty string');
	}
	const databasePath = asTrimmedString(database);

	return {
		idleTimeoutMinutes: idle,
		databasePath: databasePath == null ? getDefaultDatabasePath() : expandHome(databasePath),
		sync: parseSyncSection(parsed.sync),
	};
}

export async function loadConfig(configPath = getDefaultConfigPath()): Promise<AppConfig> {
	let text: string;
	try {
		text = await readFile(configPath, 'utf8');
	} catch (error) {
		if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
			return parseConfig('');
		}
		throw new Error(`reading config ${configPath}: ${describeError(error)}`, { cause: error });
	}
	return parseConfig(text);
}

export function requireSyncConfig(config: AppConfig, configPath: string): SyncConfig {
	if (config.sync == null) {
		throw new Error(`No [sync] section in ${configPath}. Add workspace_id, work_day_start and work_day_end.`);
	}
	return config.sync;
}
