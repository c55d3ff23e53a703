import { chmod, mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

export const APP_NAME = 'agent-timesheet';

export type LocalDateParts = {
	year: number;
	monthIndex: number;
	day: number;
};

export function pad2(value: number): string {
	return String(value).padStart(2, '0');
}

export function parseLocalDate(input: string): LocalDateParts {
	const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(input.trim());
	if (match == null) {
		throw new Error(`Invalid date "${input}". Expected YYYY-MM-DD.`);
	}

	const year = Number(match[1]);
	const month = Number(match[2]);
	const day = Number(match[3]);
	const candidate = new Date(year, month - 1, day, 12, 0, 0, 0);
	if (candidate.getFullYear() !== year || candidate.getMonth() !== month - 1 || candidate.getDate() !== day) {
		throw new Error(`Invalid date "${input}". Expected YYYY-MM-DD.`);
	}

	return { year, monthIndex: month - 1, day };
}

/** Calendar date of an instant in the process time zone, as YYYY-MM-DD. */
export function localDateString(date: Date): string {
	return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

export function addDays(localDate: string, days: number): string {
	const { year, monthIndex, day } = parseLocalDate(localDate);
	// Noon keeps the arithmetic clear of DST transitions around midnight.
	return localDateString(new Date(year, monthIndex, day + days, 12, 0, 0, 0));
}

export function isWeekday(localDate: string): boolean {
	const { year, monthIndex, day } = parseLocalDate(localDate);
	const weekday = new Date(year, monthIndex, day, 12, 0, 0, 0).getDay();
	return weekday >= 1 && weekday <= 5;
}

/** UTC instant truncated to whole seconds, e.g. 2026-02-04T09:00:00Z. */
export function formatUtcSeconds(date: Date): string {
	return `${date.toISOString().slice(0, 19)}Z`;
}

export function formatLocalTime(date: Date): string {
	return `${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
}

export function formatNumber(value: number): string {
	return new Intl.NumberFormat('en-US').format(Math.round(value));
}

export function formatMinutes(seconds: number): string {
	return `${Math.floor(seconds / 60)}m`;
}

export function getHomeDirectory(): string {
	return os.homedir();
}

export function expandHome(filePath: string): string {
	if (filePath === '~') {
		return getHomeDirectory();
	}
	if (filePath.startsWith('~/')) {
		return path.join(getHomeDirectory(), filePath.slice(2));
	}
	return filePath;
}

export function getConfigDirectory(): string {
	const xdg = process.env.XDG_CONFIG_HOME?.trim();
	const root = xdg != null && xdg !== '' ? xdg : path.join(getHomeDirectory(), '.config');
	return path.join(root, APP_NAME);
}

export function getDataDirectory(): string {
	const xdg = process.env.XDG_DATA_HOME?.trim();
	const root = xdg != null && xdg !== '' ? xdg : path.join(getHomeDirectory(), '.local', 'share');
	return path.join(root, APP_NAME);
}

export async function listDirectory(
	dirPath: string,
): Promise<{ name: string; fullPath: string; isFile: boolean; isDirectory: boolean }[]> {
	try {
		const entries = await readdir(dirPath, { withFileTypes: true, encoding: 'utf8' });
		return entries.map((entry) => ({
			name: entry.name,
			fullPath: path.join(dirPath, entry.name),
			isFile: entry.isFile(),
			isDirectory: entry.isDirectory(),
		}));
	} catch {
		return [];
	}
}

export async function readJsonlLines(filePath: string): Promise<unknown[]> {
	let content: string;
	try {
		content = await readFile(filePath, 'utf8');
	} catch {
		return [];
	}

	const lines = content.split(/\r?\n/);
	const parsed: unknown[] = [];
	for (const line of lines) {
		const trimmed = line.trim();
		if (trimmed === '') {
			continue;
		}
		try {
			parsed.push(JSON.parse(trimmed));
		} catch {
			// ignore invalid JSON lines
		}
	}
	return parsed;
}

export function asRecord(value: unknown): Record<string, unknown> | null {
	if (value == null || typeof value !== 'object' || Array.isArray(value)) {
		return null;
	}
	return value as Record<string, unknown>;
}

export function asTrimmedString(value: unknown): string | undefined {
	if (typeof value !== 'string') {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed === '' ? undefined : trimmed;
}

export function normalizeNumber(value: unknown): number {
	return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

async function ensureParentDir(filePath: string): Promise<void> {
	await mkdir(path.dirname(filePath), { recursive: true });
}

export async function readJsonFile(filePath: string): Promise<unknown> {
	try {
		const content = await readFile(filePath, 'utf8');
		return JSON.parse(content);
	} catch {
		return null;
	}
}

export async function writeJsonFile(filePath: string, value: unknown, mode?: number): Promise<void> {
	await ensureParentDir(filePath);
	await writeFile(filePath, JSON.stringify(value, null, 2), { encoding: 'utf8', mode });
	if (mode != null) {
		// writeFile only applies the mode when it creates the file.
		await chmod(filePath, mode);
	}
}

export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

export function ansiEnabled(noColorFlag: boolean): boolean {
	return !noColorFlag && process.env.NO_COLOR == null;
}

export function color(text: string, code: string, enabled: boolean): string {
	if (!enabled) {
		return text;
	}
	return `\x1b[${code}m${text}\x1b[0m`;
}

export function bold(text: string, enabled: boolean): string {
	return color(text, '1', enabled);
}
