import type { CliOptions } from './cli/options.js';
import { parseArgs, printHelp } from './cli/options.js';
import { resolveApiKey } from './cli/prompts.js';
import { withSpinner } from './cli/spinner.js';
import { CLOCKIFY_API_KEY_SECRET, ClockifyClient } from './clockify.js';
import { getDefaultConfigPath, loadConfig, requireSyncConfig } from './config.js';
import { getClaudeProjectsDir } from './loaders.js';
import { renderDayReport, renderProjectList } from './reporting/render.js';
import type { ScanResult } from './scan.js';
import { scanSessions } from './scan.js';
import { getSecretsPath, storeSecret } from './secrets.js';
import { touchesLocalDate } from './sessions.js';
import { SessionStore } from './store.js';
import { runSync } from './sync.js';
import type { AppConfig } from './types.js';
import { ansiEnabled, bold, color, expandHome, formatNumber, localDateString } from './utils.js';

type CommandContext = {
	options: CliOptions;
	config: AppConfig;
	configPath: string;
	colorsEnabled: boolean;
};

async function openStore(context: CommandContext): Promise<SessionStore> {
	return SessionStore.open(expandHome(context.options.databasePath ?? context.config.databasePath));
}

async function scanWithSpinner(store: SessionStore, context: CommandContext): Promise<ScanResult> {
	return withSpinner(
		'Scanning transcripts...',
		context.colorsEnabled,
		() => scanSessions(store, getClaudeProjectsDir(), context.config.idleTimeoutMinutes),
		(result) => `Scanned ${formatNumber(result.fileCount)} transcripts`,
	);
}

async function runToday(context: CommandContext): Promise<void> {
	const store = await openStore(context);
	try {
		const result = await scanWithSpinner(store, context);
		const today = localDateString(new Date());
		const sessions = result.sessions
			.map((item) => item.session)
			.filter((session) => touchesLocalDate(session, today));
		console.log(renderDayReport(today, sessions, context.colorsEnabled));
	} finally {
		store.close();
	}
}

async function runScan(context: CommandContext): Promise<void> {
	const store = await openStore(context);
	try {
		const result = await scanWithSpinner(store, context);
		console.log(
			`Stored ${bold(formatNumber(result.sessions.length), context.colorsEnabled)} sessions (${formatNumber(store.sessionCount())} in database).`,
		);
	} finally {
		store.close();
	}
}

async function runSyncCommand(context: CommandContext): Promise<void> {
	const syncConfig = requireSyncConfig(context.config, context.configPath);
	const store = await openStore(context);
	try {
		await scanWithSpinner(store, context);
		const summary = await runSync({ store, config: syncConfig, poster: new ClockifyClient() });
		if (summary.entries > 0) {
			console.log(color('Sync complete.', '32', context.colorsEnabled));
		}
	} finally {
		store.close();
	}
}

async function runProjects(context: CommandContext): Promise<void> {
	const syncConfig = requireSyncConfig(context.config, context.configPath);
	const projects = await withSpinner('Loading Clockify projects...', context.colorsEnabled, () =>
		new ClockifyClient().listProjects(syncConfig.workspaceId),
	);
	console.log(renderProjectList(projects, context.colorsEnabled));
}

async function runSetup(context: CommandContext): Promise<void> {
	const apiKey = await resolveApiKey(context.options);
	await storeSecret(CLOCKIFY_API_KEY_SECRET, apiKey);
	console.log(`Saved ${CLOCKIFY_API_KEY_SECRET} to ${getSecretsPath()}`);
}

export async function runApp(argv: string[]): Promise<void> {
	const options = parseArgs(argv);
	if (options.help) {
		printHelp();
		return;
	}

	const configPath = expandHome(options.configPath ?? getDefaultConfigPath());
	const context: CommandContext = {
		options,
		config: await loadConfig(configPath),
		configPath,
		colorsEnabled: ansiEnabled(options.noColor),
	};

	switch (options.command) {
		case 'today':
			return runToday(context);
		case 'scan':
			return runScan(context);
		case 'sync':
			return runSyncCommand(context);
		case 'projects':
			return runProjects(context);
		case 'setup':
			return runSetup(context);
	}
}
