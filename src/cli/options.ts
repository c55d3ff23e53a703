import { APP_NAME } from '../utils.js';

export type CommandKind = 'today' | 'scan' | 'sync' | 'projects' | 'setup';

export type CliOptions = {
	command: CommandKind;
	configPath?: string;
	databasePath?: string;
	apiKey?: string;
	noColor: boolean;
	help: boolean;
};

function parseCommand(input: string): CommandKind | null {
	switch (input) {
		case 'today':
		case 'scan':
		case 'sync':
		case 'projects':
		case 'setup':
			return input;
		default:
			return null;
	}
}

function takeValue(argv: string[], index: number, flag: string): string {
	const raw = argv[index + 1];
	if (raw == null || raw.trim() === '') {
		throw new Error(`Missing value after ${flag}`);
	}
	return raw.trim();
}

export function parseArgs(argv: string[]): CliOptions {
	const options: CliOptions = {
		command: 'today',
		noColor: false,
		help: false,
	};
	let commandSeen = false;

	for (let i = 0; i < argv.length; i += 1) {
		const arg = argv[i];
		if (arg == null) {
			continue;
		}

		if (arg === '--help' || arg === '-h') {
			options.help = true;
			continue;
		}
		if (arg === '--no-color') {
			options.noColor = true;
			continue;
		}

		if (arg === '--config' || arg === '-c') {
			options.configPath = takeValue(argv, i, arg);
			i += 1;
			continue;
		}
		if (arg.startsWith('--config=')) {
			options.configPath = arg.slice('--config='.length).trim();
			continue;
		}

		if (arg === '--db') {
			options.databasePath = takeValue(argv, i, arg);
			i += 1;
			continue;
		}
		if (arg.startsWith('--db=')) {
			options.databasePath = arg.slice('--db='.length).trim();
			continue;
		}

		if (arg === '--api-key') {
			options.apiKey = takeValue(argv, i, arg);
			i += 1;
			continue;
		}
		if (arg.startsWith('--api-key=')) {
			options.apiKey = arg.slice('--api-key='.length).trim();
			continue;
		}

		const command = arg.startsWith('-') ? null : parseCommand(arg);
		if (command != null && !commandSeen) {
			options.command = command;
			commandSeen = true;
			continue;
		}

		throw new Error(`Unknown argument "${arg}". Run with --help.`);
	}

	return options;
}

export function printHelp(): void {
	console.log(
		[
			`Usage: ${APP_NAME} [command] [options]`,
			'',
			'Commands:',
			"  today      Scan transcripts and show today's sessions (default)",
			'  scan       Scan transcripts into the session database',
			'  sync       Scan, then post finished weekdays to Clockify',
			'  projects   List Clockify projects in the configured workspace',
			'  setup      Store the Clockify API key (reads stdin or --api-key)',
			'',
			'Options:',
			'  -c, --config <path>     Config file (default ~/.config/agent-timesheet/config.toml)',
			'      --db <path>         Session database path',
			'      --api-key <key>     API key for setup',
			'      --no-color          Disable ANSI colors',
			'  -h, --help              Show help',
		].join('\n'),
	);
}
