import { APP_NAME, asRecord, getConfigDirectory, readJsonFile, writeJsonFile } from './utils.js';
import path from 'node:path';

const SECRETS_FILE_MODE = 0o600;

export function getSecretsPath(): string {
	return path.join(getConfigDirectory(), 'secrets.json');
}

function envName(name: string): string {
	return `AGENT_TIMESHEET_${name.toUpperCase().replace(/[^A-Z0-9]+/g, '_')}`;
}

async function readSecrets(filePath: string): Promise<Record<string, string>> {
	const record = asRecord(await readJsonFile(filePath));
	const secrets: Record<string, string> = {};
	if (record == null) {
		return secrets;
	}
	for (const [key, value] of Object.entries(record)) {
		if (typeof value === 'string') {
			secrets[key] = value;
		}
	}
	return secrets;
}

export async function storeSecret(name: string, value: string, filePath = getSecretsPath()): Promise<void> {
	const secrets = await readSecrets(filePath);
	secrets[name] = value;
	await writeJsonFile(filePath, secrets, SECRETS_FILE_MODE);
}

export async function getSecret(name: string, filePath = getSecretsPath()): Promise<string> {
	const fromEnv = process.env[envName(name)]?.trim();
	if (fromEnv != null && fromEnv !== '') {
		return fromEnv;
	}

	const value = (await readSecrets(filePath))[name];
	if (value == null || value === '') {
		throw new Error(`secret '${name}' not found (run \`${APP_NAME} setup\` to store it)`);
	}
	return value;
}
