import { getSecret } from './secrets.js';
import { asRecord, asTrimmedString, describeError } from './utils.js';

export const CLOCKIFY_API_BASE = 'https://api.clockify.me/api/v1';
export const CLOCKIFY_API_KEY_SECRET = 'clockify_api_key';
const PROJECT_PAGE_SIZE = 50;

export type ClockifyProject = {
	id: string;
	name: string;
	archived: boolean;
};

/** The one capability the sync driver needs from the time-tracking service. */
export interface TimeEntryPoster {
	postTimeEntry(projectId: string, start: Date, end: Date, workspaceId: string): Promise<string>;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type ClockifyClientOptions = {
	fetch?: FetchLike;
	apiKey?: () => Promise<string>;
	baseUrl?: string;
	description?: string;
};

export class ClockifyApiError extends Error {
	constructor(
		readonly status: number,
		message: string,
	) {
		super(message);
		this.name = 'ClockifyApiError';
	}
}

export function statusHint(status: number): string {
	switch (status) {
		case 400:
			return 'invalid project ID or request parameters';
		case 401:
			return 'check your API key';
		case 403:
			return 'access forbidden - check workspace/project permissions';
		case 404:
			return 'project or workspace not found';
		case 422:
			return 'invalid request - check time range and project ID';
		default:
			return 'unexpected error';
	}
}

function parseProject(value: unknown): ClockifyProject | null {
	const record = asRecord(value);
	if (record == null || typeof record.id !== 'string' || typeof record.name !== 'string') {
		return null;
	}
	return { id: record.id, name: record.name, archived: record.archived === true };
}

export class ClockifyClient implements TimeEntryPoster {
	private readonly fetchImpl: FetchLike;
	private readonly apiKey: () => Promise<string>;
	private readonly baseUrl: string;
	private readonly description: string;

	constructor(options: ClockifyClientOptions = {}) {
		this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
		this.apiKey =
			options.apiKey ??
			(async () => {
				try {
					return await getSecret(CLOCKIFY_API_KEY_SECRET);
				} catch (error) {
					throw new Error('Failed to retrieve Clockify API key', { cause: error });
				}
			});
		this.baseUrl = options.baseUrl ?? CLOCKIFY_API_BASE;
		this.description = options.description ?? 'Development';
	}

	private async request(url: string, init: RequestInit): Promise<unknown> {
		const apiKey = await this.apiKey();
		const headers = { 'X-Api-Key': apiKey, 'Content-Type': 'application/json' };

		let response: Response;
		try {
			response = await this.fetchImpl(url, { ...init, headers });
		} catch (error) {
			throw new Error(`Network error contacting Clockify: ${describeError(error)}`, { cause: error });
		}

		if (!response.ok) {
			throw new ClockifyApiError(
				response.status,
				`Clockify API returned HTTP ${response.status}: ${statusHint(response.status)}`,
			);
		}

		try {
			return await response.json();
		} catch (error) {
			throw new Error('Failed to parse Clockify response JSON', { cause: error });
		}
	}

	async postTimeEntry(projectId: string, start: Date, end: Date, workspaceId: string): Promise<string> {
		const body = await this.request(
			`${this.baseUrl}/workspaces/${encodeURIComponent(workspaceId)}/time-entries`,
			{
				method: 'POST',
				body: JSON.stringify({
					projectId,
					start: start.toISOString(),
					end: end.toISOString(),
					description: this.description,
				}),
			},
		);

		const id = asTrimmedString(asRecord(body)?.id);
		if (id == null) {
			throw new Error('Clockify response did not include a time entry id');
		}
		return id;
	}

	async listProjects(workspaceId: string): Promise<ClockifyProject[]> {
		const projects: ClockifyProject[] = [];

		for (let page = 1; ; page += 1) {
			const body = await this.request(
				`${this.baseUrl}/workspaces/${encodeURIComponent(workspaceId)}/projects?page-size=${PROJECT_PAGE_SIZE}&page=${page}`,
				{ method: 'GET' },
			);
			if (!Array.isArray(body)) {
				throw new Error('Clockify projects response was not a list');
			}

			for (const item of body) {
				const project = parseProject(item);
				if (project != null) {
					projects.push(project);
				}
			}

			if (body.length < PROJECT_PAGE_SIZE) {
				return projects;
			}
		}
	}
}
