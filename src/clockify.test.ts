import { describe, expect, it, vi } from 'vitest';
import { ClockifyApiError, ClockifyClient, statusHint } from './clockify.js';

function jsonResponse(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: { 'Content-Type': 'application/json' },
	});
}

function createClient(respond: (url: string, init?: RequestInit) => Promise<Response>) {
	const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => respond(String(input), init));
	const client = new ClockifyClient({ fetch: fetchMock, apiKey: async () => 'test-key' });
	return { client, fetchMock };
}

describe('ClockifyClient.postTimeEntry', () => {
	it('posts the entry and returns its id', async () => {
		const { client, fetchMock } = createClient(async () => jsonResponse({ id: 'entry-1' }, 201));

		const id = await client.postTimeEntry(
			'proj-a',
			new Date('2026-02-04T14:00:00Z'),
			new Date('2026-02-04T20:00:00Z'),
			'ws-1',
		);

		expect(id).toBe('entry-1');
		const [url, init] = fetchMock.mock.calls[0] ?? [];
		expect(url).toBe('https://api.clockify.me/api/v1/workspaces/ws-1/time-entries');
		expect(init?.method).toBe('POST');
		expect(init?.headers).toEqual({ 'X-Api-Key': 'test-key', 'Content-Type': 'application/json' });
		expect(JSON.parse(String(init?.body))).toEqual({
			projectId: 'proj-a',
			start: '2026-02-04T14:00:00.000Z',
			end: '2026-02-04T20:00:00.000Z',
			description: 'Development',
		});
	});

	it('explains failed statuses', async () => {
		const { client } = createClient(async () => jsonResponse({ message: 'nope' }, 401));

		const error = await client
			.postTimeEntry('proj-a', new Date('2026-02-04T14:00:00Z'), new Date('2026-02-04T20:00:00Z'), 'ws-1')
			.catch((caught: unknown) => caught);

		expect(error).toBeInstanceOf(ClockifyApiError);
		expect(error instanceof ClockifyApiError ? error.status : undefined).toBe(401);
		expect(error instanceof Error ? error.message : undefined).toBe(
			'Clockify API returned HTTP 401: check your API key',
		);
	});

	it('reports network failures', async () => {
		const { client } = createClient(async () => {
			throw new TypeError('fetch failed');
		});

		await expect(
			client.postTimeEntry('proj-a', new Date('2026-02-04T14:00:00Z'), new Date('2026-02-04T20:00:00Z'), 'ws-1'),
		).rejects.toThrow('Network error contacting Clockify: fetch failed');
	});

	it('rejects a response without an entry id', async () => {
		const { client } = createClient(async () => jsonResponse({ project: 'proj-a' }));

		await expect(
			client.postTimeEntry('proj-a', new Date('2026-02-04T14:00:00Z'), new Date('2026-02-04T20:00:00Z'), 'ws-1'),
		).rejects.toThrow('Clockify response did not include a time entry id');
	});

	it('fails before any request when the API key is missing', async () => {
		const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => jsonResponse({}));
		const client = new ClockifyClient({
			fetch: fetchMock,
			apiKey: async () => {
				throw new Error("secret 'clockify_api_key' not found");
			},
		});

		await expect(
			client.postTimeEntry('proj-a', new Date('2026-02-04T14:00:00Z'), new Date('2026-02-04T20:00:00Z'), 'ws-1'),
		).rejects.toThrow("secret 'clockify_api_key' not found");
		expect(fetchMock).not.toHaveBeenCalled();
	});
});

describe('ClockifyClient.listProjects', () => {
	it('follows pages until a short page', async () => {
		const fullPage = Array.from({ length: 50 }, (_, index) => ({
			id: `p-${index}`,
			name: `Project ${index}`,
			archived: false,
		}));
		const lastPage = [
			{ id: 'p-50', name: 'Project 50', archived: true },
			{ id: 'p-51', name: 'Project 51' },
		];
		const { client, fetchMock } = createClient(async (url) =>
			jsonResponse(url.endsWith('page=1') ? fullPage : lastPage),
		);

		const projects = await client.listProjects('ws-1');

		expect(projects).toHaveLength(52);
		expect(projects.slice(50)).toEqual([
			{ id: 'p-50', name: 'Project 50', archived: true },
			{ id: 'p-51', name: 'Project 51', archived: false },
		]);
		expect(fetchMock.mock.calls.map(([url]) => String(url))).toEqual([
			'https://api.clockify.me/api/v1/workspaces/ws-1/projects?page-size=50&page=1',
			'https://api.clockify.me/api/v1/workspaces/ws-1/projects?page-size=50&page=2',
		]);
	});

	it('stops after a single short page', async () => {
		const { client, fetchMock } = createClient(async () => jsonResponse([]));

		expect(await client.listProjects('ws-1')).toEqual([]);
		expect(fetchMock).toHaveBeenCalledTimes(1);
	});
});

describe('statusHint', () => {
	it('maps known statuses', () => {
		expect(statusHint(400)).toBe('invalid project ID or request parameters');
		expect(statusHint(403)).toBe('access forbidden - check workspace/project permissions');
		expect(statusHint(404)).toBe('project or workspace not found');
		expect(statusHint(422)).toBe('invalid request - check time range and project ID');
		expect(statusHint(500)).toBe('unexpected error');
	});
});
