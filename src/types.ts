export type TokenUsage = {
	input: number;
	output: number;
	cacheCreate: number;
	cacheRead: number;
};

export type ActivityEvent = {
	timestamp: Date;
	directory?: string;
	tokenUsage?: TokenUsage;
};

export type Session = {
	start: Date;
	end: Date;
	activeSeconds: number;
	project: string;
	inputTokens: number;
	outputTokens: number;
	cacheCreationTokens: number;
	cacheReadTokens: number;
};

export type Allocation = {
	destinationId: string;
	start: Date;
	end: Date;
};

export type AllocationResult = {
	allocations: Allocation[];
	skipped: string[];
};

export type SyncConfig = {
	workspaceId: string;
	workDayStart: string;
	workDayEnd: string;
	projectMapping: Map<string, string>;
	otherProjectId?: string;
};

export type AppConfig = {
	idleTimeoutMinutes: number;
	databasePath: string;
	sync?: SyncConfig;
};

export type SyncedEntry = {
	destinationId: string;
	entryId: string;
};

export type SyncSummary = {
	days: number;
	entries: number;
};
