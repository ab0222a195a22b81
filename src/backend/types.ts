export type Row = Record<string, unknown>;

/**
 * Data access the tools call into. One instance is shared by every request, so
 * implementations must tolerate concurrent calls.
 */
export type BackendCapability = {
	listTables: () => Promise<string[]>;
	/** Accepts `dataset.table` only. */
	describeTable: (qualifiedName: string) => Promise<Row[]>;
	/** The query text is forwarded verbatim. */
	executeQuery: (query: string) => Promise<Row[]>;
	close?: () => Promise<void>;
};
