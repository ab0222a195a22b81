import { parseJson } from '../utils.js';

export const defaultServerUrl = 'http://localhost:8080';

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export type ClientResponse = {
	ok: boolean;
	status: number;
	body: unknown;
};

export type BigQueryBridgeClient = {
	listTables: () => Promise<ClientResponse>;
	describeTable: (tableName: string) => Promise<ClientResponse>;
	executeQuery: (query: string) => Promise<ClientResponse>;
};

async function readBody(response: Response): Promise<unknown> {
	const text = await response.text();
	try {
		return parseJson(text);
	} catch {
		// Not JSON, hand the text back as is
		return text;
	}
}

export function createClient(serverUrl: string = defaultServerUrl, fetchFn: FetchFn = fetch): BigQueryBridgeClient {
	const baseUrl = serverUrl.replace(/\/+$/, '');

	async function request(path: string, body?: Record<string, unknown>): Promise<ClientResponse> {
		const response = await fetchFn(`${baseUrl}${path}`, body === undefined ? { method: 'GET' } : {
			method: 'POST',
			headers: { 'Content-Type': 'application/json' },
			body: JSON.stringify(body),
		});

		return { ok: response.ok, status: response.status, body: await readBody(response) };
	}

	return {
		async listTables() {
			return request('/list-tables');
		},
		async describeTable(tableName) {
			return request('/describe-table', { table_name: tableName });
		},
		async executeQuery(query) {
			return request('/execute-query', { query });
		},
	};
}
