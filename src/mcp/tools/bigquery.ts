import { z } from 'zod';
import { type BackendCapability } from '../../backend/types.js';
import { parseQualifiedTableName } from '../../backend/table-name.js';
import { type ToolRegistry } from './index.js';

const executeQueryArgumentsSchema = z.strictObject({
	query: z.string(),
});

const listTablesArgumentsSchema = z.strictObject({});

const describeTableArgumentsSchema = z.strictObject({
	table_name: z.string(),
});

export function registerBigQueryTools(registry: ToolRegistry, backend: BackendCapability) {
	registry.register({
		definition: {
			name: 'execute_query',
			description: 'Execute a SELECT query on the BigQuery database.',
			inputSchema: {
				type: 'object',
				properties: {
					query: { type: 'string', description: 'SQL query text, forwarded to BigQuery as is' },
				},
				required: [ 'query' ],
			},
		},
		argumentsSchema: executeQueryArgumentsSchema,
		async handle({ query }) {
			return backend.executeQuery(query);
		},
	});

	registry.register({
		definition: {
			name: 'list_tables',
			description: 'List all tables in the BigQuery database.',
			inputSchema: {
				type: 'object',
				properties: {},
			},
		},
		argumentsSchema: listTablesArgumentsSchema,
		async handle() {
			return backend.listTables();
		},
	});

	registry.register({
		definition: {
			name: 'describe_table',
			description: 'Get the schema information for a specific table.',
			inputSchema: {
				type: 'object',
				properties: {
					table_name: { type: 'string', description: 'Table to describe, as dataset.table' },
				},
				required: [ 'table_name' ],
			},
		},
		argumentsSchema: describeTableArgumentsSchema,
		async handle({ table_name: tableName }) {
			// Malformed names never reach the backend
			parseQualifiedTableName(tableName);
			return backend.describeTable(tableName);
		},
	});
}
