import { BigQuery, type Query } from '@google-cloud/bigquery';
import {
	BackendQueryError, BackendUnavailableError, type BackendError, errorMessage,
} from '../errors.js';
import { isErrnoException } from '../utils.js';
import { parseQualifiedTableName } from './table-name.js';
import { type BackendCapability, type Row } from './types.js';

export type BigQueryBackendOptions = {
	project: string;
	location: string;
	keyFile?: string;
	datasets: string[];
};

/**
 * The slice of the BigQuery client the backend needs. Kept narrow so tests can
 * substitute a stub.
 */
export type BigQueryClient = {
	query: (query: string, params?: Record<string, unknown>) => Promise<Row[]>;
	listDatasetIds: () => Promise<string[]>;
	listTableIds: (datasetId: string) => Promise<string[]>;
};

const unavailableErrorCodes = new Set([ 'ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT', 'EAI_AGAIN' ]);

/** INT64 values wider than a double keep every digit. */
export function castInteger(value: string): bigint {
	return BigInt(value);
}

export function buildQueryOptions(query: string, location: string, params?: Record<string, unknown>): Query {
	return {
		query,
		location,
		params,
		wrapIntegers: { integerTypeCastFunction: castInteger },
	};
}

export function createBigQueryClient(options: BigQueryBackendOptions): BigQueryClient {
	const bigquery = new BigQuery({
		projectId: options.project,
		location: options.location,
		keyFilename: options.keyFile,
		scopes: [ 'https://www.googleapis.com/auth/cloud-platform' ],
	});

	return {
		async query(query, params) {
			const [ rows ] = await bigquery.query(buildQueryOptions(query, options.location, params));
			return rows;
		},
		async listDatasetIds() {
			const [ datasets ] = await bigquery.getDatasets();
			return datasets.flatMap(dataset => dataset.id ? [ dataset.id ] : []);
		},
		async listTableIds(datasetId) {
			const [ tables ] = await bigquery.dataset(datasetId).getTables();
			return tables.flatMap(table => table.id ? [ table.id ] : []);
		},
	};
}

function toBackendError(error: unknown, context: Record<string, unknown>): BackendError {
	if (isErrnoException(error) && error.code && unavailableErrorCodes.has(error.code)) {
		return new BackendUnavailableError(`BigQuery unavailable: ${error.message}`, context, { cause: error });
	}

	return new BackendQueryError(errorMessage(error), context, { cause: error });
}

export function createBigQueryBackend(options: BigQueryBackendOptions, client?: BigQueryClient): BackendCapability {
	if (!options.project) {
		throw new Error('Project is required');
	}

	if (!options.location) {
		throw new Error('Location is required');
	}

	console.info(`[mcp-bigquery] Initializing BigQuery client for project: ${options.project}, location: ${options.location}, key file: ${options.keyFile ?? '(default credentials)'}`);
	const bigquery = client ?? createBigQueryClient(options);
	const { datasets } = options;

	async function query(text: string, params?: Record<string, unknown>): Promise<Row[]> {
		console.debug(`[mcp-bigquery] Executing query: ${text}`);
		try {
			const rows = await bigquery.query(text, params);
			console.debug(`[mcp-bigquery] Query returned ${rows.length} rows`);
			return rows;
		} catch (error) {
			console.error('[mcp-bigquery] Database error executing query:', errorMessage(error));
			throw toBackendError(error, { operation: 'query', query: text });
		}
	}

	return {
		async executeQuery(text) {
			return query(text);
		},

		async listTables() {
			let datasetIds: string[];
			try {
				datasetIds = datasets.length > 0 ? datasets : await bigquery.listDatasetIds();
			} catch (error) {
				throw toBackendError(error, { operation: 'listTables' });
			}

			console.debug(`[mcp-bigquery] Found ${datasetIds.length} datasets`);

			const tables: string[] = [];
			for (const datasetId of datasetIds) {
				let tableIds: string[];
				try {
					// eslint-disable-next-line no-await-in-loop
					tableIds = await bigquery.listTableIds(datasetId);
				} catch (error) {
					throw toBackendError(error, { operation: 'listTables', datasetId });
				}

				tables.push(...tableIds.map(tableId => `${datasetId}.${tableId}`));
			}

			console.debug(`[mcp-bigquery] Found ${tables.length} tables`);
			return tables;
		},

		async describeTable(qualifiedName) {
			const { datasetId, tableId } = parseQualifiedTableName(qualifiedName);
			const text = [
				'SELECT ddl',
				`FROM \`${datasetId}\`.INFORMATION_SCHEMA.TABLES`,
				'WHERE table_name = @table_name',
			].join('\n');

			return query(text, { table_name: tableId });
		},
	};
}
