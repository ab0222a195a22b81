import { InvalidArgumentError } from '../errors.js';

export type QualifiedTableName = {
	datasetId: string;
	tableId: string;
};

// Dataset ids are spliced into SQL, table ids are bound as a parameter
const datasetIdPattern = /^\w+$/;
const tableIdPattern = /^[\w-]+$/;

export function parseQualifiedTableName(name: string): QualifiedTableName {
	const parts = name.split('.');
	if (parts.length !== 2) {
		throw new InvalidArgumentError(`Invalid table name: ${name}`, { tableName: name });
	}

	const [ datasetId, tableId ] = parts;
	if (!datasetIdPattern.test(datasetId) || !tableIdPattern.test(tableId)) {
		throw new InvalidArgumentError(`Invalid table name: ${name}`, { tableName: name });
	}

	return { datasetId, tableId };
}
