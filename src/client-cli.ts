#!/usr/bin/env node
import process from 'node:process';
import { Command } from 'commander';
import { createClient, defaultServerUrl, type ClientResponse } from './client/index.js';

function print(response: ClientResponse) {
	if (response.ok) {
		console.log(JSON.stringify(response.body, null, 2));
		return;
	}

	console.error(`Request failed with HTTP ${response.status}:`);
	console.error(JSON.stringify(response.body, null, 2));
	process.exitCode = 1;
}

async function main(argv: string[] = process.argv): Promise<void> {
	const program = new Command();

	program
		.name('mcp-bigquery-client')
		.description('Call the MCP BigQuery server over its unary HTTP routes')
		.showHelpAfterError()
		.option('--list-tables', 'List all tables')
		.option('--describe-table <name>', 'Describe a table (format: dataset.table)')
		.option('--execute-query <sql>', 'Execute a SQL query')
		.option('--server-url <url>', 'Server URL', defaultServerUrl)
		.action(async (options: { listTables?: boolean; describeTable?: string; executeQuery?: string; serverUrl: string }) => {
			const client = createClient(options.serverUrl);

			if (options.listTables) {
				print(await client.listTables());
			} else if (options.describeTable) {
				print(await client.describeTable(options.describeTable));
			} else if (options.executeQuery) {
				print(await client.executeQuery(options.executeQuery));
			} else {
				program.help();
			}
		});

	await program.parseAsync(argv);
}

await main();
