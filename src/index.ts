import http from 'node:http';
import process from 'node:process';
import { getRequestListener } from '@hono/node-server';
import meow from 'meow';
import { createBigQueryBackend } from './backend/bigquery.js';
import { ConfigError, resolveConfig, type ServerConfig } from './config/index.js';
import { mcpPaths } from './http/app.js';
import { createServer } from './server.js';

function parseFlags(argv: string[]): ServerConfig {
	const cli = meow(`
	Usage
	  $ mcp-bigquery-server [options]

	Options
	  --project          BigQuery project id ($BQ_PROJECT_ID)
	  --location         BigQuery location, e.g. US ($BQ_LOCATION)
	  --key-file         Service account key file ($BQ_KEY_FILE)
	  --dataset          Dataset to expose, repeatable ($BQ_DATASETS, comma-separated)
	  --host             Interface to listen on (default 0.0.0.0)
	  --port             Port for HTTP and SSE ($PORT, default 8080)
	  --drain-timeout    Milliseconds a closing session may flush results ($MCP_DRAIN_TIMEOUT_MS, default 5000)

	Examples
	  $ mcp-bigquery-server --project my-project --location US
	  $ mcp-bigquery-server --project my-project --location EU --dataset sales --dataset ops --port 9000
`, {
		importMeta: import.meta,
		argv,
		flags: {
			project: {
				type: 'string',
			},
			location: {
				type: 'string',
			},
			keyFile: {
				type: 'string',
			},
			dataset: {
				type: 'string',
				isMultiple: true,
			},
			host: {
				type: 'string',
			},
			port: {
				type: 'number',
			},
			drainTimeout: {
				type: 'number',
			},
		},
	});

	return resolveConfig(cli.flags, process.env);
}

export async function main(argv: string[] = process.argv.slice(2)) {
	let config: ServerConfig;
	try {
		config = parseFlags(argv);
	} catch (error) {
		if (error instanceof ConfigError) {
			console.error(error.message);
			process.exit(1);
		}

		throw error;
	}

	const backend = createBigQueryBackend(config);
	const bridge = createServer({ backend, drainTimeoutMs: config.drainTimeoutMs });

	const server = http.createServer(getRequestListener(bridge.app.fetch));

	// Failing to accept connections is the one fault that ends the process
	server.on('error', error => {
		console.error('[mcp-bigquery] HTTP server error:', error.message);
		process.exit(1);
	});

	server.listen(config.port, config.host, () => {
		console.info(`[mcp-bigquery] Listening on http://${config.host}:${config.port}${mcpPaths.status} (SSE at ${mcpPaths.sse})`);
	});

	const stop = async (signal: NodeJS.Signals) => {
		console.info(`[mcp-bigquery] Received ${signal}, shutting down`);
		const closed = new Promise<void>(resolve => {
			server.close(() => {
				resolve();
			});
		});
		await bridge.shutdown();
		await closed;
	};

	for (const signal of [ 'SIGINT', 'SIGTERM' ] as const) {
		process.once(signal, () => {
			void stop(signal);
		});
	}
}
