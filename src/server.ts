import type { Hono } from 'hono';
import type { Implementation } from '@modelcontextprotocol/sdk/types.js';
import { type BackendCapability } from './backend/types.js';
import { defaultDrainTimeoutMs } from './config/index.js';
import { createApp, mcpPaths } from './http/app.js';
import { createDispatcher, type Dispatcher } from './mcp/dispatch.js';
import { createRpcHandler } from './mcp/rpc.js';
import { createSessionManager, type SessionManager } from './mcp/session.js';
import { registerBigQueryTools } from './mcp/tools/bigquery.js';
import { createToolRegistry, type ToolRegistry } from './mcp/tools/index.js';

export const serverInfo: Implementation = { name: 'bigquery', version: '0.3.0' };

export type BridgeServerOptions = {
	backend: BackendCapability;
	drainTimeoutMs?: number;
};

export type BridgeServer = {
	app: Hono;
	registry: ToolRegistry;
	dispatcher: Dispatcher;
	sessions: SessionManager;
	/** Closes every session, then releases the backend. Safe to call twice. */
	shutdown: () => Promise<void>;
};

/**
 * Wires registry, dispatcher, session manager and HTTP routes around one
 * backend handle. Tools are registered before the app exists, so the registry
 * is never written while requests are served.
 */
export function createServer({ backend, drainTimeoutMs = defaultDrainTimeoutMs }: BridgeServerOptions): BridgeServer {
	const registry = createToolRegistry();
	registerBigQueryTools(registry, backend);

	const dispatcher = createDispatcher(registry);
	const sessions = createSessionManager({
		handler: createRpcHandler({ registry, dispatcher, serverInfo }),
		messagesPath: `${mcpPaths.messages}/`,
		drainTimeoutMs,
	});
	const app = createApp({ dispatcher, sessions });

	let stopping: Promise<void> | undefined;
	const shutdown = async () => {
		stopping ??= (async () => {
			await sessions.closeAll('server shutdown');
			await backend.close?.();
		})();
		return stopping;
	};

	return {
		app, registry, dispatcher, sessions, shutdown,
	};
}
