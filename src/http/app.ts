import { randomUUID } from 'node:crypto';
import { Hono, type Context } from 'hono';
import { streamSSE } from 'hono/streaming';
import { JSONRPCMessageSchema } from '@modelcontextprotocol/sdk/types.js';
import {
	BridgeError, MalformedRequestError, SessionNotFoundError, UnknownToolError, errorMessage,
} from '../errors.js';
import { type Dispatcher } from '../mcp/dispatch.js';
import { unaryCallBodySchema } from '../mcp/protocol.js';
import { type SessionManager } from '../mcp/session.js';
import { parseJson } from '../utils.js';

export const mcpPaths = {
	status: '/mcp',
	sse: '/mcp/sse',
	messages: '/mcp/messages',
	call: '/mcp/call',
} as const;

export type AppOptions = {
	dispatcher: Dispatcher;
	sessions: SessionManager;
};

function errorStatus(error: BridgeError): 400 | 404 | 500 | 502 {
	if (error instanceof UnknownToolError || error instanceof SessionNotFoundError) {
		return 404;
	}

	switch (error.kind) {
		case 'protocol':
		case 'validation': {
			return 400;
		}

		case 'backend': {
			return 502;
		}

		case 'transport': {
			return 500;
		}
	}
}

async function readJsonBody(c: Context): Promise<unknown> {
	const text = await c.req.text();
	try {
		return parseJson(text);
	} catch (error) {
		throw new MalformedRequestError('Request body is not valid JSON', {}, { cause: error });
	}
}

async function readArgumentsBody(c: Context): Promise<Record<string, unknown>> {
	const body = await readJsonBody(c);
	if (typeof body !== 'object' || body === null || Array.isArray(body)) {
		throw new MalformedRequestError('Request body must be a JSON object');
	}

	return { ...body };
}

export function createApp({ dispatcher, sessions }: AppOptions): Hono {
	const app = new Hono({ strict: false });

	async function invoke(c: Context, toolName: string, args: Record<string, unknown>) {
		const result = await dispatcher.dispatch({ toolName, arguments: args, requestId: randomUUID() });
		if (result.type === 'success') {
			return c.body(result.payload, 200, { 'Content-Type': 'application/json; charset=UTF-8' });
		}

		return c.json({ error: result.message }, errorStatus(result.error));
	}

	app.onError((error, c) => {
		if (error instanceof BridgeError) {
			return c.json({ error: error.message }, errorStatus(error));
		}

		console.error('[mcp-bigquery] Unhandled error:', errorMessage(error));
		return c.json({ error: 'Internal Server Error' }, 500);
	});

	app.get(mcpPaths.status, c => c.json({
		status: 'ok',
		message: 'MCP BigQuery server is running.',
		sse_endpoint: mcpPaths.sse,
	}));

	app.get(mcpPaths.sse, c => streamSSE(c, async stream => {
		const session = sessions.open(async frame => {
			if (stream.aborted) {
				throw new Error('Stream aborted');
			}

			await stream.writeSSE(frame);
		});

		stream.onAbort(() => {
			void sessions.close(session.id, 'client disconnected');
		});

		await session.finished;
	}));

	// Sessions announce the trailing-slash form; `strict: false` accepts both
	app.post(mcpPaths.messages, async c => {
		const sessionId = c.req.query('session_id');
		if (!sessionId) {
			throw new MalformedRequestError('session_id is required');
		}

		// Fail fast before reading the body
		sessions.get(sessionId);

		const parsed = JSONRPCMessageSchema.safeParse(await readJsonBody(c));
		if (!parsed.success) {
			throw new MalformedRequestError('Could not parse message');
		}

		sessions.submit(sessionId, parsed.data);
		return c.text('Accepted', 202);
	});

	app.post(mcpPaths.call, async c => {
		const parsed = unaryCallBodySchema.safeParse(await readJsonBody(c));
		if (!parsed.success) {
			throw new MalformedRequestError('Request body must be {"toolName": string, "arguments"?: object}');
		}

		return invoke(c, parsed.data.toolName, parsed.data.arguments ?? {});
	});

	app.get('/list-tables', async c => invoke(c, 'list_tables', {}));

	app.post('/describe-table', async c => invoke(c, 'describe_table', await readArgumentsBody(c)));

	app.post('/execute-query', async c => invoke(c, 'execute_query', await readArgumentsBody(c)));

	return app;
}
