import {
	CallToolRequestSchema,
	ErrorCode,
	InitializeRequestSchema,
	isJSONRPCRequest,
	LATEST_PROTOCOL_VERSION,
	SUPPORTED_PROTOCOL_VERSIONS,
	type CallToolResult,
	type Implementation,
	type JSONRPCMessage,
	type JSONRPCRequest,
	type RequestId,
} from '@modelcontextprotocol/sdk/types.js';
import { type Dispatcher } from './dispatch.js';
import { type InvocationResult } from './protocol.js';
import { type ToolRegistry } from './tools/index.js';

/**
 * Handles one inbound MCP message. Resolves to the reply, or to `undefined`
 * for messages that get none (notifications, client responses).
 */
export type RpcHandler = (message: JSONRPCMessage) => Promise<JSONRPCMessage | undefined>;

export type RpcHandlerOptions = {
	registry: ToolRegistry;
	dispatcher: Dispatcher;
	serverInfo: Implementation;
};

export function toCallToolResult(result: InvocationResult): CallToolResult {
	if (result.type === 'success') {
		return { content: [ { type: 'text', text: result.payload } ] };
	}

	return { content: [ { type: 'text', text: result.message } ], isError: true };
}

function errorReply(id: RequestId, code: ErrorCode, message: string): JSONRPCMessage {
	return {
		jsonrpc: '2.0', id, error: { code, message },
	};
}

function resultReply(id: RequestId, result: Record<string, unknown>): JSONRPCMessage {
	return { jsonrpc: '2.0', id, result };
}

export function createRpcHandler({ registry, dispatcher, serverInfo }: RpcHandlerOptions): RpcHandler {
	async function handleRequest(request: JSONRPCRequest): Promise<JSONRPCMessage> {
		switch (request.method) {
			case 'initialize': {
				const parsed = InitializeRequestSchema.safeParse(request);
				if (!parsed.success) {
					return errorReply(request.id, ErrorCode.InvalidParams, 'Invalid initialize params');
				}

				const requested = parsed.data.params.protocolVersion;
				return resultReply(request.id, {
					protocolVersion: SUPPORTED_PROTOCOL_VERSIONS.includes(requested) ? requested : LATEST_PROTOCOL_VERSION,
					capabilities: { tools: {} },
					serverInfo,
				});
			}

			case 'ping': {
				return resultReply(request.id, {});
			}

			case 'tools/list': {
				return resultReply(request.id, { tools: registry.list() });
			}

			case 'tools/call': {
				const parsed = CallToolRequestSchema.safeParse(request);
				if (!parsed.success) {
					return errorReply(request.id, ErrorCode.InvalidParams, 'Invalid tools/call params');
				}

				const result = await dispatcher.dispatch({
					toolName: parsed.data.params.name,
					arguments: parsed.data.params.arguments ?? {},
					requestId: request.id,
				});
				return resultReply(request.id, toCallToolResult(result));
			}

			default: {
				return errorReply(request.id, ErrorCode.MethodNotFound, `Method not found: ${request.method}`);
			}
		}
	}

	return async message => {
		if (!isJSONRPCRequest(message)) {
			return undefined;
		}

		return handleRequest(message);
	};
}
