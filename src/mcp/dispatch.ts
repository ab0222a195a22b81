import { errorMessage, toBridgeError } from '../errors.js';
import { type InvocationRequest, type InvocationResult, serializePayload } from './protocol.js';
import { type ToolRegistry } from './tools/index.js';

export type Dispatcher = {
	/**
	 * Never rejects: every outcome, including unknown tools, invalid arguments
	 * and backend failures, comes back as a result.
	 */
	dispatch: (request: InvocationRequest) => Promise<InvocationResult>;
};

export function createDispatcher(registry: ToolRegistry): Dispatcher {
	async function dispatch(request: InvocationRequest): Promise<InvocationResult> {
		const { toolName, requestId } = request;

		try {
			const tool = registry.lookup(toolName);
			const run = tool.prepare(request.arguments);
			const output = await run();

			return {
				type: 'success',
				requestId,
				payload: serializePayload(output),
			};
		} catch (error) {
			const bridgeError = toBridgeError(error);
			if (bridgeError.kind === 'backend') {
				console.error(`[mcp-bigquery] Tool ${toolName} failed:`, errorMessage(error));
			}

			return {
				type: 'failure',
				requestId,
				message: bridgeError.message,
				error: bridgeError,
			};
		}
	}

	return { dispatch };
}
