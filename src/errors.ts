export type BridgeErrorKind = 'protocol' | 'validation' | 'backend' | 'transport';

export abstract class BridgeError extends Error {
	abstract readonly kind: BridgeErrorKind;

	constructor(
		message: string,
		public readonly context: Record<string, unknown> = {},
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = new.target.name;
	}
}

// Client-caused, never retried

export class ProtocolError extends BridgeError {
	readonly kind = 'protocol';
}

export class MalformedRequestError extends ProtocolError {}

export class UnknownToolError extends ProtocolError {
	constructor(public readonly toolName: string) {
		super(`Unknown tool: ${toolName}`, { toolName });
	}
}

export class DuplicateToolError extends ProtocolError {
	constructor(public readonly toolName: string) {
		super(`Tool already registered: ${toolName}`, { toolName });
	}
}

export class SessionNotFoundError extends ProtocolError {
	constructor(public readonly sessionId: string) {
		super('Could not find session', { sessionId });
	}
}

export class ValidationError extends BridgeError {
	readonly kind = 'validation';
}

export class InvalidArgumentError extends ValidationError {}

export class BackendError extends BridgeError {
	readonly kind = 'backend';
}

export class BackendUnavailableError extends BackendError {}

export class BackendQueryError extends BackendError {}

/**
 * Connection dropped or a write failed. Never reported to the client, which is
 * unreachable by then.
 */
export class TransportError extends BridgeError {
	readonly kind = 'transport';
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Anything thrown past a tool handler that is not already tagged came from the
 * backend side of the bridge.
 */
export function toBridgeError(error: unknown): BridgeError {
	if (error instanceof BridgeError) {
		return error;
	}

	return new BackendError(errorMessage(error), {}, { cause: error });
}
