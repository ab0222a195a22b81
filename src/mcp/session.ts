import { randomUUID } from 'node:crypto';
import invariant from 'invariant';
import { isJSONRPCRequest, type JSONRPCMessage } from '@modelcontextprotocol/sdk/types.js';
import { SessionNotFoundError, TransportError, errorMessage } from '../errors.js';
import { type RpcHandler } from './rpc.js';

export type SessionState = 'open' | 'closing' | 'closed';

export type Frame = {
	event: string;
	data: string;
};

/** Writes one frame onto the client's stream. Rejects when the connection is gone. */
export type FrameSink = (frame: Frame) => Promise<void>;

export type SessionManagerOptions = {
	handler: RpcHandler;
	/** Path clients post messages to; the session id is appended as a query parameter. */
	messagesPath: string;
	/** How long a closing session may keep flushing results before they are dropped. */
	drainTimeoutMs: number;
};

const cancelled = Symbol('cancelled');

export type Session = {
	readonly id: string;
	readonly state: SessionState;
	/** Settles once the writer has stopped; nothing is written to the sink after that. */
	readonly finished: Promise<void>;
	/**
	 * Reserves the next outbound slot for a reply that is still being computed.
	 * Replies are written in the order they were enqueued, whatever order they
	 * complete in.
	 */
	enqueue: (reply: Promise<Frame | undefined>) => void;
	/**
	 * Stops accepting input, lets the writer flush for up to `drainTimeoutMs`,
	 * then cancels it. Calling it again returns the same promise.
	 */
	close: (reason: string, drainTimeoutMs: number) => Promise<void>;
};

function createSession(id: string, sink: FrameSink, onWriteFailure: (error: TransportError) => void): Session {
	let state: SessionState = 'open';
	// One slot per accepted message, in acceptance order
	const outbound: Array<Promise<Frame | undefined>> = [];
	let wakeWriter: (() => void) | undefined;
	let closing: Promise<void> | undefined;

	let cancelWriter: () => void = () => undefined;
	const writerCancelled = new Promise<typeof cancelled>(resolve => {
		cancelWriter = () => {
			resolve(cancelled);
		};
	});

	async function waitForWork(): Promise<void> {
		await new Promise<void>(resolve => {
			wakeWriter = resolve;
		});
		wakeWriter = undefined;
	}

	// Single writer: the only place that touches the sink
	async function drain(): Promise<void> {
		while (state !== 'closed') {
			const next = outbound[0];
			if (next === undefined) {
				if (state === 'closing') {
					return;
				}

				// eslint-disable-next-line no-await-in-loop
				await Promise.race([ waitForWork(), writerCancelled ]);
				continue;
			}

			// eslint-disable-next-line no-await-in-loop
			const frame = await Promise.race([ next, writerCancelled ]);
			if (frame === cancelled) {
				return;
			}

			outbound.shift();
			if (frame === undefined) {
				continue;
			}

			try {
				// eslint-disable-next-line no-await-in-loop
				if (await Promise.race([ sink(frame), writerCancelled ]) === cancelled) {
					return;
				}
			} catch (error) {
				onWriteFailure(new TransportError(`Write failed: ${errorMessage(error)}`, { sessionId: id }, { cause: error }));
				return;
			}
		}
	}

	const writer = drain();

	async function shutdown(reason: string, drainTimeoutMs: number): Promise<void> {
		state = 'closing';
		wakeWriter?.();
		console.debug(`[mcp-bigquery-session] Closing session ${id}: ${reason}`);

		let timer: ReturnType<typeof setTimeout> | undefined;
		const timeout = new Promise<'timeout'>(resolve => {
			timer = setTimeout(() => {
				resolve('timeout');
			}, drainTimeoutMs);
		});

		try {
			await Promise.race([ writer, timeout ]);
		} finally {
			clearTimeout(timer);
		}

		state = 'closed';
		cancelWriter();
		await writer;

		const discarded = outbound.length;
		outbound.length = 0;
		if (discarded > 0) {
			console.warn(`[mcp-bigquery-session] Discarded ${discarded} pending result(s) for session ${id}`);
		}
	}

	return {
		id,
		get state() {
			return state;
		},
		finished: writer,
		enqueue(reply) {
			invariant(state === 'open', 'Cannot enqueue on a session that is not open');

			outbound.push(reply.catch((error: unknown) => {
				console.error(`[mcp-bigquery-session] Dropping reply for session ${id}:`, errorMessage(error));
				return undefined;
			}));
			wakeWriter?.();
		},
		async close(reason, drainTimeoutMs) {
			closing ??= shutdown(reason, drainTimeoutMs);
			return closing;
		},
	};
}

export type SessionManager = {
	readonly size: number;
	/**
	 * Opens a session over a fresh stream. The first frame tells the client
	 * where to post its messages.
	 */
	open: (sink: FrameSink) => Session;
	/** Throws `SessionNotFoundError` unless the session exists and is open. */
	get: (sessionId: string) => Session;
	/**
	 * Accepts one inbound message for a session. Handling starts at once; a
	 * request's reply goes out after every reply accepted before it.
	 * Notifications get no reply and take no slot.
	 */
	submit: (sessionId: string, message: JSONRPCMessage) => void;
	close: (sessionId: string, reason: string) => Promise<void>;
	closeAll: (reason: string) => Promise<void>;
};

export function createSessionManager({ handler, messagesPath, drainTimeoutMs }: SessionManagerOptions): SessionManager {
	const sessions = new Map<string, Session>();

	async function reply(message: JSONRPCMessage): Promise<Frame | undefined> {
		const response = await handler(message);
		if (!response) {
			return undefined;
		}

		return { event: 'message', data: JSON.stringify(response) };
	}

	function get(sessionId: string): Session {
		const session = sessions.get(sessionId);
		if (session?.state !== 'open') {
			throw new SessionNotFoundError(sessionId);
		}

		return session;
	}

	async function close(sessionId: string, reason: string): Promise<void> {
		const session = sessions.get(sessionId);
		if (!session) {
			return;
		}

		try {
			await session.close(reason, drainTimeoutMs);
		} finally {
			sessions.delete(sessionId);
		}

		console.debug(`[mcp-bigquery-session] Closed session ${sessionId}`);
	}

	return {
		get size() {
			return sessions.size;
		},

		open(sink) {
			const id = randomUUID().replaceAll('-', '');
			invariant(!sessions.has(id), 'Session id collision');

			const session = createSession(id, sink, error => {
				console.error(`[mcp-bigquery-session] ${error.message}`);
				void close(id, 'write failed');
			});
			sessions.set(id, session);
			session.enqueue(Promise.resolve({
				event: 'endpoint',
				data: `${messagesPath}?session_id=${id}`,
			}));

			console.debug(`[mcp-bigquery-session] Opened session ${id}`);
			return session;
		},

		get,

		submit(sessionId, message) {
			const session = get(sessionId);
			if (!isJSONRPCRequest(message)) {
				void (async () => {
					try {
						await handler(message);
					} catch (error) {
						console.error(`[mcp-bigquery-session] Failed to handle message for session ${sessionId}:`, errorMessage(error));
					}
				})();
				return;
			}

			session.enqueue(reply(message));
		},

		close,

		async closeAll(reason) {
			await Promise.all([ ...sessions.keys() ].map(async id => close(id, reason)));
		},
	};
}
