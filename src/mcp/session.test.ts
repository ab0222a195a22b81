import test from 'ava';
import sinon from 'sinon';
import { isJSONRPCRequest, type JSONRPCMessage } from '@modelcontextprotocol/sdk/types.js';
import { SessionNotFoundError } from '../errors.js';
import { createSessionManager, type Frame, type FrameSink } from './session.js';

type Reply = JSONRPCMessage | undefined;

function deferred<T>() {
	let resolve: (value: T) => void = () => undefined;
	const promise = new Promise<T>(r => {
		resolve = r;
	});
	return { promise, resolve };
}

async function waitFor(condition: () => boolean): Promise<void> {
	while (!condition()) {
		// eslint-disable-next-line no-await-in-loop
		await new Promise(resolve => {
			setImmediate(resolve);
		});
	}
}

function ping(id: number): JSONRPCMessage {
	return { jsonrpc: '2.0', id, method: 'ping' };
}

function pong(id: number): JSONRPCMessage {
	return { jsonrpc: '2.0', id, result: {} };
}

function createManager(drainTimeoutMs = 1000) {
	const handler = sinon.stub<[JSONRPCMessage], Promise<Reply>>();
	handler.callsFake(async message => isJSONRPCRequest(message) ? { jsonrpc: '2.0', id: message.id, result: {} } : undefined);
	const manager = createSessionManager({ handler, messagesPath: '/mcp/messages/', drainTimeoutMs });
	return { handler, manager };
}

function createSink() {
	const frames: Frame[] = [];
	const sink: FrameSink = async frame => {
		frames.push(frame);
	};

	return { frames, sink };
}

function messageFrames(frames: Frame[]): unknown[] {
	return frames.filter(frame => frame.event === 'message').map((frame): unknown => JSON.parse(frame.data));
}

const warn = sinon.stub(console, 'warn');
sinon.stub(console, 'debug');
sinon.stub(console, 'error');

test.after.always(() => {
	sinon.restore();
});

test('the first frame announces where to post messages', async t => {
	const { manager } = createManager();
	const { frames, sink } = createSink();

	const session = manager.open(sink);
	await waitFor(() => frames.length === 1);

	t.regex(session.id, /^[\da-f]{32}$/);
	t.deepEqual(frames, [ { event: 'endpoint', data: `/mcp/messages/?session_id=${session.id}` } ]);
	t.is(session.state, 'open');
	t.is(manager.size, 1);

	await manager.closeAll('test done');
});

test('replies are written in submission order whatever order they complete in', async t => {
	const { handler, manager } = createManager();
	const { frames, sink } = createSink();
	const slow = deferred<Reply>();
	const fast = deferred<Reply>();
	handler.onFirstCall().returns(slow.promise);
	handler.onSecondCall().returns(fast.promise);

	const session = manager.open(sink);
	manager.submit(session.id, ping(1));
	manager.submit(session.id, ping(2));

	// Both are being handled concurrently
	t.is(handler.callCount, 2);

	fast.resolve(pong(2));
	await new Promise(resolve => {
		setImmediate(resolve);
	});
	t.deepEqual(messageFrames(frames), []);

	slow.resolve(pong(1));
	await waitFor(() => frames.length === 3);

	t.deepEqual(messageFrames(frames), [ pong(1), pong(2) ]);

	await manager.closeAll('test done');
});

test('messages without a reply do not hold up later replies', async t => {
	const { manager } = createManager();
	const { frames, sink } = createSink();

	const session = manager.open(sink);
	manager.submit(session.id, { jsonrpc: '2.0', method: 'notifications/initialized' });
	manager.submit(session.id, ping(1));
	await waitFor(() => frames.length === 2);

	t.deepEqual(messageFrames(frames), [ pong(1) ]);

	await manager.closeAll('test done');
});

test('a notification that never settles does not hold up replies', async t => {
	const { handler, manager } = createManager(0);
	const { frames, sink } = createSink();
	handler.onFirstCall().returns(new Promise<Reply>(() => undefined));

	const session = manager.open(sink);
	manager.submit(session.id, { jsonrpc: '2.0', method: 'notifications/initialized' });
	manager.submit(session.id, ping(1));
	await waitFor(() => frames.length === 2);

	t.is(handler.callCount, 2);
	t.deepEqual(messageFrames(frames), [ pong(1) ]);

	await manager.close(session.id, 'test done');
	t.false(warn.getCalls().some(call => String(call.args[0]).includes(session.id)));
});

test('submitting to an unknown session fails', t => {
	const { manager } = createManager();

	t.throws(() => {
		manager.submit('0123456789abcdef0123456789abcdef', ping(1));
	}, { instanceOf: SessionNotFoundError, message: 'Could not find session' });
});

test('a closed session rejects new messages and is forgotten', async t => {
	const { manager } = createManager();
	const { sink } = createSink();

	const session = manager.open(sink);
	await manager.close(session.id, 'client disconnected');

	t.is(session.state, 'closed');
	t.is(manager.size, 0);
	t.throws(() => {
		manager.submit(session.id, ping(1));
	}, { instanceOf: SessionNotFoundError });
});

test('closing lets in-flight replies drain', async t => {
	const { handler, manager } = createManager(1000);
	const { frames, sink } = createSink();
	const reply = deferred<Reply>();
	handler.onFirstCall().returns(reply.promise);

	const session = manager.open(sink);
	manager.submit(session.id, ping(1));

	const closing = manager.close(session.id, 'server shutdown');
	t.is(session.state, 'closing');
	t.throws(() => {
		manager.submit(session.id, ping(2));
	}, { instanceOf: SessionNotFoundError });

	reply.resolve(pong(1));
	await closing;

	t.is(session.state, 'closed');
	t.deepEqual(messageFrames(frames), [ pong(1) ]);
});

test.serial('closing drops replies still pending after the drain period', async t => {
	const { handler, manager } = createManager(10);
	const { frames, sink } = createSink();
	const reply = deferred<Reply>();
	handler.onFirstCall().returns(reply.promise);

	const session = manager.open(sink);
	manager.submit(session.id, ping(1));
	await manager.close(session.id, 'server shutdown');

	t.is(session.state, 'closed');
	t.true(warn.calledWith(`[mcp-bigquery-session] Discarded 1 pending result(s) for session ${session.id}`));

	// The in-flight call still finishes, but nothing is written
	reply.resolve(pong(1));
	await new Promise(resolve => {
		setImmediate(resolve);
	});
	t.deepEqual(messageFrames(frames), []);
});

test('closing one session leaves the others running', async t => {
	const { handler, manager } = createManager(0);
	const first = createSink();
	const second = createSink();
	const stuck = deferred<Reply>();
	handler.onFirstCall().returns(stuck.promise);

	const firstSession = manager.open(first.sink);
	const secondSession = manager.open(second.sink);
	manager.submit(firstSession.id, ping(1));
	manager.submit(secondSession.id, ping(2));

	await t.notThrowsAsync(manager.close(firstSession.id, 'client disconnected'));
	stuck.resolve(pong(1));

	await waitFor(() => second.frames.length === 2);
	t.deepEqual(messageFrames(second.frames), [ pong(2) ]);
	t.is(secondSession.state, 'open');
	manager.submit(secondSession.id, ping(3));
	await waitFor(() => second.frames.length === 3);
	t.deepEqual(messageFrames(second.frames), [ pong(2), pong(3) ]);

	await manager.closeAll('test done');
});

test('a failed write closes the session', async t => {
	const { manager } = createManager();
	let writes = 0;
	const session = manager.open(async () => {
		writes++;
		if (writes > 1) {
			throw new Error('socket closed');
		}
	});

	manager.submit(session.id, ping(1));
	await session.finished;
	await waitFor(() => manager.size === 0);

	t.is(session.state, 'closed');
	t.is(writes, 2);
});

test('closeAll closes every session', async t => {
	const { manager } = createManager();
	const sessions = [ manager.open(createSink().sink), manager.open(createSink().sink) ];

	await manager.closeAll('server shutdown');

	t.deepEqual(sessions.map(session => session.state), [ 'closed', 'closed' ]);
	t.is(manager.size, 0);
});

test('closing twice is harmless', async t => {
	const { manager } = createManager();
	const session = manager.open(createSink().sink);

	await Promise.all([ manager.close(session.id, 'first'), manager.close(session.id, 'second') ]);
	await manager.close(session.id, 'third');

	t.is(session.state, 'closed');
});
