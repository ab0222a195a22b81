import test from 'ava';
import sinon from 'sinon';
import { type Row } from './backend/types.js';
import { createServer } from './server.js';

function createBackendStub() {
	return {
		listTables: sinon.stub<[], Promise<string[]>>().resolves([]),
		describeTable: sinon.stub<[string], Promise<Row[]>>().resolves([]),
		executeQuery: sinon.stub<[string], Promise<Row[]>>().resolves([]),
		close: sinon.stub<[], Promise<void>>().resolves(),
	};
}

test.before(() => {
	sinon.stub(console, 'debug');
	sinon.stub(console, 'warn');
});

test.after.always(() => {
	sinon.restore();
});

test('registers the BigQuery tools', t => {
	const bridge = createServer({ backend: createBackendStub() });

	t.deepEqual(bridge.registry.list().map(tool => tool.name), [ 'execute_query', 'list_tables', 'describe_table' ]);
});

test('shutdown closes sessions before releasing the backend', async t => {
	const backend = createBackendStub();
	const bridge = createServer({ backend, drainTimeoutMs: 0 });
	const closeAll = sinon.spy(bridge.sessions, 'closeAll');
	const session = bridge.sessions.open(async () => undefined);

	await bridge.shutdown();

	t.is(session.state, 'closed');
	t.is(bridge.sessions.size, 0);
	t.true(closeAll.calledBefore(backend.close));
	t.deepEqual(closeAll.firstCall.args, [ 'server shutdown' ]);
});

test('shutdown runs once however often it is called', async t => {
	const backend = createBackendStub();
	const bridge = createServer({ backend });

	await Promise.all([ bridge.shutdown(), bridge.shutdown() ]);
	await bridge.shutdown();

	t.is(backend.close.callCount, 1);
});

test('shutdown works with backends that hold nothing to release', async t => {
	const { close, ...backend } = createBackendStub();
	const bridge = createServer({ backend });

	await t.notThrowsAsync(bridge.shutdown());
	t.is(close.callCount, 0);
});
