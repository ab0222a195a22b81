import type { RequestId } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { type BridgeError } from '../errors.js';

export type InvocationRequest = {
	readonly toolName: string;
	readonly arguments: Readonly<Record<string, unknown>>;
	readonly requestId: RequestId;
};

export type InvocationSuccess = {
	type: 'success';
	requestId: RequestId;
	payload: string;
};

export type InvocationFailure = {
	type: 'failure';
	requestId: RequestId;
	message: string;
	error: BridgeError;
};

export type InvocationResult = InvocationSuccess | InvocationFailure;

export const unaryCallBodySchema = z.strictObject({
	toolName: z.string().min(1),
	arguments: z.record(z.string(), z.unknown()).optional(),
});

function replacer(_key: string, value: unknown): unknown {
	return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * Pretty-printed JSON. BigInt values, which JSON cannot carry, are written as
 * decimal strings.
 */
export function serializePayload(value: unknown): string {
	return JSON.stringify(value, replacer, 2) ?? 'null';
}
