import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { type z } from 'zod';
import { DuplicateToolError, UnknownToolError, ValidationError } from '../../errors.js';

export type ToolDescriptor<Arguments> = {
	definition: Tool;
	argumentsSchema: z.ZodType<Arguments>;
	handle: (args: Arguments) => Promise<unknown>;
};

export type RegisteredTool = {
	definition: Tool;
	/**
	 * Validates raw arguments and returns the bound handler call, or throws
	 * `ValidationError` without invoking anything.
	 */
	prepare: (args: unknown) => () => Promise<unknown>;
};

type Issue = {
	path: PropertyKey[];
	message: string;
};

function formatIssues(issues: Issue[]): string {
	return issues
		.map(issue => `${issue.path.length > 0 ? issue.path.map(String).join('.') : '(arguments)'}: ${issue.message}`)
		.join('; ');
}

export type ToolRegistry = {
	register: <Arguments>(descriptor: ToolDescriptor<Arguments>) => void;
	/** Throws `UnknownToolError` for names never registered. */
	lookup: (name: string) => RegisteredTool;
	/** Definitions in registration order. */
	list: () => Tool[];
};

export function createToolRegistry(): ToolRegistry {
	const tools = new Map<string, RegisteredTool>();

	return {
		register<Arguments>(descriptor: ToolDescriptor<Arguments>) {
			const { name } = descriptor.definition;
			if (tools.has(name)) {
				throw new DuplicateToolError(name);
			}

			tools.set(name, {
				definition: descriptor.definition,
				prepare(args) {
					const result = descriptor.argumentsSchema.safeParse(args);
					if (!result.success) {
						throw new ValidationError(`Invalid arguments for ${name}: ${formatIssues(result.error.issues)}`, {
							toolName: name,
							issues: result.error.issues,
						});
					}

					const { data } = result;
					return async () => descriptor.handle(data);
				},
			});
		},

		lookup(name) {
			const tool = tools.get(name);
			if (!tool) {
				throw new UnknownToolError(name);
			}

			return tool;
		},

		list() {
			return [ ...tools.values() ].map(tool => tool.definition);
		},
	};
}
