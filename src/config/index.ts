import { splitList } from '../utils.js';
import { expandTilde } from './expand.js';
import { serverConfigSchema, type ServerConfig, type ServerConfigInput } from './schema.js';

export { defaultDrainTimeoutMs, type ServerConfig } from './schema.js';

export type ConfigFlags = {
	project?: string;
	location?: string;
	keyFile?: string;
	dataset?: string[];
	host?: string;
	port?: number;
	drainTimeout?: number;
};

export class ConfigError extends Error {
	constructor(message: string, public readonly issues: string[]) {
		super(message);
		this.name = 'ConfigError';
	}
}

function parseInteger(value: string | undefined): number | undefined {
	if (value === undefined || value.trim() === '') {
		return undefined;
	}

	return Number(value);
}

/**
 * Command-line flags win over environment variables. Unset values fall back to
 * the schema defaults.
 */
export function resolveConfig(flags: ConfigFlags, env: NodeJS.ProcessEnv): ServerConfig {
	const keyFile = flags.keyFile ?? env.BQ_KEY_FILE;
	const datasets = flags.dataset && flags.dataset.length > 0 ? flags.dataset : splitList(env.BQ_DATASETS);

	const input: ServerConfigInput = {
		project: flags.project ?? env.BQ_PROJECT_ID ?? '',
		location: flags.location ?? env.BQ_LOCATION ?? '',
		keyFile: keyFile ? expandTilde(keyFile) : undefined,
		datasets,
		host: flags.host ?? env.HOST,
		port: flags.port ?? parseInteger(env.PORT),
		drainTimeoutMs: flags.drainTimeout ?? parseInteger(env.MCP_DRAIN_TIMEOUT_MS),
	};

	const result = serverConfigSchema.safeParse(input);
	if (!result.success) {
		const issues = result.error.issues.map(issue => `${issue.path.map(String).join('.')}: ${issue.message}`);
		throw new ConfigError(`Invalid configuration:\n${issues.join('\n')}`, issues);
	}

	return result.data;
}
