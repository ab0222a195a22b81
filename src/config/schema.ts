import { z } from 'zod';

export const defaultDrainTimeoutMs = 5000;

// Largest delay setTimeout honours
const maxTimerDelayMs = 2_147_483_647;

// Backend settings are handed to the BigQuery client as is
export const serverConfigSchema = z.object({
	project: z.string().min(1, 'project is required'),
	location: z.string().min(1, 'location is required'),
	keyFile: z.string().min(1).optional(),
	datasets: z.array(z.string().min(1)).default([]),
	host: z.string().default('0.0.0.0'),
	port: z.number().int().positive().max(65_535).default(8080),
	drainTimeoutMs: z.number().int().nonnegative().max(maxTimerDelayMs).default(defaultDrainTimeoutMs),
});

export type ServerConfigInput = z.input<typeof serverConfigSchema>;
export type ServerConfig = z.infer<typeof serverConfigSchema>;
