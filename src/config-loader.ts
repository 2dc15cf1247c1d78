/**
 * CONFIG LOADER
 * =============
 *
 * Builds the supervisor configuration from, in increasing priority:
 *   1. Built-in defaults
 *   2. Environment variables (a `.env` file is loaded through dotenv)
 *   3. A JSON file: $SUPERVISOR_CONFIG_FILE, or {CONFIG_DIR}/supervisor-config.json
 *
 * The merged result is validated with SupervisorConfigSchema.
 */

import { existsSync, readFileSync } from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import _ from 'lodash';
import { z } from 'zod';
import { ConfigError } from './errors';
import { LOG_LEVELS } from './logging';

export const BackoffConfigSchema = z.object({
	type: z.enum(['fixed', 'linear', 'exponential']).default('fixed'),
	delayMs: z.number().int().nonnegative().optional(),
	maxRetries: z.number().int().nonnegative().optional(),
	resetAfterMs: z.number().int().nonnegative().optional(),
	maxDelayMs: z.number().int().positive().optional(),
	jitter: z.number().min(0).max(1).optional(),
});

export const ModuleConfigSchema = z.object({
	name: z
		.string()
		.min(1)
		.regex(/^[A-Za-z0-9_.-]+$/, 'must only contain letters, digits, ".", "_" and "-"'),
	binaryPath: z.string().min(1),
	localConfigPath: z.string().min(1).optional(),
	/** Config locations kept on disk, 0 keeps all */
	historySize: z.number().int().nonnegative().default(10),
	/** Sent to the child when its supervision is cancelled; SIGKILL follows after stopTimeoutMs */
	stopSignal: z.enum(['SIGTERM', 'SIGINT', 'SIGKILL', 'SIGHUP', 'SIGQUIT']).default('SIGTERM'),
	stopTimeoutMs: z.number().int().positive().default(10000),
	backoff: BackoffConfigSchema.default({ type: 'fixed' }),
});

export const SupervisorConfigSchema = z
	.object({
		dataDir: z.string().min(1),
		logLevel: z.enum(LOG_LEVELS).default('info'),
		logDir: z.string().min(1).optional(),
		hostId: z.string().min(1).optional(),
		mqtt: z.object({
			brokerUrl: z.string().url(),
			username: z.string().optional(),
			password: z.string().optional(),
			topicPrefix: z.string().min(1).default('supervisor'),
		}),
		remote: z
			.object({
				headers: z.record(z.string()).default({}),
			})
			.default({}),
		modules: z.array(ModuleConfigSchema).default([]),
	})
	.superRefine((config, ctx) => {
		const seen = new Set<string>();
		config.modules.forEach((module, index) => {
			if (seen.has(module.name)) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ['modules', index, 'name'],
					message: `duplicate module name "${module.name}"`,
				});
			}
			seen.add(module.name);
		});
	});

export type ModuleConfig = z.infer<typeof ModuleConfigSchema>;
export type SupervisorConfig = z.infer<typeof SupervisorConfigSchema>;

export const CONFIG_FILE_NAME = 'supervisor-config.json';

export interface ConfigLoaderOptions {
	/** Defaults to process.env, populated from a .env file first */
	env?: NodeJS.ProcessEnv;
	/** Overrides SUPERVISOR_CONFIG_FILE and CONFIG_DIR */
	configFile?: string;
}

export class ConfigLoader {
	private readonly env: NodeJS.ProcessEnv;
	private readonly useProcessEnv: boolean;
	private readonly configFile?: string;

	constructor(options: ConfigLoaderOptions = {}) {
		this.env = options.env ?? process.env;
		this.useProcessEnv = options.env === undefined;
		this.configFile = options.configFile;
	}

	public load(): SupervisorConfig {
		if (this.useProcessEnv) {
			dotenv.config();
		}

		const merged = _.merge({}, this.defaults(), this.fromEnv(), this.fromFile());
		const parsed = SupervisorConfigSchema.safeParse(merged);
		if (!parsed.success) {
			const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
			throw new ConfigError(`Invalid supervisor configuration: ${issues.join('; ')}`);
		}
		return parsed.data;
	}

	/**
	 * Path of the JSON config file consulted by load()
	 */
	public configFilePath(): string {
		if (this.configFile) {
			return this.configFile;
		}
		if (this.env.SUPERVISOR_CONFIG_FILE) {
			return this.env.SUPERVISOR_CONFIG_FILE;
		}
		return path.join(this.env.CONFIG_DIR ?? '/etc/supervisor', CONFIG_FILE_NAME);
	}

	private defaults(): Record<string, unknown> {
		return {
			dataDir: '/var/lib/supervisor',
			logLevel: 'info',
			mqtt: {
				brokerUrl: 'mqtt://localhost:1883',
				topicPrefix: 'supervisor',
			},
		};
	}

	private fromEnv(): Record<string, unknown> {
		const env = this.env;
		const mqtt = _.omitBy(
			{
				brokerUrl: env.MQTT_BROKER_URL,
				username: env.MQTT_USERNAME,
				password: env.MQTT_PASSWORD,
				topicPrefix: env.MQTT_TOPIC_PREFIX,
			},
			_.isUndefined
		);

		const config: Record<string, unknown> = _.omitBy(
			{
				dataDir: env.SUPERVISOR_DATA_DIR,
				logLevel: env.LOG_LEVEL,
				logDir: env.LOG_DIR,
				hostId: env.SUPERVISOR_HOST_ID,
			},
			_.isUndefined
		);

		if (!_.isEmpty(mqtt)) {
			config.mqtt = mqtt;
		}
		if (env.SUPERVISOR_API_KEY !== undefined) {
			config.remote = { headers: { 'API-Key': env.SUPERVISOR_API_KEY } };
		}
		return config;
	}

	private fromFile(): Record<string, unknown> {
		const file = this.configFilePath();
		if (!existsSync(file)) {
			return {};
		}

		let json: unknown;
		try {
			json = JSON.parse(readFileSync(file, 'utf8'));
		} catch (error) {
			throw new ConfigError(`Failed to read config file ${file}`, { cause: error });
		}

		if (!_.isPlainObject(json)) {
			throw new ConfigError(`Config file ${file} must contain a JSON object`);
		}
		return z.record(z.unknown()).parse(json);
	}
}
