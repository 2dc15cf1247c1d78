/**
 * Winston Log Backend
 *
 * Console output plus optional size-rotated JSON log files.
 */

import path from 'path';
import winston from 'winston';
import type { LogBackend, LogMessage } from './types';

export interface WinstonLogBackendOptions {
	/** Directory for combined.log / error.log; console only when unset */
	logDir?: string;
	/** Rotate log files when they reach this size (bytes) */
	maxFileSize?: number;
	maxFiles?: number;
	/** Colorized human-readable console output */
	console?: boolean;
}

export class WinstonLogBackend implements LogBackend {
	private readonly logger: winston.Logger;

	constructor(options: WinstonLogBackendOptions = {}) {
		const maxsize = options.maxFileSize ?? 10 * 1024 * 1024; // 10MB
		const maxFiles = options.maxFiles ?? 5;
		const transports: winston.transport[] = [];

		if (options.console ?? true) {
			transports.push(new winston.transports.Console({
				stderrLevels: ['error', 'warn'],
				format: winston.format.combine(
					winston.format.colorize(),
					winston.format.printf(({ level, message, timestamp, component, ...meta }) => {
						const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
						return `${String(timestamp)} [${level}] [${String(component)}] ${String(message)}${metaStr}`;
					})
				),
			}));
		}

		if (options.logDir) {
			transports.push(
				new winston.transports.File({
					filename: path.join(options.logDir, 'combined.log'),
					format: winston.format.json(),
					maxsize,
					maxFiles,
					tailable: true,
				}),
				new winston.transports.File({
					filename: path.join(options.logDir, 'error.log'),
					level: 'error',
					format: winston.format.json(),
					maxsize,
					maxFiles,
				})
			);
		}

		// Level filtering happens in AgentLogger
		this.logger = winston.createLogger({
			level: 'debug',
			transports,
		});
	}

	public async log(entry: LogMessage): Promise<void> {
		this.logger.log({
			level: entry.level,
			message: entry.message,
			timestamp: new Date(entry.timestamp).toISOString(),
			component: entry.component,
			...(entry.hostId ? { hostId: entry.hostId } : {}),
			...entry.context,
		});
	}

	public async close(): Promise<void> {
		await new Promise<void>((resolve) => {
			this.logger.on('finish', () => resolve());
			this.logger.end();
		});
	}
}
