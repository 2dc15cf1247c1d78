/**
 * Agent Logger
 * =============
 *
 * Structured logging for supervisor-level events (modules, process supervision,
 * materializer, remote config client).
 *
 * Usage:
 *   const logger = new AgentLogger([new WinstonLogBackend()]);
 *   logger.info('Connection restored', { component: 'RemoteConfig' });
 *   logger.error('Merge failed', error, { component: 'Module', module: 'otelcol' });
 */

import type { LogBackend, LogContext, LogLevel, LogMessage } from './types';

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

export class AgentLogger {
	private readonly backends: LogBackend[];
	private hostId?: string;
	private minLogLevel: LogLevel;

	constructor(backends: LogBackend | LogBackend[], initialLogLevel: LogLevel = 'info') {
		this.backends = Array.isArray(backends) ? backends : [backends];
		this.minLogLevel = initialLogLevel;
	}

	/**
	 * Attach the resolved host id to every subsequent log entry
	 */
	public setHostId(hostId: string): void {
		this.hostId = hostId;
	}

	public setLogLevel(level: LogLevel): void {
		const previous = this.minLogLevel;
		this.minLogLevel = level;
		this.dispatch('info', `Log level changed: ${previous} -> ${level}`, { component: 'AgentLogger' });
	}

	public getLogLevel(): LogLevel {
		return this.minLogLevel;
	}

	public debug(message: string, context?: LogContext): void {
		this.log('debug', message, context);
	}

	public info(message: string, context?: LogContext): void {
		this.log('info', message, context);
	}

	public warn(message: string, context?: LogContext): void {
		this.log('warn', message, context);
	}

	public error(message: string, error?: Error, context?: LogContext): void {
		const errorContext = error ? {
			error: {
				name: error.name,
				message: error.message,
				stack: error.stack,
			},
		} : {};

		this.log('error', message, {
			...context,
			...errorContext,
		});
	}

	/**
	 * Flush and close every backend
	 */
	public async close(): Promise<void> {
		await Promise.all(this.backends.map(backend => backend.close?.()));
	}

	private shouldLog(level: LogLevel): boolean {
		return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[this.minLogLevel];
	}

	private log(level: LogLevel, message: string, context?: LogContext): void {
		if (!this.shouldLog(level)) {
			return;
		}
		this.dispatch(level, message, context);
	}

	/**
	 * Hand the entry to every backend without waiting for them.
	 * A failing backend is reported on stderr and never reaches the caller.
	 */
	private dispatch(level: LogLevel, message: string, context?: LogContext): void {
		const { component = 'agent', ...rest } = context ?? {};
		const entry: LogMessage = {
			timestamp: Date.now(),
			level,
			message,
			component,
			...(this.hostId ? { hostId: this.hostId } : {}),
			...(Object.keys(rest).length > 0 ? { context: rest } : {}),
		};

		for (const backend of this.backends) {
			backend.log(entry).catch((err: unknown) => {
				console.error('[AgentLogger] Failed to log to backend:', err);
			});
		}
	}
}
