/**
 * Logging types shared by AgentLogger and its backends
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogContext {
	component?: string;
	[key: string]: unknown;
}

export interface LogMessage {
	id?: string;
	timestamp: number;
	level: LogLevel;
	message: string;
	component: string;
	hostId?: string;
	context?: LogContext;
}

export interface LogFilter {
	level?: LogLevel;
	component?: string;
	since?: number;
	until?: number;
	limit?: number;
}

export interface LogBackend {
	log(message: LogMessage): Promise<void>;
	close?(): Promise<void>;
}
