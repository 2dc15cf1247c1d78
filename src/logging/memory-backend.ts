/**
 * Memory Log Backend
 *
 * Keeps recent log entries in memory for status inspection and tests.
 * Oldest entries are dropped once maxLogs is reached.
 */

import type { LogBackend, LogFilter, LogMessage } from './types';

export interface MemoryLogBackendOptions {
	/** Maximum number of logs to keep in memory */
	maxLogs?: number;
}

export class MemoryLogBackend implements LogBackend {
	private logs: LogMessage[] = [];
	private logIdCounter = 0;
	private readonly maxLogs: number;

	constructor(options: MemoryLogBackendOptions = {}) {
		this.maxLogs = options.maxLogs ?? 10000;
	}

	public async log(message: LogMessage): Promise<void> {
		this.logs.push({
			...message,
			id: message.id ?? `log-${++this.logIdCounter}`,
		});

		if (this.logs.length > this.maxLogs) {
			this.logs.shift();
		}
	}

	/**
	 * Retrieve logs matching filter
	 */
	public getLogs(filter?: LogFilter): LogMessage[] {
		let filtered = [...this.logs];

		if (!filter) {
			return filtered;
		}

		const { level, component, since, until, limit } = filter;

		if (level !== undefined) {
			filtered = filtered.filter((log) => log.level === level);
		}

		if (component !== undefined) {
			filtered = filtered.filter((log) => log.component === component);
		}

		if (since !== undefined) {
			filtered = filtered.filter((log) => log.timestamp >= since);
		}

		if (until !== undefined) {
			filtered = filtered.filter((log) => log.timestamp <= until);
		}

		if (limit !== undefined && limit > 0) {
			filtered = filtered.slice(-limit);
		}

		return filtered;
	}

	public clear(): void {
		this.logs = [];
	}

	public getLogCount(): number {
		return this.logs.length;
	}
}
