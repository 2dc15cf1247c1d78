/**
 * Config history
 *
 * Records every config location a module switched to, and removes the oldest
 * location directories once more than `maxEntries` are kept.
 */

import { promises as fs } from 'fs';
import { HistoryError } from '../errors';
import type { ComponentLogger } from '../logging';

export interface HistoryTracker {
	push(location: string): Promise<void>;
}

export interface ConfigHistoryOptions {
	/** 0 keeps every location */
	maxEntries?: number;
	logger?: ComponentLogger;
	removeDir?: (dir: string) => Promise<void>;
}

export class ConfigHistory implements HistoryTracker {
	private readonly entries: string[] = [];
	private readonly maxEntries: number;
	private readonly logger?: ComponentLogger;
	private readonly removeDir: (dir: string) => Promise<void>;

	constructor(options: ConfigHistoryOptions = {}) {
		this.maxEntries = options.maxEntries ?? 0;
		this.logger = options.logger;
		this.removeDir = options.removeDir ?? ((dir) => fs.rm(dir, { recursive: true, force: true }));
	}

	public async push(location: string): Promise<void> {
		if (this.entries[this.entries.length - 1] === location) {
			return;
		}
		this.entries.push(location);

		while (this.maxEntries > 0 && this.entries.length > this.maxEntries) {
			const [oldest] = this.entries;
			try {
				await this.removeDir(oldest);
			} catch (error) {
				throw new HistoryError(oldest, { cause: error });
			}
			this.entries.shift();
			this.logger?.debug('Removed old config location', { location: oldest });
		}
	}

	/**
	 * Recorded locations, oldest first
	 */
	public locations(): string[] {
		return [...this.entries];
	}

	/**
	 * Location active before the current one, if any
	 */
	public previous(): string | undefined {
		return this.entries.length > 1 ? this.entries[this.entries.length - 2] : undefined;
	}
}
