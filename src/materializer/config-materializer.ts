/**
 * Config Materializer
 * ===================
 *
 * Runs the merge strategy on each pushed config set and writes the result to a
 * brand-new directory under `root`, but only when the merged output differs
 * from the last one written. Unchanged input returns the previous location
 * without touching the filesystem.
 *
 * Layout: {root}/{locationId}/{file}, locationId being a UUIDv7 so that
 * locations sort by creation time.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { v7 as uuidv7 } from 'uuid';
import { MergeError, WriteError } from '../errors';
import type { ComponentLogger } from '../logging';
import { hashOutputConfig } from './content-hash';
import type { MergeStrategy, OutputConfigSet, RawConfigSet } from './merge-strategy';

/**
 * Filesystem operations used to write locations
 */
export interface MaterializerFileSystem {
	mkdir(dir: string, options: { recursive: true }): Promise<unknown>;
	writeFile(file: string, data: Buffer): Promise<void>;
}

export interface ConfigMaterializerOptions {
	merger: MergeStrategy;
	root: string;
	logger?: ComponentLogger;
	fileSystem?: MaterializerFileSystem;
	/** Generates location directory names; must be unique and time-ordered */
	generateLocationId?: () => string;
}

const DIR_MODE = 0o750;

export class ConfigMaterializer {
	private readonly merger: MergeStrategy;
	private readonly root: string;
	private readonly logger?: ComponentLogger;
	private readonly fileSystem: MaterializerFileSystem;
	private readonly generateLocationId: () => string;

	// Only mutated by handle(); callers serialize calls
	private lastHash = '';
	private lastLocation = '';

	constructor(options: ConfigMaterializerOptions) {
		this.merger = options.merger;
		this.root = options.root;
		this.logger = options.logger;
		this.fileSystem = options.fileSystem ?? {
			mkdir: (dir, mkdirOptions) => fs.mkdir(dir, { ...mkdirOptions, mode: DIR_MODE }),
			writeFile: (file, data) => fs.writeFile(file, data, { mode: 0o640 }),
		};
		this.generateLocationId = options.generateLocationId ?? (() => uuidv7());
	}

	/**
	 * Materialize `raw` and return the directory holding the result
	 */
	public async handle(raw: RawConfigSet): Promise<string> {
		const files = await this.mergeFiles(raw);
		const hash = hashOutputConfig(files);

		if (this.lastLocation && hash === this.lastHash) {
			this.logger?.debug('Effective config did not change', { location: this.lastLocation, hash });
			return this.lastLocation;
		}

		const location = path.join(this.root, this.generateLocationId());
		this.logger?.debug('Writing new config location', { location, files: Object.keys(files).length });

		for (const name of Object.keys(files).sort()) {
			await this.writeOne(location, name, files[name]);
		}

		this.lastHash = hash;
		this.lastLocation = location;
		this.logger?.info('Config materialized', { location, hash });

		return location;
	}

	/**
	 * Location of the last successfully written config, '' before the first one
	 */
	public currentLocation(): string {
		return this.lastLocation;
	}

	public currentHash(): string {
		return this.lastHash;
	}

	private async mergeFiles(raw: RawConfigSet): Promise<OutputConfigSet> {
		try {
			return await this.merger.merge(raw);
		} catch (error) {
			if (error instanceof MergeError) {
				throw new MergeError(error.key, `merging config fragments: ${error.reason}`, { cause: error });
			}
			throw new MergeError('*', `merging config fragments: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
		}
	}

	private async writeOne(location: string, name: string, content: Buffer): Promise<void> {
		const file = path.join(location, name);
		if (path.relative(location, file).startsWith('..')) {
			throw new WriteError(file, location, { cause: new Error(`${JSON.stringify(name)} escapes the config location`) });
		}

		try {
			await this.fileSystem.mkdir(path.dirname(file), { recursive: true });
		} catch (error) {
			throw new WriteError(path.dirname(file), location, { cause: error });
		}

		try {
			await this.fileSystem.writeFile(file, content);
		} catch (error) {
			throw new WriteError(file, location, { cause: error });
		}
	}
}
