/**
 * PACKAGE STORE
 * =============
 *
 * File-backed state of packages downloaded on behalf of the management server.
 *
 * Layout under `root`:
 *   statuses.json          last reported PackageStatuses
 *   _all.hash              hash over every installed package
 *   {name}/                package folder
 *   {name}/{name}          package content
 *   {name}/{name}.hash     content hash
 *   {name}.hash            package hash
 *   {name}.version         package version
 *
 * Hashes are stored hex-encoded. Missing or empty hash files read as null.
 */

import { createWriteStream, promises as fs, type Stats } from 'fs';
import path from 'path';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { z } from 'zod';
import { PackageStoreError } from '../errors';
import type { ComponentLogger } from '../logging';

const STATUSES_JSON = 'statuses.json';
const ALL_HASH_FILE = '_all.hash';
const HASH_SUFFIX = '.hash';
const VERSION_SUFFIX = '.version';

const FILE_MODE = 0o640;
const DIR_MODE = 0o750;

export interface PackageState {
	exists: boolean;
	hash?: Buffer | null;
	version?: string;
}

export const PackageStatusSchema = z.object({
	name: z.string(),
	agentHasVersion: z.string().optional(),
	agentHasHash: z.string().optional(),
	serverOfferedVersion: z.string().optional(),
	serverOfferedHash: z.string().optional(),
	status: z.enum(['installed', 'installing', 'install-failed']),
	errorMessage: z.string().optional(),
});

export const PackageStatusesSchema = z.object({
	packages: z.record(PackageStatusSchema).default({}),
	serverProvidedAllPackagesHash: z.string().optional(),
	errorMessage: z.string().optional(),
});

export type PackageStatus = z.infer<typeof PackageStatusSchema>;
export type PackageStatuses = z.infer<typeof PackageStatusesSchema>;

export class PackageStore {
	constructor(
		private readonly root: string,
		private readonly logger?: ComponentLogger
	) {}

	public async allPackagesHash(): Promise<Buffer | null> {
		return readHashFile(path.join(this.root, ALL_HASH_FILE));
	}

	public async setAllPackagesHash(hash: Buffer): Promise<void> {
		await writeHashFile(path.join(this.root, ALL_HASH_FILE), hash);
	}

	/**
	 * Names of the package folders under the root
	 */
	public async packages(): Promise<string[]> {
		try {
			const entries = await fs.readdir(this.root, { withFileTypes: true });
			return entries
				.filter((entry) => entry.isDirectory())
				.map((entry) => entry.name)
				.sort();
		} catch (error) {
			throw new PackageStoreError('io', `Listing packages in ${JSON.stringify(this.root)} failed`, { cause: error });
		}
	}

	/**
	 * State of a package; `{ exists: false }` when its folder is missing
	 */
	public async packageState(name: string): Promise<PackageState> {
		const pkgPath = this.packagePath(name);
		try {
			await fs.stat(pkgPath);
		} catch (error) {
			if (isNotFound(error)) {
				return { exists: false };
			}
			throw new PackageStoreError('not-found', `Cannot stat package ${JSON.stringify(pkgPath)}`, { cause: error });
		}

		const hash = await readHashFile(pkgPath + HASH_SUFFIX);
		const versionFile = pkgPath + VERSION_SUFFIX;
		let version: string;
		try {
			version = await fs.readFile(versionFile, 'utf8');
		} catch (error) {
			throw new PackageStoreError('io', `Reading version file ${JSON.stringify(versionFile)} failed`, { cause: error });
		}

		return { exists: true, hash, version };
	}

	public async setPackageState(name: string, state: PackageState): Promise<void> {
		const pkgPath = await this.existingPackage(name);

		if (!state.exists) {
			throw new PackageStoreError('exists-false', `Cannot set existence of ${JSON.stringify(name)} to false`);
		}

		await writeHashFile(pkgPath + HASH_SUFFIX, state.hash ?? Buffer.alloc(0));

		const versionFile = pkgPath + VERSION_SUFFIX;
		try {
			await fs.writeFile(versionFile, state.version ?? '', { mode: FILE_MODE });
		} catch (error) {
			throw new PackageStoreError('io', `Writing version file ${JSON.stringify(versionFile)} failed`, { cause: error });
		}
	}

	/**
	 * Create the folder of a new package. Hash and version files are written by setPackageState.
	 */
	public async createPackage(name: string): Promise<void> {
		const pkgPath = this.packagePath(name);
		try {
			await fs.stat(pkgPath);
			throw new PackageStoreError('exists', `Package ${JSON.stringify(name)} already exists`);
		} catch (error) {
			if (error instanceof PackageStoreError) {
				throw error;
			}
			if (!isNotFound(error)) {
				throw new PackageStoreError('io', `Checking for package ${JSON.stringify(pkgPath)} failed`, { cause: error });
			}
		}

		try {
			await fs.mkdir(pkgPath, { recursive: true, mode: DIR_MODE });
		} catch (error) {
			throw new PackageStoreError('io', `Creating package ${JSON.stringify(pkgPath)} failed`, { cause: error });
		}
	}

	/**
	 * Stored hash of a package's content, null if the package or file is missing
	 */
	public async fileContentHash(name: string): Promise<Buffer | null> {
		return readHashFile(this.contentPath(name) + HASH_SUFFIX);
	}

	public async updateContent(name: string, data: Readable | Buffer | string, contentHash: Buffer): Promise<void> {
		await this.existingPackage(name);

		const contentFile = this.contentPath(name);
		try {
			if (typeof data === 'string' || Buffer.isBuffer(data)) {
				await fs.writeFile(contentFile, data, { mode: FILE_MODE });
			} else {
				await pipeline(data, createWriteStream(contentFile, { mode: FILE_MODE }));
			}
		} catch (error) {
			throw new PackageStoreError('io', `Writing package file ${JSON.stringify(contentFile)} failed`, { cause: error });
		}

		await writeHashFile(contentFile + HASH_SUFFIX, contentHash);
	}

	/**
	 * Remove a package folder together with its hash and version files
	 */
	public async deletePackage(name: string): Promise<void> {
		const pkgPath = await this.existingPackage(name);

		this.logger?.info('Removing package', { package: name, path: pkgPath });
		for (const suffix of ['', VERSION_SUFFIX, HASH_SUFFIX]) {
			const target = pkgPath + suffix;
			try {
				await fs.rm(target, { recursive: true, force: true });
			} catch (error) {
				throw new PackageStoreError('io', `Deleting ${JSON.stringify(target)} failed`, { cause: error });
			}
		}
	}

	/**
	 * Statuses saved by setLastReportedStatuses. Fails when none were saved.
	 */
	public async lastReportedStatuses(): Promise<PackageStatuses> {
		const file = path.join(this.root, STATUSES_JSON);

		let content: string;
		try {
			content = await fs.readFile(file, 'utf8');
		} catch (error) {
			throw new PackageStoreError('io', `Opening ${JSON.stringify(file)} failed`, { cause: error });
		}

		try {
			return PackageStatusesSchema.parse(JSON.parse(content));
		} catch (error) {
			throw new PackageStoreError('io', `Decoding ${JSON.stringify(file)} failed`, { cause: error });
		}
	}

	public async setLastReportedStatuses(statuses: PackageStatuses): Promise<void> {
		const file = path.join(this.root, STATUSES_JSON);
		try {
			await fs.writeFile(file, JSON.stringify(statuses), { mode: FILE_MODE });
		} catch (error) {
			throw new PackageStoreError('io', `Encoding statuses to ${JSON.stringify(file)} failed`, { cause: error });
		}
	}

	private packagePath(name: string): string {
		validatePackageName(name);
		return path.join(this.root, name);
	}

	private contentPath(name: string): string {
		return path.join(this.packagePath(name), name);
	}

	private async existingPackage(name: string): Promise<string> {
		const pkgPath = this.packagePath(name);

		let info: Stats;
		try {
			info = await fs.stat(pkgPath);
		} catch (error) {
			throw new PackageStoreError('not-found', `Package ${JSON.stringify(name)} does not exist`, { cause: error });
		}

		if (!info.isDirectory()) {
			throw new PackageStoreError('not-found', `Package folder ${JSON.stringify(pkgPath)} is not a folder`);
		}
		return pkgPath;
	}
}

/**
 * Reject names colliding with the store's own files or leaving the root.
 * Checked by every operation taking a package name.
 */
export function validatePackageName(name: string): void {
	if (name === path.basename(ALL_HASH_FILE, HASH_SUFFIX)) {
		throw new PackageStoreError('illegal-name', 'Package name cannot be "_all"');
	}
	if (name.endsWith(HASH_SUFFIX)) {
		throw new PackageStoreError('illegal-name', `Package name cannot end in "${HASH_SUFFIX}"`);
	}
	if (name.endsWith(VERSION_SUFFIX)) {
		throw new PackageStoreError('illegal-name', `Package name cannot end in "${VERSION_SUFFIX}"`);
	}
	if (name === '' || name === '.' || name === '..' || name.includes('/') || name.includes(path.sep)) {
		throw new PackageStoreError('illegal-name', `Invalid package name ${JSON.stringify(name)}`);
	}
}

async function readHashFile(file: string): Promise<Buffer | null> {
	let hexHash: string;
	try {
		hexHash = (await fs.readFile(file, 'utf8')).trim();
	} catch (error) {
		if (isNotFound(error)) {
			return null;
		}
		throw new PackageStoreError('io', `Reading hash from ${JSON.stringify(file)} failed`, { cause: error });
	}

	if (hexHash.length === 0) {
		return null;
	}
	if (!/^([0-9a-fA-F]{2})+$/.test(hexHash)) {
		throw new PackageStoreError('io', `Malformed hash in ${JSON.stringify(file)}`);
	}
	return Buffer.from(hexHash, 'hex');
}

async function writeHashFile(file: string, hash: Buffer): Promise<void> {
	try {
		await fs.writeFile(file, hash.toString('hex'), { mode: FILE_MODE });
	} catch (error) {
		throw new PackageStoreError('io', `Writing hash file ${JSON.stringify(file)} failed`, { cause: error });
	}
}

function isNotFound(error: unknown): boolean {
	return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}
