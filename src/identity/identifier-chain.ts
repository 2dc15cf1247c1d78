/**
 * Host identity resolution
 *
 * Providers are tried in order and the first non-empty identifier wins.
 * Identity is best effort: a provider that fails counts as having nothing to offer.
 */

import { promises as fs } from 'fs';
import os from 'os';

export type IdentifierProvider = () => string | Promise<string>;

export async function resolveIdentifier(providers: readonly IdentifierProvider[]): Promise<string> {
	for (const provider of providers) {
		let id = '';
		try {
			id = (await provider()).trim();
		} catch {
			continue;
		}

		if (id) {
			return id;
		}
	}

	return '';
}

export function staticIdentifier(value: string | undefined): IdentifierProvider {
	return () => value ?? '';
}

export function envIdentifier(variable: string, env: NodeJS.ProcessEnv = process.env): IdentifierProvider {
	return () => env[variable] ?? '';
}

export function hostnameIdentifier(): IdentifierProvider {
	return () => os.hostname();
}

export const MACHINE_ID_PATHS = ['/etc/machine-id', '/var/lib/dbus/machine-id'];

/**
 * Reads the first machine-id file that exists and is not empty
 */
export function machineIdIdentifier(paths: readonly string[] = MACHINE_ID_PATHS): IdentifierProvider {
	return () => resolveIdentifier(paths.map((file) => () => fs.readFile(file, 'utf8')));
}

/**
 * Default chain: explicit configuration, then environment, machine id and hostname
 */
export function defaultIdentifierChain(configured?: string): IdentifierProvider[] {
	return [
		staticIdentifier(configured),
		envIdentifier('SUPERVISOR_HOST_ID'),
		machineIdIdentifier(),
		hostnameIdentifier(),
	];
}
