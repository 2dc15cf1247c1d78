import { createHash } from 'crypto';
import type { OutputConfigSet } from './merge-strategy';

const SEPARATOR = Buffer.from('\n');

/**
 * Hex sha256 over every file of the set, in lexicographic key order.
 *
 * Keys and contents are fed as one flat stream with a newline after each
 * file, so key and value boundaries are not separated cryptographically.
 * Good enough to detect change, not to verify integrity.
 */
export function hashOutputConfig(files: OutputConfigSet): string {
	const hash = createHash('sha256');

	for (const key of Object.keys(files).sort()) {
		hash.update(key);
		hash.update(files[key]);
		hash.update(SEPARATOR);
	}

	return hash.digest('hex');
}
