/**
 * Merge strategies turn the named fragments pushed by the server into the
 * files a supervised process reads.
 */

/** Fragment name -> raw content, as received from the remote config channel */
export type RawConfigSet = Record<string, Buffer>;

/** Relative file path -> content */
export type OutputConfigSet = Record<string, Buffer>;

export interface MergeStrategy {
	/**
	 * Must throw MergeError naming the offending fragment for anything it does
	 * not understand, never drop it.
	 */
	merge(raw: RawConfigSet): OutputConfigSet | Promise<OutputConfigSet>;
}

export function mergerFunc(fn: (raw: RawConfigSet) => OutputConfigSet | Promise<OutputConfigSet>): MergeStrategy {
	return { merge: fn };
}
