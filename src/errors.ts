/**
 * Supervisor errors
 *
 * Every error that can stop an agent module derives from SupervisorError.
 * CancelledError is the only one raised as part of normal operation.
 */

export abstract class SupervisorError extends Error {
	/** Whether the error should stop the module that raised it */
	abstract readonly fatal: boolean;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = this.constructor.name;
	}
}

/**
 * A merge strategy could not understand a fragment (unknown name, malformed content).
 * Recoverable once the server pushes a corrected configuration.
 */
export class MergeError extends SupervisorError {
	readonly fatal = true;

	constructor(
		public readonly key: string,
		public readonly reason: string,
		options?: { cause?: unknown }
	) {
		super(`${JSON.stringify(key)}: ${reason}`, options);
	}
}

/**
 * Writing a materialized configuration to disk failed
 */
export class WriteError extends SupervisorError {
	readonly fatal = true;

	constructor(
		public readonly path: string,
		public readonly location: string,
		options?: { cause?: unknown }
	) {
		const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
		super(`Failed to write ${JSON.stringify(path)}${reason}`, options);
	}
}

export class SpawnError extends SupervisorError {
	readonly fatal = true;

	constructor(
		public readonly command: string,
		options?: { cause?: unknown }
	) {
		const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
		super(`Failed to start ${JSON.stringify(command)}${reason}`, options);
	}
}

export class BackoffExhaustedError extends SupervisorError {
	readonly fatal = true;

	constructor(reason: string, options?: { cause?: unknown }) {
		super(`Giving up restarting process: ${reason}`, options);
	}
}

/**
 * A command line used quoting or escaping syntax the splitter refuses to interpret
 */
export class CommandSyntaxError extends SupervisorError {
	readonly fatal = true;

	constructor(
		public readonly commandLine: string,
		public readonly character: string
	) {
		super(`Unsupported character ${JSON.stringify(character)} in command line ${JSON.stringify(commandLine)}`);
	}
}

export class CancelledError extends SupervisorError {
	readonly fatal = false;

	constructor(message = 'Supervision cancelled') {
		super(message);
	}
}

export class HistoryError extends SupervisorError {
	readonly fatal = true;

	constructor(
		public readonly location: string,
		options?: { cause?: unknown }
	) {
		const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
		super(`Failed to record config location ${JSON.stringify(location)}${reason}`, options);
	}
}

export class PackageStoreError extends SupervisorError {
	readonly fatal = true;

	constructor(
		public readonly code: 'illegal-name' | 'exists' | 'not-found' | 'exists-false' | 'io',
		message: string,
		options?: { cause?: unknown }
	) {
		super(message, options);
	}
}

export class ConfigError extends SupervisorError {
	readonly fatal = true;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
	}
}

export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}
