/**
 * Process Supervisor
 *
 * Keeps one child process running: spawns it, relays its output, and restarts it
 * on exit according to a backoff policy until the supervision is cancelled or
 * the policy gives up.
 *
 * States: starting -> running -> waiting-backoff -> starting ... -> stopped
 */

import { spawn, type SpawnOptions } from 'child_process';
import { EventEmitter } from 'events';
import type { Readable, Writable } from 'stream';
import { setTimeout as sleep } from 'timers/promises';
import { BackoffExhaustedError, CancelledError, SpawnError, toError } from '../errors';
import type { ComponentLogger } from '../logging';
import { createBackoffFactory, type BackoffFactory } from './backoff';

export type SupervisorState = 'starting' | 'running' | 'waiting-backoff' | 'stopped';

/**
 * The subset of ChildProcess the supervisor relies on
 */
export interface ChildHandle extends EventEmitter {
	readonly pid?: number;
	readonly stdout: Readable | null;
	readonly stderr: Readable | null;
	kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ChildHandle;

/**
 * How a running child is stopped when its supervision is cancelled.
 * Without one, cancellation leaves the process alone.
 */
export interface TerminationPolicy {
	signal: NodeJS.Signals;
	/** Grace period before SIGKILL */
	timeoutMs: number;
}

export interface ProcessSupervisorOptions {
	logger: ComponentLogger;
	backoff?: BackoffFactory;
	termination?: TerminationPolicy;
	/** Where child stdout/stderr are relayed */
	output?: Writable;
	env?: NodeJS.ProcessEnv;
	cwd?: string;
	spawnFn?: SpawnFn;
}

interface ExitInfo {
	code: number | null;
	signal: NodeJS.Signals | null;
}

/**
 * Anything able to keep a command running until cancelled
 */
export interface Supervisor {
	supervise(command: string, args: string[], signal: AbortSignal): Promise<never>;
}

const ABORTED = Symbol('aborted');

export class ProcessSupervisor extends EventEmitter implements Supervisor {
	private readonly logger: ComponentLogger;
	private readonly backoffFactory: BackoffFactory;
	private readonly termination?: TerminationPolicy;
	private readonly output: Writable;
	private readonly env?: NodeJS.ProcessEnv;
	private readonly cwd?: string;
	private readonly spawnFn: SpawnFn;
	private currentState: SupervisorState = 'stopped';
	private spawnCount = 0;

	constructor(options: ProcessSupervisorOptions) {
		super();
		this.logger = options.logger;
		this.backoffFactory = options.backoff ?? createBackoffFactory();
		this.termination = options.termination;
		this.output = options.output ?? process.stderr;
		this.env = options.env;
		this.cwd = options.cwd;
		this.spawnFn = options.spawnFn ?? spawn;
	}

	public get state(): SupervisorState {
		return this.currentState;
	}

	/**
	 * Number of processes spawned over the lifetime of this supervisor
	 */
	public get spawns(): number {
		return this.spawnCount;
	}

	/**
	 * Run `command` until `signal` aborts (CancelledError), the process cannot be
	 * started (SpawnError) or the backoff policy gives up (BackoffExhaustedError).
	 */
	public async supervise(command: string, args: string[], signal: AbortSignal): Promise<never> {
		const backoff = this.backoffFactory();

		try {
			for (;;) {
				if (signal.aborted) {
					throw new CancelledError();
				}

				this.setState('starting');
				const { child, exited } = await this.start(command, args);
				this.setState('running');

				const outcome = await raceAbort(exited, signal);
				if (outcome === ABORTED) {
					await this.terminate(child, exited);
					throw new CancelledError();
				}

				this.logger.warn('Process exited', {
					command,
					pid: child.pid,
					exitCode: outcome.code,
					signal: outcome.signal,
				});

				const decision = backoff.next();
				if (decision.kind === 'give-up') {
					const error = new BackoffExhaustedError(decision.reason);
					this.logger.error('Process will not be restarted', error, { command });
					throw error;
				}

				this.setState('waiting-backoff');
				this.logger.info(`Restarting process in ${decision.delayMs}ms`, { command });
				await this.wait(decision.delayMs, signal);
			}
		} finally {
			this.setState('stopped');
		}
	}

	private async start(command: string, args: string[]): Promise<{ child: ChildHandle; exited: Promise<ExitInfo> }> {
		let child: ChildHandle;
		try {
			child = this.spawnFn(command, args, {
				cwd: this.cwd,
				env: this.env ?? process.env,
				stdio: ['ignore', 'pipe', 'pipe'],
				shell: false,
				windowsHide: true,
			});
		} catch (error) {
			throw new SpawnError(command, { cause: error });
		}

		const exited = new Promise<ExitInfo>((resolve) => {
			child.once('exit', (code: number | null, exitSignal: NodeJS.Signals | null) => {
				resolve({ code, signal: exitSignal });
			});
		});

		await new Promise<void>((resolve, reject) => {
			const onSpawn = () => {
				child.off('error', onError);
				resolve();
			};
			const onError = (error: unknown) => {
				child.off('spawn', onSpawn);
				reject(new SpawnError(command, { cause: error }));
			};
			child.once('spawn', onSpawn);
			child.once('error', onError);
		}).catch((error: unknown) => {
			this.logger.error('Failed to start process', toError(error), { command });
			throw error;
		});

		// Errors after a successful spawn (e.g. a failed kill) must not crash the agent
		child.on('error', (error: unknown) => {
			this.logger.warn('Process reported an error', { command, error: toError(error).message });
		});

		child.stdout?.pipe(this.output, { end: false });
		child.stderr?.pipe(this.output, { end: false });

		this.spawnCount++;
		this.logger.info('Process started', { command, args, pid: child.pid });

		return { child, exited };
	}

	private async terminate(child: ChildHandle, exited: Promise<ExitInfo>): Promise<void> {
		if (!this.termination) {
			this.logger.debug('Supervision cancelled, leaving process running', { pid: child.pid });
			return;
		}

		const { signal, timeoutMs } = this.termination;
		this.logger.info(`Stopping process with ${signal}`, { pid: child.pid });
		child.kill(signal);

		const graceful = await Promise.race([
			exited.then(() => true),
			sleep(timeoutMs, false, { ref: false }),
		]);

		if (!graceful) {
			this.logger.warn(`Process did not stop within ${timeoutMs}ms, sending SIGKILL`, { pid: child.pid });
			child.kill('SIGKILL');
		}
	}

	private async wait(delayMs: number, signal: AbortSignal): Promise<void> {
		try {
			await sleep(delayMs, undefined, { signal });
		} catch (error) {
			if (signal.aborted) {
				throw new CancelledError();
			}
			throw error;
		}
	}

	private setState(state: SupervisorState): void {
		if (this.currentState === state) {
			return;
		}
		this.currentState = state;
		this.emit('state', state);
	}
}

function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T | typeof ABORTED> {
	if (signal.aborted) {
		return Promise.resolve(ABORTED);
	}

	return new Promise<T | typeof ABORTED>((resolve, reject) => {
		const onAbort = () => resolve(ABORTED);
		signal.addEventListener('abort', onAbort, { once: true });
		promise.then(
			(value) => {
				signal.removeEventListener('abort', onAbort);
				resolve(value);
			},
			(error: unknown) => {
				signal.removeEventListener('abort', onAbort);
				reject(error);
			}
		);
	});
}
