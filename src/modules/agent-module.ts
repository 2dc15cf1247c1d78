/**
 * Agent Module
 *
 * Runs one managed binary on behalf of the remote management server:
 * - Receives configuration pushes from the remote config client
 * - Materializes each push into a fresh config location
 * - Restarts the supervised process whenever the effective config changes
 * - Reports description, health and remote config status back
 *
 * Pushes are handled one at a time through a SerialQueue. Each supervision run
 * is tagged with a generation number; a new one starts only once the previous
 * run has settled, so at most one child exists per module.
 */

import { EventEmitter } from 'events';
import path from 'path';
import yaml from 'js-yaml';
import { HistoryError, SupervisorError, toError } from '../errors';
import type { ComponentLogger } from '../logging';
import { DEFAULT_OUTPUT_FILE, type HistoryTracker, type RawConfigSet } from '../materializer';
import type { AgentHealth, RemoteConfigClient, RemoteConfigMessage, RemoteConfigStatus } from '../remote';
import { splitCommand, type Supervisor } from '../supervision';
import { SerialQueue } from './serial-queue';

export const SELF_INSTRUMENTATION_FRAGMENT = '__local_selfinstr';

/**
 * Anything turning a raw config set into a location on disk
 */
export interface Materializer {
	handle(raw: RawConfigSet): Promise<string>;
}

export interface AgentModuleOptions {
	name: string;
	instanceId: string;
	hostId: string;
	binaryPath: string;
	/** File inside a location passed to the binary through --config */
	configFile?: string;
	materializer: Materializer;
	history: HistoryTracker;
	supervisor: Supervisor;
	client: RemoteConfigClient;
	logger: ComponentLogger;
}

interface Supervision {
	generation: number;
	location: string;
	controller: AbortController;
	task: Promise<void>;
}

interface Settle {
	resolve(): void;
	reject(error: Error): void;
}

export class AgentModule extends EventEmitter {
	public readonly name: string;
	private readonly instanceId: string;
	private readonly hostId: string;
	private readonly binaryPath: string;
	private readonly configFile: string;
	private readonly materializer: Materializer;
	private readonly history: HistoryTracker;
	private readonly supervisor: Supervisor;
	private readonly client: RemoteConfigClient;
	private readonly logger: ComponentLogger;
	private readonly queue: SerialQueue<RemoteConfigMessage>;

	private isRunning = false;
	private generation = 0;
	private current?: Supervision;
	private activeLocation = '';
	private settle?: Settle;
	private readonly startTimeUnixMs = Date.now();

	constructor(options: AgentModuleOptions) {
		super();
		this.name = options.name;
		this.instanceId = options.instanceId;
		this.hostId = options.hostId;
		this.binaryPath = options.binaryPath;
		this.configFile = options.configFile ?? DEFAULT_OUTPUT_FILE;
		this.materializer = options.materializer;
		this.history = options.history;
		this.supervisor = options.supervisor;
		this.client = options.client;
		this.logger = options.logger;
		this.queue = new SerialQueue<RemoteConfigMessage>(
			(message) => this.applyConfig(message),
			(error) => this.logger.error('Unexpected error while applying config', toError(error))
		);
	}

	public running(): boolean {
		return this.isRunning;
	}

	/**
	 * Generation of the current supervision, 0 before the first config
	 */
	public currentGeneration(): number {
		return this.generation;
	}

	public currentLocation(): string {
		return this.activeLocation;
	}

	/**
	 * Start the module and resolve once it is stopped. Rejects with the error
	 * that made the module fail.
	 */
	public run(): Promise<void> {
		const finished = new Promise<void>((resolve, reject) => {
			this.settle = { resolve, reject };
		});
		return this.start().then(() => finished);
	}

	public async start(): Promise<void> {
		if (this.isRunning) {
			this.logger.warn('Module already running');
			return;
		}

		this.logger.info('Starting module', { instanceId: this.instanceId });
		this.isRunning = true;

		try {
			await this.client.start({
				onRemoteConfig: (message) => this.queue.push(message),
				onConnect: () => this.logger.info('Connected to management server'),
				onConnectFailed: (error) => this.logger.error('Failed to connect to management server', error),
				onError: (error) => this.logger.warn('Management server error', { error: error.message }),
			});
		} catch (error) {
			this.isRunning = false;
			throw error;
		}

		await this.report('description', () =>
			this.client.setAgentDescription({
				'agent.type': this.name,
				'instance.id': this.instanceId,
				'host.id': this.hostId,
			})
		);
		await this.reportHealth({ healthy: false });
		this.emit('started');
	}

	/**
	 * Drop pending pushes, cancel supervision and disconnect from the server
	 */
	public async stop(): Promise<void> {
		if (!this.isRunning) {
			return;
		}

		this.logger.info('Stopping module');
		this.isRunning = false;
		this.queue.close();
		await this.queue.onIdle();
		await this.cancelSupervision();
		await this.report('disconnect', () => this.client.stop());

		this.settle?.resolve();
		this.settle = undefined;
		this.logger.info('Module stopped');
		this.emit('stopped');
	}

	private async applyConfig(message: RemoteConfigMessage): Promise<void> {
		if (!this.isRunning) {
			return;
		}

		const raw: RawConfigSet = {
			...message.config,
			[SELF_INSTRUMENTATION_FRAGMENT]: this.selfInstrumentation(),
		};

		try {
			const location = await this.materializer.handle(raw);
			if (!this.isRunning) {
				this.logger.debug('Module stopped while materializing, dropping config', { location });
				return;
			}
			if (location === this.activeLocation) {
				this.logger.debug('Config location unchanged, keeping current process', { location });
			} else {
				await this.recordHistory(location);
				if (!this.isRunning) {
					this.logger.debug('Module stopped while recording history, dropping config', { location });
					return;
				}
				this.activeLocation = location;
				if (!(await this.startSupervision(location))) {
					return;
				}
			}
		} catch (error) {
			const failure = toError(error);
			if (!this.isRunning) {
				this.logger.warn('Dropping config that failed after the module stopped', { error: failure.message });
				return;
			}
			await this.reportStatus({
				status: 'FAILED',
				lastRemoteConfigHash: message.configHash,
				errorMessage: failure.message,
			});
			await this.fail(failure);
			return;
		}

		if (this.isRunning) {
			await this.reportStatus({ status: 'APPLIED', lastRemoteConfigHash: message.configHash });
		}
	}

	private selfInstrumentation(): Buffer {
		const fragment = {
			service: {
				telemetry: {
					resource: {
						'service.name': this.name,
						'service.instance.id': this.instanceId,
					},
				},
			},
		};
		return Buffer.from(yaml.dump(fragment));
	}

	private async recordHistory(location: string): Promise<void> {
		try {
			await this.history.push(location);
		} catch (error) {
			throw error instanceof SupervisorError ? error : new HistoryError(location, { cause: error });
		}
	}

	/**
	 * Replace the current supervision with one on `location`. Resolves false
	 * when the module stopped while the previous one was being cancelled.
	 */
	private async startSupervision(location: string): Promise<boolean> {
		const configPath = path.join(location, this.configFile);
		const [command, ...args] = splitCommand(`${this.binaryPath} --config ${configPath}`);

		await this.cancelSupervision();
		if (!this.isRunning) {
			return false;
		}

		const generation = ++this.generation;
		const controller = new AbortController();
		this.logger.info('Starting supervision', { generation, location });

		const task = this.supervisor.supervise(command, args, controller.signal).catch(async (error: unknown) => {
			if (error instanceof SupervisorError && !error.fatal) {
				this.logger.debug('Supervision cancelled', { generation });
				return;
			}
			if (controller.signal.aborted || generation !== this.generation) {
				this.logger.warn('Ignoring result of superseded supervision', { generation, error: toError(error).message });
				return;
			}
			// Our own task is finishing; fail() must not wait for it
			if (this.current?.generation === generation) {
				this.current = undefined;
			}
			await this.fail(toError(error));
		});

		this.current = { generation, location, controller, task };
		await this.reportHealth({ healthy: true, startTimeUnixMs: this.startTimeUnixMs });
		this.emit('config-applied', location, generation);
		return true;
	}

	private async cancelSupervision(): Promise<void> {
		const current = this.current;
		if (!current) {
			return;
		}

		this.current = undefined;
		this.logger.debug('Cancelling supervision', { generation: current.generation });
		current.controller.abort();
		await current.task;
	}

	/**
	 * Stop the module after a fatal error and settle run() with it
	 */
	private async fail(error: Error): Promise<void> {
		if (!this.isRunning) {
			return;
		}

		this.logger.error('Module failed', error);
		this.isRunning = false;
		this.queue.close();

		await this.cancelSupervision();
		await this.reportHealth({ healthy: false, startTimeUnixMs: this.startTimeUnixMs, lastError: error.message });
		await this.report('disconnect', () => this.client.stop());

		this.settle?.reject(error);
		this.settle = undefined;
		this.emit('failed', error);
	}

	private reportHealth(health: AgentHealth): Promise<void> {
		return this.report('health', () => this.client.setHealth(health));
	}

	private reportStatus(status: RemoteConfigStatus): Promise<void> {
		return this.report('status', () => this.client.setRemoteConfigStatus(status));
	}

	/**
	 * Reports are best effort; a lost report never stops the module
	 */
	private async report(what: string, send: () => Promise<void>): Promise<void> {
		try {
			await send();
		} catch (error) {
			this.logger.warn(`Failed to report ${what}`, { error: toError(error).message });
		}
	}
}
