/**
 * Supervisor Agent
 *
 * Bootstraps everything the agent modules share and runs one module per
 * configured binary:
 * - Logging (winston backend unless backends are injected)
 * - Host identity
 * - MQTT connection to the management server
 * - Package store
 * - Agent modules
 *
 * A failing module is logged and stopped on its own; the others keep running.
 */

import { promises as fs } from 'fs';
import path from 'path';
import type { Writable } from 'stream';
import type { SupervisorConfig } from './config-loader';
import { toError } from './errors';
import { defaultIdentifierChain, resolveIdentifier, type IdentifierProvider } from './identity';
import { AgentLogger, ComponentLogger, WinstonLogBackend, type LogBackend } from './logging';
import { createAgentModule, type AgentModule } from './modules';
import { MqttManager } from './mqtt/mqtt-manager';
import { PackageStore } from './packages';
import type { MqttConnection } from './remote';
import type { SpawnFn } from './supervision';

export interface SupervisorAgentOptions {
	/** Log backends; a WinstonLogBackend writing to `logDir` when omitted */
	backends?: LogBackend[];
	/** Connection to use instead of connecting an MqttManager to `mqtt.brokerUrl` */
	connection?: MqttConnection;
	identifiers?: IdentifierProvider[];
	spawnFn?: SpawnFn;
	output?: Writable;
}

export class SupervisorAgent {
	private readonly config: SupervisorConfig;
	private readonly options: SupervisorAgentOptions;
	private readonly agentLogger: AgentLogger;
	private readonly logger: ComponentLogger;
	private mqttManager?: MqttManager;
	private connection?: MqttConnection;
	private packageStore?: PackageStore;
	private readonly modules = new Map<string, AgentModule>();
	private readonly running = new Map<string, Promise<void>>();
	private hostIdentifier = '';

	constructor(config: SupervisorConfig, options: SupervisorAgentOptions = {}) {
		this.config = config;
		this.options = options;
		const backends = options.backends ?? [new WinstonLogBackend({ logDir: config.logDir })];
		this.agentLogger = new AgentLogger(backends, config.logLevel);
		this.logger = new ComponentLogger(this.agentLogger, 'Agent');
	}

	public get hostId(): string {
		return this.hostIdentifier;
	}

	public get packages(): PackageStore | undefined {
		return this.packageStore;
	}

	public moduleNames(): string[] {
		return [...this.modules.keys()];
	}

	public module(name: string): AgentModule | undefined {
		return this.modules.get(name);
	}

	public async init(): Promise<void> {
		this.logger.info('Starting supervisor agent', { modules: this.config.modules.length });

		// 1. Host identity
		this.hostIdentifier = await resolveIdentifier(this.options.identifiers ?? defaultIdentifierChain(this.config.hostId));
		if (this.hostIdentifier) {
			this.agentLogger.setHostId(this.hostIdentifier);
		} else {
			this.logger.warn('Could not resolve a host id');
		}

		// 2. MQTT
		this.connection = this.options.connection ?? (await this.connectMqtt());

		// 3. Package store
		await this.initializePackageStore();

		// 4. Modules
		for (const moduleConfig of this.config.modules) {
			const module = createAgentModule(moduleConfig, {
				dataDir: this.config.dataDir,
				hostId: this.hostIdentifier,
				connection: this.connection,
				topicPrefix: this.config.mqtt.topicPrefix,
				headers: this.config.remote.headers,
				logger: new ComponentLogger(this.agentLogger, 'Module'),
				spawnFn: this.options.spawnFn,
				output: this.options.output,
			});
			this.modules.set(moduleConfig.name, module);
			this.running.set(moduleConfig.name, this.runModule(moduleConfig.name, module));
		}

		this.logger.info('Supervisor agent started', { hostId: this.hostIdentifier });
	}

	public async stop(): Promise<void> {
		this.logger.info('Stopping supervisor agent');

		await Promise.all([...this.modules.values()].map((module) => module.stop()));
		await Promise.all(this.running.values());
		this.modules.clear();
		this.running.clear();

		if (this.mqttManager) {
			await this.mqttManager.disconnect();
			this.mqttManager = undefined;
		}

		this.logger.info('Supervisor agent stopped');
		await this.agentLogger.close();
	}

	private async runModule(name: string, module: AgentModule): Promise<void> {
		try {
			await module.run();
			this.logger.info('Module stopped', { module: name });
		} catch (error) {
			this.logger.error('Module failed', toError(error), { module: name });
		}
	}

	private async connectMqtt(): Promise<MqttConnection> {
		const { brokerUrl, username, password } = this.config.mqtt;
		const manager = new MqttManager(this.logger.child('mqtt'));
		await manager.connect(brokerUrl, {
			clientId: `supervisor-${this.hostIdentifier || 'unknown'}`,
			username,
			password,
		});
		this.mqttManager = manager;
		return manager;
	}

	private async initializePackageStore(): Promise<void> {
		const root = path.join(this.config.dataDir, 'packages');
		await fs.mkdir(root, { recursive: true, mode: 0o750 });
		this.packageStore = new PackageStore(root, this.logger.child('packages'));

		const installed = await this.packageStore.packages();
		this.logger.info('Package store ready', { root, packages: installed });
	}
}
