import path from 'path';
import type { Writable } from 'stream';
import { v7 as uuidv7 } from 'uuid';
import type { ModuleConfig } from '../config-loader';
import type { ComponentLogger } from '../logging';
import { ConfigHistory, ConfigMaterializer, YamlMerger } from '../materializer';
import { MqttRemoteConfigClient, type MqttConnection } from '../remote';
import { createBackoffFactory, ProcessSupervisor, type SpawnFn } from '../supervision';
import { AgentModule } from './agent-module';

export interface ModuleDependencies {
	dataDir: string;
	hostId: string;
	connection: MqttConnection;
	topicPrefix: string;
	/** Remote connection headers; `API-Key` replaces $API_KEY in configs */
	headers?: Record<string, string>;
	logger: ComponentLogger;
	/** Fresh UUIDv7 when omitted */
	instanceId?: string;
	spawnFn?: SpawnFn;
	output?: Writable;
}

/**
 * Wire an AgentModule from its configuration entry
 */
export function createAgentModule(config: ModuleConfig, deps: ModuleDependencies): AgentModule {
	const instanceId = deps.instanceId ?? uuidv7();
	const logger = deps.logger.child(config.name);
	const root = path.join(deps.dataDir, instanceId, 'config');

	const merger = new YamlMerger({
		localConfigPath: config.localConfigPath,
		apiKey: deps.headers?.['API-Key'] ?? '',
	});

	const supervisor = new ProcessSupervisor({
		logger: logger.child('process'),
		backoff: createBackoffFactory(config.backoff),
		termination: { signal: config.stopSignal, timeoutMs: config.stopTimeoutMs },
		spawnFn: deps.spawnFn,
		output: deps.output,
	});

	return new AgentModule({
		name: config.name,
		instanceId,
		hostId: deps.hostId,
		binaryPath: config.binaryPath,
		materializer: new ConfigMaterializer({ merger, root, logger: logger.child('materializer') }),
		history: new ConfigHistory({ maxEntries: config.historySize, logger: logger.child('history') }),
		supervisor,
		client: new MqttRemoteConfigClient({
			connection: deps.connection,
			instanceId,
			topicPrefix: deps.topicPrefix,
			logger: logger.child('remote'),
		}),
		logger,
	});
}
