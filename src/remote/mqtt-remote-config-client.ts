/**
 * MQTT Remote Config Client
 *
 * Topics, relative to `{topicPrefix}/{instanceId}`:
 * - `config`       (subscribe) configuration pushes, JSON RemoteConfigPayload
 * - `description`  (publish, retained) identifying attributes
 * - `health`       (publish, retained) AgentHealth
 * - `status`       (publish) RemoteConfigStatus
 */

import type { ComponentLogger } from '../logging';
import type { RawConfigSet } from '../materializer';
import {
	RemoteConfigPayloadSchema,
	type AgentHealth,
	type MqttConnection,
	type RemoteConfigCallbacks,
	type RemoteConfigClient,
	type RemoteConfigMessage,
	type RemoteConfigStatus,
} from './types';

export interface MqttRemoteConfigClientOptions {
	connection: MqttConnection;
	instanceId: string;
	topicPrefix?: string;
	logger?: ComponentLogger;
}

const QOS_AT_LEAST_ONCE = 1;

export class MqttRemoteConfigTopics {
	public readonly config: string;
	public readonly description: string;
	public readonly health: string;
	public readonly status: string;

	constructor(topicPrefix: string, instanceId: string) {
		const base = `${topicPrefix}/${instanceId}`;
		this.config = `${base}/config`;
		this.description = `${base}/description`;
		this.health = `${base}/health`;
		this.status = `${base}/status`;
	}
}

export class MqttRemoteConfigClient implements RemoteConfigClient {
	public readonly topics: MqttRemoteConfigTopics;
	private readonly connection: MqttConnection;
	private readonly logger?: ComponentLogger;
	private callbacks?: RemoteConfigCallbacks;

	constructor(options: MqttRemoteConfigClientOptions) {
		this.connection = options.connection;
		this.logger = options.logger;
		this.topics = new MqttRemoteConfigTopics(options.topicPrefix ?? 'supervisor', options.instanceId);
	}

	public async start(callbacks: RemoteConfigCallbacks): Promise<void> {
		this.callbacks = callbacks;

		try {
			await this.connection.subscribe(
				this.topics.config,
				{ qos: QOS_AT_LEAST_ONCE },
				(_topic, payload) => this.handleConfigMessage(payload)
			);
		} catch (error) {
			const failure = error instanceof Error ? error : new Error(String(error));
			callbacks.onConnectFailed?.(failure);
			throw failure;
		}

		this.logger?.debug('Subscribed to remote config topic', { topic: this.topics.config });
		callbacks.onConnect?.();
	}

	public async stop(): Promise<void> {
		if (!this.callbacks) {
			return;
		}
		this.callbacks = undefined;
		await this.connection.unsubscribe(this.topics.config);
	}

	public async setAgentDescription(identifyingAttributes: Record<string, string>): Promise<void> {
		await this.publish(this.topics.description, { identifyingAttributes }, true);
	}

	public async setHealth(health: AgentHealth): Promise<void> {
		await this.publish(this.topics.health, health, true);
	}

	public async setRemoteConfigStatus(status: RemoteConfigStatus): Promise<void> {
		await this.publish(this.topics.status, status, false);
	}

	private async publish(topic: string, body: object, retain: boolean): Promise<void> {
		if (!this.connection.isConnected()) {
			this.logger?.warn('MQTT not connected, dropping report', { topic });
			return;
		}
		await this.connection.publish(topic, JSON.stringify(body), { qos: QOS_AT_LEAST_ONCE, retain });
	}

	private handleConfigMessage(payload: Buffer): void {
		const callbacks = this.callbacks;
		if (!callbacks) {
			return;
		}

		let message: RemoteConfigMessage;
		try {
			message = decodeRemoteConfig(payload);
		} catch (error) {
			const failure = error instanceof Error ? error : new Error(String(error));
			this.logger?.warn('Ignoring undecodable remote config', { error: failure.message });
			callbacks.onError?.(failure);
			return;
		}

		callbacks.onRemoteConfig(message);
	}
}

/**
 * Decode a JSON config push into a RemoteConfigMessage
 */
export function decodeRemoteConfig(payload: Buffer | string): RemoteConfigMessage {
	let json: unknown;
	try {
		json = JSON.parse(payload.toString());
	} catch (error) {
		throw new Error('Remote config payload is not valid JSON', { cause: error });
	}

	const parsed = RemoteConfigPayloadSchema.safeParse(json);
	if (!parsed.success) {
		const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
		throw new Error(`Invalid remote config payload: ${issues.join('; ')}`);
	}

	const config: RawConfigSet = {};
	for (const [name, file] of Object.entries(parsed.data.config)) {
		config[name] = Buffer.from(file.body, file.encoding);
	}

	return {
		...(parsed.data.configHash !== undefined ? { configHash: parsed.data.configHash } : {}),
		config,
	};
}
