import mqtt, { type IClientOptions, type MqttClient } from 'mqtt';
import type { ComponentLogger } from '../logging';
import type { MqttConnection, QoS } from '../remote';

type MessageHandler = (topic: string, payload: Buffer) => void;

/**
 * Shared MQTT connection for every agent module's remote config client.
 * Reconnection is left to the mqtt client (`reconnectPeriod`).
 */
export class MqttManager implements MqttConnection {
	private client: MqttClient | null = null;
	private connected = false;
	private messageHandlers: Map<string, Set<MessageHandler>> = new Map();
	private connectionPromise: Promise<void> | null = null;

	constructor(private readonly logger?: ComponentLogger) {}

	/**
	 * Connect to MQTT broker (idempotent - can be called multiple times)
	 */
	public async connect(brokerUrl: string, options?: IClientOptions, timeoutMs = 10000): Promise<void> {
		if (this.client && this.connected) {
			return;
		}

		if (this.connectionPromise) {
			return this.connectionPromise;
		}

		this.logger?.info(`Connecting to MQTT broker: ${brokerUrl}`);

		this.connectionPromise = new Promise<void>((resolve, reject) => {
			const client = mqtt.connect(brokerUrl, {
				...options,
				clean: true,
				reconnectPeriod: 5000,
				connectTimeout: timeoutMs,
			});
			this.client = client;

			const connectionTimeout = setTimeout(() => {
				if (!this.connected) {
					client.end(true);
					this.connectionPromise = null;
					reject(new Error(`MQTT connection timeout after ${timeoutMs}ms: ${brokerUrl}`));
				}
			}, timeoutMs);

			client.on('connect', () => {
				clearTimeout(connectionTimeout);
				this.connected = true;
				this.connectionPromise = null;
				this.logger?.info('Connected to MQTT broker');
				resolve();
			});

			client.on('error', (err) => {
				this.logger?.warn('MQTT error', { error: err.message });
				if (!this.connected) {
					clearTimeout(connectionTimeout);
					this.connectionPromise = null;
					reject(err);
				}
			});

			client.on('reconnect', () => {
				this.logger?.debug('Reconnecting to MQTT broker...');
			});

			client.on('offline', () => {
				this.connected = false;
				this.logger?.warn('MQTT client offline');
			});

			client.on('close', () => {
				this.connected = false;
			});

			client.on('message', (topic: string, payload: Buffer) => {
				this.routeMessage(topic, payload);
			});
		});

		return this.connectionPromise;
	}

	public async publish(topic: string, payload: string | Buffer, options?: { qos?: QoS; retain?: boolean }): Promise<void> {
		const client = this.requireClient();

		await new Promise<void>((resolve, reject) => {
			client.publish(topic, payload, options ?? {}, (error) => {
				if (error) {
					reject(error);
				} else {
					resolve();
				}
			});
		});
	}

	/**
	 * Subscribe to MQTT topic with optional handler
	 */
	public async subscribe(topic: string, options?: { qos?: QoS }, handler?: MessageHandler): Promise<void> {
		const client = this.requireClient();

		await new Promise<void>((resolve, reject) => {
			client.subscribe(topic, { qos: options?.qos ?? 0 }, (error, granted) => {
				if (error) {
					reject(new Error(`Subscribe error for ${topic}: ${error.message || 'Unspecified error'}`));
					return;
				}

				if (!granted || granted.length === 0) {
					reject(new Error(`Subscribe failed: No subscription granted for topic: ${topic}`));
					return;
				}

				// QoS 128 means the broker rejected the subscription
				if (granted[0].qos === 128) {
					reject(new Error(`Subscribe rejected by broker (QoS=128) for topic: ${topic}`));
					return;
				}

				if (handler) {
					const handlers = this.messageHandlers.get(topic) ?? new Set<MessageHandler>();
					handlers.add(handler);
					this.messageHandlers.set(topic, handlers);
				}
				this.logger?.debug(`Subscribed to topic: ${topic}`, { qos: granted[0].qos });
				resolve();
			});
		});
	}

	public async unsubscribe(topic: string): Promise<void> {
		const client = this.requireClient();

		await new Promise<void>((resolve, reject) => {
			client.unsubscribe(topic, (error) => {
				if (error) {
					reject(error);
				} else {
					this.messageHandlers.delete(topic);
					resolve();
				}
			});
		});
	}

	public isConnected(): boolean {
		return this.connected && this.client !== null;
	}

	public async disconnect(): Promise<void> {
		const client = this.client;
		if (!client) {
			return;
		}

		await new Promise<void>((resolve) => {
			client.end(false, {}, () => resolve());
		});
		this.client = null;
		this.connected = false;
		this.messageHandlers.clear();
		this.logger?.info('Disconnected from MQTT broker');
	}

	private requireClient(): MqttClient {
		if (!this.client || !this.connected) {
			throw new Error('MQTT client not connected');
		}
		return this.client;
	}

	private routeMessage(topic: string, payload: Buffer): void {
		for (const [subscribedTopic, handlers] of this.messageHandlers.entries()) {
			if (!topicMatches(subscribedTopic, topic)) {
				continue;
			}
			handlers.forEach((handler) => {
				try {
					handler(topic, payload);
				} catch (error) {
					this.logger?.error(`Error in MQTT message handler for topic ${topic}`, error instanceof Error ? error : new Error(String(error)));
				}
			});
		}
	}
}

/**
 * Check if a topic matches a subscription pattern (supports + and # wildcards)
 */
export function topicMatches(pattern: string, topic: string): boolean {
	const patternParts = pattern.split('/');
	const topicParts = topic.split('/');

	for (let i = 0; i < patternParts.length; i++) {
		if (patternParts[i] === '#') {
			return true;
		}
		if (i >= topicParts.length) {
			return false;
		}
		if (patternParts[i] !== '+' && patternParts[i] !== topicParts[i]) {
			return false;
		}
	}

	return patternParts.length === topicParts.length;
}
