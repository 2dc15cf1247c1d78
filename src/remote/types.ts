import { z } from 'zod';
import type { RawConfigSet } from '../materializer';

/**
 * A configuration push from the management server
 */
export interface RemoteConfigMessage {
	/** Server-side hash identifying this config, echoed back in status reports */
	configHash?: string;
	config: RawConfigSet;
}

export interface AgentHealth {
	healthy: boolean;
	startTimeUnixMs?: number;
	lastError?: string;
}

export type RemoteConfigStatusValue = 'APPLIED' | 'FAILED';

export interface RemoteConfigStatus {
	status: RemoteConfigStatusValue;
	lastRemoteConfigHash?: string;
	errorMessage?: string;
}

export interface RemoteConfigCallbacks {
	/** Invoked for every valid configuration push */
	onRemoteConfig(message: RemoteConfigMessage): void;
	onConnect?(): void;
	onConnectFailed?(error: Error): void;
	/** Server errors and undecodable messages */
	onError?(error: Error): void;
}

/**
 * Client side of the remote management channel, one per agent module
 */
export interface RemoteConfigClient {
	start(callbacks: RemoteConfigCallbacks): Promise<void>;
	stop(): Promise<void>;
	setAgentDescription(identifyingAttributes: Record<string, string>): Promise<void>;
	setHealth(health: AgentHealth): Promise<void>;
	setRemoteConfigStatus(status: RemoteConfigStatus): Promise<void>;
}

export type QoS = 0 | 1 | 2;

/**
 * MQTT connection used by the remote config client
 */
export interface MqttConnection {
	publish(topic: string, payload: string | Buffer, options?: { qos?: QoS; retain?: boolean }): Promise<void>;
	subscribe(topic: string, options?: { qos?: QoS }, handler?: (topic: string, payload: Buffer) => void): Promise<void>;
	unsubscribe(topic: string): Promise<void>;
	isConnected(): boolean;
}

export const RemoteConfigFileSchema = z.object({
	body: z.string(),
	encoding: z.enum(['utf8', 'base64']).default('utf8'),
});

export const RemoteConfigPayloadSchema = z.object({
	configHash: z.string().optional(),
	config: z.record(z.string().min(1), RemoteConfigFileSchema),
});

export type RemoteConfigPayload = z.infer<typeof RemoteConfigPayloadSchema>;
