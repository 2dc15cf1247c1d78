/**
 * Shared test doubles: fake child processes, an in-memory MQTT connection,
 * loggers backed by MemoryLogBackend and temporary directories.
 */

import { EventEmitter } from 'events';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { PassThrough, Writable } from 'stream';
import { AgentLogger, ComponentLogger, MemoryLogBackend } from '../src/logging';
import type { MqttConnection, QoS } from '../src/remote';
import type { ChildHandle, SpawnFn } from '../src/supervision';

export class FakeChild extends EventEmitter implements ChildHandle {
	public readonly stdout = new PassThrough();
	public readonly stderr = new PassThrough();
	public readonly killSignals: Array<NodeJS.Signals | number | undefined> = [];
	public exited = false;

	constructor(
		public readonly pid: number,
		private readonly exitOnKill: boolean
	) {
		super();
	}

	public kill(signal?: NodeJS.Signals | number): boolean {
		this.killSignals.push(signal);
		if (this.exitOnKill || signal === 'SIGKILL') {
			setImmediate(() => this.exit(null, typeof signal === 'string' ? signal : 'SIGTERM'));
		}
		return true;
	}

	public exit(code: number | null = 0, signal: NodeJS.Signals | null = null): void {
		if (this.exited) {
			return;
		}
		this.exited = true;
		this.emit('exit', code, signal);
	}
}

export interface SpawnCall {
	command: string;
	args: string[];
	at: number;
}

export interface FakeSpawnOptions {
	/** Emit 'error' instead of 'spawn' */
	failWith?: Error;
	/** Throw synchronously from spawn */
	throwWith?: Error;
	/** Children exit when killed with any signal */
	exitOnKill?: boolean;
}

/**
 * Spawn function recording every call and handing out FakeChild instances
 */
export class FakeSpawner {
	public readonly calls: SpawnCall[] = [];
	public readonly children: FakeChild[] = [];
	private nextPid = 1000;

	constructor(private readonly options: FakeSpawnOptions = {}) {}

	public readonly spawn: SpawnFn = (command, args) => {
		if (this.options.throwWith) {
			throw this.options.throwWith;
		}

		const child = new FakeChild(this.nextPid++, this.options.exitOnKill ?? true);
		this.calls.push({ command, args, at: Date.now() });
		this.children.push(child);

		const failure = this.options.failWith;
		setImmediate(() => {
			if (failure) {
				child.emit('error', failure);
			} else {
				child.emit('spawn');
			}
		});
		return child;
	};

	public get last(): FakeChild {
		const child = this.children[this.children.length - 1];
		if (!child) {
			throw new Error('No child spawned yet');
		}
		return child;
	}

	/**
	 * Children that have not exited
	 */
	public alive(): FakeChild[] {
		return this.children.filter((child) => !child.exited);
	}
}

interface Subscription {
	qos?: QoS;
	handler?: (topic: string, payload: Buffer) => void;
}

export interface PublishedMessage {
	topic: string;
	payload: string;
	qos?: QoS;
	retain?: boolean;
}

// Mock MQTT Connection
export class MockMqttConnection implements MqttConnection {
	public readonly subscriptions = new Map<string, Subscription>();
	public readonly published: PublishedMessage[] = [];
	public connected = true;
	public failSubscribe?: Error;

	async publish(topic: string, payload: string | Buffer, options?: { qos?: QoS; retain?: boolean }): Promise<void> {
		this.published.push({ topic, payload: payload.toString(), qos: options?.qos, retain: options?.retain });
	}

	async subscribe(topic: string, options?: { qos?: QoS }, handler?: (topic: string, payload: Buffer) => void): Promise<void> {
		if (this.failSubscribe) {
			throw this.failSubscribe;
		}
		this.subscriptions.set(topic, { qos: options?.qos, handler });
	}

	async unsubscribe(topic: string): Promise<void> {
		this.subscriptions.delete(topic);
	}

	isConnected(): boolean {
		return this.connected;
	}

	// Test helper to simulate incoming message
	simulateMessage(topic: string, payload: string | Buffer): void {
		const subscription = this.subscriptions.get(topic);
		if (!subscription?.handler) {
			throw new Error(`No handler subscribed to ${topic}`);
		}
		subscription.handler(topic, Buffer.isBuffer(payload) ? payload : Buffer.from(payload));
	}

	/**
	 * Parsed JSON bodies published to `topic`, oldest first
	 */
	publishedTo(topic: string): unknown[] {
		return this.published.filter((message) => message.topic === topic).map((message) => JSON.parse(message.payload));
	}
}

export interface TestLogger {
	backend: MemoryLogBackend;
	agentLogger: AgentLogger;
	logger: ComponentLogger;
}

export function createTestLogger(component = 'Test'): TestLogger {
	const backend = new MemoryLogBackend();
	const agentLogger = new AgentLogger(backend, 'debug');
	return { backend, agentLogger, logger: new ComponentLogger(agentLogger, component) };
}

/**
 * Writable collecting everything written to it
 */
export class CollectingStream extends Writable {
	private readonly chunks: Buffer[] = [];

	_write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
		this.chunks.push(chunk);
		callback();
	}

	text(): string {
		return Buffer.concat(this.chunks).toString('utf8');
	}
}

export async function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
	const deadline = Date.now() + timeoutMs;
	while (!predicate()) {
		if (Date.now() > deadline) {
			throw new Error(`Condition not met within ${timeoutMs}ms`);
		}
		await new Promise((resolve) => setTimeout(resolve, 5));
	}
}

/**
 * Resolve with the rejection reason of `promise`, failing if it resolves
 */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
	try {
		await promise;
	} catch (error) {
		return error;
	}
	throw new Error('Expected promise to reject');
}

export async function makeTempDir(prefix = 'supervisor-test-'): Promise<string> {
	return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
	await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Relative paths of every file under `dir`, sorted
 */
export async function listFiles(dir: string): Promise<string[]> {
	const files: string[] = [];
	const walk = async (current: string): Promise<void> => {
		for (const entry of await fs.readdir(current, { withFileTypes: true })) {
			const full = path.join(current, entry.name);
			if (entry.isDirectory()) {
				await walk(full);
			} else {
				files.push(path.relative(dir, full));
			}
		}
	};
	await walk(dir);
	return files.sort();
}
