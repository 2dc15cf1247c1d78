/**
 * Unit tests for AgentModule
 *
 * Uses the real materializer, history, process supervisor and MQTT remote
 * config client over a MockMqttConnection and FakeSpawner.
 */

import { promises as fs } from 'fs';
import path from 'path';
import {
	BackoffExhaustedError,
	CancelledError,
	CommandSyntaxError,
	HistoryError,
	MergeError,
	SpawnError,
} from '../../src/errors';
import { ConfigHistory, ConfigMaterializer, YamlMerger, type HistoryTracker } from '../../src/materializer';
import { AgentModule, SELF_INSTRUMENTATION_FRAGMENT, type Materializer } from '../../src/modules';
import { MqttRemoteConfigClient } from '../../src/remote';
import { createBackoffFactory, ProcessSupervisor, type SpawnFn, type Supervisor } from '../../src/supervision';
import {
	CollectingStream,
	createTestLogger,
	FakeSpawner,
	makeTempDir,
	MockMqttConnection,
	rejectionOf,
	removeDir,
	waitFor,
} from '../helpers';

const INSTANCE_ID = 'inst-1';
const BINARY = '/opt/collector/bin/collector';
const CONFIG_TOPIC = `supervisor/${INSTANCE_ID}/config`;
const HEALTH_TOPIC = `supervisor/${INSTANCE_ID}/health`;
const STATUS_TOPIC = `supervisor/${INSTANCE_ID}/status`;
const DESCRIPTION_TOPIC = `supervisor/${INSTANCE_ID}/description`;

interface ModuleOverrides {
	spawnFn?: SpawnFn;
	supervisor?: Supervisor;
	history?: HistoryTracker;
	materializer?: Materializer;
	binaryPath?: string;
}

describe('AgentModule', () => {
	let dir: string;
	let root: string;
	let connection: MockMqttConnection;
	let spawner: FakeSpawner;
	let history: ConfigHistory;

	beforeEach(async () => {
		dir = await makeTempDir();
		root = path.join(dir, INSTANCE_ID, 'config');
		connection = new MockMqttConnection();
		spawner = new FakeSpawner({ exitOnKill: true });
		history = new ConfigHistory();
	});

	afterEach(async () => {
		await removeDir(dir);
	});

	function createModule(overrides: ModuleOverrides = {}): AgentModule {
		const { logger } = createTestLogger('Module');
		return new AgentModule({
			name: 'collector',
			instanceId: INSTANCE_ID,
			hostId: 'host-1',
			binaryPath: overrides.binaryPath ?? BINARY,
			materializer: overrides.materializer ?? new ConfigMaterializer({ merger: new YamlMerger(), root }),
			history: overrides.history ?? history,
			supervisor:
				overrides.supervisor ??
				new ProcessSupervisor({
					logger: logger.child('process'),
					backoff: createBackoffFactory({ type: 'fixed', delayMs: 10 }),
					termination: { signal: 'SIGTERM', timeoutMs: 1000 },
					spawnFn: overrides.spawnFn ?? spawner.spawn,
					output: new CollectingStream(),
				}),
			client: new MqttRemoteConfigClient({ connection, instanceId: INSTANCE_ID, logger: logger.child('remote') }),
			logger,
		});
	}

	function push(config: Record<string, string>, configHash?: string): void {
		const files = Object.fromEntries(Object.entries(config).map(([name, body]) => [name, { body }]));
		connection.simulateMessage(CONFIG_TOPIC, JSON.stringify({ configHash, config: files }));
	}

	const statuses = () => connection.publishedTo(STATUS_TOPIC);
	const healthReports = () => connection.publishedTo(HEALTH_TOPIC);

	it('publishes its description and reports unhealthy until configured', async () => {
		const module = createModule();
		await module.start();

		expect(connection.publishedTo(DESCRIPTION_TOPIC)).toEqual([
			{ identifyingAttributes: { 'agent.type': 'collector', 'instance.id': INSTANCE_ID, 'host.id': 'host-1' } },
		]);
		expect(healthReports()).toEqual([{ healthy: false }]);
		expect(module.running()).toBe(true);
		expect(spawner.calls).toHaveLength(0);

		await module.stop();
	});

	it('materializes a push and starts the binary on the new location', async () => {
		const module = createModule();
		await module.start();

		push({ receivers: 'receivers:\n  otlp: {}\n' }, 'hash-1');
		await waitFor(() => statuses().length === 1);

		const location = module.currentLocation();
		expect(path.dirname(location)).toBe(root);
		expect(spawner.calls.map((call) => [call.command, call.args])).toEqual([
			[BINARY, ['--config', path.join(location, 'config.yaml')]],
		]);
		expect(await fs.readFile(path.join(location, 'config.yaml'), 'utf8')).toBe(
			[
				'receivers:',
				'  otlp: {}',
				'service:',
				'  telemetry:',
				'    resource:',
				`      service.instance.id: ${INSTANCE_ID}`,
				'      service.name: collector',
				'',
			].join('\n')
		);
		expect(statuses()).toEqual([{ status: 'APPLIED', lastRemoteConfigHash: 'hash-1' }]);
		expect(healthReports()[1]).toEqual({ healthy: true, startTimeUnixMs: expect.any(Number) });
		expect(history.locations()).toEqual([location]);
		expect(module.currentGeneration()).toBe(1);

		await module.stop();
	});

	it('keeps the running process when the effective config is unchanged', async () => {
		const module = createModule();
		await module.start();

		push({ receivers: 'receivers:\n  otlp: {}\n' }, 'hash-1');
		push({ receivers: 'receivers: {otlp: {}}\n' }, 'hash-2');
		await waitFor(() => statuses().length === 2);

		expect(spawner.calls).toHaveLength(1);
		expect(spawner.last.killSignals).toEqual([]);
		expect(module.currentGeneration()).toBe(1);
		expect(statuses()).toEqual([
			{ status: 'APPLIED', lastRemoteConfigHash: 'hash-1' },
			{ status: 'APPLIED', lastRemoteConfigHash: 'hash-2' },
		]);

		await module.stop();
	});

	it('stops the previous child before starting one for a changed config', async () => {
		const aliveAtSpawn: number[] = [];
		const module = createModule({
			spawnFn: (command, args, options) => {
				aliveAtSpawn.push(spawner.alive().length);
				return spawner.spawn(command, args, options);
			},
		});
		await module.start();

		push({ receivers: 'receivers:\n  otlp: {}\n' });
		await waitFor(() => statuses().length === 1);
		const first = module.currentLocation();

		push({ receivers: 'receivers:\n  jaeger: {}\n' });
		await waitFor(() => statuses().length === 2);
		const second = module.currentLocation();

		expect(second).not.toBe(first);
		expect(aliveAtSpawn).toEqual([0, 0]);
		expect(spawner.children[0].killSignals).toEqual(['SIGTERM']);
		expect(spawner.alive()).toHaveLength(1);
		expect(spawner.calls[1].args).toEqual(['--config', path.join(second, 'config.yaml')]);
		expect(history.locations()).toEqual([first, second]);
		expect(module.currentGeneration()).toBe(2);

		await module.stop();
	});

	it('fails on a merge error and reports it', async () => {
		const module = createModule();
		const outcome = rejectionOf(module.run());
		await waitFor(() => module.running());

		push({ bad: '- a\n- b\n' }, 'hash-bad');
		const error = await outcome;

		const message = '"bad": merging config fragments: expected a YAML mapping, got a sequence';
		expect(error).toBeInstanceOf(MergeError);
		expect(error).toMatchObject({ message });
		expect(statuses()).toEqual([{ status: 'FAILED', lastRemoteConfigHash: 'hash-bad', errorMessage: message }]);
		expect(healthReports()[healthReports().length - 1]).toEqual({
			healthy: false,
			startTimeUnixMs: expect.any(Number),
			lastError: message,
		});
		expect(module.running()).toBe(false);
		expect(connection.subscriptions.has(CONFIG_TOPIC)).toBe(false);
		expect(spawner.calls).toHaveLength(0);
	});

	it('fails when the binary cannot be started', async () => {
		const failing = new FakeSpawner({ failWith: new Error('spawn ENOENT') });
		const module = createModule({ spawnFn: failing.spawn });
		const outcome = rejectionOf(module.run());
		await waitFor(() => module.running());

		push({ receivers: 'receivers: {}\n' });
		const error = await outcome;

		expect(error).toBeInstanceOf(SpawnError);
		expect(healthReports()[healthReports().length - 1]).toMatchObject({
			healthy: false,
			lastError: `Failed to start "${BINARY}": spawn ENOENT`,
		});
		expect(module.running()).toBe(false);
	});

	it('fails when the binary path needs shell quoting', async () => {
		const module = createModule({ binaryPath: "/opt/collector's/bin/collector" });
		const outcome = rejectionOf(module.run());
		await waitFor(() => module.running());

		push({ receivers: 'receivers: {}\n' });

		expect(await outcome).toBeInstanceOf(CommandSyntaxError);
		expect(spawner.calls).toHaveLength(0);
	});

	it('fails when the history tracker fails', async () => {
		const module = createModule({
			history: {
				push: async () => {
					throw new Error('read-only filesystem');
				},
			},
		});
		const outcome = rejectionOf(module.run());
		await waitFor(() => module.running());

		push({ receivers: 'receivers: {}\n' });
		const error = await outcome;

		expect(error).toBeInstanceOf(HistoryError);
		expect(error).toMatchObject({ message: expect.stringMatching(/read-only filesystem$/) });
		expect(spawner.calls).toHaveLength(0);
	});

	it('ignores the outcome of a superseded supervision', async () => {
		const started: AbortSignal[] = [];
		const supervisor: Supervisor = {
			supervise: (_command, _args, signal) => {
				started.push(signal);
				return new Promise<never>((_resolve, reject) => {
					// Report a fatal error instead of a cancellation
					signal.addEventListener('abort', () => reject(new BackoffExhaustedError('late failure')), { once: true });
				});
			},
		};
		const module = createModule({ supervisor });
		await module.start();

		push({ receivers: 'receivers:\n  otlp: {}\n' });
		push({ receivers: 'receivers:\n  jaeger: {}\n' });
		await waitFor(() => statuses().length === 2);

		expect(started).toHaveLength(2);
		expect(started[0].aborted).toBe(true);
		expect(started[1].aborted).toBe(false);
		expect(module.running()).toBe(true);

		await module.stop();
		expect(started[1].aborted).toBe(true);
	});

	it('ignores undecodable pushes', async () => {
		const module = createModule();
		await module.start();

		connection.simulateMessage(CONFIG_TOPIC, '{"config": 42}');
		await new Promise((resolve) => setTimeout(resolve, 20));

		expect(module.running()).toBe(true);
		expect(statuses()).toEqual([]);
		expect(spawner.calls).toHaveLength(0);

		await module.stop();
	});

	it('stops the child and resolves run() on stop', async () => {
		const module = createModule();
		const finished = module.run();
		await waitFor(() => module.running());

		push({ receivers: 'receivers: {}\n' });
		await waitFor(() => spawner.calls.length === 1 && statuses().length === 1);

		await module.stop();

		await expect(finished).resolves.toBeUndefined();
		expect(spawner.last.killSignals).toEqual(['SIGTERM']);
		expect(spawner.alive()).toHaveLength(0);
		expect(connection.subscriptions.has(CONFIG_TOPIC)).toBe(false);
	});

	it('injects the self-identification fragment under its reserved name', async () => {
		const received: string[] = [];
		const module = new AgentModule({
			name: 'collector',
			instanceId: INSTANCE_ID,
			hostId: 'host-1',
			binaryPath: BINARY,
			materializer: {
				handle: async (raw) => {
					received.push(...Object.keys(raw));
					return path.join(root, 'fixed');
				},
			},
			history,
			supervisor: { supervise: (_command, _args, signal) => new Promise<never>((_resolve, reject) => {
				signal.addEventListener('abort', () => reject(new CancelledError()), { once: true });
			}) },
			client: new MqttRemoteConfigClient({ connection, instanceId: INSTANCE_ID }),
			logger: createTestLogger('Module').logger,
		});
		await module.start();

		push({ receivers: 'receivers: {}\n' });
		await waitFor(() => statuses().length === 1);

		expect(received).toEqual(['receivers', SELF_INSTRUMENTATION_FRAGMENT]);
		await module.stop();
	});

	it('keeps running when a supervision ends with a non-fatal error', async () => {
		const module = createModule({
			supervisor: {
				supervise: async () => {
					throw new CancelledError('cancelled elsewhere');
				},
			},
		});
		await module.start();

		push({ receivers: 'receivers: {}\n' });
		await waitFor(() => statuses().length === 1);

		expect(new CancelledError().fatal).toBe(false);
		expect(statuses()).toEqual([{ status: 'APPLIED' }]);
		expect(module.running()).toBe(true);

		await module.stop();
	});

	describe('when the supervision fails while a push is in flight', () => {
		interface PendingSupervision {
			signal: AbortSignal;
			reject(error: Error): void;
		}

		let supervisions: PendingSupervision[];
		let supervisor: Supervisor;

		beforeEach(() => {
			supervisions = [];
			supervisor = {
				supervise: (_command, _args, signal) =>
					new Promise<never>((_resolve, reject) => {
						supervisions.push({ signal, reject });
						signal.addEventListener('abort', () => reject(new CancelledError()), { once: true });
					}),
			};
		});

		it('does not start a process for a push still being materialized', async () => {
			let releaseSecond: (location: string) => void = () => undefined;
			let handled = 0;
			const materializer: Materializer = {
				handle: () => {
					handled++;
					if (handled === 1) {
						return Promise.resolve(path.join(root, 'loc-1'));
					}
					return new Promise<string>((resolve) => {
						releaseSecond = resolve;
					});
				},
			};
			const module = createModule({ supervisor, materializer, history: { push: async () => undefined } });
			const outcome = rejectionOf(module.run());
			await waitFor(() => module.running());

			push({ receivers: 'receivers: {}\n' }, 'hash-1');
			await waitFor(() => supervisions.length === 1 && statuses().length === 1);
			push({ receivers: 'receivers:\n  otlp: {}\n' }, 'hash-2');
			await waitFor(() => handled === 2);

			supervisions[0].reject(new BackoffExhaustedError('too many restarts'));
			expect(await outcome).toBeInstanceOf(BackoffExhaustedError);
			expect(module.running()).toBe(false);

			releaseSecond(path.join(root, 'loc-2'));
			await new Promise((resolve) => setTimeout(resolve, 20));

			expect(supervisions).toHaveLength(1);
			expect(module.currentLocation()).toBe(path.join(root, 'loc-1'));
			expect(statuses()).toEqual([{ status: 'APPLIED', lastRemoteConfigHash: 'hash-1' }]);
			expect(healthReports()[healthReports().length - 1]).toEqual({
				healthy: false,
				startTimeUnixMs: expect.any(Number),
				lastError: 'Giving up restarting process: too many restarts',
			});
		});

		it('does not start a process for a push still being recorded in history', async () => {
			let releaseHistory: () => void = () => undefined;
			let recorded = 0;
			const module = createModule({
				supervisor,
				history: {
					push: () => {
						recorded++;
						if (recorded === 1) {
							return Promise.resolve();
						}
						return new Promise<void>((resolve) => {
							releaseHistory = resolve;
						});
					},
				},
			});
			const outcome = rejectionOf(module.run());
			await waitFor(() => module.running());

			push({ receivers: 'receivers: {}\n' }, 'hash-1');
			await waitFor(() => supervisions.length === 1 && statuses().length === 1);
			const first = module.currentLocation();
			push({ receivers: 'receivers:\n  otlp: {}\n' }, 'hash-2');
			await waitFor(() => recorded === 2);

			supervisions[0].reject(new BackoffExhaustedError('too many restarts'));
			expect(await outcome).toBeInstanceOf(BackoffExhaustedError);

			releaseHistory();
			await new Promise((resolve) => setTimeout(resolve, 20));

			expect(supervisions).toHaveLength(1);
			expect(module.currentLocation()).toBe(first);
			expect(statuses()).toEqual([{ status: 'APPLIED', lastRemoteConfigHash: 'hash-1' }]);
		});
	});
});
