/**
 * Supervisor Entry Point
 *
 * Loads the configuration, starts the agent and stops it gracefully on
 * SIGINT/SIGTERM.
 */

import process from 'process';
import { SupervisorAgent } from './agent';
import { ConfigLoader } from './config-loader';

let agent: SupervisorAgent | undefined;
let shuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
	if (shuttingDown) {
		console.log(`Already shutting down, ignoring ${signal}`);
		return;
	}

	shuttingDown = true;
	console.log(`\n${signal} received. Starting graceful shutdown...`);

	try {
		await agent?.stop();
		process.exit(0);
	} catch (error) {
		console.error('Error during shutdown:', error);
		process.exit(1);
	}
}

async function main(): Promise<void> {
	const config = new ConfigLoader().load();
	agent = new SupervisorAgent(config);

	process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
	process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
	process.on('unhandledRejection', (reason) => {
		console.error('Unhandled rejection:', reason);
		void gracefulShutdown('unhandledRejection');
	});

	await agent.init();
}

main().catch((error: unknown) => {
	console.error('Failed to start supervisor:', error);
	process.exit(1);
});
