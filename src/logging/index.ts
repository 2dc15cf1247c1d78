/**
 * Logging Module
 * ==============
 */

export * from './types';
export { AgentLogger } from './agent-logger';
export { ComponentLogger } from './component-logger';
export { MemoryLogBackend } from './memory-backend';
export { WinstonLogBackend } from './winston-backend';
