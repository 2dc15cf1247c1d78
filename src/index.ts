export { SupervisorAgent } from './agent';
export type { SupervisorAgentOptions } from './agent';
export { ConfigLoader, SupervisorConfigSchema, ModuleConfigSchema, BackoffConfigSchema } from './config-loader';
export type { ConfigLoaderOptions, ModuleConfig, SupervisorConfig } from './config-loader';
export * from './errors';
export * from './identity';
export * from './logging';
export * from './materializer';
export * from './modules';
export { MqttManager, topicMatches } from './mqtt/mqtt-manager';
export * from './packages';
export * from './remote';
export * from './supervision';
