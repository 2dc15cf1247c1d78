export { AgentModule, SELF_INSTRUMENTATION_FRAGMENT } from './agent-module';
export type { AgentModuleOptions, Materializer } from './agent-module';
export { createAgentModule } from './module-factory';
export type { ModuleDependencies } from './module-factory';
export { SerialQueue } from './serial-queue';
