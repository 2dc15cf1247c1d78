export { splitCommand } from './command-splitter';
export {
	FixedBackoff,
	LinearBackoff,
	ExponentialBackoff,
	CountingBackoff,
	backoffFromFunction,
	createBackoffFactory,
	DEFAULT_BACKOFF_DELAY_MS,
	DEFAULT_RESET_AFTER_MS,
} from './backoff';
export type {
	BackoffConfig,
	BackoffDecision,
	BackoffFactory,
	BackoffPolicy,
	BackoffType,
	CountingBackoffOptions,
	ExponentialBackoffOptions,
} from './backoff';
export { ProcessSupervisor } from './process-supervisor';
export type {
	ChildHandle,
	ProcessSupervisorOptions,
	SpawnFn,
	Supervisor,
	SupervisorState,
	TerminationPolicy,
} from './process-supervisor';
