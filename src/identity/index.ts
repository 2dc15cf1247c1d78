export {
	resolveIdentifier,
	staticIdentifier,
	envIdentifier,
	hostnameIdentifier,
	machineIdIdentifier,
	defaultIdentifierChain,
	MACHINE_ID_PATHS,
} from './identifier-chain';
export type { IdentifierProvider } from './identifier-chain';
