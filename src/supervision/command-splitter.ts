import { CommandSyntaxError } from '../errors';

/**
 * Characters that would need real shell quoting semantics to interpret.
 * The splitter refuses them instead of guessing.
 */
const UNSUPPORTED_CHARACTERS = ["'", '"', '`', '\\', '\n'];

/**
 * Split a command line such as `/usr/bin/otelcol --config /etc/config.yaml`
 * into program and arguments on whitespace.
 */
export function splitCommand(commandLine: string): string[] {
	for (const character of UNSUPPORTED_CHARACTERS) {
		if (commandLine.includes(character)) {
			throw new CommandSyntaxError(commandLine, character);
		}
	}

	return commandLine.split(/\s+/).filter((token) => token.length > 0);
}
