/**
 * YAML Merger
 *
 * Deep-merges YAML fragments into a single config.yaml:
 * - an optional local base file is applied first
 * - fragments follow in lexicographic name order
 * - mappings merge key by key, anything else is replaced by the later fragment
 * - `$API_KEY` in the serialized result is replaced with the connection's API key
 */

import { promises as fs } from 'fs';
import yaml from 'js-yaml';
import _ from 'lodash';
import { MergeError } from '../errors';
import type { MergeStrategy, OutputConfigSet, RawConfigSet } from './merge-strategy';

export const API_KEY_PLACEHOLDER = '$API_KEY';
export const DEFAULT_OUTPUT_FILE = 'config.yaml';

type YamlMapping = Record<string, unknown>;

export interface YamlMergerOptions {
	/** Local YAML applied underneath every remote fragment */
	localConfigPath?: string;
	apiKey?: string;
	outputFile?: string;
}

export class YamlMerger implements MergeStrategy {
	private readonly localConfigPath?: string;
	private readonly apiKey: string;
	private readonly outputFile: string;

	constructor(options: YamlMergerOptions = {}) {
		this.localConfigPath = options.localConfigPath;
		this.apiKey = options.apiKey ?? '';
		this.outputFile = options.outputFile ?? DEFAULT_OUTPUT_FILE;
	}

	public async merge(raw: RawConfigSet): Promise<OutputConfigSet> {
		const documents: YamlMapping[] = [];

		if (this.localConfigPath) {
			documents.push(parseMapping(this.localConfigPath, await this.readLocalConfig(this.localConfigPath)));
		}

		for (const name of Object.keys(raw).sort()) {
			documents.push(parseMapping(name, raw[name].toString('utf8')));
		}

		const merged = documents.reduce<YamlMapping>((acc, doc) => _.mergeWith(acc, doc, replaceNonMappings), {});
		const serialized = yaml.dump(merged, { sortKeys: true, lineWidth: -1, noRefs: true });

		return {
			[this.outputFile]: Buffer.from(serialized.split(API_KEY_PLACEHOLDER).join(this.apiKey), 'utf8'),
		};
	}

	private async readLocalConfig(file: string): Promise<string> {
		try {
			return await fs.readFile(file, 'utf8');
		} catch (error) {
			throw new MergeError(file, 'cannot read local configuration', { cause: error });
		}
	}
}

function parseMapping(key: string, content: string): YamlMapping {
	let document: unknown;
	try {
		document = yaml.load(content, { filename: key });
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new MergeError(key, `malformed YAML: ${reason}`, { cause: error });
	}

	if (document === undefined || document === null) {
		return {};
	}

	if (!isMapping(document)) {
		throw new MergeError(key, `expected a YAML mapping, got ${Array.isArray(document) ? 'a sequence' : typeof document}`);
	}

	return document;
}

function isMapping(value: unknown): value is YamlMapping {
	return _.isPlainObject(value);
}

/**
 * Only mappings merge recursively; sequences and scalars from the later
 * fragment replace whatever was there.
 */
function replaceNonMappings(objValue: unknown, srcValue: unknown): unknown {
	if (isMapping(objValue) && isMapping(srcValue)) {
		return undefined;
	}
	return _.cloneDeep(srcValue);
}
