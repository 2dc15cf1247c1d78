export { ConfigMaterializer } from './config-materializer';
export type { ConfigMaterializerOptions, MaterializerFileSystem } from './config-materializer';
export { hashOutputConfig } from './content-hash';
export { mergerFunc } from './merge-strategy';
export type { MergeStrategy, OutputConfigSet, RawConfigSet } from './merge-strategy';
export { YamlMerger, API_KEY_PLACEHOLDER, DEFAULT_OUTPUT_FILE } from './yaml-merger';
export type { YamlMergerOptions } from './yaml-merger';
export { ConfigHistory } from './config-history';
export type { HistoryTracker, ConfigHistoryOptions } from './config-history';
