export * from './types';
export { MqttRemoteConfigClient, MqttRemoteConfigTopics, decodeRemoteConfig } from './mqtt-remote-config-client';
export type { MqttRemoteConfigClientOptions } from './mqtt-remote-config-client';
