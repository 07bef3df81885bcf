export { QueueStore } from './store.js';
export { QueueCorruptError, TopicValidationError } from './errors.js';
export { encodeTopic, topicPaths, validateTopic } from './topic.js';
export type { TopicPaths } from './topic.js';
export { formatUtcTimestamp } from './timestamp.js';
export type { LockMode } from './lock.js';
export type { Message, QueueEnvelope } from './types.js';
