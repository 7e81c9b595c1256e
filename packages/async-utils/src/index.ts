export * from './PromiseQueue.js';
export * from './KeyedQueue.js';
export * from './ListenerCleaner.js';
