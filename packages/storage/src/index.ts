export * from './json-file-store.js';
export * from './jsonl-log.js';
