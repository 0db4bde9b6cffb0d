export * from './config';
export * from './logger';
export * from './errors';
export * from './db';
export * from './http/metrics';
export * from './tracing';
export * from './events';
export * from './cache/TtlCache';
export * from './concurrency/Mutex';
