export * from './config';
export * from './credentials';
export * from './descriptive_store';
export * from './embedder';
export * from './errors';
export * from './extractor';
export * from './file_scanner';
export * from './index_writer';
export * from './job_queue';
export * from './keys';
export * from './log';
export * from './orchestrator';
export * from './output_format';
export * from './pool';
export * from './records';
export * from './redis_store';
export * from './session';
export * from './store_client';
export * from './telemetry';
export * from './vector_index';
export * from './vectorize';
export * from './watcher';
