import { ConnectionOptions, JobsOptions, Queue, Worker } from 'bullmq';
import { ConfigurationError } from './errors';
import { createLogger } from './log';
import { isObject } from './records';

const log = createLogger('queue');

export const REFRESH_JOB = 'refresh';

export interface RefreshJob {
  root: string;
  project: string;
  files: string[];
}

export function isRefreshJob(value: unknown): value is RefreshJob {
  return (
    isObject(value) &&
    typeof value.root === 'string' &&
    typeof value.project === 'string' &&
    Array.isArray(value.files) &&
    value.files.every(file => typeof file === 'string')
  );
}

/** bullmq connection settings from a redis:// or rediss:// URL. */
export function connectionFromUrl(redisUrl: string): ConnectionOptions {
  let url: URL;
  try {
    url = new URL(redisUrl);
  } catch (err) {
    throw new ConfigurationError(`invalid redisUrl: ${redisUrl}`, { cause: err });
  }
  if (url.protocol !== 'redis:' && url.protocol !== 'rediss:') {
    throw new ConfigurationError(`unsupported redisUrl scheme: ${url.protocol}`);
  }
  const db = url.pathname.length > 1 ? Number(url.pathname.slice(1)) : 0;
  return {
    host: url.hostname || 'localhost',
    port: url.port ? Number(url.port) : 6379,
    username: url.username ? decodeURIComponent(url.username) : undefined,
    password: url.password ? decodeURIComponent(url.password) : undefined,
    db: Number.isInteger(db) ? db : 0,
    tls: url.protocol === 'rediss:' ? {} : undefined,
    // Workers block on the connection; bullmq requires this to be null.
    maxRetriesPerRequest: null,
  };
}

export function createQueue(name: string, redisUrl: string) {
  return new Queue<RefreshJob>(name, { connection: connectionFromUrl(redisUrl) });
}

export function startWorker(name: string, redisUrl: string, handle: (job: RefreshJob) => Promise<void>) {
  const worker = new Worker<unknown, void>(
    name,
    async job => {
      if (job.name !== REFRESH_JOB) {
        log.warn(`ignoring unknown job ${job.name}`);
        return;
      }
      if (!isRefreshJob(job.data)) throw new Error(`malformed ${REFRESH_JOB} job ${job.id ?? ''}`);
      await handle(job.data);
    },
    { connection: connectionFromUrl(redisUrl) },
  );
  worker.on('failed', (job, err) => log.error(`job ${job?.id ?? '?'} failed`, err));
  return worker;
}

export async function enqueueRefresh(queue: Queue<RefreshJob>, payload: RefreshJob, opts?: JobsOptions) {
  await queue.add(REFRESH_JOB, payload, opts);
}
