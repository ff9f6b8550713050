#!/usr/bin/env node
import 'dotenv/config';
import path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { EntityType, isEntityType } from '@code-recall/shared';
import { AppConfig, loadConfig } from './config';
import { CodeRecallError, errorMessage } from './errors';
import { listProjects } from './index_writer';
import { createQueue, enqueueRefresh, startWorker } from './job_queue';
import { createLogger } from './log';
import { isClean } from './orchestrator';
import {
  formatEntities,
  formatHitsJson,
  formatProjectList,
  formatRecallHits,
  formatRememberSummary,
  formatStatus,
  formatVectorizeSummary,
} from './output_format';
import { Session, openSession, projectNameFor } from './session';
import { startWatcher } from './watcher';

const log = createLogger('cli');

interface GlobalOptions {
  project?: string;
  config?: string;
  root: string;
  describe?: boolean;
  json?: boolean;
}

const EXIT_PARTIAL = 1;
const EXIT_FATAL = 2;

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) throw new InvalidArgumentError('expected a positive integer');
  return parsed;
}

function entityType(value: string): EntityType {
  if (!isEntityType(value)) throw new InvalidArgumentError('expected function, class, method or variable');
  return value;
}

const program = new Command();

program
  .name('code-recall')
  .description('Index Python code structure into Redis and search it')
  .version('0.1.0')
  .option('-p, --project <name>', 'project name (defaults to the root directory name)')
  .option('-c, --config <path>', 'config file')
  .option('-r, --root <dir>', 'project root', process.cwd())
  .option('--describe', 'print store mutations as JSON lines instead of applying them')
  .option('--json', 'machine-readable output');

function globals(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

/** Whether the command names a project, directly, by config or by an explicit --root. */
function namesProject(opts: GlobalOptions, config: AppConfig): boolean {
  return opts.project !== undefined || config.project !== undefined || program.getOptionValueSource('root') !== 'default';
}

function print(text: string) {
  if (text) console.log(text);
}

/** SIGINT cancels the run between files; a second one exits. */
function abortOnInterrupt(): AbortController {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    log.warn('interrupted, finishing files in progress (press Ctrl+C again to exit)');
    controller.abort();
    process.once('SIGINT', () => process.exit(130));
  });
  return controller;
}

async function withSession(
  run: (session: Session, config: AppConfig, opts: GlobalOptions) => Promise<number | void>,
  overrides: { root?: string; withEmbedder?: boolean } = {},
) {
  const opts = globals();
  const config = loadConfig(opts.config);
  const root = path.resolve(overrides.root ?? opts.root);
  const session = openSession({
    config,
    root,
    project: opts.project,
    describe: opts.describe,
    withEmbedder: overrides.withEmbedder,
  });
  try {
    const code = await run(session, config, { ...opts, root });
    if (code) process.exitCode = code;
  } finally {
    await session.close();
  }
}

program
  .command('remember')
  .description('index every source file under a directory')
  .argument('[path]', 'project root (defaults to --root)')
  .action((root: string | undefined) =>
    withSession(
      async (session, _config, opts) => {
        log.info(`indexing ${opts.root} as ${session.orchestrator.projectName}`);
        const summary = await session.orchestrator.remember(undefined, abortOnInterrupt().signal);
        print(opts.json ? JSON.stringify(summary) : formatRememberSummary(summary));
        return isClean(summary) ? 0 : EXIT_PARTIAL;
      },
      { root },
    ),
  );

program
  .command('refresh')
  .description('re-index only the given files')
  .argument('<files...>', 'changed files, absolute or relative to the project root')
  .action((files: string[]) =>
    withSession(async (session, _config, opts) => {
      const summary = await session.orchestrator.refresh(files, abortOnInterrupt().signal);
      print(opts.json ? JSON.stringify(summary) : formatRememberSummary(summary));
      return isClean(summary) ? 0 : EXIT_PARTIAL;
    }),
  );

program
  .command('recall')
  .description('list indexed entities of a type, optionally by name')
  .argument('<type>', 'function, class, method or variable', entityType)
  .argument('[name]', 'entity name')
  .action((type: EntityType, name: string | undefined) =>
    withSession(async (session, config, opts) => {
      let orchestrator = session.orchestrator;
      if (!namesProject(opts, config)) {
        const [latest] = await listProjects(session.store);
        if (latest) orchestrator = session.orchestratorFor(latest.metadata.name);
      }
      log.debug(`recalling from ${orchestrator.projectName}`);
      const entities = await orchestrator.recall(type, name);
      if (opts.json) print(JSON.stringify(entities));
      else print(entities.length ? formatEntities(entities) : `no ${type} entities found${name ? ` named ${name}` : ''}`);
    }),
  );

program
  .command('status')
  .description('show what is indexed for the project, or list every indexed project')
  .action(() =>
    withSession(async (session, config, opts) => {
      if (!namesProject(opts, config)) {
        const projects = await listProjects(session.store);
        print(opts.json ? JSON.stringify(projects) : formatProjectList(projects));
        return;
      }
      const status = await session.orchestrator.status();
      print(opts.json ? JSON.stringify(status) : formatStatus(status));
    }),
  );

program
  .command('forget')
  .description('delete every key of the project')
  .action(() =>
    withSession(async (session, _config, opts) => {
      const result = await session.orchestrator.forget();
      print(opts.json ? JSON.stringify(result) : `deleted ${result.deleted} keys`);
    }),
  );

program
  .command('vectorize')
  .description('index the project and embed every entity')
  .option('-b, --batch-size <n>', 'entities per embedding request', positiveInt)
  .action((cmdOpts: { batchSize?: number }) =>
    withSession(
      async (session, _config, opts) => {
        const summary = await session.orchestrator.vectorize(cmdOpts.batchSize, abortOnInterrupt().signal);
        print(opts.json ? JSON.stringify(summary) : formatVectorizeSummary(summary));
        return isClean(summary.remember) && summary.vectors.failed === 0 ? 0 : EXIT_PARTIAL;
      },
      { withEmbedder: true },
    ),
  );

program
  .command('vector-recall')
  .description('semantic search over embedded entities')
  .argument('<query>', 'search text')
  .option('-k, --top-k <n>', 'number of results', positiveInt)
  .option('--min-score <score>', 'drop hits below this similarity', parseFloat)
  .option('-t, --type <type...>', 'restrict to entity types')
  .option('-f, --file <path>', 'restrict to one file')
  .action((query: string, cmdOpts: { topK?: number; minScore?: number; type?: string[]; file?: string }) =>
    withSession(
      async (session, _config, opts) => {
        const entityTypes = (cmdOpts.type ?? []).map(entityType);
        const hits = await session.orchestrator.vectorRecall(query, cmdOpts.topK, {
          minScore: cmdOpts.minScore,
          entityTypes,
          filePath: cmdOpts.file,
        });
        if (opts.json) print(formatHitsJson(hits));
        else print(hits.length ? formatRecallHits(hits) : 'no matches');
      },
      { withEmbedder: true },
    ),
  );

program
  .command('watch')
  .description('refresh changed files as they are saved')
  .option('--delay <ms>', 'debounce delay', positiveInt, 500)
  .action((cmdOpts: { delay: number }) =>
    withSession(async (session, config, opts) => {
      const project = projectNameFor(opts.root, opts.project ?? config.project);
      const refresh = async (files: string[]) => {
        const summary = await session.orchestrator.refresh(files);
        log.info(formatRememberSummary(summary));
      };
      let onChange = refresh;
      const closers: Array<() => Promise<void>> = [];
      if (config.queue.enabled) {
        const queue = createQueue(config.queue.name, config.redisUrl);
        const worker = startWorker(config.queue.name, config.redisUrl, job => refresh(job.files));
        onChange = files => enqueueRefresh(queue, { root: opts.root, project, files });
        closers.push(() => worker.close(), () => queue.close());
      }
      const watch = startWatcher(opts.root, { extensions: config.extensions, delayMs: cmdOpts.delay, onChange });
      await new Promise<void>(resolve => process.once('SIGINT', () => resolve()));
      await watch.close();
      for (const close of closers) await close();
    }),
  );

program.parseAsync(process.argv).catch(err => {
  if (err instanceof CodeRecallError) log.error(`${err.code}: ${err.message}`);
  else log.error(errorMessage(err), err);
  process.exitCode = EXIT_FATAL;
});
