#!/usr/bin/env node
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import chalk from 'chalk';
import Table from 'cli-table3';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { BUNDLED_TEMPLATES_PATH, ConfigLoader } from '../../config/src/ConfigLoader.js';
import type { Config } from '../../config/src/types.js';
import { PipelineError, UnknownUserError, errnoCode, errorMessage } from '../../errors/src/index.js';
import { createLogger, flushLog, streamLog } from '../../logging/src/index.js';
import { recordCommented } from '../../record-store/src/merge.js';
import { rankUsers } from '../../record-store/src/ranking.js';
import { load, save, withStoreLock } from '../../record-store/src/store.js';
import { findUser, totalCount, type UserRecord } from '../../record-store/src/types.js';
import { loadTemplates } from '../../template-selector/src/loader.js';
import { collect, previewForUser, roomSurfaceFactory, stageForUser, type SurfaceFactory } from './pipeline.js';

export interface CliResult {
  success: boolean;
  data?: unknown;
  error?: string;
}

export interface CliContext {
  loader?: ConfigLoader;
  /** Replaces the browser connection, for tests */
  openSurface?: SurfaceFactory;
  /** Abort signal for `collect`; SIGINT is wired up when absent */
  signal?: AbortSignal;
  print?: (line: string) => void;
}

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('expected a positive integer');
  }
  return parsed;
}

function isoTimestamp(value: string): string {
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) throw new InvalidArgumentError('expected an ISO-8601 timestamp');
  return new Date(ms).toISOString();
}

function userSummary(record: UserRecord) {
  return {
    userId: record.userId,
    displayName: record.displayName,
    counts: record.counts,
    total: totalCount(record.counts),
    isFollowing: record.isFollowing,
    lastSeenAt: record.lastSeenAt,
    lastCommentedAt: record.lastCommentedAt,
  };
}

function followLabel(value: boolean | null): string {
  if (value === null) return '?';
  return value ? 'yes' : chalk.yellow('no');
}

/** Copies the bundled templates to `target` unless a file is already there. */
async function installTemplates(target: string): Promise<boolean> {
  await fs.mkdir(path.dirname(target), { recursive: true });
  try {
    await fs.copyFile(BUNDLED_TEMPLATES_PATH, target, fs.constants.COPYFILE_EXCL);
    return true;
  } catch (err) {
    if (errnoCode(err) === 'EEXIST') return false;
    throw err;
  }
}

export async function run(argv = process.argv.slice(2), context: CliContext = {}): Promise<CliResult> {
  const loader = context.loader ?? new ConfigLoader();
  const print = context.print ?? ((line: string) => console.log(line));
  const logger = createLogger('pipeline');
  let result: CliResult = { success: true };

  const loadConfig = () => loader.load({ defaultsIfMissing: true });
  const surfaceFor = (config: Config) => context.openSurface ?? roomSurfaceFactory(config, logger);

  const program = new Command();
  program
    .name('engage')
    .description('Collect engagement from the notifications feed and stage thank-you comments')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => print(text.trimEnd()),
      writeErr: (text) => print(text.trimEnd()),
    });

  program
    .command('collect')
    .description('Read the notifications feed and merge new events into the store')
    .option('--max-pages <n>', 'pages to read', positiveInt)
    .action(async (options: { maxPages?: number }) => {
      const config = await loadConfig();
      const storePath = loader.resolvePath(config, 'store');
      const controller = new AbortController();
      const onSigint = () => {
        print(chalk.yellow('interrupted, stopping after the current entry'));
        controller.abort();
      };
      const signal = context.signal ?? controller.signal;
      if (!context.signal) process.once('SIGINT', onSigint);
      try {
        print(chalk.blue(`collecting from ${config.feed.startUrl}`));
        const outcome = await collect(
          { storePath, openSurface: surfaceFor(config), logger },
          { maxPages: options.maxPages ?? config.feed.maxPages, timeoutMs: config.feed.timeoutMs, signal },
        );
        print(chalk.green(`${outcome.newlyCounted.length} new event(s), ${outcome.users} user(s) in ${storePath}`));
        result = {
          success: true,
          data: {
            storePath,
            newlyCounted: outcome.newlyCounted.length,
            users: outcome.users,
            stats: outcome.stats,
          },
        };
      } finally {
        process.removeListener('SIGINT', onSigint);
      }
    });

  program
    .command('list')
    .description('Show users in priority order')
    .option('--limit <n>', 'number of users', positiveInt)
    .option('--json', 'print JSON')
    .action(async (options: { limit?: number; json?: boolean }) => {
      const config = await loadConfig();
      const store = await load(loader.resolvePath(config, 'store'));
      const users = rankUsers(store, options.limit).map(userSummary);
      if (options.json) {
        print(JSON.stringify(users, null, 2));
      } else {
        const table = new Table({ head: ['user', 'name', 'likes', 'collects', 'total', 'following', 'commented'] });
        for (const user of users) {
          table.push([
            user.userId,
            user.displayName,
            user.counts.like,
            user.counts.collect,
            user.total,
            followLabel(user.isFollowing),
            user.lastCommentedAt ?? '',
          ]);
        }
        print(table.toString());
      }
      result = { success: true, data: users };
    });

  program
    .command('preview <userId>')
    .description('Render the comment that would be staged for a user')
    .action(async (userId: string) => {
      const config = await loadConfig();
      const templates = await loadTemplates(loader.resolvePath(config, 'templates'));
      const request = await previewForUser(loader.resolvePath(config, 'store'), templates, userId);
      print(chalk.cyan(`[${request.templateId}]`));
      print(request.renderedText);
      result = { success: true, data: request };
    });

  program
    .command('stage <userId>')
    .description('Fill the comment box for a user in the browser (never submits)')
    .action(async (userId: string) => {
      const config = await loadConfig();
      const templates = await loadTemplates(loader.resolvePath(config, 'templates'));
      const staged = await stageForUser(
        {
          storePath: loader.resolvePath(config, 'store'),
          templates,
          openSurface: surfaceFor(config),
          timeoutMs: config.staging.timeoutMs,
          logger,
        },
        userId,
      );
      const data = {
        userId,
        outcome: staged.outcome,
        templateId: staged.request?.templateId ?? null,
        renderedText: staged.request?.renderedText ?? null,
      };
      if (staged.outcome === 'staged') {
        print(chalk.green(`comment staged for ${userId}; review and submit it in the browser`));
        result = { success: true, data };
      } else {
        const reason = staged.outcome === 'user_not_found' ? `no activity entry for ${userId}` : `comment box for ${userId} does not take input`;
        print(chalk.yellow(reason));
        result = { success: false, data, error: reason };
      }
    });

  program
    .command('mark-commented <userId>')
    .description('Record that a comment to the user was submitted')
    .option('--at <timestamp>', 'submission time (default: now)', isoTimestamp)
    .action(async (userId: string, options: { at?: string }) => {
      const config = await loadConfig();
      const storePath = loader.resolvePath(config, 'store');
      const at = options.at ?? new Date().toISOString();
      const record = await withStoreLock(storePath, async () => {
        const updated = recordCommented(await load(storePath), userId, at);
        await save(storePath, updated);
        return findUser(updated, userId);
      });
      if (!record) throw new UnknownUserError(userId);
      print(chalk.green(`${userId} marked as commented at ${record.lastCommentedAt ?? at}`));
      result = { success: true, data: userSummary(record) };
    });

  const configCmd = program.command('config').description('Manage the config file');

  configCmd
    .command('init')
    .description('Write the default config and templates if missing')
    .action(async () => {
      const created = await loader.ensureExists();
      const config = await loader.reload();
      const templatesPath = loader.resolvePath(config, 'templates');
      const templatesCreated = await installTemplates(templatesPath);
      const configPath = loader.getConfigPath();
      print(`${created ? chalk.green('created') : 'kept'} ${configPath}`);
      print(`${templatesCreated ? chalk.green('created') : 'kept'} ${templatesPath}`);
      result = { success: true, data: { configPath, created, templatesPath, templatesCreated } };
    });

  configCmd
    .command('show')
    .description('Print the effective config')
    .action(async () => {
      const config = await loadConfig();
      print(JSON.stringify(config, null, 2));
      result = { success: true, data: { configPath: loader.getConfigPath(), config } };
    });

  configCmd
    .command('validate')
    .description('Check the config file and the template file')
    .action(async () => {
      const configResult = await loader.validate();
      let templates: { valid: boolean; count?: number; error?: string };
      try {
        const config = await loadConfig();
        const loaded = await loadTemplates(loader.resolvePath(config, 'templates'));
        templates = { valid: true, count: loaded.length };
      } catch (err) {
        templates = { valid: false, error: errorMessage(err) };
      }
      for (const problem of configResult.errors ?? []) {
        print(chalk.red(`config ${problem.path}: ${problem.message}`));
      }
      if (templates.error) print(chalk.red(templates.error));
      const success = configResult.valid && templates.valid;
      if (success) print(chalk.green('config and templates are valid'));
      result = {
        success,
        data: { config: configResult, templates },
        error: success ? undefined : 'validation failed',
      };
    });

  const logsCmd = program.command('logs').description('Read the log files');

  logsCmd
    .command('tail')
    .description('Print the last lines of a log')
    .option('--lines <n>', 'number of lines', positiveInt)
    .option('--source <name>', 'pipeline or debug')
    .option('--file <path>', 'explicit log file')
    .action(async (options: { lines?: number; source?: string; file?: string }) => {
      const tail = await streamLog({ maxLines: options.lines, source: options.source, file: options.file });
      for (const line of tail.lines) print(line);
      result = { success: true, data: tail };
    });

  logsCmd
    .command('flush')
    .description('Print a whole log and optionally truncate it')
    .option('--source <name>', 'pipeline or debug')
    .option('--file <path>', 'explicit log file')
    .option('--truncate', 'empty the file afterwards')
    .action(async (options: { source?: string; file?: string; truncate?: boolean }) => {
      const truncate = Boolean(options.truncate);
      const flushed = await flushLog({ source: options.source, file: options.file }, truncate);
      for (const line of flushed.lines) print(line);
      result = { success: true, data: { ...flushed, truncated: truncate } };
    });

  try {
    await program.parseAsync(argv, { from: 'user' });
    return result;
  } catch (err) {
    if (err instanceof CommanderError) {
      const informational = err.code === 'commander.helpDisplayed' || err.code === 'commander.version';
      return informational ? { success: true } : { success: false, error: err.message };
    }
    if (err instanceof PipelineError) {
      return { success: false, error: err.message, data: { code: err.code, context: err.context } };
    }
    throw err;
  }
}

async function main() {
  const result = await run();
  if (result.success) {
    process.exit(0);
  }
  console.error(chalk.red(result.error || 'command failed'));
  process.exit(1);
}

const currentFile = fileURLToPath(import.meta.url);
if (path.resolve(process.argv[1] || '') === currentFile) {
  main().catch((err: unknown) => {
    console.error(chalk.red(errorMessage(err)));
    process.exit(1);
  });
}
