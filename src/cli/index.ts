#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import {
  defaultConfigPath,
  loadConfig,
  parseConcurrency,
  writeDefaultConfig,
  type Config,
} from '../shared/config.js';
import { resolvePath } from '../shared/utils.js';
import { ConfigError, errorMessage } from '../shared/errors.js';
import { JsonFileRegistry } from '../registry/store.js';
import { YouTubeFetcher } from '../source/youtube.js';
import { EmailNotifier } from '../push/email.js';
import { startWatch } from '../push/scheduler.js';
import { runCheck, type RunDeps, type RunReport } from '../engine/run.js';
import { EXIT_CONFIG, EXIT_STORAGE, exitCodeFor, renderRunReport } from '../engine/report.js';

const program = new Command();

program
  .name('tubewatch')
  .description('Email notifications for new uploads on tracked YouTube channels')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Create a default config and an empty channel registry')
  .action(async () => {
    const configPath = defaultConfigPath();
    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    const config = await loadConfig();
    const registry = openRegistry(config);
    const created = registry.init();
    if (!created.ok) {
      log(`Registry ${created.error.kind}: ${created.error.message}`);
      process.exitCode = EXIT_STORAGE;
      return;
    }
    log(created.data ? `✓ ${registry.path} created` : `✓ ${registry.path} already exists`);
  });

// === doctor ===
program
  .command('doctor')
  .description('Check config, registry and SMTP credentials')
  .action(async () => {
    const results: string[] = [];

    let config: Config;
    try {
      config = await loadConfig();
      results.push('Config: ok');
    } catch (err) {
      log(`✗ Config: error (${errorMessage(err)})`);
      process.exitCode = EXIT_CONFIG;
      return;
    }

    const loaded = openRegistry(config).loadAll();
    results.push(loaded.ok ? `Registry: ${loaded.data.size} channels` : `Registry: ${loaded.error.kind}`);

    results.push(config.youtube.api_key ? 'YouTube: configured' : 'YouTube: (no api_key)');

    if (config.email.smtp_user && config.email.to) {
      const verified = await new EmailNotifier(config.email).verify();
      results.push(verified.ok ? 'SMTP: ok' : `SMTP: ${verified.error.kind}`);
    } else {
      results.push('SMTP: (unconfigured)');
    }

    log(results.join(' | '));
  });

// === source ===
const sourceCmd = program.command('source').description('Manage tracked channels');

sourceCmd
  .command('add <channelId>')
  .description('Start tracking a channel; its current latest upload is announced on the next check')
  .action(async (channelId: string) => {
    const registry = openRegistry(await loadConfig());
    const added = registry.add(channelId);
    if (!added.ok) {
      log(`Registry ${added.error.kind}: ${added.error.message}`);
      process.exitCode = EXIT_STORAGE;
      return;
    }
    log(added.data ? `✓ Channel added: ${channelId}` : `Channel already tracked: ${channelId}`);
  });

sourceCmd
  .command('remove <channelId>')
  .description('Stop tracking a channel')
  .action(async (channelId: string) => {
    const registry = openRegistry(await loadConfig());
    const removed = registry.remove(channelId);
    if (!removed.ok) {
      log(`Registry ${removed.error.kind}: ${removed.error.message}`);
      process.exitCode = removed.error.kind === 'NotFound' ? 1 : EXIT_STORAGE;
      return;
    }
    log(`✓ Channel removed: ${channelId}`);
  });

sourceCmd
  .command('list')
  .description('List tracked channels')
  .action(async () => {
    const loaded = openRegistry(await loadConfig()).loadAll();
    if (!loaded.ok) {
      log(`Registry ${loaded.error.kind}: ${loaded.error.message}`);
      process.exitCode = EXIT_STORAGE;
      return;
    }

    if (loaded.data.size === 0) {
      log('No channels tracked. Use: tubewatch source add <channelId>');
      return;
    }
    for (const source of loaded.data.values()) {
      log(`${source.sourceId.padEnd(26)} ${source.lastNotifiedItemId || '(never notified)'}`);
    }
    log(`\n${loaded.data.size} channels total`);
  });

// === check ===
program
  .command('check')
  .description('Check every tracked channel once and email new uploads')
  .option('-c, --concurrency <n>', 'Channels checked in parallel (1-16)', parseConcurrency)
  .action(async (opts: { concurrency?: number }) => {
    const config = await loadConfig();
    const report = await runCheck(createDeps(config), {
      concurrency: opts.concurrency ?? config.run.concurrency,
    });
    printReport(report);
    process.exitCode = exitCodeFor(report);
  });

// === watch ===
program
  .command('watch')
  .description('Repeat the check on a cron schedule')
  .option('--cron <expr>', 'Cron expression (defaults to schedule.cron)')
  .action(async (opts: { cron?: string }) => {
    const config = await loadConfig();
    const deps = createDeps(config);

    const watcher = startWatch(opts.cron ?? config.schedule.cron, async (signal) => {
      const report = await runCheck(deps, { concurrency: config.run.concurrency, signal });
      printReport(report);
      return report;
    });

    process.once('SIGINT', () => {
      watcher.stop().then(
        () => process.exit(0),
        (err: unknown) => {
          log(`Shutdown failed: ${errorMessage(err)}`);
          process.exit(1);
        },
      );
    });
  });

function openRegistry(config: Config): JsonFileRegistry {
  return new JsonFileRegistry(resolvePath(config.registry.path));
}

function createDeps(config: Config): RunDeps {
  if (!config.youtube.api_key) {
    throw new ConfigError('youtube.api_key is not set (or TUBEWATCH_YOUTUBE_API_KEY)');
  }
  if (!config.email.to) {
    throw new ConfigError('email.to is not set (or TUBEWATCH_EMAIL_TO)');
  }
  return {
    registry: openRegistry(config),
    fetcher: new YouTubeFetcher(config.youtube),
    notifier: new EmailNotifier(config.email),
  };
}

function printReport(report: RunReport): void {
  for (const line of renderRunReport(report)) log(line);
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  log(`✗ ${errorMessage(err)}`);
  process.exitCode = err instanceof ConfigError ? EXIT_CONFIG : 1;
});
