import 'dotenv/config';
import { Command } from 'commander';
import { loadConfig, requireApiKey } from './config';
import { createRuntime, type Runtime } from './runtime';
import { errorMessage } from './errors';
import { parseIntervalSeconds } from './validation';

const config = loadConfig();
let runtime: Runtime | null = null;

function rt(): Runtime {
  runtime ??= createRuntime(config);
  return runtime;
}

export function buildProgram(): Command {
  const program = new Command();
  program.name('post-relay').description('Relay new posts from tracked accounts to webhook channels');

  const channel = program.command('channel').description('Manage notification channels');

  channel
    .command('create <name> <webhookUrl>')
    .description('Create a channel backed by a webhook URL')
    .action((name: string, webhookUrl: string) => {
      const created = rt().service.createChannel(name, webhookUrl);
      console.log(`Channel "${created.name}" created`);
    });

  channel
    .command('list')
    .description('List channels')
    .action(() => {
      const channels = rt().store.listChannels();
      if (channels.length === 0) return console.log('No channels');
      for (const c of channels) console.log(`${c.name}\t${c.accountCount} account(s)\t${c.webhookUrl}`);
    });

  channel
    .command('delete <name>')
    .description('Delete a channel and every account routed to it')
    .action((name: string) => {
      const { removedAccounts } = rt().service.deleteChannel(name);
      console.log(`Channel "${name}" deleted (${removedAccounts.length} account(s) removed)`);
    });

  const account = program.command('account').description('Manage tracked accounts');

  account
    .command('add <handle> <channel>')
    .description('Track an account; its current posts become the baseline')
    .action(async (handle: string, channelName: string) => {
      requireApiKey(config);
      const { account: added, baseline } = await rt().service.addAccount(handle, channelName);
      console.log(`Tracking @${added.handle} in "${channelName}" (baseline ${baseline}, cursor ${added.lastSeenId ?? '-'})`);
    });

  account
    .command('remove <handle>')
    .description('Stop tracking an account')
    .action((handle: string) => {
      rt().service.removeAccount(handle);
      console.log(`Removed ${handle}`);
    });

  account
    .command('list')
    .description('List tracked accounts')
    .option('-c, --channel <name>', 'only accounts in this channel')
    .action((opts: { channel?: string }) => {
      const accounts = rt().store.listAccounts(opts.channel);
      if (accounts.length === 0) return console.log('No accounts');
      for (const a of accounts) {
        console.log(`@${a.handle}\t${a.channelName}\t${a.active ? 'active' : 'inactive'}\t${a.lastSeenId ?? '-'}`);
      }
    });

  program
    .command('sent')
    .description('Show recently delivered posts')
    .option('-c, --channel <name>', 'only deliveries to this channel')
    .option('-n, --limit <count>', 'how many to show', '20')
    .action((opts: { channel?: string; limit: string }) => {
      const rows = rt().service.recentSent(opts.channel, opts.limit);
      if (rows.length === 0) return console.log('Nothing sent yet');
      for (const r of rows) {
        console.log(`${new Date(r.sentAt).toISOString()}\t@${r.handle}\t${r.postId}\t${r.text.slice(0, 60)}`);
      }
    });

  program
    .command('run')
    .description('Poll continuously until interrupted')
    .option('-i, --interval <seconds>', 'seconds between cycles')
    .action(async (opts: { interval?: string }) => {
      requireApiKey(config);
      const interval = parseIntervalSeconds(opts.interval);
      const { scheduler } = rt();
      await scheduler.runOnce();
      scheduler.start(interval);
      const stop = () => {
        scheduler.stop();
        scheduler
          .idle()
          .then(() => process.exit(0))
          .catch((e) => {
            console.error(e);
            process.exit(1);
          });
      };
      process.on('SIGINT', stop);
      process.on('SIGTERM', stop);
    });

  program
    .command('run-once')
    .description('Run a single cycle and print its summary')
    .action(async () => {
      requireApiKey(config);
      const summary = await rt().scheduler.runOnce();
      console.log(JSON.stringify(summary, null, 2));
      if (summary.aborted) process.exitCode = 1;
    });

  return program;
}

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(errorMessage(err));
    process.exit(1);
  });
