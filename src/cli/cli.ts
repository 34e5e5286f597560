#!/usr/bin/env node

import 'reflect-metadata';
import { Command } from 'commander';
import pc from 'picocolors';
import { runChat, runListModels } from './chat';
import { runStatusCheck } from './status';

function fail(err: unknown): void {
  console.error(pc.red(`✗ ${err instanceof Error ? err.message : String(err)}`));
  process.exitCode = 1;
}

// ── Program ─────────────────────────────────────────────────

const program = new Command();

program
  .name('portkey')
  .description('OpenAI client routed through the Portkey gateway')
  .version('0.1.0')
  .option('-v, --verbose', 'Show debug logs');

program
  .command('chat')
  .description('Send one chat completion through the gateway')
  .argument('<message>', 'User message')
  .option('-m, --model <model>', 'Model name (defaults to cli.default_model)')
  .option('-s, --system <prompt>', 'System prompt')
  .action(async (message: string, opts: { model?: string; system?: string }) => {
    const { verbose } = program.opts<{ verbose?: boolean }>();
    await runChat(message, { ...opts, verbose }).catch(fail);
  });

program
  .command('models')
  .description('List models available to the virtual key')
  .action(async () => {
    const { verbose } = program.opts<{ verbose?: boolean }>();
    await runListModels({ verbose }).catch(fail);
  });

program
  .command('status')
  .description('Check the local configuration')
  .action(() => {
    if (!runStatusCheck()) process.exitCode = 1;
  });

program.parseAsync().catch(fail);
