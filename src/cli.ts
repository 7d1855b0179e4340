#!/usr/bin/env node
import 'dotenv/config';
import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import chalk from 'chalk';
import { loadAdaptersConfig } from './config/adapters.js';
import { missingConfigWarnings } from './config/app.js';
import { ConversationMemory } from './core/memory.js';
import { createServices } from './core/services.js';
import { formatResponse } from './presentation/format.js';
import { renderMarkdownToTerminal } from './presentation/terminal.js';
import { createLogger } from './util/logging.js';

const log = createLogger({ level: process.env.LOG_LEVEL ?? 'warn' });

async function main(): Promise<void> {
  const config = loadAdaptersConfig();
  const services = createServices(config, log);
  const router = services.routerFactory(new ConversationMemory());
  const rl = readline.createInterface({ input, output });

  console.log(chalk.yellow.bold('✈️  SkyRoute: flight status and route analytics'));
  console.log(chalk.gray('─'.repeat(60)));
  console.log(chalk.gray('Try "status of AA123" or "most on-time airlines from JFK to ATL".'));
  console.log(chalk.gray(`Type ${chalk.red('exit')} to quit.`));
  for (const warning of missingConfigWarnings(config)) {
    console.log(chalk.yellow(`⚠️  ${warning}`));
  }
  console.log(chalk.gray('─'.repeat(60)));
  console.log();

  try {
    for (;;) {
      const q = await rl.question(chalk.blue.bold('You> '));
      if (q.trim().toLowerCase() === 'exit') break;
      if (!q.trim()) continue;

      const response = await router.handle(q);
      const text = renderMarkdownToTerminal(formatResponse(response));
      const color = response.kind === 'error' ? chalk.red : response.kind === 'clarification' ? chalk.yellow : (s: string) => s;
      console.log();
      console.log(color(text));
      console.log();
    }
  } finally {
    rl.close();
    await services.close();
  }
}

main().catch((e: unknown) => {
  console.error(e);
  process.exit(1);
});
