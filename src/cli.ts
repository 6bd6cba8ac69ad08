#!/usr/bin/env node

/**
 * askweb - web and YouTube answers from a local model
 */

import chalk from 'chalk';
import { config, getSessionConfig } from './config.js';
import { checkOllamaHealth, createSession } from './pipeline/index.js';
import { startChat } from './chat.js';

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  if (args.includes('--version') || args.includes('-v')) {
    console.log('askweb 0.1.0');
    return;
  }
  if (args.includes('--help') || args.includes('-h')) {
    console.log('Usage: askweb [--verbose]');
    console.log('');
    console.log('Answers questions from live web search results or a YouTube');
    console.log('video transcript, streamed from a local Ollama model.');
    console.log('');
    console.log('Options:');
    console.log('  -v, --version  Show version');
    console.log('  -h, --help     Show this help');
    console.log('      --verbose  Log debug output');
    console.log('');
    console.log('In the prompt you can:');
    console.log('  - Ask anything (searches the web)');
    console.log('  - Paste a YouTube link, optionally with a question');
    console.log('  - "clear history", "toggle history", "exit"');
    console.log('');
    console.log('Environment: OLLAMA_URL, OLLAMA_MODEL, MAX_RESULTS, MAX_HISTORY_TURNS,');
    console.log('HISTORY_ENABLED, REQUEST_TIMEOUT_MS, MAX_LEN_PER_SOURCE, LOG_LEVEL');
    return;
  }
  if (args.includes('--verbose')) {
    process.env.LOG_LEVEL = 'debug';
  }

  if (!(await checkOllamaHealth())) {
    console.log(chalk.yellow(`Warning: Ollama not reachable at ${config.OLLAMA_URL}, answers will fail until it is running`));
  }

  await startChat(createSession(getSessionConfig()));
}

main().catch((err) => {
  console.error(chalk.red('Error:'), err);
  process.exit(1);
});
