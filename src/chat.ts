/**
 * Interactive query loop: search, extract, stream an answer
 */

import * as readline from 'readline';
import chalk from 'chalk';
import type { Session, TurnOutcome } from './pipeline/index.js';
import { describeError } from './pipeline/errors.js';
import { logger } from './logger.js';

const RULE_WIDTH = 90;

/** Commands recognised instead of a query (compared lower-cased) */
export type ChatCommand = 'exit' | 'clear' | 'toggle';

export function parseCommand(input: string): ChatCommand | null {
  switch (input.trim().toLowerCase()) {
    case 'exit':
    case 'quit':
      return 'exit';
    case 'clear':
    case 'clear history':
      return 'clear';
    case 'toggle history':
      return 'toggle';
    default:
      return null;
  }
}

function printSources(heading: string, sources: string[]): void {
  console.log(chalk.bold(`\n${heading}`));
  sources.forEach((url, i) => console.log(`  [${i + 1}] ${url}`));
}

/**
 * Print the result of a turn after the streamed text
 */
export function reportOutcome(outcome: TurnOutcome): void {
  switch (outcome.status) {
    case 'answered':
      if (!outcome.answer) {
        console.log(chalk.yellow('\nNo response content received from the model.'));
      }
      printSources('Sources Used:', outcome.sources);
      break;
    case 'no_results':
      console.log(chalk.yellow('No search results found for this query.'));
      break;
    case 'retrieval_failed':
      console.log(chalk.red(`Search failed: ${outcome.error.message}`));
      break;
    case 'no_content':
      console.log(chalk.red('No text could be extracted from any source.'));
      printSources('Sources Checked:', outcome.attempted);
      break;
    case 'stream_failed':
      console.log(chalk.red(`\nFailed to generate or stream the synthesized answer: ${outcome.error.message}`));
      printSources('Sources Checked:', outcome.sources);
      break;
    case 'cancelled':
      console.log(chalk.yellow('\nInterrupted. This turn was not added to the conversation history.'));
      printSources('Sources Checked:', outcome.sources);
      break;
  }
  console.log(`\n${'='.repeat(RULE_WIDTH)}\n`);
}

/**
 * Start interactive REPL
 */
export async function startChat(session: Session): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  console.log(chalk.blue('askweb - answers grounded in live web pages and YouTube transcripts'));
  console.log(chalk.gray('Commands: "exit" to quit, "clear history", "toggle history"'));
  console.log(chalk.gray('Multi-line: end line with \\ to continue. Ctrl+C interrupts an answer.'));
  console.log(chalk.gray(`Context preservation is ${session.historyEnabled ? 'ENABLED' : 'DISABLED'}`));
  console.log();

  let isClosed = false;
  let activeTurn: AbortController | null = null;

  // Helper to collect multi-line input with backslash continuation
  const collectInput = (initialLine: string): Promise<string> => {
    return new Promise((resolve) => {
      const lines: string[] = [];

      const processLine = (line: string) => {
        if (line.endsWith('\\')) {
          lines.push(line.slice(0, -1));
          rl.question(chalk.gray('... '), processLine);
        } else {
          lines.push(line);
          resolve(lines.join('\n'));
        }
      };

      processLine(initialLine);
    });
  };

  const runQuery = async (query: string): Promise<void> => {
    const controller = new AbortController();
    activeTurn = controller;
    let streaming = false;

    try {
      const outcome = await session.runTurn(query, {
        signal: controller.signal,
        onChunk: (text) => {
          if (!streaming) {
            streaming = true;
            console.log(`\n${'='.repeat(40)} RESULTS ${'='.repeat(40)}`);
            console.log(chalk.bold('\nSynthesized Answer:\n'));
          }
          process.stdout.write(text);
        },
      });
      if (streaming) process.stdout.write('\n');
      reportOutcome(outcome);
    } catch (err) {
      // Unexpected failures end the turn, never the session
      logger.error('An unexpected error occurred:', describeError(err));
    } finally {
      activeTurn = null;
    }
  };

  const promptUser = (): void => {
    if (isClosed) return;

    rl.question(chalk.green('Query: '), async (input) => {
      if (isClosed) return;

      const fullInput = input.endsWith('\\') ? await collectInput(input) : input;
      const query = fullInput.trim();

      if (!query) {
        promptUser();
        return;
      }

      switch (parseCommand(query)) {
        case 'exit':
          console.log(chalk.blue('Exiting...'));
          isClosed = true;
          rl.close();
          return;
        case 'clear':
          session.clearHistory();
          console.log(chalk.yellow('Conversation history cleared.\n'));
          promptUser();
          return;
        case 'toggle': {
          const enabled = session.toggleHistory();
          console.log(chalk.yellow(`Context preservation ${enabled ? 'enabled' : 'disabled'}\n`));
          promptUser();
          return;
        }
        case null:
          break;
      }

      await runQuery(query);
      promptUser();
    });
  };

  // Ctrl+C stops the running answer; at the prompt it leaves
  rl.on('SIGINT', () => {
    if (activeTurn) {
      activeTurn.abort();
      return;
    }
    console.log(chalk.blue('\nExiting...'));
    isClosed = true;
    rl.close();
  });

  promptUser();

  return new Promise((resolve) => {
    rl.on('close', () => {
      isClosed = true;
      activeTurn?.abort();
      resolve();
    });
  });
}
