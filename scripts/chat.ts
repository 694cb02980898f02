#!/usr/bin/env npx tsx
/**
 * Terminal chat with the calendar assistant.
 *
 * Confirmations are answered inline (blocking approval mode). Threads are
 * checkpointed like the HTTP API's, so a chat interrupted mid-turn picks up
 * where it stopped when started again with the same --thread.
 *
 * Usage:
 *   npm run chat
 *   npm run chat -- --thread my-thread
 */

import { randomUUID } from 'crypto';
import { createInterface } from 'readline/promises';
import { stdin, stdout } from 'process';
import { validateConfig } from '../src/config.js';
import { createTurnController } from '../src/orchestrator/index.js';
import type { ConfirmationPrompt, TurnController, TurnOutcome } from '../src/orchestrator/index.js';
import { closeCheckpointStore } from '../src/services/checkpoint/index.js';
import { AppError, ThreadNotFoundError, errorMessage } from '../src/utils/errors.js';

process.env.LOG_LEVEL ??= 'warn';

interface Options {
  threadId: string;
}

function parseArgs(args: string[]): Options {
  const options: Options = { threadId: '' };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--thread' || arg === '-t') {
      options.threadId = args[++i] || '';
    } else if (arg === '--help' || arg === '-h') {
      printHelp();
      process.exit(0);
    }
  }

  options.threadId ||= randomUUID();
  return options;
}

function printHelp(): void {
  console.log(`
Calendar assistant chat

Usage:
  npm run chat
  npm run chat -- --thread <id>

Options:
  -t, --thread   Continue (or start) the thread with this id
  -h, --help     Show this help

Type "exit" or "quit" to leave.
`);
}

const rl = createInterface({ input: stdin, output: stdout });

const confirm: ConfirmationPrompt = async ({ invocation, expiresAt, signal }) => {
  const minutes = Math.max(1, Math.round((expiresAt - Date.now()) / 60000));
  console.log(`\nThe assistant wants to run ${invocation.capabilityName}:`);
  console.log(JSON.stringify(invocation.arguments, null, 2));

  const answer = await rl.question(`Approve? [y/N] (times out in ${minutes}m) `, { signal });
  const approved = /^y(es)?$/i.test(answer.trim());
  if (approved) {
    return { approved };
  }

  const feedback = await rl.question('Why not? (optional) ', { signal });
  return { approved, feedback };
};

function printOutcome(outcome: TurnOutcome): void {
  switch (outcome.status) {
    case 'completed':
      console.log(`\nassistant> ${outcome.reply}\n`);
      break;
    case 'awaiting_feedback':
      for (const result of outcome.rejected) {
        console.log(`\n${result.capabilityName} was not run${result.humanFeedback ? ` (${result.humanFeedback})` : ''}.`);
      }
      break;
    case 'awaiting_approval':
      console.log(`\nWaiting on approval for: ${outcome.pending.map((p) => p.capabilityName).join(', ')}`);
      break;
  }
}

/**
 * Keep asking for feedback until the turn completes or suspends elsewhere.
 */
async function drive(controller: TurnController, threadId: string, start: TurnOutcome): Promise<void> {
  let outcome = start;
  printOutcome(outcome);

  while (outcome.status === 'awaiting_feedback') {
    const feedback = await rl.question('What should the assistant do instead? ');
    outcome = await controller.submitFeedback(threadId, feedback);
    printOutcome(outcome);
  }
}

async function main(): Promise<void> {
  validateConfig();
  const { threadId } = parseArgs(process.argv.slice(2));
  const controller = createTurnController(confirm);

  console.log(`Thread ${threadId}. Type "exit" to quit.`);

  try {
    const thread = await controller.getThread(threadId);
    if (thread.phase !== 'awaiting_user_input' && thread.phase !== 'done') {
      console.log(`Resuming interrupted turn (${thread.phase})...`);
      await drive(controller, threadId, await controller.resume(threadId));
    }
  } catch (error) {
    if (!(error instanceof ThreadNotFoundError)) {
      console.error(`error: ${errorMessage(error)}`);
    }
  }

  for (;;) {
    const text = (await rl.question('you> ')).trim();
    if (text === 'exit' || text === 'quit') break;
    if (!text) continue;

    try {
      await drive(controller, threadId, await controller.sendMessage(threadId, text));
    } catch (error) {
      const code = error instanceof AppError ? ` [${error.code}]` : '';
      console.error(`error${code}: ${errorMessage(error)}`);
    }
  }
}

main()
  .catch((error: unknown) => {
    console.error(`fatal: ${errorMessage(error)}`);
    process.exitCode = 1;
  })
  .finally(() => {
    rl.close();
    closeCheckpointStore();
  });
