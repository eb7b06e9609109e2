#!/usr/bin/env node
import 'dotenv/config';
import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import chalk from 'chalk';
import { ConfigurationError, describeModel, loadAgentConfig, type AgentConfig } from './config/agent.js';
import { buildConciergeAgent } from './core/agent_factory.js';
import type { HumanGate } from './core/consent.js';
import type { PipelineStageKey, PipelineStatusUpdate } from './core/pipeline_status.js';
import { preloadPrompts } from './core/prompts.js';
import { createLogger } from './util/logging.js';
import { createBlock, identity, renderMarkdownToTerminal } from './util/terminal.js';

const log = createLogger();

const PIPELINE_BAR = '─'.repeat(40);
const PIPELINE_TOP_TEXT = `┌─ PIPELINE ${PIPELINE_BAR}`;
const PIPELINE_BOTTOM_TEXT = `└${'─'.repeat(Math.max(PIPELINE_TOP_TEXT.length - 1, 0))}`;
const PIPELINE_TOP = chalk.gray(PIPELINE_TOP_TEXT);
const PIPELINE_BOTTOM = chalk.gray(PIPELINE_BOTTOM_TEXT);

const QUIT_WORDS = ['quit', 'exit'];

// Get streaming delay from environment or use default
const STREAMING_DELAY_MS = parseInt(process.env.CLI_STREAMING_DELAY_MS || '2');

async function streamText(text: string, delayMs = STREAMING_DELAY_MS) {
  for (const char of text) {
    process.stdout.write(char);
    await new Promise((resolve) => setTimeout(resolve, delayMs));
  }
}

class Spinner {
  private readonly frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
  private readonly stageLabels: Record<PipelineStageKey, string> = {
    'extract-email': 'Looking for an email address...',
    'check-location': 'Checking for a location...',
    'plan-query': 'Planning the search...',
    search: 'Searching the web...',
    'select-urls': 'Choosing pages to read...',
    browse: 'Reading pages...',
    synthesize: 'Writing your summary...',
    'draft-email': 'Drafting an email...',
    'confirm-send': 'Waiting for you...',
  };
  private interval: NodeJS.Timeout | null = null;
  private currentFrame = 0;
  private active = false;
  private status = 'Processing...';

  start() {
    this.active = true;
    this.status = 'Processing...';
    this.resume();
  }

  handlePipelineUpdate(update: PipelineStatusUpdate) {
    this.status = update.message || (update.stage ? this.stageLabels[update.stage] : 'Processing...');
    if (this.active && !this.interval) this.resume();
    if (this.interval) this.draw();
  }

  /** Clears the spinner line so a prompt or notice can take it over. */
  pause() {
    if (!this.interval) return;
    clearInterval(this.interval);
    this.interval = null;
    process.stdout.write('\r\x1b[2K');
  }

  resume() {
    if (!this.active || this.interval) return;
    this.interval = setInterval(() => {
      this.draw();
      this.currentFrame = (this.currentFrame + 1) % this.frames.length;
    }, 80);
  }

  stop() {
    this.pause();
    this.active = false;
  }

  private draw() {
    const frame = chalk.yellow(this.frames[this.currentFrame] ?? '');
    process.stdout.write(`\r\x1b[2K${chalk.gray('│')} ${frame} ${chalk.gray(this.status)}`);
  }
}

function printBlock(title: string, message: string, accent: (s: string) => string) {
  const block = createBlock(title, message, accent, identity);
  console.log(block.top);
  if (block.body.length > 0) console.log(block.body);
  console.log(block.bottom);
}

function printBanner(cfg: AgentConfig) {
  console.log(chalk.yellow.bold('🔎 Concierge Agent: tell me what to look up on the web'));
  console.log(chalk.gray('─'.repeat(60)));
  console.log(chalk.white(`Model: ${chalk.green(describeModel(cfg.llm))}   Search: ${chalk.green(cfg.search.provider)}`));
  console.log(chalk.white('Tip: mention an email address and I will offer to send the summary there.'));
  console.log(chalk.red('Type "quit" or "exit" to leave.'));
  console.log(chalk.gray('─'.repeat(60)));
  console.log();
}

async function main() {
  let cfg: AgentConfig;
  try {
    cfg = loadAgentConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(chalk.red('❌ Configuration problem:'));
      for (const issue of error.issues) console.error(chalk.red(`   • ${issue}`));
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  await preloadPrompts();
  log.debug({ provider: cfg.llm.provider, search: cfg.search.provider, smtp: Boolean(cfg.smtp) }, 'CLI starting');
  printBanner(cfg);

  const rl = readline.createInterface({ input, output });
  const spinner = new Spinner();

  const gate: HumanGate = {
    notify(message) {
      spinner.pause();
      console.log();
      printBlock('Agent', message, chalk.magentaBright);
    },
    async ask(question) {
      spinner.pause();
      const answer = await rl.question(chalk.yellow(question));
      spinner.resume();
      return answer;
    },
  };

  const agent = buildConciergeAgent(cfg, {
    log,
    gate,
    onStatus: (update) => spinner.handlePipelineUpdate(update),
    onSummary: async (summary) => {
      spinner.pause();
      const block = createBlock('Summary', renderMarkdownToTerminal(summary), chalk.greenBright, identity);
      console.log();
      console.log(block.top);
      if (block.body.length > 0) {
        await streamText(`${block.body}\n`);
      }
      console.log(block.bottom);
      spinner.resume();
    },
  });

  try {
    while (true) {
      const q = (await rl.question(chalk.blue.bold('What would you like to find? '))).trim();
      if (!q) continue;
      if (QUIT_WORDS.includes(q.toLowerCase())) {
        console.log(chalk.cyan('Goodbye!'));
        break;
      }

      console.log();
      console.log(PIPELINE_TOP);
      spinner.start();
      let result: Awaited<ReturnType<typeof agent.runTurn>>;
      try {
        result = await agent.runTurn(q);
      } finally {
        spinner.stop();
        console.log(PIPELINE_BOTTOM);
      }

      log.debug({ exit: result.exit, query: result.query, emailSent: result.emailSent }, 'turn_finished');
      console.log();
    }
  } finally {
    rl.close();
  }
}

main().catch((e) => {
  log.error({ error: e instanceof Error ? e.message : String(e) }, 'cli_crashed');
  console.error(e);
  process.exit(1);
});
