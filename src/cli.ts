#!/usr/bin/env node

import { Command } from 'commander';
import * as fs from 'fs/promises';
import * as readline from 'readline';
import { loadConfig, resetConfig, type Config } from './config/index.js';
import { JournalAnalyzer } from './analysis/journal-analyzer.js';
import type { ClassificationInput } from './analysis/input.js';
import { createLogger } from './utils/logger.js';

const VERSION = '0.1.0';

interface TextOptions {
  file?: string;
  start?: string;
  end?: string;
  emotion?: string;
  verbose?: boolean;
}

function buildAnalyzer(verbose?: boolean): JournalAnalyzer {
  resetConfig();
  const config: Config = loadConfig();

  if (verbose) {
    config.logging.level = 'debug';
  }

  return new JournalAnalyzer({ config, logger: createLogger(config.logging) });
}

function parseOffset(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const offset = Number(value);
  if (!Number.isInteger(offset)) {
    throw new Error(`--${name} must be an integer (got "${value}")`);
  }
  return offset;
}

/**
 * Text from --file, else the joined arguments.
 */
async function readInput(words: string[], options: TextOptions): Promise<ClassificationInput> {
  const text = options.file ? await fs.readFile(options.file, 'utf-8') : words.join(' ');

  const start = parseOffset(options.start, 'start');
  const end = parseOffset(options.end, 'end');
  if ((start === undefined) !== (end === undefined)) {
    throw new Error('--start and --end must be given together');
  }

  return {
    text,
    selection: start !== undefined && end !== undefined ? { start, end } : undefined,
    contextualEmotion: options.emotion,
  };
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function withTextOptions(command: Command): Command {
  return command
    .argument('[text...]', 'Entry text (ignored with --file)')
    .option('-f, --file <path>', 'Read the entry from a file')
    .option('--start <n>', 'Selection start, in characters')
    .option('--end <n>', 'Selection end, exclusive')
    .option('-v, --verbose', 'Enable verbose logging');
}

function fail(what: string, error: unknown): never {
  console.error(`Failed to ${what}:`, error instanceof Error ? error.message : String(error));
  process.exit(1);
}

const program = new Command();

program
  .name('journal-lens')
  .description('Rule-based emotion, domain and active-listening analysis for journal entries')
  .version(VERSION);

withTextOptions(program.command('emotion'))
  .description('Classify the emotion of an entry')
  .action(async (words: string[], options: TextOptions) => {
    try {
      const analyzer = buildAnalyzer(options.verbose);
      printJson(analyzer.classifyEmotion(await readInput(words, options)));
    } catch (error) {
      fail('classify emotion', error);
    }
  });

withTextOptions(program.command('domain'))
  .description('Rank the life domains of an entry')
  .action(async (words: string[], options: TextOptions) => {
    try {
      const analyzer = buildAnalyzer(options.verbose);
      printJson(analyzer.classifyDomain(await readInput(words, options)));
    } catch (error) {
      fail('classify domain', error);
    }
  });

withTextOptions(program.command('respond'))
  .description('Produce one reflective sentence for an entry')
  .option('-e, --emotion <hint>', 'Emotion hint (id or name)')
  .action(async (words: string[], options: TextOptions) => {
    try {
      const analyzer = buildAnalyzer(options.verbose);
      printJson({ response: analyzer.respond(await readInput(words, options)) ?? null });
    } catch (error) {
      fail('respond', error);
    }
  });

withTextOptions(program.command('analyze'))
  .description('Full report: emotion, domains, response, prompt and title')
  .option('-e, --emotion <hint>', 'Emotion hint (id or name)')
  .action(async (words: string[], options: TextOptions) => {
    try {
      const analyzer = buildAnalyzer(options.verbose);
      printJson(analyzer.analyze(await readInput(words, options)));
    } catch (error) {
      fail('analyze', error);
    }
  });

program
  .command('chat')
  .description('Start an interactive journaling session')
  .option('-v, --verbose', 'Enable verbose logging')
  .action((options: { verbose?: boolean }) => {
    let analyzer: JournalAnalyzer;
    try {
      analyzer = buildAnalyzer(options.verbose);
    } catch (error) {
      fail('start chat', error);
    }

    console.log('journal-lens - Write a line and press Enter. Type /reset to start over, Ctrl+C to exit.\n');

    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: 'You: ',
    });

    rl.prompt();

    rl.on('line', (line) => {
      const input = line.trim();
      if (!input) {
        rl.prompt();
        return;
      }

      if (input === '/reset') {
        analyzer.resetSession();
        console.log('(session reset)\n');
        rl.prompt();
        return;
      }

      try {
        const report = analyzer.analyze(input);
        console.log(`Listener: ${report.response ?? ''}`);
        console.log(`[${report.emotion.categoryLabel} | ${report.topDomain}]\n`);
      } catch (error) {
        console.error(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
      }

      rl.prompt();
    });

    rl.on('close', () => {
      console.log('\nGoodbye!');
      process.exit(0);
    });
  });

program.parse();
