#!/usr/bin/env node

import { readFile } from 'node:fs/promises';
import { createApp } from './index.js';
import { KeywordExtractor } from './keywords/KeywordExtractor.js';
import { ConfigurationError } from './utils/errors.js';

function usage(): void {
  console.log('Usage: tailor-match [command]');
  console.log('');
  console.log('Commands:');
  console.log('  serve [--config <path>]        Start the HTTP API (default)');
  console.log('  keywords <file> [--by-category] Extract keywords from a text file');
  console.log('  help                           Show this help');
}

function flagValue(args: string[], flag: string): string | undefined {
  const i = args.indexOf(flag);
  return i >= 0 ? args[i + 1] : undefined;
}

async function serve(args: string[]): Promise<void> {
  const app = createApp({ configPath: flagValue(args, '--config') });
  try {
    await app.start();
    app.enableGracefulShutdown();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`Configuration error${error.setting ? ` (${error.setting})` : ''}: ${error.message}`);
    } else {
      console.error('Failed to start:', error);
    }
    process.exit(1);
  }
}

async function keywords(args: string[]): Promise<void> {
  const file = args.find((a) => !a.startsWith('--'));
  if (!file) {
    usage();
    process.exit(2);
  }

  const text = await readFile(file, 'utf8');
  const extractor = new KeywordExtractor();
  const output = args.includes('--by-category')
    ? extractor.extractByCategory(text)
    : { keywords: extractor.extract(text) };
  console.log(JSON.stringify(output, null, 2));
}

async function main(): Promise<void> {
  const [command = 'serve', ...rest] = process.argv.slice(2);

  switch (command) {
    case 'serve':
      await serve(rest);
      break;
    case 'keywords':
      await keywords(rest);
      break;
    case 'help':
    case '--help':
    case '-h':
      usage();
      break;
    default:
      console.error(`Unknown command: ${command}`);
      usage();
      process.exit(2);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
