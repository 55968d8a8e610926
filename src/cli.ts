#!/usr/bin/env node
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { loadConfig, parseStrategy } from './config.js';
import { InvalidUrlError } from './errors.js';
import { createModelClient } from './model/client.js';
import { EmailQuotaNotifier } from './notify/quotaAlert.js';
import { JobUrlAnalyzer } from './pipeline/analyzer.js';
import type { ExtractionStrategy } from './types.js';
import { HttpClient } from './utils/http.js';
import { RunLogger } from './utils/logger.js';

interface CliArgs {
  url?: string;
  htmlFile?: string;
  userId?: string;
  userEmail?: string;
  strategy?: ExtractionStrategy;
}

const USAGE =
  'Usage: job-extract --url <posting-url> [--html-file <path>] [--user-id <id>] [--user-email <email>] [--strategy cascade|model-only]';

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {};
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const value = argv[i + 1];
    if (!value) {
      continue;
    }
    if (arg === '--url') {
      args.url = value;
      i += 1;
    } else if (arg === '--html-file') {
      args.htmlFile = value;
      i += 1;
    } else if (arg === '--user-id') {
      args.userId = value;
      i += 1;
    } else if (arg === '--user-email') {
      args.userEmail = value;
      i += 1;
    } else if (arg === '--strategy') {
      args.strategy = parseStrategy(value);
      i += 1;
    }
  }
  return args;
}

function dateStamp(date = new Date()): string {
  return date.toISOString().slice(0, 10);
}

async function run(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (!args.url) {
    console.error(USAGE);
    process.exitCode = 2;
    return;
  }

  const config = loadConfig();
  const logger = new RunLogger(join(config.logDir, `extract_run_${dateStamp()}.log`), 'Extraction run', {
    url: args.url,
    user: args.userId,
  });
  await logger.init();

  const analyzer = new JobUrlAnalyzer({
    httpClient: new HttpClient(config.fetchTimeoutMs),
    modelClient: createModelClient(config),
    notifier: new EmailQuotaNotifier(config.smtp),
    logger,
    config,
  });

  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once('SIGINT', onSigint);

  try {
    const htmlContent = args.htmlFile ? await readFile(args.htmlFile, 'utf8') : undefined;
    const response = await analyzer.analyze(
      {
        url: args.url,
        userId: args.userId,
        userEmail: args.userEmail,
        htmlContent,
      },
      { signal: controller.signal, strategy: args.strategy },
    );
    console.log(JSON.stringify(response, null, 2));
    if (!response.success) {
      process.exitCode = 1;
    }
  } catch (error) {
    if (error instanceof InvalidUrlError) {
      await logger.error(error.message);
      console.error(error.message);
      process.exitCode = 2;
      return;
    }
    throw error;
  } finally {
    process.removeListener('SIGINT', onSigint);
    await logger.close();
  }
}

run().catch((error) => {
  console.error(`Extraction failed: ${String(error)}`);
  process.exitCode = 1;
});
