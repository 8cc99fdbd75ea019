#!/usr/bin/env node
import dotenv from 'dotenv';
import { loadConfig } from './config.js';
import { RequestError, TransportError } from './lib/errors.js';
import { createFetchTransport } from './lib/http.js';
import { Logger, levelFromFlags, setLogLevel } from './lib/logger.js';
import { parseCliOptions } from './options.js';
import { searchAccount } from './services/pipeline.js';
import { renderResults } from './services/render.js';

dotenv.config();

const log = Logger.scope('main');

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  const options = parseCliOptions(process.argv.slice(2), config);
  setLogLevel(levelFromFlags(options));

  const transport = createFetchTransport({ timeoutMs: config.requestTimeoutMs, userAgent: config.userAgent });
  const context = await searchAccount(options, config, transport);

  console.log(renderResults(context.found, context.definitions, options.json));
}

main().catch((error: unknown) => {
  if (error instanceof RequestError || error instanceof TransportError) {
    console.error(`Error: ${error.message}`);
  } else {
    log.error('Unexpected failure', error);
  }
  process.exitCode = 1;
});
