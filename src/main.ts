#!/usr/bin/env node
import { runCli } from './cli.js';

/**
 * Entry point for the svg-inline-export binary
 */
async function bootstrap() {
  process.exitCode = await runCli(process.argv.slice(2));
}

bootstrap().catch(err => {
  console.error('Fatal:', err);
  process.exitCode = 1;
});
