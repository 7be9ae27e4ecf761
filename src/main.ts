#!/usr/bin/env node
import { runCli } from './cli';

try {
  process.exitCode = runCli(process.argv.slice(2));
} catch (error) {
  console.error('Error:', error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
}
