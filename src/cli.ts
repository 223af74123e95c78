#!/usr/bin/env node
/**
 * CLI entry point for chat-relay.
 * Handles argument parsing, --init command, environment variable setup,
 * and delegates to the main application bootstrap.
 */

import { existsSync, mkdirSync, copyFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join, resolve } from 'node:path';
import { USAGE, parseCliArgs } from './cli-args.js';

const command = parseCliArgs(process.argv.slice(2));

if (command.kind === 'help') {
  console.log(USAGE);
  process.exit(0);
}

if (command.kind === 'init') {
  const targetPath = resolve(process.cwd(), 'config', 'settings.yaml');
  const sourcePath = join(dirname(fileURLToPath(import.meta.url)), '..', 'config', 'settings.example.yaml');

  if (existsSync(targetPath)) {
    console.error(`Error: Settings file already exists at ${targetPath}`);
    process.exit(1);
  }

  if (!existsSync(sourcePath)) {
    console.error('Error: Example settings not found (package may be corrupted)');
    process.exit(1);
  }

  mkdirSync(dirname(targetPath), { recursive: true });
  copyFileSync(sourcePath, targetPath);

  console.log(`Created settings file: ${targetPath}`);
  console.log('');
  console.log('Next steps:');
  console.log('  1. Set LLM_API_KEY in the environment (or apiKey in the file)');
  console.log('  2. Run: chat-relay --config config/settings.yaml');
  console.log('');

  process.exit(0);
}

if (command.kind === 'run') {
  Object.assign(process.env, command.env);
}

// Bootstrap the application
await import('./index.js');
