#!/usr/bin/env node

import fs from 'node:fs';
import path from 'node:path';
import {
  parseFindArgs,
  toFindOptions,
  helpText,
  type FindArgs,
} from './src/cli';
import { findFiles } from './src/find-files';
import * as logger from './src/utils/logger';

function readVersion(): string {
  // Compiled output lives one directory below package.json.
  const candidates = [
    path.join(__dirname, 'package.json'),
    path.join(__dirname, '..', 'package.json'),
  ];
  const packageJsonPath = candidates.find((candidate) =>
    fs.existsSync(candidate),
  );
  if (!packageJsonPath) {
    return 'unknown';
  }
  const packageJson: { version?: string } = JSON.parse(
    fs.readFileSync(packageJsonPath, 'utf8'),
  );
  return packageJson.version || 'unknown';
}

const VERSION = readVersion();

function showHelp() {
  console.log(helpText(VERSION));
}

function showVersion() {
  console.log(`unique-files v${VERSION}`);
}

function main() {
  const rawArgs = process.argv.slice(2);

  if (rawArgs.length === 0) {
    showHelp();
    process.exit(0);
  }

  let args: FindArgs;
  try {
    args = parseFindArgs(rawArgs);
  } catch (error: unknown) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.error(`Error: ${errorMessage}`);
    console.log();
    showHelp();
    process.exit(1);
  }

  if (args.help) {
    showHelp();
    process.exit(0);
  }

  if (args.version) {
    showVersion();
    process.exit(0);
  }

  if (!args.targetDir) {
    logger.error('Error: Directory to search is required');
    console.log();
    showHelp();
    process.exit(1);
  }

  try {
    findFiles(args.targetDir, toFindOptions(args));
  } catch (error: unknown) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.error(`Error: ${errorMessage}`);
    process.exit(1);
  }
}

if (require.main === module) {
  main();
}
