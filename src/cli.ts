#!/usr/bin/env node

import { readFileSync } from 'node:fs';
import { join, dirname, resolve, relative } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parseArgs, type MakeArgs } from './args.js';
import { errorMessage } from './errors.js';
import { LogLevel, configureLogger, parseLogLevel } from './logger.js';
import { make } from './make.js';
import { terminalPrompter } from './prompt.js';

function showVersion(): void {
  const packagePath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  const packageContent = readFileSync(packagePath, 'utf-8');
  const packageJson = JSON.parse(packageContent) as { version: string; [key: string]: unknown };
  console.log(packageJson.version);
}

function showHelp(): void {
  console.log(`brickyard - Generate files from a template brick`);
  console.log(``);
  console.log(`USAGE:`);
  console.log(`  brickyard make <brick-dir> [OPTIONS] [--<var> <value> ...]`);
  console.log(``);
  console.log(`ARGUMENTS:`);
  console.log(`  brick-dir                Directory containing brick.yaml and __brick__/`);
  console.log(``);
  console.log(`OPTIONS:`);
  console.log(`  -o, --output-dir <dir>   Where to generate (defaults to current directory)`);
  console.log(`  --on-conflict <policy>   prompt | overwrite | skip | append (default: prompt)`);
  console.log(`  --verbose                Log debug output`);
  console.log(`  --quiet                  Log nothing`);
  console.log(`  --help, -h               Show this help message`);
  console.log(`  --version, -v            Show version number`);
  console.log(``);
  console.log(`EXAMPLES:`);
  console.log(`  brickyard make ./bricks/widget --name MyWidget`);
  console.log(`  brickyard make ./bricks/models --models '["user","order"]' -o lib`);
  console.log(`  brickyard make ./bricks/app --on-conflict skip`);
}

function checkNodeVersion(): void {
  const currentVersion = process.version;
  const versionParts = currentVersion.slice(1).split('.');
  const majorVersion = parseInt(versionParts[0] || '0', 10);

  if (majorVersion < 20) {
    console.error(`Error: Node.js version ${currentVersion} is not supported.`);
    console.error(`Please upgrade to Node.js 20 or higher.`);
    process.exit(1);
  }
}

function setupSignalHandlers(): void {
  let isShuttingDown = false;

  const handleShutdown = (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    console.error(`\nReceived ${signal}, stopping. Files written so far are kept.`);
    process.exit(1);
  };

  process.on('SIGINT', () => handleShutdown('SIGINT'));
  process.on('SIGTERM', () => handleShutdown('SIGTERM'));
}

async function main(): Promise<void> {
  checkNodeVersion();
  setupSignalHandlers();

  const rawArgs = process.argv.slice(2);

  if (rawArgs.length === 0 || rawArgs.includes('--help') || rawArgs.includes('-h')) {
    showHelp();
    process.exit(0);
  }

  if (rawArgs.includes('--version') || rawArgs.includes('-v')) {
    showVersion();
    process.exit(0);
  }

  let args: MakeArgs;
  try {
    args = parseArgs(rawArgs);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    console.error(`Run 'brickyard --help' for usage.`);
    process.exit(1);
  }

  configureLogger({
    level: args.verbose ? LogLevel.DEBUG : parseLogLevel(process.env.BRICKYARD_LOG_LEVEL) ?? LogLevel.INFO,
    silent: args.quiet
  });

  const prompter = terminalPrompter();
  const result = await make(resolve(args.brick), {
    outputDir: args.outputDir ? resolve(args.outputDir) : process.cwd(),
    vars: args.vars,
    ...(args.onConflict ? { fileConflictResolution: args.onConflict } : {}),
    ...(prompter ? { prompter } : {})
  });

  for (const file of result.files) {
    console.log(` + ${relative(process.cwd(), file.path)} (${file.status})`);
  }

  if (!result.success) {
    console.error(result.message);
    process.exit(1);
  }

  console.log(`\n${result.message}`);
  process.exit(0);
}

main().catch((error: unknown) => {
  console.error(`Unexpected error: ${errorMessage(error)}`);
  process.exit(1);
});
