#!/usr/bin/env node
import { Command } from 'commander';
import pc from 'picocolors';
import { runAssess, runCatalog, runCheckConfig, type AssessCommandOptions, type CliIo } from './commands.js';

const defaultIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  colors: pc,
  env: process.env,
};

function exitOnFailure(code: number): void {
  if (code !== 0) {
    process.exit(code);
  }
}

export function createProgram(io: CliIo = defaultIo): Command {
  const program = new Command();

  program
    .name('droidrisk')
    .description('Score Android applications from static and dynamic analysis findings')
    .version('0.1.0');

  // ── assess ───────────────────────────────────────────────────────────────
  program
    .command('assess')
    .description('Score an assessment job file')
    .argument('<job>', 'Path to a JSON assessment job')
    .option('-f, --format <format>', 'Output format (text, json)', 'text')
    .option('--intel <path>', 'Threat intel feed (overrides INTEL_FEED_PATH)')
    .option('--without <feature...>', 'Treat optional features as unavailable')
    .option('--timeout <ms>', 'Dynamic stream timeout (overrides DYNAMIC_TIMEOUT_MS)')
    .action(async (jobPath: string, options: AssessCommandOptions) => {
      exitOnFailure(await runAssess(jobPath, options, io));
    });

  // ── catalog ──────────────────────────────────────────────────────────────
  program
    .command('catalog')
    .description('List the metric catalog with configured weights and caps')
    .action(() => {
      exitOnFailure(runCatalog(io));
    });

  // ── check-config ─────────────────────────────────────────────────────────
  program
    .command('check-config')
    .description('Validate environment configuration')
    .action(async () => {
      exitOnFailure(await runCheckConfig(io));
    });

  return program;
}

// Run if main module
const isMain = process.argv[1]?.endsWith('cli.js') || process.argv[1]?.endsWith('cli.ts');
if (isMain) {
  createProgram()
    .parseAsync()
    .catch((err: unknown) => {
      console.error(pc.red(err instanceof Error ? err.message : String(err)));
      process.exit(1);
    });
}
