#!/usr/bin/env node
import { Command } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { runCheckCommand } from './commands/check.js';
import { runFilterCommand } from './commands/filter.js';
import { runPatternsCommand } from './commands/patterns.js';
import { createRenderer, getRenderer } from './ui/renderer.js';

interface GlobalFlags {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
}

export async function buildCli(argv: string[]): Promise<void> {
  const program = new Command();

  let globalFlags: GlobalFlags = {};

  const version = detectVersionSync() ?? '0.0.0';

  program
    .name('pathrules')
    .description('Match paths against ignore rules (first matching rule wins, #include supported)')
    .version(version, '-v, --version');

  program
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Machine-friendly output (JSON lines)')
    .option('--config <path>', 'Config file (default: pathrules.config.yaml)');

  program.hook('preAction', (thisCommand) => {
    globalFlags = thisCommand.opts<GlobalFlags>();
    process.env.PATHRULES_QUIET = globalFlags.quiet ? '1' : '0';
    createRenderer({ quiet: !!globalFlags.quiet });
  });

  const common = () => ({
    verbose: !!globalFlags.verbose,
    configPath: globalFlags.config,
  });

  program
    .command('check')
    .description('Report whether each path is ignored')
    .argument('<paths...>', 'Repo-relative paths')
    .option('--rules <file>', 'Rule file (overrides config)')
    .option('--explain', 'Show the rule that decided each path')
    .action(async (paths: string[], opts: { rules?: string; explain?: boolean }) => {
      const res = await runCheckCommand({ ...common(), paths, rulesFile: opts.rules, explain: !!opts.explain });
      if (!res.ok) process.exitCode = 1;
    });

  program
    .command('patterns')
    .description('List compiled patterns in evaluation order')
    .option('--rules <file>', 'Rule file (overrides config)')
    .action(async (opts: { rules?: string }) => {
      const res = await runPatternsCommand({ ...common(), rulesFile: opts.rules });
      if (!res.ok) process.exitCode = 1;
    });

  program
    .command('filter')
    .description('Read paths from stdin and print those that are not ignored')
    .option('--rules <file>', 'Rule file (overrides config)')
    .action(async (opts: { rules?: string }) => {
      const res = await runFilterCommand({ ...common(), rulesFile: opts.rules });
      if (!res.ok) process.exitCode = 1;
    });

  await program.parseAsync(argv);
}

buildCli(process.argv).catch((err: unknown) => {
  getRenderer().error('Unexpected failure', err instanceof Error ? (err.stack ?? err.message) : String(err));
  process.exitCode = 1;
});

function detectVersionSync(): string | null {
  try {
    const startDir = dirname(fileURLToPath(import.meta.url));

    let current = startDir;
    for (let i = 0; i < 8; i++) {
      const candidate = resolve(current, 'package.json');
      if (existsSync(candidate)) {
        const content = readFileSync(candidate, 'utf8');
        const parsed: { version?: unknown } = JSON.parse(content);
        return typeof parsed.version === 'string' ? parsed.version : null;
      }
      const parent = resolve(current, '..');
      if (parent === current) break;
      current = parent;
    }
    return null;
  } catch {
    return null;
  }
}
