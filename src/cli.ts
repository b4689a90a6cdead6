import { Command } from 'commander';
import { createRequire } from 'node:module';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string; description: string };

interface CliOptions {
  issueData: string;
  analysisData: string;
  workspace: string;
  output: string;
}

export const program = new Command()
  .name('issuesmith')
  .description(pkg.description)
  .version(pkg.version)
  .requiredOption('--issue-data <path>', 'Path to issue data JSON file')
  .requiredOption('--analysis-data <path>', 'Path to issue analysis JSON file')
  .requiredOption('--workspace <path>', 'Workspace directory (a git checkout of the repository)')
  .requiredOption('--output <path>', 'Output file for the execution report')
  .action(async (options: CliOptions) => {
    const { runCommand } = await import('./commands/run.js');
    process.exitCode = await runCommand(options);
  });
