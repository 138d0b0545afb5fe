#!/usr/bin/env node

import { Command } from 'commander';
import chalk, { Chalk, type ChalkInstance } from 'chalk';
import ora from 'ora';
import { promises as fs } from 'fs';
import { basename, resolve } from 'path';
import { loadConfig, type CclogConfig } from './config.js';
import { decodeProjectPath, encodeProjectPath, resolveProjectDir } from './codec/path-codec.js';
import { generateSessionList } from './scanner/index-reader.js';
import { generateProjectList } from './scanner/project-scanner.js';
import { renderInfo, renderTerminal } from './reporter/terminal.js';
import { exportAllFiltered, exportMarkdown, type BulkExportResult } from './reporter/markdown.js';
import { errnoCode, SessionFileError, wrapError } from './utils/errors.js';
import { createLogger, setLogLevel } from './utils/logger.js';

const log = createLogger('cli');

type GlobalOptions = {
  projectsDir?: string;
  columns?: string;
  color?: boolean;
  logLevel?: string;
};

interface Runtime {
  config: CclogConfig;
  colors: ChalkInstance;
}

process.stdout.on('error', err => {
  // The reader went away (selector closed, `| head`): nothing left to do.
  if (errnoCode(err) === 'EPIPE') process.exit(0);
  console.error(chalk.red(`Error: ${err.message}`));
  process.exit(1);
});

function writeLine(line: string): void {
  process.stdout.write(line + '\n');
}

function colorsFor(color: boolean | undefined): ChalkInstance {
  if (color === true) return new Chalk({ level: chalk.level || 1 });
  if (color === false) return new Chalk({ level: 0 });
  return chalk;
}

/**
 * Build the runtime from global options and run one command. Any failure
 * becomes a one-line diagnostic on stderr and a non-zero exit code.
 */
async function run(command: Command, body: (rt: Runtime) => Promise<void>): Promise<void> {
  try {
    const opts = command.optsWithGlobals<GlobalOptions>();
    const config = loadConfig(process.env, {
      projectsRoot: opts.projectsDir,
      columns: opts.columns,
      logLevel: opts.logLevel,
    });
    setLogLevel(config.logLevel);
    await body({ config, colors: colorsFor(opts.color) });
  } catch (err) {
    const error = wrapError(err);
    log.debug(error.toDetailedString());
    console.error(chalk.red(`Error: ${error.message}`));
    process.exitCode = 1;
  }
}

async function requireProjectDir(target: string | undefined, config: CclogConfig): Promise<string> {
  const projectDir = resolveProjectDir(target, config.projectsRoot);
  try {
    await fs.access(projectDir);
  } catch (err) {
    throw new SessionFileError(
      `No Claude logs found for this project: ${target ?? process.cwd()}`,
      'FILE_NOT_FOUND',
      projectDir,
      err,
    );
  }
  return projectDir;
}

const program = new Command();

program
  .name('cclog')
  .description('List, preview and export Claude Code conversation logs')
  .version('0.1.0')
  .option('--projects-dir <path>', 'Claude Code projects directory (default: ~/.claude/projects)')
  .option('--columns <n>', 'Terminal width used to lay out listings')
  .option('--color', 'Force colored output')
  .option('--no-color', 'Disable colored output')
  .option('--log-level <level>', 'debug | info | warn | error | silent');

program
  .command('view')
  .description('Render a session log with colors')
  .argument('<file>', 'Session JSONL file')
  .action(async (file: string, _opts: unknown, command: Command) => {
    await run(command, async ({ config, colors }) => {
      const output = await renderTerminal(file, {
        colors,
        maxResultLines: config.maxResultLines,
        columns: config.columns,
      });
      writeLine(output);
    });
  });

program
  .command('info')
  .description('Show session metadata')
  .argument('<file>', 'Session JSONL file')
  .action(async (file: string, _opts: unknown, command: Command) => {
    await run(command, async ({ colors }) => {
      writeLine(await renderInfo(file, colors));
    });
  });

program
  .command('list')
  .description('List the sessions of a project, newest first')
  .argument('[dir]', 'Project log directory or working directory (default: current directory)')
  .action(async (dir: string | undefined, _opts: unknown, command: Command) => {
    await run(command, async ({ config, colors }) => {
      const projectDir = await requireProjectDir(dir, config);
      for await (const line of generateSessionList(projectDir, { columns: config.columns, colors })) {
        writeLine(line);
      }
    });
  });

program
  .command('projects')
  .description('List all projects, most recently active first')
  .argument('[root]', 'Projects directory (default: --projects-dir)')
  .action(async (root: string | undefined, _opts: unknown, command: Command) => {
    await run(command, async ({ config, colors }) => {
      const options = {
        columns: config.columns,
        colors,
        maxSessionsPerProject: config.maxSessionsPerProject,
      };
      for await (const line of generateProjectList(root ?? config.projectsRoot, options)) {
        writeLine(line);
      }
    });
  });

program
  .command('decode')
  .description('Decode a project directory name into its original path')
  .argument('<name>', 'Encoded project directory name')
  .action(async (name: string, _opts: unknown, command: Command) => {
    await run(command, async () => {
      writeLine(decodeProjectPath(name));
    });
  });

program
  .command('encode')
  .description('Encode a path into its project directory name')
  .argument('[path]', 'Project path (default: current directory)')
  .action(async (path: string | undefined, _opts: unknown, command: Command) => {
    await run(command, async () => {
      writeLine(encodeProjectPath(resolve(path ?? process.cwd())));
    });
  });

program
  .command('export')
  .description('Export a session to Markdown')
  .argument('<file>', 'Session JSONL file')
  .argument('[outDir]', 'Output directory (default: claude_chat)')
  .action(async (file: string, outDir: string | undefined, _opts: unknown, command: Command) => {
    await run(command, async ({ config, colors }) => {
      const result = await exportMarkdown(file, outDir ?? config.exportDir, { filterEmpty: false });
      writeLine(`Exported ${colors.cyan(result.stats.messages)} message(s) to ${result.outputPath}`);
    });
  });

program
  .command('export-filtered')
  .description('Export a session to Markdown without empty entries')
  .argument('<file>', 'Session JSONL file')
  .argument('[outDir]', 'Output directory (default: claude_chat)')
  .action(async (file: string, outDir: string | undefined, _opts: unknown, command: Command) => {
    await run(command, async ({ config, colors }) => {
      const result = await exportMarkdown(file, outDir ?? config.exportDir, { filterEmpty: true });
      writeLine(
        `Exported ${colors.cyan(result.stats.messages)} message(s) to ${result.outputPath} ` +
          colors.dim(`(${result.stats.removed} empty entries removed)`),
      );
    });
  });

program
  .command('export-all-filtered')
  .description('Export every session of a project to Markdown without empty entries')
  .argument('[dir]', 'Project log directory or working directory (default: current directory)')
  .argument('[outDir]', 'Output directory (default: claude_chat)')
  .action(async (dir: string | undefined, outDir: string | undefined, _opts: unknown, command: Command) => {
    await run(command, async ({ config, colors }) => {
      const projectDir = await requireProjectDir(dir, config);
      const target = outDir ?? config.exportDir;
      const spinner = ora({ text: 'Exporting sessions...', stream: process.stderr }).start();

      let result: BulkExportResult;
      try {
        result = await exportAllFiltered(projectDir, target, (done, total, filePath) => {
          if (filePath) spinner.text = `[${done + 1}/${total}] ${basename(filePath)}`;
        });
      } catch (err) {
        spinner.fail('Export failed');
        throw err;
      }

      const { exported, skipped, failed } = result;
      const summary = `Exported ${exported.length} session(s) to ${target}`;
      if (failed.length > 0) {
        spinner.warn(`${summary}, ${failed.length} failed`);
        log.warn(`${failed.length} session(s) could not be exported`);
        process.exitCode = 1;
      } else {
        spinner.succeed(summary);
      }

      writeLine(
        `${colors.green(exported.length)} exported, ${colors.dim(`${skipped.length} skipped`)}, ` +
          `${failed.length > 0 ? colors.red(`${failed.length} failed`) : '0 failed'}`,
      );
    });
  });

await program.parseAsync();
