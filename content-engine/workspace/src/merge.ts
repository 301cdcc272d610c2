/**
 * Source merge step
 *
 * Consolidates the generated sources into combined documents for the archive.
 * Runs in-process by default; a configured command runs instead with the
 * workspace as its working directory, and a non-zero exit fails the run with
 * the command's own output.
 */

import { spawn } from 'node:child_process';
import { readFile, writeFile } from 'fs/promises';
import path from 'path';
import { PostProcessingError, errorMessage } from '../../utils/errors.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { SOURCE_DIRS, SourceDir } from './types.js';
import { listFiles } from './workspace.js';

export interface MergeRunner {
  merge(projectDir: string): Promise<void>;
}

export const MERGED_DOCUMENTS: Readonly<Record<SourceDir, string>> = {
  front: 'output_docs/source_code_frontend.txt',
  backend: 'output_docs/source_code_backend.txt',
  db: 'output_docs/source_code_database.txt'
};

export class InProcessMergeRunner implements MergeRunner {
  constructor(private logger: Logger = silentLogger) {}

  async merge(projectDir: string): Promise<void> {
    let total = 0;

    for (const dir of SOURCE_DIRS) {
      const root = path.join(projectDir, 'output_sourcecode', dir);
      const files = await listFiles(root);
      if (files.length === 0) continue;

      const sections: string[] = [];
      for (const file of files) {
        const content = await readFile(path.join(root, file), 'utf-8');
        sections.push(`===== output_sourcecode/${dir}/${file} =====\n${content.trimEnd()}\n`);
      }
      await writeFile(path.join(projectDir, MERGED_DOCUMENTS[dir]), sections.join('\n'), 'utf-8');
      total += files.length;
    }

    if (total === 0) {
      throw new PostProcessingError('Source merge failed: no generated source files under output_sourcecode', 1);
    }
    this.logger('info', 'Merged generated sources', { projectDir, files: total });
  }
}

interface CommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

function run(cmd: string, args: string[], cwd: string): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const ps = spawn(cmd, args, { cwd, shell: false, env: process.env });
    let out = '';
    let err = '';
    ps.stdout.on('data', (d: Buffer) => (out += d.toString()));
    ps.stderr.on('data', (d: Buffer) => (err += d.toString()));
    ps.on('error', reject);
    ps.on('close', code => resolve({ code, stdout: out, stderr: err }));
  });
}

export class CommandMergeRunner implements MergeRunner {
  private cmd: string;
  private args: string[];

  constructor(command: string, private logger: Logger = silentLogger) {
    const [cmd, ...args] = command.trim().split(/\s+/);
    this.cmd = cmd;
    this.args = args;
  }

  async merge(projectDir: string): Promise<void> {
    let result: CommandResult;
    try {
      result = await run(this.cmd, this.args, projectDir);
    } catch (error) {
      throw new PostProcessingError(`Source merge failed: ${errorMessage(error)}`, null);
    }

    if (result.code !== 0) {
      this.logger('error', 'Merge command failed', { command: this.cmd, exitCode: result.code });
      throw new PostProcessingError(result.stderr || result.stdout || 'Source merge failed', result.code);
    }
    this.logger('info', 'Merge command finished', { command: this.cmd });
  }
}

/**
 * Command runner when a merge command is configured, in-process merge otherwise
 */
export function createMergeRunner(command: string, logger?: Logger): MergeRunner {
  return command.trim() ? new CommandMergeRunner(command, logger) : new InProcessMergeRunner(logger);
}
