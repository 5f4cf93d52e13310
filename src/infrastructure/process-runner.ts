import { spawn } from 'node:child_process';

import type { ProcessRunnerPort } from '../application/ports/process-runner.port';
import { getLogger } from '../utils/get-logger';

/** Runs helper commands such as `mkfifo`; stderr is kept for the failure message. */
export class ProcessRunner implements ProcessRunnerPort {
  private readonly logger = getLogger();

  public run(command: string, args: string[]): Promise<void> {
    this.logger.debug(`Running helper: command=${command}, args=${args.join(' ')}`);

    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { stdio: ['ignore', 'ignore', 'pipe'] });
      const stderr: Buffer[] = [];

      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
      child.on('error', reject);
      child.on('close', (code) => {
        if (code === 0) {
          resolve();
          return;
        }
        const detail = Buffer.concat(stderr).toString('utf8').trim();
        reject(new Error(`${command} exited with code ${code ?? 'unknown'}${detail ? `: ${detail}` : ''}`));
      });
    });
  }
}
