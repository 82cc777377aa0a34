import { Injectable } from '@nestjs/common';
import { spawn, StdioOptions } from 'child_process';
import {
  IProcessRunner,
  ProcessRunOptions,
  ProcessRunResult,
} from '../../application/ports/process-runner.port';

@Injectable()
export class ChildProcessRunner implements IProcessRunner {
  run(
    command: string,
    args: readonly string[],
    options: ProcessRunOptions,
  ): Promise<ProcessRunResult> {
    // A captured child gets no stdin, so a TeX error prompt reads EOF and aborts.
    const stdio: StdioOptions = options.captureOutput
      ? ['ignore', 'pipe', 'pipe']
      : 'inherit';

    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        stdio,
        timeout: options.timeoutMs,
        windowsHide: true,
      });

      let stdout = '';
      let stderr = '';
      child.stdout?.setEncoding('utf8');
      child.stderr?.setEncoding('utf8');
      child.stdout?.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr?.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.once('error', reject);
      child.once('close', (exitCode, signal) => {
        resolve({ exitCode, signal, stdout, stderr });
      });
    });
  }

  launch(command: string, args: readonly string[]): Promise<void> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        detached: true,
        stdio: 'ignore',
        windowsHide: true,
      });
      child.once('error', reject);
      child.once('spawn', () => {
        child.unref();
        resolve();
      });
    });
  }
}
