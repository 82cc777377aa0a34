import { promises as fs } from 'fs';
import * as path from 'path';
import {
  IProcessRunner,
  ProcessRunOptions,
  ProcessRunResult,
} from '../application/ports/process-runner.port';

export interface FakeLatexmkBehaviour {
  exitCode?: number | null;
  signal?: NodeJS.Signals | null;
  stdout?: string;
  stderr?: string;
  /** Write `<base>.pdf` (or `.dvi` under -dvi). Defaults to true. */
  writeArtifact?: boolean;
  /** Intermediate files to leave behind. Defaults to .aux and .log. */
  intermediates?: string[];
  runError?: Error;
  launchError?: Error;
}

export interface RecordedRun {
  command: string;
  args: string[];
  options: ProcessRunOptions;
}

/** Stands in for latexmk: writes the files a real run would leave. */
export class FakeLatexmkRunner implements IProcessRunner {
  readonly runs: RecordedRun[] = [];
  readonly launches: { command: string; args: string[] }[] = [];

  constructor(public behaviour: FakeLatexmkBehaviour = {}) {}

  async run(
    command: string,
    args: readonly string[],
    options: ProcessRunOptions,
  ): Promise<ProcessRunResult> {
    this.runs.push({ command, args: [...args], options });
    if (this.behaviour.runError) throw this.behaviour.runError;

    const outputDir = args
      .find((arg) => arg.startsWith('-output-directory='))
      ?.slice('-output-directory='.length);
    const texPath = args[args.length - 1];

    if (outputDir && texPath) {
      const baseName = path.basename(texPath, path.extname(texPath));
      const write = (extension: string) =>
        fs.writeFile(path.join(outputDir, `${baseName}${extension}`), 'fake output');

      for (const extension of this.behaviour.intermediates ?? ['.aux', '.log']) {
        await write(extension);
      }
      if (this.behaviour.writeArtifact ?? true) {
        await write(args.includes('-dvi') ? '.dvi' : '.pdf');
      }
    }

    return {
      exitCode: this.behaviour.exitCode === undefined ? 0 : this.behaviour.exitCode,
      signal: this.behaviour.signal ?? null,
      stdout: this.behaviour.stdout ?? '',
      stderr: this.behaviour.stderr ?? '',
    };
  }

  async launch(command: string, args: readonly string[]): Promise<void> {
    this.launches.push({ command, args: [...args] });
    if (this.behaviour.launchError) throw this.behaviour.launchError;
  }
}
