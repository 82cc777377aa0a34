import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as path from 'path';
import { INTERMEDIATE_EXTENSIONS } from '../../domain/constants/latex.constants';
import { isErrnoException } from '../../domain/errors/rendering.errors';
import {
  CompilationResult,
  CompileOptions,
  LatexCompiler,
} from '../../domain/types/compilation.types';
import { ILoggerPort } from '../ports/logger.port';
import { IProcessRunner, ProcessRunResult } from '../ports/process-runner.port';

const COMPILER_FLAGS: Record<LatexCompiler, string> = {
  pdflatex: '-pdf',
  latex: '-dvi',
  xelatex: '-xelatex',
  lualatex: '-lualatex',
};

const ERROR_LINE_PATTERNS = [/Error:/, /Fatal error:/, /^!/, /^[^\s:]+:\d+:/];
const MAX_SUMMARY_LINES = 20;

/** Error-level lines of compiler output, deduplicated, in order. */
export function summarizeCompilerOutput(output: string): string[] {
  const lines = output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => ERROR_LINE_PATTERNS.some((pattern) => pattern.test(line)));
  return Array.from(new Set(lines)).slice(0, MAX_SUMMARY_LINES);
}

export function artifactExtension(compiler: LatexCompiler): string {
  return compiler === 'latex' ? '.dvi' : '.pdf';
}

/** Command that opens a file with the desktop's default viewer. */
export function platformOpener(
  filePath: string,
  platform: NodeJS.Platform = process.platform,
): { command: string; args: string[] } {
  switch (platform) {
    case 'darwin':
      return { command: 'open', args: [filePath] };
    case 'win32':
      return { command: 'cmd', args: ['/c', 'start', '""', filePath] };
    default:
      return { command: 'xdg-open', args: [filePath] };
  }
}

@Injectable()
export class LatexCompilerService {
  constructor(
    @Inject('IProcessRunner')
    private readonly processRunner: IProcessRunner,
    @Inject('ILoggerPort')
    private readonly logger: ILoggerPort,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Runs latexmk on a markup file. Success means the artifact exists
   * afterwards, whatever the exit code was.
   */
  async compile(
    markupPath: string,
    outputDir?: string,
    options: CompileOptions = {},
  ): Promise<CompilationResult> {
    const compiler = options.compiler ?? 'pdflatex';
    const verbose = options.verbose ?? false;
    const texPath = path.resolve(markupPath);
    const targetDir = path.resolve(outputDir ?? path.dirname(texPath));
    const baseName = path.basename(texPath, path.extname(texPath));
    const artifactPath = path.join(
      targetDir,
      `${baseName}${artifactExtension(compiler)}`,
    );
    const context = { compiler, baseName };

    if (!(await this.exists(texPath))) {
      this.logger.error(`LaTeX file not found: ${texPath}`, undefined, context);
      return {
        success: false,
        state: 'pending',
        artifactPath,
        exitCode: null,
        errorSummary: [],
        reason: 'markup-missing',
      };
    }

    await fs.mkdir(targetDir, { recursive: true });
    // A leftover artifact from an earlier run must not pass for this one.
    await fs.rm(artifactPath, { force: true });

    let result: CompilationResult;
    try {
      result = await this.invoke(texPath, targetDir, artifactPath, options);
    } finally {
      if (options.cleanup) {
        await this.removeIntermediates(targetDir, baseName, artifactPath, verbose);
      }
    }

    if (result.success && options.openArtifact) {
      await this.openArtifact(artifactPath);
    }
    return result;
  }

  /** Compiles next to the requested PDF, continuing past errors and cleaning up. */
  compileToPdf(
    markupPath: string,
    outputPdf?: string,
    compiler: LatexCompiler = 'pdflatex',
    verbose = false,
  ): Promise<CompilationResult> {
    const outputDir = outputPdf ? path.dirname(outputPdf) : undefined;
    return this.compile(markupPath, outputDir, {
      compiler,
      verbose,
      continueOnError: true,
      cleanup: true,
    });
  }

  private async invoke(
    texPath: string,
    outputDir: string,
    artifactPath: string,
    options: CompileOptions,
  ): Promise<CompilationResult> {
    const compiler = options.compiler ?? 'pdflatex';
    const verbose = options.verbose ?? false;
    const command =
      options.command ??
      this.configService.get<string>('rendering.latexCommand') ??
      'latexmk';
    const timeoutMs =
      options.timeoutMs ?? this.configService.get<number>('rendering.timeoutMs');
    const context = { compiler, baseName: path.basename(texPath) };

    const args = [
      COMPILER_FLAGS[compiler],
      `-interaction=${options.continueOnError === false ? 'errorstopmode' : 'nonstopmode'}`,
      '-file-line-error',
      `-output-directory=${outputDir}`,
      ...(verbose ? [] : ['-silent']),
      texPath,
    ];

    this.logger.info(`Compiling ${path.basename(texPath)} with ${compiler}`, context);
    this.logger.debug(`Running: ${command} ${args.join(' ')}`, context);

    let run: ProcessRunResult;
    try {
      run = await this.processRunner.run(command, args, {
        captureOutput: !verbose,
        timeoutMs,
      });
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        this.logger.error(
          `${command} not found. Install TeX Live, MiKTeX or another LaTeX distribution.`,
          error,
          context,
        );
        return {
          success: false,
          state: 'invoked',
          artifactPath,
          exitCode: null,
          errorSummary: [],
          reason: 'compiler-not-found',
        };
      }
      throw error;
    }

    const errorSummary =
      run.exitCode === 0 ? [] : summarizeCompilerOutput(`${run.stdout}\n${run.stderr}`);
    if (run.exitCode !== 0) {
      this.logger.warn(
        `${command} exited with ${run.exitCode ?? run.signal ?? 'unknown status'}`,
        context,
        { errorSummary },
      );
    }

    if (!(await this.exists(artifactPath))) {
      this.logger.error(
        `Compilation finished but no artifact was written to ${artifactPath}`,
        undefined,
        context,
      );
      return {
        success: false,
        state: 'artifact-missing',
        artifactPath,
        exitCode: run.exitCode,
        errorSummary,
        reason: 'artifact-missing',
      };
    }

    this.logger.info(`Compiled ${artifactPath}`, context);
    return {
      success: true,
      state: 'artifact-found',
      artifactPath,
      exitCode: run.exitCode,
      errorSummary,
    };
  }

  private async removeIntermediates(
    outputDir: string,
    baseName: string,
    artifactPath: string,
    verbose: boolean,
  ): Promise<void> {
    await Promise.all(
      INTERMEDIATE_EXTENSIONS.map(async (extension) => {
        const file = path.join(outputDir, `${baseName}${extension}`);
        if (file === artifactPath) return;
        try {
          await fs.unlink(file);
          if (verbose) this.logger.debug(`Removed ${file}`);
        } catch (error) {
          if (isErrnoException(error) && error.code === 'ENOENT') return;
          if (verbose) this.logger.warn(`Failed to remove ${file}`, undefined, { error: String(error) });
        }
      }),
    );
  }

  private async openArtifact(artifactPath: string): Promise<void> {
    const opener = platformOpener(artifactPath);
    try {
      await this.processRunner.launch(opener.command, opener.args);
    } catch (error) {
      this.logger.warn(`Failed to open ${artifactPath}`, undefined, {
        error: String(error),
      });
    }
  }

  private async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }
}
