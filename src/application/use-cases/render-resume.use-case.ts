import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
  isErrnoException,
  RenderingError,
  TemplateNotFoundError,
} from '../../domain/errors/rendering.errors';
import { TemplatePopulator } from '../../domain/services/template-populator.service';
import {
  CompilationResult,
  LatexCompiler,
} from '../../domain/types/compilation.types';
import { ResumeRecord } from '../../domain/types/resume.types';
import { DEFAULT_TEMPLATE_PATH } from '../../infrastructure/config/rendering.config';
import { RenderContextService } from '../../infrastructure/logging/shared/render-context.service';
import { ILoggerPort } from '../ports/logger.port';
import { LatexCompilerService } from '../services/latex-compiler.service';
import { resolveOutputName } from '../services/output-naming';

export interface RenderResumeInput {
  resume: ResumeRecord;
  templatePath?: string;
  /** Base name for the outputs; sanitised, or generated when absent. */
  outputName?: string;
  compiler?: LatexCompiler;
  verbose?: boolean;
  outputRoot?: string;
  /** Also keep a pretty-printed copy of the record under `<root>/json`. */
  saveJson?: boolean;
}

export interface RenderResult {
  renderId: string;
  success: boolean;
  latexPath: string;
  artifactPath: string | null;
  jsonPath?: string;
  error?: string;
  errorSummary?: string[];
}

export interface OutputDirectories {
  latex: string;
  pdfs: string;
  json: string;
}

export function outputDirectories(root: string): OutputDirectories {
  return {
    latex: path.join(root, 'latex'),
    pdfs: path.join(root, 'pdfs'),
    json: path.join(root, 'json'),
  };
}

function describeFailure(result: CompilationResult): string {
  switch (result.reason) {
    case 'compiler-not-found':
      return 'LaTeX compiler not found';
    case 'markup-missing':
      return 'LaTeX file not found';
    default:
      return result.errorSummary[0]
        ? `Failed to compile PDF: ${result.errorSummary[0]}`
        : 'Failed to compile PDF';
  }
}

@Injectable()
export class RenderResumeUseCase {
  constructor(
    private readonly templatePopulator: TemplatePopulator,
    private readonly latexCompiler: LatexCompilerService,
    private readonly renderContext: RenderContextService,
    private readonly configService: ConfigService,
    @Inject('ILoggerPort')
    private readonly logger: ILoggerPort,
  ) {}

  async execute(input: RenderResumeInput): Promise<RenderResult> {
    const renderId = uuidv4();
    const outputName = resolveOutputName(input.outputName);

    return this.renderContext.runWithAsync({ renderId, outputName }, () =>
      this.render(renderId, outputName, input),
    );
  }

  /** Writes the record as indented JSON and returns the file path. */
  async saveResumeJson(
    resume: ResumeRecord,
    name?: string,
    outputRoot: string = this.outputRoot(),
  ): Promise<string> {
    const jsonPath = path.join(
      outputDirectories(outputRoot).json,
      `${resolveOutputName(name)}.json`,
    );
    await this.writeOutput(jsonPath, JSON.stringify(resume, null, 2));
    this.logger.info(`Saved resume JSON: ${jsonPath}`, RenderResumeUseCase.name);
    return jsonPath;
  }

  private async render(
    renderId: string,
    outputName: string,
    input: RenderResumeInput,
  ): Promise<RenderResult> {
    const root = input.outputRoot ?? this.outputRoot();
    const dirs = outputDirectories(root);
    const templatePath =
      input.templatePath ??
      this.configService.get<string>('rendering.templatePath') ??
      DEFAULT_TEMPLATE_PATH;
    const compiler =
      input.compiler ??
      this.configService.get<LatexCompiler>('rendering.compiler') ??
      'pdflatex';
    const verbose =
      input.verbose ?? this.configService.get<boolean>('rendering.verbose') ?? false;
    this.renderContext.set('compiler', compiler);

    this.logger.info(`Rendering resume ${outputName}`, RenderResumeUseCase.name);

    const template = await this.readTemplate(templatePath);
    const regions = this.templatePopulator.findRegions(template);
    this.logger.debug(
      `Template regions: ${regions.length ? regions.join(', ') : 'none'}`,
      RenderResumeUseCase.name,
    );

    const markup = this.templatePopulator.populate(template, input.resume);
    const latexPath = path.join(dirs.latex, `${outputName}.tex`);
    await this.writeOutput(latexPath, markup);

    const jsonPath = input.saveJson
      ? await this.saveResumeJson(input.resume, outputName, root)
      : undefined;

    const compilation = await this.latexCompiler.compileToPdf(
      latexPath,
      path.join(dirs.pdfs, `${outputName}.pdf`),
      compiler,
      verbose,
    );

    if (!compilation.success) {
      const error = describeFailure(compilation);
      this.logger.error(error, undefined, RenderResumeUseCase.name, {
        latexPath,
        reason: compilation.reason,
      });
      return {
        renderId,
        success: false,
        latexPath,
        artifactPath: null,
        jsonPath,
        error,
        errorSummary: compilation.errorSummary,
      };
    }

    this.logger.info(
      `Generated ${compilation.artifactPath}`,
      RenderResumeUseCase.name,
    );
    return {
      renderId,
      success: true,
      latexPath,
      artifactPath: compilation.artifactPath,
      jsonPath,
    };
  }

  private outputRoot(): string {
    return (
      this.configService.get<string>('rendering.outputRoot') ??
      path.join(process.cwd(), 'output')
    );
  }

  private async readTemplate(templatePath: string): Promise<string> {
    try {
      return await fs.readFile(templatePath, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new TemplateNotFoundError(templatePath, error);
      }
      throw new RenderingError(`Could not read LaTeX template: ${templatePath}`, error);
    }
  }

  private async writeOutput(filePath: string, content: string): Promise<void> {
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, content, 'utf8');
    } catch (error) {
      throw new RenderingError(`Could not write ${filePath}`, error);
    }
  }
}
