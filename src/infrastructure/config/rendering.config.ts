import { registerAs } from '@nestjs/config';
import * as path from 'path';
import {
  isLatexCompiler,
  LatexCompiler,
} from '../../domain/types/compilation.types';

export interface RenderingConfig {
  outputRoot: string;
  templatePath: string;
  latexCommand: string;
  compiler: LatexCompiler;
  timeoutMs?: number;
  verbose: boolean;
}

export const DEFAULT_TEMPLATE_PATH = path.resolve(
  __dirname,
  '../../../templates/resume.template.tex',
);

function parseTimeout(raw: string | undefined): number | undefined {
  const value = Number(raw);
  return raw && Number.isFinite(value) && value > 0 ? value : undefined;
}

export default registerAs('rendering', (): RenderingConfig => {
  const compiler = process.env.LATEX_COMPILER;

  return {
    outputRoot:
      process.env.RENDER_OUTPUT_ROOT || path.join(process.cwd(), 'output'),
    templatePath: process.env.RESUME_TEMPLATE_PATH || DEFAULT_TEMPLATE_PATH,
    latexCommand: process.env.LATEX_COMMAND || 'latexmk',
    compiler: isLatexCompiler(compiler) ? compiler : 'pdflatex',
    // Unset or invalid means no limit.
    timeoutMs: parseTimeout(process.env.LATEX_TIMEOUT_MS),
    verbose: process.env.LATEX_VERBOSE === 'true',
  };
});
