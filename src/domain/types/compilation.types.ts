export type LatexCompiler = 'pdflatex' | 'latex' | 'xelatex' | 'lualatex';

export const LATEX_COMPILERS: readonly LatexCompiler[] = [
  'pdflatex',
  'latex',
  'xelatex',
  'lualatex',
];

export function isLatexCompiler(value: unknown): value is LatexCompiler {
  return LATEX_COMPILERS.some((compiler) => compiler === value);
}

/**
 * Lifecycle of a single compilation:
 * pending -> invoked -> artifact-found | artifact-missing
 *
 * A run stays `pending` when the markup is missing and ends `invoked` when
 * the compiler could not be started.
 */
export type CompilationState =
  | 'pending'
  | 'invoked'
  | 'artifact-found'
  | 'artifact-missing';

export type CompilationFailureReason =
  | 'markup-missing'
  | 'compiler-not-found'
  | 'artifact-missing';

export interface CompileOptions {
  compiler?: LatexCompiler;
  /** nonstopmode when true, errorstopmode otherwise. */
  continueOnError?: boolean;
  verbose?: boolean;
  openArtifact?: boolean;
  cleanup?: boolean;
  /** Executable to invoke; latexmk unless configured otherwise. */
  command?: string;
  timeoutMs?: number;
}

export interface CompilationResult {
  success: boolean;
  state: CompilationState;
  artifactPath: string;
  exitCode: number | null;
  errorSummary: string[];
  reason?: CompilationFailureReason;
}
