export * from './domain/types/resume.types';
export * from './domain/types/compilation.types';
export * from './domain/errors/rendering.errors';
export { escapeLatex, classifyContact, ensureProtocol } from './domain/services/latex-text';
export * from './domain/formatters';
export { TemplatePopulator } from './domain/services/template-populator.service';
export * from './application/ports';
export {
  LatexCompilerService,
  summarizeCompilerOutput,
} from './application/services/latex-compiler.service';
export { ResumeLoader } from './application/services/resume-loader.service';
export {
  generateOutputName,
  resolveOutputName,
  sanitizeOutputName,
} from './application/services/output-naming';
export * from './application/use-cases/render-resume.use-case';
export { default as renderingConfig } from './infrastructure/config/rendering.config';
export type { RenderingConfig } from './infrastructure/config/rendering.config';
export { LoggerModule } from './infrastructure/logging/logger.module';
export { ProcessModule } from './infrastructure/process/process.module';
export { RenderingModule } from './infrastructure/rendering/rendering.module';
export { AppModule } from './app.module';
export { createRenderingApp, renderResumeFile } from './main';
