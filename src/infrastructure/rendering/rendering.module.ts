import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { RenderResumeUseCase } from '../../application/use-cases/render-resume.use-case';
import { LatexCompilerService } from '../../application/services/latex-compiler.service';
import { ResumeLoader } from '../../application/services/resume-loader.service';
import { TemplatePopulator } from '../../domain/services/template-populator.service';
import { ProcessModule } from '../process/process.module';

@Module({
  imports: [ConfigModule, ProcessModule],
  providers: [
    TemplatePopulator,
    LatexCompilerService,
    ResumeLoader,
    RenderResumeUseCase,
  ],
  exports: [
    TemplatePopulator,
    LatexCompilerService,
    ResumeLoader,
    RenderResumeUseCase,
  ],
})
export class RenderingModule {}
