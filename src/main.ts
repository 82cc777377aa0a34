#!/usr/bin/env node
import 'reflect-metadata';
import { INestApplicationContext } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { ResumeLoader } from './application/services/resume-loader.service';
import {
  RenderResult,
  RenderResumeUseCase,
} from './application/use-cases/render-resume.use-case';
import { WinstonLoggerAdapter } from './infrastructure/logging/shared/winston-logger.adapter';

export async function createRenderingApp(): Promise<INestApplicationContext> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });
  app.useLogger(app.get(WinstonLoggerAdapter));
  return app;
}

/** Loads a résumé JSON file and renders it with the configured defaults. */
export async function renderResumeFile(
  resumePath: string,
  outputName?: string,
): Promise<RenderResult> {
  const app = await createRenderingApp();
  try {
    const resume = await app.get(ResumeLoader).load(resumePath);
    return await app.get(RenderResumeUseCase).execute({ resume, outputName });
  } finally {
    await app.close();
  }
}

async function bootstrap(): Promise<void> {
  const [resumePath, outputName] = process.argv.slice(2);
  if (!resumePath) {
    process.stderr.write('Usage: resume-typesetter <resume.json> [output-name]\n');
    process.exitCode = 2;
    return;
  }

  const result = await renderResumeFile(resumePath, outputName);
  process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
  if (!result.success) process.exitCode = 1;
}

if (require.main === module) {
  bootstrap().catch((error: unknown) => {
    const detail = error instanceof Error ? (error.stack ?? error.message) : String(error);
    process.stderr.write(`${detail}\n`);
    process.exitCode = 1;
  });
}
