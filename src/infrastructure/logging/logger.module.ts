import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { RenderContextService } from './shared/render-context.service';
import { WinstonLoggerAdapter } from './shared/winston-logger.adapter';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    RenderContextService,
    WinstonLoggerAdapter,
    {
      provide: 'ILoggerPort',
      useExisting: WinstonLoggerAdapter,
    },
  ],
  exports: ['ILoggerPort', WinstonLoggerAdapter, RenderContextService],
})
export class LoggerModule {}
