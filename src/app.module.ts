import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import renderingConfig from './infrastructure/config/rendering.config';
import { LoggerModule } from './infrastructure/logging/logger.module';
import { RenderingModule } from './infrastructure/rendering/rendering.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      load: [renderingConfig],
    }),
    LoggerModule,
    RenderingModule,
  ],
})
export class AppModule {}
