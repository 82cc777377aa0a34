import { Module } from '@nestjs/common';
import { ChildProcessRunner } from './child-process.runner';

@Module({
  providers: [
    ChildProcessRunner,
    {
      provide: 'IProcessRunner',
      useExisting: ChildProcessRunner,
    },
  ],
  exports: ['IProcessRunner'],
})
export class ProcessModule {}
