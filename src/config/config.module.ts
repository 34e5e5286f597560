import { Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import { loadConfig } from './config.loader';

@Module({
  imports: [
    NestConfigModule.forRoot({
      load: [() => ({ ...loadConfig() })],
      ignoreEnvVars: true,
      isGlobal: true,
    }),
  ],
})
export class AppConfigModule {}
