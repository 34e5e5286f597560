import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfigModule } from './config/config.module';
import { toPortkeyModuleOptions } from './config/config.loader';
import { AppConfig } from './config/config.types';
import { PortkeyModule } from './portkey/portkey.module';

@Module({
  imports: [
    AppConfigModule,
    PortkeyModule.registerAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService<AppConfig, true>) =>
        toPortkeyModuleOptions({
          portkey: config.get('portkey', { infer: true }),
          cli: config.get('cli', { infer: true }),
        }),
    }),
  ],
})
export class AppModule {}
