import { DynamicModule, FactoryProvider, Module, ModuleMetadata } from '@nestjs/common';
import { PORTKEY_CLIENT, PORTKEY_MODULE_OPTIONS } from './portkey.constants';
import { createPortkeyClient } from './portkey.client';
import { PortkeyClientOptions, PortkeyCredentials, PortkeyModuleOptions } from './portkey.types';

export interface PortkeyModuleAsyncOptions
  extends Pick<ModuleMetadata, 'imports'>,
    Pick<FactoryProvider<PortkeyModuleOptions>, 'inject' | 'useFactory'> {
  isGlobal?: boolean;
}

@Module({})
export class PortkeyModule {
  static register(
    credentials: PortkeyCredentials,
    options?: PortkeyClientOptions,
  ): DynamicModule {
    return PortkeyModule.registerAsync({
      useFactory: () => ({ credentials, options }),
    });
  }

  static registerAsync(asyncOptions: PortkeyModuleAsyncOptions): DynamicModule {
    return {
      module: PortkeyModule,
      global: asyncOptions.isGlobal ?? false,
      imports: asyncOptions.imports ?? [],
      providers: [
        {
          provide: PORTKEY_MODULE_OPTIONS,
          inject: asyncOptions.inject ?? [],
          useFactory: asyncOptions.useFactory,
        },
        {
          provide: PORTKEY_CLIENT,
          inject: [PORTKEY_MODULE_OPTIONS],
          useFactory: (moduleOptions: PortkeyModuleOptions) =>
            createPortkeyClient(moduleOptions.credentials, moduleOptions.options),
        },
      ],
      exports: [PORTKEY_CLIENT],
    };
  }
}
