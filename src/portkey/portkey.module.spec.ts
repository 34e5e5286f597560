import { Test } from '@nestjs/testing';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { PortkeyModule } from './portkey.module';
import { PortkeyClient } from './portkey.client';
import { PORTKEY_CLIENT } from './portkey.constants';
import { toPortkeyModuleOptions } from '../config/config.loader';
import { AppConfig } from '../config/config.types';

describe('PortkeyModule', () => {
  it('provides a client built from static credentials', async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [PortkeyModule.register({ apiKey: 'k1', virtualKey: 'v1' })],
    }).compile();

    const client = moduleRef.get<PortkeyClient>(PORTKEY_CLIENT);

    expect(client).toBeInstanceOf(PortkeyClient);
    expect(client.headers).toEqual({
      'x-portkey-api-key': 'k1',
      'x-portkey-virtual-key': 'v1',
    });
  });

  it('resolves credentials through an injected ConfigService', async () => {
    const config: AppConfig = {
      portkey: { api_key: 'k2', virtual_key: 'v2', timeout: 1_000, max_retries: 0 },
      cli: { default_model: 'gpt-4o-mini' },
    };

    const moduleRef = await Test.createTestingModule({
      imports: [
        PortkeyModule.registerAsync({
          imports: [ConfigModule.forRoot({ ignoreEnvFile: true, load: [() => ({ ...config })] })],
          inject: [ConfigService],
          useFactory: (configService: ConfigService<AppConfig, true>) =>
            toPortkeyModuleOptions({
              portkey: configService.get('portkey', { infer: true }),
              cli: configService.get('cli', { infer: true }),
            }),
        }),
      ],
    }).compile();

    const client = moduleRef.get<PortkeyClient>(PORTKEY_CLIENT);

    expect(client.apiKey).toBe('k2');
    expect(client.virtualKey).toBe('v2');
    expect(client.openai.timeout).toBe(1_000);
    expect(client.openai.maxRetries).toBe(0);
  });

  it('shares one client inside a module', async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [PortkeyModule.register({ apiKey: 'k1', virtualKey: 'v1' })],
    }).compile();

    expect(moduleRef.get(PORTKEY_CLIENT)).toBe(moduleRef.get(PORTKEY_CLIENT));
  });
});
