import { LogLevel } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import { AppModule } from '../app.module';
import { AppConfig } from '../config/config.types';
import { PortkeyClient } from '../portkey/portkey.client';
import { PORTKEY_CLIENT } from '../portkey/portkey.constants';

export interface ChatOptions {
  model?: string;
  system?: string;
  verbose?: boolean;
}

export function buildChatRequest(
  message: string,
  model: string,
  system?: string,
): ChatCompletionCreateParamsNonStreaming {
  const messages: ChatCompletionMessageParam[] = [];
  if (system) messages.push({ role: 'system', content: system });
  messages.push({ role: 'user', content: message });
  return { model, messages };
}

async function withClient<T>(
  verbose: boolean | undefined,
  fn: (client: PortkeyClient, config: ConfigService<AppConfig, true>) => Promise<T>,
): Promise<T> {
  const logger: LogLevel[] = verbose ? ['log', 'error', 'warn', 'debug'] : ['error', 'warn'];
  const app = await NestFactory.createApplicationContext(AppModule, { logger, abortOnError: false });
  try {
    return await fn(
      app.get<PortkeyClient>(PORTKEY_CLIENT),
      app.get<ConfigService<AppConfig, true>>(ConfigService),
    );
  } finally {
    await app.close();
  }
}

export async function runChat(message: string, opts: ChatOptions): Promise<void> {
  await withClient(opts.verbose, async (client, config) => {
    const model = opts.model || config.get('cli', { infer: true }).default_model;
    const completion = await client.chat.completions.create(buildChatRequest(message, model, opts.system));
    console.log(completion.choices[0]?.message.content ?? '');
  });
}

export async function runListModels(opts: { verbose?: boolean }): Promise<void> {
  await withClient(opts.verbose, async (client) => {
    for await (const model of client.openai.models.list()) {
      console.log(model.id);
    }
  });
}
