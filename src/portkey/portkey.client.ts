import { Logger } from '@nestjs/common';
import OpenAI from 'openai';
import {
  PORTKEY_API_KEY_HEADER,
  PORTKEY_BASE_URL,
  PORTKEY_VIRTUAL_KEY_HEADER,
} from './portkey.constants';
import { PortkeyClientOptions, PortkeyCredentials, PortkeyHeaders } from './portkey.types';
import { redactSecret } from '../utils/redact';

/**
 * OpenAI client bound to the Portkey gateway.
 *
 * Every request made through {@link PortkeyClient.openai} goes to
 * {@link PORTKEY_BASE_URL} and carries the `x-portkey-api-key` and
 * `x-portkey-virtual-key` headers. Requests and responses are left to the
 * OpenAI SDK untouched.
 *
 * @example
 * const client = new PortkeyClient('pk-api-key', 'openai-virtual-key');
 * const completion = await client.chat.completions.create({
 *   model: 'gpt-4o-mini',
 *   messages: [{ role: 'user', content: 'Hello' }],
 * });
 */
export class PortkeyClient {
  readonly openai: OpenAI;
  readonly baseUrl: string = PORTKEY_BASE_URL;
  readonly apiKey: string;
  readonly virtualKey: string;
  readonly headers: Readonly<PortkeyHeaders>;
  private readonly logger = new Logger(`Portkey:${PortkeyClient.name}`);

  constructor(apiKey: string, virtualKey: string, options: PortkeyClientOptions = {}) {
    this.apiKey = apiKey;
    this.virtualKey = virtualKey;
    this.headers = Object.freeze({
      [PORTKEY_API_KEY_HEADER]: apiKey,
      [PORTKEY_VIRTUAL_KEY_HEADER]: virtualKey,
    });

    this.openai = new OpenAI({
      ...options,
      apiKey,
      baseURL: this.baseUrl,
      defaultHeaders: { ...this.headers },
    });

    this.logger.debug(`Client ready | baseURL=${this.baseUrl} | virtualKey=${redactSecret(virtualKey)}`);
  }

  /** Same object as `openai.chat`. */
  get chat(): OpenAI['chat'] {
    return this.openai.chat;
  }
}

export function createPortkeyClient(
  credentials: PortkeyCredentials,
  options?: PortkeyClientOptions,
): PortkeyClient {
  return new PortkeyClient(credentials.apiKey, credentials.virtualKey, options);
}
