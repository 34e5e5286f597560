import type { ClientOptions } from 'openai';
import {
  PORTKEY_API_KEY_HEADER,
  PORTKEY_VIRTUAL_KEY_HEADER,
} from './portkey.constants';

export interface PortkeyCredentials {
  apiKey: string;
  virtualKey: string;
}

export interface PortkeyHeaders {
  [PORTKEY_API_KEY_HEADER]: string;
  [PORTKEY_VIRTUAL_KEY_HEADER]: string;
}

/** Transport settings handed to the OpenAI SDK as-is. */
export type PortkeyClientOptions = Pick<ClientOptions, 'timeout' | 'maxRetries'>;

export interface PortkeyModuleOptions {
  credentials: PortkeyCredentials;
  options?: PortkeyClientOptions;
}
