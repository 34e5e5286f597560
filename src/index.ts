export {
  PORTKEY_API_KEY_HEADER,
  PORTKEY_BASE_URL,
  PORTKEY_CLIENT,
  PORTKEY_VIRTUAL_KEY_HEADER,
} from './portkey/portkey.constants';
export { PortkeyClient, createPortkeyClient } from './portkey/portkey.client';
export { PortkeyModule, PortkeyModuleAsyncOptions } from './portkey/portkey.module';
export {
  PortkeyClientOptions,
  PortkeyCredentials,
  PortkeyHeaders,
  PortkeyModuleOptions,
} from './portkey/portkey.types';
