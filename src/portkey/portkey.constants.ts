export const PORTKEY_BASE_URL = 'https://api.portkey.ai/v1';

export const PORTKEY_API_KEY_HEADER = 'x-portkey-api-key';
export const PORTKEY_VIRTUAL_KEY_HEADER = 'x-portkey-virtual-key';

export const PORTKEY_CLIENT = Symbol('PORTKEY_CLIENT');
export const PORTKEY_MODULE_OPTIONS = Symbol('PORTKEY_MODULE_OPTIONS');
