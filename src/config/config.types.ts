export interface PortkeyConfig {
  api_key: string;
  virtual_key: string;
  timeout: number;
  max_retries: number;
}

export interface CliConfig {
  default_model: string;
}

export interface AppConfig {
  portkey: PortkeyConfig;
  cli: CliConfig;
}
