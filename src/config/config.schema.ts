import * as Joi from 'joi';
import { AppConfig } from './config.types';

export const configValidationSchema = Joi.object<AppConfig>({
  portkey: Joi.object({
    api_key: Joi.string().allow('').required(),
    virtual_key: Joi.string().allow('').required(),
    timeout: Joi.number().integer().min(1).default(120_000),
    max_retries: Joi.number().integer().min(0).default(3),
  }).required(),

  cli: Joi.object({
    default_model: Joi.string().default('gpt-4o-mini'),
  }).default(),
});
