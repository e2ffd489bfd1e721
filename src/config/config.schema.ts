// Third´s Modules
import * as joi from 'joi';
import 'dotenv/config';

/**
 * Variables de entorno
 */
export type EnvVars = {
  API_KEY: string;
  CORS_ORIGIN: string;
  DB_HOST: string;
  DEFAULT_TIMEZONE: string;
  JWT_SECRET: string;
  PORT: number;
};

/**
 * Validate env variables
 */
export const configValidationSchema: joi.ObjectSchema<EnvVars> = joi
  .object<EnvVars>({
    API_KEY: joi.string().required(),
    CORS_ORIGIN: joi.string().default('http://localhost:4200'),
    DB_HOST: joi.string().required(),
    DEFAULT_TIMEZONE: joi.string().default('UTC'),
    JWT_SECRET: joi.string().min(16).required(),
    PORT: joi.number().port().default(9053),
  })
  .unknown(true);
