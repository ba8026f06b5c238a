// Third´s Modules
import * as joi from 'joi';

/**
 * Validación de variables de entorno.
 * ConfigModule aplica este schema al arrancar y expone los valores ya
 * convertidos (números y booleanos) a través de ConfigService.
 */
export const configValidationSchema: joi.ObjectSchema = joi
  .object({
    NODE_ENV: joi
      .string()
      .valid('development', 'production', 'test')
      .default('development'),
    PORT: joi.number().port().default(9053),
    DB_HOST: joi.string().required(),

    JWT_SECRET: joi.string().min(16).required(),
    JWT_ISSUER: joi.string().default('bookvault-api'),
    JWT_AUDIENCE: joi.string().default('bookvault'),
    JWT_ACCESS_TTL_SECONDS: joi.number().integer().positive().default(3600),
    JWT_REFRESH_TTL_SECONDS: joi.number().integer().positive().default(2_592_000),

    CORS_ORIGIN: joi.string().default('http://localhost:3000'),

    BOOKS_PER_PAGE: joi.number().integer().min(1).max(100).default(20),
    MAX_DOWNLOADS_PER_PURCHASE: joi.number().integer().min(1).default(5),
    DOWNLOAD_LINK_TTL_SECONDS: joi.number().integer().positive().default(3600),
    SEED_CATALOG: joi.boolean().default(true),
  })
  .unknown(true);
