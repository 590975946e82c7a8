import * as Joi from 'joi';

export const configValidationSchema = Joi.object({
  // Application
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test')
    .default('development'),
  PORT: Joi.number().default(3001),

  // Frontend
  FRONTEND_URL: Joi.string().default('http://localhost:3000'),

  // Database
  DATABASE_PATH: Joi.string().default('data/marketplace.db'),

  // JWT
  JWT_SECRET_KEY: Joi.string().min(16).required(),
  JWT_ALGORITHM: Joi.string().valid('HS256', 'HS384', 'HS512').default('HS256'),
  JWT_EXPIRATION_MINUTES: Joi.number().integer().min(1).default(30),
  JWT_REFRESH_EXPIRATION_DAYS: Joi.number().integer().min(1).default(1),

  // Password hashing (Argon2id)
  PASSWORD_HASH_MEMORY_COST: Joi.number().integer().min(1024).default(65536),
  PASSWORD_HASH_TIME_COST: Joi.number().integer().min(1).default(3),

  // Marketplace rules
  MIN_FACTORY_YEAR: Joi.number().integer().default(1950),
  MAX_FUTURE_YEAR: Joi.number().integer().min(0).default(1),
  MAX_PRICE: Joi.number().integer().min(1).default(10000000),
  MAX_MILEAGE: Joi.number().integer().min(1).default(1000000),
  MAX_BRAND_DESCRIPTION: Joi.number().integer().min(1).default(500),

  // Initial administrator (both must be set for the seed to run)
  ADMIN_EMAIL: Joi.string().email().allow('').optional(),
  ADMIN_PASSWORD: Joi.string().allow('').optional(),
  ADMIN_USERNAME: Joi.string().default('administrator'),

  // Logging
  LOG_LEVEL: Joi.string()
    .valid('error', 'warn', 'info', 'debug', 'verbose')
    .default('info'),
});
