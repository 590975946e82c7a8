export default () => ({
  app: {
    nodeEnv: process.env.NODE_ENV || 'development',
    port: parseInt(process.env.PORT || '3001', 10),
    frontendUrl: process.env.FRONTEND_URL || 'http://localhost:3000',
  },
  database: {
    path: process.env.DATABASE_PATH || 'data/marketplace.db',
  },
  jwt: {
    secretKey: process.env.JWT_SECRET_KEY,
    algorithm: process.env.JWT_ALGORITHM || 'HS256',
    expirationMinutes: parseInt(process.env.JWT_EXPIRATION_MINUTES || '30', 10),
    refreshExpirationDays: parseInt(
      process.env.JWT_REFRESH_EXPIRATION_DAYS || '1',
      10,
    ),
  },
  passwordHash: {
    memoryCost: parseInt(process.env.PASSWORD_HASH_MEMORY_COST || '65536', 10),
    timeCost: parseInt(process.env.PASSWORD_HASH_TIME_COST || '3', 10),
  },
  marketplace: {
    minFactoryYear: parseInt(process.env.MIN_FACTORY_YEAR || '1950', 10),
    maxFutureYear: parseInt(process.env.MAX_FUTURE_YEAR || '1', 10),
    maxPrice: parseInt(process.env.MAX_PRICE || '10000000', 10),
    maxMileage: parseInt(process.env.MAX_MILEAGE || '1000000', 10),
    maxBrandDescription: parseInt(
      process.env.MAX_BRAND_DESCRIPTION || '500',
      10,
    ),
  },
  seed: {
    adminEmail: process.env.ADMIN_EMAIL || undefined,
    adminPassword: process.env.ADMIN_PASSWORD || undefined,
    adminUsername: process.env.ADMIN_USERNAME || 'administrator',
  },
  logging: {
    level: process.env.LOG_LEVEL || 'info',
  },
});
