/**
 * Dental Clinic API - Configuration Module
 *
 * Centralized configuration with type safety and validation.
 */

export default () => ({
  // Application
  app: {
    nodeEnv: process.env.NODE_ENV || 'development',
    port: parseInt(process.env.PORT || '4000', 10),
    corsOrigins: process.env.CORS_ORIGINS?.split(',') || ['http://localhost:3000'],
  },

  // Database
  database: {
    url: process.env.DATABASE_URL,
    synchronize: process.env.DATABASE_SYNCHRONIZE === 'true',
    logging: process.env.ENABLE_DB_LOGS === 'true',
  },

  // Bearer tokens
  jwt: {
    secret: process.env.JWT_SECRET_KEY,
    accessTokenLifetimeMinutes: parseInt(process.env.JWT_ACCESS_TOKEN_LIFETIME || '15', 10),
    refreshTokenLifetimeDays: parseInt(process.env.JWT_REFRESH_TOKEN_LIFETIME || '7', 10),
  },

  auth: {
    bcryptRounds: parseInt(process.env.BCRYPT_ROUNDS || '10', 10),
  },

  // AWS (treatment images)
  aws: {
    region: process.env.AWS_REGION || 'us-east-1',
    accessKeyId: process.env.AWS_ACCESS_KEY_ID,
    secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY,
    s3: {
      mediaBucket: process.env.S3_BUCKET_NAME || 'dental-clinic-media',
    },
  },
});
