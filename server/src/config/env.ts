import dotenv from 'dotenv';

dotenv.config();

export const env = {
  nodeEnv: process.env.NODE_ENV ?? 'development',
  host: process.env.HOST || '0.0.0.0',
  port: parseInt(process.env.PORT || '3333', 10),
  corsOrigin: process.env.CORS_ORIGIN || '*',
};
