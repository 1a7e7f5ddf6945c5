import dotenv from 'dotenv';

dotenv.config();

const Config = {
  ALERT_WEBHOOK_URL: process.env.ALERT_WEBHOOK_URL,
  ENABLE_ALERT_LOGGING: process.env.ENABLE_ALERT_LOGGING === 'true',
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
  LOG_DIR: process.env.LOG_DIR,
  SILENT: process.env.NODE_ENV === 'test',
};

export default Config;
