import winston from 'winston';

const logLevel = process.env.LOG_LEVEL || 'info';
const nodeEnv = process.env.NODE_ENV || 'development';

export const logger = winston.createLogger({
  level: logLevel,
  silent: nodeEnv === 'test',
  defaultMeta: { service: 'proxy-auction' },
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    nodeEnv === 'production'
      ? winston.format.json()
      : winston.format.printf(({ level, message, timestamp, service: _service, ...meta }) => {
          return `${timestamp} [${level}]: ${message} ${Object.keys(meta).length ? JSON.stringify(meta) : ''}`;
        })
  ),
  transports: [new winston.transports.Console()],
});
