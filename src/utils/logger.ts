import winston from 'winston';

const { combine, timestamp, printf, colorize, json } = winston.format;

const devFormat = combine(
  colorize(),
  timestamp({ format: 'HH:mm:ss' }),
  printf(({ level, message, timestamp, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
    return `${timestamp} ${level}: ${message} ${metaStr}`;
  })
);

const prodFormat = combine(
  timestamp(),
  json()
);

export const logger = winston.createLogger({
  level: process.env.ZETA_LOG_LEVEL ?? 'warn',
  format: process.env.NODE_ENV === 'production' ? prodFormat : devFormat,
  silent: process.env.NODE_ENV === 'test',
  transports: [
    // stderr, so CLI output on stdout stays machine-readable
    new winston.transports.Console({ stderrLevels: ['error', 'warn', 'info', 'debug'] }),
  ],
});

