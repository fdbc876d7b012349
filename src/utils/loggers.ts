import winston from 'winston';

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'authorization'];

export function redactSensitive(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(redactSensitive);
  }

  if (value && typeof value === 'object' && !(value instanceof Date)) {
    const redacted: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      const lowerKey = key.toLowerCase();
      redacted[key] = SENSITIVE_KEYS.some((sensitive) =>
        lowerKey.includes(sensitive),
      )
        ? '[REDACTED]'
        : redactSensitive(entry);
    }
    return redacted;
  }

  return value;
}

export const createLogger = (service: string) => {
  const transports: winston.transport[] = [new winston.transports.Console()];
  if (process.env.LOG_FILE) {
    transports.push(
      new winston.transports.File({ filename: process.env.LOG_FILE }),
    );
  }

  return winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    silent: process.env.NODE_ENV === 'test' && !process.env.LOG_LEVEL,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.json(),
    ),
    defaultMeta: { service },
    transports,
  });
};

export type Logger = ReturnType<typeof createLogger>;
