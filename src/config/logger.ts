import pino from 'pino';
import type { LoggerOptions } from 'pino';

// Logs go to stderr: stdout belongs to the operator console
const STDERR = 2;

const options: LoggerOptions = {
  level: process.env.LOG_LEVEL || 'info',
  // Token material never reaches the output
  redact: {
    paths: ['accessToken', 'refreshToken', 'access_token', 'refresh_token', 'code', 'codeVerifier'],
    remove: true,
  },
};

// LOG_FORMAT=json skips pretty printing, for log shippers
export const logger =
  process.env.LOG_FORMAT === 'json'
    ? pino(options, pino.destination(STDERR))
    : pino({
        ...options,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            destination: STDERR,
          },
        },
      });

export default logger;
