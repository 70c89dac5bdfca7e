import { Params } from 'nestjs-pino';
import { IncomingMessage, ServerResponse } from 'http';
import { multistream } from 'pino';
import pinoPretty from 'pino-pretty';
import { createWriteStream } from 'fs';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';

const serviceName = process.env.SERVICE_NAME || 'doc-chat';
const logDir = process.env.LOG_DIR;

function headerValue(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name];
  return typeof value === 'string' ? value : undefined;
}

export const pinoConfig: Params = {
  pinoHttp: {
    level: process.env.LOG_LEVEL || 'info',

    base: {
      service: serviceName,
      environment: process.env.NODE_ENV || 'development',
      version: process.env.APP_VERSION || '1.0.0',
    },

    redact: {
      paths: [
        'req.headers.authorization',
        'req.headers.cookie',
        'req.headers["x-api-key"]',
        'apiKey',
      ],
      remove: true,
    },

    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

    serializers: {
      req: (req: IncomingMessage) => ({
        id: req.id,
        method: req.method,
        url: req.url,
        headers: process.env.NODE_ENV === 'production' ? undefined : req.headers,
      }),
      res: (res: ServerResponse) => ({
        statusCode: res.statusCode,
      }),
    },

    autoLogging: {
      ignore: (req: IncomingMessage) => req.url === '/health',
    },

    genReqId: (req: IncomingMessage) =>
      headerValue(req, 'x-request-id') ?? `req-${uuidv4()}`,

    customProps: (req: IncomingMessage) => ({
      requestId: headerValue(req, 'x-request-id') ?? req.id,
    }),

    // Console (pretty) always; JSON file only when LOG_DIR is set
    stream: multistream([
      {
        level: 'info',
        stream:
          process.env.NODE_ENV !== 'production'
            ? pinoPretty({
                colorize: true,
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname',
                singleLine: false,
              })
            : process.stdout,
      },
      ...(logDir
        ? [
            {
              level: 'debug' as const,
              stream: createWriteStream(join(logDir, `${serviceName}.log`), {
                flags: 'a',
              }),
            },
          ]
        : []),
    ]),
  },
};
