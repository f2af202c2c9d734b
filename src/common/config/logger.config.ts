import { Params } from 'nestjs-pino';
import { getCorrelationId } from '../services/correlation-context';

const env = process.env.NODE_ENV;

export const loggerConfig: Params = {
  pinoHttp: {
    level:
      env === 'test' ? 'silent' : env === 'production' ? 'info' : 'debug',

    // Auto-inject correlation ID; journal operations run inside
    // withCorrelationId so every line of a request shares one ID.
    customProps: (): Record<string, unknown> => ({
      correlationId: getCorrelationId(),
    }),

    // Pretty-print for local development only
    transport:
      env !== 'production' && env !== 'test'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              singleLine: false,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,

    base: null,

    serializers: {
      req: (req: { method?: string; url?: string }) => ({
        method: req.method,
        url: req.url,
      }),
      res: (res: { statusCode?: number }) => ({ statusCode: res.statusCode }),
    },
  },
};
