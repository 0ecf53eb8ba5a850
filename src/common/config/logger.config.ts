import { Params } from 'nestjs-pino';

const environment = process.env.NODE_ENV || 'development';

function logLevel(): string {
  if (environment === 'production') return 'info';
  if (environment === 'test') return 'silent';
  return 'debug';
}

export const loggerConfig: Params = {
  pinoHttp: {
    level: logLevel(),

    // Pretty-print for development
    transport:
      environment !== 'production' && environment !== 'test'
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

    // Request lines carry method/url/status only; bodies and headers stay out
    serializers: {
      req: (req: { method?: string; url?: string }) => ({
        method: req.method,
        url: req.url,
      }),
      res: (res: { statusCode?: number }) => ({ statusCode: res.statusCode }),
    },
  },
};
