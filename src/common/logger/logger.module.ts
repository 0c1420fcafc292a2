import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { WinstonModule } from 'nest-winston';
import * as winston from 'winston';
import { sanitizeFormat } from './log-sanitizer';
import { getRequestContext } from './request-context';

// Adds the request's trace ID to every log line written while handling it
const traceFormat = winston.format((info) => {
  const context = getRequestContext();
  if (context) {
    info.traceId = context.traceId;
  }
  return info;
});

@Global()
@Module({
  imports: [
    WinstonModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const nodeEnv = configService.get<string>('NODE_ENV');
        const isProduction = nodeEnv === 'production';

        return {
          level: isProduction ? 'info' : 'debug',
          silent: nodeEnv === 'test',
          format: winston.format.combine(
            winston.format.timestamp(),
            traceFormat(),
            sanitizeFormat(),
            isProduction
              ? winston.format.json()
              : winston.format.combine(
                  winston.format.colorize(),
                  winston.format.printf(({ level, message, timestamp, traceId, context, ...meta }) => {
                    const trace = traceId ? `[${String(traceId).substring(0, 8)}]` : '';
                    const ctx = context ? `[${String(context)}]` : '';
                    const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
                    return `${String(timestamp)} ${level} ${trace}${ctx} ${String(message)} ${metaStr}`;
                  }),
                ),
          ),
          transports: [new winston.transports.Console()],
        };
      },
    }),
  ],
  exports: [WinstonModule],
})
export class LoggerModule {}
