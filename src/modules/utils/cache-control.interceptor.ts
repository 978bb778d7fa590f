import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Response } from 'express';
import { Observable, tap } from 'rxjs';
import { getNumber } from './config.helpers';

@Injectable()
export class CacheControlInterceptor implements NestInterceptor {
  private readonly maxAgeSeconds: number;

  constructor(configService: ConfigService) {
    this.maxAgeSeconds = getNumber(
      configService,
      'CACHE_CONTROL_MAX_AGE_SECONDS',
      300,
    );
  }

  intercept<T>(context: ExecutionContext, next: CallHandler<T>): Observable<T> {
    const response = context.switchToHttp().getResponse<Response>();

    // only successful responses are cacheable; the exception filter sets no-store
    return next.handle().pipe(
      tap(() => {
        if (!response.headersSent) {
          response.setHeader(
            'Cache-Control',
            `public, max-age=${this.maxAgeSeconds}`,
          );
        }
      }),
    );
  }
}
