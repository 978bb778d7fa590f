import { ConfigService } from '@nestjs/config';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { lastValueFrom, of, throwError } from 'rxjs';
import { CacheControlInterceptor } from './cache-control.interceptor';

describe('CacheControlInterceptor', () => {
  function contextWith(setHeader: jest.Mock): ExecutionContextHost {
    return new ExecutionContextHost([{}, { headersSent: false, setHeader }]);
  }

  it('marks successful responses cacheable for the configured time', async () => {
    const interceptor = new CacheControlInterceptor(
      new ConfigService({ CACHE_CONTROL_MAX_AGE_SECONDS: '60' }),
    );
    const setHeader = jest.fn();

    const result = await lastValueFrom(
      interceptor.intercept(contextWith(setHeader), { handle: () => of('body') }),
    );

    expect(result).toBe('body');
    expect(setHeader).toHaveBeenCalledWith('Cache-Control', 'public, max-age=60');
  });

  it('defaults to five minutes', async () => {
    const interceptor = new CacheControlInterceptor(new ConfigService({}));
    const setHeader = jest.fn();

    await lastValueFrom(
      interceptor.intercept(contextWith(setHeader), { handle: () => of(null) }),
    );

    expect(setHeader).toHaveBeenCalledWith('Cache-Control', 'public, max-age=300');
  });

  it('leaves failed responses alone', async () => {
    const interceptor = new CacheControlInterceptor(new ConfigService({}));
    const setHeader = jest.fn();

    await expect(
      lastValueFrom(
        interceptor.intercept(contextWith(setHeader), {
          handle: () => throwError(() => new Error('boom')),
        }),
      ),
    ).rejects.toThrow('boom');
    expect(setHeader).not.toHaveBeenCalled();
  });
});
