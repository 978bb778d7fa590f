import { Controller, Get, Header, Res } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Response } from 'express';
import { ReadmeService } from '../utils/readme.service';
import { StatusService } from '../status/status.service';
import { loadLayeredRateLimitConfig } from '../rate-limit/rate-limit.config';
import { MINUTE_MS } from '../utils/config.helpers';

export interface ApiInfo {
  name: string;
  version: string;
  rateLimits: {
    global: string;
    perClient: string;
    burst: string;
  };
  endpoints: string[];
}

@Controller()
export class IndexController {
  constructor(
    private readonly readmeService: ReadmeService,
    private readonly statusService: StatusService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Main index endpoint that renders the README as HTML
   */
  @Get()
  @Header('Content-Type', 'text/html')
  getIndex(@Res() res: Response): void {
    const html = this.readmeService.getReadmeAsHtml();
    res.send(html);
  }

  @Get('readme')
  @Header('Content-Type', 'text/markdown')
  getReadme(): string {
    return this.readmeService.getReadmeAsMarkdown();
  }

  @Get('api/info')
  getInfo(): ApiInfo {
    const limits = loadLayeredRateLimitConfig(this.configService);
    return {
      name: 'Weather Integration API',
      version: this.statusService.getStatus().version,
      rateLimits: {
        global: `${limits.global.maxRequests} requests per day`,
        perClient: `${limits.client.maxRequests} requests per hour per IP`,
        burst: `${limits.burst.maxRequests} requests per ${limits.burst.windowMs / MINUTE_MS} minutes per IP`,
      },
      endpoints: [
        'GET /api/v1/weather/summary?locations=lat,lon,...&temperature=20&unit=celsius',
        'GET /api/v1/weather/locations/:locationId',
        'GET /api/info',
        'GET /status',
        'GET /status/cache',
        'GET /status/rate-limit',
      ],
    };
  }
}
