import { Inject, Injectable, Logger } from '@nestjs/common';
import { readFileSync } from 'fs';
import { join } from 'path';
import { marked } from 'marked';
import { CLOCK, Clock } from './clock';

const RELOAD_INTERVAL_MS = 60_000;
const PAGE_TITLE = 'Weather Integration API';

@Injectable()
export class ReadmeService {
  private readonly logger = new Logger(ReadmeService.name);
  private readonly readmePath = join(process.cwd(), 'README.md');
  private readmeContent = '';
  private readmeHtml = '';
  private lastReadTime = 0;

  constructor(@Inject(CLOCK) private readonly clock: Clock) {
    this.loadReadme();
  }

  /**
   * README rendered as a standalone HTML page. Re-read at most once a minute.
   */
  getReadmeAsHtml(): string {
    this.reloadIfStale();
    return this.readmeHtml;
  }

  getReadmeAsMarkdown(): string {
    this.reloadIfStale();
    return this.readmeContent;
  }

  private reloadIfStale(): void {
    if (this.clock() - this.lastReadTime >= RELOAD_INTERVAL_MS) {
      this.loadReadme();
    }
  }

  private loadReadme(): void {
    this.lastReadTime = this.clock();
    try {
      this.readmeContent = readFileSync(this.readmePath, 'utf8');
    } catch (error) {
      this.logger.warn(
        `Could not load ${this.readmePath}: ${error instanceof Error ? error.message : String(error)}`,
      );
      this.readmeContent = '# Documentation unavailable\n\nREADME.md could not be read.';
    }
    this.readmeHtml = renderPage(marked.parser(marked.lexer(this.readmeContent)));
  }
}

function renderPage(body: string): string {
  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="UTF-8">',
    `<title>${PAGE_TITLE}</title>`,
    '<style>body{font-family:sans-serif;max-width:860px;margin:0 auto;padding:1.5rem}pre{overflow:auto}</style>',
    '</head>',
    `<body>${body}</body>`,
    '</html>',
  ].join('\n');
}
