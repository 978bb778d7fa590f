import fs from 'fs';
import { Logger } from '@nestjs/common';
import { ReadmeService } from './readme.service';

describe('ReadmeService', () => {
  let now: number;
  let readFile: jest.SpyInstance;

  beforeEach(() => {
    now = 0;
    readFile = jest.spyOn(fs, 'readFileSync').mockReturnValue('# Forecasts\n\nFirst draft');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('wraps the rendered markdown in a titled page', () => {
    const service = new ReadmeService(() => now);
    const html = service.getReadmeAsHtml();

    expect(html.startsWith('<!DOCTYPE html>')).toBe(true);
    expect(html).toContain('<title>Weather Integration API</title>');
    expect(html).toContain('<h1>Forecasts</h1>');
    expect(html).toContain('<p>First draft</p>');
  });

  it('re-reads the file once a minute has passed', () => {
    const service = new ReadmeService(() => now);
    readFile.mockReturnValue('# Forecasts\n\nSecond draft');

    now = 59_999;
    expect(service.getReadmeAsMarkdown()).toBe('# Forecasts\n\nFirst draft');

    now = 60_000;
    expect(service.getReadmeAsMarkdown()).toBe('# Forecasts\n\nSecond draft');
    expect(readFile).toHaveBeenCalledTimes(2);
  });

  it('serves a placeholder page when the file cannot be read', () => {
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    readFile.mockImplementation(() => {
      throw new Error('ENOENT');
    });

    const service = new ReadmeService(() => now);

    expect(service.getReadmeAsMarkdown()).toBe(
      '# Documentation unavailable\n\nREADME.md could not be read.',
    );
    expect(service.getReadmeAsHtml()).toContain('<h1>Documentation unavailable</h1>');
  });
});
