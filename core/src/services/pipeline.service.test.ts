import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { PipelineService } from './pipeline.service';
import { outputFilename } from './document.service';

function upperTranslator() {
  return { translate: vi.fn(async (text: string) => text.toUpperCase()) };
}

describe('PipelineService.translateDocument', () => {
  it('translates across chunks and restores every image in place', async () => {
    const translator = upperTranslator();
    const pipeline = new PipelineService({ translator });
    const markdown = 'one ![a](a.png)\n# two ![b](b.png)\nthree ![c](c.png)';

    const outcome = await pipeline.translateDocument(markdown, { chunkSize: 16, concurrency: 2 });

    expect(outcome).toEqual({
      status: 'completed',
      text: 'ONE ![a](a.png)\n\n# TWO ![b](b.png)\nTHREE ![c](c.png)',
      chunkCount: 2,
      imageCount: 3,
    });
    expect(translator.translate.mock.calls.map(([text]) => text)).toEqual([
      'one <<IMG_0>>',
      '# two <<IMG_1>>\nthree <<IMG_2>>',
    ]);
  });

  it('passes cancellation through without assembling text', async () => {
    const controller = new AbortController();
    controller.abort();
    const pipeline = new PipelineService({ translator: upperTranslator() });

    const outcome = await pipeline.translateDocument('a\nb', { signal: controller.signal });

    expect(outcome).toEqual({ status: 'cancelled', completed: 0, total: 1 });
  });
});

describe('PipelineService.translateFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pipeline-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes the translated document with its translated title', async () => {
    const input = path.join(dir, 'my_book.md');
    await fs.writeFile(input, '# My Book\r\n\r\nHello world', 'utf-8');
    const pipeline = new PipelineService({ translator: upperTranslator() });

    const result = await pipeline.translateFile({ input, output: path.join(dir, 'out'), format: 'md' });

    const expectedPath = path.join(dir, 'out', outputFilename('my_book.md', 'md'));
    expect(result).toEqual({
      status: 'completed',
      outputPath: expectedPath,
      title: 'MY BOOK',
      chunkCount: 1,
      imageCount: 0,
      pages: 1,
    });
    await expect(fs.readFile(expectedPath, 'utf-8')).resolves.toBe('% MY BOOK\n\n# MY BOOK\n\nHELLO WORLD\n');
  });

  it('writes nothing when cancelled', async () => {
    const input = path.join(dir, 'book.md');
    await fs.writeFile(input, 'Hello', 'utf-8');
    const controller = new AbortController();
    controller.abort();
    const pipeline = new PipelineService({ translator: upperTranslator() });

    const result = await pipeline.translateFile({ input, output: path.join(dir, 'out'), signal: controller.signal });

    expect(result).toEqual({ status: 'cancelled', completed: 0, total: 1 });
    await expect(fs.access(path.join(dir, 'out'))).rejects.toThrow();
  });

  it('fails on a document without text', async () => {
    const input = path.join(dir, 'empty.md');
    await fs.writeFile(input, '  \n', 'utf-8');
    const pipeline = new PipelineService({ translator: upperTranslator() });

    await expect(pipeline.translateFile({ input, output: dir })).rejects.toThrow('No text could be extracted');
  });
});
