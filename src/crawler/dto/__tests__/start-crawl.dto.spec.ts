import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { StartBatchCrawlDto } from '../start-batch-crawl.dto';
import { StartCrawlDto } from '../start-crawl.dto';

const failedConstraints = async (dto: object): Promise<string[]> =>
  (await validate(dto)).flatMap((error) =>
    Object.keys(error.constraints ?? {}),
  );

describe('crawl request DTOs', () => {
  it.each([
    'https://example.com',
    'http://localhost:3000',
    'http://intranet',
    'https://my_site.example.com',
  ])('should accept the homepage %p', async (rootUrl) => {
    const dto = plainToInstance(StartCrawlDto, { rootUrl, maxPages: 5 });

    await expect(failedConstraints(dto)).resolves.toEqual([]);
  });

  it.each(['ftp://example.com', 'example.com', 'not a url'])(
    'should reject the homepage %p',
    async (rootUrl) => {
      const dto = plainToInstance(StartCrawlDto, { rootUrl });

      await expect(failedConstraints(dto)).resolves.toEqual(['isUrl']);
    },
  );

  it('should accept single-label hosts in a batch', async () => {
    const dto = plainToInstance(StartBatchCrawlDto, {
      urls: ['http://localhost:8080', 'https://example.com'],
    });

    await expect(failedConstraints(dto)).resolves.toEqual([]);
  });
});
