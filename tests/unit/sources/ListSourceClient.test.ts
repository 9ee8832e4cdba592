/**
 * ListSourceClient unit tests
 */
import { describe, it, expect } from 'vitest';
import { ListSourceClient, parseDomainList } from '../../../src/sources/ListSourceClient.js';
import { HttpClient } from '../../../src/core/HttpClient.js';
import { CatalogError, FileFetchError } from '../../../src/core/errors.js';
import { createFakeFetch, createListHost, jsonResponse, noSleep, textResponse } from '../../helpers/fakeFetch.js';

const LISTS = 'https://lists.test';
const CATALOG_URL = `${LISTS}/cache_domains.json`;

function clientFor(handler: Parameters<typeof createFakeFetch>[0]): ListSourceClient {
  const fake = createFakeFetch(handler);
  return new ListSourceClient(new HttpClient({ fetchImpl: fake.fetch, sleep: noSleep }));
}

describe('parseDomainList', () => {
  it('should drop blank lines, whitespace-only lines and comments', () => {
    expect(parseDomainList(['', '# comment', 'cache.example.com', '  '].join('\n'))).toEqual(['cache.example.com']);
  });

  it('should trim surrounding whitespace and handle CRLF', () => {
    expect(parseDomainList('  a.example.com \r\n#x\r\nb.example.com\r\n')).toEqual(['a.example.com', 'b.example.com']);
  });

  it('should keep the case of domains as received', () => {
    expect(parseDomainList('Steam.Example.COM')).toEqual(['Steam.Example.COM']);
  });

  it('should keep wildcard entries', () => {
    expect(parseDomainList('*.cdn.example.com')).toEqual(['*.cdn.example.com']);
  });
});

describe('ListSourceClient', () => {
  describe('fetchCatalog', () => {
    it('should map catalog entries and ignore extra fields', async () => {
      const client = clientFor({
        [LISTS]: () =>
          jsonResponse({
            cache_domains: [
              { name: 'steam', description: 'Steam', domain_files: ['steam.txt'] },
              { name: 'wsus', domain_files: ['windowsupdates.txt', 'wsus-extra.txt'] },
            ],
          }),
      });

      await expect(client.fetchCatalog(CATALOG_URL)).resolves.toEqual([
        { name: 'steam', domainFiles: ['steam.txt'] },
        { name: 'wsus', domainFiles: ['windowsupdates.txt', 'wsus-extra.txt'] },
      ]);
    });

    it('should return an empty list for a valid empty catalog', async () => {
      const client = clientFor({ [LISTS]: () => jsonResponse({ cache_domains: [] }) });

      await expect(client.fetchCatalog(CATALOG_URL)).resolves.toEqual([]);
    });

    it('should throw CatalogError when cache_domains is missing', async () => {
      const client = clientFor({ [LISTS]: () => jsonResponse({ services: [] }) });

      await expect(client.fetchCatalog(CATALOG_URL)).rejects.toBeInstanceOf(CatalogError);
    });

    it('should throw CatalogError when the catalog is unreachable', async () => {
      const client = clientFor({ [LISTS]: () => textResponse('forbidden', 403) });

      const error = await client.fetchCatalog(CATALOG_URL).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CatalogError);
      expect(error).toMatchObject({ url: CATALOG_URL, fatal: true });
    });
  });

  describe('listServiceNames', () => {
    it('should return names in catalog order', async () => {
      const client = clientFor({
        [LISTS]: () =>
          jsonResponse({
            cache_domains: [
              { name: 'riot', domain_files: [] },
              { name: 'blizzard', domain_files: [] },
            ],
          }),
      });

      await expect(client.listServiceNames(CATALOG_URL)).resolves.toEqual(['riot', 'blizzard']);
    });
  });

  describe('fetchDomainList', () => {
    it('should return parsed domains', async () => {
      const client = clientFor({ [LISTS]: createListHost({ '/steam.txt': '# Steam\nlancache.steamcontent.com\n' }) });

      await expect(client.fetchDomainList(`${LISTS}/steam.txt`)).resolves.toEqual(['lancache.steamcontent.com']);
    });

    it('should throw FileFetchError on an HTTP error', async () => {
      const client = clientFor({ [LISTS]: createListHost({}) });

      const error = await client.fetchDomainList(`${LISTS}/gone.txt`).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FileFetchError);
      expect(error).toMatchObject({ url: `${LISTS}/gone.txt`, fatal: false });
    });

    it('should throw FileFetchError when the host is unreachable', async () => {
      const client = clientFor({});

      await expect(client.fetchDomainList(`${LISTS}/steam.txt`)).rejects.toBeInstanceOf(FileFetchError);
    });
  });
});
