import { PayloadTooLargeException } from '@nestjs/common';
import { CachedBodyRequest } from '../../http/cached-body-request';
import type { HttpRequest } from '../../http/http-request';
import { FakeHttpRequest, fakeResponse, jsonRequest } from '../../testing/fake-http-request';
import { createTestWebConfig } from '../../testing/test-web-config';
import type { FilterChain } from '../web-filter';
import { CacheRequestBodyFilter } from './cache-request-body.filter';

describe('CacheRequestBodyFilter', () => {
  let filter: CacheRequestBodyFilter;
  let forwarded: HttpRequest[];
  let chain: FilterChain;

  beforeEach(() => {
    filter = new CacheRequestBodyFilter(createTestWebConfig({ WEB_BODY_LIMIT: '1024' }));
    forwarded = [];
    chain = {
      doFilter: jest.fn(async (request: HttpRequest) => {
        forwarded.push(request);
      }),
    };
  });

  it('should forward a cached request for JSON bodies', async () => {
    const original = jsonRequest('POST', '/admin-api/users', '{"name":"tom"}');

    await filter.doFilter(original, fakeResponse().response, chain);

    const [request] = forwarded;
    expect(request).toBeInstanceOf(CachedBodyRequest);
    expect(request instanceof CachedBodyRequest && request.text()).toBe('{"name":"tom"}');
    expect(original.reads).toBe(1);
  });

  it('should match the JSON content type case-insensitively', async () => {
    const original = new FakeHttpRequest({
      method: 'POST',
      headers: { 'content-type': 'Application/JSON; charset=UTF-8' },
      body: '{}',
    });

    await filter.doFilter(original, fakeResponse().response, chain);

    expect(forwarded[0]).toBeInstanceOf(CachedBodyRequest);
  });

  it('should pass non-JSON requests through untouched', async () => {
    const original = new FakeHttpRequest({
      method: 'POST',
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      body: 'a=1',
    });

    await filter.doFilter(original, fakeResponse().response, chain);

    expect(forwarded).toEqual([original]);
    expect(original.reads).toBe(0);
  });

  it('should skip excluded path prefixes', async () => {
    const original = jsonRequest('POST', '/actuator/health', '{}');

    await filter.doFilter(original, fakeResponse().response, chain);

    expect(forwarded).toEqual([original]);
    expect(original.reads).toBe(0);
  });

  it('should reject bodies over the configured limit', async () => {
    const original = jsonRequest('POST', '/admin-api/files', `{"data":"${'x'.repeat(1024)}"}`);

    await expect(filter.doFilter(original, fakeResponse().response, chain)).rejects.toBeInstanceOf(
      PayloadTooLargeException,
    );
    expect(chain.doFilter).not.toHaveBeenCalled();
  });
});
