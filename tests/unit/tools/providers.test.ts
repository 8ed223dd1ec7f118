/**
 * Provider Client Unit Tests
 * fetch is stubbed; nothing leaves the process
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';

import { UpstreamError } from '@/lib/errors.js';
import { createExaClient } from '@/tools/providers/exa.client.js';
import { createYelpClient } from '@/tools/providers/yelp.client.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function requestAt(fetchMock: Mock<typeof fetch>, index: number): [string, RequestInit] {
  const call = fetchMock.mock.calls[index];
  if (!call) {
    throw new Error(`fetch was not called ${index + 1} times`);
  }
  const [input, init] = call;
  return [String(input), init ?? {}];
}

describe('provider clients', () => {
  let fetchMock: Mock<typeof fetch>;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('Yelp client', () => {
    const yelp = createYelpClient({ apiKey: 'test-secret', baseUrl: 'http://yelp.test' });

    it('should search one best match near the coordinates', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({ businesses: [{ id: 'biz-1', rating: 4.5, review_count: 12 }] })
      );

      const business = await yelp.findBusiness({
        term: 'Corner Bistro',
        latitude: 40.7,
        longitude: -74,
      });

      expect(business).toEqual({ id: 'biz-1', rating: 4.5, review_count: 12 });
      const [url, init] = requestAt(fetchMock, 0);
      expect(url).toBe(
        'http://yelp.test/businesses/search?term=Corner+Bistro&sort_by=best_match&limit=1&latitude=40.7&longitude=-74'
      );
      expect(init.headers).toEqual({ Authorization: 'Bearer test-secret' });
    });

    it('should return null when nothing matches', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ businesses: [] }));

      await expect(
        yelp.findBusiness({ term: 'Nowhere', latitude: 0, longitude: 0 })
      ).resolves.toBeNull();
    });

    it('should list reviews of a business', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({ reviews: [{ id: 'r1', text: 'Great fries', rating: 5 }] })
      );

      const reviews = await yelp.getReviews('biz-1');

      expect(reviews).toEqual([{ id: 'r1', text: 'Great fries', rating: 5 }]);
      expect(requestAt(fetchMock, 0)[0]).toBe('http://yelp.test/businesses/biz-1/reviews');
    });

    it('should raise UpstreamError on an error status', async () => {
      fetchMock.mockResolvedValue(new Response('slow down', { status: 429 }));

      const failure = yelp.getReviews('biz-1');

      await expect(failure).rejects.toBeInstanceOf(UpstreamError);
      await expect(failure).rejects.toThrow(
        'Review lookup request failed with status 429: slow down'
      );
    });

    it('should raise UpstreamError when the network fails', async () => {
      fetchMock.mockRejectedValue(new Error('connect ECONNREFUSED'));

      await expect(yelp.getReviews('biz-1')).rejects.toThrow(
        'Review lookup request failed: connect ECONNREFUSED'
      );
    });
  });

  describe('content search client', () => {
    const exa = createExaClient({ apiKey: 'test-secret', baseUrl: 'http://exa.test' });

    it('should restrict the search to one domain and keep page texts', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({
          results: [
            { url: 'http://bistro.test/menu', text: 'Burger 12' },
            { url: 'http://bistro.test/blank', text: null },
            { url: 'http://bistro.test/hours', text: 'Open daily' },
          ],
        })
      );

      const texts = await exa.searchDomain('bistro.test', 'menu');

      expect(texts).toEqual(['Burger 12', 'Open daily']);
      const [url, init] = requestAt(fetchMock, 0);
      expect(url).toBe('http://exa.test/search');
      expect(init.method).toBe('POST');
      expect(JSON.parse(String(init.body))).toEqual({
        query: 'menu',
        type: 'auto',
        includeDomains: ['bistro.test'],
        contents: { text: true },
      });
    });
  });
});
