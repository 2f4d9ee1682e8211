/**
 * GoDaddyProvider unit tests
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { GoDaddyProvider } from '../../../src/providers/godaddy/GoDaddyProvider.js';
import {
  AuthError,
  MalformedRecordError,
  NotFoundError,
  TransportError,
} from '../../../src/core/errors.js';

const credentials = { apiKey: 'test-key', apiSecret: 'test-secret' };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('GoDaddyProvider', () => {
  const fetchMock = vi.fn<typeof fetch>();
  let provider: GoDaddyProvider;

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    provider = new GoDaddyProvider(credentials);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('getInfo', () => {
    it('should return provider info', () => {
      const info = provider.getInfo();

      expect(info.name).toBe('GoDaddy');
      expect(info.type).toBe('godaddy');
      expect(info.baseUrl).toBe('https://api.godaddy.com');
      expect(info.features).toEqual({ pagination: true, listDomains: true });
    });

    it('should drop trailing slashes from the base URL', () => {
      const custom = new GoDaddyProvider(credentials, { baseUrl: 'https://api.ote-godaddy.com/' });
      expect(custom.getInfo().baseUrl).toBe('https://api.ote-godaddy.com');
    });
  });

  describe('fetchRecords', () => {
    it('should request the records with the sso-key header', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([{ type: 'A', name: '@', data: '1.2.3.4', ttl: 600 }]));

      const records = await provider.fetchRecords('example.com');

      expect(records).toEqual([{ type: 'A', name: '@', data: '1.2.3.4', ttl: 600 }]);
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(fetchMock).toHaveBeenCalledWith(
        'https://api.godaddy.com/v1/domains/example.com/records?limit=500&offset=0',
        {
          method: 'GET',
          headers: {
            Authorization: 'sso-key test-key:test-secret',
            Accept: 'application/json',
          },
        }
      );
    });

    it('should keep SRV service fields', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse([
          {
            type: 'SRV',
            name: '@',
            data: 'sip.example.com',
            service: '_sip',
            protocol: '_tcp',
            priority: 10,
            weight: 5,
            port: 5060,
            ttl: 3600,
          },
        ])
      );

      const [record] = await provider.fetchRecords('example.com');

      expect(record).toMatchObject({ service: '_sip', protocol: '_tcp', port: 5060 });
    });

    it('should follow pages until a short page', async () => {
      const paged = new GoDaddyProvider(credentials, { pageSize: 2 });
      fetchMock
        .mockResolvedValueOnce(
          jsonResponse([
            { type: 'A', name: '@', data: '10.0.0.1' },
            { type: 'A', name: 'www', data: '10.0.0.2' },
          ])
        )
        .mockResolvedValueOnce(jsonResponse([{ type: 'TXT', name: '@', data: 'hello' }]));

      const records = await paged.fetchRecords('example.com');

      expect(records.map((r) => r.data)).toEqual(['10.0.0.1', '10.0.0.2', 'hello']);
      expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
        'https://api.godaddy.com/v1/domains/example.com/records?limit=2&offset=0',
        'https://api.godaddy.com/v1/domains/example.com/records?limit=2&offset=2',
      ]);
    });

    it('should return an empty list for a zone without records', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([]));

      await expect(provider.fetchRecords('example.com')).resolves.toEqual([]);
    });

    it('should map rejected credentials to AuthError', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ code: 'UNABLE_TO_AUTHENTICATE', message: 'Could not authenticate API key/secret' }, 401)
      );

      const error = await provider.fetchRecords('example.com').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthError);
      expect(error).toHaveProperty(
        'message',
        'GoDaddy rejected the API credentials for example.com (401: Could not authenticate API key/secret)'
      );
    });

    it('should map an unknown domain to NotFoundError', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ code: 'UNKNOWN_DOMAIN', message: 'The given domain is not registered' }, 404)
      );

      const error = await provider.fetchRecords('example.com').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toHaveProperty('message', 'Domain not found: example.com (The given domain is not registered)');
    });

    it('should map an error object sent with status 200 to NotFoundError', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ code: 'UNKNOWN_DOMAIN', message: 'No zone file' }));

      await expect(provider.fetchRecords('example.com')).rejects.toThrow(NotFoundError);
    });

    it('should wrap network failures in TransportError', async () => {
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

      await expect(provider.fetchRecords('example.com')).rejects.toThrow(
        'Request to https://api.godaddy.com/v1/domains/example.com/records?limit=500&offset=0 failed: fetch failed'
      );
    });

    it('should map server errors to TransportError with the status', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ message: 'Internal error' }, 500));

      const error = await provider.fetchRecords('example.com').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toHaveProperty('message', 'GoDaddy API error for example.com (500: Internal error)');
      expect(error).toHaveProperty('status', 500);
    });

    it('should wrap a failed body read in TransportError', async () => {
      const response = jsonResponse([]);
      vi.spyOn(response, 'text').mockRejectedValueOnce(new TypeError('terminated'));
      fetchMock.mockResolvedValueOnce(response);

      const error = await provider.fetchRecords('example.com').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toHaveProperty(
        'message',
        'Reading the response from https://api.godaddy.com/v1/domains/example.com/records?limit=500&offset=0 failed: terminated'
      );
      expect(error).toHaveProperty('cause', expect.any(TypeError));
    });

    it('should reject a body that is not JSON', async () => {
      fetchMock.mockResolvedValueOnce(new Response('<html></html>', { status: 200 }));

      await expect(provider.fetchRecords('example.com')).rejects.toThrow(TransportError);
    });

    it('should reject entries that fail validation', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([{ type: 'MX', name: '@', data: 'mail', priority: -1 }]));

      const error = await provider.fetchRecords('example.com').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MalformedRecordError);
      expect(error).toHaveProperty('record', { type: 'MX', name: '@', data: 'mail' });
    });
  });

  describe('listDomains', () => {
    it('should return the domain names sorted', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse([
          { domain: 'zeta.org', status: 'ACTIVE' },
          { domain: 'alpha.com', status: 'ACTIVE' },
        ])
      );

      await expect(provider.listDomains()).resolves.toEqual(['alpha.com', 'zeta.org']);
      expect(fetchMock.mock.calls[0]?.[0]).toBe('https://api.godaddy.com/v1/domains');
    });

    it('should not map 404 to NotFoundError without a domain', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ code: 'NOT_FOUND', message: 'Nothing here' }, 404));

      await expect(provider.listDomains()).rejects.toThrow(new TransportError('GoDaddy API error (404: Nothing here)'));
    });
  });
});
