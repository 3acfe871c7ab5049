import { describe, it, expect, beforeEach } from 'vitest';
import { CloudflareApiError } from '@cfupdater/utils';
import { CloudflareClient } from '@cfupdater/sdk';
import {
  FakeCloudflare,
  TEST_RECORD,
  TEST_TOKEN,
  TEST_ZONE,
  envelopeError,
} from '../helpers/fake-cloudflare.js';

const RECORDS_PATH = `/client/v4/zones/${TEST_ZONE}/dns_records`;

describe('CloudflareClient', () => {
  let fake: FakeCloudflare;
  let client: CloudflareClient;

  beforeEach(() => {
    fake = new FakeCloudflare();
    client = new CloudflareClient({
      apiToken: TEST_TOKEN,
      zoneId: TEST_ZONE,
      retryAttempts: 2,
      retryDelay: 0,
      adapter: fake.adapter,
    });
  });

  describe('listRecords', () => {
    it('filters by name and sends the bearer token', async () => {
      fake.addRecord({ name: TEST_RECORD, content: '198.51.100.7' });
      fake.addRecord({ name: 'other.example.com', content: '198.51.100.8' });

      const records = await client.listRecords(TEST_RECORD);

      expect(records.map((r) => r.id)).toEqual(['rec-1']);
      expect(fake.requests[0]).toMatchObject({
        method: 'GET',
        path: RECORDS_PATH,
        params: { name: TEST_RECORD },
        authorization: 'Bearer test-token',
      });
    });

    it('reports the first Cloudflare error', async () => {
      const stranger = new CloudflareClient({
        apiToken: 'wrong-token',
        zoneId: TEST_ZONE,
        retryDelay: 0,
        adapter: fake.adapter,
      });

      const error = await stranger.listRecords(TEST_RECORD).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CloudflareApiError);
      expect(error).toMatchObject({
        message: 'Failed to list DNS records: Authentication error',
        status: 403,
        errors: [{ code: 10000, message: 'Authentication error' }],
      });
      expect(fake.requests).toHaveLength(1);
    });

    it('treats success: false as a failure even on HTTP 200', async () => {
      fake.fail('GET', /dns_records$/, 200, { success: false, errors: [], result: null });

      await expect(client.listRecords(TEST_RECORD)).rejects.toThrow('Failed to list DNS records: Unknown error');
    });

    it('retries network errors until the attempts run out', async () => {
      fake.fail('GET', /dns_records$/, undefined, undefined, 10);

      const error = await client.listRecords(TEST_RECORD).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CloudflareApiError);
      expect(error).toMatchObject({
        message: 'Failed to list DNS records: ECONNREFUSED: connect ECONNREFUSED',
        status: undefined,
      });
      expect(fake.requestsTo('GET')).toHaveLength(3);
    });
  });

  describe('findARecord', () => {
    it('returns the A record with the exact name', async () => {
      fake.addRecord({ name: TEST_RECORD, type: 'TXT', content: 'v=spf1 -all' });
      fake.addRecord({ name: TEST_RECORD, content: '198.51.100.7' });

      const record = await client.findARecord(TEST_RECORD);

      expect(record).toMatchObject({ id: 'rec-2', type: 'A', content: '198.51.100.7' });
    });

    it('returns null when the name has no records', async () => {
      await expect(client.findARecord(TEST_RECORD)).resolves.toBeNull();
    });

    it('returns null when only other record types exist', async () => {
      fake.addRecord({ name: TEST_RECORD, type: 'AAAA', content: '2001:db8::1' });

      await expect(client.findARecord(TEST_RECORD)).resolves.toBeNull();
    });
  });

  describe('updateRecord', () => {
    it('puts the full A record body', async () => {
      const existing = fake.addRecord({ name: TEST_RECORD, content: '198.51.100.7' });

      const updated = await client.updateRecord(existing.id, { name: TEST_RECORD, content: '203.0.113.10' });

      expect(updated.content).toBe('203.0.113.10');
      expect(fake.requestsTo('PUT')[0]).toMatchObject({
        path: `${RECORDS_PATH}/rec-1`,
        body: { type: 'A', name: TEST_RECORD, content: '203.0.113.10', ttl: 1, proxied: false },
      });
    });

    it('retries a bad gateway once', async () => {
      const existing = fake.addRecord({ name: TEST_RECORD, content: '198.51.100.7' });
      fake.fail('PUT', /dns_records\/rec-1$/, 502);

      await client.updateRecord(existing.id, { name: TEST_RECORD, content: '203.0.113.10' });

      expect(fake.requestsTo('PUT')).toHaveLength(2);
      expect(fake.records[0].content).toBe('203.0.113.10');
    });

    it('does not retry client errors', async () => {
      fake.fail('PUT', /dns_records\/rec-9$/, 400, envelopeError(1004, 'DNS Validation Error'));

      await expect(client.updateRecord('rec-9', { name: TEST_RECORD, content: '203.0.113.10' }))
        .rejects.toThrow('Failed to update DNS record: DNS Validation Error');
      expect(fake.requestsTo('PUT')).toHaveLength(1);
    });
  });

  describe('createRecord', () => {
    it('posts the record with the requested ttl and proxying', async () => {
      const created = await client.createRecord({
        name: TEST_RECORD,
        content: '203.0.113.10',
        ttl: 120,
        proxied: true,
      });

      expect(created).toMatchObject({ id: 'rec-1', name: TEST_RECORD, content: '203.0.113.10' });
      expect(fake.requestsTo('POST')[0]).toMatchObject({
        path: RECORDS_PATH,
        body: { type: 'A', name: TEST_RECORD, content: '203.0.113.10', ttl: 120, proxied: true },
      });
    });
  });
});
