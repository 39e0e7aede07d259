/**
 * Tests for BlockBlobClient
 */

import { beforeEach, describe, expect, it } from 'vitest';
import { BlockBlobClient } from '../block-blob-client.js';
import { BodyStream } from '../../http/body-stream.js';
import { MockTransport, reply } from '../../testing/mock-transport.js';
import { InMemoryLogger } from '../../observability/logger.js';
import { ValidationError } from '../../errors/index.js';

const BASE_HEADERS = {
  ETag: '"0x8D2"',
  'Last-Modified': 'Tue, 02 Jan 2024 03:04:05 GMT',
  'x-ms-request-id': 'req-1',
};

const text = (bytes: Uint8Array): string => new TextDecoder().decode(bytes);

describe('BlockBlobClient', () => {
  let transport: MockTransport;
  let logger: InMemoryLogger;
  let client: BlockBlobClient;

  beforeEach(() => {
    transport = new MockTransport();
    logger = new InMemoryLogger();
    client = BlockBlobClient.fromConnectionString(
      'AccountName=acct;SharedAccessSignature=sv=2021-12-02&sig=test-secret',
      'docs',
      'report.txt',
      { transport, logger }
    );
  });

  describe('upload', () => {
    it('should put the whole blob in one request', async () => {
      transport.enqueue(
        reply(201, { ...BASE_HEADERS, 'Content-MD5': 'XUFAKrxLKna5cZ2REBfFkg==', 'x-ms-request-server-encrypted': 'true' })
      );

      const info = await client.upload('hello', {
        httpHeaders: { contentType: 'text/plain' },
        metadata: { owner: 'ops' },
        tier: 'Cool',
      });

      const request = transport.single();
      expect(request.method).toBe('PUT');
      expect(request.url.pathname).toBe('/docs/report.txt');
      expect(request.headers['x-ms-blob-type']).toBe('BlockBlob');
      expect(request.headers['content-length']).toBe('5');
      expect(request.headers['x-ms-blob-content-type']).toBe('text/plain');
      expect(request.headers['x-ms-meta-owner']).toBe('ops');
      expect(request.headers['x-ms-access-tier']).toBe('Cool');
      expect(text(request.body)).toBe('hello');
      expect(info).toMatchObject({ etag: '"0x8D2"', contentMd5: 'XUFAKrxLKna5cZ2REBfFkg==', serverEncrypted: true });
    });

    it('should stream a body stream', async () => {
      transport.enqueue(reply(201, BASE_HEADERS));

      await client.upload(BodyStream.from('streamed'));

      const request = transport.single();
      expect(request.headers['content-length']).toBe('8');
      expect(text(request.body)).toBe('streamed');
    });
  });

  describe('staged blocks', () => {
    it('should stage a block', async () => {
      transport.enqueue(reply(201, { 'x-ms-request-id': 'req-2', 'x-ms-request-server-encrypted': 'true' }));

      const info = await client.stageBlock('YmxvY2stMQ==', 'part', { transactionalContentMd5: 'md5' });

      const request = transport.single();
      expect(request.url.searchParams.get('comp')).toBe('block');
      expect(request.url.searchParams.get('blockid')).toBe('YmxvY2stMQ==');
      expect(request.url.searchParams.get('sig')).toBe('test-secret');
      expect(request.headers['content-md5']).toBe('md5');
      expect(info).toMatchObject({ requestId: 'req-2', serverEncrypted: true });
    });

    it('should reject an invalid block id without sending', async () => {
      await expect(client.stageBlock('bad id!', 'part')).rejects.toThrow(ValidationError);
      expect(transport.requests).toHaveLength(0);
    });

    it('should commit a block list in order', async () => {
      transport.enqueue(reply(201, BASE_HEADERS));

      await client.commitBlockList(['YQ==', { id: 'Yg==', list: 'committed' }], { metadata: { a: '1' } });

      const request = transport.single();
      expect(request.url.searchParams.get('comp')).toBe('blocklist');
      expect(request.headers['content-type']).toBe('application/xml; charset=utf-8');
      expect(request.headers['x-ms-meta-a']).toBe('1');
      expect(text(request.body)).toBe(
        '<?xml version="1.0" encoding="utf-8"?><BlockList><Latest>YQ==</Latest><Committed>Yg==</Committed></BlockList>'
      );
      expect(request.headers['content-length']).toBe(String(request.body.length));
      expect(logger.getLogsByLevel('debug').find((record) => record.message === 'Block list committed')?.context).toEqual({
        container: 'docs',
        blob: 'report.txt',
        blocks: 2,
      });
    });

    it('should read the block list', async () => {
      transport.enqueue(
        reply(
          200,
          { ...BASE_HEADERS, 'x-ms-blob-content-length': '10', 'Content-Type': 'application/xml' },
          '<BlockList><CommittedBlocks><Block><Name>YQ==</Name><Size>10</Size></Block></CommittedBlocks><UncommittedBlocks /></BlockList>'
        )
      );

      const list = await client.getBlockList('committed');

      expect(transport.single().url.searchParams.get('blocklisttype')).toBe('committed');
      expect(list).toMatchObject({
        etag: '"0x8D2"',
        contentLength: 10,
        committedBlocks: [{ name: 'YQ==', size: 10 }],
        uncommittedBlocks: [],
      });
    });
  });

  it('should keep the kind when addressing a snapshot', () => {
    const snapshot = client.withSnapshot('snap-1');

    expect(snapshot).toBeInstanceOf(BlockBlobClient);
    expect(snapshot.snapshot).toBe('snap-1');
    expect(snapshot.url).toBe('https://acct.blob.core.windows.net/docs/report.txt?sv=2021-12-02&sig=test-secret&snapshot=snap-1');
  });
});
