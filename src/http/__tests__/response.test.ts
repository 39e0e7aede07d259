/**
 * Tests for HttpResponse
 */

import { describe, it, expect } from 'vitest';
import { HttpResponse, parseResponseHead, parseStatusLine, statusClassOf } from '../response.js';
import { MemoryBodyStream } from '../body-stream.js';
import { BodyStreamError, ValidationError } from '../../errors/index.js';

describe('HttpResponse', () => {
  describe('Constructor', () => {
    it('should keep status code and reason phrase', () => {
      const response = new HttpResponse(206, 'Partial Content');

      expect(response.statusCode).toBe(206);
      expect(response.reasonPhrase).toBe('Partial Content');
      expect(response.statusClass).toBe('success');
    });

    it('should reject status codes outside 100..599', () => {
      expect(() => new HttpResponse(99, 'Low')).toThrow(ValidationError);
      expect(() => new HttpResponse(600, 'High')).toThrow(ValidationError);
      expect(() => new HttpResponse(200.5, 'Fraction')).toThrow(ValidationError);
    });
  });

  it('should not change status or reason when headers and body change', () => {
    const response = new HttpResponse(404, 'Not Found');
    response.addHeaderLine('x-ms-error-code: BlobNotFound\r');
    response.addHeader('Content-Length', '0');
    response.setBodyStream(new MemoryBodyStream(new Uint8Array(0)));

    expect(response.statusCode).toBe(404);
    expect(response.reasonPhrase).toBe('Not Found');
    expect(response.headers.get('X-MS-Error-Code')).toBe('BlobNotFound');
  });

  describe('body ownership', () => {
    it('should hand the body over once', () => {
      const response = new HttpResponse(200, 'OK');
      const body = new MemoryBodyStream(new Uint8Array([1]));
      response.setBodyStream(body);

      expect(response.takeBodyStream()).toBe(body);
      expect(response.hasBody).toBe(false);
      expect(() => response.takeBodyStream()).toThrow(BodyStreamError);
    });

    it('should return undefined when there is no body', () => {
      const response = new HttpResponse(204, 'No Content');

      expect(response.takeBodyStream()).toBeUndefined();
      expect(response.takeBodyStream()).toBeUndefined();
    });

    it('should release a replaced body', () => {
      const response = new HttpResponse(200, 'OK');
      const first = new MemoryBodyStream(new Uint8Array([1]));
      const second = new MemoryBodyStream(new Uint8Array([2]));

      response.setBodyStream(first);
      response.setBodyStream(second);

      expect(first.isReleased).toBe(true);
      expect(second.isReleased).toBe(false);
    });

    it('should not release a body set twice', () => {
      const response = new HttpResponse(200, 'OK');
      const body = new MemoryBodyStream(new Uint8Array([1]));

      response.setBodyStream(body);
      response.setBodyStream(body);

      expect(body.isReleased).toBe(false);
    });

    it('should read the attached body', async () => {
      const response = new HttpResponse(200, 'OK');
      response.setBodyStream(new MemoryBodyStream(new TextEncoder().encode('hello')));

      expect(await response.readBodyAsText()).toBe('hello');
    });

    it('should read an empty body when none is attached', async () => {
      expect((await new HttpResponse(202, 'Accepted').readBody()).length).toBe(0);
    });

    it('should refuse to read a taken body', async () => {
      const response = new HttpResponse(200, 'OK');
      response.setBodyStream(new MemoryBodyStream(new Uint8Array([1])));
      response.takeBodyStream();

      await expect(response.readBody()).rejects.toMatchObject({ reason: 'TAKEN' });
    });

    it('should release the attached body', () => {
      const response = new HttpResponse(200, 'OK');
      const body = new MemoryBodyStream(new Uint8Array([1]));
      response.setBodyStream(body);

      response.release();

      expect(body.isReleased).toBe(true);
    });
  });
});

describe('statusClassOf', () => {
  it('should classify each range', () => {
    expect(statusClassOf(100)).toBe('informational');
    expect(statusClassOf(201)).toBe('success');
    expect(statusClassOf(304)).toBe('redirection');
    expect(statusClassOf(412)).toBe('clientError');
    expect(statusClassOf(503)).toBe('serverError');
  });
});

describe('parseStatusLine', () => {
  it('should parse version, code and reason', () => {
    expect(parseStatusLine('HTTP/1.1 412 Condition Not Met\r')).toEqual({
      httpVersion: '1.1',
      statusCode: 412,
      reasonPhrase: 'Condition Not Met',
    });
  });

  it('should accept an empty reason', () => {
    expect(parseStatusLine('HTTP/2 200')).toEqual({ httpVersion: '2', statusCode: 200, reasonPhrase: '' });
  });

  it('should reject malformed lines', () => {
    expect(() => parseStatusLine('200 OK')).toThrow(ValidationError);
  });
});

describe('parseResponseHead', () => {
  it('should parse the status line and every header line up to the blank line', () => {
    const response = parseResponseHead(
      'HTTP/1.1 200 OK\r\nContent-Length: 42\r\nX-Empty:\r\nnot a header\r\nSet-Cookie: a=1\r\nSet-Cookie: b=2\r\n\r\nIgnored: yes\r\n'
    );

    expect(response.statusCode).toBe(200);
    expect(response.reasonPhrase).toBe('OK');
    expect(response.headers.entries()).toEqual([
      { name: 'Content-Length', value: '42' },
      { name: 'X-Empty', value: '' },
      { name: 'Set-Cookie', value: 'a=1' },
      { name: 'Set-Cookie', value: 'b=2' },
    ]);
  });
});
