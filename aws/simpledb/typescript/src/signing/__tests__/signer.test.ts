/**
 * Tests for Signature Version 2 signing
 */

import { describe, it, expect } from 'vitest';
import { encodeFormBody, normalizedParameters, percentEncode, signatureBaseString } from '../canonical.js';
import { RequestSigner, formatTimestamp, resolveSignatureMethod } from '../signer.js';
import type { SignableRequest } from '../types.js';

const credentials = { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' };
const timestamp = new Date(Date.UTC(2010, 0, 25, 15, 1, 28));

const request: SignableRequest = {
  method: 'POST',
  host: 'sdb.amazonaws.com',
  path: '/',
  params: { Action: 'ListDomains', Version: '2009-04-15', MaxNumberOfDomains: '100' },
};

describe('percentEncode', () => {
  it('should leave unreserved characters alone', () => {
    expect(percentEncode('AZaz09-_.~')).toBe('AZaz09-_.~');
  });

  it('should encode characters encodeURIComponent keeps', () => {
    expect(percentEncode("it's (a) test*")).toBe('it%27s%20%28a%29%20test%2A');
  });

  it('should encode UTF-8 and reserved characters', () => {
    expect(percentEncode('café ü/x+y=z&')).toBe('caf%C3%A9%20%C3%BC%2Fx%2By%3Dz%26');
  });
});

describe('normalizedParameters', () => {
  it('should sort by byte order and skip Signature', () => {
    expect(normalizedParameters({ b: '2', Signature: 'x', a: '1', B: '3' })).toBe('B=3&a=1&b=2');
  });
});

describe('signatureBaseString', () => {
  it('should join method, host, path and parameters with newlines', () => {
    expect(signatureBaseString('post', 'SDB.Example.COM:8080', '', { Action: 'ListDomains' })).toBe(
      'POST\nsdb.example.com:8080\n/\nAction=ListDomains'
    );
  });
});

describe('formatTimestamp', () => {
  it('should format UTC to the second without zone suffix', () => {
    expect(formatTimestamp(new Date(Date.UTC(2010, 0, 25, 15, 1, 28, 999)))).toBe('2010-01-25T15:01:28');
  });
});

describe('resolveSignatureMethod', () => {
  it('should prefer HmacSHA256', () => {
    expect(resolveSignatureMethod()).toBe('HmacSHA256');
  });

  it('should honour an explicit method', () => {
    expect(resolveSignatureMethod('HmacSHA1')).toBe('HmacSHA1');
  });
});

describe('RequestSigner', () => {
  it('should add the authentication parameters', () => {
    const signed = new RequestSigner(credentials).sign(request, timestamp);

    expect(signed).toMatchObject({
      Action: 'ListDomains',
      AWSAccessKeyId: 'test-access-key',
      SignatureVersion: '2',
      SignatureMethod: 'HmacSHA256',
      Timestamp: '2010-01-25T15:01:28',
    });
  });

  it('should reproduce a known HMAC-SHA256 signature', () => {
    const signed = new RequestSigner(credentials, 'HmacSHA256').sign(request, timestamp);
    expect(signed.Signature).toBe('DPuFkZs/vw2+fDrn14hBNYF6xgI25H+uYY+NL2nuc7w=');
  });

  it('should reproduce a known HMAC-SHA1 signature', () => {
    const signed = new RequestSigner(credentials, 'HmacSHA1').sign(request, timestamp);
    expect(signed.Signature).toBe('oFK+QVvoazdbDdj9CZoXAl2YbIU=');
  });

  it('should be deterministic and leave the input untouched', () => {
    const signer = new RequestSigner(credentials);
    const first = signer.sign(request, timestamp);
    const second = signer.sign(request, timestamp);

    expect(first).toEqual(second);
    expect(request.params).toEqual({ Action: 'ListDomains', Version: '2009-04-15', MaxNumberOfDomains: '100' });
  });

  it('should change the signature when the timestamp changes', () => {
    const signer = new RequestSigner(credentials);
    const later = new Date(timestamp.getTime() + 1000);
    expect(signer.sign(request, later).Signature).not.toBe(signer.sign(request, timestamp).Signature);
  });
});

describe('encodeFormBody', () => {
  it('should encode every parameter including Signature', () => {
    expect(encodeFormBody({ Signature: 'a+b/c=', Action: 'Select', SelectExpression: "x = 'y'" })).toBe(
      'Action=Select&SelectExpression=x%20%3D%20%27y%27&Signature=a%2Bb%2Fc%3D'
    );
  });
});
