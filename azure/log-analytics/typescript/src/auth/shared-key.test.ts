/**
 * Tests for shared key signing
 */

import { describe, it, expect } from 'vitest';
import {
  SharedKeyAuthProvider,
  buildAuthorizationHeader,
  buildStringToSign,
  decodeWorkspaceKey,
  sign,
} from './shared-key.js';
import { ConfigurationError } from '../errors.js';

const DATE = 'Tue, 05 Mar 2024 09:07:02 GMT';
const KEY = Buffer.from('test-secret', 'utf8');
const ENCODED_KEY = 'dGVzdC1zZWNyZXQ=';

describe('buildStringToSign', () => {
  it('should join the five fields with newlines', () => {
    expect(buildStringToSign(71, DATE)).toBe(
      'POST\n71\napplication/json\nx-ms-date:Tue, 05 Mar 2024 09:07:02 GMT\n/api/logs'
    );
  });

  it('should depend only on content length and date', () => {
    expect(buildStringToSign(2, DATE)).toBe(buildStringToSign(2, DATE));
    expect(buildStringToSign(2, DATE)).not.toBe(buildStringToSign(3, DATE));
  });
});

describe('sign', () => {
  it('should produce the HMAC-SHA256 digest in base64', () => {
    expect(sign(buildStringToSign(2, DATE), KEY)).toBe(
      'j3bjQmcOUke/2ed41DdMi5z199N3oH0aakc7p/ik9N0='
    );
  });

  it('should be deterministic', () => {
    const stringToSign = buildStringToSign(2, DATE);
    expect(sign(stringToSign, KEY)).toBe(sign(stringToSign, KEY));
  });

  it('should change when the string changes', () => {
    expect(sign(buildStringToSign(3, DATE), KEY)).toBe(
      'tKRFhx29HqKSkLmDzND/MlDk8wMpVHzqmQxXTC0c5VM='
    );
  });

  it('should change when the key changes', () => {
    expect(sign(buildStringToSign(2, DATE), Buffer.from('test-secreT', 'utf8'))).toBe(
      'TGxqZ8YIsQInZ/VZBgnNgkUMkx/f/PHIAyBL0iLEU3c='
    );
  });
});

describe('buildAuthorizationHeader', () => {
  it('should format the SharedKey scheme', () => {
    expect(buildAuthorizationHeader('ws-1', 'abc=')).toBe('SharedKey ws-1:abc=');
  });
});

describe('decodeWorkspaceKey', () => {
  it('should decode a padded base64 key', () => {
    expect(decodeWorkspaceKey(ENCODED_KEY).toString('utf8')).toBe('test-secret');
  });

  it.each(['', 'not base64!', 'dGVzdC1zZWNyZXQ', 'dGVz=dC1z'])(
    'should reject %j',
    (value) => {
      expect(() => decodeWorkspaceKey(value)).toThrow(ConfigurationError);
    }
  );

  it('should report the key error code', () => {
    let caught: unknown;
    try {
      decodeWorkspaceKey('***');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({ code: 'Configuration.InvalidWorkspaceKey' });
  });
});

describe('SharedKeyAuthProvider', () => {
  it('should sign with the decoded key and echo the date', () => {
    const provider = new SharedKeyAuthProvider('ws-1', ENCODED_KEY);

    const headers = provider.signRequest(2, DATE);

    expect(headers).toEqual({
      Authorization: 'SharedKey ws-1:j3bjQmcOUke/2ed41DdMi5z199N3oH0aakc7p/ik9N0=',
      'x-ms-date': DATE,
    });
  });

  it('should fail at construction for a malformed key', () => {
    expect(() => new SharedKeyAuthProvider('ws-1', 'not base64!')).toThrow(ConfigurationError);
  });
});
