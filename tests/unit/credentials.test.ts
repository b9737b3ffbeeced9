import fs from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadCredentials, parseCredentials, resolveCredentialsPath } from '../../src/modules/verifier/credentials';
import { MissingCredentialsError } from '../../src/utils/errors';
import { makeTempDir, removeDir } from '../helpers';

describe('credentials', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('parses key=value lines, skipping comments and blanks', () => {
    const content = '# smarty keys\nauth_id=test-id\n\nAUTH_TOKEN = test-secret\r\n';
    expect(parseCredentials(content, 'creds.txt')).toEqual({ authId: 'test-id', authToken: 'test-secret' });
  });

  it('names the missing keys', () => {
    expect(() => parseCredentials('auth_id=test-id\n', 'creds.txt'))
      .toThrow('Invalid credentials file creds.txt: missing auth_token');
    expect(() => parseCredentials('', 'creds.txt'))
      .toThrow('Invalid credentials file creds.txt: missing auth_id and auth_token');
  });

  it('rejects lines without an equals sign', () => {
    expect(() => parseCredentials('auth_id=test-id\nauth_token test-secret\n', 'creds.txt'))
      .toThrow('Malformed line 2 in creds.txt: expected key=value');
  });

  it('finds the file in the first directory that has it', () => {
    const other = path.join(dir, 'other');
    fs.mkdirSync(other);
    fs.writeFileSync(path.join(other, 'keys.txt'), 'auth_id=test-id\nauth_token=test-secret\n');

    expect(resolveCredentialsPath('keys.txt', [dir, other])).toBe(path.join(other, 'keys.txt'));
    expect(resolveCredentialsPath('absent.txt', [dir, other])).toBeUndefined();
  });

  it('fails with MissingCredentialsError when there is no file', () => {
    expect(() => loadCredentials(undefined)).toThrow(MissingCredentialsError);
    expect(() => loadCredentials(path.join(dir, 'nope.txt'))).toThrow(/not found/);
  });
});
