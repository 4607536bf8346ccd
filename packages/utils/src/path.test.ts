import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { secureFilename, normalizeExtension } from './path.js';

describe('secureFilename', () => {
  it('joins whitespace-separated words with underscores', () => {
    assert.equal(secureFilename('flight 2024.bin'), 'flight_2024.bin');
  });

  it('flattens directory traversal into a plain name', () => {
    assert.equal(secureFilename('../../etc/passwd'), 'etc_passwd');
  });

  it('flattens windows paths and drops the drive colon', () => {
    assert.equal(secureFilename('C:\\logs\\00000042.BIN'), 'C_logs_00000042.BIN');
  });

  it('transliterates accented characters', () => {
    assert.equal(secureFilename('café.bin'), 'cafe.bin');
  });

  it('strips leading dots left after dropping non-ascii characters', () => {
    assert.equal(secureFilename('日本.bin'), 'bin');
  });

  it('returns an empty string when nothing usable remains', () => {
    assert.equal(secureFilename('...'), '');
    assert.equal(secureFilename(''), '');
  });
});

describe('normalizeExtension', () => {
  it('adds a missing leading dot', () => {
    assert.equal(normalizeExtension('bin'), '.bin');
  });

  it('keeps a dotted extension and trims whitespace', () => {
    assert.equal(normalizeExtension(' .log '), '.log');
  });
});
