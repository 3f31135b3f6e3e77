import { describe, it } from 'node:test';
import assert from 'node:assert';
import { sanitizeBody, normalizeCustomerIdentifier, TRUNCATION_MARKER } from './sanitize.js';

describe('sanitizeBody', () => {
  it('should trim whitespace from both ends', () => {
    assert.strictEqual(sanitizeBody('  hello world  ', 100), 'hello world');
  });

  it('should keep the original casing', () => {
    assert.strictEqual(sanitizeBody('Hello WORLD', 100), 'Hello WORLD');
  });

  it('should normalize Windows line endings to Unix', () => {
    assert.strictEqual(sanitizeBody('line1\r\nline2', 100), 'line1\nline2');
  });

  it('should strip null bytes and other control characters', () => {
    assert.strictEqual(sanitizeBody('a\u0000b\u0007c\u001Bd\u007Fe', 100), 'abcde');
  });

  it('should keep tabs and newlines', () => {
    assert.strictEqual(sanitizeBody('col1\tcol2\nrow2', 100), 'col1\tcol2\nrow2');
  });

  it('should truncate beyond the limit and append the marker', () => {
    const out = sanitizeBody('abcdefghij', 4);
    assert.strictEqual(out, 'abcd' + TRUNCATION_MARKER);
    assert.strictEqual(out, 'abcd... [truncated]');
  });

  it('should not split an emoji at the limit', () => {
    assert.strictEqual(sanitizeBody('ab\u{1F600}cd', 3), 'ab' + TRUNCATION_MARKER);
    assert.strictEqual(sanitizeBody('ab\u{1F600}cd', 4), 'ab\u{1F600}' + TRUNCATION_MARKER);
  });

  it('should not truncate a body exactly at the limit', () => {
    assert.strictEqual(sanitizeBody('abcd', 4), 'abcd');
  });

  it('should return empty string for blank input', () => {
    assert.strictEqual(sanitizeBody('', 10), '');
    assert.strictEqual(sanitizeBody('  \u0000 \n ', 10), '');
  });
});

describe('normalizeCustomerIdentifier', () => {
  it('should lowercase email addresses', () => {
    assert.strictEqual(normalizeCustomerIdentifier(' Jane.Doe@Example.COM ', 'email'), 'jane.doe@example.com');
  });

  it('should leave chat ids as they are apart from trimming', () => {
    assert.strictEqual(normalizeCustomerIdentifier(' U02ABCDEF ', 'chat'), 'U02ABCDEF');
  });
});
