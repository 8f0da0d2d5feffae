import { describe, it } from 'node:test';
import assert from 'node:assert';
import { normalizeContact, normalizeText } from './normalize.js';

describe('normalizeText', () => {
  it('should trim whitespace from both ends', () => {
    assert.strictEqual(normalizeText('  hello world  '), 'hello world');
  });

  it('should keep letter case', () => {
    assert.strictEqual(normalizeText('Hello WORLD'), 'Hello WORLD');
  });

  it('should normalize Windows and old Mac line endings to Unix', () => {
    assert.strictEqual(normalizeText('line1\r\nline2\rline3'), 'line1\nline2\nline3');
  });

  it('should collapse multiple spaces and tabs into a single space', () => {
    assert.strictEqual(normalizeText('word1   word2\t\tword3'), 'word1 word2 word3');
  });

  it('should drop spaces hugging a newline', () => {
    assert.strictEqual(normalizeText('line1   \n\t line2'), 'line1\nline2');
  });

  it('should reduce 3 or more newlines to 2 newlines', () => {
    assert.strictEqual(normalizeText('line1\n\n\nline2'), 'line1\n\nline2');
    assert.strictEqual(normalizeText('line1\n \n \n\nline2'), 'line1\n\nline2');
  });

  it('should compose decomposed accents (NFC)', () => {
    assert.strictEqual(normalizeText('Jose\u0301'), 'Jos\u00e9');
  });

  it('should return empty string for blank input', () => {
    assert.strictEqual(normalizeText(''), '');
    assert.strictEqual(normalizeText(' \t\r\n '), '');
  });
});

describe('normalizeContact', () => {
  it('should trim every field and lower-case the email', () => {
    const out = normalizeContact({ name: '  John Doe ', email: ' John@Example.COM ', message: ' Hello! ' });
    assert.deepStrictEqual(out, { name: 'John Doe', email: 'john@example.com', message: 'Hello!' });
  });

  it('should not lower-case name or message', () => {
    const out = normalizeContact({ name: 'ACME', email: 'a@b.io', message: 'Call ME' });
    assert.strictEqual(out.name, 'ACME');
    assert.strictEqual(out.message, 'Call ME');
  });

  it('should treat missing and non-string fields as empty', () => {
    assert.deepStrictEqual(normalizeContact({ name: 42, email: null }), { name: '', email: '', message: '' });
  });

  it('should treat a non-object body as empty', () => {
    const empty = { name: '', email: '', message: '' };
    assert.deepStrictEqual(normalizeContact(undefined), empty);
    assert.deepStrictEqual(normalizeContact('name=x'), empty);
    assert.deepStrictEqual(normalizeContact(['a', 'b']), empty);
  });

  it('should ignore unknown fields', () => {
    const out = normalizeContact({ name: 'A', email: 'a@b.io', message: 'x', extra: 'y' });
    assert.deepStrictEqual(Object.keys(out), ['name', 'email', 'message']);
  });
});
