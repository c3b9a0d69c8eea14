import { describe, it, expect } from 'vitest';
import { decodeProductLink, encodeProductLink } from './url.js';

describe('encodeProductLink', () => {
  it('encodes reserved characters but keeps slashes', () => {
    expect(encodeProductLink('https://shop.example/item?id=1&ref=a b')).toBe(
      'https%3A//shop.example/item%3Fid%3D1%26ref%3Da%20b',
    );
  });

  it("encodes quotes and parentheses so the link can sit inside onclick='...'", () => {
    expect(encodeProductLink("https://shop.example/it's(1)")).toBe('https%3A//shop.example/it%27s%281%29');
  });
});

describe('decodeProductLink', () => {
  it('reverses the encoding', () => {
    expect(decodeProductLink('https%3A//shop.example/item%3Fid%3D1')).toBe('https://shop.example/item?id=1');
  });

  it('leaves plain URLs alone', () => {
    expect(decodeProductLink('https://shop.example/item/42')).toBe('https://shop.example/item/42');
  });

  it('returns malformed input unchanged', () => {
    expect(decodeProductLink('https://shop.example/100%')).toBe('https://shop.example/100%');
  });
});
