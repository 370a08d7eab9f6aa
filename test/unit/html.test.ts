import { describe, it, expect } from 'vitest';
import { escapeHtml, safeUrl } from '../../src/utils/html.js';

describe('html helpers', () => {
  it('should escape markup characters', () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;');
  });

  it('should allow only web and inline image URLs', () => {
    expect(safeUrl(' https://example.com/a.png ')).toBe('https://example.com/a.png');
    expect(safeUrl('data:image/png;base64,AAAA')).toBe('data:image/png;base64,AAAA');
    expect(safeUrl('javascript:alert(1)')).toBeUndefined();
    expect(safeUrl('/relative.png')).toBeUndefined();
  });
});
