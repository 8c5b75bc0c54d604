import { describe, it, expect } from 'vitest';
import {
  getPathExtension,
  isDomainAllowed,
  isEdgeUrl,
  isValidDomain,
  matchesDomain,
  parseAbsoluteUrl,
  shouldRewrite,
  trimUrl,
} from '../src/validation';
import { testConfig } from './helpers';

describe('trimUrl', () => {
  it('drops the spaces and control characters the URL parser ignores', () => {
    expect(trimUrl(' \t\nhttps://example.com/a b.jpg\r\n ')).toBe('https://example.com/a b.jpg');
  });

  it('keeps other whitespace', () => {
    expect(trimUrl('\u00a0/a.jpg')).toBe('\u00a0/a.jpg');
  });
});

describe('isValidDomain', () => {
  it('accepts public host names', () => {
    expect(isValidDomain('example.com')).toBe(true);
    expect(isValidDomain('img.cdn-1.example.co.uk')).toBe(true);
  });

  it.each([
    'localhost',
    '192.168.1.10',
    '::1',
    '[::1]',
    'printer.local',
    'files.internal',
    'nas.lan',
    'intranet',
    '',
  ])('rejects %s', (domain) => {
    expect(isValidDomain(domain)).toBe(false);
  });
});

describe('matchesDomain', () => {
  it('matches the domain itself and its subdomains', () => {
    expect(matchesDomain('example.com', 'example.com')).toBe(true);
    expect(matchesDomain('img.example.com', 'example.com')).toBe(true);
    expect(matchesDomain('EXAMPLE.com', 'example.com')).toBe(true);
  });

  it('does not match on a shared suffix', () => {
    expect(matchesDomain('notexample.com', 'example.com')).toBe(false);
  });

  it('never matches an empty entry', () => {
    expect(matchesDomain('example.com', ' ')).toBe(false);
  });
});

describe('isDomainAllowed', () => {
  it('returns false for an empty allow-list', () => {
    expect(isDomainAllowed('example.com', [])).toBe(false);
  });

  it('checks every listed domain', () => {
    expect(isDomainAllowed('static.example.org', ['example.com', 'example.org'])).toBe(true);
  });
});

describe('parseAbsoluteUrl', () => {
  it('parses absolute and protocol-relative URLs', () => {
    expect(parseAbsoluteUrl('https://example.com/a.jpg')?.hostname).toBe('example.com');
    expect(parseAbsoluteUrl('//example.com/a.jpg')?.hostname).toBe('example.com');
  });

  it('returns null for relative URLs', () => {
    expect(parseAbsoluteUrl('/example.com/a.jpg')).toBeNull();
    expect(parseAbsoluteUrl('a.jpg')).toBeNull();
  });
});

describe('isEdgeUrl', () => {
  it('compares the host with the edge domain', () => {
    expect(isEdgeUrl('https://cdn.test/example.com/a.jpg', 'cdn.test')).toBe(true);
    expect(isEdgeUrl('//CDN.test/example.com/a.jpg', 'cdn.test')).toBe(true);
  });

  it('does not match hosts that merely contain the edge domain', () => {
    expect(isEdgeUrl('https://cdn.test.example.com/a.jpg', 'cdn.test')).toBe(false);
    expect(isEdgeUrl('https://example.com/cdn.test/a.jpg', 'cdn.test')).toBe(false);
  });

  it('is false without an edge domain', () => {
    expect(isEdgeUrl('https://cdn.test/example.com/a.jpg', '')).toBe(false);
  });
});

describe('getPathExtension', () => {
  it('reads the extension of the last segment only', () => {
    expect(getPathExtension('/a/b.tar.GZ')).toBe('gz');
    expect(getPathExtension('/dir.v2/file')).toBe('');
    expect(getPathExtension('/')).toBe('');
  });
});

describe('shouldRewrite', () => {
  const config = testConfig();

  it('accepts media on allow-listed hosts and their subdomains', () => {
    expect(shouldRewrite('https://example.com/wp-content/photo.jpg', config)).toBe(true);
    expect(shouldRewrite('https://img.example.com/a.png', config)).toBe(true);
    expect(shouldRewrite('http://example.com/clip.mp4', config)).toBe(true);
  });

  it('rejects hosts outside the allow-list', () => {
    expect(shouldRewrite('https://notexample.com/a.png', config)).toBe(false);
    expect(shouldRewrite('https://other.org/a.png', config)).toBe(false);
  });

  it('accepts any public host when the allow-list is empty', () => {
    expect(shouldRewrite('https://other.org/a.png', testConfig({ allowedOriginDomains: [] }))).toBe(true);
  });

  it('gates on the media extension', () => {
    expect(shouldRewrite('https://example.com/files/report.pdf', config)).toBe(false);
    expect(shouldRewrite('https://example.com/files/report.jpg', config)).toBe(true);
    expect(shouldRewrite('https://example.com/PHOTO.JPG', config)).toBe(true);
    expect(shouldRewrite('https://example.com/gallery/', config)).toBe(false);
  });

  it('ignores the query string when reading the extension', () => {
    expect(shouldRewrite('https://example.com/a.jpg?v=2', config)).toBe(true);
    expect(shouldRewrite('https://example.com/image.cgi?file=b.jpg', config)).toBe(false);
  });

  it('rejects URLs that already point at the edge', () => {
    expect(shouldRewrite('https://cdn.test/example.com/wp-content/photo.jpg', config)).toBe(false);
    expect(shouldRewrite(' https://cdn.test/example.com/wp-content/photo.jpg', config)).toBe(false);
  });

  it('ignores surrounding whitespace', () => {
    expect(shouldRewrite(' https://example.com/a.jpg\n', config)).toBe(true);
    expect(shouldRewrite(' https://notexample.com/a.jpg', config)).toBe(false);
  });

  it('resolves relative URLs against the site URL', () => {
    expect(shouldRewrite('/wp-content/uploads/a.jpg', config)).toBe(true);
    expect(shouldRewrite('uploads/a.webp', config)).toBe(true);
  });

  it('rejects non-http schemes and internal hosts', () => {
    expect(shouldRewrite('data:image/png;base64,AAAA', config)).toBe(false);
    expect(shouldRewrite('ftp://example.com/a.jpg', config)).toBe(false);
    const open = testConfig({ allowedOriginDomains: [] });
    expect(shouldRewrite('https://192.168.1.10/a.jpg', open)).toBe(false);
    expect(shouldRewrite('http://localhost/a.jpg', open)).toBe(false);
  });

  it('rejects empty input', () => {
    expect(shouldRewrite('', config)).toBe(false);
    expect(shouldRewrite('   ', config)).toBe(false);
  });
});
