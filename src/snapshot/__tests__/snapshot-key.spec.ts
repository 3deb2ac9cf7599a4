import {
  buildSnapshotKey,
  compareKeysByRecency,
  formatStamp,
  parseSnapshotKey,
  SITE_LIST_ORIGIN,
  toOriginSlug,
} from '../snapshot-key';

describe('snapshot keys', () => {
  const createdAt = new Date('2026-10-19T10:15:00.123Z');

  describe('toOriginSlug', () => {
    it.each([
      ['https://example.com', 'https_example.com'],
      ['http://localhost:8080', 'http_localhost_8080'],
      ['https://example.com/some/path?q=1', 'https_example.com'],
      [SITE_LIST_ORIGIN, 'site-list'],
      ['odd name_here', 'odd-name-here'],
      ['https://my_site.example.com', 'https_my-site.example.com'],
    ])('should turn %p into %p', (origin, slug) => {
      expect(toOriginSlug(origin)).toBe(slug);
    });

    it('should tell schemes apart', () => {
      expect(toOriginSlug('http://example.com')).not.toBe(
        toOriginSlug('https://example.com'),
      );
    });

    it('should keep a port apart from an underscore in the host', () => {
      expect(toOriginSlug('https://a.com:8443')).toBe('https_a.com_8443');
      expect(toOriginSlug('https://a.com_8443')).toBe('https_a.com-8443');
    });
  });

  it('should format the creation time as a compact UTC stamp', () => {
    expect(formatStamp(createdAt)).toBe('20261019T101500123Z');
  });

  describe('buildSnapshotKey', () => {
    it('should join the origin slug and the stamp', () => {
      expect(buildSnapshotKey('https://example.com', createdAt)).toBe(
        'https_example.com__20261019T101500123Z',
      );
    });

    it('should add a sequence suffix after the first key', () => {
      expect(buildSnapshotKey('https://example.com', createdAt, 2)).toBe(
        'https_example.com__20261019T101500123Z-002',
      );
    });
  });

  describe('parseSnapshotKey', () => {
    it('should read back a built key', () => {
      expect(
        parseSnapshotKey('https_example.com__20261019T101500123Z-002'),
      ).toEqual({
        originSlug: 'https_example.com',
        stamp: '20261019T101500123Z-002',
        createdAt,
      });
    });

    it.each([
      'nope',
      'https_example.com__2026',
      'https_example.com__20261399T101500123Z',
      '../escape__20261019T101500123Z',
    ])('should reject %p', (key) => {
      expect(parseSnapshotKey(key)).toBeNull();
    });
  });

  it('should order keys newest first', () => {
    const keys = [
      'a__20261019T101500000Z',
      'a__20261019T101600000Z',
      'a__20261019T101500000Z-001',
    ];

    expect([...keys].sort(compareKeysByRecency)).toEqual([
      'a__20261019T101600000Z',
      'a__20261019T101500000Z-001',
      'a__20261019T101500000Z',
    ]);
  });
});
