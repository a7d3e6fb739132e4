import { formatBytes, formatValue, humanizeKey, slugify } from '../../apps/web/lib/format';
import { getTools } from '../../apps/web/lib/tools';

describe('format helpers', () => {
  it('humanizes snake_case and camelCase keys', () => {
    expect(humanizeKey('page_speed_score')).toBe('Page speed score');
    expect(humanizeKey('mobileFriendly')).toBe('Mobile friendly');
    expect(humanizeKey('h1')).toBe('H1');
  });

  it('formats byte sizes', () => {
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(2048)).toBe('2.0 KB');
    expect(formatBytes(3 * 1024 * 1024)).toBe('3.0 MB');
  });

  it('formats values for display', () => {
    expect(formatValue(true)).toBe('Yes');
    expect(formatValue(null)).toBe('');
    expect(formatValue(undefined)).toBe('');
    expect(formatValue(['a', 1])).toBe('["a",1]');
    expect(formatValue(3.5)).toBe('3.5');
  });

  it('builds element ids from key paths', () => {
    expect(slugify(['seo', 'Meta Tags'])).toBe('seo-meta-tags');
    expect(slugify(['_links_', 'a.b'])).toBe('links-a-b');
  });
});

describe('getTools', () => {
  it('lists every analysis type once, basic SEO first', () => {
    const types = getTools().map(tool => tool.type);

    expect(types[0]).toBe('seo');
    expect([...types].sort()).toEqual(['ad', 'analytics', 'comprehensive', 'mobile', 'pagespeed', 'searchconsole', 'seo']);
  });

  it('gives each tool four features and a loading message', () => {
    for (const tool of getTools()) {
      expect(tool.features).toHaveLength(4);
      expect(tool.loadingMessage.length).toBeGreaterThan(0);
    }
  });
});
