import { describe, it, expect, afterEach } from 'vitest';
import { JsdomRenderer, RenderPool, type PageRenderer } from '../renderer.js';
import { mockFetch } from '../../__tests__/helpers/fixtures.js';

const originalFetch = globalThis.fetch;

const SCRIPTED_PAGE = `<html><body><div id="app"></div>
<script>document.getElementById('app').textContent = 'Rendered by script';</script>
</body></html>`;

describe('JsdomRenderer', () => {
  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it('returns the DOM after inline scripts have run', async () => {
    mockFetch({ 'https://example.com/app': SCRIPTED_PAGE });
    const renderer = new JsdomRenderer({ timeoutMs: 1000, userAgent: 'test-agent', settleMs: 0, runScripts: true });

    const html = await renderer.render('https://example.com/app');

    expect(html).toContain('<div id="app">Rendered by script</div>');
  });

  it('leaves the markup untouched with scripts disabled', async () => {
    mockFetch({ 'https://example.com/app': SCRIPTED_PAGE });
    const renderer = new JsdomRenderer({ timeoutMs: 1000, userAgent: 'test-agent', settleMs: 0, runScripts: false });

    const html = await renderer.render('https://example.com/app');

    expect(html).toContain('<div id="app"></div>');
  });

  it('runs scripts for one page when the caller opts in', async () => {
    mockFetch({ 'https://example.com/app': SCRIPTED_PAGE });
    const renderer = new JsdomRenderer({ timeoutMs: 1000, userAgent: 'test-agent', settleMs: 0, runScripts: false });

    const html = await renderer.render('https://example.com/app', undefined, true);

    expect(html).toContain('<div id="app">Rendered by script</div>');
  });

  it('propagates fetch failures', async () => {
    mockFetch({ 'https://example.com/app': { status: 502 } });
    const renderer = new JsdomRenderer({ timeoutMs: 1000, userAgent: 'test-agent', settleMs: 0, runScripts: true });

    await expect(renderer.render('https://example.com/app')).rejects.toThrow('HTTP 502');
  });
});

describe('RenderPool', () => {
  it('returns the renderer to the pool when rendering throws', async () => {
    let created = 0;
    const pool = new RenderPool(1, (): PageRenderer => {
      created++;
      return {
        render: async (url) => {
          if (url.endsWith('/bad')) throw new Error('render crashed');
          return `<html>${url}</html>`;
        },
        close: async () => undefined,
      };
    });

    await expect(pool.render('https://example.com/bad')).rejects.toThrow('render crashed');
    expect(pool.inUse).toBe(0);
    await expect(pool.render('https://example.com/good')).resolves.toBe('<html>https://example.com/good</html>');
    expect(created).toBe(1);
  });

  it('closes pooled renderers', async () => {
    let closed = 0;
    const pool = new RenderPool(2, () => ({
      render: async () => '<html></html>',
      close: async () => {
        closed++;
      },
    }));
    await Promise.all([pool.render('https://example.com/a'), pool.render('https://example.com/b')]);

    await pool.close();

    expect(closed).toBe(2);
    await expect(pool.render('https://example.com/c')).rejects.toThrow('Pool is closed');
  });
});
