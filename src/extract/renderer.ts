import { JSDOM, ResourceLoader, VirtualConsole } from 'jsdom';
import { fetchText } from '../source/http.js';
import { ResourcePool } from '../shared/pool.js';
import { TimeoutError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

/**
 * Produces the DOM of a page after its scripts have run, serialized as HTML.
 * `runScripts` overrides the renderer's own setting for one page.
 */
export interface PageRenderer {
  render(url: string, signal?: AbortSignal, runScripts?: boolean): Promise<string>;
  close(): Promise<void>;
}

export interface JsdomRendererOptions {
  timeoutMs: number;
  userAgent: string;
  /** Extra wait after the load event for late DOM writes. */
  settleMs: number;
  /**
   * Executes page scripts and the external scripts they load. jsdom is not a sandbox,
   * so this is an opt-in for trusted sources.
   */
  runScripts: boolean;
}

/**
 * Renders a page in jsdom. Each render gets its own window, which is closed before
 * returning.
 */
export class JsdomRenderer implements PageRenderer {
  private readonly loader: ResourceLoader;

  constructor(private readonly opts: JsdomRendererOptions) {
    this.loader = new ResourceLoader({ userAgent: opts.userAgent });
  }

  async render(url: string, signal?: AbortSignal, runScripts = this.opts.runScripts): Promise<string> {
    const doc = await fetchText(url, {
      timeoutMs: this.opts.timeoutMs,
      userAgent: this.opts.userAgent,
      signal,
    });
    if (signal?.aborted) throw new TimeoutError(`Render aborted: ${url}`, { url });

    const virtualConsole = new VirtualConsole();
    virtualConsole.on('jsdomError', (err) => {
      logger.debug({ url, error: err.message }, 'Page script error');
    });

    const dom = new JSDOM(doc.body, {
      url: doc.url,
      pretendToBeVisual: true,
      virtualConsole,
      ...(runScripts ? { runScripts: 'dangerously' as const, resources: this.loader } : {}),
    });

    try {
      await this.settle(dom, signal);
      return dom.serialize();
    } finally {
      dom.window.close();
    }
  }

  private settle(dom: JSDOM, signal?: AbortSignal): Promise<void> {
    const { window } = dom;
    return new Promise<void>((resolve) => {
      let timer: NodeJS.Timeout | undefined;
      const done = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', done);
        resolve();
      };
      const afterLoad = () => {
        timer = setTimeout(done, this.opts.settleMs);
      };
      signal?.addEventListener('abort', done, { once: true });
      if (window.document.readyState === 'complete') afterLoad();
      else window.addEventListener('load', afterLoad, { once: true });
    });
  }

  async close(): Promise<void> {
    // windows are closed per render
  }
}

/**
 * A fixed number of renderers shared by all sources. `render` checks one out and
 * always returns it, even when rendering throws.
 */
export class RenderPool implements PageRenderer {
  private readonly pool: ResourcePool<PageRenderer>;

  constructor(size: number, factory: () => PageRenderer) {
    this.pool = new ResourcePool(size, factory, (renderer) => renderer.close());
  }

  get inUse(): number {
    return this.pool.inUse;
  }

  render(url: string, signal?: AbortSignal, runScripts?: boolean): Promise<string> {
    return this.pool.use((renderer) => renderer.render(url, signal, runScripts));
  }

  close(): Promise<void> {
    return this.pool.close();
  }
}
