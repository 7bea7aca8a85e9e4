import { EventEmitter } from 'events';
import { testConfig } from '../../../test/helpers/test-config';
import { PlaywrightBrowserAdapter } from './playwright-browser.adapter';

const mockLaunch = jest.fn();
jest.mock('playwright-core', () => ({
  chromium: { launch: (...args: unknown[]) => mockLaunch(...args) },
}));

const HTML = '<html><body>Acme Tools</body></html>';

class FakeBrowser extends EventEmitter {
  connected = true;
  newContext = jest.fn(async () => ({
    newPage: async () => ({
      goto: async () => ({ status: () => 200 }),
      waitForLoadState: async () => undefined,
      content: async () => HTML,
    }),
    close: async () => undefined,
  }));

  isConnected(): boolean {
    return this.connected;
  }

  async close(): Promise<void> {
    this.connected = false;
  }

  crash(): void {
    this.connected = false;
    this.emit('disconnected');
  }
}

describe('PlaywrightBrowserAdapter', () => {
  let adapter: PlaywrightBrowserAdapter;

  beforeEach(() => {
    mockLaunch.mockReset();
    adapter = new PlaywrightBrowserAdapter(
      testConfig((cfg) => {
        cfg.browserExecutablePath = '/nonexistent/chrome';
      }),
    );
  });

  afterEach(async () => {
    await adapter.dispose();
  });

  it('pasa el ejecutable configurado y devuelve el HTML', async () => {
    mockLaunch.mockResolvedValue(new FakeBrowser());

    await expect(adapter.fetch('https://acme.in/')).resolves.toEqual({ ok: true, html: HTML, status: 200 });
    expect(mockLaunch).toHaveBeenCalledWith(
      expect.objectContaining({ executablePath: '/nonexistent/chrome', headless: true }),
    );
  });

  it('si Chromium no arranca queda unavailable y no lo reintenta', async () => {
    mockLaunch.mockRejectedValue(new Error('Executable doesn\'t exist at /nonexistent/chrome'));

    const first = await adapter.fetch('https://acme.in/');
    const second = await adapter.fetch('https://acme.in/contact');

    expect(first).toEqual({
      ok: false,
      reason: 'unavailable',
      detail: 'Executable doesn\'t exist at /nonexistent/chrome',
    });
    expect(second).toEqual(first);
    expect(mockLaunch).toHaveBeenCalledTimes(1);
  });

  it('relanza Chromium después de una desconexión', async () => {
    const crashed = new FakeBrowser();
    const fresh = new FakeBrowser();
    mockLaunch.mockResolvedValueOnce(crashed).mockResolvedValueOnce(fresh);

    await adapter.fetch('https://acme.in/');
    crashed.crash();
    const outcome = await adapter.fetch('https://acme.in/contact');

    expect(outcome).toMatchObject({ ok: true, status: 200 });
    expect(mockLaunch).toHaveBeenCalledTimes(2);
    expect(fresh.newContext).toHaveBeenCalledTimes(1);
  });

  it('un navegador muerto sin evento se descarta al fallar newContext', async () => {
    const dead = new FakeBrowser();
    dead.newContext.mockImplementationOnce(async () => {
      dead.connected = false;
      throw new Error('Target closed');
    });
    mockLaunch.mockResolvedValueOnce(dead).mockResolvedValueOnce(new FakeBrowser());

    await expect(adapter.fetch('https://acme.in/')).resolves.toEqual({
      ok: false,
      reason: 'network_error',
      detail: 'Target closed',
    });
    await expect(adapter.fetch('https://acme.in/')).resolves.toMatchObject({ ok: true });
    expect(mockLaunch).toHaveBeenCalledTimes(2);
  });
});
