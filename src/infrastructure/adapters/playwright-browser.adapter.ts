import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Browser, BrowserContext } from 'playwright-core';
import { FetchOutcome, fetchFailure } from '../../domain/entities/fetch-outcome.entity';
import { FetchTier } from '../../domain/enums/fetch-tier.enum';
import { PageFetcherPort } from '../../domain/ports/page-fetcher.port';
import { errorMessage } from '../../shared/utils/error-message';
import { BLOCKED_STATUSES } from './http-transport.adapter';

/**
 * Tier 3: Chromium headless vía playwright-core.
 *
 * El navegador se lanza la primera vez que se necesita y se comparte;
 * cada página usa su propio contexto. Si playwright-core no encuentra
 * un Chromium, el tier responde `unavailable` y no se vuelve a intentar.
 */
@Injectable()
export class PlaywrightBrowserAdapter implements PageFetcherPort, OnModuleDestroy {
  readonly tier = FetchTier.BROWSER;
  private readonly logger = new Logger(PlaywrightBrowserAdapter.name);
  private readonly timeoutMs: number;
  private readonly executablePath: string | undefined;
  private readonly userAgents: string[];
  private browserPromise: Promise<Browser> | null = null;
  private unavailableReason: string | null = null;

  constructor(private readonly config: ConfigService) {
    this.timeoutMs = this.config.get<number>('scraper.timeouts.browser', 30000);
    this.executablePath = this.config.get<string>('scraper.browserExecutablePath') || undefined;
    this.userAgents = this.config.get<string[]>('scraper.userAgents', []);
  }

  async onModuleDestroy(): Promise<void> {
    await this.dispose();
  }

  async fetch(url: string): Promise<FetchOutcome> {
    if (this.unavailableReason) {
      return fetchFailure('unavailable', this.unavailableReason);
    }

    let browser: Browser;
    try {
      browser = await this.getBrowser();
    } catch (error) {
      this.unavailableReason = errorMessage(error);
      this.browserPromise = null;
      this.logger.warn(`[Browser] No se pudo iniciar Chromium: ${this.unavailableReason}`);
      return fetchFailure('unavailable', this.unavailableReason);
    }

    let context: BrowserContext;
    try {
      context = await browser.newContext({
        viewport: { width: 1366, height: 768 },
        locale: 'en-IN',
        timezoneId: 'Asia/Kolkata',
        ignoreHTTPSErrors: true,
        ...(this.userAgents.length > 0
          ? { userAgent: this.userAgents[Math.floor(Math.random() * this.userAgents.length)] }
          : {}),
      });
    } catch (error) {
      // Navegador muerto: se descarta para relanzarlo en el próximo fetch
      if (!browser.isConnected()) this.browserPromise = null;
      return fetchFailure('network_error', errorMessage(error));
    }

    try {
      const page = await context.newPage();
      const response = await page.goto(url, {
        waitUntil: 'domcontentloaded',
        timeout: this.timeoutMs,
      });
      const status = response?.status() ?? 200;

      if (BLOCKED_STATUSES.has(status)) return fetchFailure('blocked', undefined, status);
      if (status >= 400) return fetchFailure('http_error', undefined, status);

      // Dar tiempo a que el JS pinte el contenido
      await page.waitForLoadState('networkidle', { timeout: 5000 }).catch(() => undefined);

      return { ok: true, html: await page.content(), status };
    } catch (error) {
      const message = errorMessage(error);
      return fetchFailure(message.includes('Timeout') ? 'timeout' : 'network_error', message);
    } finally {
      await context.close().catch((err: unknown) =>
        this.logger.debug(`[Browser] Error cerrando contexto: ${errorMessage(err)}`),
      );
    }
  }

  async dispose(): Promise<void> {
    if (!this.browserPromise) return;
    const pending = this.browserPromise;
    this.browserPromise = null;
    try {
      const browser = await pending;
      await browser.close();
      this.logger.log('[Browser] Chromium cerrado');
    } catch (error) {
      this.logger.debug(`[Browser] Error al cerrar: ${errorMessage(error)}`);
    }
  }

  /** Un solo lanzamiento aunque lleguen varias páginas a la vez */
  private getBrowser(): Promise<Browser> {
    if (this.browserPromise) return this.browserPromise;

    const launching: Promise<Browser> = this.launch().then((browser) => {
      // Si Chromium se cae, el próximo fetch lanza uno nuevo
      browser.on('disconnected', () => {
        if (this.browserPromise !== launching) return;
        this.logger.warn('[Browser] Chromium desconectado');
        this.browserPromise = null;
      });
      return browser;
    });
    this.browserPromise = launching;
    return launching;
  }

  private async launch(): Promise<Browser> {
    const { chromium } = await import('playwright-core');
    const browser = await chromium.launch({
      headless: true,
      ...(this.executablePath ? { executablePath: this.executablePath } : {}),
      args: ['--no-sandbox', '--disable-dev-shm-usage'],
    });
    this.logger.log('[Browser] Chromium iniciado');
    return browser;
  }
}
