/**
 * Niveles de descarga, del más barato al más caro.
 * Se escala al siguiente sólo si el anterior no consiguió una página válida.
 */
export enum FetchTier {
  /** GET HTTP simple, ~200ms */
  TRANSPORT = 'transport',

  /** GET con huella TLS de Chrome, headers de navegador y proxy SOCKS5 opcional */
  BYPASS = 'bypass',

  /** Chromium headless (playwright-core), ~3-10s */
  BROWSER = 'browser',
}

/** Por qué un tier no entregó la página */
export type FetchFailureReason =
  | 'blocked'
  | 'http_error'
  | 'network_error'
  | 'timeout'
  | 'too_short'
  | 'unavailable';
