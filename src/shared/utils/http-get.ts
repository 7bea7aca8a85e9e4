import * as http from 'http';
import * as https from 'https';
import * as zlib from 'zlib';
import { Readable } from 'stream';

export type HttpGetResult =
  | { kind: 'response'; status: number; body: string; url: string }
  | { kind: 'error'; error: 'timeout' | 'network'; message: string };

export interface HttpGetOptions {
  /** Tiempo total (incluye redirects) */
  timeoutMs: number;
  maxRedirects: number;
  headers: http.OutgoingHttpHeaders;
  agent?: http.Agent;
  /** Opciones TLS extra para https (ciphers, ecdhCurve, ...) */
  tls?: Pick<https.RequestOptions, 'ciphers' | 'ecdhCurve' | 'secureOptions' | 'minVersion'>;
}

/** Cuerpos más grandes se cortan: ninguna página de contacto pesa tanto */
const MAX_BODY_BYTES = 5 * 1024 * 1024;

/**
 * GET con redirects manuales, timeout global y descompresión.
 * Nunca rechaza: los errores vuelven como { kind: 'error' }.
 */
export function httpGet(url: string, options: HttpGetOptions): Promise<HttpGetResult> {
  const deadline = Date.now() + options.timeoutMs;
  return requestOnce(url, options, deadline, options.maxRedirects);
}

function requestOnce(
  url: string,
  options: HttpGetOptions,
  deadline: number,
  redirectsLeft: number,
): Promise<HttpGetResult> {
  return new Promise((resolve) => {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      resolve({ kind: 'error', error: 'network', message: `URL inválida: ${url}` });
      return;
    }

    const isHttps = parsed.protocol === 'https:';
    if (!isHttps && parsed.protocol !== 'http:') {
      resolve({ kind: 'error', error: 'network', message: `Protocolo no soportado: ${parsed.protocol}` });
      return;
    }

    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      resolve({ kind: 'error', error: 'timeout', message: `Timeout antes de pedir ${url}` });
      return;
    }

    const requestOptions: https.RequestOptions = {
      method: 'GET',
      headers: options.headers,
      ...(options.agent ? { agent: options.agent } : {}),
      ...(isHttps ? { rejectUnauthorized: false, ...options.tls } : {}),
    };

    let settled = false;
    let timer: NodeJS.Timeout | undefined;
    const finish = (result: HttpGetResult) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      resolve(result);
    };

    const onResponse = (res: http.IncomingMessage) => {
      const status = res.statusCode ?? 0;

      if (status >= 300 && status < 400 && res.headers.location && redirectsLeft > 0) {
        res.resume();
        let next: string;
        try {
          next = new URL(res.headers.location, url).href;
        } catch {
          finish({ kind: 'error', error: 'network', message: `Redirect inválido: ${res.headers.location}` });
          return;
        }
        requestOnce(next, options, deadline, redirectsLeft - 1).then(finish, (err: Error) =>
          finish({ kind: 'error', error: 'network', message: err.message }),
        );
        return;
      }

      const stream = decodeBody(res);
      const chunks: Buffer[] = [];
      let size = 0;

      stream.on('data', (chunk: Buffer) => {
        size += chunk.length;
        if (size > MAX_BODY_BYTES) {
          stream.destroy();
          res.destroy();
          finish({ kind: 'response', status, body: Buffer.concat(chunks).toString('utf-8'), url });
          return;
        }
        chunks.push(chunk);
      });
      stream.on('end', () =>
        finish({ kind: 'response', status, body: Buffer.concat(chunks).toString('utf-8'), url }),
      );
      stream.on('error', (err: Error) => finish({ kind: 'error', error: 'network', message: err.message }));
    };

    const req = isHttps
      ? https.request(parsed, requestOptions, onResponse)
      : http.request(parsed, requestOptions, onResponse);

    req.on('error', (err) => finish({ kind: 'error', error: 'network', message: err.message }));
    // Plazo total: también corta servidores que envían de a un byte
    timer = setTimeout(() => {
      finish({ kind: 'error', error: 'timeout', message: `Timeout (${options.timeoutMs}ms) en ${url}` });
      req.destroy();
    }, remaining);

    req.end();
  });
}

function decodeBody(res: http.IncomingMessage): Readable {
  switch (res.headers['content-encoding']) {
    case 'gzip':
      return res.pipe(zlib.createGunzip());
    case 'deflate':
      return res.pipe(zlib.createInflate());
    case 'br':
      return res.pipe(zlib.createBrotliDecompress());
    default:
      return res;
  }
}
