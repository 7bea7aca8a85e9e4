import * as http from 'http';
import * as zlib from 'zlib';
import { htmlPage } from '../../../test/helpers/fakes';
import { testConfig } from '../../../test/helpers/test-config';
import { HttpTransportAdapter } from './http-transport.adapter';

const PAGE = htmlPage('<h1>Acme Tools</h1>');

describe('HttpTransportAdapter', () => {
  let server: http.Server;
  let baseUrl: string;
  let adapter: HttpTransportAdapter;
  let hugeClosed: Promise<void> = Promise.resolve();

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      switch (req.url) {
        case '/ok':
          res.writeHead(200, { 'Content-Type': 'text/html' });
          res.end(PAGE);
          return;
        case '/gzip':
          res.writeHead(200, { 'Content-Type': 'text/html', 'Content-Encoding': 'gzip' });
          res.end(zlib.gzipSync(PAGE));
          return;
        case '/redirect':
          res.writeHead(302, { Location: '/ok' });
          res.end();
          return;
        case '/loop':
          res.writeHead(301, { Location: '/loop' });
          res.end();
          return;
        case '/blocked':
          res.writeHead(403);
          res.end('Forbidden');
          return;
        case '/trickle': {
          // un byte cada 50ms durante 3s
          res.writeHead(200, { 'Content-Type': 'text/html' });
          let sent = 0;
          const drip = setInterval(() => {
            sent++;
            if (sent >= 60) {
              clearInterval(drip);
              res.end('.');
              return;
            }
            res.write('.');
          }, 50);
          res.on('close', () => clearInterval(drip));
          return;
        }
        case '/huge': {
          // 6 MB comprimidos y la respuesta nunca termina
          res.writeHead(200, { 'Content-Type': 'text/html', 'Content-Encoding': 'gzip' });
          const gzip = zlib.createGzip();
          gzip.pipe(res);
          gzip.write(Buffer.alloc(6 * 1024 * 1024, 'a'));
          gzip.flush();
          hugeClosed = new Promise<void>((resolve) =>
            res.on('close', () => {
              gzip.destroy();
              resolve();
            }),
          );
          return;
        }
        case '/slow':
          // nunca responde
          return;
        default:
          res.writeHead(404);
          res.end('Not found');
      }
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('Servidor sin puerto TCP');
    baseUrl = `http://127.0.0.1:${address.port}`;

    adapter = new HttpTransportAdapter(
      testConfig((cfg) => {
        cfg.timeouts.transport = 300;
        cfg.maxRedirects = 3;
      }),
    );
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('devuelve el HTML de un 200', async () => {
    await expect(adapter.fetch(`${baseUrl}/ok`)).resolves.toEqual({ ok: true, html: PAGE, status: 200 });
  });

  it('descomprime gzip', async () => {
    await expect(adapter.fetch(`${baseUrl}/gzip`)).resolves.toEqual({ ok: true, html: PAGE, status: 200 });
  });

  it('sigue redirects', async () => {
    await expect(adapter.fetch(`${baseUrl}/redirect`)).resolves.toEqual({
      ok: true,
      html: PAGE,
      status: 200,
    });
  });

  it('un bucle de redirects termina como http_error', async () => {
    await expect(adapter.fetch(`${baseUrl}/loop`)).resolves.toEqual({
      ok: false,
      reason: 'http_error',
      status: 301,
    });
  });

  it('403 cuenta como bloqueo', async () => {
    await expect(adapter.fetch(`${baseUrl}/blocked`)).resolves.toEqual({
      ok: false,
      reason: 'blocked',
      status: 403,
    });
  });

  it('404 es http_error', async () => {
    await expect(adapter.fetch(`${baseUrl}/missing`)).resolves.toEqual({
      ok: false,
      reason: 'http_error',
      status: 404,
    });
  });

  it('un servidor que no responde da timeout', async () => {
    const outcome = await adapter.fetch(`${baseUrl}/slow`);
    expect(outcome).toMatchObject({ ok: false, reason: 'timeout' });
  });

  it('el timeout cubre la respuesta completa, no sólo la inactividad', async () => {
    const startedAt = Date.now();
    const outcome = await adapter.fetch(`${baseUrl}/trickle`);
    expect(outcome).toMatchObject({ ok: false, reason: 'timeout' });
    expect(Date.now() - startedAt).toBeLessThan(1500);
  });

  it('un cuerpo demasiado grande se corta y se cierra la conexión', async () => {
    const patient = new HttpTransportAdapter(
      testConfig((cfg) => {
        cfg.timeouts.transport = 10000;
      }),
    );

    const outcome = await patient.fetch(`${baseUrl}/huge`);

    expect(outcome.ok).toBe(true);
    if (outcome.ok) expect(outcome.html.length).toBeLessThanOrEqual(5 * 1024 * 1024);
    await expect(hugeClosed).resolves.toBeUndefined();
  });

  it('un puerto cerrado da network_error', async () => {
    const outcome = await adapter.fetch('http://127.0.0.1:1/');
    expect(outcome).toMatchObject({ ok: false, reason: 'network_error' });
  });
});
