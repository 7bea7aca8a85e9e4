import { ResolutionRecord } from '../../domain/entities/resolution.entity';
import { FakeSearchProvider, InMemoryStore, hit } from '../../../test/helpers/fakes';
import { testConfig } from '../../../test/helpers/test-config';
import { IdentityResolverService } from './identity-resolver.service';

describe('IdentityResolverService', () => {
  let urlCache: InMemoryStore<ResolutionRecord>;

  beforeEach(() => {
    urlCache = new InMemoryStore<ResolutionRecord>();
  });

  it('un hit de cache no toca el buscador', async () => {
    const provider = new FakeSearchProvider();
    urlCache.set('acme', { url: 'https://acme.in', directoryUrl: null });
    const resolver = new IdentityResolverService(testConfig(), provider);

    const resolution = await resolver.resolve('ACME Pvt Ltd', urlCache);

    expect(resolution).toEqual({ url: 'https://acme.in', directoryUrl: null, cached: true });
    expect(provider.queries).toEqual([]);
  });

  it('un nombre que ya es dominio se usa directo', async () => {
    const provider = new FakeSearchProvider();
    const resolver = new IdentityResolverService(testConfig(), provider);

    const resolution = await resolver.resolve('Sulekha.com', urlCache);

    expect(resolution).toEqual({ url: 'https://sulekha.com', directoryUrl: null, cached: false });
    expect(urlCache.get('sulekhacom')).toEqual({ url: 'https://sulekha.com', directoryUrl: null });
    expect(provider.queries).toEqual([]);
  });

  it('elige el mejor candidato y guarda el primer directorio', async () => {
    const provider = new FakeSearchProvider(() => [
      hit('https://www.linkedin.com/company/acme'),
      hit('https://www.justdial.com/Mumbai/Acme'),
      hit('https://acme.in/'),
    ]);
    const resolver = new IdentityResolverService(testConfig(), provider);

    const resolution = await resolver.resolve('Acme', urlCache);

    expect(provider.queries).toEqual(['Acme India official website']);
    expect(resolution).toEqual({
      url: 'https://acme.in/',
      directoryUrl: 'https://www.justdial.com/Mumbai/Acme',
      cached: false,
    });

    const again = await resolver.resolve('Acme', urlCache);
    expect(again.cached).toBe(true);
    expect(provider.queries).toHaveLength(1);
  });

  it('reintenta la búsqueda ante errores', async () => {
    let calls = 0;
    const provider = new FakeSearchProvider(() => {
      calls++;
      return calls < 3 ? new Error('DDG HTTP 429') : [hit('https://acme.in/')];
    });
    const resolver = new IdentityResolverService(testConfig(), provider);

    const resolution = await resolver.resolve('Acme', urlCache);

    expect(provider.queries).toHaveLength(3);
    expect(resolution.url).toBe('https://acme.in/');
  });

  it('agotados los reintentos guarda el resultado negativo', async () => {
    const provider = new FakeSearchProvider(() => new Error('DDG HTTP 503'));
    const resolver = new IdentityResolverService(
      testConfig((cfg) => {
        cfg.search.maxRetries = 1;
      }),
      provider,
    );

    const resolution = await resolver.resolve('Acme', urlCache);

    expect(provider.queries).toHaveLength(2);
    expect(resolution).toEqual({ url: null, directoryUrl: null, cached: false });
    expect(urlCache.get('acme')).toEqual({ url: null, directoryUrl: null });

    await resolver.resolve('Acme', urlCache);
    expect(provider.queries).toHaveLength(2);
  });

  describe('findDirectoryUrl', () => {
    it('devuelve el primer hit de directorio', async () => {
      const provider = new FakeSearchProvider(() => [
        hit('https://acme.in/'),
        hit('https://www.indiamart.com/acme-tools/'),
      ]);
      const resolver = new IdentityResolverService(testConfig(), provider);

      await expect(resolver.findDirectoryUrl('Acme')).resolves.toBe(
        'https://www.indiamart.com/acme-tools/',
      );
      expect(provider.queries).toEqual(['"Acme" site:justdial.com OR site:indiamart.com']);
    });

    it('un error de búsqueda da null', async () => {
      const provider = new FakeSearchProvider(() => new Error('timeout'));
      const resolver = new IdentityResolverService(testConfig(), provider);

      await expect(resolver.findDirectoryUrl('Acme')).resolves.toBeNull();
    });
  });
});
