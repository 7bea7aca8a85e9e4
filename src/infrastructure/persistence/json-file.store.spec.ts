import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CompanyResult } from '../../domain/entities/company-result.entity';
import { ResolutionRecord } from '../../domain/entities/resolution.entity';
import { ResultSource, ResultStatus } from '../../domain/enums/result-status.enum';
import { JsonFileStore } from './json-file.store';
import { resolutionRecordCodec, resultRecordCodec } from './record.codecs';

describe('JsonFileStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'contacts-store-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('un archivo ausente deja el store vacío', async () => {
    const store = new JsonFileStore(path.join(dir, 'urls.json'), resolutionRecordCodec);
    await store.load();
    expect(store.size).toBe(0);
  });

  it('persiste en snake_case y lo vuelve a cargar', async () => {
    const file = path.join(dir, 'urls.json');
    const store = new JsonFileStore<ResolutionRecord>(file, resolutionRecordCodec);
    store.set('acme', { url: 'https://acme.in', directoryUrl: null });
    await store.flush();

    expect(JSON.parse(await fs.readFile(file, 'utf-8'))).toEqual({
      acme: { url: 'https://acme.in', directory_url: null },
    });

    const reloaded = new JsonFileStore(file, resolutionRecordCodec);
    await reloaded.load();
    expect(reloaded.get('acme')).toEqual({ url: 'https://acme.in', directoryUrl: null });
  });

  it('un archivo corrupto no impide seguir', async () => {
    const file = path.join(dir, 'urls.json');
    await fs.writeFile(file, '{not json', 'utf-8');
    const store = new JsonFileStore(file, resolutionRecordCodec);

    await store.load();
    expect(store.size).toBe(0);

    store.set('acme', { url: null, directoryUrl: null });
    await store.flush();
    expect(JSON.parse(await fs.readFile(file, 'utf-8'))).toEqual({
      acme: { url: null, directory_url: null },
    });
  });

  it('descarta entradas con forma inválida', async () => {
    const file = path.join(dir, 'urls.json');
    await fs.writeFile(
      file,
      JSON.stringify({ acme: { url: 'https://acme.in', directory_url: null }, broken: 42 }),
      'utf-8',
    );
    const store = new JsonFileStore(file, resolutionRecordCodec);

    await store.load();

    expect(store.size).toBe(1);
    expect(store.has('broken')).toBe(false);
  });

  it('flush no deja temporales y crea el directorio', async () => {
    const nested = path.join(dir, 'cache', 'urls.json');
    const store = new JsonFileStore(nested, resolutionRecordCodec);
    store.set('acme', { url: 'https://acme.in', directoryUrl: null });

    await store.flush();
    await store.flush();

    expect(await fs.readdir(path.join(dir, 'cache'))).toEqual(['urls.json']);
  });
});

describe('resultRecordCodec', () => {
  it('acepta ids numéricos de archivos viejos', () => {
    const result = resultRecordCodec.decode({
      id: 7,
      fname: 'Acme',
      website_url: 'https://acme.in',
      emails: ['info@acme.in'],
      phone_numbers: [],
      about: null,
      address: null,
      gstin: null,
      cin: null,
      source: 'official_website',
      status: 'success',
      error: null,
    });

    expect(result).toBeInstanceOf(CompanyResult);
    expect(result?.id).toBe('7');
    expect(result?.source).toBe(ResultSource.OFFICIAL_WEBSITE);
  });

  it('rechaza un status desconocido', () => {
    expect(resultRecordCodec.decode({ id: '1', fname: 'Acme', status: 'done' })).toBeNull();
  });

  it('encode usa las claves de la salida', () => {
    const result = new CompanyResult({
      id: '1',
      fname: 'Acme',
      status: ResultStatus.SKIPPED,
      error: 'name_too_short',
    });

    expect(resultRecordCodec.encode(result)).toEqual({
      id: '1',
      fname: 'Acme',
      website_url: null,
      emails: [],
      phone_numbers: [],
      about: null,
      address: null,
      gstin: null,
      cin: null,
      source: 'none',
      status: 'skipped',
      error: 'name_too_short',
    });
  });
});
