import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { AxiosError } from 'axios';
import {
  CLASS_BATCH_FILE_NAME,
  fetchAll,
  fetchClassBatch,
  fetchSpecies,
  GbifClient,
  isLegitSpecies,
  rawFilePath,
} from '../../../src/lib/fetcher/index.js';
import { ConfigError, FetchError, FileIOError } from '../../../src/utils/errors.js';
import { serializeJSON } from '../../../src/utils/staging.js';
import {
  createFakeHttp,
  createTempDir,
  GBIF_URL,
  readJSON,
  removeTempDir,
  routeGbif,
  type FakeHttp,
} from '../../helpers/fixtures.js';

const redDeerDetail = {
  key: 2440954,
  scientificName: 'Cervus elaphus',
  commonName: 'Cerf élaphe',
  iucnStatus: 'LC',
  rank: 'SPECIES',
};

const lynxDetail = {
  key: 2435240,
  scientificName: 'Lynx lynx',
  rank: 'SPECIES',
};

describe('GbifClient', () => {
  let fake: FakeHttp;

  beforeEach(() => {
    fake = createFakeHttp();
  });

  it('should refuse a malformed base URL', () => {
    expect(() => new GbifClient(fake.http, 'not a url')).toThrow(ConfigError);
  });

  it('should strip trailing slashes from the base URL', async () => {
    fake.get.mockResolvedValue({ status: 200, data: { results: [], endOfRecords: true } });
    const gbif = new GbifClient(fake.http, `${GBIF_URL}//`);

    await gbif.searchSpecies({ q: 'Lynx lynx', limit: 1 }, 'Lynx lynx');

    expect(fake.get).toHaveBeenCalledWith(`${GBIF_URL}/species/search`, {
      params: { q: 'Lynx lynx', limit: 1 },
    });
  });

  it('should keep only object results of a search page', async () => {
    fake.get.mockResolvedValue({
      status: 200,
      data: { results: [{ key: 1 }, 'junk', null, { key: 2 }], endOfRecords: false },
    });
    const gbif = new GbifClient(fake.http, GBIF_URL);

    const page = await gbif.searchSpecies({ class: 'Aves' }, 'Aves');

    expect(page).toEqual({ results: [{ key: 1 }, { key: 2 }], endOfRecords: false });
  });

  it('should raise FetchError when no result matches', async () => {
    routeGbif(fake.get, {});
    const gbif = new GbifClient(fake.http, GBIF_URL);

    await expect(gbif.resolveUsageKey('Nope nope')).rejects.toThrow('No GBIF result for "Nope nope"');
  });

  it('should raise FetchError when the best match has no key', async () => {
    fake.get.mockResolvedValue({ status: 200, data: { results: [{ scientificName: 'X y' }] } });
    const gbif = new GbifClient(fake.http, GBIF_URL);

    await expect(gbif.resolveUsageKey('X y')).rejects.toThrow('GBIF result for "X y" has no usage key');
  });

  it('should raise FetchError when the body is not an object', async () => {
    fake.get.mockResolvedValue({ status: 200, data: '<html>' });
    const gbif = new GbifClient(fake.http, GBIF_URL);

    await expect(gbif.getSpecies(1, 'X y')).rejects.toThrow(
      `GBIF response from ${GBIF_URL}/species/1 is not a JSON object`,
    );
  });

  it('should wrap network failures in FetchError', async () => {
    fake.get.mockRejectedValue(new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED'));
    const gbif = new GbifClient(fake.http, GBIF_URL);

    const error = await gbif.resolveUsageKey('Lynx lynx').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({
      species: 'Lynx lynx',
      message: `GBIF request ${GBIF_URL}/species/search failed: connect ECONNREFUSED`,
    });
  });
});

describe('Fetcher', () => {
  let dir: string;
  let fake: FakeHttp;
  let gbif: GbifClient;

  beforeEach(async () => {
    dir = await createTempDir();
    fake = createFakeHttp();
    gbif = new GbifClient(fake.http, GBIF_URL);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('fetchSpecies()', () => {
    it('should search, download the detail and stage it verbatim', async () => {
      routeGbif(fake.get, { 'Cervus elaphus': { key: 2440954, detail: redDeerDetail } });

      const result = await fetchSpecies(gbif, 'Cervus elaphus', dir);

      expect(result.usageKey).toBe(2440954);
      expect(result.path).toBe(join(dir, 'gbif_Cervus_elaphus.json'));
      expect(result.payload).toEqual(redDeerDetail);
      expect(await readFile(result.path, 'utf8')).toBe(serializeJSON(redDeerDetail));
      expect(fake.get).toHaveBeenNthCalledWith(1, `${GBIF_URL}/species/search`, {
        params: { q: 'Cervus elaphus', limit: 1 },
      });
      expect(fake.get).toHaveBeenNthCalledWith(2, `${GBIF_URL}/species/2440954`, { params: undefined });
    });

    it('should not stage anything when the species is unknown', async () => {
      routeGbif(fake.get, {});

      await expect(fetchSpecies(gbif, 'Nope nope', dir)).rejects.toBeInstanceOf(FetchError);
      await expect(readFile(rawFilePath(dir, 'Nope nope'), 'utf8')).rejects.toThrow();
    });
  });

  describe('fetchAll()', () => {
    it('should continue past a species that fails', async () => {
      routeGbif(fake.get, {
        'Cervus elaphus': { key: 2440954, detail: redDeerDetail },
        'Lynx lynx': { key: 2435240, detail: lynxDetail },
      });

      const result = await fetchAll(gbif, ['Cervus elaphus', 'Nope nope', 'Lynx lynx'], dir);

      expect(result.fetched.map((entry) => entry.species)).toEqual(['Cervus elaphus', 'Lynx lynx']);
      expect(result.failed).toHaveLength(1);
      expect(result.failed[0]?.species).toBe('Nope nope');
      expect(result.failed[0]?.error.message).toBe('No GBIF result for "Nope nope"');
      expect(await readJSON(join(dir, 'gbif_Lynx_lynx.json'))).toEqual(lynxDetail);
    });

    it('should stop when staging files cannot be written', async () => {
      routeGbif(fake.get, { 'Cervus elaphus': { key: 2440954, detail: redDeerDetail } });
      const blocker = join(dir, 'blocker');
      await writeFile(blocker, 'x');

      await expect(fetchAll(gbif, ['Cervus elaphus'], join(blocker, 'raw'))).rejects.toBeInstanceOf(
        FileIOError,
      );
    });
  });

  describe('fetchClassBatch()', () => {
    it('should page through each class and keep legitimate species', async () => {
      fake.get.mockImplementation(
        async (_url: string, config: { params: { class: string; offset: number } }) => {
          const { class: className, offset } = config.params;
          if (className === 'Aves') {
            throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED');
          }
          const pages: Record<number, unknown[]> = {
            0: [
              { scientificName: 'Panthera leo' },
              { scientificName: 'Bacteria sp.' },
              { scientificName: 'Lynx lynx' },
            ],
            3: [{ scientificName: 'Vulpes vulpes' }],
          };
          return { status: 200, data: { results: pages[offset] ?? [], endOfRecords: false } };
        },
      );

      const result = await fetchClassBatch(gbif, ['Mammalia', 'Aves'], dir, {
        perClass: 3,
        maxRecords: 500,
        rateLimitDelayMs: 0,
      });

      expect(result.path).toBe(join(dir, CLASS_BATCH_FILE_NAME));
      expect(result.speciesByClass).toEqual({ Mammalia: 3, Aves: 0 });
      expect(result.failed.map((failure) => failure.species)).toEqual(['Aves']);
      expect(await readJSON(result.path)).toEqual({
        Mammalia: [
          { scientificName: 'Panthera leo' },
          { scientificName: 'Lynx lynx' },
          { scientificName: 'Vulpes vulpes' },
        ],
        Aves: [],
      });
      expect(fake.get).toHaveBeenNthCalledWith(2, `${GBIF_URL}/species/search`, {
        params: { rank: 'SPECIES', class: 'Mammalia', limit: 1, offset: 3 },
      });
    });

    it('should give up on a class after examining maxRecords entries', async () => {
      fake.get.mockResolvedValue({
        status: 200,
        data: {
          results: [{ scientificName: 'Tobacco mosaic virus' }, { scientificName: 'Fungus x' }],
          endOfRecords: false,
        },
      });

      const result = await fetchClassBatch(gbif, ['Insecta'], dir, {
        perClass: 10,
        maxRecords: 2,
        rateLimitDelayMs: 0,
      });

      expect(result.speciesByClass).toEqual({ Insecta: 0 });
      expect(fake.get).toHaveBeenCalledTimes(1);
    });

    it('should stop at the end of records', async () => {
      fake.get.mockResolvedValue({
        status: 200,
        data: { results: [{ scientificName: 'Pica pica' }], endOfRecords: true },
      });

      const result = await fetchClassBatch(gbif, ['Aves'], dir, {
        perClass: 5,
        maxRecords: 500,
        rateLimitDelayMs: 0,
      });

      expect(result.speciesByClass).toEqual({ Aves: 1 });
      expect(fake.get).toHaveBeenCalledTimes(1);
    });
  });
});

describe('isLegitSpecies()', () => {
  it('should accept ordinary species names', () => {
    expect(isLegitSpecies({ scientificName: 'Panthera tigris' })).toBe(true);
  });

  it('should exclude microbes, open nomenclature and hybrids', () => {
    expect(isLegitSpecies({ scientificName: 'Escherichia bacterium' })).toBe(false);
    expect(isLegitSpecies({ scientificName: 'Felis sp.' })).toBe(false);
    expect(isLegitSpecies({ scientificName: 'Incertae sedis' })).toBe(false);
    expect(isLegitSpecies({ scientificName: 'Mus hybr. musculus' })).toBe(false);
  });

  it('should accept entries without a name', () => {
    expect(isLegitSpecies({ key: 1 })).toBe(true);
  });
});
