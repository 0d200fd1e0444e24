/**
 * Shared test fixtures: temp staging directories and a fake HTTP client
 */

import { vi, type Mock } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { HttpClient } from '../../src/lib/utils/http-client.js';

export async function createTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'animalia-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function readJSON(path: string): Promise<unknown> {
  return JSON.parse(await readFile(path, 'utf8'));
}

export interface FakeHttp {
  http: HttpClient;
  get: Mock;
  post: Mock;
}

/**
 * An HttpClient whose `get` and `post` are Vitest mocks
 */
export function createFakeHttp(): FakeHttp {
  const get = vi.fn();
  const post = vi.fn();
  return { http: { get, post }, get, post };
}

export const GBIF_URL = 'https://api.gbif.test/v1';
export const API_URL = 'http://localhost:3999/animaux';

/**
 * Route GBIF requests of a fake client to canned search hits and details
 */
export function routeGbif(
  get: FakeHttp['get'],
  species: Record<string, { key: number; detail: Record<string, unknown> }>,
): void {
  get.mockImplementation(async (url: string, config?: { params?: { q?: string } }) => {
    if (url === `${GBIF_URL}/species/search`) {
      const hit = species[config?.params?.q ?? ''];
      return {
        status: 200,
        data: {
          results: hit ? [{ key: hit.key, scientificName: hit.detail.scientificName }] : [],
          endOfRecords: true,
        },
      };
    }
    const match = Object.values(species).find((entry) => url === `${GBIF_URL}/species/${entry.key}`);
    if (!match) {
      throw new Error(`unexpected GET ${url}`);
    }
    return { status: 200, data: match.detail };
  });
}
