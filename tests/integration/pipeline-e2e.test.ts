/**
 * End-to-end pipeline runs against an in-process HTTP server standing in for
 * both GBIF and the target API
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import { join } from 'path';
import { runPipeline } from '../../src/lib/orchestrator/index.js';
import type { PipelineSettings } from '../../src/lib/orchestrator/index.js';
import { createHttpClient } from '../../src/lib/utils/http-client.js';
import { createTempDir, readJSON, removeTempDir } from '../helpers/fixtures.js';

const details: Record<string, Record<string, unknown>> = {
  '2440954': {
    key: 2440954,
    scientificName: 'Cervus elaphus',
    commonName: 'Cerf élaphe',
    iucnStatus: 'LC',
    rank: 'SPECIES',
    order: 'Artiodactyla',
    family: 'Cervidae',
    genus: 'Cervus',
  },
  '2433433': {
    key: 2433433,
    scientificName: 'Ursus arctos',
    vernacularName: 'Brown bear',
    iucnStatus: 'LC',
  },
  '9999001': {
    key: 9999001,
    scientificName: 'Dubius statusus',
    iucnStatus: 'UNKNOWN_CODE',
  },
};

const searchKeys: Record<string, number> = {
  'Cervus elaphus': 2440954,
  'Ursus arctos': 2433433,
  'Dubius statusus': 9999001,
};

function sendJSON(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

async function readBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return JSON.parse(Buffer.concat(chunks).toString('utf8'));
}

describe('Pipeline end to end', () => {
  let server: Server;
  let baseUrl: string;
  let received: unknown[];
  let dir: string;
  let config: PipelineSettings;

  beforeAll(async () => {
    server = createServer((req, res) => {
      const url = new URL(req.url ?? '/', 'http://localhost');

      if (req.method === 'GET' && url.pathname === '/v1/species/search') {
        const key = searchKeys[url.searchParams.get('q') ?? ''];
        const results = key ? [{ key, scientificName: details[String(key)]?.scientificName }] : [];
        sendJSON(res, 200, { offset: 0, limit: 1, endOfRecords: true, results });
        return;
      }

      const detail = url.pathname.match(/^\/v1\/species\/(\d+)$/);
      if (req.method === 'GET' && detail) {
        const body = details[detail[1] ?? ''];
        if (body) {
          sendJSON(res, 200, body);
        } else {
          sendJSON(res, 404, { error: 'not found' });
        }
        return;
      }

      if (req.method === 'POST' && url.pathname === '/animaux') {
        readBody(req).then(
          (body) => {
            received.push(body);
            const duplicate =
              typeof body === 'object' && body !== null && 'nom' in body && body.nom === 'Ursus arctos';
            if (duplicate) {
              sendJSON(res, 409, { error: 'duplicate' });
            } else {
              sendJSON(res, 201, { id: received.length });
            }
          },
          () => sendJSON(res, 400, { error: 'bad json' }),
        );
        return;
      }

      sendJSON(res, 404, { error: 'no route' });
    });

    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('test server has no TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  beforeEach(async () => {
    received = [];
    dir = await createTempDir();
    config = {
      apiUrl: `${baseUrl}/animaux`,
      httpTimeoutMs: 2000,
      gbifApiUrl: `${baseUrl}/v1`,
      rawDataDir: join(dir, 'raw'),
      processedDataDir: join(dir, 'processed'),
    };
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should fetch, transform, validate and send one species', async () => {
    const http = createHttpClient({ timeoutMs: config.httpTimeoutMs });

    const summary = await runPipeline('Cervus elaphus', { config, http });

    expect(summary.status).toBe('Completed');
    expect(summary.counts).toEqual({
      fetched: 1,
      transformed: 1,
      validated: 1,
      rejected: 0,
      sent: 1,
      failed: 0,
    });
    expect(received).toEqual([
      {
        nom: 'Cervus elaphus',
        nom_commun: 'Cerf élaphe',
        rang: 'SPECIES',
        statutUICN: 'LC',
        ordre: 'Artiodactyla',
        famille: 'Cervidae',
        genre: 'Cervus',
        descriptions: null,
        imageUrl: null,
      },
    ]);
    expect(await readJSON(join(dir, 'raw', 'gbif_Cervus_elaphus.json'))).toEqual(details['2440954']);
  });

  it('should keep rejected records out of the target API', async () => {
    const http = createHttpClient({ timeoutMs: config.httpTimeoutMs });

    const summary = await runPipeline('Dubius statusus', { config, http });

    expect(summary.status).toBe('Aborted');
    expect(summary.failedStage).toBe('validate');
    expect(summary.counts.rejected).toBe(1);
    expect(received).toEqual([]);
    expect(await readJSON(join(dir, 'processed', 'animals_validation_errors.json'))).toMatchObject([
      { reason: 'invalid statutUICN', record: { nom: 'Dubius statusus', statutUICN: 'UNKNOWN_CODE' } },
    ]);
  });

  it('should record a conflict answered by the target API', async () => {
    const http = createHttpClient({ timeoutMs: config.httpTimeoutMs });

    const summary = await runPipeline('Ursus arctos', { config, http });

    expect(summary.status).toBe('CompletedWithErrors');
    expect(summary.counts.sent).toBe(0);
    expect(summary.counts.failed).toBe(1);
    expect(await readJSON(join(dir, 'processed', 'send_errors.json'))).toEqual([
      {
        index: 0,
        nom: 'Ursus arctos',
        kind: 'HTTP_ERROR',
        statusCode: 409,
        response: '{"error":"duplicate"}',
        error: 'Target API answered 409 for "Ursus arctos"',
        record: {
          nom: 'Ursus arctos',
          nom_commun: 'Brown bear',
          rang: null,
          statutUICN: 'LC',
          ordre: null,
          famille: null,
          genre: null,
          descriptions: null,
          imageUrl: null,
        },
      },
    ]);
  });

  it('should abort at fetch for a species GBIF does not know', async () => {
    const http = createHttpClient({ timeoutMs: config.httpTimeoutMs });

    const summary = await runPipeline('Nope nope', { config, http });

    expect(summary.status).toBe('Aborted');
    expect(summary.failedStage).toBe('fetch');
    expect(summary.error?.message).toBe('No GBIF result for "Nope nope"');
    expect(received).toEqual([]);
  });

  it('should report an unreachable target API per record', async () => {
    const http = createHttpClient({ timeoutMs: config.httpTimeoutMs });

    const summary = await runPipeline('Cervus elaphus', {
      config: { ...config, apiUrl: 'http://127.0.0.1:1/animaux' },
      http,
    });

    expect(summary.status).toBe('CompletedWithErrors');
    expect(summary.counts.failed).toBe(1);
    expect(await readJSON(join(dir, 'processed', 'send_errors.json'))).toMatchObject([
      { nom: 'Cervus elaphus', kind: 'CONNECTION_ERROR' },
    ]);
  });
});
