import type { Server } from 'node:http';
import express from 'express';
import { afterEach, describe, expect, it } from 'vitest';
import { ChatSession } from '../src/core/session.ts';
import { setupUploadRoutes } from '../src/upload/upload-routes.ts';

const SALES_CSV = 'region,sales\nNorth,100\nSouth,200\nEast,300\n';

let server: Server | undefined;

async function startApp(maxFileSizeMb = 1) {
  const session = new ChatSession({ historyCapacity: 0, headRows: 10 });
  const sessions = new Map([['session-1', session]]);
  const app = express();
  setupUploadRoutes(app, sessions, { maxFileSizeMb });

  const listening = app.listen(0, '127.0.0.1');
  server = listening;
  await new Promise<void>((resolve) => listening.once('listening', () => resolve()));

  const address = listening.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Expected a TCP address');
  }
  return { session, baseUrl: `http://127.0.0.1:${address.port}` };
}

function csvForm(content: string, filename: string): FormData {
  const form = new FormData();
  form.append('file', new Blob([content], { type: 'text/csv' }), filename);
  return form;
}

afterEach(async () => {
  const running = server;
  server = undefined;
  if (running) {
    await new Promise<void>((resolve, reject) => running.close((error) => (error ? reject(error) : resolve())));
  }
});

describe('POST /sessions/:sessionId/upload', () => {
  it('loads the uploaded file into the session', async () => {
    const { session, baseUrl } = await startApp();

    const response = await fetch(`${baseUrl}/sessions/session-1/upload`, {
      method: 'POST',
      body: csvForm(SALES_CSV, 'sales.csv'),
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ success: true, filename: 'sales.csv', rows: 3, columns: 2 });
    expect(session.dataset?.source).toBe('sales.csv');
  });

  it('answers 404 for an unknown session', async () => {
    const { baseUrl } = await startApp();

    const response = await fetch(`${baseUrl}/sessions/nope/upload`, {
      method: 'POST',
      body: csvForm(SALES_CSV, 'sales.csv'),
    });

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Session not found' });
  });

  it('only accepts .csv files', async () => {
    const { session, baseUrl } = await startApp();

    const response = await fetch(`${baseUrl}/sessions/session-1/upload`, {
      method: 'POST',
      body: csvForm(SALES_CSV, 'notes.txt'),
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'File type .txt is not allowed. Upload a .csv file.' });
    expect(session.dataset).toBeUndefined();
  });

  it('rejects a malformed file with the load error code', async () => {
    const { baseUrl } = await startApp();

    const response = await fetch(`${baseUrl}/sessions/session-1/upload`, {
      method: 'POST',
      body: csvForm('a,b\n1,2,3\n', 'broken.csv'),
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: 'Malformed CSV: expected 2 fields in data row 1, saw 3.',
      code: 'DATA_LOAD_ERROR',
    });
  });

  it('rejects a file that is not UTF-8', async () => {
    const { session, baseUrl } = await startApp();
    const latin1 = Buffer.from('city\nM\xfcnchen\n', 'latin1');
    const form = new FormData();
    form.append('file', new Blob([latin1], { type: 'text/csv' }), 'cities.csv');

    const response = await fetch(`${baseUrl}/sessions/session-1/upload`, { method: 'POST', body: form });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: 'The file is not valid UTF-8 text. Save it as UTF-8 and upload it again.',
      code: 'DATA_LOAD_ERROR',
    });
    expect(session.dataset).toBeUndefined();
  });

  it('answers 413 for a file over the size limit', async () => {
    const { session, baseUrl } = await startApp(0.00001);

    const response = await fetch(`${baseUrl}/sessions/session-1/upload`, {
      method: 'POST',
      body: csvForm(SALES_CSV, 'sales.csv'),
    });

    expect(response.status).toBe(413);
    expect(await response.json()).toEqual({ error: 'File exceeds the maximum size of 0.00001 MB.' });
    expect(session.dataset).toBeUndefined();
  });

  it('requires a multipart body', async () => {
    const { baseUrl } = await startApp();

    const response = await fetch(`${baseUrl}/sessions/session-1/upload`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ csv: SALES_CSV }),
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Invalid request. Expected multipart/form-data.' });
  });
});
