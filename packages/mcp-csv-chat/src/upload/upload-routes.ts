/**
 * Upload HTTP Routes
 *
 * - POST /sessions/:sessionId/upload  Accepts one multipart CSV file and loads it
 *   as the dataset of the MCP session with that ID.
 */

import { type Request, type Response } from 'express';
import type express from 'express';
import type { Readable } from 'node:stream';
import { basename, extname } from 'node:path';
import Busboy from 'busboy';
import type { ChatSession } from '../core/session.ts';
import { parseCsv } from '../core/table.ts';
import { DataLoadError } from '../utils/errors.ts';
import { logger } from '../utils/logger.ts';

export interface UploadRouteOptions {
  maxFileSizeMb: number;
}

interface ReceivedFile {
  filename: string;
  content: Buffer;
}

const ALLOWED_EXTENSIONS = ['.csv'];

/**
 * Extracts a route param as a single string (Express 5 params may be string | string[]).
 */
function paramString(value: string | string[] | undefined): string {
  if (Array.isArray(value)) return value[0] ?? '';
  return value ?? '';
}

/**
 * Strips directory components and control characters from a client-supplied name.
 */
function sanitiseFilename(raw: string): string {
  const name = basename(raw)
    .replace(/[\x00-\x1f\x7f/\\:*?"<>|]/g, '_')
    .replace(/^[\s.]+|[\s.]+$/g, '')
    .slice(0, 200);
  return name || 'upload.csv';
}

/**
 * @throws DataLoadError when the bytes are not valid UTF-8
 */
function decodeCsv(content: Buffer): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(content);
  } catch (error) {
    if (error instanceof TypeError) {
      throw new DataLoadError('The file is not valid UTF-8 text. Save it as UTF-8 and upload it again.');
    }
    throw error;
  }
}

export function setupUploadRoutes(
  app: express.Application,
  sessions: Map<string, ChatSession>,
  options: UploadRouteOptions,
): void {
  const maxFileSize = Math.round(options.maxFileSizeMb * 1024 * 1024);

  app.post('/sessions/:sessionId/upload', async (req: Request, res: Response) => {
    const sessionId = paramString(req.params.sessionId);
    const session = sessions.get(sessionId);

    if (!session) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }

    let busboy: Busboy.Busboy;
    try {
      busboy = Busboy({
        headers: req.headers,
        limits: { files: 1, fileSize: maxFileSize },
      });
    } catch {
      res.status(400).json({ error: 'Invalid request. Expected multipart/form-data.' });
      return;
    }

    let fileSeen = false;
    let fileTooLarge = false;
    let uploadError: string | null = null;

    const uploadPromise = new Promise<ReceivedFile | null>((resolve) => {
      busboy.on('file', (_fieldname: string, fileStream: Readable, info: Busboy.FileInfo) => {
        if (fileSeen) {
          fileStream.resume();
          return;
        }
        fileSeen = true;

        const filename = sanitiseFilename(info.filename || 'upload.csv');
        const extension = extname(filename).toLowerCase();
        if (!ALLOWED_EXTENSIONS.includes(extension)) {
          uploadError = `File type ${extension || '(none)'} is not allowed. Upload a .csv file.`;
          fileStream.resume();
          resolve(null);
          return;
        }

        const chunks: Buffer[] = [];
        fileStream.on('data', (chunk: Buffer) => {
          chunks.push(chunk);
        });
        fileStream.on('limit', () => {
          fileTooLarge = true;
        });
        fileStream.on('end', () => {
          resolve(fileTooLarge ? null : { filename, content: Buffer.concat(chunks) });
        });
        fileStream.on('error', (error: Error) => {
          logger.error({ error: error.message, sessionId }, 'Upload stream error');
          uploadError = 'Failed to read the uploaded file.';
          resolve(null);
        });
      });

      busboy.on('error', (error: Error) => {
        logger.error({ error: error.message, sessionId }, 'Busboy parsing error');
        uploadError = 'Failed to parse upload.';
        resolve(null);
      });

      busboy.on('close', () => {
        if (!fileSeen) {
          uploadError = 'No file was included in the upload.';
          resolve(null);
        }
      });
    });

    req.pipe(busboy);
    const received = await uploadPromise;

    if (fileTooLarge) {
      res.status(413).json({ error: `File exceeds the maximum size of ${options.maxFileSizeMb} MB.` });
      return;
    }

    if (uploadError || !received) {
      res.status(400).json({ error: uploadError ?? 'Upload failed.' });
      return;
    }

    try {
      const dataset = session.loadTable(parseCsv(decodeCsv(received.content)), received.filename);
      logger.info(
        { sessionId, filename: received.filename, size: received.content.length },
        'CSV uploaded',
      );
      res.json({
        success: true,
        filename: received.filename,
        rows: dataset.profile.rowCount,
        columns: dataset.profile.columnCount,
      });
    } catch (error) {
      if (error instanceof DataLoadError) {
        logger.warn({ sessionId, filename: received.filename, error: error.message }, 'Rejected CSV upload');
        res.status(400).json({ error: error.message, code: error.code });
        return;
      }
      logger.error(
        { sessionId, error: error instanceof Error ? error.message : String(error) },
        'Failed to load uploaded CSV',
      );
      res.status(500).json({ error: 'Failed to load the uploaded file.' });
    }
  });
}
