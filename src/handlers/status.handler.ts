import { Request, Response } from 'express';
import { DocumentStore } from '../db/documentStore.js';
import { logger } from '../utils/logger.js';

export const APP_NAME = 'CTF Scoring API';
const COLLECTION_PREVIEW_LIMIT = 10;

export interface RootResponse {
  name: string;
  status: 'ok';
}

export interface DiagnosticResponse {
  backend: string;
  database: string;
  database_url: string | null;
  database_name: string | null;
  connection_status: string;
  collections: string[];
}

function describe(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return message.slice(0, 50);
}

export class StatusHandler {
  constructor(
    private readonly store: DocumentStore,
    private readonly databaseUrlConfigured: boolean
  ) {}

  getRoot(req: Request, res: Response<RootResponse>): void {
    res.json({ name: APP_NAME, status: 'ok' });
  }

  /**
   * Probe the store and report what was reachable. Store failures are
   * written into the payload; this endpoint always answers 200.
   */
  async getDiagnostics(req: Request, res: Response<DiagnosticResponse>): Promise<void> {
    const response: DiagnosticResponse = {
      backend: '✅ Running',
      database: '❌ Not Available',
      database_url: null,
      database_name: null,
      connection_status: 'Not Connected',
      collections: [],
    };

    try {
      response.database = '✅ Available';
      response.database_url = this.databaseUrlConfigured ? '✅ Set' : '❌ Not Set';
      response.database_name = await this.store.databaseName();
      response.connection_status = 'Connected';

      try {
        response.collections = await this.store.listCollections(COLLECTION_PREVIEW_LIMIT);
        response.database = '✅ Connected & Working';
      } catch (error) {
        logger.warn({ err: error }, 'Listing collections failed');
        response.database = `⚠️  Connected but Error: ${describe(error)}`;
      }
    } catch (error) {
      logger.warn({ err: error }, 'Database probe failed');
      response.database = `❌ Error: ${describe(error)}`;
    }

    res.json(response);
  }
}
