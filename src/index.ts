import fs from 'fs-extra';
import path from 'path';
import { EventEmitter } from 'events';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { OnshapeClient } from './client';
import {
  APPLICATION_ELEMENT_TYPE,
  DEFAULT_CONFIG,
  DRAWING_DATA_TYPE,
  MAX_PAGE_SIZE,
} from './constants';
import {
  ConfigurationError,
  InvalidUrlError,
  TranslationFailedError,
  TranslationTimeoutError,
} from './errors';
import {
  DocumentRef,
  DrawingApi,
  DrawingExporterEvents,
  ExportSummary,
  OnshapeDocument,
  OnshapeElement,
  TranslationStatus,
} from './types';

export * from './errors';
export * from './types';
export { OnshapeClient } from './client';

export interface ExporterConfigOptions {
  accessKey?: string;
  secretKey?: string;
  stack?: string;
  outputPath?: string;
  formats?: string[];
  pageSize?: number;
  pollInterval?: number;
  downloadPause?: number;
  /** 0 polls until the translation leaves ACTIVE, however long that takes. */
  maxPollAttempts?: number;
  logging?: boolean;
}

export type Sleep = (ms: number) => Promise<void>;

export interface ExporterDependencies {
  client?: DrawingApi;
  sleep?: Sleep;
  logger?: (message: string) => void;
}

export interface RunOptions {
  offset?: number;
  limit: number;
}

const defaultSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export function outputFileName(did: string, wid: string, eid: string, format: string): string {
  return `d${did}_w${wid}_e${eid}.${format.toLowerCase()}`;
}

/**
 * Extracts document, workspace and (optional) element ids from a URL such as
 * `https://cad.onshape.com/documents/<did>/w/<wid>/e/<eid>`.
 */
export function parseDocumentUrl(url: string): DocumentRef {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    throw new InvalidUrlError(url);
  }

  const [, documents, documentId, w, workspaceId, e, elementId] = pathname.split('/');
  if (documents !== 'documents' || !documentId || w !== 'w' || !workspaceId) {
    throw new InvalidUrlError(url);
  }
  if (e && (e !== 'e' || !elementId)) {
    throw new InvalidUrlError(url);
  }

  return elementId ? { documentId, workspaceId, elementId } : { documentId, workspaceId };
}

export class ExporterConfig {
  accessKey: string;
  secretKey: string;
  stack: string;
  outputPath: string;
  formats: string[];
  pageSize: number;
  pollInterval: number;
  downloadPause: number;
  maxPollAttempts: number;
  logging: boolean;

  constructor(config: ExporterConfigOptions = {}) {
    this.accessKey = config.accessKey || process.env.ONSHAPE_ACCESS_KEY || '';
    this.secretKey = config.secretKey || process.env.ONSHAPE_SECRET_KEY || '';
    this.stack = config.stack || process.env.ONSHAPE_STACK || DEFAULT_CONFIG.stack;
    this.outputPath = config.outputPath || DEFAULT_CONFIG.outputPath;
    this.formats = (config.formats ?? DEFAULT_CONFIG.formats).map(format => format.toUpperCase());
    this.pageSize = config.pageSize ?? DEFAULT_CONFIG.pageSize;
    this.pollInterval = config.pollInterval ?? DEFAULT_CONFIG.pollInterval;
    this.downloadPause = config.downloadPause ?? DEFAULT_CONFIG.downloadPause;
    this.maxPollAttempts = config.maxPollAttempts ?? DEFAULT_CONFIG.maxPollAttempts;
    this.logging = config.logging ?? false;

    this.validate();
  }

  validate(): void {
    if (!this.accessKey) throw new ConfigurationError('Onshape access key is required');
    if (!this.secretKey) throw new ConfigurationError('Onshape secret key is required');
    if (!/^https?:\/\//.test(this.stack)) {
      throw new ConfigurationError('Stack must be an http(s) URL');
    }
    if (this.formats.length === 0) throw new ConfigurationError('At least one format is required');
    if (this.pageSize < 1 || this.pageSize > MAX_PAGE_SIZE) {
      throw new ConfigurationError(`pageSize must be between 1 and ${MAX_PAGE_SIZE}`);
    }
    if (this.pollInterval < 0) throw new ConfigurationError('pollInterval must be non-negative');
    if (this.downloadPause < 0) throw new ConfigurationError('downloadPause must be non-negative');
    if (this.maxPollAttempts < 0) throw new ConfigurationError('maxPollAttempts must be non-negative');
  }
}

export interface DrawingExporter {
  on<K extends keyof DrawingExporterEvents>(event: K, listener: DrawingExporterEvents[K]): this;
  emit<K extends keyof DrawingExporterEvents>(
    event: K,
    ...args: Parameters<DrawingExporterEvents[K]>
  ): boolean;
}

export class DrawingExporter extends EventEmitter {
  private config: ExporterConfig;
  private client: DrawingApi;
  private sleep: Sleep;
  private drawingCount: number;

  constructor(config: ExporterConfigOptions = {}, deps: ExporterDependencies = {}) {
    super();
    this.config = new ExporterConfig(config);
    this.client =
      deps.client ??
      new OnshapeClient({
        stack: this.config.stack,
        accessKey: this.config.accessKey,
        secretKey: this.config.secretKey,
        logging: this.config.logging,
        logger: deps.logger,
      });
    this.sleep = deps.sleep ?? defaultSleep;
    this.drawingCount = 0;
  }

  outputPathFor(did: string, wid: string, eid: string, format: string): string {
    return path.join(this.config.outputPath, outputFileName(did, wid, eid, format));
  }

  async listDocuments(offset: number, limit: number): Promise<OnshapeDocument[]> {
    const page = await this.client.getDocuments({ offset, limit });
    return (page.items ?? []).slice(0, limit);
  }

  async listDrawings(did: string, wid: string): Promise<OnshapeElement[]> {
    const elements = await this.client.listElements(did, wid, APPLICATION_ELEMENT_TYPE);
    if (!Array.isArray(elements)) return [];
    return elements.filter(element => element.dataType === DRAWING_DATA_TYPE);
  }

  async waitForTranslation(tid: string): Promise<TranslationStatus> {
    for (let attempt = 1; ; attempt++) {
      const status = await this.client.getTranslationStatus(tid);
      if (status.requestState !== 'ACTIVE') return status;

      if (this.config.maxPollAttempts > 0 && attempt >= this.config.maxPollAttempts) {
        throw new TranslationTimeoutError(tid, attempt);
      }
      this.emit('translationPolling', { translationId: tid, attempt });
      await this.sleep(this.config.pollInterval);
    }
  }

  /**
   * Translates one drawing into each format and downloads the results.
   * Formats whose output file already exists are skipped without any request.
   * Resolves with the paths written by this call.
   */
  async exportDrawing(
    did: string,
    wid: string,
    eid: string,
    formats: string[] = this.config.formats
  ): Promise<string[]> {
    const written: string[] = [];

    for (const format of formats) {
      const filePath = this.outputPathFor(did, wid, eid, format);
      if (await fs.pathExists(filePath)) {
        this.emit('fileSkipped', { filePath });
        continue;
      }

      const request = await this.client.requestDrawingTranslation(did, wid, eid, {
        formatName: format,
        destinationName: path.basename(filePath),
        notifyUser: false,
        storeInDocument: false,
        linkDocumentWorkspaceId: null,
      });
      if (request.requestState === 'FAILED') {
        throw new TranslationFailedError(request.failureReason, request.id);
      }
      this.emit('translationRequested', { elementId: eid, format, translationId: request.id });

      const result = await this.waitForTranslation(request.id);
      if (result.requestState === 'FAILED') {
        throw new TranslationFailedError(result.failureReason, request.id);
      }

      // Only the first result is downloaded.
      const [externalDataId, ...extra] = result.resultExternalDataIds ?? [];
      if (!externalDataId) {
        throw new TranslationFailedError('translation finished without a result file', request.id);
      }
      if (extra.length > 0) {
        this.emit('multipleResults', { translationId: request.id, count: extra.length + 1 });
      }

      await this._download(did, externalDataId, filePath);
      written.push(filePath);
      this.emit('downloadComplete', { filePath, format });
      await this.sleep(this.config.downloadPause);
    }

    return written;
  }

  private async _download(did: string, fid: string, filePath: string): Promise<void> {
    const tempPath = `${filePath}.part`;
    const data: Readable = await this.client.downloadExternalData(did, fid);

    try {
      await pipeline(data, fs.createWriteStream(tempPath));
      await fs.move(tempPath, filePath, { overwrite: false });
    } catch (error) {
      await fs.remove(tempPath);
      throw error;
    }
  }

  private async _exportWorkspace(did: string, wid: string): Promise<void> {
    const drawings = await this.listDrawings(did, wid);
    if (drawings.length === 0) {
      this.emit('noDrawings', { documentId: did });
      return;
    }

    this.emit('drawingsFound', { documentId: did, count: drawings.length });
    for (const drawing of drawings) {
      await this.exportDrawing(did, wid, drawing.id);
      this.drawingCount++;
      this.emit('drawingExported', { documentId: did, elementId: drawing.id, total: this.drawingCount });
    }
  }

  /**
   * Pages through public documents starting at `offset`, covering at most
   * `limit` of them, and exports every drawing found.
   */
  async run({ offset = 0, limit }: RunOptions): Promise<ExportSummary> {
    await fs.ensureDir(this.config.outputPath);
    this.drawingCount = 0;

    const { pageSize } = this.config;
    const pageCount = Math.ceil(Math.max(limit, 0) / pageSize);
    let documentCount = 0;

    for (let page = 0; page < pageCount; page++) {
      const pageOffset = offset + page * pageSize;
      const pageLimit = Math.min(pageSize, limit - page * pageSize);

      this.emit('pageStarted', { offset: pageOffset, limit: pageLimit });
      const documents = await this.listDocuments(pageOffset, pageLimit);
      this.emit('documentsFound', { count: documents.length, offset: pageOffset });

      for (const document of documents) {
        documentCount++;
        await this._exportWorkspace(document.id, document.defaultWorkspace.id);
      }

      // An empty page means the listing is exhausted.
      if (documents.length === 0) break;
    }

    const summary = { documentCount, drawingCount: this.drawingCount };
    this.emit('exportComplete', summary);
    return summary;
  }

  /**
   * Exports the drawing named by an Onshape URL, or every drawing in the
   * workspace when the URL stops at the workspace.
   */
  async exportFromUrl(url: string): Promise<ExportSummary> {
    const { documentId, workspaceId, elementId } = parseDocumentUrl(url);
    await fs.ensureDir(this.config.outputPath);
    this.drawingCount = 0;

    if (elementId) {
      await this.exportDrawing(documentId, workspaceId, elementId);
      this.drawingCount++;
      this.emit('drawingExported', { documentId, elementId, total: this.drawingCount });
    } else {
      await this._exportWorkspace(documentId, workspaceId);
    }

    const summary = { documentCount: 1, drawingCount: this.drawingCount };
    this.emit('exportComplete', summary);
    return summary;
  }
}
