import type { Readable } from 'stream';

export interface OnshapeDocument {
  id: string;
  name?: string;
  defaultWorkspace: {
    id: string;
    name?: string;
  };
}

export interface DocumentPage {
  items?: OnshapeDocument[];
}

export interface OnshapeElement {
  id: string;
  name?: string;
  dataType?: string;
}

export type TranslationState = 'ACTIVE' | 'DONE' | 'FAILED';

export interface TranslationStatus {
  id: string;
  requestState: TranslationState;
  failureReason?: string;
  resultExternalDataIds?: string[];
}

export interface TranslationRequest {
  formatName: string;
  destinationName: string;
  notifyUser: boolean;
  storeInDocument: boolean;
  linkDocumentWorkspaceId: string | null;
}

/**
 * The slice of the Onshape REST API the exporter talks to.
 */
export interface DrawingApi {
  getDocuments(params: { offset: number; limit: number }): Promise<DocumentPage>;
  listElements(did: string, wid: string, elementType?: string): Promise<OnshapeElement[]>;
  requestDrawingTranslation(
    did: string,
    wid: string,
    eid: string,
    payload: TranslationRequest
  ): Promise<TranslationStatus>;
  getTranslationStatus(tid: string): Promise<TranslationStatus>;
  downloadExternalData(did: string, fid: string): Promise<Readable>;
}

export interface DocumentRef {
  documentId: string;
  workspaceId: string;
  elementId?: string;
}

export interface ExportSummary {
  documentCount: number;
  drawingCount: number;
}

export interface DrawingExporterEvents {
  pageStarted: (data: { offset: number; limit: number }) => void;
  documentsFound: (data: { count: number; offset: number }) => void;
  drawingsFound: (data: { documentId: string; count: number }) => void;
  noDrawings: (data: { documentId: string }) => void;
  fileSkipped: (data: { filePath: string }) => void;
  translationRequested: (data: { elementId: string; format: string; translationId: string }) => void;
  translationPolling: (data: { translationId: string; attempt: number }) => void;
  multipleResults: (data: { translationId: string; count: number }) => void;
  downloadComplete: (data: { filePath: string; format: string }) => void;
  drawingExported: (data: { documentId: string; elementId: string; total: number }) => void;
  exportComplete: (data: ExportSummary) => void;
}
