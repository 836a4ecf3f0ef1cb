export const DEFAULT_CONFIG = {
  stack: 'https://cad.onshape.com',
  outputPath: 'data',
  formats: ['DWG', 'PNG'],
  pageSize: 20,
  pollInterval: 2000,
  downloadPause: 1000,
  maxPollAttempts: 0,
};

export const API_ENDPOINTS = {
  documents: '/api/documents',
  elements: (did: string, wid: string) => `/api/documents/d/${did}/w/${wid}/elements`,
  drawingTranslation: (did: string, wid: string, eid: string) =>
    `/api/drawings/d/${did}/w/${wid}/e/${eid}/translations`,
  translation: (tid: string) => `/api/translations/${tid}`,
  externalData: (did: string, fid: string) => `/api/documents/d/${did}/externaldata/${fid}`,
};

export const HTTP_STATUS = {
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
} as const;

export const PUBLIC_DOCUMENTS_FILTER = 4;
export const APPLICATION_ELEMENT_TYPE = 'APPLICATION';
export const DRAWING_DATA_TYPE = 'onshape-app/drawing';
export const MAX_PAGE_SIZE = 20;
