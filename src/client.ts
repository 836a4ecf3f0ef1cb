import axios, { AxiosRequestConfig } from 'axios';
import { Readable } from 'stream';
import { API_ENDPOINTS, HTTP_STATUS, PUBLIC_DOCUMENTS_FILTER } from './constants';
import { ApiError, AuthenticationError } from './errors';
import {
  DocumentPage,
  DrawingApi,
  OnshapeElement,
  TranslationRequest,
  TranslationStatus,
} from './types';

export interface OnshapeClientOptions {
  stack: string;
  accessKey: string;
  secretKey: string;
  logging?: boolean;
  logger?: (message: string) => void;
}

function errorMessage(data: unknown): string | undefined {
  if (typeof data === 'object' && data !== null && 'message' in data && typeof data.message === 'string') {
    return data.message;
  }
  return undefined;
}

/**
 * Thin axios wrapper over the Onshape REST endpoints used for drawing exports.
 * Authenticates with an API key pair over HTTP Basic.
 */
export class OnshapeClient implements DrawingApi {
  private baseUrl: string;
  private auth: { username: string; password: string };
  private logging: boolean;
  private logger: (message: string) => void;

  constructor(options: OnshapeClientOptions) {
    this.baseUrl = options.stack.replace(/\/+$/, '');
    this.auth = { username: options.accessKey, password: options.secretKey };
    this.logging = options.logging ?? false;
    this.logger = options.logger ?? console.log;
  }

  private _log(message: string): void {
    if (this.logging) this.logger(message);
  }

  private async _request<T>(
    method: 'get' | 'post',
    endpoint: string,
    config: AxiosRequestConfig = {},
    body?: unknown
  ): Promise<T> {
    const url = `${this.baseUrl}${endpoint}`;
    const requestConfig: AxiosRequestConfig = {
      headers: { accept: 'application/json' },
      ...config,
      auth: this.auth,
    };

    this._log(`${method.toUpperCase()} ${url}`);
    try {
      const response =
        method === 'get'
          ? await axios.get<T>(url, requestConfig)
          : await axios.post<T>(url, body, requestConfig);
      this._log(`${response.status} ${url}`);
      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        this._log(`${status ?? 'ERR'} ${url}`);
        if (status === HTTP_STATUS.UNAUTHORIZED || status === HTTP_STATUS.FORBIDDEN) {
          throw new AuthenticationError(status);
        }
        const data: unknown = error.response?.data;
        throw new ApiError(errorMessage(data) ?? error.message, status, data);
      }

      throw error;
    }
  }

  getDocuments({ offset, limit }: { offset: number; limit: number }): Promise<DocumentPage> {
    return this._request<DocumentPage>('get', API_ENDPOINTS.documents, {
      params: { filter: PUBLIC_DOCUMENTS_FILTER, offset, limit },
    });
  }

  listElements(did: string, wid: string, elementType?: string): Promise<OnshapeElement[]> {
    return this._request<OnshapeElement[]>('get', API_ENDPOINTS.elements(did, wid), {
      params: elementType ? { elementType } : undefined,
    });
  }

  requestDrawingTranslation(
    did: string,
    wid: string,
    eid: string,
    payload: TranslationRequest
  ): Promise<TranslationStatus> {
    return this._request<TranslationStatus>(
      'post',
      API_ENDPOINTS.drawingTranslation(did, wid, eid),
      { headers: { accept: 'application/json', 'content-type': 'application/json' } },
      payload
    );
  }

  getTranslationStatus(tid: string): Promise<TranslationStatus> {
    return this._request<TranslationStatus>('get', API_ENDPOINTS.translation(tid));
  }

  downloadExternalData(did: string, fid: string): Promise<Readable> {
    return this._request<Readable>('get', API_ENDPOINTS.externalData(did, fid), {
      responseType: 'stream',
      headers: { accept: 'application/octet-stream' },
    });
  }
}
