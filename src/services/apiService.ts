import axios from 'axios';
import { getApiBaseUrl } from '../lib/apiConfig';
import type {
  AppSettings,
  DocumentInfo,
  EstimateSection,
  PagePreview,
  ShapeDescriptor,
} from '../types';

const API_BASE_URL = getApiBaseUrl();

const apiClient = axios.create({
  baseURL: API_BASE_URL,
  timeout: 600000, // 10 minutes; saving a large drawing waits for the worker
  headers: {
    'Content-Type': 'application/json',
  },
});

// Add response interceptor to turn an unreachable back end into a readable error
apiClient.interceptors.response.use(
  (response) => response,
  (error: unknown) => {
    if (axios.isAxiosError(error) && (error.code === 'ERR_NETWORK' || error.code === 'ECONNREFUSED')) {
      console.warn('⚠️ API: Back end is not available:', error.message);
      error.message = 'Back end server is not available.';
    }
    return Promise.reject(error);
  }
);

export interface PreviewStatus {
  previews: PagePreview[];
  rendering: boolean;
}

// Document service
export const documentService = {
  async openDocument(path: string): Promise<DocumentInfo> {
    const response = await apiClient.post<{ document: DocumentInfo }>('/documents/open', { path });
    return response.data.document;
  },

  async getPreviews(id: string): Promise<PreviewStatus> {
    const response = await apiClient.get<PreviewStatus>(`/documents/${id}/previews`);
    return response.data;
  },

  async saveDocument(id: string, shapes: ShapeDescriptor[], destinationPath?: string): Promise<string> {
    const body = destinationPath === undefined ? { shapes } : { shapes, destinationPath };
    const response = await apiClient.post<{ path: string }>(`/documents/${id}/save`, body);
    return response.data.path;
  },

  async exportSpreadsheet(id: string, sections: EstimateSection[], totalLabor: number): Promise<string> {
    const response = await apiClient.post<{ path: string }>(`/documents/${id}/export`, { sections, totalLabor });
    return response.data.path;
  },

  async closeDocument(id: string): Promise<void> {
    await apiClient.delete(`/documents/${id}`);
  },
};

// Settings service
export const settingsService = {
  async getSettings(): Promise<AppSettings> {
    const response = await apiClient.get<{ settings: AppSettings }>('/settings');
    return response.data.settings;
  },
};
