/**
 * API Client
 */

import axios, { AxiosInstance } from 'axios';
import { configManager } from './config';
import { APIError, ImagesResponse, TargetSnapshot } from './types';

function isAPIErrorBody(data: unknown): data is Partial<APIError> {
  return typeof data === 'object' && data !== null && ('message' in data || 'code' in data);
}

export class APIClient {
  private client: AxiosInstance;

  constructor(endpoint?: string, client?: AxiosInstance) {
    const baseURL = endpoint || configManager.getEndpoint();
    this.client = client ?? axios.create({ baseURL });
  }

  /**
   * List target names
   */
  async listTargets(): Promise<string[]> {
    const response = await this.client.get<string[]>('/targets');
    return response.data;
  }

  /**
   * Get the latest snapshot of a target
   */
  async getTarget(name: string): Promise<TargetSnapshot> {
    const response = await this.client.get<TargetSnapshot>(`/targets/${encodeURIComponent(name)}`);
    return response.data;
  }

  async getAvailable(name: string): Promise<ImagesResponse> {
    const response = await this.client.get<ImagesResponse>(`/targets/${encodeURIComponent(name)}/available`);
    return response.data;
  }

  async getDesired(name: string): Promise<ImagesResponse> {
    const response = await this.client.get<ImagesResponse>(`/targets/${encodeURIComponent(name)}/desired`);
    return response.data;
  }

  /**
   * Create or replace a target. The body is validated by the server.
   */
  async createTarget(body: unknown): Promise<TargetSnapshot> {
    const response = await this.client.post<TargetSnapshot>('/targets', body);
    return response.data;
  }

  async deleteTarget(name: string): Promise<void> {
    await this.client.delete(`/targets/${encodeURIComponent(name)}`);
  }

  /**
   * Handle API error
   */
  static handleError(error: unknown): APIError {
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      const data: unknown = error.response?.data;
      if (isAPIErrorBody(data)) {
        return {
          code: typeof data.code === 'number' ? data.code : status || 500,
          message: typeof data.message === 'string' ? data.message : error.message,
          details: typeof data.details === 'string' ? data.details : undefined,
        };
      }
      return {
        code: status || 500,
        message: error.message,
      };
    }
    return {
      code: 500,
      message: error instanceof Error ? error.message : 'Unknown error',
    };
  }
}
