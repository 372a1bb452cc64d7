import axios, { type AxiosInstance } from 'axios';
import type { Dataset, GameDataSource } from './types';

export const DATASET_FILES: Record<Dataset, string> = {
  stage: 'stage_table.json',
  zone: 'zone_table.json',
  activity: 'activity_table.json',
  character: 'character_table.json',
  tower: 'climb_tower_table.json'
};

/**
 * Transport failure reduced to plain fields; axios errors hold the socket and
 * request objects, which are circular.
 */
export class GameDataFetchError extends Error {
  constructor(
    message: string,
    readonly url: string,
    readonly status: number | null,
    readonly code: string | null
  ) {
    super(message);
    this.name = 'GameDataFetchError';
  }
}

export interface HttpGameDataSourceOptions {
  baseUrl: string;
  timeoutMs: number;
  client?: AxiosInstance;
}

export class HttpGameDataSource implements GameDataSource {
  private readonly client: AxiosInstance;

  constructor(private readonly options: HttpGameDataSourceOptions) {
    this.client = options.client ?? axios.create();
  }

  urlFor(dataset: Dataset): string {
    return `${this.options.baseUrl.replace(/\/+$/, '')}/${DATASET_FILES[dataset]}`;
  }

  async fetch(dataset: Dataset): Promise<string> {
    const url = this.urlFor(dataset);
    let data: unknown;
    try {
      const response = await this.client.get<unknown>(url, {
        responseType: 'text',
        timeout: this.options.timeoutMs,
        transformResponse: [(body: unknown) => body]
      });
      data = response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw new GameDataFetchError(error.message, url, error.response?.status ?? null, error.code ?? null);
      }
      throw error;
    }
    if (data === null || data === undefined) {
      return '';
    }
    return typeof data === 'string' ? data : JSON.stringify(data);
  }
}
