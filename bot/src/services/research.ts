import axios, { type AxiosInstance } from 'axios';
import { errorMessage } from '../core/errors';
import { isRecord, readRecords, readString } from '../utils/json';
import { Logger } from '../utils/logger';

export interface ResearchProvider {
  /** Recent web and news snippets for the query. Empty when nothing is available. */
  gather(query: string): Promise<string>;
}

export interface ResearchKeys {
  tavilyApiKey: string;
  newsApiKey: string;
}

const MAX_RESULTS = 4;

/**
 * Tavily web search and NewsAPI, queried in parallel. Each source is optional
 * (skipped without a key) and contributes nothing when it fails.
 */
export class ResearchService implements ResearchProvider {
  private readonly http: AxiosInstance;

  constructor(private readonly keys: ResearchKeys) {
    this.http = axios.create({ timeout: 12_000 });
  }

  async gather(query: string): Promise<string> {
    const q = query.trim().slice(0, 300);
    if (!q) return '';

    const [web, news] = await Promise.all([this.tavily(q), this.newsApi(q)]);
    const parts: string[] = [];
    if (web) parts.push(`Web/News (Tavily):\n${web}`);
    if (news) parts.push(`News (NewsAPI):\n${news}`);
    return parts.join('\n\n');
  }

  private async tavily(query: string): Promise<string> {
    if (!this.keys.tavilyApiKey) return '';
    try {
      const res = await this.http.post<unknown>('https://api.tavily.com/search', {
        api_key: this.keys.tavilyApiKey,
        query,
        search_depth: 'basic',
        max_results: MAX_RESULTS,
        topic: 'news',
        include_answer: false,
      });
      if (!isRecord(res.data)) return '';
      return formatItems(readRecords(res.data.results), 'content', 400);
    } catch (err) {
      Logger.debug(`[RESEARCH] Tavily failed: ${errorMessage(err)}`);
      return '';
    }
  }

  private async newsApi(query: string): Promise<string> {
    if (!this.keys.newsApiKey) return '';
    try {
      const res = await this.http.get<unknown>('https://newsapi.org/v2/everything', {
        params: {
          q: query.slice(0, 200),
          apiKey: this.keys.newsApiKey,
          pageSize: MAX_RESULTS,
          language: 'en',
          sortBy: 'relevancy',
        },
      });
      if (!isRecord(res.data)) return '';
      return formatItems(readRecords(res.data.articles), 'description', 300);
    } catch (err) {
      Logger.debug(`[RESEARCH] NewsAPI failed: ${errorMessage(err)}`);
      return '';
    }
  }
}

function formatItems(items: Record<string, unknown>[], bodyKey: string, bodyLimit: number): string {
  return items
    .slice(0, MAX_RESULTS)
    .map(item => ({
      title: readString(item, 'title').slice(0, 120),
      body: readString(item, bodyKey).slice(0, bodyLimit),
    }))
    .filter(item => item.title || item.body)
    .map(item => `- ${item.title}\n  ${item.body}`)
    .join('\n');
}
